// Unit ownership index.
// Purpose: map unit roots to owning units and resolve which unit contains a path.
// Assumes roots and lookups are workspace-relative paths using forward slashes.

import { compareStrings } from "../core/utils.js";

import { isPathWithinRoot, rootDepth, toWorkspaceRelative } from "./paths.js";
import type { Unit } from "./schema.js";

export type OwnershipRoot = {
  unit_id: string;
  root: string;
  depth: number;
};

export type OwnershipIndex = {
  roots: OwnershipRoot[];
};

// =============================================================================
// INDEX BUILD
// =============================================================================

export function buildOwnershipIndex(
  workspaceRoot: string,
  units: readonly Unit[],
): OwnershipIndex {
  const roots: OwnershipRoot[] = [];

  for (const unit of units) {
    const root = toWorkspaceRelative(workspaceRoot, unit.root);
    if (root === null) {
      // Units rooted outside the workspace can never own a workspace path.
      continue;
    }

    roots.push({ unit_id: unit.id, root, depth: rootDepth(root) });
  }

  roots.sort(compareOwnershipRoots);
  return { roots };
}

// =============================================================================
// OWNER RESOLUTION
// =============================================================================

/** First match wins: the index is ordered deepest root first, then by unit id. */
export function resolveOwner(index: OwnershipIndex, workspaceRelativePath: string): string | null {
  for (const entry of index.roots) {
    if (isPathWithinRoot(workspaceRelativePath, entry.root)) {
      return entry.unit_id;
    }
  }
  return null;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function compareOwnershipRoots(a: OwnershipRoot, b: OwnershipRoot): number {
  if (a.depth !== b.depth) {
    return b.depth - a.depth;
  }
  if (a.root !== b.root) {
    return compareStrings(a.root, b.root);
  }
  return compareStrings(a.unit_id, b.unit_id);
}

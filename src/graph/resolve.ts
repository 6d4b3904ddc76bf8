// Change resolution.
// Purpose: map changed paths to the set of directly-changed units.

import { compareStrings } from "../core/utils.js";

import type { ChangedFile } from "./schema.js";
import type { UnitGraph } from "./unit-graph.js";

export type ChangeResolution = {
  unit_ids: Set<string>;
  unmapped_paths: string[];
};

export function resolveChangedUnits(paths: Iterable<string>, graph: UnitGraph): ChangeResolution {
  const unitIds = new Set<string>();
  const unmapped = new Set<string>();

  for (const changedPath of paths) {
    const owner = graph.unitContaining(changedPath);
    if (owner === null) {
      unmapped.add(changedPath);
      continue;
    }
    unitIds.add(owner);
  }

  return {
    unit_ids: unitIds,
    unmapped_paths: Array.from(unmapped).sort(compareStrings),
  };
}

/** Flatten changed files to paths; a rename contributes its source path too. */
export function collectChangedPaths(files: readonly ChangedFile[]): string[] {
  const paths: string[] = [];
  for (const file of files) {
    paths.push(file.path);
    if (file.old_path !== null && file.old_path !== file.path) {
      paths.push(file.old_path);
    }
  }
  return paths;
}

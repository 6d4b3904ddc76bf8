/**
 * VCS adapter for change detection.
 * Purpose: provide the minimal surface test-changed needs from version control.
 * Assumptions: implementations operate on a local working copy; paths come back repo-relative.
 * Usage: createGitVcs() in the CLI; tests inject an in-memory Vcs.
 */

import type { ChangedFile } from "../graph/schema.js";

import { listChangesBetween, listUncommittedChanges } from "./changes.js";
import { resolveRepoRoot } from "./git.js";

// =============================================================================
// TYPES
// =============================================================================

export interface Vcs {
  resolveRepoRoot(cwd: string): Promise<string>;
  listUncommittedChanges(repoRoot: string): Promise<ChangedFile[]>;
  listChangesBetween(repoRoot: string, from: string, to?: string): Promise<ChangedFile[]>;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function createGitVcs(): Vcs {
  return {
    resolveRepoRoot,
    listUncommittedChanges,
    listChangesBetween,
  };
}

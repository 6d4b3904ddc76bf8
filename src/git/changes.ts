import { compareStrings } from "../core/utils.js";
import type { ChangedFile, ChangeKind } from "../graph/schema.js";
import { normalizeRepoPath } from "../graph/paths.js";

import { git } from "./git.js";

// =============================================================================
// PUBLIC API
// =============================================================================

/** Staged, unstaged and untracked changes in the working tree. */
export async function listUncommittedChanges(repoRoot: string): Promise<ChangedFile[]> {
  const res = await git(repoRoot, ["status", "--porcelain=v1", "-z", "--untracked-files=all"]);
  return sortChangedFiles(parseStatusPorcelainZ(res.stdout));
}

export async function listChangesBetween(
  repoRoot: string,
  from: string,
  to = "HEAD",
): Promise<ChangedFile[]> {
  const res = await git(repoRoot, ["diff", "--name-status", "-z", "-M", from, to]);
  return sortChangedFiles(parseNameStatusZ(res.stdout));
}

// =============================================================================
// PARSERS
// =============================================================================

/**
 * Parse `git status --porcelain=v1 -z`. Each entry is `XY path`; rename and copy entries are
 * followed by a second NUL-terminated field holding the source path.
 */
export function parseStatusPorcelainZ(output: string): ChangedFile[] {
  const tokens = splitNul(output);
  const files: ChangedFile[] = [];

  for (let cursor = 0; cursor < tokens.length; cursor += 1) {
    const entry = tokens[cursor];
    if (entry.length < 4) continue;

    const code = entry.slice(0, 2);
    const filePath = normalizeRepoPath(entry.slice(3));

    if (code === "!!") continue;

    if (code.includes("R") || code.includes("C")) {
      cursor += 1;
      const source = cursor < tokens.length ? normalizeRepoPath(tokens[cursor]) : null;
      if (code.includes("R")) {
        files.push({ path: filePath, old_path: source, change: "renamed" });
      } else {
        files.push({ path: filePath, old_path: null, change: "added" });
      }
      continue;
    }

    files.push({ path: filePath, old_path: null, change: statusCodeToKind(code) });
  }

  return files;
}

/** Parse `git diff --name-status -z`: a status field, then one path (two for R and C). */
export function parseNameStatusZ(output: string): ChangedFile[] {
  const tokens = splitNul(output);
  const files: ChangedFile[] = [];

  let cursor = 0;
  while (cursor < tokens.length) {
    const status = tokens[cursor];
    const letter = status.charAt(0);
    cursor += 1;

    if (letter === "R" || letter === "C") {
      const source = tokens[cursor];
      const target = tokens[cursor + 1];
      cursor += 2;
      if (source === undefined || target === undefined) break;

      files.push(
        letter === "R"
          ? { path: normalizeRepoPath(target), old_path: normalizeRepoPath(source), change: "renamed" }
          : { path: normalizeRepoPath(target), old_path: null, change: "added" },
      );
      continue;
    }

    const filePath = tokens[cursor];
    cursor += 1;
    if (filePath === undefined) break;

    files.push({ path: normalizeRepoPath(filePath), old_path: null, change: diffLetterToKind(letter) });
  }

  return files;
}

// =============================================================================
// INTERNALS
// =============================================================================

function splitNul(output: string): string[] {
  return output.split("\0").filter((token) => token.length > 0);
}

function statusCodeToKind(code: string): ChangeKind {
  if (code.includes("D")) return "removed";
  if (code === "??" || code.includes("A")) return "added";
  return "modified";
}

function diffLetterToKind(letter: string): ChangeKind {
  if (letter === "A") return "added";
  if (letter === "D") return "removed";
  return "modified";
}

function sortChangedFiles(files: ChangedFile[]): ChangedFile[] {
  return [...files].sort((a, b) => compareStrings(a.path, b.path));
}

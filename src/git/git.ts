import { execa } from "execa";

import { DiffError } from "../core/errors.js";
import { isRecord } from "../core/utils.js";

export type GitResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export async function git(cwd: string, args: string[]): Promise<GitResult> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
    });
    return { stdout: res.stdout, stderr: res.stderr, exitCode: res.exitCode };
  } catch (err) {
    const stdout = readOutputField(err, "stdout") ?? "";
    const stderr = readOutputField(err, "stderr") || (err instanceof Error ? err.message : String(err));
    throw new DiffError(`git ${args.join(" ")} failed (cwd=${cwd}): ${stderr.trim()}`, {
      stdout,
      stderr,
      cause: err,
    });
  }
}

export async function resolveRepoRoot(cwd: string): Promise<string> {
  try {
    const res = await git(cwd, ["rev-parse", "--show-toplevel"]);
    return res.stdout.trim();
  } catch (err) {
    if (err instanceof DiffError) {
      throw new DiffError(`Not inside a git repository: ${cwd}`, {
        stdout: err.stdout,
        stderr: err.stderr,
        cause: err,
        hint: "Run test-changed from a git checkout, or pass --workspace <path>.",
      });
    }
    throw err;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function readOutputField(error: unknown, key: "stdout" | "stderr"): string | undefined {
  if (!isRecord(error)) return undefined;
  const value = error[key];
  return typeof value === "string" ? value : undefined;
}

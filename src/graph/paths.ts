import path from "node:path";

const WINDOWS_DRIVE = /^[A-Za-z]:\//;

export function toPosixPath(inputPath: string): string {
  return inputPath.replace(/\\/g, "/");
}

export function normalizeRepoPath(inputPath: string): string {
  const normalized = toPosixPath(inputPath);
  const withoutDot = normalized.replace(/^\.\/+/, "");
  const withoutLeading = withoutDot.replace(/^\/+/, "");
  return withoutLeading.replace(/\/+$/, "");
}

export function isAbsolutePath(inputPath: string): boolean {
  const posix = toPosixPath(inputPath);
  return posix.startsWith("/") || WINDOWS_DRIVE.test(posix);
}

/**
 * Map an absolute or workspace-relative path onto the workspace-relative POSIX form used by
 * the ownership index. Returns null when the path escapes the workspace root; the root itself
 * maps to "".
 */
export function toWorkspaceRelative(workspaceRoot: string, inputPath: string): string | null {
  const root = toPosixPath(workspaceRoot).replace(/\/+$/, "");
  const candidate = toPosixPath(inputPath);

  const relative = isAbsolutePath(candidate)
    ? path.posix.relative(root.length > 0 ? root : "/", candidate)
    : path.posix.normalize(candidate);

  if (relative === "" || relative === "." || relative === "./") {
    return "";
  }
  if (relative === ".." || relative.startsWith("../") || isAbsolutePath(relative)) {
    return null;
  }

  return normalizeRepoPath(relative);
}

export function isPathWithinRoot(filePath: string, root: string): boolean {
  if (root.length === 0 || root === ".") {
    return true;
  }

  return filePath === root || filePath.startsWith(`${root}/`);
}

export function rootDepth(root: string): number {
  if (root.length === 0 || root === ".") {
    return 0;
  }

  return root.split("/").length;
}

import { TARGET_DIRECTORIES, type TargetDirectory } from "../types.js";
import { PENDING_WRITE_PREFIX } from "../write.js";

export function isTargetDirectory(value: string): value is TargetDirectory {
  return TARGET_DIRECTORIES.some((directory) => directory === value);
}

/**
 * Normalizes a relative file name (`/` separators, no `.`/`..` or empty
 * segments). Returns null for anything that could leave its parent directory
 * or that collides with the store's temp file names.
 */
export function normalizeRelativePath(value: string): string | null {
  const unified = value.trim().replaceAll("\\", "/");
  if (!unified || unified.startsWith("/") || /^[A-Za-z]:/.test(unified)) return null;
  const segments = unified.split("/").filter((segment) => segment !== ".");
  if (!segments.length) return null;
  if (
    segments.some(
      (segment) =>
        segment === "" || segment === ".." || segment.includes("\0") || segment.startsWith(PENDING_WRITE_PREFIX)
    )
  ) {
    return null;
  }
  return segments.join("/");
}

/** Like {@link normalizeRelativePath} but also requires a src/tests/docs root. */
export function normalizeProjectPath(value: string): string | null {
  const normalized = normalizeRelativePath(value);
  if (!normalized) return null;
  const [root, ...rest] = normalized.split("/");
  if (!root || !isTargetDirectory(root) || rest.length === 0) return null;
  return normalized;
}

export function baseName(path: string): string {
  const index = path.lastIndexOf("/");
  return index === -1 ? path : path.slice(index + 1);
}

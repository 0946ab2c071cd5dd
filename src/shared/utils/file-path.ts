/**
 * File path utilities for entries that point at the filesystem.
 */
import path from "node:path";

/**
 * Expand a leading `~` to the given home directory.
 * Only `~` on its own and `~/...` are expanded; `~user` forms are returned as-is.
 *
 * @param filePath - Path as written by the user
 * @param homeDir - Home directory to substitute
 * @returns Path with the home reference expanded
 */
export function expandHome(filePath: string, homeDir: string): string {
  if (filePath === "~") return homeDir;
  if (filePath.startsWith("~/")) {
    return path.join(homeDir, filePath.slice(2));
  }
  return filePath;
}

/**
 * Normalize path for display and launching.
 * Collapses duplicate separators and `.`/`..` segments, drops a trailing slash.
 *
 * @param filePath - Path to normalize
 * @returns Normalized path
 */
export function normalizePath(filePath: string): string {
  if (!filePath) return "";

  const normalized = path.normalize(filePath);
  // Keep the root itself intact
  if (normalized.length > 1 && normalized.endsWith(path.sep)) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

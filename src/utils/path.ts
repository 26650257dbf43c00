/**
 * Path Utilities
 * String-level helpers shared by the href classifier and the resolver
 */

import path from "node:path";

const DRIVE_LETTER_PATTERN = /^[A-Za-z]:/;

/**
 * Split a destination at its first "#"
 *
 * @example
 * splitFragment("docs/a.md#usage") // { path: "docs/a.md", fragment: "usage" }
 * splitFragment("docs/a.md") // { path: "docs/a.md", fragment: "" }
 */
export function splitFragment(href: string): { path: string; fragment: string } {
  const index = href.indexOf("#");
  if (index < 0) {
    return { path: href, fragment: "" };
  }
  return { path: href.slice(0, index), fragment: href.slice(index + 1) };
}

/**
 * Remove one layer of markdown's alternate destination syntax
 *
 * @example
 * stripAngleBrackets("<docs/a b.md>") // "docs/a b.md"
 */
export function stripAngleBrackets(href: string): string {
  if (href.length >= 2 && href.startsWith("<") && href.endsWith(">")) {
    return href.slice(1, -1);
  }
  return href;
}

/**
 * True for POSIX-absolute, UNC, drive-letter and platform-absolute paths
 */
export function isAbsoluteOrUncPath(p: string): boolean {
  if (p.startsWith("/") || p.startsWith("\\\\")) {
    return true;
  }
  if (DRIVE_LETTER_PATTERN.test(p)) {
    return true;
  }
  return path.isAbsolute(p);
}

/**
 * Shorten an absolute path for display by removing the root prefix
 *
 * @example
 * stripAbsolutePath("/notes/docs/a.md", "/notes") // "docs/a.md"
 * stripAbsolutePath("/elsewhere/a.md", "/notes") // "/elsewhere/a.md"
 */
export function stripAbsolutePath(fullPath: string, root: string): string {
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  return fullPath.startsWith(prefix) ? fullPath.slice(prefix.length) : fullPath;
}

/**
 * Containment test on the relative path, so "/root-extra" is not inside "/root"
 */
export function isWithinRoot(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === ".." || rel.startsWith(".." + path.sep)) {
    return false;
  }
  // Different drive on Windows
  return !path.isAbsolute(rel);
}

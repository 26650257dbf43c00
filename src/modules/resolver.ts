/**
 * Resolver Module
 * Classifies link destinations and resolves followable ones to files inside the root
 *
 * Rejections (external URLs, wrong extensions, escapes, missing files) are
 * silent and return null. Only a filesystem that cannot produce absolute
 * paths throws.
 */

import path from "node:path";
import type { FileSystem, FollowableLink } from "../types";
import {
  PathResolutionError,
  isAbsoluteOrUncPath,
  isWithinRoot,
  nodeFileSystem,
  splitFragment,
  stripAbsolutePath,
  stripAngleBrackets,
} from "../utils";

const MARKDOWN_EXTENSIONS = [".md", ".markdown"];

function normalizeHref(href: string): string {
  return stripAngleBrackets(href.trim());
}

/**
 * Decide whether a destination points at a local markdown document
 *
 * @example
 * isFollowableHref("docs/guide.md#install") // true
 * isFollowableHref("https://example.com/a.md") // false
 * isFollowableHref("/etc/notes.md") // false
 */
export function isFollowableHref(href: string): boolean {
  const normalized = normalizeHref(href);

  if (
    normalized.includes("://") ||
    normalized.toLowerCase().startsWith("mailto:")
  ) {
    return false;
  }

  const { path: target } = splitFragment(normalized);
  if (isAbsoluteOrUncPath(target)) {
    return false;
  }

  const lower = target.toLowerCase();
  return MARKDOWN_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Percent-decode a path, keeping the raw text when it is malformed
 */
function decodePath(target: string): string {
  if (!target.includes("%")) {
    return target;
  }
  try {
    return decodeURIComponent(target);
  } catch {
    return target;
  }
}

function absolute(fs: FileSystem, p: string, what: string): string {
  try {
    return fs.abs(p);
  } catch (error) {
    throw new PathResolutionError(`Cannot make ${what} absolute`, p, {
      cause: error,
    });
  }
}

async function evalSymlinks(fs: FileSystem, p: string): Promise<string> {
  try {
    return await fs.realpath(p);
  } catch {
    // Missing targets are rejected later by the stat check
    return p;
  }
}

/**
 * Resolve a destination written in currentFilePath to a file under rootDir
 * Returns null when the link is not followable. The label is filled in by the caller.
 *
 * @throws PathResolutionError when an absolute path cannot be computed
 */
export async function resolveFollowableLink(
  rootDir: string,
  currentFilePath: string,
  href: string,
  fs: FileSystem = nodeFileSystem,
): Promise<FollowableLink | null> {
  const normalized = normalizeHref(href);

  if (!isFollowableHref(normalized)) {
    return null;
  }

  const { path: rawPath, fragment } = splitFragment(normalized);
  const trimmed = rawPath.trim();
  if (trimmed === "") {
    return null;
  }
  const target = decodePath(trimmed);

  const candidate = path.normalize(
    path.join(path.dirname(currentFilePath), target),
  );

  let rootAbs = absolute(fs, rootDir, "root directory");
  let candidateAbs = absolute(fs, candidate, "link target");

  // Evaluate symlinks on both sides before the containment test,
  // so a link inside the root that points outside is caught
  rootAbs = await evalSymlinks(fs, rootAbs);
  candidateAbs = await evalSymlinks(fs, candidateAbs);

  if (!isWithinRoot(rootAbs, candidateAbs)) {
    return null;
  }

  try {
    const info = await fs.stat(candidateAbs);
    if (!info.isFile()) {
      return null;
    }
  } catch {
    return null;
  }

  return {
    href: normalized,
    path: target,
    fragment,
    label: "",
    resolvedPath: candidateAbs,
    resolvedNote: stripAbsolutePath(candidateAbs, rootAbs),
  };
}

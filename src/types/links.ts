/**
 * Link-related type definitions
 */

/**
 * A link construct as written in the markdown source
 * Produced by the extractor and consumed immediately by the resolver
 */
export interface RawLink {
  href: string; // Destination, trimmed
  label: string; // Concatenated visible text, trimmed
}

export interface FollowableLink {
  href: string; // Destination after trim and <...> stripping, before decoding
  path: string; // Path portion with the fragment removed, percent-decoded
  fragment: string; // Everything after the first "#" (may be empty)
  label: string; // Never empty

  resolvedPath: string; // Absolute, symlink-evaluated, inside the root
  resolvedNote: string; // resolvedPath relative to the evaluated root (status line)
}

/**
 * Filesystem queries the resolver depends on
 * Swappable so resolution can be tested without touching the disk
 */
export interface FileSystem {
  /** Absolute form of a path. Throws when the filesystem is unusable. */
  abs(path: string): string;
  /** Symlink-evaluated path. Rejects when the path does not exist. */
  realpath(path: string): Promise<string>;
  stat(path: string): Promise<{ isFile(): boolean }>;
}

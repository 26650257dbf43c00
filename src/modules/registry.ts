/**
 * Registry Module
 * The ordered set of followable links of one rendered document
 */

import type { FileSystem, FollowableLink } from "../types";
import { nodeFileSystem } from "../utils";
import { extractRawLinks } from "./extractor";
import { resolveFollowableLink } from "./resolver";

/**
 * Immutable, document-ordered list of followable links
 * Rebuilt from scratch whenever a document is loaded
 */
export class LinkRegistry implements Iterable<FollowableLink> {
  private readonly links: readonly FollowableLink[];

  constructor(links: readonly FollowableLink[]) {
    this.links = [...links];
  }

  static empty(): LinkRegistry {
    return new LinkRegistry([]);
  }

  get length(): number {
    return this.links.length;
  }

  /**
   * Link at index, or undefined when out of range
   */
  at(index: number): FollowableLink | undefined {
    if (index < 0 || index >= this.links.length) {
      return undefined;
    }
    return this.links[index];
  }

  toArray(): FollowableLink[] {
    return [...this.links];
  }

  [Symbol.iterator](): Iterator<FollowableLink> {
    return this.links[Symbol.iterator]();
  }
}

/**
 * Build the registry for a document
 * Links with blank labels or that fail the followable checks are dropped
 *
 * @throws PathResolutionError when the filesystem cannot produce absolute paths
 */
export async function followableLinksForDocument(
  rootDir: string,
  currentFilePath: string,
  markdown: string,
  fs: FileSystem = nodeFileSystem,
): Promise<LinkRegistry> {
  const links: FollowableLink[] = [];

  for (const raw of extractRawLinks(markdown)) {
    const label = raw.label.trim();
    if (label === "") continue;

    const link = await resolveFollowableLink(
      rootDir,
      currentFilePath,
      raw.href,
      fs,
    );
    if (!link) continue;

    links.push({ ...link, label });
  }

  return new LinkRegistry(links);
}

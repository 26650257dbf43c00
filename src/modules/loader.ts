/**
 * Loader Module
 * Reads a document from disk and builds its link registry
 */

import path from "node:path";
import { readFile } from "fs/promises";
import type { FileSystem, MarkdownDocument } from "../types";
import { nodeFileSystem, stripAbsolutePath } from "../utils";
import { followableLinksForDocument, type LinkRegistry } from "./registry";

export interface LoadedDocument {
  document: MarkdownDocument;
  links: LinkRegistry;
}

export type DocumentLoader = (filePath: string) => Promise<LoadedDocument>;

/**
 * Display name of a document relative to the root
 */
async function documentNote(
  fs: FileSystem,
  rootDir: string,
  localPath: string,
): Promise<string> {
  const rootAbs = fs.abs(rootDir);
  let rootEval = rootAbs;
  try {
    rootEval = await fs.realpath(rootAbs);
  } catch {
    // Keep the absolute form
  }

  const note = stripAbsolutePath(localPath, rootEval);
  return note !== localPath ? note : stripAbsolutePath(localPath, rootAbs);
}

/**
 * Create a loader bound to a sandbox root
 * Errors (unreadable file, unusable filesystem) reject the returned promise
 */
export function createDocumentLoader(
  rootDir: string,
  fs: FileSystem = nodeFileSystem,
): DocumentLoader {
  return async (filePath) => {
    const localPath = path.resolve(filePath);
    const body = await readFile(localPath, "utf-8");
    const links = await followableLinksForDocument(rootDir, localPath, body, fs);
    const note = await documentNote(fs, rootDir, localPath);

    return { document: { localPath, note, body }, links };
  };
}

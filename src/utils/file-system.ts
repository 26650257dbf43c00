import path from "node:path";
import { realpath, stat } from "fs/promises";
import type { FileSystem } from "../types";

/**
 * FileSystem backed by the real disk
 */
export const nodeFileSystem: FileSystem = {
  abs: (p) => path.resolve(p),
  realpath: (p) => realpath(p),
  stat: (p) => stat(p),
};

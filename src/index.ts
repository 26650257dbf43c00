/**
 * Library entry point
 */

export * from "./modules";
export type * from "./types";
export { AppConfigSchema, PartialAppConfigSchema } from "./types";
export {
  Logger,
  PathResolutionError,
  loadConfig,
  loadDefaultConfig,
  nodeFileSystem,
} from "./utils";

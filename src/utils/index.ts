/**
 * Utility exports
 */

// Path utilities
export {
  splitFragment,
  stripAngleBrackets,
  isAbsoluteOrUncPath,
  stripAbsolutePath,
  isWithinRoot,
} from "./path";

// Filesystem utilities
export { fileExists, isRegularFile } from "./file-exists";
export { nodeFileSystem } from "./file-system";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
  getLogDirectory,
} from "./load-config";

// Errors
export { PathResolutionError, toError } from "./errors";

// Classes
export { Logger } from "./logger";
export type { CloseSink, LogFields, LogSink } from "./logger";

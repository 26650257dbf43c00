/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  PagerConfig,
  LoggingConfig,
  LogLevel,
  PartialAppConfig,
  ConfigError,
} from "./config";
export { AppConfigSchema, PartialAppConfigSchema } from "./config";

// Links
export type { RawLink, FollowableLink, FileSystem } from "./links";

// Pager
export type {
  MarkdownDocument,
  NavEntry,
  StatusMessage,
  KeyName,
  PagerEvent,
  PagerEffect,
  ChangeOp,
  ChangeEvent,
} from "./pager";

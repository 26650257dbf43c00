/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const PagerConfigSchema = z.object({
  // Sandbox boundary for followable links, resolved against the working directory
  root: z.string(),
  watch: z.boolean(),
  showLineNumbers: z.boolean(),
  statusMessageTimeout: z.number().int().positive(), // In milliseconds
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  // Interactive pager only: write the log to <os log dir>/mdnav.log
  file: z.boolean(),
});

export const AppConfigSchema = z.object({
  pager: PagerConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = AppConfigSchema.partial().extend({
  pager: PagerConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type PagerConfig = z.infer<typeof PagerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}

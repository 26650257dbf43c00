/**
 * Shared command helpers - config loading with CLI overrides
 */

import path from "node:path";
import chalk from "chalk";
import { z, ZodError } from "zod";
import type { AppConfig, ConfigError } from "../../types";
import { isRegularFile, loadConfig } from "../../utils";

export const CommonOptionsSchema = z.object({
  root: z.string().optional(),
  config: z.string().optional(),
  lineNumbers: z.boolean().optional(),
});

function describeConfigError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Print config layers that failed to load; the rest still apply
 */
export function reportConfigErrors(errors: ConfigError[]): void {
  for (const { path: configPath, error } of errors) {
    console.error(
      `  ${chalk.yellow("◆")} ${chalk.dim("Ignoring config")} ${configPath}: ${describeConfigError(error)}`,
    );
  }
}

/**
 * Load configuration (default → user → custom) and apply CLI overrides
 */
export async function loadCommandConfig(
  options: z.infer<typeof CommonOptionsSchema>,
): Promise<{ config: AppConfig; errors: ConfigError[] }> {
  const { config, errors } = await loadConfig(options.config);

  if (options.root) {
    config.pager.root = options.root;
  }
  if (options.lineNumbers) {
    config.pager.showLineNumbers = true;
  }

  return { config, errors };
}

/**
 * Resolve a document argument, failing when it is not a readable file
 */
export async function resolveDocument(file: string): Promise<string> {
  const filePath = path.resolve(file);
  if (!(await isRegularFile(filePath))) {
    throw new Error(`Not a file: ${file}`);
  }
  return filePath;
}

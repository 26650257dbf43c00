import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { AppConfig, ConfigError, PartialAppConfig } from "../types";
import { AppConfigSchema, PartialAppConfigSchema } from "../types";
import { fileExists } from "./file-exists";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths (XDG on Linux)
const paths = envPaths("mdnav", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Directory for the interactive pager's log file
 */
export function getLogDirectory(): string {
  return paths.log;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return AppConfigSchema.parse(parsed);
}

async function loadPartialConfig(configPath: string): Promise<PartialAppConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialAppConfigSchema.parse(parsed);
}

async function loadUserConfig(): Promise<PartialAppConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!(await fileExists(userConfigPath))) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

export function mergeConfig(
  base: AppConfig,
  override: PartialAppConfig,
): AppConfig {
  return {
    pager: { ...base.pager, ...override.pager },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: AppConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A layer that fails to load or validate is skipped and reported in errors
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

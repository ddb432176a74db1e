/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import {
  StudykitConfigSchema,
  PartialStudykitConfigSchema,
  type StudykitConfig,
  type PartialStudykitConfig,
} from "../types";

const moduleDir = dirname(fileURLToPath(import.meta.url));

// Get OS-specific paths using env-paths (XDG directories on Linux)
const paths = envPaths("studykit", { suffix: "" });

export interface ConfigError {
  path: string;
  error: unknown;
}

interface LoadConfigResult {
  config: StudykitConfig;
  errors: ConfigError[];
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<StudykitConfig> {
  const defaultConfigPath = join(moduleDir, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return StudykitConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable or invalid
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialStudykitConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialStudykitConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: StudykitConfig,
  override: PartialStudykitConfig,
): StudykitConfig {
  return {
    csv: { ...base.csv, ...override.csv },
    json: { ...base.json, ...override.json },
    transcript: { ...base.transcript, ...override.transcript },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/studykit or ~/.config/studykit
 * - macOS: ~/Library/Preferences/studykit
 * - Windows: %APPDATA%\studykit
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}

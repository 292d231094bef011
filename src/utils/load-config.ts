/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and overrides
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { fileExists } from "./file-exists";
import type {
  CardConvertConfig,
  CardTypesConfig,
  ConfigError,
  PartialCardConvertConfig,
} from "../types";
import {
  CardConvertConfigSchema,
  PartialCardConvertConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("cardconvert", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/cardconvert or ~/.config/cardconvert
 * - macOS: ~/Library/Preferences/cardconvert
 * - Windows: %APPDATA%\cardconvert
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<CardConvertConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return CardConvertConfigSchema.parse(parsed);
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable, not JSON, or fails validation
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialCardConvertConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialCardConvertConfigSchema.parse(parsed);
}

function mergeCardTypes(
  base: CardTypesConfig,
  override: PartialCardConvertConfig["cardTypes"],
): CardTypesConfig {
  return {
    cards: { ...base.cards, ...override?.cards },
    heroes: { ...base.heroes, ...override?.heroes },
    cardbacks: { ...base.cardbacks, ...override?.cardbacks },
  };
}

/**
 * Deep merge two objects
 * Card types are merged per card class, arrays are replaced
 */
export function mergeConfig(
  base: CardConvertConfig,
  override: PartialCardConvertConfig,
): CardConvertConfig {
  return {
    ...base,
    ...override,
    cardTypes: mergeCardTypes(base.cardTypes, override.cardTypes),
    logging: { ...base.logging, ...override.logging },
  };
}

export interface LoadConfigOptions {
  custom?: string;
  env?: NodeJS.ProcessEnv;
}

interface LoadConfigResult {
  config: CardConvertConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: --config path > $CARDCONVERT_CONFIG > user config > default config
 * A file that fails to load or validate is skipped and reported in `errors`
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  const { custom, env = process.env } = options;
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const overrides: string[] = [];
  const userConfigPath = getUserConfigPath();
  if (await fileExists(userConfigPath)) {
    overrides.push(userConfigPath);
  }
  if (env.CARDCONVERT_CONFIG) {
    overrides.push(env.CARDCONVERT_CONFIG);
  }
  if (custom) {
    overrides.push(custom);
  }

  for (const path of overrides) {
    try {
      config = mergeConfig(config, await loadPartialConfig(path));
    } catch (error) {
      errors.push({ path, error });
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

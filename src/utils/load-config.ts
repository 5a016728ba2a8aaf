/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join } from "path";
import envPaths from "env-paths";
import defaults from "../config/default.json";
import { isFile } from "./is-file";
import type { DownloaderConfig, PartialDownloaderConfig } from "../types";
import {
  DownloaderConfigSchema,
  PartialDownloaderConfigSchema,
} from "../types";

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("inha-downloader", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/inha-downloader or ~/.config/inha-downloader
 * - macOS: ~/Library/Preferences/inha-downloader
 * - Windows: %APPDATA%\inha-downloader
 */
function getConfigDirectory(): string {
  return paths.config;
}

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Load default configuration with Zod validation
 */
export function loadDefaultConfig(): DownloaderConfig {
  return DownloaderConfigSchema.parse(defaults);
}

/**
 * Read and validate a partial config file
 * Throws on invalid JSON or schema mismatch
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialDownloaderConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialDownloaderConfigSchema.parse(parsed);
}

/**
 * Deep merge two configs
 */
export function mergeConfig(
  base: DownloaderConfig,
  override: PartialDownloaderConfig,
): DownloaderConfig {
  return {
    service: { ...base.service, ...override.service },
    http: { ...base.http, ...override.http },
    output: { ...base.output, ...override.output },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: DownloaderConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Files that fail to load or validate are skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  try {
    if (await isFile(userConfigPath)) {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    }
  } catch (error) {
    errors.push({ path: userConfigPath, error });
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
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

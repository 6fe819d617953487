import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import {
  type CallGraphConfig,
  CallGraphConfigSchema,
} from "./Config.schemas.js";

/**
 * Supported config file name (JSON only).
 */
export const CONFIG_FILE_NAME = "call-graph-mcp.config.json" as const;

/**
 * Find a config file in the given directory.
 *
 * @param directory - Directory to search in
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

/**
 * Parse and validate config content, applying defaults.
 *
 * @param content - Raw JSON string from config file
 * @throws Error if JSON is invalid or config structure is invalid
 */
export const parseConfig = (content: string): CallGraphConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }

  return CallGraphConfigSchema.parse(rawConfig);
};

/**
 * Configuration used when no config file exists.
 */
export const createDefaultConfig = (): CallGraphConfig =>
  CallGraphConfigSchema.parse({});

/**
 * Load and validate a JSON config file.
 * A relative preload directory is resolved against the config file's folder.
 */
export const loadConfig = (configPath: string): CallGraphConfig => {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let config: CallGraphConfig;
  try {
    config = parseConfig(readFileSync(configPath, "utf-8"));
  } catch (e) {
    if (e instanceof Error && e.message === "Invalid JSON") {
      throw new Error(`Failed to parse JSON config: ${configPath}`);
    }
    throw e;
  }

  if (!config.preload) {
    return config;
  }
  return {
    ...config,
    preload: {
      ...config.preload,
      directory: resolve(dirname(configPath), config.preload.directory),
    },
  };
};

/**
 * Result type for loadConfigOrDefault indicating how config was obtained.
 */
export type ConfigResult = {
  config: CallGraphConfig;
  source: "explicit" | "default";
  configPath?: string;
};

/**
 * Load the explicit config file if given, else the one in `directory`, else
 * defaults.
 *
 * @throws Error if an explicit path does not exist or any found file is invalid
 */
export const loadConfigOrDefault = (
  directory: string,
  explicitPath?: string,
): ConfigResult => {
  const configPath = explicitPath ?? findConfigFile(directory);
  if (configPath) {
    return { config: loadConfig(configPath), source: "explicit", configPath };
  }
  return { config: createDefaultConfig(), source: "default" };
};

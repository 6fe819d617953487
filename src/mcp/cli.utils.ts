import { resolve } from "node:path";
import { collectSourceFiles } from "../ingestion/collectSourceFiles.js";
import type { CallGraphLogger } from "../logging/CallGraphLogger.js";
import type { QueryService } from "../service/createQueryService.js";

/**
 * Parsed command-line arguments.
 */
export interface ParsedArgs {
  /** Config file path */
  configPath?: string;
  /** Source directory analyzed before serving */
  preloadDirectory?: string;
  /** Discard log output */
  silent?: boolean;
}

/**
 * Parse command-line arguments.
 *
 * @throws Error for an unknown flag or a flag missing its value
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const result: ParsedArgs = {};

  const valueOf = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`${flag} flag requires a path argument`);
    }
    return value;
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--config") {
      result.configPath = resolve(valueOf(arg, i));
      i++;
    } else if (arg === "--preload") {
      result.preloadDirectory = resolve(valueOf(arg, i));
      i++;
    } else if (arg === "--silent") {
      result.silent = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
    i++;
  }

  return result;
};

/**
 * Analyze a whole source tree so the graph is ready when the first client
 * connects.
 */
export const preloadSources = (
  service: QueryService,
  directory: string,
  extensions: readonly string[],
  logger: CallGraphLogger,
): void => {
  const { files, source } = collectSourceFiles(directory, extensions);
  if (files.length === 0) {
    logger.warn(`No source files found in ${directory}`);
    return;
  }
  logger.info(`Preloading ${files.length} file(s) from ${directory}`);
  service.analyzeCodebase(source);
};

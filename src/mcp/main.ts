#!/usr/bin/env node

// Early error handlers to catch module loading failures
process.on("uncaughtException", (error) => {
  console.error("[call-graph-mcp] Uncaught exception:", error.message);
  if (error.stack) console.error(error.stack);
  process.exit(1);
});
process.on("unhandledRejection", (reason) => {
  console.error("[call-graph-mcp] Unhandled rejection:", reason);
  process.exit(1);
});

import { realpathSync } from "node:fs";
import { loadConfigOrDefault } from "../config/configLoader.utils.js";
import { DEFAULT_SOURCE_EXTENSIONS } from "../config/Config.schemas.js";
import { createCppExtractor } from "../ingestion/extract/createCppExtractor.js";
import { consoleLogger } from "../logging/ConsoleCallGraphLogger.js";
import { silentLogger } from "../logging/SilentCallGraphLogger.js";
import { createQueryService } from "../service/createQueryService.js";
import { parseArgs, preloadSources } from "./cli.utils.js";
import { startMcpServer } from "./startMcpServer.js";

/**
 * Main entry point.
 */
export const main = async (): Promise<void> => {
  try {
    const args = parseArgs(process.argv.slice(2));
    const logger = args.silent ? silentLogger : consoleLogger;

    const { config, configPath } = loadConfigOrDefault(
      process.cwd(),
      args.configPath,
    );
    if (configPath) {
      logger.info(`Config: ${configPath}`);
    }

    const service = createQueryService({
      extractor: createCppExtractor(),
      logger,
      maxSourceBytes: config.analysis.maxSourceBytes,
    });

    const preloadDirectory =
      args.preloadDirectory ?? config.preload?.directory;
    if (preloadDirectory) {
      preloadSources(
        service,
        preloadDirectory,
        config.preload?.extensions ?? DEFAULT_SOURCE_EXTENSIONS,
        logger,
      );
    }

    logger.info(`Starting ${config.server.name} on stdio...`);
    await startMcpServer(service, config.server.name);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[call-graph-mcp] Fatal error: ${message}`);
    if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
};

// Run main if executed directly
// Use realpathSync to handle npm bin symlinks (process.argv[1] may be a symlink)
const resolvedScript = process.argv[1] ? realpathSync(process.argv[1]) : "";
if (import.meta.url === `file://${resolvedScript}`) {
  main().catch((error) => {
    console.error("[call-graph-mcp] Unhandled error:", error);
    process.exit(1);
  });
}

import { type Cycle, detectCycles } from "../analysis/detectCycles.js";
import { suggestSimilarNames } from "../analysis/suggestSimilarNames.js";
import {
  type FunctionSummary,
  getDownstreamDependencies,
  getOrphanFunctions,
  getUpstreamCallers,
  listFunctions,
} from "../analysis/traverseCalls.js";
import { DEFAULT_MAX_SOURCE_BYTES } from "../config/Config.schemas.js";
import type { GraphStore } from "../db/GraphStore.js";
import { createSqliteGraphStore } from "../db/sqlite/createSqliteGraphStore.js";
import type { FunctionName } from "../db/Types.js";
import type {
  SkippedRegion,
  SourceExtractor,
} from "../ingestion/ExtractionTypes.js";
import {
  type IngestResult,
  ingestFunctions,
} from "../ingestion/ingestFunctions.js";
import type { CallGraphLogger } from "../logging/CallGraphLogger.js";
import { InvalidArgumentError } from "./CallGraphError.js";

export const MAX_NAME_LENGTH = 512;

// biome-ignore lint/suspicious/noControlCharactersInRegex: matches control characters
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

export interface AnalyzeResult {
  /** Distinct nodes in the new graph, defined and external */
  nodeCount: number;
  /** Distinct function names with a definition */
  definedCount: number;
  edgeCount: number;
  skippedRegions: SkippedRegion[];
  /** Extracted records dropped for a blank name */
  skippedRecords: number;
}

export type LookupResult =
  | { status: "found"; defined: boolean }
  | { status: "not_found"; suggestions: FunctionName[] };

/**
 * The operations exposed to the transport layer.
 *
 * Reads never mutate the graph; `analyzeCodebase` replaces it wholesale.
 * Queries for names absent from the graph return empty results.
 */
export interface QueryService {
  /**
   * Extract call facts from `sourceText` and replace the current graph.
   * The graph is built aside and swapped in only on success, so a failure
   * keeps the previous graph.
   *
   * @throws ParseUnavailableError if the extractor cannot run
   * @throws InvalidArgumentError if the source is too large
   */
  analyzeCodebase(sourceText: string): AnalyzeResult;

  /** @throws InvalidArgumentError for an empty or malformed name */
  getCallers(functionName: string): FunctionName[];

  /** @throws InvalidArgumentError for an empty or malformed name */
  getCallees(functionName: string): FunctionName[];

  detectCycles(): Cycle[];

  getOrphanFunctions(): FunctionName[];

  listFunctions(): FunctionSummary[];

  /**
   * Whether a name is in the graph, with close names when it is not.
   *
   * @throws InvalidArgumentError for an empty or malformed name
   */
  lookupFunction(functionName: string): LookupResult;

  close(): void;
}

export interface QueryServiceOptions {
  extractor: SourceExtractor;
  logger: CallGraphLogger;
  /** Largest accepted source in bytes (default: 10 MiB) */
  maxSourceBytes?: number;
  /** Store factory, one store per analysis (default: in-memory SQLite) */
  openStore?: () => GraphStore;
}

/**
 * Validate and normalize a function name argument.
 *
 * @throws InvalidArgumentError if the name is not a usable identifier
 */
export const validateFunctionName = (functionName: unknown): FunctionName => {
  if (typeof functionName !== "string") {
    throw new InvalidArgumentError(
      "function_name must be a string",
      "function_name",
    );
  }
  const name = functionName.trim();
  if (name.length === 0) {
    throw new InvalidArgumentError(
      "function_name must not be empty",
      "function_name",
    );
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new InvalidArgumentError(
      `function_name must be at most ${MAX_NAME_LENGTH} characters`,
      "function_name",
    );
  }
  if (CONTROL_CHARACTERS.test(name)) {
    throw new InvalidArgumentError(
      "function_name must not contain control characters",
      "function_name",
    );
  }
  return name;
};

/**
 * Create the query service that owns the current call graph.
 *
 * @example
 * const service = createQueryService({ extractor: createCppExtractor(), logger });
 * service.analyzeCodebase(source); // { nodeCount: 8, ... }
 * service.getCallers("db_connect"); // ["log_transaction", "update_balance"]
 */
export const createQueryService = (
  options: QueryServiceOptions,
): QueryService => {
  const {
    extractor,
    logger,
    maxSourceBytes = DEFAULT_MAX_SOURCE_BYTES,
    openStore = () => createSqliteGraphStore(),
  } = options;

  let store = openStore();

  const buildStore = (sourceText: string): AnalyzeResult => {
    const extraction = extractor.extract(sourceText);

    const next = openStore();
    let counts: IngestResult;
    try {
      counts = ingestFunctions(next, extraction.functions);
    } catch (error) {
      next.close();
      throw error;
    }

    const previous = store;
    store = next;
    try {
      previous.close();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to close previous graph: ${message}`);
    }
    return { ...counts, skippedRegions: extraction.skippedRegions };
  };

  return {
    analyzeCodebase(sourceText: string): AnalyzeResult {
      if (typeof sourceText !== "string") {
        throw new InvalidArgumentError(
          "code_content must be a string",
          "code_content",
        );
      }
      const bytes = Buffer.byteLength(sourceText, "utf-8");
      if (bytes > maxSourceBytes) {
        throw new InvalidArgumentError(
          `code_content is ${bytes} bytes, limit is ${maxSourceBytes}`,
          "code_content",
        );
      }

      const startTime = Date.now();
      let result: AnalyzeResult;
      try {
        result = buildStore(sourceText);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Analysis failed, keeping previous graph: ${message}`);
        throw error;
      }

      logger.success(
        `Analyzed ${extractor.language} source: ${result.definedCount} functions, ${result.nodeCount} nodes, ${result.edgeCount} calls in ${Date.now() - startTime}ms`,
      );
      if (result.skippedRegions.length > 0) {
        logger.warn(
          `Skipped ${result.skippedRegions.length} malformed region(s)`,
        );
      }
      return result;
    },

    getCallers(functionName: string): FunctionName[] {
      return getUpstreamCallers(store, validateFunctionName(functionName));
    },

    getCallees(functionName: string): FunctionName[] {
      return getDownstreamDependencies(
        store,
        validateFunctionName(functionName),
      );
    },

    detectCycles(): Cycle[] {
      return detectCycles(store);
    },

    getOrphanFunctions(): FunctionName[] {
      return getOrphanFunctions(store);
    },

    listFunctions(): FunctionSummary[] {
      return listFunctions(store);
    },

    lookupFunction(functionName: string): LookupResult {
      const name = validateFunctionName(functionName);
      const node = store.getNode(name);
      if (node) {
        return { status: "found", defined: node.defined };
      }
      return {
        status: "not_found",
        suggestions: suggestSimilarNames(store, name),
      };
    },

    close(): void {
      store.close();
    },
  };
};

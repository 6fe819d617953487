export type { Cycle } from "./analysis/detectCycles.js";
export { detectCycles } from "./analysis/detectCycles.js";
export type { FunctionSummary } from "./analysis/traverseCalls.js";
export {
  type CallGraphConfig,
  type CallGraphConfigInput,
  CallGraphConfigSchema,
} from "./config/Config.schemas.js";
export { loadConfig, loadConfigOrDefault } from "./config/configLoader.utils.js";
export type { GraphStore } from "./db/GraphStore.js";
export { createSqliteGraphStore } from "./db/sqlite/createSqliteGraphStore.js";
export type { CallEdge, CallNode, FunctionName } from "./db/Types.js";
export { collectSourceFiles } from "./ingestion/collectSourceFiles.js";
export type {
  ExtractedFunction,
  ExtractionResult,
  SkippedRegion,
  SourceExtractor,
} from "./ingestion/ExtractionTypes.js";
export { createCppExtractor } from "./ingestion/extract/createCppExtractor.js";
export { isCppTreeSitterAvailable } from "./ingestion/extract/cppTreeSitterLoader.js";
export { ingestFunctions } from "./ingestion/ingestFunctions.js";
export type { CallGraphLogger } from "./logging/CallGraphLogger.js";
export { createConsoleCallGraphLogger } from "./logging/ConsoleCallGraphLogger.js";
export { silentLogger } from "./logging/SilentCallGraphLogger.js";
export { createMcpServer } from "./mcp/createMcpServer.js";
export {
  CallGraphError,
  type CallGraphErrorKind,
  InvalidArgumentError,
  isCallGraphError,
  ParseUnavailableError,
} from "./service/CallGraphError.js";
export {
  type AnalyzeResult,
  createQueryService,
  type LookupResult,
  type QueryService,
  type QueryServiceOptions,
} from "./service/createQueryService.js";

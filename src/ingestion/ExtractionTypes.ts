import type { FunctionName } from "../db/Types.js";

/**
 * One function definition found by an extractor, with the names it calls.
 * The same name may appear in several records (duplicate or partial
 * definitions recovered from malformed source).
 */
export interface ExtractedFunction {
  name: FunctionName;
  callees: ReadonlySet<FunctionName>;
}

/**
 * A region of source the extractor could not make sense of and skipped.
 * Lines are 1-indexed.
 */
export interface SkippedRegion {
  startLine: number;
  endLine: number;
  /** First characters of the skipped text, single line */
  preview: string;
}

export interface ExtractionResult {
  /** Definitions in source order */
  functions: ExtractedFunction[];
  skippedRegions: SkippedRegion[];
}

/**
 * Converts source text to call facts.
 *
 * Malformed source never makes `extract` throw; it yields fewer functions and
 * more skipped regions. It throws `ParseUnavailableError` only when the
 * extractor cannot run at all.
 */
export interface SourceExtractor {
  /** Language label for log messages (e.g., "C++") */
  readonly language: string;
  extract(source: string): ExtractionResult;
}

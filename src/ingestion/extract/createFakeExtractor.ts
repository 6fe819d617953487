import { ParseUnavailableError } from "../../service/CallGraphError.js";
import type {
  ExtractedFunction,
  ExtractionResult,
  SkippedRegion,
  SourceExtractor,
} from "../ExtractionTypes.js";

/**
 * Create a fake extractor for testing. No grammar required.
 *
 * Reads a line format instead of C++: `name: callee, callee`. Blank lines are
 * ignored and lines without a colon are reported as skipped regions.
 *
 * @example
 * const extractor = createFakeExtractor();
 * extractor.extract("f: g\ng:");
 * // functions: [{ name: "f", callees: {"g"} }, { name: "g", callees: {} }]
 */
export const createFakeExtractor = (options?: {
  /** Throw ParseUnavailableError with this message on every call */
  unavailable?: string;
  /** Callback invoked with each source (for test assertions) */
  onExtract?: (source: string) => void;
}): SourceExtractor => ({
  language: "fake",

  extract(source: string): ExtractionResult {
    if (options?.unavailable !== undefined) {
      throw new ParseUnavailableError(options.unavailable);
    }
    options?.onExtract?.(source);

    const functions: ExtractedFunction[] = [];
    const skippedRegions: SkippedRegion[] = [];

    source.split("\n").forEach((line, index) => {
      const trimmed = line.trim();
      if (trimmed.length === 0) return;

      const colon = trimmed.indexOf(":");
      if (colon === -1) {
        skippedRegions.push({
          startLine: index + 1,
          endLine: index + 1,
          preview: trimmed,
        });
        return;
      }

      const callees = trimmed
        .slice(colon + 1)
        .split(",")
        .map((callee) => callee.trim())
        .filter((callee) => callee.length > 0);
      functions.push({
        name: trimmed.slice(0, colon).trim(),
        callees: new Set(callees),
      });
    });

    return { functions, skippedRegions };
  },
});

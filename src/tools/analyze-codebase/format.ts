import type { AnalyzeResult } from "../../service/createQueryService.js";

/**
 * Format the outcome of an analysis.
 *
 * Output format:
 * ```
 * Successfully analyzed codebase. Graph built with 9 functions.
 * defined: 6, calls: 11
 *
 * skippedRegions[1]:
 *   lines 12-14: int broken( {
 * ```
 */
export function formatAnalysis(result: AnalyzeResult): string {
  const lines = [
    `Successfully analyzed codebase. Graph built with ${result.nodeCount} functions.`,
    `defined: ${result.definedCount}, calls: ${result.edgeCount}`,
  ];

  if (result.skippedRecords > 0) {
    lines.push(`unnamed definitions skipped: ${result.skippedRecords}`);
  }

  if (result.skippedRegions.length > 0) {
    lines.push("");
    lines.push(`skippedRegions[${result.skippedRegions.length}]:`);
    for (const region of result.skippedRegions) {
      const range =
        region.startLine === region.endLine
          ? `line ${region.startLine}`
          : `lines ${region.startLine}-${region.endLine}`;
      lines.push(`  ${range}: ${region.preview}`);
    }
  }

  return lines.join("\n");
}

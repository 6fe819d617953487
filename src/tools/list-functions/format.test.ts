import { describe, expect, it } from "vitest";
import { formatFunctionList } from "./format.js";

describe(formatFunctionList.name, () => {
  it("formats an empty graph", () => {
    expect(formatFunctionList([])).toBe(
      "functions[0]:\n\n(graph is empty, run analyze_codebase first)",
    );
  });

  it("formats defined and external functions", () => {
    const result = formatFunctionList([
      { name: "main", defined: true, callerCount: 0, calleeCount: 2 },
      { name: "printf", defined: false, callerCount: 1, calleeCount: 0 },
    ]);

    expect(result.split("\n")).toEqual([
      "functions[2]:",
      "  main (defined) callers: 0, callees: 2",
      "  printf (external) callers: 1, callees: 0",
    ]);
  });
});

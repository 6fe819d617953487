import { describe, expect, it } from "vitest";
import { formatCallees } from "./format.js";

describe(formatCallees.name, () => {
  it("formats a leaf function", () => {
    expect(formatCallees("db_connect", [])).toBe(
      "Function 'db_connect' does not call any other functions.",
    );
  });

  it("lists callees, external ones included", () => {
    expect(formatCallees("main", ["main_loop", "std::cout"])).toBe(
      "Function 'main' calls: main_loop, std::cout",
    );
  });
});

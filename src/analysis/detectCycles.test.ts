import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { GraphStore } from "../db/GraphStore.js";
import { createSqliteGraphStore } from "../db/sqlite/createSqliteGraphStore.js";
import type { ExtractedFunction } from "../ingestion/ExtractionTypes.js";
import { ingestFunctions } from "../ingestion/ingestFunctions.js";
import { detectCycles } from "./detectCycles.js";

const fn = (name: string, ...callees: string[]): ExtractedFunction => ({
  name,
  callees: new Set(callees),
});

describe(detectCycles.name, () => {
  let store: GraphStore;

  beforeEach(() => {
    store = createSqliteGraphStore();
  });

  afterEach(() => {
    store.close();
  });

  it("returns no cycles for an empty graph", () => {
    expect(detectCycles(store)).toEqual([]);
  });

  it("returns no cycles for an acyclic graph", () => {
    ingestFunctions(store, [fn("f", "g", "h"), fn("g", "h"), fn("h", "puts")]);

    expect(detectCycles(store)).toEqual([]);
  });

  it("reports mutual recursion once", () => {
    ingestFunctions(store, [fn("a", "b"), fn("b", "a")]);

    expect(detectCycles(store)).toEqual([["a", "b", "a"]]);
  });

  it("reports direct recursion as a length-1 cycle", () => {
    ingestFunctions(store, [fn("x", "x")]);

    expect(detectCycles(store)).toEqual([["x", "x"]]);
  });

  it("reports each component in completion order", () => {
    ingestFunctions(store, [
      fn("main", "a"),
      fn("a", "b"),
      fn("b", "c"),
      fn("c", "a"),
      fn("d", "e"),
      fn("e", "d"),
      fn("x", "x"),
    ]);

    expect(detectCycles(store)).toEqual([
      ["a", "b", "c", "a"],
      ["d", "e", "d"],
      ["x", "x"],
    ]);
  });

  it("reports a self-loop inside a larger component after its cycle", () => {
    ingestFunctions(store, [fn("p", "q", "p"), fn("q", "p")]);

    expect(detectCycles(store)).toEqual([
      ["p", "q", "p"],
      ["p", "p"],
    ]);
  });

  it("reports one cycle per component, following the DFS order", () => {
    ingestFunctions(store, [fn("a", "b", "c"), fn("b", "a"), fn("c", "a")]);

    expect(detectCycles(store)).toEqual([["a", "b", "a"]]);
  });

  it("starts a cycle where the DFS entered the component", () => {
    ingestFunctions(store, [fn("entry", "y"), fn("x", "y"), fn("y", "x")]);

    expect(detectCycles(store)).toEqual([["y", "x", "y"]]);
  });

  it("handles a long cycle without overflowing the stack", () => {
    const length = 10_000;
    const records = Array.from({ length }, (_, i) =>
      fn(`f${i}`, `f${(i + 1) % length}`),
    );
    ingestFunctions(store, records);

    const cycles = detectCycles(store);

    expect(cycles).toHaveLength(1);
    expect(cycles[0]).toHaveLength(length + 1);
    expect(cycles[0]?.[0]).toBe("f0");
    expect(cycles[0]?.[1]).toBe("f1");
    expect(cycles[0]?.[length]).toBe("f0");
  });

  it("finds nothing in a layered graph whose edges all point forward", () => {
    const size = 60;
    const records: ExtractedFunction[] = [];
    for (let i = 0; i < size; i++) {
      const callees: string[] = [];
      for (let j = i + 1; j < size; j++) {
        if ((i * 7 + j * 3) % 5 === 0) callees.push(`n${j}`);
      }
      records.push(fn(`n${i}`, ...callees));
    }
    ingestFunctions(store, records);

    expect(detectCycles(store)).toEqual([]);
  });

  it("returns every self-loop, one per recursive function", () => {
    ingestFunctions(store, [
      fn("main", "main_loop"),
      fn("main_loop", "process_client", "main_loop"),
      fn("process_client", "log_transaction"),
      fn("log_transaction", "log_transaction"),
    ]);

    expect(detectCycles(store)).toEqual([
      ["log_transaction", "log_transaction"],
      ["main_loop", "main_loop"],
    ]);
  });
});

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { GraphStore } from "../db/GraphStore.js";
import { createSqliteGraphStore } from "../db/sqlite/createSqliteGraphStore.js";
import type { ExtractedFunction } from "../ingestion/ExtractionTypes.js";
import { ingestFunctions } from "../ingestion/ingestFunctions.js";
import {
  getDownstreamDependencies,
  getOrphanFunctions,
  getUpstreamCallers,
  listFunctions,
} from "./traverseCalls.js";

const fn = (name: string, ...callees: string[]): ExtractedFunction => ({
  name,
  callees: new Set(callees),
});

// Bank sample: main → main_loop ⟲ → process_client → {log, interest, balance}
const bankSample = [
  fn("process_client", "log_transaction", "calculate_interest", "update_balance"),
  fn("main_loop", "process_client", "main_loop"),
  fn("main", "main_loop", "std::cout"),
  fn("log_transaction", "db_connect"),
  fn("update_balance", "db_connect", "log_transaction"),
  fn("hidden_backdoor", "db_connect"),
];

describe("traverseCalls", () => {
  let store: GraphStore;

  beforeEach(() => {
    store = createSqliteGraphStore();
  });

  afterEach(() => {
    store.close();
  });

  describe(getUpstreamCallers.name, () => {
    it("returns direct callers only", () => {
      ingestFunctions(store, bankSample);

      expect(getUpstreamCallers(store, "db_connect")).toEqual([
        "log_transaction",
        "update_balance",
        "hidden_backdoor",
      ]);
      expect(getUpstreamCallers(store, "process_client")).toEqual([
        "main_loop",
      ]);
    });

    it("includes a function that calls itself", () => {
      ingestFunctions(store, bankSample);

      expect(getUpstreamCallers(store, "main_loop")).toEqual([
        "main_loop",
        "main",
      ]);
    });

    it("returns an empty list for an unknown name", () => {
      ingestFunctions(store, bankSample);

      expect(getUpstreamCallers(store, "doesNotExist")).toEqual([]);
    });
  });

  describe(getDownstreamDependencies.name, () => {
    it("returns direct callees including external ones", () => {
      ingestFunctions(store, bankSample);

      expect(getDownstreamDependencies(store, "main")).toEqual([
        "main_loop",
        "std::cout",
      ]);
    });

    it("returns an empty list for a leaf", () => {
      ingestFunctions(store, bankSample);

      expect(getDownstreamDependencies(store, "calculate_interest")).toEqual(
        [],
      );
    });

    it("is the mirror of getUpstreamCallers for every edge", () => {
      ingestFunctions(store, bankSample);

      for (const { caller, callee } of store.edges()) {
        expect(getUpstreamCallers(store, callee)).toContain(caller);
        expect(getDownstreamDependencies(store, caller)).toContain(callee);
      }
    });
  });

  describe(getOrphanFunctions.name, () => {
    it("returns defined functions without callers", () => {
      ingestFunctions(store, bankSample);

      expect(getOrphanFunctions(store)).toEqual(["main", "hidden_backdoor"]);
    });

    it("never reports external call targets", () => {
      ingestFunctions(store, [fn("f", "printf")]);

      expect(getOrphanFunctions(store)).toEqual(["f"]);
      expect(store.getNode("printf")?.defined).toBe(false);
    });

    it("does not report a function that only calls itself", () => {
      ingestFunctions(store, [fn("spin", "spin")]);

      expect(getOrphanFunctions(store)).toEqual([]);
    });

    it("returns an empty list for an empty graph", () => {
      expect(getOrphanFunctions(store)).toEqual([]);
    });
  });

  describe(listFunctions.name, () => {
    it("lists every node with its degrees in insertion order", () => {
      ingestFunctions(store, [fn("f", "g", "puts"), fn("g", "g")]);

      expect(listFunctions(store)).toEqual([
        { name: "f", defined: true, callerCount: 0, calleeCount: 2 },
        { name: "g", defined: true, callerCount: 2, calleeCount: 1 },
        { name: "puts", defined: false, callerCount: 1, calleeCount: 0 },
      ]);
    });
  });
});

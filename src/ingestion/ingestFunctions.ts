import type { GraphStore } from "../db/GraphStore.js";
import type { ExtractedFunction } from "./ExtractionTypes.js";

export interface IngestResult {
  /** Distinct nodes created, defined and external */
  nodeCount: number;
  /** Distinct function names with a definition */
  definedCount: number;
  edgeCount: number;
  /** Records dropped because their name was blank */
  skippedRecords: number;
}

/**
 * Replace the store's content with the graph described by `functions`.
 *
 * The store is cleared first, then records are applied in order: the
 * function is marked defined and an edge is added per callee. Repeated
 * definitions of the same name union their callees. The whole batch runs in
 * one transaction, so a failure leaves the store as it was.
 *
 * @example
 * ingestFunctions(store, [
 *   { name: "f", callees: new Set(["g"]) },
 *   { name: "g", callees: new Set() },
 * ]);
 * // { nodeCount: 2, definedCount: 2, edgeCount: 1, skippedRecords: 0 }
 */
export const ingestFunctions = (
  store: GraphStore,
  functions: readonly ExtractedFunction[],
): IngestResult =>
  store.transaction(() => {
    store.clear();

    let skippedRecords = 0;
    for (const fn of functions) {
      const name = fn.name.trim();
      if (name.length === 0) {
        skippedRecords++;
        continue;
      }

      store.markDefined(name);
      for (const callee of fn.callees) {
        const calleeName = callee.trim();
        if (calleeName.length > 0) {
          store.addEdge(name, calleeName);
        }
      }
    }

    const counts = store.counts();
    return {
      nodeCount: counts.nodes,
      definedCount: counts.definedNodes,
      edgeCount: counts.edges,
      skippedRecords,
    };
  });

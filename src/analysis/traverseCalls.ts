import type { GraphStore } from "../db/GraphStore.js";
import type { FunctionName } from "../db/Types.js";

/**
 * One row of the function listing.
 */
export interface FunctionSummary {
  name: FunctionName;
  defined: boolean;
  callerCount: number;
  calleeCount: number;
}

/**
 * Direct callers of `name` (one hop), in node insertion order.
 * An absent name has no callers.
 */
export const getUpstreamCallers = (
  store: GraphStore,
  name: FunctionName,
): FunctionName[] => store.incoming(name);

/**
 * Direct callees of `name` (one hop), in node insertion order.
 */
export const getDownstreamDependencies = (
  store: GraphStore,
  name: FunctionName,
): FunctionName[] => store.outgoing(name);

/**
 * Defined functions that no parsed function calls.
 *
 * External nodes (call targets without a definition) are never orphans:
 * they are unresolved calls, not dead local code. A function that only calls
 * itself is not an orphan either.
 */
export const getOrphanFunctions = (store: GraphStore): FunctionName[] => {
  const called = new Set<FunctionName>();
  for (const edge of store.edges()) {
    called.add(edge.callee);
  }
  return store
    .nodes()
    .filter((node) => node.defined && !called.has(node.name))
    .map((node) => node.name);
};

/**
 * Every node with its definition flag and direct degrees, in insertion order.
 */
export const listFunctions = (store: GraphStore): FunctionSummary[] => {
  const callerCounts = new Map<FunctionName, number>();
  const calleeCounts = new Map<FunctionName, number>();
  for (const { caller, callee } of store.edges()) {
    calleeCounts.set(caller, (calleeCounts.get(caller) ?? 0) + 1);
    callerCounts.set(callee, (callerCounts.get(callee) ?? 0) + 1);
  }

  return store.nodes().map((node) => ({
    name: node.name,
    defined: node.defined,
    callerCount: callerCounts.get(node.name) ?? 0,
    calleeCount: calleeCounts.get(node.name) ?? 0,
  }));
};

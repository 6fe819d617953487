import type { CallEdge, CallNode, FunctionName, GraphCounts } from "./Types.js";

/**
 * Node and edge storage for one call graph.
 *
 * The forward index (caller → callees) and the reverse index (callee →
 * callers) are views of the same edge set, so every edge is visible from both
 * endpoints. All sequences come back in insertion order of the nodes involved.
 *
 * @example
 * const store = createSqliteGraphStore();
 * store.addEdge("main", "run");
 * store.outgoing("main"); // ["run"]
 * store.incoming("run"); // ["main"]
 */
export interface GraphStore {
  /**
   * Create a node with `defined = false` if it does not exist yet.
   */
  addNode(name: FunctionName): void;

  /**
   * Mark a node as defined, creating it if needed.
   */
  markDefined(name: FunctionName): void;

  /**
   * Add the edge caller → callee. Creates missing endpoints (caller first)
   * and marks the caller defined. Idempotent.
   */
  addEdge(caller: FunctionName, callee: FunctionName): void;

  /**
   * Drop every node and edge in one transaction.
   */
  clear(): void;

  nodes(): CallNode[];

  getNode(name: FunctionName): CallNode | null;

  hasNode(name: FunctionName): boolean;

  /**
   * Direct callees of `name`. Empty for an unknown name.
   */
  outgoing(name: FunctionName): FunctionName[];

  /**
   * Direct callers of `name`. Empty for an unknown name.
   */
  incoming(name: FunctionName): FunctionName[];

  /**
   * Every edge, in the order it was first added.
   */
  edges(): CallEdge[];

  counts(): GraphCounts;

  /**
   * Run `fn` in a single transaction. If it throws, every mutation it made is
   * rolled back and the error propagates.
   */
  transaction<T>(fn: () => T): T;

  /**
   * Release the underlying database. The store is unusable afterwards.
   */
  close(): void;
}

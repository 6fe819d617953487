/** Function identifier: the raw name string, in one flat namespace. */
export type FunctionName = string;

/**
 * A function in the call graph.
 *
 * `defined` is true once a definition with this name was ingested. Nodes that
 * only ever appeared as a call target stay `false` (external or unresolved).
 */
export interface CallNode {
  name: FunctionName;
  defined: boolean;
}

/** A "calls" relation. Multiple call sites between the same pair collapse. */
export interface CallEdge {
  caller: FunctionName;
  callee: FunctionName;
}

export interface GraphCounts {
  nodes: number;
  definedNodes: number;
  edges: number;
}

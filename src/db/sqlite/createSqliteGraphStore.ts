import type Database from "better-sqlite3";
import type { GraphStore } from "../GraphStore.js";
import type { CallEdge, CallNode, FunctionName, GraphCounts } from "../Types.js";
import { closeDatabase, openGraphDatabase } from "./sqliteConnection.utils.js";

interface NodeRow {
  name: string;
  defined: number;
}

interface EdgeRow {
  caller: string;
  callee: string;
}

interface CountsRow {
  nodes: number;
  definedNodes: number | null;
  edges: number;
}

const rowToNode = (row: NodeRow): CallNode => ({
  name: row.name,
  defined: row.defined === 1,
});

/**
 * Create a GraphStore backed by SQLite.
 *
 * @param db - better-sqlite3 database with the call-graph schema (default: a fresh in-memory one)
 * @returns GraphStore implementation
 */
export const createSqliteGraphStore = (
  db: Database.Database = openGraphDatabase(),
): GraphStore => {
  const insertNodeStmt = db.prepare<[string]>(`
    INSERT INTO nodes (name, defined) VALUES (?, 0)
    ON CONFLICT(name) DO NOTHING
  `);

  const markDefinedStmt = db.prepare<[string]>(`
    INSERT INTO nodes (name, defined) VALUES (?, 1)
    ON CONFLICT(name) DO UPDATE SET defined = 1
  `);

  const insertEdgeStmt = db.prepare<[string, string]>(`
    INSERT INTO edges (source, target)
    SELECT s.id, t.id FROM nodes s, nodes t
    WHERE s.name = ? AND t.name = ?
    ON CONFLICT(source, target) DO NOTHING
  `);

  const nodesStmt = db.prepare<[], NodeRow>(
    "SELECT name, defined FROM nodes ORDER BY id",
  );

  const nodeStmt = db.prepare<[string], NodeRow>(
    "SELECT name, defined FROM nodes WHERE name = ?",
  );

  const outgoingStmt = db.prepare<[string], { name: string }>(`
    SELECT t.name AS name
    FROM nodes s
    JOIN edges e ON e.source = s.id
    JOIN nodes t ON t.id = e.target
    WHERE s.name = ?
    ORDER BY t.id
  `);

  const incomingStmt = db.prepare<[string], { name: string }>(`
    SELECT s.name AS name
    FROM nodes t
    JOIN edges e ON e.target = t.id
    JOIN nodes s ON s.id = e.source
    WHERE t.name = ?
    ORDER BY s.id
  `);

  const edgesStmt = db.prepare<[], EdgeRow>(`
    SELECT s.name AS caller, t.name AS callee
    FROM edges e
    JOIN nodes s ON s.id = e.source
    JOIN nodes t ON t.id = e.target
    ORDER BY e.rowid
  `);

  const countsStmt = db.prepare<[], CountsRow>(`
    SELECT
      (SELECT COUNT(*) FROM nodes) AS nodes,
      (SELECT SUM(defined) FROM nodes) AS definedNodes,
      (SELECT COUNT(*) FROM edges) AS edges
  `);

  // Edges first: their foreign keys point at nodes
  const clearTransaction = db.transaction(() => {
    db.exec("DELETE FROM edges");
    db.exec("DELETE FROM nodes");
  });

  const addEdgeTransaction = db.transaction(
    (caller: FunctionName, callee: FunctionName) => {
      markDefinedStmt.run(caller);
      insertNodeStmt.run(callee);
      insertEdgeStmt.run(caller, callee);
    },
  );

  return {
    addNode(name: FunctionName): void {
      insertNodeStmt.run(name);
    },

    markDefined(name: FunctionName): void {
      markDefinedStmt.run(name);
    },

    addEdge(caller: FunctionName, callee: FunctionName): void {
      addEdgeTransaction(caller, callee);
    },

    clear(): void {
      clearTransaction();
    },

    nodes(): CallNode[] {
      return nodesStmt.all().map(rowToNode);
    },

    getNode(name: FunctionName): CallNode | null {
      const row = nodeStmt.get(name);
      return row ? rowToNode(row) : null;
    },

    hasNode(name: FunctionName): boolean {
      return nodeStmt.get(name) !== undefined;
    },

    outgoing(name: FunctionName): FunctionName[] {
      return outgoingStmt.all(name).map((row) => row.name);
    },

    incoming(name: FunctionName): FunctionName[] {
      return incomingStmt.all(name).map((row) => row.name);
    },

    edges(): CallEdge[] {
      return edgesStmt.all().map((row) => ({
        caller: row.caller,
        callee: row.callee,
      }));
    },

    counts(): GraphCounts {
      const row = countsStmt.get();
      return {
        nodes: row?.nodes ?? 0,
        definedNodes: row?.definedNodes ?? 0,
        edges: row?.edges ?? 0,
      };
    },

    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },

    close(): void {
      closeDatabase(db);
    },
  };
};

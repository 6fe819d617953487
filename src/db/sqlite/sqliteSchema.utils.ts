import type Database from "better-sqlite3";

/**
 * SQLite schema for the call graph.
 *
 * Tables:
 * - nodes: one row per function name; `id` doubles as insertion order
 * - edges: one row per (caller, callee) pair, endpoints are node ids
 *
 * idx_edges_source serves outgoing lookups and idx_edges_target incoming ones.
 * Foreign keys guarantee an edge never outlives either endpoint.
 */

const NODES_TABLE = `
CREATE TABLE IF NOT EXISTS nodes (
  id INTEGER PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  defined INTEGER NOT NULL DEFAULT 0
)`;

const EDGES_TABLE = `
CREATE TABLE IF NOT EXISTS edges (
  source INTEGER NOT NULL REFERENCES nodes(id),
  target INTEGER NOT NULL REFERENCES nodes(id),
  UNIQUE (source, target)
)`;

const INDEXES = [
  "CREATE INDEX IF NOT EXISTS idx_nodes_defined ON nodes(defined)",
  "CREATE INDEX IF NOT EXISTS idx_edges_source ON edges(source)",
  "CREATE INDEX IF NOT EXISTS idx_edges_target ON edges(target)",
];

/**
 * Initialize the schema on a database connection.
 * Creates tables and indexes if they don't exist.
 *
 * @param db - better-sqlite3 database instance
 */
export const initializeSchema = (db: Database.Database): void => {
  db.exec(NODES_TABLE);
  db.exec(EDGES_TABLE);

  for (const indexSql of INDEXES) {
    db.exec(indexSql);
  }
};

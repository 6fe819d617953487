import Database from "better-sqlite3";
import { initializeSchema } from "./sqliteSchema.utils.js";

/**
 * Open a private in-memory database holding one call graph.
 *
 * Each analysis gets its own connection, so a graph can be built next to the
 * one currently being served and swapped in afterwards.
 */
export const openGraphDatabase = (): Database.Database => {
  const db = new Database(":memory:");

  db.pragma("foreign_keys = ON");

  initializeSchema(db);

  return db;
};

/**
 * Close the database connection.
 *
 * @param db - Database instance to close
 */
export const closeDatabase = (db: Database.Database): void => {
  db.close();
};

/**
 * SQLite connection management
 */

import Database from "better-sqlite3";

export type { Database } from "better-sqlite3";

/**
 * Open a SQLite database
 * @param path - Path to SQLite database file (or ':memory:')
 */
export function createConnection(path: string): Database.Database {
  const db = new Database(path);
  // Foreign keys are off by default in SQLite
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");
  return db;
}

export function closeConnection(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}

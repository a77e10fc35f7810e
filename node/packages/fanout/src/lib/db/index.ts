/**
 * Database layer for fanout with SQLite
 */

export * from "./types.js";
export * from "./connection.js";
export * from "./migrations.js";

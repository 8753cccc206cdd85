import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { applyDbMigrations } from "./migrations";
import { SCHEMA_SQL } from "./schema";
import { logger } from "../logger";

export type SqliteDb = Database.Database;

export const IN_MEMORY = ":memory:";

const BUSY_TIMEOUT_MS = 5000;

export function openSqlite(dbPath: string): SqliteDb {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  return db;
}

export function applySchema(db: SqliteDb, schemaSql: string = SCHEMA_SQL) {
  db.exec(schemaSql);

  try {
    const result = applyDbMigrations(db);
    if (result.applied.length > 0) {
      logger.info({ appliedMigrations: result.applied }, "Applied DB migrations");
    }
    logger.debug({ totalMigrations: result.total, appliedCount: result.applied.length }, "DB migration check complete");
  } catch (err) {
    logger.error({ err }, "Failed to apply schema migrations");
    throw err;
  }
}

/** Opens the delivery database with schema and migrations applied. */
export function openDeliveryDb(dbPath: string): SqliteDb {
  const db = openSqlite(dbPath);
  applySchema(db);
  return db;
}

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { logger } from "../lib/logger.js";
import { toErrorMessage } from "../lib/errors.js";
import { allSchemas, columnMigrations } from "./schema.js";

export type Db = Database.Database;

const IN_MEMORY = ":memory:";

/**
 * Open (creating if needed) the SQLite database at `dbPath` and bring its schema up to date.
 *
 * The handle is owned by the caller; close it with {@link closeDatabase}.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== IN_MEMORY) {
    try {
      mkdirSync(dirname(dbPath), { recursive: true });
    } catch (error) {
      logger.error("Failed to create database directory", {
        context: "db",
        dbPath,
        error: toErrorMessage(error),
      });
      throw new Error(`Failed to create database directory: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  let db: Db | undefined;
  try {
    db = new Database(dbPath);
    db.pragma("foreign_keys = ON");
    if (dbPath !== IN_MEMORY) db.pragma("journal_mode = WAL");
    initializeSchemas(db);
    return db;
  } catch (error) {
    logger.error("Failed to initialize database", {
      context: "db",
      dbPath,
      error: toErrorMessage(error),
    });
    if (db) {
      try {
        db.close();
      } catch (closeError) {
        logger.error("Error while closing database after initialization failure", {
          context: "db",
          error: toErrorMessage(closeError),
        });
      }
    }
    throw new Error(`Database initialization failed: ${toErrorMessage(error)}`, { cause: error });
  }
}

function initializeSchemas(db: Db): void {
  db.transaction(() => {
    for (const schema of allSchemas) {
      db.exec(schema);
    }
    for (const { table, column, type } of columnMigrations) {
      const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
      if (!columns.some((c) => c.name === column)) {
        logger.info("Adding missing column", { context: "db", table, column });
        db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${type}`);
      }
    }
  })();
  logger.debug("Database schemas initialized", { context: "db" });
}

export function closeDatabase(db: Db): void {
  if (!db.open) return;
  db.close();
  logger.debug("Database connection closed", { context: "db" });
}

import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { migrate } from "drizzle-orm/better-sqlite3/migrator";
import { logger } from "../lib/logger.js";
import * as schema from "./schema.js";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: AppDatabase;
  close: () => void;
}

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const MIGRATIONS_FOLDER = path.resolve(__dirname, "./migrations");

export const createDatabase = (url: string): DatabaseHandle => {
  const sqlite = new Database(url);
  if (url !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("foreign_keys = ON");

  const db = drizzle(sqlite, { schema });
  migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  logger.debug("Database migrated", { url });

  return {
    sqlite,
    db,
    close: () => sqlite.close(),
  };
};

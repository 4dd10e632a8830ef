/**
 * Database adapter factory.
 * Opens the SQLite database named by the app config (DATABASE_URL, default
 * ~/.skillswap/skillswap.db) once per process.
 */

import * as path from "path";
import * as fs from "fs";
import type { DbAdapter } from "./adapter";
import { createSqliteAdapter } from "./sqlite-adapter";
import type { DatabaseConfig } from "@/lib/config/app-config";
import { getConfig } from "@/lib/config/app-config";

let _adapter: DbAdapter | null = null;

export function openDb(database: DatabaseConfig): DbAdapter {
  if (database.path !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(database.path)), { recursive: true });
  }
  return createSqliteAdapter(database.path);
}

export function getDb(): DbAdapter {
  if (_adapter) return _adapter;
  _adapter = openDb(getConfig().database);
  return _adapter;
}

/** For tests: reset the singleton to a fresh in-memory DB */
export function resetDbForTesting(): DbAdapter {
  _adapter = createSqliteAdapter(":memory:");
  return _adapter;
}

export type { DbAdapter, DbRow, UserListFilters } from "./adapter";

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

export interface OpenDatabaseOptions {
  readonly?: boolean;
}

/** Opens a SQLite file, creating its directory first. ":memory:" is passed through. */
export function openDatabase(
  path: string,
  options: OpenDatabaseOptions = {},
): Database.Database {
  if (path !== ":memory:" && !options.readonly) {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path, {
    readonly: options.readonly ?? false,
    fileMustExist: options.readonly ?? false,
  });
  db.pragma("busy_timeout = 5000");
  return db;
}

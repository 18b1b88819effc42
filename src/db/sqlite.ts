import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ":memory:";

/**
 * Open (creating if needed) a SQLite database file.
 * `:memory:` opens a private in-process database.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  return db;
}

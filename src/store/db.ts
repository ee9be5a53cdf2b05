import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import { loadServerConfig } from "../config.js";
import { StorageError } from "../errors.js";

const SCHEMA_SQL = `
-- Append-only feeding log; occurred_at and recorded_at are UTC ISO 8601
CREATE TABLE IF NOT EXISTS feedings (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  occurred_at TEXT NOT NULL,
  volume_ml INTEGER NOT NULL CHECK (volume_ml > 0 AND volume_ml <= 1000),
  feed_type TEXT NOT NULL CHECK (feed_type IN ('formula', 'breast_milk')),
  note TEXT,
  recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_feedings_occurred_at ON feedings(occurred_at);

CREATE TRIGGER IF NOT EXISTS feedings_immutable BEFORE UPDATE ON feedings BEGIN
  SELECT RAISE(ABORT, 'feedings are immutable');
END;
`;

let _db: Database.Database | null = null;

/** Open (creating if absent) a feeding store at an explicit path */
export function openDb(dbPath: string): Database.Database {
  try {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(SCHEMA_SQL);
    return db;
  } catch (err) {
    throw new StorageError(`Could not open feeding store at ${dbPath}`, { cause: err });
  }
}

/** Process-wide store, opened lazily on first use */
export function getDb(dbPath?: string): Database.Database {
  if (_db) return _db;
  _db = openDb(dbPath ?? loadServerConfig().dbPath);
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

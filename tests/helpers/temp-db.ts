import type Database from "better-sqlite3";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { openDb } from "../../src/store/db.js";

export interface TempDb {
  db: Database.Database;
  dbPath: string;
  cleanup: () => void;
}

export function createTempDb(): TempDb {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "feeding-test-"));
  const dbPath = path.join(dir, "feeding.db");
  const db = openDb(dbPath);
  return {
    db,
    dbPath,
    cleanup: () => {
      if (db.open) db.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

/** Beijing wall clock to an instant, e.g. bj("2024-01-02 08:00") */
export function bj(wallClock: string): Date {
  return new Date(`${wallClock.replace(" ", "T")}:00+08:00`);
}

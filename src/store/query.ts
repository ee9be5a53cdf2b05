import type Database from "better-sqlite3";
import { StorageError, ValidationError } from "../errors.js";
import { RECENT_LIMIT_CEILING, isFeedType, type FeedingEvent } from "../types.js";

export interface FeedingRow {
  id: number;
  occurred_at: string;
  volume_ml: number;
  feed_type: string;
  note: string | null;
  recorded_at: string;
}

function toEvent(row: FeedingRow): FeedingEvent {
  const { feed_type } = row;
  if (!isFeedType(feed_type)) {
    throw new StorageError(`Feeding ${row.id} has unknown feed_type "${feed_type}"`);
  }
  return { ...row, feed_type };
}

function readRows<T>(action: string, read: () => T): T {
  try {
    return read();
  } catch (err) {
    throw new StorageError(`Failed to ${action}`, { cause: err });
  }
}

/** Feedings with start <= occurred_at < end, oldest first */
export function queryRange(
  db: Database.Database,
  start: Date,
  end: Date,
): FeedingEvent[] {
  const rows = readRows("query feedings", () =>
    db
      .prepare(
        `SELECT * FROM feedings
         WHERE occurred_at >= ? AND occurred_at < ?
         ORDER BY occurred_at ASC, id ASC`,
      )
      .all(start.toISOString(), end.toISOString()) as FeedingRow[],
  );
  return rows.map(toEvent);
}

/** Most recent feedings first. Limits above the ceiling are clamped. */
export function listRecent(
  db: Database.Database,
  limit: number,
  ceiling: number = RECENT_LIMIT_CEILING,
): FeedingEvent[] {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError(`limit must be a positive whole number, got ${limit}`);
  }

  const rows = readRows("list recent feedings", () =>
    db
      .prepare(
        `SELECT * FROM feedings ORDER BY occurred_at DESC, id DESC LIMIT ?`,
      )
      .all(Math.min(limit, ceiling)) as FeedingRow[],
  );
  return rows.map(toEvent);
}

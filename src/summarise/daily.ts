import type Database from "better-sqlite3";
import { queryRange } from "../store/query.js";
import {
  CIVIL_TIMEZONE,
  dayBounds,
  formatCivil,
  formatCivilDate,
  type CivilDate,
} from "../time/civil.js";
import type { DailySummary, FeedType, FeedTypeTotals, FeedingEvent } from "../types.js";

function round(n: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(n * f) / f;
}

export function summariseFeedings(date: CivilDate, events: FeedingEvent[]): DailySummary {
  const byType: Record<FeedType, FeedTypeTotals> = {
    formula: { count: 0, volume_ml: 0 },
    breast_milk: { count: 0, volume_ml: 0 },
  };

  let total = 0;
  let latest: string | null = null;
  for (const e of events) {
    total += e.volume_ml;
    byType[e.feed_type].count++;
    byType[e.feed_type].volume_ml += e.volume_ml;
    if (latest === null || e.occurred_at > latest) latest = e.occurred_at;
  }

  return {
    date: formatCivilDate(date),
    timezone: CIVIL_TIMEZONE,
    total_feedings: events.length,
    total_volume_ml: total,
    average_volume_ml: events.length > 0 ? round(total / events.length, 1) : 0,
    last_feeding_at: latest === null ? null : formatCivil(new Date(latest)),
    by_type: byType,
  };
}

/** Read-time projection of one civil day; always reflects the current rows */
export function computeDailySummary(db: Database.Database, date: CivilDate): DailySummary {
  const { start, end } = dayBounds(date);
  return summariseFeedings(date, queryRange(db, start, end));
}

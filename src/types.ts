export type FeedType = "formula" | "breast_milk";

export const FEED_TYPES: Record<FeedType, string> = {
  formula: "Infant formula, bottle fed",
  breast_milk: "Breast milk, nursed or expressed and bottle fed",
};

export function isFeedType(value: string): value is FeedType {
  return Object.prototype.hasOwnProperty.call(FEED_TYPES, value);
}

/** Largest single feeding accepted, in millilitres */
export const VOLUME_MAX_ML = 1000;

/** Upper bound on `note` length, in characters */
export const NOTE_MAX_LENGTH = 500;

/** Default ceiling for recent_logs; overridable via FEEDING_RECENT_LIMIT_MAX */
export const RECENT_LIMIT_CEILING = 100;

export interface FeedingEvent {
  id: number;
  /** UTC ISO 8601 */
  occurred_at: string;
  volume_ml: number;
  feed_type: FeedType;
  note: string | null;
  /** UTC ISO 8601 */
  recorded_at: string;
}

export interface NewFeeding {
  occurred_at: Date;
  volume_ml: number;
  feed_type: string;
  note?: string | null;
}

export interface FeedTypeTotals {
  count: number;
  volume_ml: number;
}

export interface DailySummary {
  date: string;
  timezone: string;
  total_feedings: number;
  total_volume_ml: number;
  average_volume_ml: number;
  /** Beijing time with offset, or null when the day has no feedings */
  last_feeding_at: string | null;
  by_type: Record<FeedType, FeedTypeTotals>;
}

import type Database from "better-sqlite3";
import { StorageError, ValidationError } from "../errors.js";
import { FEED_TYPES, NOTE_MAX_LENGTH, VOLUME_MAX_ML, isFeedType, type NewFeeding } from "../types.js";

export function validateFeeding(feeding: NewFeeding): void {
  if (!Number.isSafeInteger(feeding.volume_ml) || feeding.volume_ml <= 0) {
    throw new ValidationError(
      `volume_ml must be a positive whole number of millilitres, got ${feeding.volume_ml}`,
    );
  }
  if (feeding.volume_ml > VOLUME_MAX_ML) {
    throw new ValidationError(
      `volume_ml must be at most ${VOLUME_MAX_ML}ml for a single feeding, got ${feeding.volume_ml}`,
    );
  }
  if (!isFeedType(feeding.feed_type)) {
    throw new ValidationError(
      `feed_type must be one of ${Object.keys(FEED_TYPES).join(", ")}, got "${feeding.feed_type}"`,
    );
  }
  if (Number.isNaN(feeding.occurred_at.getTime())) {
    throw new ValidationError("occurred_at is not a valid instant");
  }
  if (feeding.note != null && feeding.note.length > NOTE_MAX_LENGTH) {
    throw new ValidationError(
      `note must be at most ${NOTE_MAX_LENGTH} characters, got ${feeding.note.length}`,
    );
  }
}

/** Validate and append one feeding. Returns the new row id. */
export function insertFeeding(
  db: Database.Database,
  feeding: NewFeeding,
  recordedAt: Date = new Date(),
): number {
  validateFeeding(feeding);

  const note = feeding.note?.trim() || null;

  try {
    const insert = db.transaction(() =>
      db.prepare(`
        INSERT INTO feedings (occurred_at, volume_ml, feed_type, note, recorded_at)
        VALUES (?, ?, ?, ?, ?)
      `).run(
        feeding.occurred_at.toISOString(),
        feeding.volume_ml,
        feeding.feed_type,
        note,
        recordedAt.toISOString(),
      ),
    );
    return Number(insert().lastInsertRowid);
  } catch (err) {
    throw new StorageError("Failed to record feeding", { cause: err });
  }
}

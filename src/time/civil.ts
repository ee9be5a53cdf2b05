/**
 * Calendar arithmetic in the fixed civil zone (Beijing time, UTC+8, no DST).
 *
 * All day boundaries and displayed times go through here; storage stays in UTC.
 */

export const CIVIL_OFFSET_MINUTES = 8 * 60;
export const CIVIL_TIMEZONE = "Asia/Shanghai (UTC+8)";

const OFFSET_MS = CIVIL_OFFSET_MINUTES * 60_000;
const OFFSET_SUFFIX = "+08:00";

export interface CivilDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

export type CivilDateTime = CivilDate & TimeOfDay;

export function toCivil(instant: Date): CivilDateTime {
  const shifted = new Date(instant.getTime() + OFFSET_MS);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
  };
}

export function fromCivil(dt: CivilDateTime): Date {
  return new Date(
    Date.UTC(dt.year, dt.month - 1, dt.day, dt.hour, dt.minute, dt.second) - OFFSET_MS,
  );
}

export function civilDateOf(instant: Date): CivilDate {
  const { year, month, day } = toCivil(instant);
  return { year, month, day };
}

export function addDays(date: CivilDate, days: number): CivilDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

export function isValidCivilDate(date: CivilDate): boolean {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day));
  return (
    d.getUTCFullYear() === date.year &&
    d.getUTCMonth() === date.month - 1 &&
    d.getUTCDate() === date.day
  );
}

/** Half-open [start, end) covering the civil day */
export function dayBounds(date: CivilDate): { start: Date; end: Date } {
  const midnight = { hour: 0, minute: 0, second: 0 };
  return {
    start: fromCivil({ ...date, ...midnight }),
    end: fromCivil({ ...addDays(date, 1), ...midnight }),
  };
}

/** Parses YYYY-MM-DD; null when malformed or not a real calendar date */
export function parseCivilDate(text: string): CivilDate | null {
  const m = text.trim().match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (!m) return null;
  const date = { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
  return isValidCivilDate(date) ? date : null;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatCivilDate(date: CivilDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

/** "2024-01-01T22:00:00+08:00" */
export function formatCivil(instant: Date): string {
  const c = toCivil(instant);
  return `${formatCivilDate(c)}T${pad(c.hour)}:${pad(c.minute)}:${pad(c.second)}${OFFSET_SUFFIX}`;
}

/** "2024-01-01 22:00" for human-readable messages */
export function formatCivilShort(instant: Date): string {
  const c = toCivil(instant);
  return `${formatCivilDate(c)} ${pad(c.hour)}:${pad(c.minute)}`;
}

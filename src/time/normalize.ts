import { TimeParseError } from "../errors.js";
import {
  addDays,
  civilDateOf,
  fromCivil,
  isValidCivilDate,
  type CivilDate,
  type TimeOfDay,
} from "./civil.js";

type HourHint = (hour: number) => number;

interface Qualifier {
  phrase: string;
  dayOffset: number;
  /** Maps a bare hour ("at 10") to the hour the phrase implies */
  hint?: HourHint;
  lastNight?: boolean;
}

const afternoonOrEvening: HourHint = (h) => (h >= 1 && h <= 11 ? h + 12 : h);
const overnight: HourHint = (h) => (h === 12 ? 0 : h >= 6 && h <= 11 ? h + 12 : h);

// Longest phrases first so "yesterday morning" wins over "yesterday"
const QUALIFIERS: Qualifier[] = [
  { phrase: "yesterday afternoon", dayOffset: -1, hint: afternoonOrEvening },
  { phrase: "yesterday evening", dayOffset: -1, hint: afternoonOrEvening },
  { phrase: "yesterday morning", dayOffset: -1 },
  { phrase: "this afternoon", dayOffset: 0, hint: afternoonOrEvening },
  { phrase: "this evening", dayOffset: 0, hint: afternoonOrEvening },
  { phrase: "this morning", dayOffset: 0 },
  { phrase: "last night", dayOffset: 0, hint: overnight, lastNight: true },
  { phrase: "yesterday", dayOffset: -1 },
  { phrase: "tonight", dayOffset: 0, hint: afternoonOrEvening },
  { phrase: "today", dayOffset: 0 },
];

const NOW_PHRASES = new Set(["now", "just now", "right now"]);

// Instants outside these years do not sort or format as four-digit ISO strings
const EARLIEST_MS = Date.UTC(1970, 0, 1);
/** 9999-12-31 23:59:59.999 Beijing time */
const LATEST_MS = Date.UTC(9999, 11, 31, 15, 59, 59, 999);

const MAX_OFFSET_MINUTES = 14 * 60;

const UNIT_MS: Record<string, number> = {
  m: 60_000,
  min: 60_000,
  mins: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hr: 3_600_000,
  hrs: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
};

interface TimeOfDayOpts {
  hint?: HourHint;
  /** Accept "10" with no colon or am/pm; only sensible after a qualifier */
  allowBareHour: boolean;
}

function parseTimeOfDay(text: string, opts: TimeOfDayOpts): TimeOfDay | null {
  const t = text.replace(/^at\s+/, "").trim();
  if (t === "noon" || t === "midday") return { hour: 12, minute: 0, second: 0 };
  if (t === "midnight") return { hour: 0, minute: 0, second: 0 };

  const m = t.match(/^(\d{1,2})(?::(\d{2})(?::(\d{2}))?)?\s*(am|pm|a\.m\.|p\.m\.|o'clock)?$/);
  if (!m) return null;

  let hour = Number(m[1]);
  const minute = m[2] !== undefined ? Number(m[2]) : 0;
  const second = m[3] !== undefined ? Number(m[3]) : 0;
  const suffix = m[4];

  if (suffix !== undefined && suffix !== "o'clock") {
    if (hour < 1 || hour > 12) return null;
    const pm = suffix.startsWith("p");
    hour = (hour % 12) + (pm ? 12 : 0);
  } else {
    if (m[2] === undefined && suffix === undefined && !opts.allowBareHour) return null;
    if (opts.hint && hour <= 12) hour = opts.hint(hour);
  }

  if (hour > 23 || minute > 59 || second > 59) return null;
  return { hour, minute, second };
}

function parseAbsolute(text: string, original: string): Date | null {
  const m = text.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:(?:t|\s+)(.+))?$/);
  if (!m) return null;

  const date: CivilDate = { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
  if (!isValidCivilDate(date)) {
    throw new TimeParseError(original, `"${original}" is not a real calendar date`);
  }

  const rest = m[4]?.trim();
  if (!rest) {
    throw new TimeParseError(original, `"${original}" has a date but no time of day`);
  }

  const zoned = rest.match(
    /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?\s*(z|[+-]\d{2}(?::?\d{2})?)$/,
  );
  if (zoned) {
    const hour = Number(zoned[1]);
    const minute = Number(zoned[2]);
    const second = zoned[3] !== undefined ? Number(zoned[3]) : 0;
    const ms = zoned[4] !== undefined ? Number(zoned[4].padEnd(3, "0")) : 0;
    if (hour > 23 || minute > 59 || second > 59) {
      throw new TimeParseError(original);
    }
    const offsetMinutes = parseOffsetSuffix(zoned[5] ?? "z", original);
    const utc = Date.UTC(date.year, date.month - 1, date.day, hour, minute, second, ms);
    return new Date(utc - offsetMinutes * 60_000);
  }

  const tod = parseTimeOfDay(rest, { allowBareHour: false });
  if (!tod) throw new TimeParseError(original);
  return fromCivil({ ...date, ...tod });
}

function parseOffsetSuffix(suffix: string, original: string): number {
  if (suffix === "z") return 0;
  const sign = suffix.startsWith("-") ? -1 : 1;
  const digits = suffix.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  const total = hours * 60 + minutes;
  if (minutes > 59 || total > MAX_OFFSET_MINUTES) {
    throw new TimeParseError(original, `"${original}" has a UTC offset beyond ±14:00`);
  }
  return sign * total;
}

function withinSupportedRange(at: Date, original: string): Date {
  const ms = at.getTime();
  if (!(ms >= EARLIEST_MS && ms <= LATEST_MS)) {
    throw new TimeParseError(
      original,
      `"${original}" is outside the supported range of years 1970 to 9999`,
    );
  }
  return at;
}

/** Milliseconds described by "N units ago", or null */
function parseAgo(text: string): number | null {
  const m = text.match(
    /^(\d+(?:\.\d+)?|half an?|an?|one)\s*(minutes?|mins?|m|hours?|hrs?|h)\s+ago$/,
  );
  if (!m) return null;

  const amountText = m[1] ?? "";
  const amount = amountText.startsWith("half")
    ? 0.5
    : /^\d/.test(amountText)
      ? Number(amountText)
      : 1;
  const unit = UNIT_MS[m[2] ?? ""];
  if (unit === undefined) return null;
  return Math.round(amount * unit);
}

/** Latest instant at this time of day that is not after now; an exact match is now itself */
function mostRecentAt(tod: TimeOfDay, now: Date): Date {
  const today = civilDateOf(now);
  const candidate = fromCivil({ ...today, ...tod });
  if (candidate.getTime() <= now.getTime()) return candidate;
  return fromCivil({ ...addDays(today, -1), ...tod });
}

function resolveQualified(q: Qualifier, tod: TimeOfDay, now: Date): Date {
  const today = civilDateOf(now);

  if (q.lastNight) {
    // Evening hours belong to the previous day, small hours to this one
    const anchor = tod.hour >= 12 ? addDays(today, -1) : today;
    const at = fromCivil({ ...anchor, ...tod });
    if (at.getTime() <= now.getTime()) return at;
    return fromCivil({ ...addDays(anchor, -1), ...tod });
  }

  return fromCivil({ ...addDays(today, q.dayOffset), ...tod });
}

function parseQualified(text: string, now: Date): Date | null {
  for (const q of QUALIFIERS) {
    let timeText: string | null = null;
    if (text.startsWith(`${q.phrase} `)) {
      timeText = text.slice(q.phrase.length + 1);
    } else if (text.endsWith(` ${q.phrase}`)) {
      timeText = text.slice(0, text.length - q.phrase.length - 1);
    }
    if (timeText === null) continue;

    const tod = parseTimeOfDay(timeText, { hint: q.hint, allowBareHour: true });
    if (tod) return resolveQualified(q, tod, now);
  }
  return null;
}

/**
 * Resolve a feeding time expression against `now`.
 *
 * Accepts "now"/empty, absolute date-times (read as Beijing time unless they
 * carry an offset), bare times of day, day qualifiers such as
 * "last night at 10pm", and offsets such as "45 minutes ago".
 * Bare times never land in the future: "10pm" at 08:00 means yesterday 22:00.
 *
 * @throws TimeParseError when the expression is not understood, or lands
 * outside the years 1970 to 9999
 */
export function normalizeTime(expression: string | null | undefined, now: Date): Date {
  const original = expression ?? "";
  return withinSupportedRange(resolveExpression(original, now), original);
}

function resolveExpression(original: string, now: Date): Date {
  const text = original.trim().toLowerCase().replace(/\s+/g, " ");

  if (text === "" || NOW_PHRASES.has(text)) return new Date(now.getTime());

  const absolute = parseAbsolute(text, original);
  if (absolute) return absolute;

  const timeOnly = parseTimeOfDay(text, { allowBareHour: false });
  if (timeOnly) return mostRecentAt(timeOnly, now);

  const qualified = parseQualified(text, now);
  if (qualified) return qualified;

  const agoMs = parseAgo(text);
  if (agoMs !== null) return new Date(now.getTime() - agoMs);

  if (QUALIFIERS.some((q) => q.phrase === text)) {
    throw new TimeParseError(
      original,
      `"${original}" needs a time of day, e.g. "${text} at 9pm"`,
    );
  }
  throw new TimeParseError(original);
}

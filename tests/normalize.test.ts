import { describe, it, expect } from "vitest";
import { TimeParseError } from "../src/errors.js";
import { normalizeTime } from "../src/time/normalize.js";
import { bj } from "./helpers/temp-db.js";

const now = bj("2024-01-02 08:00");

function resolve(expression: string | undefined, at: Date = now): string {
  return normalizeTime(expression, at).toISOString();
}

describe("normalizeTime", () => {
  describe("now", () => {
    it("returns now for empty or absent input", () => {
      expect(resolve(undefined)).toBe(now.toISOString());
      expect(resolve("")).toBe(now.toISOString());
      expect(resolve("   ")).toBe(now.toISOString());
    });

    it("returns now for now phrases", () => {
      expect(resolve("now")).toBe(now.toISOString());
      expect(resolve("Just now")).toBe(now.toISOString());
    });

    it("returns a copy rather than the injected instance", () => {
      expect(normalizeTime("", now)).not.toBe(now);
    });
  });

  describe("absolute date-times", () => {
    it("reads a wall clock as Beijing time", () => {
      expect(resolve("2024-01-01 22:00")).toBe("2024-01-01T14:00:00.000Z");
      expect(resolve("2024-01-01 22:00:30")).toBe("2024-01-01T14:00:30.000Z");
    });

    it("accepts slashes, a T separator and 12-hour times", () => {
      expect(resolve("2024/01/01 9:30 pm")).toBe(bj("2024-01-01 21:30").toISOString());
      expect(resolve("2024-01-01T06:15")).toBe(bj("2024-01-01 06:15").toISOString());
    });

    it("honors an explicit offset", () => {
      expect(resolve("2024-01-01T14:00:00Z")).toBe("2024-01-01T14:00:00.000Z");
      expect(resolve("2024-01-01T10:00:00-05:00")).toBe("2024-01-01T15:00:00.000Z");
      expect(resolve("2024-01-01T22:00:00+08:00")).toBe("2024-01-01T14:00:00.000Z");
    });

    it("rejects a date with no time of day", () => {
      expect(() => normalizeTime("2024-01-01", now)).toThrow(TimeParseError);
      expect(() => normalizeTime("2024-01-01", now)).toThrow("has a date but no time of day");
    });

    it("rejects impossible calendar dates", () => {
      expect(() => normalizeTime("2024-02-30 10:00", now)).toThrow("is not a real calendar date");
    });
  });

  describe("time of day without a date", () => {
    it("resolves 10pm at 08:00 to the previous evening", () => {
      expect(resolve("10pm")).toBe(bj("2024-01-01 22:00").toISOString());
      expect(resolve("22:00")).toBe(bj("2024-01-01 22:00").toISOString());
      expect(resolve("at 10 pm")).toBe(bj("2024-01-01 22:00").toISOString());
    });

    it("keeps an earlier time on the same day", () => {
      expect(resolve("7:30")).toBe(bj("2024-01-02 07:30").toISOString());
      expect(resolve("midnight")).toBe(bj("2024-01-02 00:00").toISOString());
    });

    it("resolves an exact match with now to now itself", () => {
      expect(resolve("8am")).toBe(now.toISOString());
      expect(resolve("08:00")).toBe(now.toISOString());
    });

    it("rolls a time one second after now back a day", () => {
      expect(resolve("08:00:01")).toBe(new Date(now.getTime() + 1000 - 86_400_000).toISOString());
    });

    it("rolls back across a month boundary in a leap year", () => {
      expect(resolve("10pm", bj("2024-03-01 06:00"))).toBe(bj("2024-02-29 22:00").toISOString());
    });

    it("handles 12am and 12pm", () => {
      expect(resolve("12am")).toBe(bj("2024-01-02 00:00").toISOString());
      expect(resolve("12pm")).toBe(bj("2024-01-01 12:00").toISOString());
    });
  });

  describe("day qualifiers", () => {
    it("rolls last night at 10pm back to the previous day", () => {
      expect(resolve("last night at 10pm")).toBe(bj("2024-01-01 22:00").toISOString());
      expect(resolve("10pm last night")).toBe(bj("2024-01-01 22:00").toISOString());
    });

    it("reads a bare hour last night as evening", () => {
      expect(resolve("last night at 10")).toBe(bj("2024-01-01 22:00").toISOString());
    });

    it("keeps small hours of last night on the current day", () => {
      expect(resolve("last night at 2am")).toBe(bj("2024-01-02 02:00").toISOString());
    });

    it("rolls small hours of last night back when they are still ahead", () => {
      expect(resolve("last night at 3am", bj("2024-01-02 01:00"))).toBe(
        bj("2024-01-01 03:00").toISOString(),
      );
    });

    it("uses the previous day for yesterday", () => {
      expect(resolve("yesterday at 3pm")).toBe(bj("2024-01-01 15:00").toISOString());
      expect(resolve("3pm yesterday")).toBe(bj("2024-01-01 15:00").toISOString());
      expect(resolve("yesterday morning at 7")).toBe(bj("2024-01-01 07:00").toISOString());
      expect(resolve("yesterday evening at 9")).toBe(bj("2024-01-01 21:00").toISOString());
    });

    it("uses the current day for today and this morning", () => {
      expect(resolve("today at 6:45")).toBe(bj("2024-01-02 06:45").toISOString());
      expect(resolve("this morning at 7")).toBe(bj("2024-01-02 07:00").toISOString());
    });

    it("does not roll back tonight even when it is ahead of now", () => {
      expect(resolve("tonight at 10")).toBe(bj("2024-01-02 22:00").toISOString());
    });

    it("requires a time of day", () => {
      expect(() => normalizeTime("yesterday", now)).toThrow("needs a time of day");
      expect(() => normalizeTime("last night", now)).toThrow(TimeParseError);
    });
  });

  describe("relative offsets", () => {
    it("subtracts minutes and hours", () => {
      expect(resolve("45 minutes ago")).toBe(bj("2024-01-02 07:15").toISOString());
      expect(resolve("an hour ago")).toBe(bj("2024-01-02 07:00").toISOString());
      expect(resolve("2h ago")).toBe(bj("2024-01-02 06:00").toISOString());
      expect(resolve("1.5 hours ago")).toBe(bj("2024-01-02 06:30").toISOString());
      expect(resolve("half an hour ago")).toBe(bj("2024-01-02 07:30").toISOString());
      expect(resolve("10 mins ago")).toBe(bj("2024-01-02 07:50").toISOString());
    });
  });

  describe("supported range", () => {
    it("rejects offsets that reach before 1970", () => {
      expect(() => normalizeTime("100000000 hours ago", now)).toThrow(
        '"100000000 hours ago" is outside the supported range of years 1970 to 9999',
      );
      expect(() => normalizeTime("1969-12-31 23:00", now)).toThrow(TimeParseError);
    });

    it("accepts the edges of the range", () => {
      expect(resolve("1970-01-01T00:00:00Z")).toBe("1970-01-01T00:00:00.000Z");
      expect(resolve("9999-12-31 23:59")).toBe("9999-12-31T15:59:00.000Z");
    });

    it("rejects UTC offsets beyond fourteen hours", () => {
      expect(() => normalizeTime("2024-01-01T10:00:00+15:00", now)).toThrow(
        '"2024-01-01T10:00:00+15:00" has a UTC offset beyond ±14:00',
      );
      expect(() => normalizeTime("2024-01-01T10:00:00+08:75", now)).toThrow(TimeParseError);
      expect(resolve("2024-01-01T10:00:00+14:00")).toBe("2023-12-31T20:00:00.000Z");
    });
  });

  describe("unparseable input", () => {
    it.each(["whenever", "25:00", "13pm", "10", "yesterday at lunch"])(
      "rejects %j instead of defaulting to now",
      (expression) => {
        expect(() => normalizeTime(expression, now)).toThrow(TimeParseError);
      },
    );

    it("keeps the original expression on the error", () => {
      try {
        normalizeTime("Sometime Soon", now);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(TimeParseError);
        expect(err instanceof TimeParseError && err.expression).toBe("Sometime Soon");
      }
    });
  });
});

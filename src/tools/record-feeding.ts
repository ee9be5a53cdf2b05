import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type Database from "better-sqlite3";
import { ValidationError } from "../errors.js";
import { insertFeeding } from "../store/write.js";
import { formatCivil, formatCivilShort } from "../time/civil.js";
import { normalizeTime } from "../time/normalize.js";
import {
  coerceNumber,
  jsonResult,
  optionalString,
  requireString,
  runTool,
  type ToolContext,
} from "./shared.js";

/** Raw tool arguments; checked here so every bad value becomes a ValidationError result */
export interface RecordFeedingArgs {
  volume_ml?: unknown;
  feed_type?: unknown;
  time_expression?: unknown;
  note?: unknown;
}

export function recordFeeding(
  db: Database.Database,
  args: RecordFeedingArgs,
  ctx: ToolContext,
): CallToolResult {
  return runTool("record_feeding", () => {
    const now = ctx.now();
    const volume = coerceNumber(args.volume_ml, "volume_ml");
    const feedType = requireString(args.feed_type, "feed_type").trim().toLowerCase();
    const timeExpression = optionalString(args.time_expression, "time_expression");
    const note = optionalString(args.note, "note")?.trim() || null;
    const occurredAt = normalizeTime(timeExpression, now);

    if (occurredAt.getTime() - now.getTime() > ctx.futureGraceMs) {
      throw new ValidationError(
        `"${timeExpression ?? ""}" resolves to ${formatCivil(occurredAt)}, which is in the future. Feedings can only be recorded after they happen.`,
      );
    }

    const id = insertFeeding(
      db,
      { occurred_at: occurredAt, volume_ml: volume, feed_type: feedType, note },
      now,
    );

    console.error(
      `[feeding-tracker] Recorded feeding ${id}: ${volume}ml (${feedType}) at ${formatCivil(occurredAt)}`,
    );

    return jsonResult({
      success: true,
      id,
      occurred_at: formatCivil(occurredAt),
      volume_ml: volume,
      feed_type: feedType,
      note,
      message: `Recorded ${volume}ml of ${feedType} at ${formatCivilShort(occurredAt)} (UTC+8).`,
    });
  });
}

export function registerRecordFeeding(
  server: McpServer,
  db: Database.Database,
  ctx: ToolContext,
): void {
  server.tool(
    "record_feeding",
    "Record a baby feeding. Use this whenever the user reports a feed, including ones that happened earlier (\"120ml formula last night at 10pm\"). The response echoes the interpreted time in Beijing time (UTC+8); read it back to the user if the time was ambiguous.",
    {
      volume_ml: z.unknown().describe("Amount fed in millilitres, a positive whole number"),
      feed_type: z.unknown().describe("Either 'formula' or 'breast_milk'"),
      time_expression: z.unknown().optional().describe("When the feeding happened: empty for now, '2024-01-01 22:00', '10pm', 'last night at 10pm', 'yesterday 14:30', '45 minutes ago'. Read as Beijing time."),
      note: z.unknown().optional().describe("Optional short note, e.g. 'spat up a little'"),
    },
    async (args) => recordFeeding(db, args, ctx),
  );
}

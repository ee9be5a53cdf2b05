import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type Database from "better-sqlite3";
import { ValidationError } from "../errors.js";
import { computeDailySummary } from "../summarise/daily.js";
import { parseCivilDate } from "../time/civil.js";
import { jsonResult, requireString, runTool } from "./shared.js";

export function dailySummary(db: Database.Database, args: { date?: unknown }): CallToolResult {
  return runTool("daily_summary", () => {
    const raw = requireString(args.date, "date");
    const date = parseCivilDate(raw);
    if (!date) {
      throw new ValidationError(`date must be a calendar date in YYYY-MM-DD form, got "${raw}"`);
    }
    const summary = computeDailySummary(db, date);
    return jsonResult({ success: true, ...summary, has_feedings: summary.total_feedings > 0 });
  });
}

export function registerDailySummary(server: McpServer, db: Database.Database): void {
  server.tool(
    "daily_summary",
    "Summarise the feedings of a specific day (Beijing time, UTC+8). Use today_summary for the current day.",
    {
      date: z.unknown().describe("The day to summarise (YYYY-MM-DD)"),
    },
    async (args) => dailySummary(db, args),
  );
}

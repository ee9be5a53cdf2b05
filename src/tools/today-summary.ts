import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type Database from "better-sqlite3";
import { computeDailySummary } from "../summarise/daily.js";
import { civilDateOf } from "../time/civil.js";
import { jsonResult, runTool, type ToolContext } from "./shared.js";

export function todaySummary(db: Database.Database, ctx: ToolContext): CallToolResult {
  return runTool("today_summary", () => {
    const summary = computeDailySummary(db, civilDateOf(ctx.now()));
    const hasFeedings = summary.total_feedings > 0;

    return jsonResult({
      success: true,
      ...summary,
      has_feedings: hasFeedings,
      message: hasFeedings
        ? `${summary.total_feedings} feeding(s) today, ${summary.total_volume_ml}ml in total. Last feeding at ${summary.last_feeding_at}.`
        : "No feedings recorded yet today.",
    });
  });
}

export function registerTodaySummary(
  server: McpServer,
  db: Database.Database,
  ctx: ToolContext,
): void {
  server.tool(
    "today_summary",
    "Summarise today's feedings (Beijing time, UTC+8): total volume, number of feeds, average per feed, and when the last feed was.",
    {},
    async () => todaySummary(db, ctx),
  );
}

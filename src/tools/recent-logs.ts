import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type Database from "better-sqlite3";
import { listRecent } from "../store/query.js";
import { formatCivil } from "../time/civil.js";
import { coerceNumber, jsonResult, runTool, type ToolContext } from "./shared.js";

const DEFAULT_LIMIT = 5;

export function recentLogs(
  db: Database.Database,
  args: { limit?: unknown },
  ctx: ToolContext,
): CallToolResult {
  return runTool("recent_logs", () => {
    const limit = args.limit === undefined || args.limit === null ? DEFAULT_LIMIT : coerceNumber(args.limit, "limit");
    const events = listRecent(db, limit, ctx.recentLimitMax);

    const feedings = events.map((e) => ({
      id: e.id,
      occurred_at: formatCivil(new Date(e.occurred_at)),
      volume_ml: e.volume_ml,
      feed_type: e.feed_type,
      note: e.note,
      recorded_at: formatCivil(new Date(e.recorded_at)),
    }));

    return jsonResult({ success: true, count: feedings.length, feedings });
  });
}

export function registerRecentLogs(
  server: McpServer,
  db: Database.Database,
  ctx: ToolContext,
): void {
  server.tool(
    "recent_logs",
    "List the most recent feedings, newest first, with their times in Beijing time (UTC+8).",
    {
      limit: z.unknown().optional().describe(`How many feedings to return (default ${DEFAULT_LIMIT}, large values are capped)`),
    },
    async (args) => recentLogs(db, args, ctx),
  );
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type Database from "better-sqlite3";
import { registerDailySummary } from "./tools/daily-summary.js";
import { registerRecentLogs } from "./tools/recent-logs.js";
import { registerRecordFeeding } from "./tools/record-feeding.js";
import { registerTodaySummary } from "./tools/today-summary.js";
import type { ToolContext } from "./tools/shared.js";

export const SERVER_NAME = "feeding-tracker";
export const SERVER_VERSION = "0.1.0";

export function createServer(db: Database.Database, ctx: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerRecordFeeding(server, db, ctx);
  registerTodaySummary(server, db, ctx);
  registerRecentLogs(server, db, ctx);
  registerDailySummary(server, db);

  return server;
}

#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadServerConfig } from "./config.js";
import { closeDb, getDb } from "./store/db.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const config = loadServerConfig();
  const db = getDb(config.dbPath);

  const server = createServer(db, {
    now: () => new Date(),
    futureGraceMs: config.futureGraceMs,
    recentLimitMax: config.recentLimitMax,
  });

  let closing = false;
  const shutdown = (): void => {
    if (closing) return;
    closing = true;
    server
      .close()
      .catch((err: unknown) => console.error("[feeding-tracker] Close failed:", err))
      .finally(() => {
        closeDb();
        process.exit(0);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  // The gateway ends stdin to ask for a clean exit
  process.stdin.on("end", shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`feeding-tracker MCP server running on stdio (store: ${config.dbPath})`);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});

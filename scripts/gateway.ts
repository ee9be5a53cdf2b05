#!/usr/bin/env node

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { loadGatewayConfig } from "../src/config.js";
import { Gateway } from "../src/gateway/gateway.js";
import { webSocketRelay } from "../src/gateway/relay.js";
import { childToolProcess, type ToolCommand } from "../src/gateway/tool-process.js";

function usage(): void {
  console.error("Usage: feeding-gateway <relay-url>");
  console.error("");
  console.error("The relay URL may also be given as GATEWAY_RELAY_URL.");
  console.error("Example:");
  console.error("  npx feeding-gateway wss://relay.example.com/mcp");
}

/** This package's own MCP server, run with the same node (and tsx when running from source) */
function defaultToolCommand(): ToolCommand {
  const self = fileURLToPath(import.meta.url);
  const ext = path.extname(self);
  const entry = path.resolve(path.dirname(self), "..", "src", `index${ext}`);
  return {
    command: process.execPath,
    args: ext === ".ts" ? ["--import", "tsx", entry] : [entry],
  };
}

async function main(): Promise<void> {
  const arg = process.argv[2];
  if (arg === "--help" || arg === "-h") {
    usage();
    return;
  }

  const config = loadGatewayConfig(process.env, arg);
  const tool: ToolCommand = {
    ...(config.toolCommand
      ? { command: config.toolCommand, args: config.toolArgs ?? [] }
      : defaultToolCommand()),
    maxStdinBacklogBytes: config.toolStdinBacklogBytes,
  };

  const gateway = new Gateway({
    connect: webSocketRelay(config.relayUrl, { heartbeatMs: config.heartbeatMs }),
    spawnTool: childToolProcess(tool),
    backoff: config.backoff,
    outboxLimit: config.outboxLimit,
    shutdownGraceMs: config.shutdownGraceMs,
    onStateChange: (state, previous) => {
      console.error(`[Gateway] ${previous} -> ${state}`);
    },
  });

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    console.error(`[Gateway] ${signal} received, shutting down`);
    gateway.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("[Gateway] Shutdown failed:", err);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  console.error(`[Gateway] Relay ${config.relayUrl}, tool: ${tool.command} ${tool.args.join(" ")}`);
  gateway.start();
}

main().catch((err) => {
  console.error("Fatal:", err);
  usage();
  process.exit(1);
});

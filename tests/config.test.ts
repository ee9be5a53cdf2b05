import * as path from "node:path";
import { describe, it, expect } from "vitest";
import { defaultDbPath, loadGatewayConfig, loadServerConfig } from "../src/config.js";
import { ValidationError } from "../src/errors.js";

describe("loadServerConfig", () => {
  it("falls back to defaults", () => {
    expect(loadServerConfig({})).toEqual({
      dbPath: defaultDbPath(),
      futureGraceMs: 5 * 60_000,
      recentLimitMax: 100,
    });
    expect(path.basename(defaultDbPath())).toBe("feeding.db");
  });

  it("reads overrides from the environment", () => {
    expect(
      loadServerConfig({
        FEEDING_DB: "/tmp/feeds.db",
        FEEDING_FUTURE_GRACE_MINUTES: "0",
        FEEDING_RECENT_LIMIT_MAX: "20",
      }),
    ).toEqual({ dbPath: "/tmp/feeds.db", futureGraceMs: 0, recentLimitMax: 20 });
  });

  it("names the offending variable", () => {
    expect(() => loadServerConfig({ FEEDING_RECENT_LIMIT_MAX: "many" })).toThrow(ValidationError);
    expect(() => loadServerConfig({ FEEDING_RECENT_LIMIT_MAX: "many" })).toThrow(
      /^Invalid configuration: FEEDING_RECENT_LIMIT_MAX: /,
    );
  });
});

describe("loadGatewayConfig", () => {
  it("requires a websocket relay url", () => {
    expect(() => loadGatewayConfig({})).toThrow(/GATEWAY_RELAY_URL/);
    expect(() => loadGatewayConfig({ GATEWAY_RELAY_URL: "http://relay.test" })).toThrow(
      "must be a ws:// or wss:// URL",
    );
  });

  it("fills in defaults around the relay url", () => {
    expect(loadGatewayConfig({ GATEWAY_RELAY_URL: "wss://relay.test/agent" })).toEqual({
      relayUrl: "wss://relay.test/agent",
      backoff: { initialMs: 1000, maxMs: 30_000, jitter: 0.2 },
      heartbeatMs: 30_000,
      shutdownGraceMs: 5000,
      outboxLimit: 1000,
      toolStdinBacklogBytes: 16 * 1024 * 1024,
      toolCommand: undefined,
      toolArgs: undefined,
    });
  });

  it("prefers the url given on the command line", () => {
    const config = loadGatewayConfig({ GATEWAY_RELAY_URL: "ws://env.test" }, "ws://argv.test");
    expect(config.relayUrl).toBe("ws://argv.test");
  });

  it("parses tool arguments as a JSON array", () => {
    const config = loadGatewayConfig({
      GATEWAY_RELAY_URL: "ws://relay.test",
      GATEWAY_TOOL_COMMAND: "node",
      GATEWAY_TOOL_ARGS: '["server.js","--quiet"]',
    });
    expect(config.toolCommand).toBe("node");
    expect(config.toolArgs).toEqual(["server.js", "--quiet"]);

    expect(() =>
      loadGatewayConfig({ GATEWAY_RELAY_URL: "ws://relay.test", GATEWAY_TOOL_ARGS: "server.js" }),
    ).toThrow("GATEWAY_TOOL_ARGS: must be a JSON array of strings");
  });

  it("rejects a maximum backoff below the initial one", () => {
    expect(() =>
      loadGatewayConfig({
        GATEWAY_RELAY_URL: "ws://relay.test",
        GATEWAY_BACKOFF_INITIAL_MS: "5000",
        GATEWAY_BACKOFF_MAX_MS: "1000",
      }),
    ).toThrow("GATEWAY_BACKOFF_MAX_MS must be >= GATEWAY_BACKOFF_INITIAL_MS");
  });
});

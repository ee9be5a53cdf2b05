import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import { DEFAULT_STDIN_BACKLOG_BYTES } from "./gateway/tool-process.js";
import { RECENT_LIMIT_CEILING } from "./types.js";

type Env = Record<string, string | undefined>;

const ServerEnvSchema = z.object({
  FEEDING_DB: z.string().min(1).optional(),
  FEEDING_FUTURE_GRACE_MINUTES: z.coerce.number().min(0).default(5),
  FEEDING_RECENT_LIMIT_MAX: z.coerce.number().int().positive().default(RECENT_LIMIT_CEILING),
});

const toolArgs = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      const result = z.array(z.string()).safeParse(parsed);
      if (result.success) return result.data;
    } catch {
      // reported below
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON array of strings" });
    return z.NEVER;
  });

const GatewayEnvSchema = z.object({
  GATEWAY_RELAY_URL: z
    .string()
    .url()
    .refine((u) => /^wss?:\/\//i.test(u), "must be a ws:// or wss:// URL"),
  GATEWAY_BACKOFF_INITIAL_MS: z.coerce.number().int().positive().default(1000),
  GATEWAY_BACKOFF_MAX_MS: z.coerce.number().int().positive().default(30_000),
  GATEWAY_BACKOFF_JITTER: z.coerce.number().min(0).max(1).default(0.2),
  GATEWAY_HEARTBEAT_MS: z.coerce.number().int().min(0).default(30_000),
  GATEWAY_SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(5000),
  GATEWAY_OUTBOX_LIMIT: z.coerce.number().int().positive().default(1000),
  GATEWAY_TOOL_BACKLOG_BYTES: z.coerce.number().int().positive().default(DEFAULT_STDIN_BACKLOG_BYTES),
  GATEWAY_TOOL_COMMAND: z.string().min(1).optional(),
  GATEWAY_TOOL_ARGS: toolArgs.optional(),
});

export interface ServerConfig {
  dbPath: string;
  futureGraceMs: number;
  recentLimitMax: number;
}

export interface GatewayConfig {
  relayUrl: string;
  backoff: { initialMs: number; maxMs: number; jitter: number };
  heartbeatMs: number;
  shutdownGraceMs: number;
  outboxLimit: number;
  /** Bytes queued on the tool's stdin before it is treated as stalled */
  toolStdinBacklogBytes: number;
  /** Unset means "run this package's own server entry" */
  toolCommand: string | undefined;
  toolArgs: string[] | undefined;
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "env"}: ${i.message}`)
      .join("; ");
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

export function defaultDbPath(): string {
  return path.join(os.homedir(), ".feeding-tracker", "feeding.db");
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const parsed = parseEnv(ServerEnvSchema, env);
  return {
    dbPath: parsed.FEEDING_DB ?? defaultDbPath(),
    futureGraceMs: parsed.FEEDING_FUTURE_GRACE_MINUTES * 60_000,
    recentLimitMax: parsed.FEEDING_RECENT_LIMIT_MAX,
  };
}

export function loadGatewayConfig(
  env: Env = process.env,
  relayUrlOverride?: string,
): GatewayConfig {
  const source = relayUrlOverride ? { ...env, GATEWAY_RELAY_URL: relayUrlOverride } : env;
  const parsed = parseEnv(GatewayEnvSchema, source);
  if (parsed.GATEWAY_BACKOFF_MAX_MS < parsed.GATEWAY_BACKOFF_INITIAL_MS) {
    throw new ValidationError(
      "Invalid configuration: GATEWAY_BACKOFF_MAX_MS must be >= GATEWAY_BACKOFF_INITIAL_MS",
    );
  }
  return {
    relayUrl: parsed.GATEWAY_RELAY_URL,
    backoff: {
      initialMs: parsed.GATEWAY_BACKOFF_INITIAL_MS,
      maxMs: parsed.GATEWAY_BACKOFF_MAX_MS,
      jitter: parsed.GATEWAY_BACKOFF_JITTER,
    },
    heartbeatMs: parsed.GATEWAY_HEARTBEAT_MS,
    shutdownGraceMs: parsed.GATEWAY_SHUTDOWN_GRACE_MS,
    outboxLimit: parsed.GATEWAY_OUTBOX_LIMIT,
    toolStdinBacklogBytes: parsed.GATEWAY_TOOL_BACKLOG_BYTES,
    toolCommand: parsed.GATEWAY_TOOL_COMMAND,
    toolArgs: parsed.GATEWAY_TOOL_ARGS,
  };
}

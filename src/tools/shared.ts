import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { StorageError, ValidationError, isToolFacingError } from "../errors.js";

/** What every tool needs besides the store; `now` is injected so tests can pin the clock */
export interface ToolContext {
  now: () => Date;
  futureGraceMs: number;
  recentLimitMax: number;
}

export function jsonResult(payload: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
  };
}

export function errorResult(tool: string, err: unknown): CallToolResult {
  let type = "InternalError";
  let message = `${tool} failed unexpectedly; nothing was changed.`;

  if (isToolFacingError(err)) {
    type = err.name;
    message = err.message;
  }
  if (err instanceof StorageError || !isToolFacingError(err)) {
    console.error(`[feeding-tracker] ${tool} failed:`, err);
  }

  return {
    isError: true,
    content: [
      {
        type: "text" as const,
        text: JSON.stringify({ success: false, error: { type, message } }),
      },
    ],
  };
}

/** Run a tool body, turning thrown errors into structured results */
export function runTool(tool: string, body: () => CallToolResult): CallToolResult {
  try {
    return body();
  } catch (err) {
    return errorResult(tool, err);
  }
}

/** Accepts 120 or "120"; anything else is a ValidationError */
export function coerceNumber(value: unknown, field: string): number {
  if (value === undefined || value === null) {
    throw new ValidationError(`${field} is required`);
  }
  if (typeof value === "number") return value;
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a number, got ${JSON.stringify(value)}`);
  }
  const trimmed = value.trim();
  const n = trimmed === "" ? Number.NaN : Number(trimmed);
  if (Number.isNaN(n)) {
    throw new ValidationError(`${field} must be a number, got ${JSON.stringify(value)}`);
  }
  return n;
}

export function requireString(value: unknown, field: string): string {
  if (value === undefined || value === null) {
    throw new ValidationError(`${field} is required`);
  }
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string, got ${JSON.stringify(value)}`);
  }
  return value;
}

/** undefined and null both mean "not given" */
export function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  return requireString(value, field);
}

import { z } from "zod";
import { ErrorCode, JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";

export type RequestId = string | number;
export type FrameKind = "request" | "notification" | "response";

/** One validated JSON-RPC message, kept as the single line it travels as */
export interface Frame {
  line: string;
  kind: FrameKind;
  id: RequestId | undefined;
  method: string | undefined;
}

const Envelope = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    method: z.string().optional(),
  })
  .passthrough();

/** Parse a relay or tool frame; null when it is not a JSON-RPC 2.0 message */
export function parseFrame(raw: string): Frame | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!JSONRPCMessageSchema.safeParse(json).success) return null;

  const envelope = Envelope.safeParse(json);
  if (!envelope.success) return null;
  const { id, method } = envelope.data;

  const kind: FrameKind =
    method === undefined ? "response" : id === undefined ? "notification" : "request";

  // stdio framing is one message per line
  const line = raw.includes("\n") ? JSON.stringify(json) : raw.trim();
  return { line, kind, id, method };
}

/** Map key that keeps 1 and "1" apart */
export function requestKey(id: RequestId): string {
  return `${typeof id}:${id}`;
}

export function errorResponse(id: RequestId, message: string): string {
  return JSON.stringify({
    jsonrpc: "2.0",
    id,
    error: { code: ErrorCode.InternalError, message },
  });
}

/** The same frame with a different request id */
export function withId(line: string, id: RequestId): string {
  const message = Envelope.parse(JSON.parse(line));
  return JSON.stringify({ ...message, id });
}

export function preview(raw: string, max = 120): string {
  const flat = raw.replace(/\s+/g, " ");
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

import { ProcessError, TransportError, errorMessage } from "../errors.js";
import { Backoff, type BackoffOptions } from "./backoff.js";
import {
  errorResponse,
  parseFrame,
  preview,
  requestKey,
  withId,
  type Frame,
  type RequestId,
} from "./frames.js";
import type { ConnectRelay, RelayConnection } from "./relay.js";
import type { SpawnTool, ToolProcess } from "./tool-process.js";

export type GatewayState = "disconnected" | "connecting" | "connected" | "stopped";

export interface GatewayOptions {
  connect: ConnectRelay;
  spawnTool: SpawnTool;
  /** Delay between relay reconnect attempts */
  backoff: BackoffOptions;
  /** Delay between tool process restarts */
  processBackoff?: BackoffOptions;
  /** Tool output kept while the relay is down; oldest frames are dropped beyond this */
  outboxLimit?: number;
  shutdownGraceMs?: number;
  onStateChange?: (state: GatewayState, previous: GatewayState) => void;
}

export interface GatewayStats {
  state: GatewayState;
  pendingRequests: number;
  queuedForRelay: number;
  queuedForTool: number;
  toolPid: number | undefined;
  reconnectAttempts: number;
}

const REPLAY_ID_PREFIX = "gateway-replay-";
const INITIALIZED_NOTIFICATION = JSON.stringify({
  jsonrpc: "2.0",
  method: "notifications/initialized",
});

/**
 * Bridges one relay session at a time onto the stdio of a local MCP tool process.
 *
 * The relay is replaced on every failure with a growing backoff; the tool process
 * survives relay blips and is restarted only when it dies itself. Requests the
 * process never answered are reported back as JSON-RPC errors.
 */
export class Gateway {
  private _state: GatewayState = "disconnected";
  private stopping = false;

  private connection: RelayConnection | null = null;
  private session = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

  private tool: ToolProcess | null = null;
  private toolGeneration = 0;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;

  private readonly transportBackoff: Backoff;
  private readonly processBackoff: Backoff;
  private readonly outboxLimit: number;
  private readonly shutdownGraceMs: number;

  /** Requests written to the tool process and not yet answered */
  private readonly pending = new Map<string, RequestId>();
  private inbox: Frame[] = [];
  private outbox: string[] = [];

  private initializeLine: string | null = null;
  private clientInitialized = false;
  private replaySeq = 0;
  private readonly swallowed = new Set<string>();
  private drainWaiters: Array<() => void> = [];

  constructor(private readonly opts: GatewayOptions) {
    this.transportBackoff = new Backoff(opts.backoff);
    this.processBackoff = new Backoff(opts.processBackoff ?? { initialMs: 500, maxMs: 10_000 });
    this.outboxLimit = opts.outboxLimit ?? 1000;
    this.shutdownGraceMs = opts.shutdownGraceMs ?? 5000;
  }

  get state(): GatewayState {
    return this._state;
  }

  stats(): GatewayStats {
    return {
      state: this._state,
      pendingRequests: this.pending.size,
      queuedForRelay: this.outbox.length,
      queuedForTool: this.inbox.length,
      toolPid: this.tool?.pid,
      reconnectAttempts: this.transportBackoff.attempts,
    };
  }

  start(): void {
    if (this.stopping || this._state !== "disconnected" || this.reconnectTimer) return;
    if (!this.tool && !this.restartTimer) this.startTool();
    this.connect();
  }

  /**
   * Stop relaying, give in-flight requests up to the grace period to finish,
   * then close the relay and stop the tool process.
   */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.clearTimers();

    await this.waitForDrain(this.shutdownGraceMs);

    const conn = this.connection;
    this.connection = null;
    this.session++;
    conn?.close();
    this.setState("stopped");

    const tool = this.tool;
    this.tool = null;
    this.toolGeneration++;
    if (tool) await tool.stop(this.shutdownGraceMs);
    console.error("[Gateway] Stopped");
  }

  // --- relay side ---

  private connect(): void {
    this.reconnectTimer = null;
    const session = ++this.session;
    this.setState("connecting");

    try {
      this.connection = this.opts.connect({
        onOpen: () => this.handleOpen(session),
        onMessage: (data) => this.handleInbound(session, data),
        onClose: (error) => this.handleDrop(session, error),
      });
    } catch (err) {
      const error =
        err instanceof TransportError
          ? err
          : new TransportError(`Relay connect failed: ${errorMessage(err)}`, { cause: err });
      this.handleDrop(session, error);
    }
  }

  private handleOpen(session: number): void {
    if (session !== this.session || this.stopping) return;
    this.setState("connected");
    this.transportBackoff.reset();
    if (!this.tool && !this.restartTimer) this.startTool();
    this.flushOutbox();
  }

  private handleInbound(session: number, data: string): void {
    if (session !== this.session || this._state !== "connected" || this.stopping) return;

    const frame = parseFrame(data);
    if (!frame) {
      console.error(`[Gateway] Dropping malformed frame: ${preview(data)}`);
      return;
    }

    if (frame.kind === "request" && frame.method === "initialize") {
      this.initializeLine = frame.line;
    } else if (frame.kind === "notification" && frame.method === "notifications/initialized") {
      this.clientInitialized = true;
    }
    this.toTool(frame);
  }

  private handleDrop(session: number, error: TransportError): void {
    if (session !== this.session || this.stopping) return;
    this.connection = null;
    console.error(`[Gateway] ${error.message}`);
    this.setState("disconnected");
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    const delay = this.transportBackoff.next();
    console.error(
      `[Gateway] Reconnecting in ${delay}ms (attempt ${this.transportBackoff.attempts})`,
    );
    this.reconnectTimer = setTimeout(() => this.connect(), delay);
  }

  private deliver(line: string): void {
    if (this._state === "connected" && this.connection) {
      try {
        this.connection.send(line);
        return;
      } catch (err) {
        console.error(`[Gateway] Relay send failed, queueing: ${errorMessage(err)}`);
      }
    }
    this.outbox.push(line);
    if (this.outbox.length > this.outboxLimit) {
      const dropped = this.outbox.shift() ?? "";
      console.error(`[Gateway] Relay queue full, dropped: ${preview(dropped)}`);
    }
  }

  private flushOutbox(): void {
    if (this.outbox.length === 0) return;
    const queued = this.outbox;
    this.outbox = [];
    console.error(`[Gateway] Flushing ${queued.length} queued frame(s) to relay`);
    for (const line of queued) this.deliver(line);
  }

  // --- tool side ---

  private startTool(): void {
    this.restartTimer = null;
    const generation = ++this.toolGeneration;

    let tool: ToolProcess;
    try {
      tool = this.opts.spawnTool({
        onLine: (line) => this.handleToolLine(generation, line),
        onExit: (error) => this.handleToolExit(generation, error),
      });
    } catch (err) {
      this.handleToolExit(
        generation,
        new ProcessError(`Tool process could not start: ${errorMessage(err)}`, {}, { cause: err }),
      );
      return;
    }
    this.tool = tool;
    console.error(`[Gateway] Tool process started (pid ${tool.pid ?? "unknown"})`);

    // A fresh process has no MCP session; re-run the client's handshake on its behalf
    if (this.initializeLine) {
      const id = `${REPLAY_ID_PREFIX}${++this.replaySeq}`;
      this.swallowed.add(requestKey(id));
      tool.send(withId(this.initializeLine, id));
      if (this.clientInitialized) tool.send(INITIALIZED_NOTIFICATION);
    }

    const queued = this.inbox;
    this.inbox = [];
    for (const frame of queued) this.toTool(frame);
  }

  private toTool(frame: Frame): void {
    if (!this.tool) {
      this.inbox.push(frame);
      return;
    }
    if (frame.kind === "request" && frame.id !== undefined) {
      this.pending.set(requestKey(frame.id), frame.id);
    }
    this.tool.send(frame.line);
  }

  private handleToolLine(generation: number, line: string): void {
    if (generation !== this.toolGeneration) return;
    this.processBackoff.reset();

    const frame = parseFrame(line);
    if (!frame) {
      console.error(`[Gateway] Tool wrote a non JSON-RPC line, dropping: ${preview(line)}`);
      return;
    }

    if (frame.kind === "response" && frame.id !== undefined) {
      const key = requestKey(frame.id);
      if (this.swallowed.delete(key)) return;
      this.pending.delete(key);
      if (this.pending.size === 0) this.notifyDrained();
    }
    this.deliver(frame.line);
  }

  private handleToolExit(generation: number, error: ProcessError): void {
    if (generation !== this.toolGeneration) return;
    this.tool = null;
    console.error(`[Gateway] ${error.message}`);

    for (const id of this.pending.values()) {
      this.deliver(
        errorResponse(id, "Tool process exited before responding; the request may not have completed"),
      );
    }
    this.pending.clear();
    this.swallowed.clear();
    this.notifyDrained();

    if (this.stopping) return;
    const delay = this.processBackoff.next();
    console.error(`[Gateway] Restarting tool process in ${delay}ms`);
    this.restartTimer = setTimeout(() => this.startTool(), delay);
  }

  // --- lifecycle helpers ---

  private setState(next: GatewayState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.opts.onStateChange?.(next, previous);
  }

  private clearTimers(): void {
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    if (this.restartTimer) clearTimeout(this.restartTimer);
    this.reconnectTimer = null;
    this.restartTimer = null;
  }

  private waitForDrain(ms: number): Promise<void> {
    if (this.pending.size === 0 || !this.tool) return Promise.resolve();
    console.error(`[Gateway] Waiting up to ${ms}ms for ${this.pending.size} request(s)`);
    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.drainWaiters.push(done);
    });
  }

  private notifyDrained(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const done of waiters) done();
  }
}

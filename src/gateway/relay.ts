import WebSocket from "ws";
import { TransportError } from "../errors.js";

export interface RelayConnection {
  /** @throws TransportError when the socket cannot take the frame; the caller keeps it */
  send(frame: string): void;
  /** Close from our side; onClose is not called afterwards */
  close(): void;
}

export interface RelayHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  /** Called once per connection, after open or instead of it */
  onClose(error: TransportError): void;
}

export type ConnectRelay = (handlers: RelayHandlers) => RelayConnection;

export interface WebSocketRelayOptions {
  /** Ping interval; a missed pong drops the socket. 0 disables. */
  heartbeatMs?: number;
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export function webSocketRelay(url: string, opts: WebSocketRelayOptions = {}): ConnectRelay {
  return (handlers) => {
    const socket = new WebSocket(url);
    let finished = false;
    let heartbeat: ReturnType<typeof setInterval> | null = null;
    let awaitingPong = false;

    const stopHeartbeat = (): void => {
      if (heartbeat) clearInterval(heartbeat);
      heartbeat = null;
    };

    const finish = (error: TransportError): void => {
      if (finished) return;
      finished = true;
      stopHeartbeat();
      handlers.onClose(error);
    };

    socket.on("open", () => {
      if (opts.heartbeatMs) {
        heartbeat = setInterval(() => {
          if (awaitingPong) {
            console.error("[Relay] Heartbeat missed, dropping socket");
            socket.terminate();
            return;
          }
          awaitingPong = true;
          socket.ping();
        }, opts.heartbeatMs);
      }
      handlers.onOpen();
    });

    socket.on("pong", () => {
      awaitingPong = false;
    });

    socket.on("message", (data) => {
      if (!finished) handlers.onMessage(rawDataToString(data));
    });

    socket.on("close", (code, reason) => {
      const why = reason.length > 0 ? `: ${reason.toString()}` : "";
      finish(new TransportError(`Relay closed (code ${code}${why})`));
    });

    socket.on("error", (err) => {
      finish(new TransportError(`Relay error: ${err.message}`, { cause: err }));
      socket.terminate();
    });

    return {
      // ws drops data sent while CONNECTING or CLOSING without reporting it
      send: (frame) => {
        if (socket.readyState !== WebSocket.OPEN) {
          throw new TransportError(`Relay socket is not open (readyState ${socket.readyState})`);
        }
        socket.send(frame);
      },
      close: () => {
        finished = true;
        stopHeartbeat();
        socket.close();
      },
    };
  };
}

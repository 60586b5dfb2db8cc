import { Buffer } from "node:buffer";
import WebSocket from "ws";

import { StreamDisconnectedError } from "../worker/errors.js";

/** Result of one receive-with-timeout on the streaming connection. */
export type StreamFrame =
  | { readonly kind: "text"; readonly data: string }
  | { readonly kind: "binary"; readonly byteLength: number }
  | { readonly kind: "timeout" }
  | { readonly kind: "closed"; readonly code: number | null; readonly reason: string };

type ClosedFrame = Extract<StreamFrame, { kind: "closed" }>;

/**
 * Minimal contract of a streaming connection. `receive` never rejects: a
 * dropped connection surfaces as a `closed` frame and keeps doing so on every
 * later call.
 */
export interface StreamConnection {
  receive(timeoutMs: number): Promise<StreamFrame>;
  close(): void;
}

export type StreamConnector = (url: string) => Promise<StreamConnection>;

/** Subset of the `ws` socket surface consumed by {@link WsStreamConnection}. */
export interface SocketLike {
  on(event: string, listener: (...args: never[]) => void): unknown;
  close(): void;
}

function rawDataToBuffer(data: WebSocket.RawData): Buffer {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (Buffer.isBuffer(data)) {
    return data;
  }
  return Buffer.from(new Uint8Array(data));
}

/**
 * Adapts the push-based socket events into a pull-based receive. Frames that
 * arrive while nobody is waiting are queued in arrival order.
 */
export class WsStreamConnection implements StreamConnection {
  private readonly inbox: StreamFrame[] = [];
  private waiter: ((frame: StreamFrame) => void) | null = null;
  private closedFrame: ClosedFrame | null = null;

  constructor(private readonly socket: SocketLike) {
    socket.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      const buffer = rawDataToBuffer(data);
      this.push(isBinary ? { kind: "binary", byteLength: buffer.byteLength } : { kind: "text", data: buffer.toString("utf8") });
    });
    socket.on("close", (code: number, reason: Buffer) => {
      this.finish({ kind: "closed", code, reason: reason.toString("utf8") });
    });
    socket.on("error", (error: Error) => {
      this.finish({ kind: "closed", code: null, reason: error.message });
    });
  }

  receive(timeoutMs: number): Promise<StreamFrame> {
    const queued = this.inbox.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.closedFrame) {
      return Promise.resolve(this.closedFrame);
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);
      this.waiter = (frame) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(frame);
      };
    });
  }

  close(): void {
    this.finish({ kind: "closed", code: 1000, reason: "closed by client" });
    this.socket.close();
  }

  private push(frame: StreamFrame): void {
    if (this.closedFrame) {
      return;
    }
    if (this.waiter) {
      this.waiter(frame);
      return;
    }
    this.inbox.push(frame);
  }

  private finish(frame: ClosedFrame): void {
    if (this.closedFrame) {
      return;
    }
    this.closedFrame = frame;
    this.waiter?.(frame);
  }
}

export interface WebSocketConnectOptions {
  readonly handshakeTimeoutMs: number;
}

/** Opens a `ws` connection and resolves once the handshake completed. */
export function connectWebSocket(url: string, options: WebSocketConnectOptions): Promise<StreamConnection> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs });
    const onOpen = (): void => {
      socket.off("error", onError);
      resolve(new WsStreamConnection(socket));
    };
    const onError = (error: Error): void => {
      socket.off("open", onOpen);
      reject(new StreamDisconnectedError(`Unable to open stream ${url}: ${error.message}`, { cause: error }));
    };
    socket.once("open", onOpen);
    socket.once("error", onError);
  });
}

/** Connector used in production; tests swap in scripted connections. */
export function createWebSocketConnector(options: WebSocketConnectOptions): StreamConnector {
  return (url) => connectWebSocket(url, options);
}

//shardcore/gateway/GatewaySocket.ts

import WebSocket from "ws";

import { AsyncChannel } from "../core/AsyncChannel";
import { CancelledError } from "../core/errors";
import { Logger } from "../utils/logger";

const log = Logger.scope("SHARD").child("WS");

export type SocketFrame =
  | { kind: "text"; data: string }
  | { kind: "binary"; data: Buffer }
  | { kind: "close"; code: number; reason: string };

/**
 * One gateway transport connection. A "close" frame is always the last frame
 * `receive` yields; after it the socket is spent.
 */
export interface GatewaySocket {
  receive(signal?: AbortSignal): Promise<SocketFrame>;
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
}

export type SocketConnector = (url: string, signal: AbortSignal) => Promise<GatewaySocket>;

// How many frames may sit decoded-but-unread before the socket is paused.
const FRAME_BUFFER = 16;

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/** `ws`-backed socket; pauses the underlying stream while the reader is behind. */
export class WsGatewaySocket implements GatewaySocket {
  private readonly frames = new AsyncChannel<SocketFrame>(FRAME_BUFFER);
  private readonly backlog: SocketFrame[] = [];
  private draining = false;
  private closeSeen = false;

  constructor(private readonly ws: WebSocket) {
    ws.on("message", (data, isBinary) => {
      const buf = toBuffer(data);
      this.push(isBinary ? { kind: "binary", data: buf } : { kind: "text", data: buf.toString("utf-8") });
    });
    ws.on("close", (code, reason) => {
      this.push({ kind: "close", code, reason: reason.toString("utf-8") });
    });
    // "close" always follows "error".
    ws.on("error", (err) => log.debug("socket error", { err }));
  }

  receive(signal?: AbortSignal): Promise<SocketFrame> {
    return this.frames.receive(signal);
  }

  send(data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new Error(`socket not open (readyState=${this.ws.readyState})`));
        return;
      }
      this.ws.send(data, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(code: number, reason: string): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      try {
        this.ws.close(code, reason);
      } catch (err) {
        log.debug("close failed, terminating", { err });
        this.ws.terminate();
      }
    }
    this.frames.close();
  }

  private push(frame: SocketFrame): void {
    if (this.closeSeen || this.frames.closed) return;
    if (frame.kind === "close") this.closeSeen = true;

    if (this.backlog.length === 0 && this.frames.trySend(frame)) return;

    this.backlog.push(frame);
    if (!this.draining) {
      this.draining = true;
      this.ws.pause();
      void this.drain();
    }
  }

  private async drain(): Promise<void> {
    try {
      while (this.backlog.length > 0) {
        await this.frames.send(this.backlog[0]);
        this.backlog.shift();
      }
    } catch (err) {
      // The reader closed the socket while frames were still queued.
      log.debug(`discarding ${this.backlog.length} unread frame(s)`, { err });
      this.backlog.length = 0;
    } finally {
      this.draining = false;
      if (this.ws.readyState === WebSocket.OPEN) this.ws.resume();
    }
  }
}

/** Default connector: opens a `ws` socket, honouring the caller's abort signal. */
export function connectWs(url: string, signal: AbortSignal): Promise<GatewaySocket> {
  return new Promise<GatewaySocket>((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError(signal.reason));
      return;
    }

    const ws = new WebSocket(url, { perMessageDeflate: false });
    // Wrap before "open" so no early frame is missed.
    const socket = new WsGatewaySocket(ws);

    let settled = false;
    const finishOk = (): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(socket);
    };
    const finishErr = (err: unknown): void => {
      if (settled) return;
      settled = true;
      cleanup();
      ws.terminate();
      reject(err);
    };
    const onAbort = (): void => finishErr(new CancelledError(signal.reason));

    const cleanup = (): void => {
      ws.removeListener("open", finishOk);
      ws.removeListener("error", finishErr);
      signal.removeEventListener("abort", onAbort);
    };

    ws.once("open", finishOk);
    ws.once("error", finishErr);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

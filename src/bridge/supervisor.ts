/**
 * Connection supervisor for the remote push stream.
 *
 * Keeps one websocket subscription open for as long as the bridge runs:
 *
 *   - normal close (1000/1001)      → reconnect at once
 *   - any other close, error, or
 *     failure to connect            → wait min(cap, base * 2^retries + jitter)
 *   - connection opened             → retries back to 0
 *
 * Frames are decoded here. Pings are skipped, malformed frames are logged
 * and dropped, and everything else goes to the frame handler. Handler errors
 * are logged; only stop() ends the loop. Each socket gets a generation
 * number and frames from an older socket are ignored.
 */

import WebSocket from "ws";
import { computeBackoff, sleep } from "../util/backoff.js";
import { FrameValidationError } from "./errors.js";
import { decodeFrame, type DecodedFrame, type RemoteFrame } from "./frames.js";

/** The part of a `ws` client the supervisor uses. */
export interface SupervisedSocket {
  on(event: "open", listener: () => void): unknown;
  on(event: "message", listener: (data: WebSocket.RawData) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number) => void): unknown;
  terminate(): void;
}

export interface SupervisorOptions {
  /** Push endpoint, without the secret. */
  url: string;
  token: string;
  onFrame: (frame: RemoteFrame) => Promise<void>;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  /** Socket factory. Defaults to a `ws` client. */
  connect?: (url: string) => SupervisedSocket;
  random?: () => number;
}

interface SessionEnd {
  normal: boolean;
  code?: number;
}

const NORMAL_CLOSE_CODES = new Set([1000, 1001]);

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function defaultConnect(url: string): SupervisedSocket {
  return new WebSocket(url, { handshakeTimeout: 15_000 });
}

export class ConnectionSupervisor {
  private readonly connect: (url: string) => SupervisedSocket;
  private readonly baseMs: number;
  private readonly capMs: number;
  private running: Promise<void> | null = null;
  private controller: AbortController | null = null;
  private socket: SupervisedSocket | null = null;
  private generation = 0;
  private retries = 0;

  constructor(private readonly options: SupervisorOptions) {
    this.connect = options.connect ?? defaultConnect;
    this.baseMs = options.reconnectBaseMs ?? 5_000;
    this.capMs = options.reconnectMaxMs ?? 60_000;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /** Consecutive failed sessions since the last successful connect. */
  get retryCount(): number {
    return this.retries;
  }

  get currentGeneration(): number {
    return this.generation;
  }

  /** Start the loop. No-op while it is already running. */
  start(): void {
    if (this.running) return;
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.loop(controller.signal)
      .catch((err) => console.error("[supervisor] Loop crashed:", err))
      .finally(() => {
        this.running = null;
      });
  }

  /** Abort the loop, drop the socket, and wait for the loop to exit. */
  async stop(): Promise<void> {
    this.controller?.abort();
    this.socket?.terminate();
    await this.running;
  }

  private get streamUrl(): string {
    const separator = this.options.url.includes("?") ? "&" : "?";
    return `${this.options.url}${separator}secret=${encodeURIComponent(this.options.token)}`;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const end = await this.session(signal);
      if (signal.aborted) break;

      if (end.normal) {
        console.info(`[supervisor] Stream closed normally (${end.code}), reconnecting`);
        continue;
      }

      const delay = computeBackoff(this.retries, {
        baseMs: this.baseMs,
        capMs: this.capMs,
        random: this.options.random,
      });
      this.retries++;
      console.warn(`[supervisor] Stream lost (${end.code ?? "no code"}), retrying in ${Math.round(delay)}ms`);
      await sleep(delay, signal);
    }
    console.info("[supervisor] Stopped");
  }

  /** One connection, from connect to close. Never rejects. */
  private session(signal: AbortSignal): Promise<SessionEnd> {
    return new Promise((resolve) => {
      const generation = ++this.generation;

      let socket: SupervisedSocket;
      try {
        socket = this.connect(this.streamUrl);
      } catch (err) {
        console.error("[supervisor] Could not open stream:", err);
        resolve({ normal: false });
        return;
      }
      this.socket = socket;

      let settled = false;
      const finish = (end: SessionEnd): void => {
        if (settled) return;
        settled = true;
        signal.removeEventListener("abort", onAbort);
        if (this.socket === socket) this.socket = null;
        resolve(end);
      };
      const onAbort = (): void => {
        socket.terminate();
        finish({ normal: true });
      };
      signal.addEventListener("abort", onAbort, { once: true });

      socket.on("open", () => {
        this.retries = 0;
        console.info("[supervisor] Connected to push stream");
      });
      socket.on("message", (data) => {
        if (generation !== this.generation) {
          console.debug("[supervisor] Dropping frame from a stale socket");
          return;
        }
        this.dispatch(rawToString(data));
      });
      socket.on("error", (err) => {
        console.warn("[supervisor] Stream error:", err.message);
      });
      socket.on("close", (code) => {
        finish({ normal: NORMAL_CLOSE_CODES.has(code), code });
      });
    });
  }

  private dispatch(raw: string): void {
    let decoded: DecodedFrame;
    try {
      decoded = decodeFrame(raw);
    } catch (err) {
      console.error("[supervisor] Dropping frame:", err instanceof FrameValidationError ? err.message : err);
      return;
    }

    if (decoded.kind === "ping") {
      console.debug("[supervisor] Ping");
      return;
    }

    const frame = decoded.frame;
    this.options.onFrame(frame).catch((err) => {
      console.error(`[supervisor] Frame handler failed for ${frame.message_id}:`, err);
    });
  }
}

/**
 * Uptime monitor pinger. GETs a push URL every interval so an external
 * monitor notices when the process dies.
 */

import axios from "axios";
import { computeBackoff, sleep } from "./util/backoff.js";
import { formatErrorMessage } from "./net-errors.js";

export interface HeartbeatOptions {
  random?: () => number;
  /** Milliseconds since the epoch. */
  now?: () => number;
  timeoutMs?: number;
}

export class HeartbeatPinger {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private retries = 0;

  constructor(
    private readonly url: string,
    private readonly intervalSeconds: number,
    private readonly options: HeartbeatOptions = {},
  ) {}

  get isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    console.info(`[heartbeat] Pinging every ${this.intervalSeconds}s`);
    this.loop = this.run(controller.signal)
      .catch((err) => console.error("[heartbeat] Loop crashed:", err))
      .finally(() => {
        this.loop = null;
      });
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.controller = null;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const now = this.options.now ?? Date.now;
    const intervalMs = this.intervalSeconds * 1000;

    while (!signal.aborted) {
      const startedAt = now();
      try {
        const response = await axios.get<unknown>(this.url, {
          timeout: this.options.timeoutMs ?? 10_000,
          validateStatus: () => true,
          signal,
        });
        if (response.status !== 200) {
          console.error(`[heartbeat] Ping returned HTTP ${response.status}`);
        }
      } catch (err) {
        if (signal.aborted) break;
        const delay = computeBackoff(this.retries++, {
          baseMs: 2000,
          capMs: intervalMs,
          random: this.options.random,
        });
        console.error(`[heartbeat] Ping failed, retrying in ${Math.round(delay)}ms:`, formatErrorMessage(err));
        await sleep(delay, signal);
        continue;
      }

      this.retries = 0;
      await sleep(Math.max(0, intervalMs - (now() - startedAt)), signal);
    }
  }
}

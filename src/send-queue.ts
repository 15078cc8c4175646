/**
 * FIFO serialization for outbound relay work.
 *
 * Only one task runs at a time. Later tasks queue up behind it in arrival
 * order, so messages reach the target platform in the order they arrived on
 * the source. A failing task does not stop the queue; its error is delivered
 * to the caller that enqueued it.
 *
 * The bridge wraps render + dispatch + identity update in `run()`. Queuing a
 * task never waits on the running one, so the supervisor can keep reading
 * frames while a slow attachment upload holds the queue.
 */

interface QueueEntry {
  /** Runs the task and settles the caller's promise. Never rejects. */
  execute: () => Promise<void>;
  /** Wall-clock arrival time (Date.now()), for the wait-time log line. */
  enqueuedAt: number;
}

/** Queue waits longer than this are logged as warnings. */
const SLOW_WAIT_MS = 30_000;

export class SendQueue {
  private readonly entries: QueueEntry[] = [];
  private processing = false;

  constructor(private readonly name = "send") {}

  /**
   * Enqueue a task and resolve with its result once it has run.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.entries.push({
        execute: async () => {
          try {
            resolve(await task());
          } catch (err) {
            reject(err);
          }
        },
        enqueuedAt: Date.now(),
      });
      if (!this.processing) {
        this.drain().catch((err) => console.error(`[queue:${this.name}] Drain error:`, err));
      }
    });
  }

  private async drain(): Promise<void> {
    this.processing = true;

    let entry = this.entries.shift();
    while (entry) {
      const waited = Date.now() - entry.enqueuedAt;
      if (waited > SLOW_WAIT_MS) {
        console.warn(`[queue:${this.name}] Task waited ${Math.round(waited / 1000)}s for its turn`);
      }
      await entry.execute();
      entry = this.entries.shift();
    }

    this.processing = false;
  }

  /** Resolves once every task queued so far has run. */
  async idle(): Promise<void> {
    if (!this.processing && this.entries.length === 0) return;
    await this.run(async () => undefined);
  }

  /** Number of queued (not yet running) tasks. */
  depth(): number {
    return this.entries.length;
  }

  /** Whether a task is currently running. */
  isProcessing(): boolean {
    return this.processing;
  }
}

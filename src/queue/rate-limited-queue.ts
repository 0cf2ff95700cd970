/**
 * Single-flight request queue for rate-sensitive collaborators.
 *
 * Tasks run strictly one at a time in submission order. Every task is
 * followed by a randomized pause; a failed task additionally triggers an
 * exponential backoff of 2^n * base, where n is the queue length at the
 * moment of failure (the failed entry included). The failure is handed back
 * to the submitter; the queue never retries on its own.
 */

export type FetchTask<T> = () => Promise<T>;

export interface RateLimitedQueueOptions {
  /** Lower bound of the pause after each task (ms). Default 1500. */
  minDelayMs?: number;
  /** Upper bound of the pause after each task (ms). Default 3500. */
  maxDelayMs?: number;
  /** Unit of the 2^n backoff (ms). Default 1000. */
  backoffBaseMs?: number;
  /** Source of uniform [0, 1) values. */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  /** Log prefix, e.g. "x-api". */
  name?: string;
}

interface QueueEntry {
  /** Settles the submitter's handle; resolves true when the task succeeded. */
  run: () => Promise<boolean>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * Pause that does not hold the process open. For one-shot CLIs, where the
 * trailing pause after the last task should not delay exit.
 */
export function unrefSleep(ms: number): Promise<void> {
  return new Promise((r) => {
    setTimeout(r, ms).unref();
  });
}

export class RateLimitedQueue {
  private readonly entries: QueueEntry[] = [];
  private draining = false;
  private idle: Promise<void> = Promise.resolve();

  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly backoffBaseMs: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly tag: string;

  constructor(options: RateLimitedQueueOptions = {}) {
    this.minDelayMs = options.minDelayMs ?? 1500;
    this.maxDelayMs = options.maxDelayMs ?? 3500;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.tag = `[queue${options.name ? `:${options.name}` : ""}]`;

    if (this.maxDelayMs < this.minDelayMs) {
      throw new RangeError("maxDelayMs must be >= minDelayMs");
    }
  }

  /** Entries not yet finished, including the one running. */
  get size(): number {
    return this.entries.length;
  }

  get isDraining(): boolean {
    return this.draining;
  }

  /**
   * Append a task; the returned promise settles with that task's own
   * result or failure.
   */
  submit<T>(task: FetchTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.entries.push({
        run: async () => {
          try {
            resolve(await task());
            return true;
          } catch (error) {
            reject(error);
            return false;
          }
        },
      });

      if (!this.draining) {
        this.draining = true;
        this.idle = this.drain();
      }
    });
  }

  /** Resolves once the queue is empty and the worker has stopped. */
  onIdle(): Promise<void> {
    return this.idle;
  }

  private async drain(): Promise<void> {
    try {
      while (this.entries.length > 0) {
        const ok = await this.entries[0].run();

        if (!ok) {
          const backlog = this.entries.length;
          const backoffMs = 2 ** backlog * this.backoffBaseMs;
          console.log(`${this.tag} Task failed, backing off ${backoffMs}ms (backlog ${backlog})`);
          await this.sleep(backoffMs);
        }

        this.entries.shift();
        await this.sleep(this.nextDelay());
      }
    } finally {
      this.draining = false;
    }
  }

  private nextDelay(): number {
    return this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
  }
}

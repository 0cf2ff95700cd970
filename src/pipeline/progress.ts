import { EventEmitter } from "events";

/**
 * Progress events published by the pipeline while a request runs.
 * Consumers (CLI, SSE endpoint) subscribe independently; the pipeline
 * never knows who is listening.
 */
export type ProgressEvent =
  | { type: "collect:start"; ticker: string; query: string; hoursBack: number; maxItems: number }
  | { type: "collect:done"; ticker: string; fetched: number; recent: number; selected: number }
  | { type: "score:start"; total: number }
  | { type: "score:post"; index: number; total: number; status: "ok"; score: number }
  | { type: "score:post"; index: number; total: number; status: "skip"; reason: string }
  | { type: "score:done"; scored: number; skipped: number }
  | { type: "aggregate:done"; ticker: string; weightedSentiment: number; count: number };

export type ProgressListener = (event: ProgressEvent) => void;

export class ProgressChannel {
  private readonly emitter = new EventEmitter();
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  publish(event: ProgressEvent): void {
    if (this.closed) return;
    this.emitter.emit("progress", event);
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: ProgressListener): () => void {
    this.emitter.on("progress", listener);
    return () => {
      this.emitter.off("progress", listener);
    };
  }

  /** Ends every open stream(). Later publishes are dropped. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.emitter.emit("close");
  }

  /**
   * Buffered async iteration over events. Listening starts at the call,
   * not at the first next(), so nothing published in between is lost.
   * Ends after close() once the buffer is drained.
   */
  stream(): AsyncGenerator<ProgressEvent, void, undefined> {
    const buffer: ProgressEvent[] = [];
    const state: { done: boolean; wake: (() => void) | null } = { done: this.closed, wake: null };

    const onEvent = (event: ProgressEvent) => {
      buffer.push(event);
      state.wake?.();
    };
    const onClose = () => {
      state.done = true;
      state.wake?.();
    };

    this.emitter.on("progress", onEvent);
    this.emitter.once("close", onClose);

    const detach = () => {
      this.emitter.off("progress", onEvent);
      this.emitter.off("close", onClose);
    };

    return (async function* () {
      try {
        while (true) {
          const next = buffer.shift();
          if (next) {
            yield next;
            continue;
          }
          if (state.done) return;
          await new Promise<void>((resolve) => {
            state.wake = resolve;
          });
          state.wake = null;
        }
      } finally {
        detach();
      }
    })();
  }
}

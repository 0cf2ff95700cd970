import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { SentimentPipeline } from "../pipeline/analyzer";
import type { SelectionWindow, AggregateResultJson } from "../types/sentiment";
import { toResultJson } from "../types/sentiment";
import { ValidationError, errorMessage } from "../pipeline/errors";
import { errorBody } from "./http-errors";
import type { ErrorBody } from "./http-errors";

export type WatchlistEntry =
  | { ticker: string; status: "pending" }
  | { ticker: string; status: "ok"; updatedAt: string; result: AggregateResultJson }
  | { ticker: string; status: "error"; updatedAt: string; error: ErrorBody };

export interface WatchlistOptions {
  tickers: readonly string[];
  window: SelectionWindow;
  now?: () => Date;
}

/**
 * Periodic re-analysis of a fixed set of tickers.
 *
 * Only the latest outcome per ticker is kept, in memory. Tickers run one
 * after another; the shared queue paces the searches anyway.
 */
export class WatchlistMonitor {
  private readonly latest = new Map<string, WatchlistEntry>();
  private refreshing = false;
  private task: ScheduledTask | null = null;

  constructor(
    private readonly pipeline: SentimentPipeline,
    private readonly options: WatchlistOptions
  ) {}

  get tickers(): readonly string[] {
    return this.options.tickers;
  }

  get isRefreshing(): boolean {
    return this.refreshing;
  }

  snapshot(): WatchlistEntry[] {
    return this.options.tickers.map(
      (ticker) => this.latest.get(ticker) ?? { ticker, status: "pending" }
    );
  }

  /**
   * Re-run every ticker. A refresh already in progress is not doubled up;
   * the call returns false instead.
   */
  async refresh(): Promise<boolean> {
    if (this.refreshing) {
      console.log(`[watchlist] Refresh already in progress, skipping`);
      return false;
    }
    this.refreshing = true;
    try {
      const { hoursBack, maxItems } = this.options.window;
      for (const ticker of this.options.tickers) {
        try {
          const result = await this.pipeline.runAnalysis(ticker, hoursBack, maxItems);
          this.latest.set(ticker, {
            ticker,
            status: "ok",
            updatedAt: this.now().toISOString(),
            result: toResultJson(result),
          });
          console.log(`[watchlist] ${ticker}: ${result.weightedSentiment.toFixed(2)}`);
        } catch (error) {
          this.latest.set(ticker, {
            ticker,
            status: "error",
            updatedAt: this.now().toISOString(),
            error: errorBody(error),
          });
          console.error(`[watchlist] ${ticker} failed: ${errorMessage(error)}`);
        }
      }
      return true;
    } finally {
      this.refreshing = false;
    }
  }

  /** Run refresh() on a cron expression (UTC). */
  schedule(expression: string): void {
    if (!cron.validate(expression)) {
      throw new ValidationError(`Invalid cron expression: ${expression}`);
    }
    this.stop();
    this.task = cron.schedule(
      expression,
      async () => {
        await this.refresh();
      },
      { timezone: "UTC" }
    );
    console.log(`[cron] Watchlist refresh scheduled: ${expression} UTC (${this.options.tickers.length} tickers)`);
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  private now(): Date {
    return this.options.now?.() ?? new Date();
  }
}

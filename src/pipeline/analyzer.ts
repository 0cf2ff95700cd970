import type { AggregateResult, RawPost, ScoredPost } from "../types/sentiment";
import type { PostSource, TextAnalyzer } from "../types/collaborators";
import type { RateLimitedQueue } from "../queue/rate-limited-queue";
import { collect } from "../collector/collect";
import { scoreMany, scoreText, toScoredPost } from "../analysis/score";
import { aggregate } from "../analysis/aggregate";
import type { ProgressChannel } from "./progress";
import { NoDataError, ValidationError } from "./errors";

export const MULTI_SOURCE_TICKER = "multiple-sources";

export interface PipelineDeps {
  queue: RateLimitedQueue;
  source: PostSource;
  analyzer: TextAnalyzer;
  /** Parallel analysis calls per batch. Default 1. */
  concurrency?: number;
  now?: () => Date;
}

/**
 * Ticker in, AggregateResult out. Holds no state between calls besides
 * its injected collaborators; the queue may be shared with other pipelines.
 */
export class SentimentPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  get analyzer(): TextAnalyzer {
    return this.deps.analyzer;
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  async runAnalysis(
    ticker: string,
    hoursBack: number,
    maxItems: number,
    progress?: ProgressChannel
  ): Promise<AggregateResult> {
    const posts = await collect(
      ticker,
      { hoursBack, maxItems },
      { queue: this.deps.queue, source: this.deps.source, now: () => this.now(), progress }
    );
    if (posts.length === 0) {
      throw new NoDataError("empty_window", `No posts found for ${ticker} in the past ${hoursBack}h`);
    }

    const scored = await scoreMany(this.deps.analyzer, posts, {
      concurrency: this.deps.concurrency,
      progress,
    });
    if (scored.length === 0) {
      throw new NoDataError("analysis_failed", `Every analysis call failed for ${ticker}`);
    }

    return this.finish(ticker, scored, progress);
  }

  /** One text, no collection. A failed analysis is an error here, not a skip. */
  async scoreSingleText(text: string, progress?: ProgressChannel): Promise<ScoredPost> {
    const post = this.textPost(text);
    progress?.publish({ type: "score:start", total: 1 });
    const result = await scoreText(this.deps.analyzer, post.text);

    if (result.status === "skip") {
      progress?.publish({ type: "score:post", index: 1, total: 1, status: "skip", reason: result.reason });
      progress?.publish({ type: "score:done", scored: 0, skipped: 1 });
      throw result.error;
    }

    progress?.publish({ type: "score:post", index: 1, total: 1, status: "ok", score: result.sentimentScore });
    progress?.publish({ type: "score:done", scored: 1, skipped: 0 });
    return toScoredPost(post, result);
  }

  /** Every text weighs the same: they carry no engagement. */
  async scoreMultipleTexts(texts: readonly string[], progress?: ProgressChannel): Promise<AggregateResult> {
    const posts = texts.filter((t) => t.trim().length > 0).map((t) => this.textPost(t));
    if (posts.length === 0) {
      throw new NoDataError("no_input", "No texts to analyze");
    }

    const scored = await scoreMany(this.deps.analyzer, posts, {
      concurrency: this.deps.concurrency,
      progress,
    });
    if (scored.length === 0) {
      throw new NoDataError("analysis_failed", `Every analysis call failed for ${posts.length} texts`);
    }

    return this.finish(MULTI_SOURCE_TICKER, scored, progress);
  }

  private finish(ticker: string, scored: ScoredPost[], progress?: ProgressChannel): AggregateResult {
    const result = aggregate(ticker, scored, this.now());
    progress?.publish({
      type: "aggregate:done",
      ticker,
      weightedSentiment: result.weightedSentiment,
      count: result.stats.count,
    });
    return result;
  }

  private textPost(text: string): RawPost {
    if (!text.trim()) {
      throw new ValidationError("Text must not be empty");
    }
    return { text, author: "user", timestamp: this.now(), likes: 0, retweets: 0, replies: 0 };
  }
}

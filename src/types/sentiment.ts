import { z } from "zod";

/**
 * Core records of the sentiment pipeline.
 *
 * Posts come in from the scrape collaborator, get one analysis each,
 * and are reduced into a single AggregateResult per request.
 */

const Count = z.number().int().nonnegative();

export const RawPostSchema = z.object({
  text: z.string(),
  author: z.string(),
  timestamp: z.date(),
  likes: Count,
  retweets: Count,
  replies: Count,
});

export type RawPost = Readonly<z.infer<typeof RawPostSchema>>;

/** Caller-supplied recency horizon and volume cap for one run. */
export const SelectionWindowSchema = z.object({
  hoursBack: z.number().int().min(1, "hoursBack must be at least 1"),
  maxItems: z
    .number()
    .int()
    .min(10, "maxItems must be between 10 and 100")
    .max(100, "maxItems must be between 10 and 100"),
});

export type SelectionWindow = z.infer<typeof SelectionWindowSchema>;

export const ScoreMethodSchema = z.enum([
  "parsed",   // number read from a "Score: x" style line
  "keywords", // bullish/bearish keyword balance
]);

export type ScoreMethod = z.infer<typeof ScoreMethodSchema>;

export interface ScoredPost {
  readonly post: RawPost;
  readonly analysisText: string;
  /** Usually within [-1, 1]; a parsed figure is passed through unclamped. */
  readonly sentimentScore: number;
  readonly scoreMethod: ScoreMethod;
  readonly source: "primary";
  readonly engagement: number;
}

export interface SentimentStats {
  readonly count: number;
  readonly mean: number;
  readonly std: number;
  readonly min: number;
  readonly max: number;
  readonly avgEngagement: number;
}

export interface AggregateResult {
  readonly ticker: string;
  readonly weightedSentiment: number;
  readonly stats: SentimentStats;
  readonly themes: readonly string[];
  readonly scoredPosts: readonly ScoredPost[];
  readonly timestamp: Date;
}

/** likes + retweets + replies */
export function engagementOf(post: RawPost): number {
  return post.likes + post.retweets + post.replies;
}

/**
 * JSON shape served to API/CLI consumers. Dates become ISO strings,
 * everything else is passed through.
 */
export function toResultJson(result: AggregateResult) {
  return {
    ticker: result.ticker,
    weightedSentiment: result.weightedSentiment,
    stats: result.stats,
    themes: [...result.themes],
    scoredPosts: result.scoredPosts.map(toScoredPostJson),
    timestamp: result.timestamp.toISOString(),
  };
}

export function toScoredPostJson(scored: ScoredPost) {
  return {
    text: scored.post.text,
    author: scored.post.author,
    postedAt: scored.post.timestamp.toISOString(),
    likes: scored.post.likes,
    retweets: scored.post.retweets,
    replies: scored.post.replies,
    engagement: scored.engagement,
    sentimentScore: scored.sentimentScore,
    scoreMethod: scored.scoreMethod,
    source: scored.source,
    analysisText: scored.analysisText,
  };
}

export type AggregateResultJson = ReturnType<typeof toResultJson>;
export type ScoredPostJson = ReturnType<typeof toScoredPostJson>;

/**
 * Collector: bounded, recency-filtered post selection ranked by engagement.
 *
 * One scrape per request goes through the queue. The recency filter and
 * the top-K cut happen locally, so the number of posts sent to the
 * (paid) analysis service never exceeds topK(maxItems).
 */

import type { RawPost, SelectionWindow } from "../types/sentiment";
import { RawPostSchema, SelectionWindowSchema, engagementOf } from "../types/sentiment";
import type { PostSource } from "../types/collaborators";
import type { RateLimitedQueue } from "../queue/rate-limited-queue";
import type { ProgressChannel } from "../pipeline/progress";
import { ScrapeUnavailable, ValidationError, errorMessage } from "../pipeline/errors";

const HOUR_MS = 60 * 60 * 1000;

export interface CollectDeps {
  queue: RateLimitedQueue;
  source: PostSource;
  now?: () => Date;
  progress?: ProgressChannel;
}

/** Bare symbol, retweets excluded. Language filtering is the source's job. */
export function buildSearchQuery(ticker: string): string {
  return `${ticker.trim()} -is:retweet`;
}

/** max(10, min(floor(maxItems / 3), 15)) */
export function topK(maxItems: number): number {
  return Math.max(10, Math.min(Math.floor(maxItems / 3), 15));
}

/** Strictly newer than now - hoursBack. */
export function filterRecent(posts: readonly RawPost[], hoursBack: number, now: Date): RawPost[] {
  const cutoff = now.getTime() - hoursBack * HOUR_MS;
  return posts.filter((p) => p.timestamp.getTime() > cutoff);
}

/**
 * Posts whose counts are negative or fractional, or whose timestamp is not a
 * valid date, are dropped. The survivors are the source's own objects.
 */
export function dropMalformed(posts: readonly RawPost[]): RawPost[] {
  return posts.filter((p) => RawPostSchema.safeParse(p).success);
}

/** Engagement descending; equal engagement keeps server order. */
export function rankByEngagement(posts: readonly RawPost[]): RawPost[] {
  return posts
    .map((post, index) => ({ post, index, engagement: engagementOf(post) }))
    .sort((a, b) => b.engagement - a.engagement || a.index - b.index)
    .map((r) => r.post);
}

export function validateWindow(window: SelectionWindow): SelectionWindow {
  const parsed = SelectionWindowSchema.safeParse(window);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => i.message).join("; ");
    throw new ValidationError(`Invalid selection window: ${detail}`, parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Fetch, filter and select the posts worth analyzing for a ticker.
 * An empty result is a normal outcome; the caller decides if it is fatal.
 */
export async function collect(
  ticker: string,
  window: SelectionWindow,
  deps: CollectDeps
): Promise<RawPost[]> {
  const { hoursBack, maxItems } = validateWindow(window);
  if (!ticker.trim()) {
    throw new ValidationError("Ticker must not be empty");
  }

  const query = buildSearchQuery(ticker);
  console.log(`[collector] Collecting ${ticker} from the past ${hoursBack}h (max ${maxItems})`);
  deps.progress?.publish({ type: "collect:start", ticker, query, hoursBack, maxItems });

  let fetched: RawPost[];
  try {
    fetched = await deps.queue.submit(() => deps.source.search(query, maxItems));
  } catch (error) {
    throw new ScrapeUnavailable(`Search for ${ticker} failed: ${errorMessage(error)}`, { cause: error });
  }

  const valid = dropMalformed(fetched);
  if (valid.length < fetched.length) {
    console.log(`[collector] Dropped ${fetched.length - valid.length} malformed post(s) for ${ticker}`);
  }

  const now = deps.now?.() ?? new Date();
  const recent = filterRecent(valid, hoursBack, now);
  const k = topK(maxItems);
  const selected = rankByEngagement(recent).slice(0, k);

  console.log(
    `[collector] ${fetched.length} fetched, ${recent.length} within ${hoursBack}h, ${selected.length} selected (top ${k})`
  );
  deps.progress?.publish({
    type: "collect:done",
    ticker,
    fetched: fetched.length,
    recent: recent.length,
    selected: selected.length,
  });

  return selected;
}

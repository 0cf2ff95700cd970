/**
 * Per-post sentiment scoring.
 *
 * Each post gets exactly one analysis call. The numeric score is read from
 * the free-text answer: first from an explicit "Score: x" style line, and
 * failing that from a bullish/bearish keyword balance. A failed call is a
 * tagged skip, never a thrown error, so one bad post can't sink a batch.
 */

import type { RawPost, ScoredPost, ScoreMethod } from "../types/sentiment";
import { engagementOf } from "../types/sentiment";
import type { TextAnalyzer } from "../types/collaborators";
import type { ProgressChannel } from "../pipeline/progress";
import { AnalysisUnavailable, errorMessage } from "../pipeline/errors";
import { buildPostPrompt } from "./prompts";

export const SCORE_MARKERS = ["score:", "score is:", "sentiment:", "rating:"] as const;

export const POSITIVE_KEYWORDS = ["bullish", "positive", "optimistic", "growth", "gain"] as const;
export const NEGATIVE_KEYWORDS = ["bearish", "negative", "pessimistic", "decline", "loss"] as const;

// Plain decimal with optional sign and exponent. No inf/nan, no thousands separators.
const NUMERIC_TOKEN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export type ScoreResult =
  | { status: "ok"; analysisText: string; sentimentScore: number; scoreMethod: ScoreMethod }
  | { status: "skip"; reason: string; error: AnalysisUnavailable };

export interface ScoreManyOptions {
  /** Parallel analysis calls. Default 1. */
  concurrency?: number;
  progress?: ProgressChannel;
}

/**
 * Number from the last line carrying a score marker, or null.
 * Only that last line is considered; an unparseable token there means
 * no parse, even if an earlier marker line had a number.
 */
export function parseMarkedScore(analysis: string): number | null {
  const marked = analysis.split("\n").filter((line) => {
    const lower = line.toLowerCase();
    return SCORE_MARKERS.some((m) => lower.includes(m));
  });
  if (marked.length === 0) return null;

  const line = marked[marked.length - 1];
  const afterColon = line.slice(line.lastIndexOf(":") + 1).trim();
  const token = afterColon.split(/\s+/)[0];
  if (!token || !NUMERIC_TOKEN.test(token)) return null;

  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

/** Non-overlapping occurrences, case already folded by the caller. */
function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/** (pos - neg) / (pos + neg) over substring hits; 0 when nothing matches. */
export function keywordScore(analysis: string): number {
  const lower = analysis.toLowerCase();
  const pos = POSITIVE_KEYWORDS.reduce((sum, w) => sum + countOccurrences(lower, w), 0);
  const neg = NEGATIVE_KEYWORDS.reduce((sum, w) => sum + countOccurrences(lower, w), 0);
  const total = pos + neg;
  if (total === 0) return 0;
  return (pos - neg) / total;
}

export function extractScore(analysis: string): { score: number; method: ScoreMethod } {
  const parsed = parseMarkedScore(analysis);
  if (parsed !== null) return { score: parsed, method: "parsed" };
  return { score: keywordScore(analysis), method: "keywords" };
}

/**
 * Analyze one text. Never throws: collaborator failures come back as
 * { status: "skip" }.
 */
export async function scoreText(analyzer: TextAnalyzer, text: string): Promise<ScoreResult> {
  try {
    const analysisText = await analyzer.analyze(buildPostPrompt(text));
    const { score, method } = extractScore(analysisText);
    return { status: "ok", analysisText, sentimentScore: score, scoreMethod: method };
  } catch (error) {
    const unavailable =
      error instanceof AnalysisUnavailable
        ? error
        : new AnalysisUnavailable(errorMessage(error), undefined, { cause: error });
    return { status: "skip", reason: unavailable.message, error: unavailable };
  }
}

export function toScoredPost(
  post: RawPost,
  result: Extract<ScoreResult, { status: "ok" }>
): ScoredPost {
  return {
    post,
    analysisText: result.analysisText,
    sentimentScore: result.sentimentScore,
    scoreMethod: result.scoreMethod,
    source: "primary",
    engagement: engagementOf(post),
  };
}

/**
 * Score every post independently with a small worker pool.
 * Skipped posts are logged and dropped; the output keeps input order.
 */
export async function scoreMany(
  analyzer: TextAnalyzer,
  posts: readonly RawPost[],
  options: ScoreManyOptions = {}
): Promise<ScoredPost[]> {
  const total = posts.length;
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const { progress } = options;

  progress?.publish({ type: "score:start", total });
  if (total === 0) {
    progress?.publish({ type: "score:done", scored: 0, skipped: 0 });
    return [];
  }

  console.log(`[scorer] Scoring ${total} posts (concurrency=${concurrency})...`);

  const results: (ScoredPost | null)[] = new Array(total).fill(null);
  let idx = 0;

  async function worker() {
    while (idx < total) {
      const i = idx++;
      const post = posts[i];
      const result = await scoreText(analyzer, post.text);

      if (result.status === "ok") {
        results[i] = toScoredPost(post, result);
        progress?.publish({ type: "score:post", index: i + 1, total, status: "ok", score: result.sentimentScore });
      } else {
        console.log(`[scorer] Skipping post ${i + 1}/${total}: ${result.reason}`);
        progress?.publish({ type: "score:post", index: i + 1, total, status: "skip", reason: result.reason });
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, total) }, () => worker());
  await Promise.all(workers);

  const scored = results.filter((r): r is ScoredPost => r !== null);
  const skipped = total - scored.length;
  console.log(`[scorer] Results: ${scored.length} scored, ${skipped} skipped`);
  progress?.publish({ type: "score:done", scored: scored.length, skipped });

  return scored;
}

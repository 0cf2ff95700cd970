/**
 * Reduce scored posts into one AggregateResult.
 *
 * Weights are engagement normalized against the busiest post (not the sum),
 * so the weighted mean divides by Σw explicitly. With no engagement data at
 * all every post weighs 1 and the result is a plain mean.
 */

import type { AggregateResult, ScoredPost, SentimentStats } from "../types/sentiment";
import { NoDataError } from "../pipeline/errors";

export type ThemeName = "bullish" | "bearish" | "momentum" | "fundamental" | "risk";
export type Theme = ThemeName | "neutral";

export const THEME_ORDER: readonly ThemeName[] = ["bullish", "bearish", "momentum", "fundamental", "risk"];

export const THEME_KEYWORDS: Readonly<Record<ThemeName, readonly string[]>> = {
  bullish: ["bullish", "uptrend", "growth", "rally", "surge"],
  bearish: ["bearish", "downtrend", "decline", "dump", "crash"],
  momentum: ["momentum", "volume", "breakout", "resistance", "support"],
  fundamental: ["adoption", "development", "partnership", "news", "update"],
  risk: ["risk", "volatile", "uncertainty", "caution", "warning"],
};

export const MIN_THEME_OCCURRENCES = 2;

/** Negative engagement counts as none, so every weight stays in [0, 1]. */
export function computeWeights(engagements: readonly number[]): number[] {
  const clean = engagements.map((e) => Math.max(0, e));
  const total = clean.reduce((sum, e) => sum + e, 0);
  if (total <= 0) return clean.map(() => 1);
  const max = Math.max(...clean);
  return clean.map((e) => e / max);
}

export function weightedMean(values: readonly number[], weights: readonly number[]): number {
  let num = 0;
  let den = 0;
  for (let i = 0; i < values.length; i++) {
    num += values[i] * weights[i];
    den += weights[i];
  }
  return num / den;
}

/** Sample standard deviation (n - 1); 0 for a single value. */
export function sampleStd(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;
  const mean = values.reduce((s, v) => s + v, 0) / n;
  const ss = values.reduce((s, v) => s + (v - mean) ** 2, 0);
  return Math.sqrt(ss / (n - 1));
}

export function computeStats(scoredPosts: readonly ScoredPost[]): SentimentStats {
  const scores = scoredPosts.map((s) => s.sentimentScore);
  const n = scores.length;
  return {
    count: n,
    mean: scores.reduce((s, v) => s + v, 0) / n,
    std: sampleStd(scores),
    min: Math.min(...scores),
    max: Math.max(...scores),
    avgEngagement: scoredPosts.reduce((s, p) => s + p.engagement, 0) / n,
  };
}

/**
 * Themes mentioned by at least two analyses, in table order.
 * A post counts once per theme however many of its keywords it hits.
 */
export function extractThemes(
  analyses: readonly string[],
  minOccurrences = MIN_THEME_OCCURRENCES
): Theme[] {
  const lowered = analyses.map((a) => a.toLowerCase());
  const themes: Theme[] = [];

  for (const theme of THEME_ORDER) {
    const keywords = THEME_KEYWORDS[theme];
    const count = lowered.filter((text) => keywords.some((k) => text.includes(k))).length;
    if (count >= minOccurrences) themes.push(theme);
  }

  return themes.length > 0 ? themes : ["neutral"];
}

export function aggregate(
  ticker: string,
  scoredPosts: readonly ScoredPost[],
  now: Date = new Date()
): AggregateResult {
  if (scoredPosts.length === 0) {
    throw new NoDataError("analysis_failed", `No analyzable posts for ${ticker}`);
  }

  const weights = computeWeights(scoredPosts.map((s) => s.engagement));
  const weightedSentiment = weightedMean(
    scoredPosts.map((s) => s.sentimentScore),
    weights
  );
  const uniform = weights.every((w) => w === 1);
  console.log(
    `[aggregate] ${ticker}: ${weightedSentiment.toFixed(2)} over ${scoredPosts.length} posts (${uniform ? "equal" : "engagement"} weights)`
  );

  return {
    ticker,
    weightedSentiment,
    stats: computeStats(scoredPosts),
    themes: extractThemes(scoredPosts.map((s) => s.analysisText)),
    scoredPosts: [...scoredPosts],
    timestamp: now,
  };
}

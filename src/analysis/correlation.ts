import { ValidationError } from "../pipeline/errors";

export interface MarketCorrelation {
  /** Pearson r, or null when it is undefined (fewer than 2 points, or a flat series). */
  correlation: number | null;
  interpretation: string;
  timestamp: Date;
}

export function pearson(xs: readonly number[], ys: readonly number[]): number | null {
  const n = xs.length;
  if (n < 2 || ys.length !== n) return null;

  const mx = xs.reduce((s, v) => s + v, 0) / n;
  const my = ys.reduce((s, v) => s + v, 0) / n;
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }
  if (sxx === 0 || syy === 0) return null;
  return sxy / Math.sqrt(sxx * syy);
}

export function interpretCorrelation(r: number | null): string {
  if (r === null) return "Undefined correlation: not enough variation to compare";
  if (r > 0.7) return "Strong positive correlation: Sentiment strongly predicts price movements";
  if (r > 0.3) return "Moderate positive correlation: Sentiment somewhat predicts price movements";
  if (r > -0.3) return "Weak correlation: Sentiment has limited predictive value";
  if (r > -0.7) return "Moderate negative correlation: Sentiment inversely predicts price movements";
  return "Strong negative correlation: Sentiment strongly inversely predicts price movements";
}

/**
 * How well a series of sentiment readings tracks the matching price changes.
 */
export function getMarketCorrelation(
  sentimentScores: readonly number[],
  priceChanges: readonly number[],
  now: Date = new Date()
): MarketCorrelation {
  if (sentimentScores.length !== priceChanges.length) {
    throw new ValidationError("Length of sentiment scores and price changes must match");
  }
  const correlation = pearson(sentimentScores, priceChanges);
  return {
    correlation,
    interpretation: interpretCorrelation(correlation),
    timestamp: now,
  };
}

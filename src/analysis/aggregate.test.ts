import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  aggregate,
  computeStats,
  computeWeights,
  extractThemes,
  sampleStd,
  weightedMean,
} from "./aggregate";
import { NoDataError } from "../pipeline/errors";
import type { ScoredPost } from "../types/sentiment";

function makeScored(score: number, engagement: number, analysisText = "Score: " + score): ScoredPost {
  return {
    post: {
      text: `post ${score}/${engagement}`,
      author: "trader",
      timestamp: new Date("2026-03-10T10:00:00Z"),
      likes: engagement,
      retweets: 0,
      replies: 0,
    },
    analysisText,
    sentimentScore: score,
    scoreMethod: "parsed",
    source: "primary",
    engagement,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("computeWeights", () => {
  it("normalizes against the maximum engagement", () => {
    expect(computeWeights([100, 50, 0])).toEqual([1, 0.5, 0]);
  });

  it("uses uniform weights when there is no engagement at all", () => {
    expect(computeWeights([0, 0, 0])).toEqual([1, 1, 1]);
  });

  it("treats negative engagement as zero", () => {
    expect(computeWeights([100, -60])).toEqual([1, 0]);
    expect(computeWeights([-5, 0])).toEqual([1, 1]);
  });
});

describe("weightedMean", () => {
  it("divides by the sum of weights", () => {
    expect(weightedMean([1, -1], [1, 0.5])).toBeCloseTo(1 / 3, 10);
  });
});

describe("sampleStd", () => {
  it("uses the n - 1 divisor", () => {
    expect(sampleStd([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.13809, 4);
  });

  it("is 0 for a single value", () => {
    expect(sampleStd([0.7])).toBe(0);
  });
});

describe("computeStats", () => {
  it("summarizes scores and engagement", () => {
    const stats = computeStats([makeScored(0.5, 10), makeScored(-0.5, 20), makeScored(1, 30)]);
    expect(stats.count).toBe(3);
    expect(stats.mean).toBeCloseTo(1 / 3, 10);
    expect(stats.std).toBeCloseTo(0.763763, 5);
    expect(stats.min).toBe(-0.5);
    expect(stats.max).toBe(1);
    expect(stats.avgEngagement).toBe(20);
  });
});

describe("extractThemes", () => {
  it("keeps themes mentioned by at least two analyses", () => {
    const themes = extractThemes([
      "Price is testing support",
      "Strong SUPPORT at 60k",
      "Adoption is rising",
    ]);
    expect(themes).toEqual(["momentum"]);
  });

  it("returns neutral when nothing reaches the threshold", () => {
    expect(extractThemes(["nothing here", "quiet day"])).toEqual(["neutral"]);
  });

  it("counts a theme once per analysis", () => {
    expect(extractThemes(["bullish rally surge", "flat"])).toEqual(["neutral"]);
  });

  it("lists several themes in table order", () => {
    expect(extractThemes(["risk of a crash", "high risk, bearish"])).toEqual(["bearish", "risk"]);
  });
});

describe("aggregate", () => {
  it("fails with NoDataError on empty input", () => {
    expect(() => aggregate("$BTC", [])).toThrow(NoDataError);
  });

  it("reports std 0 (not NaN) for a single post", () => {
    const result = aggregate("$BTC", [makeScored(0.4, 12)]);
    expect(result.stats.std).toBe(0);
    expect(result.weightedSentiment).toBeCloseTo(0.4, 10);
  });

  it("weights scores by normalized engagement", () => {
    const result = aggregate("$BTC", [makeScored(1, 100), makeScored(-1, 50)]);
    expect(result.weightedSentiment).toBeCloseTo(1 / 3, 10);
  });

  it("equals the arithmetic mean when engagement is all zero", () => {
    const result = aggregate("multi", [makeScored(0.2, 0), makeScored(-0.4, 0), makeScored(0.8, 0)]);
    expect(result.weightedSentiment).toBeCloseTo(0.2, 10);
    expect(result.weightedSentiment).toBeCloseTo(result.stats.mean, 10);
  });

  it.each([
    [[0.9, -0.3, 0.1], [5, 200, 40]],
    [[-1, -0.8, 0.6, 0.2], [1, 1, 1000, 3]],
    [[0.5, 0.5], [7, 0]],
    [[2.5, -0.2, 0], [10, 10, 10]],
  ])("stays within [min, max] of the scores (%j, %j)", (scores, engagements) => {
    const posts = scores.map((s, i) => makeScored(s, engagements[i]));
    const result = aggregate("$X", posts);
    expect(result.weightedSentiment).toBeGreaterThanOrEqual(Math.min(...scores) - 1e-12);
    expect(result.weightedSentiment).toBeLessThanOrEqual(Math.max(...scores) + 1e-12);
  });

  it("keeps input order, ticker, timestamp and themes", () => {
    const now = new Date("2026-03-10T12:00:00Z");
    const posts = [
      makeScored(0.1, 5, "Volume is picking up"),
      makeScored(0.9, 50, "Breakout above resistance"),
      makeScored(-0.2, 20, "Partnership news"),
    ];

    const result = aggregate("$ETH", posts, now);

    expect(result.ticker).toBe("$ETH");
    expect(result.timestamp).toBe(now);
    expect(result.scoredPosts.map((p) => p.sentimentScore)).toEqual([0.1, 0.9, -0.2]);
    expect(result.stats.count).toBe(3);
    expect(result.themes).toEqual(["momentum"]);
  });
});

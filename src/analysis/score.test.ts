import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  extractScore,
  keywordScore,
  parseMarkedScore,
  scoreMany,
  scoreText,
} from "./score";
import { AnalysisUnavailable } from "../pipeline/errors";
import { ProgressChannel, type ProgressEvent } from "../pipeline/progress";
import type { RawPost } from "../types/sentiment";
import type { TextAnalyzer } from "../types/collaborators";

function makePost(text: string, engagement = 0): RawPost {
  return {
    text,
    author: "trader",
    timestamp: new Date("2026-03-10T10:00:00Z"),
    likes: engagement,
    retweets: 0,
    replies: 0,
  };
}

/** Answers by looking for a post text inside the prompt. */
function analyzerFrom(answers: Record<string, string | Error>): TextAnalyzer {
  return {
    analyze: vi.fn(async (prompt: string) => {
      for (const [needle, answer] of Object.entries(answers)) {
        if (prompt.includes(needle)) {
          if (answer instanceof Error) throw answer;
          return answer;
        }
      }
      throw new AnalysisUnavailable("no scripted answer");
    }),
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseMarkedScore", () => {
  it("reads the number from a final 'Sentiment Score:' line", () => {
    const analysis = "1. Indicators: mixed\n2. Impact: small\nSentiment Score: 0.42";
    expect(parseMarkedScore(analysis)).toBe(0.42);
  });

  it("uses the last marker line when several exist", () => {
    const analysis = "Initial score: 0.1\nRevised score: -0.35";
    expect(parseMarkedScore(analysis)).toBe(-0.35);
  });

  it("accepts 'score is:' and 'rating:' markers, case-insensitively", () => {
    expect(parseMarkedScore("The SCORE IS: 0.5 overall")).toBe(0.5);
    expect(parseMarkedScore("RATING: -1")).toBe(-1);
  });

  it("takes the first token after the last colon of the line", () => {
    expect(parseMarkedScore("Sentiment: Score: -0.6 (leaning negative)")).toBe(-0.6);
  });

  it("does not clamp out-of-range figures", () => {
    expect(parseMarkedScore("Score: 7")).toBe(7);
  });

  it("accepts exponent notation", () => {
    expect(parseMarkedScore("Score: 5e-1")).toBe(0.5);
  });

  it("returns null when the last marker line is not numeric", () => {
    expect(parseMarkedScore("Score: 0.8\nFinal rating: strong")).toBeNull();
  });

  it("returns null for markdown-wrapped labels", () => {
    expect(parseMarkedScore("**Sentiment Score:** 0.42")).toBeNull();
  });

  it("returns null for non-finite numbers", () => {
    expect(parseMarkedScore("Score: 1e999")).toBeNull();
  });

  it("returns null without any marker", () => {
    expect(parseMarkedScore("Overall the mood is upbeat.")).toBeNull();
  });

  it("tolerates CRLF line endings", () => {
    expect(parseMarkedScore("Reasoning\r\nScore: 0.3\r\n")).toBe(0.3);
  });
});

describe("keywordScore", () => {
  it("balances positive against negative keyword hits", () => {
    const analysis = "The chart looks bullish. Traders are bullish overall, though one account is bearish.";
    expect(keywordScore(analysis)).toBeCloseTo(1 / 3, 10);
  });

  it("is exactly 0 without keyword hits", () => {
    expect(keywordScore("Nothing notable here.")).toBe(0);
  });

  it("is -1 when only negative keywords appear", () => {
    expect(keywordScore("Bearish and PESSIMISTIC")).toBe(-1);
  });

  it("counts substring occurrences", () => {
    // "gains" contains "gain", "losses" contains "loss"
    expect(keywordScore("gains gains losses")).toBeCloseTo(1 / 3, 10);
  });
});

describe("extractScore", () => {
  it("prefers the marked score", () => {
    expect(extractScore("bearish bearish\nScore: 0.9")).toEqual({ score: 0.9, method: "parsed" });
  });

  it("falls back to keywords when parsing fails", () => {
    expect(extractScore("Very bullish tone.\nScore: n/a")).toEqual({ score: 1, method: "keywords" });
  });
});

describe("scoreText", () => {
  it("returns an ok result with the analysis text", async () => {
    const analyzer = analyzerFrom({ "to the moon": "Looks upbeat.\nSentiment Score: 0.75" });
    const result = await scoreText(analyzer, "$BTC to the moon");
    expect(result).toEqual({
      status: "ok",
      analysisText: "Looks upbeat.\nSentiment Score: 0.75",
      sentimentScore: 0.75,
      scoreMethod: "parsed",
    });
  });

  it("returns a skip when the analyzer reports AnalysisUnavailable", async () => {
    const failure = new AnalysisUnavailable("Analysis API returned 500", 500);
    const analyzer = analyzerFrom({ "post": failure });
    const result = await scoreText(analyzer, "some post");
    expect(result.status).toBe("skip");
    if (result.status === "skip") {
      expect(result.error).toBe(failure);
      expect(result.reason).toBe("Analysis API returned 500");
    }
  });

  it("wraps unexpected errors as AnalysisUnavailable", async () => {
    const analyzer = analyzerFrom({ "post": new TypeError("fetch failed") });
    const result = await scoreText(analyzer, "some post");
    expect(result.status).toBe("skip");
    if (result.status === "skip") {
      expect(result.error).toBeInstanceOf(AnalysisUnavailable);
      expect(result.reason).toBe("fetch failed");
    }
  });
});

describe("scoreMany", () => {
  it("keeps input order and computes engagement", async () => {
    const analyzer: TextAnalyzer = {
      analyze: vi.fn(async (prompt: string) => {
        // later posts answer faster
        const delay = prompt.includes("first") ? 20 : prompt.includes("second") ? 10 : 0;
        await new Promise((r) => setTimeout(r, delay));
        return prompt.includes("first") ? "Score: 0.1" : prompt.includes("second") ? "Score: 0.2" : "Score: 0.3";
      }),
    };
    const posts = [makePost("first", 30), makePost("second", 20), makePost("third", 10)];

    const scored = await scoreMany(analyzer, posts, { concurrency: 3 });

    expect(scored.map((s) => s.post.text)).toEqual(["first", "second", "third"]);
    expect(scored.map((s) => s.sentimentScore)).toEqual([0.1, 0.2, 0.3]);
    expect(scored.map((s) => s.engagement)).toEqual([30, 20, 10]);
    expect(scored.every((s) => s.source === "primary")).toBe(true);
  });

  it("drops failed posts without affecting the others", async () => {
    const analyzer = analyzerFrom({
      "alpha": "Score: 0.5",
      "beta": new AnalysisUnavailable("Analysis API returned 429", 429),
      "gamma": "Score: -0.5",
    });
    const posts = [makePost("alpha"), makePost("beta"), makePost("gamma")];

    const scored = await scoreMany(analyzer, posts, { concurrency: 2 });
    expect(scored.map((s) => s.post.text)).toEqual(["alpha", "gamma"]);
  });

  it("returns [] when every post fails", async () => {
    const analyzer = analyzerFrom({ "x": new AnalysisUnavailable("down") });
    const scored = await scoreMany(analyzer, [makePost("x1"), makePost("x2")]);
    expect(scored).toEqual([]);
  });

  it("calls the analyzer once per post", async () => {
    const analyzer = analyzerFrom({ "p": "Score: 0" });
    await scoreMany(analyzer, [makePost("p1"), makePost("p2"), makePost("p3")], { concurrency: 2 });
    expect(analyzer.analyze).toHaveBeenCalledTimes(3);
  });

  it("publishes a progress event per post", async () => {
    const analyzer = analyzerFrom({
      "one": "Score: 0.4",
      "two": new AnalysisUnavailable("Analysis API returned 502", 502),
    });
    const progress = new ProgressChannel();
    const events: ProgressEvent[] = [];
    progress.subscribe((e) => events.push(e));

    await scoreMany(analyzer, [makePost("one"), makePost("two")], { progress });

    expect(events).toEqual([
      { type: "score:start", total: 2 },
      { type: "score:post", index: 1, total: 2, status: "ok", score: 0.4 },
      { type: "score:post", index: 2, total: 2, status: "skip", reason: "Analysis API returned 502" },
      { type: "score:done", scored: 1, skipped: 1 },
    ]);
  });

  it("handles an empty batch without calling the analyzer", async () => {
    const analyzer = analyzerFrom({});
    expect(await scoreMany(analyzer, [])).toEqual([]);
    expect(analyzer.analyze).not.toHaveBeenCalled();
  });
});

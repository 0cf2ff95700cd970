import { Hono } from "hono";
import type { Context } from "hono";
import { cors } from "hono/cors";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import type { SentimentPipeline } from "../pipeline/analyzer";
import { ProgressChannel } from "../pipeline/progress";
import { ValidationError, errorMessage } from "../pipeline/errors";
import { generateMarketSummary } from "../analysis/summary";
import { getMarketCorrelation } from "../analysis/correlation";
import { toResultJson, toScoredPostJson } from "../types/sentiment";
import type { AggregateResult } from "../types/sentiment";
import type { WatchlistMonitor } from "./watchlist";
import { errorBody, statusFor } from "./http-errors";

export interface AppOptions {
  defaults: { hoursBack: number; maxItems: number };
  watchlist?: WatchlistMonitor;
  /** Shown on GET /. */
  version?: string;
}

// ── Request schemas ──

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const SentimentQuerySchema = z.object({
  hours: z.coerce.number().int().min(1, "hours must be at least 1").optional(),
  max: z.coerce.number().int().min(10, "max must be between 10 and 100").max(100, "max must be between 10 and 100").optional(),
  summary: flag.optional(),
});

const ScoreBodySchema = z.object({
  text: z.string().trim().min(1, "text must not be empty"),
});

const BatchBodySchema = z.object({
  texts: z.array(z.string()).min(1, "texts must not be empty").max(100, "at most 100 texts per batch"),
});

const CorrelationBodySchema = z.object({
  sentimentScores: z.array(z.number().finite()),
  priceChanges: z.array(z.number().finite()),
});

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError(`Invalid ${what}: ${detail}`, parsed.error.issues);
  }
  return parsed.data;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
}

/**
 * HTTP surface over a SentimentPipeline. Routes only translate between
 * HTTP and pipeline calls; every failure goes through onError.
 */
export function createApp(pipeline: SentimentPipeline, options: AppOptions) {
  const app = new Hono();

  app.use("*", cors());

  app.onError((err, c) => {
    const status = statusFor(err);
    if (status === 500) {
      console.error(`[api] ${c.req.method} ${c.req.path} failed:`, err);
    } else {
      console.log(`[api] ${c.req.method} ${c.req.path} → ${status}: ${err.message}`);
    }
    return c.json(errorBody(err), status);
  });

  app.notFound((c) => c.json({ error: "not_found", message: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.get("/", (c) => {
    return c.json({
      service: "cashtag-pulse",
      version: options.version ?? "0.1.0",
      description: "Engagement-weighted social sentiment for market tickers",
      defaults: options.defaults,
      endpoints: [
        { path: "/v1/sentiment/{ticker}", method: "GET", query: ["hours", "max", "summary"] },
        { path: "/v1/sentiment/{ticker}/stream", method: "GET", description: "Server-Sent Events" },
        { path: "/v1/score", method: "POST", body: "{ text }" },
        { path: "/v1/score/batch", method: "POST", body: "{ texts }" },
        { path: "/v1/correlation", method: "POST", body: "{ sentimentScores, priceChanges }" },
        { path: "/v1/watchlist", method: "GET" },
      ],
    });
  });

  function windowFrom(c: Context) {
    const query = parseInput(SentimentQuerySchema, c.req.query(), "query");
    return {
      hoursBack: query.hours ?? options.defaults.hoursBack,
      maxItems: query.max ?? options.defaults.maxItems,
      summary: query.summary ?? false,
    };
  }

  async function withSummary(result: AggregateResult, wanted: boolean) {
    const json = toResultJson(result);
    if (!wanted) return json;
    return { ...json, summary: await generateMarketSummary(pipeline.analyzer, result) };
  }

  app.get("/v1/sentiment/:ticker", async (c) => {
    const ticker = c.req.param("ticker");
    const { hoursBack, maxItems, summary } = windowFrom(c);
    console.log(`[api] Sentiment for ${ticker} (${hoursBack}h, max ${maxItems})`);

    const result = await pipeline.runAnalysis(ticker, hoursBack, maxItems);
    return c.json(await withSummary(result, summary));
  });

  app.get("/v1/sentiment/:ticker/stream", (c) => {
    const ticker = c.req.param("ticker");
    const { hoursBack, maxItems, summary } = windowFrom(c);
    console.log(`[api] Streaming sentiment for ${ticker} (${hoursBack}h, max ${maxItems})`);

    return streamSSE(c, async (stream) => {
      const progress = new ProgressChannel();
      const events = progress.stream();
      const outcome = pipeline
        .runAnalysis(ticker, hoursBack, maxItems, progress)
        .then(
          (result): { ok: true; result: AggregateResult } => ({ ok: true, result }),
          (error: unknown): { ok: false; error: unknown } => ({ ok: false, error })
        )
        .finally(() => progress.close());

      let id = 0;
      for await (const event of events) {
        await stream.writeSSE({ event: "progress", data: JSON.stringify(event), id: String(id++) });
      }

      const settled = await outcome;
      if (settled.ok) {
        const body = await withSummary(settled.result, summary);
        await stream.writeSSE({ event: "result", data: JSON.stringify(body), id: String(id++) });
      } else {
        console.log(`[api] Stream for ${ticker} ended with error: ${errorMessage(settled.error)}`);
        await stream.writeSSE({ event: "error", data: JSON.stringify(errorBody(settled.error)), id: String(id++) });
      }
    });
  });

  app.post("/v1/score", async (c) => {
    const { text } = parseInput(ScoreBodySchema, await readJson(c), "request body");
    const scored = await pipeline.scoreSingleText(text);
    return c.json(toScoredPostJson(scored));
  });

  app.post("/v1/score/batch", async (c) => {
    const { texts } = parseInput(BatchBodySchema, await readJson(c), "request body");
    const result = await pipeline.scoreMultipleTexts(texts);
    return c.json(toResultJson(result));
  });

  app.post("/v1/correlation", async (c) => {
    const { sentimentScores, priceChanges } = parseInput(
      CorrelationBodySchema,
      await readJson(c),
      "request body"
    );
    const correlation = getMarketCorrelation(sentimentScores, priceChanges);
    return c.json({ ...correlation, timestamp: correlation.timestamp.toISOString() });
  });

  app.get("/v1/watchlist", (c) => {
    const monitor = options.watchlist;
    return c.json({
      tickers: monitor ? [...monitor.tickers] : [],
      refreshing: monitor?.isRefreshing ?? false,
      entries: monitor?.snapshot() ?? [],
    });
  });

  return app;
}

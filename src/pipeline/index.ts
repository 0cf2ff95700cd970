import type { AppConfig } from "../config";
import { RateLimitedQueue } from "../queue/rate-limited-queue";
import type { RateLimitedQueueOptions } from "../queue/rate-limited-queue";
import { createXSearchSource } from "../scrapers/twitter-api";
import { createChatAnalyzer } from "../analysis/llm-client";
import { SentimentPipeline } from "./analyzer";

export { SentimentPipeline, MULTI_SOURCE_TICKER } from "./analyzer";
export type { PipelineDeps } from "./analyzer";
export { ProgressChannel } from "./progress";
export type { ProgressEvent, ProgressListener } from "./progress";
export * from "./errors";

/** Production wiring: X search behind a rate-limited queue, chat-completions analyzer. */
export function createPipeline(
  config: AppConfig,
  queueOptions: Pick<RateLimitedQueueOptions, "sleep" | "random"> = {}
): SentimentPipeline {
  const queue = new RateLimitedQueue({ ...config.queue, ...queueOptions, name: "x-api" });
  return new SentimentPipeline({
    queue,
    source: createXSearchSource({ bearerToken: config.x.bearerToken, apiUrl: config.x.apiUrl }),
    analyzer: createChatAnalyzer(config.analysis),
    concurrency: config.analysis.concurrency,
  });
}

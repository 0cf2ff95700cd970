// Re-export modules for library usage
export * from "./types";
export * from "./scrapers";
export * from "./pipeline";
export { RateLimitedQueue } from "./queue/rate-limited-queue";
export type { FetchTask, RateLimitedQueueOptions } from "./queue/rate-limited-queue";
export { collect, buildSearchQuery, topK, filterRecent, rankByEngagement } from "./collector/collect";
export { scoreText, scoreMany, extractScore, parseMarkedScore, keywordScore } from "./analysis/score";
export type { ScoreResult } from "./analysis/score";
export { aggregate, extractThemes, computeStats, computeWeights } from "./analysis/aggregate";
export { getMarketCorrelation, pearson, interpretCorrelation } from "./analysis/correlation";
export type { MarketCorrelation } from "./analysis/correlation";
export { generateMarketSummary } from "./analysis/summary";
export { createChatAnalyzer, isAnalysisAvailable } from "./analysis/llm-client";
export { loadConfig, loadEnvFile } from "./config";
export type { AppConfig } from "./config";
export { createApp } from "./api/app";
export { WatchlistMonitor } from "./api/watchlist";
export type { WatchlistEntry } from "./api/watchlist";

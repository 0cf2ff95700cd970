import { serve } from "@hono/node-server";
import { loadConfig, loadEnvFile } from "../config";
import { createPipeline } from "../pipeline";
import { isAnalysisAvailable } from "../analysis/llm-client";
import { createApp } from "./app";
import { WatchlistMonitor } from "./watchlist";

/**
 * Cashtag Pulse API server
 *
 * Sentiment over HTTP, plus an optional watchlist refreshed on a cron.
 */

loadEnvFile();
const config = loadConfig();
const pipeline = createPipeline(config);

const watchlist =
  config.server.watchlist.length > 0
    ? new WatchlistMonitor(pipeline, {
        tickers: config.server.watchlist,
        window: config.defaults,
      })
    : undefined;

const app = createApp(pipeline, { defaults: config.defaults, watchlist });

if (watchlist && config.server.cronEnabled) {
  watchlist.schedule(config.server.cronSchedule);
} else if (watchlist) {
  console.log(`[cron] DISABLE_CRON=true, watchlist refresh is manual only`);
}

if (!isAnalysisAvailable(config.analysis)) {
  console.warn(`[api] ANALYSIS_API_KEY not set: every analysis call will fail`);
}
if (!config.x.bearerToken) {
  console.warn(`[api] X_BEARER_TOKEN not set: ticker searches will fail`);
}

const port = config.server.port;
console.log(`
Cashtag Pulse API Server

   URL:        http://localhost:${port}
   Model:      ${config.analysis.model}
   Watchlist:  ${config.server.watchlist.join(", ") || "(none)"}
   Cron:       ${watchlist && config.server.cronEnabled ? config.server.cronSchedule + " UTC" : "DISABLED"}

Endpoints:
   GET  /                              Health check
   GET  /v1/sentiment/:ticker          Aggregate sentiment (?hours=&max=&summary=)
   GET  /v1/sentiment/:ticker/stream   Same, as Server-Sent Events
   POST /v1/score                      Score one text
   POST /v1/score/batch                Score and aggregate several texts
   POST /v1/correlation                Sentiment vs. price correlation
   GET  /v1/watchlist                  Latest watchlist results
`);

serve({
  fetch: app.fetch,
  port,
});

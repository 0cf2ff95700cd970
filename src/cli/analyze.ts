#!/usr/bin/env tsx
/**
 * Ticker sentiment from the command line.
 *
 * Usage:
 *   npm run analyze -- '$BTC'
 *   npm run analyze -- '$ETH' --hours 12 --max 30 --summary
 *   npm run analyze -- --text "Breaking out above resistance" --text "Looks weak"
 *   npm run analyze -- '$SOL' --json
 *
 * Reads .env from the working directory.
 */

import { loadConfig, loadEnvFile } from "../config";
import { createPipeline } from "../pipeline";
import { unrefSleep } from "../queue/rate-limited-queue";
import { ProgressChannel } from "../pipeline/progress";
import type { ProgressEvent } from "../pipeline/progress";
import { isPipelineError } from "../pipeline/errors";
import { generateMarketSummary } from "../analysis/summary";
import { toResultJson, toScoredPostJson } from "../types/sentiment";
import type { AggregateResult, ScoredPost } from "../types/sentiment";
import { UsageError, parseAnalyzeArgs } from "./args";

const USAGE = `Usage:
  analyze <ticker> [--hours N] [--max N] [--summary] [--json]
  analyze --text "..." [--text "..."] [--json]`;

function describeProgress(event: ProgressEvent): string {
  switch (event.type) {
    case "collect:start":
      return `Searching "${event.query}" (past ${event.hoursBack}h, max ${event.maxItems})`;
    case "collect:done":
      return `${event.fetched} fetched, ${event.recent} recent, ${event.selected} selected`;
    case "score:start":
      return `Scoring ${event.total} post(s)`;
    case "score:post":
      return event.status === "ok"
        ? `  [${event.index}/${event.total}] ${event.score.toFixed(2)}`
        : `  [${event.index}/${event.total}] skipped: ${event.reason}`;
    case "score:done":
      return `${event.scored} scored, ${event.skipped} skipped`;
    case "aggregate:done":
      return `Weighted sentiment ${event.weightedSentiment.toFixed(2)} over ${event.count} post(s)`;
  }
}

function printScored(scored: ScoredPost) {
  console.log(`\nScore: ${scored.sentimentScore.toFixed(2)} (${scored.scoreMethod})`);
  console.log(`\n${scored.analysisText}`);
}

function printResult(result: AggregateResult) {
  const { stats } = result;
  console.log(`\n═══ ${result.ticker} ═══`);
  console.log(`Weighted sentiment: ${result.weightedSentiment.toFixed(3)}`);
  console.log(`Posts:              ${stats.count} (avg engagement ${stats.avgEngagement.toFixed(1)})`);
  console.log(`Mean ± std:         ${stats.mean.toFixed(3)} ± ${stats.std.toFixed(3)}`);
  console.log(`Range:              ${stats.min.toFixed(2)} to ${stats.max.toFixed(2)}`);
  console.log(`Themes:             ${result.themes.join(", ")}`);

  console.log(`\nTop posts:`);
  for (const scored of result.scoredPosts.slice(0, 5)) {
    const text = scored.post.text.replace(/\s+/g, " ").slice(0, 90);
    console.log(`  ${scored.sentimentScore.toFixed(2).padStart(5)}  @${scored.post.author} (${scored.engagement})  ${text}`);
  }
}

async function main() {
  const command = parseAnalyzeArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.log(USAGE);
    return;
  }

  loadEnvFile();
  const config = loadConfig();
  const pipeline = createPipeline(config, { sleep: unrefSleep });

  const progress = new ProgressChannel();
  if (!command.json) {
    progress.subscribe((event) => console.log(`· ${describeProgress(event)}`));
  }

  try {
    if (command.kind === "text") {
      if (command.texts.length === 1) {
        const scored = await pipeline.scoreSingleText(command.texts[0], progress);
        if (command.json) console.log(JSON.stringify(toScoredPostJson(scored), null, 2));
        else printScored(scored);
        return;
      }
      const result = await pipeline.scoreMultipleTexts(command.texts, progress);
      if (command.json) console.log(JSON.stringify(toResultJson(result), null, 2));
      else printResult(result);
      return;
    }

    const result = await pipeline.runAnalysis(
      command.ticker,
      command.hoursBack ?? config.defaults.hoursBack,
      command.maxItems ?? config.defaults.maxItems,
      progress
    );
    const summary = command.summary ? await generateMarketSummary(pipeline.analyzer, result) : undefined;

    if (command.json) {
      const body = summary === undefined ? toResultJson(result) : { ...toResultJson(result), summary };
      console.log(JSON.stringify(body, null, 2));
      return;
    }
    printResult(result);
    if (summary) console.log(`\n═══ Market summary ═══\n\n${summary}`);
    else if (summary === null) console.log(`\n(summary unavailable)`);
  } finally {
    progress.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(`${error.message}\n\n${USAGE}`);
  } else if (isPipelineError(error)) {
    console.error(`\n${error.code}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});

/**
 * Preflight check logic, exportable for testing.
 *
 * Each check function returns a structured result instead of logging directly.
 * The CLI entry point (preflight.ts) handles formatting and exit codes.
 */

import { z } from "zod";
import type { AppConfig } from "../config";
import { errorMessage } from "../pipeline/errors";
import { buildSearchUrl } from "../scrapers/twitter-api";

export type CheckStatus = "pass" | "fail" | "skip";

export interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
}

const ModelsSchema = z.object({
  data: z.array(z.object({ id: z.string() })).default([]),
});

async function failureText(res: Response): Promise<string> {
  const errText = await res.text().catch(() => "");
  return `${res.status} ${errText.slice(0, 80)}`.trim();
}

export async function checkAnalysis(config: AppConfig["analysis"]): Promise<CheckResult> {
  const name = "ANALYSIS_API_KEY";
  if (!config.apiKey) return { name, status: "fail", message: "required for sentiment scoring" };

  try {
    const res = await fetch(`${config.apiUrl}/models`, {
      headers: { Authorization: `Bearer ${config.apiKey}` },
      signal: AbortSignal.timeout(8000),
    });
    if (!res.ok) return { name, status: "fail", message: await failureText(res) };

    const parsed = ModelsSchema.safeParse(await res.json().catch(() => null));
    const models = parsed.success ? parsed.data.data.map((m) => m.id) : [];
    if (models.includes(config.model)) {
      return { name, status: "pass", message: `${config.model} available` };
    }
    return {
      name,
      status: "pass",
      message: `key valid (model ${config.model} not listed; ${models.length} models found)`,
    };
  } catch (e) {
    return { name, status: "fail", message: errorMessage(e) };
  }
}

export async function checkXBearer(config: AppConfig["x"]): Promise<CheckResult> {
  const name = "X_BEARER_TOKEN";
  if (!config.bearerToken) return { name, status: "fail", message: "required for ticker search" };

  try {
    const res = await fetch(buildSearchUrl(config.apiUrl, "$BTC -is:retweet", 10), {
      headers: { Authorization: `Bearer ${config.bearerToken}` },
      signal: AbortSignal.timeout(5000),
    });
    if (res.ok) {
      return { name, status: "pass", message: "search API OK" };
    }
    if (res.status === 429) {
      return { name, status: "pass", message: "valid (rate limited, try later)" };
    }
    return { name, status: "fail", message: await failureText(res) };
  } catch (e) {
    return { name, status: "fail", message: errorMessage(e) };
  }
}

export function checkWatchlist(config: AppConfig["server"]): CheckResult {
  const name = "WATCHLIST";
  if (config.watchlist.length === 0) return { name, status: "skip", message: "not set" };
  const cron = config.cronEnabled ? config.cronSchedule : "cron disabled";
  return { name, status: "pass", message: `${config.watchlist.join(", ")} (${cron})` };
}

/** What the checks run against, as label/value pairs for the report header. */
export function describeTargets(config: AppConfig): [string, string][] {
  const { analysis, x, server, defaults } = config;
  return [
    ["Analysis", `${analysis.model} @ ${analysis.apiUrl} (concurrency ${analysis.concurrency})`],
    ["Search", x.apiUrl],
    ["Window", `${defaults.hoursBack}h, max ${defaults.maxItems} posts`],
    ["Watchlist", server.watchlist.length > 0 ? server.watchlist.join(", ") : "(none)"],
    ["Cron", server.cronEnabled ? `${server.cronSchedule} UTC` : "disabled"],
  ];
}

/**
 * Run all preflight checks. Returns structured results.
 */
export async function runPreflight(config: AppConfig): Promise<CheckResult[]> {
  const [analysis, x] = await Promise.all([checkAnalysis(config.analysis), checkXBearer(config.x)]);
  return [analysis, x, checkWatchlist(config.server)];
}

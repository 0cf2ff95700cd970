import type { AggregateResult } from "../types/sentiment";
import type { TextAnalyzer } from "../types/collaborators";
import { errorMessage } from "../pipeline/errors";
import { buildSummaryPrompt } from "./prompts";

/**
 * Narrative market report for a finished aggregate. Optional extra: a
 * failure here is logged and yields null, the aggregate stands on its own.
 */
export async function generateMarketSummary(
  analyzer: TextAnalyzer,
  result: AggregateResult
): Promise<string | null> {
  console.log(`[summary] Generating report for ${result.ticker}...`);
  try {
    return await analyzer.analyze(buildSummaryPrompt(result));
  } catch (error) {
    console.log(`[summary] Failed to generate report for ${result.ticker}: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Text-analysis collaborator over an OpenAI-compatible chat completions API
 * (OpenRouter by default).
 *
 * Every failure mode collapses into AnalysisUnavailable: network errors,
 * timeouts, non-2xx responses, and responses without message content.
 */

import { z } from "zod";
import type { TextAnalyzer } from "../types/collaborators";
import type { AppConfig } from "../config";
import { AnalysisUnavailable, errorMessage } from "../pipeline/errors";

export type AnalysisConfig = AppConfig["analysis"];

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      })
    )
    .optional(),
});

/** Pull the first choice's content out of a completion payload. */
export function extractCompletionText(payload: unknown): string | null {
  const parsed = CompletionSchema.safeParse(payload);
  if (!parsed.success) return null;
  const text = parsed.data.choices?.[0]?.message?.content?.trim();
  return text ? text : null;
}

export function createChatAnalyzer(config: AnalysisConfig): TextAnalyzer {
  return {
    async analyze(prompt: string): Promise<string> {
      const { apiKey, apiUrl, model, referer, title, timeoutMs } = config;
      if (!apiKey) {
        throw new AnalysisUnavailable("ANALYSIS_API_KEY not set");
      }

      let response: Response;
      try {
        response = await fetch(`${apiUrl}/chat/completions`, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Authorization: `Bearer ${apiKey}`,
            "HTTP-Referer": referer,
            "X-Title": title,
          },
          body: JSON.stringify({
            model,
            messages: [{ role: "user", content: prompt }],
          }),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        throw new AnalysisUnavailable(`Analysis request failed: ${errorMessage(error)}`, undefined, {
          cause: error,
        });
      }

      if (!response.ok) {
        const errText = await response.text().catch(() => "");
        console.log(`[analysis] API error ${response.status}: ${errText.slice(0, 200)}`);
        throw new AnalysisUnavailable(
          `Analysis API returned ${response.status}`,
          response.status
        );
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new AnalysisUnavailable("Analysis API returned invalid JSON", response.status, {
          cause: error,
        });
      }

      const text = extractCompletionText(payload);
      if (!text) {
        throw new AnalysisUnavailable("Analysis API returned no content", response.status);
      }
      return text;
    },
  };
}

export function isAnalysisAvailable(config: AnalysisConfig): boolean {
  return !!config.apiKey;
}

import type { RawPost } from "./sentiment";

/**
 * Narrow seams to the two external services. The pipeline only ever
 * talks to these interfaces; the HTTP-backed implementations live in
 * scrapers/ and analysis/.
 */

export interface PostSource {
  /** May return fewer than maxResults posts. */
  search(query: string, maxResults: number): Promise<RawPost[]>;
}

export interface TextAnalyzer {
  /** Free-text completion for a prompt. Throws AnalysisUnavailable on failure. */
  analyze(prompt: string): Promise<string>;
}

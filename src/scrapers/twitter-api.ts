/**
 * X/Twitter API: recent search as the post source.
 *
 * One call per search: GET /2/tweets/search/recent with a bearer token.
 * Tweets come back with public_metrics and an author expansion, which map
 * directly onto RawPost. The English-language filter is added here so the
 * collector's query stays a bare symbol.
 *
 * Callers are expected to run search() through the RateLimitedQueue; this
 * module does no pacing of its own.
 */

import { z } from "zod";
import type { RawPost } from "../types/sentiment";
import type { PostSource } from "../types/collaborators";

const DEFAULT_BASE = "https://api.x.com/2";

// The recent search endpoint only accepts 10..100
const MIN_RESULTS = 10;
const MAX_RESULTS = 100;

const FIELDS =
  "tweet.fields=created_at,public_metrics,author_id,lang&expansions=author_id&user.fields=username,name";

// ── Types ──

const MetricsSchema = z
  .object({
    like_count: z.number(),
    retweet_count: z.number(),
    reply_count: z.number(),
    quote_count: z.number(),
  })
  .partial();

const TweetSchema = z.object({
  id: z.string(),
  text: z.string(),
  author_id: z.string().optional(),
  created_at: z.string().optional(),
  public_metrics: MetricsSchema.optional(),
});

const UserSchema = z.object({
  id: z.string(),
  username: z.string().optional(),
  name: z.string().optional(),
});

const ResponseSchema = z.object({
  data: z.unknown().optional(),
  includes: z.object({ users: z.unknown().optional() }).optional(),
  meta: z.object({ result_count: z.number().optional() }).optional(),
});

export type RawResponse = z.infer<typeof ResponseSchema>;

export interface XSearchOptions {
  bearerToken?: string;
  apiUrl?: string;
  /** Appended to every query. Default "lang:en". */
  languageFilter?: string;
}

// ── Parsing ──

function count(n: number | undefined): number {
  return typeof n === "number" && Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

/**
 * Map a search response onto RawPost, keeping server order.
 * Tweets without a parseable created_at are dropped: they could never
 * pass a recency window.
 */
export function parseTweets(raw: RawResponse): RawPost[] {
  if (!raw.data || !Array.isArray(raw.data)) return [];

  const users = new Map<string, z.infer<typeof UserSchema>>();
  const rawUsers = raw.includes?.users;
  if (Array.isArray(rawUsers)) {
    for (const u of rawUsers) {
      const parsed = UserSchema.safeParse(u);
      if (parsed.success) users.set(parsed.data.id, parsed.data);
    }
  }

  const posts: RawPost[] = [];
  for (const item of raw.data) {
    const parsed = TweetSchema.safeParse(item);
    if (!parsed.success) continue;

    const t = parsed.data;
    const timestamp = t.created_at ? new Date(t.created_at) : null;
    if (!timestamp || Number.isNaN(timestamp.getTime())) continue;

    const u = t.author_id ? users.get(t.author_id) : undefined;
    const m = t.public_metrics ?? {};
    posts.push({
      text: t.text,
      author: u?.username || "?",
      timestamp,
      likes: count(m.like_count),
      retweets: count(m.retweet_count),
      replies: count(m.reply_count),
    });
  }
  return posts;
}

export function buildSearchUrl(
  base: string,
  query: string,
  maxResults: number,
  languageFilter = "lang:en"
): string {
  const n = Math.min(MAX_RESULTS, Math.max(MIN_RESULTS, Math.floor(maxResults)));
  const full = languageFilter ? `${query} ${languageFilter}` : query;
  return `${base}/tweets/search/recent?query=${encodeURIComponent(full)}&max_results=${n}&${FIELDS}`;
}

// ── API ──

async function apiGet(url: string, token: string): Promise<RawResponse> {
  const res = await fetch(url, {
    headers: { Authorization: `Bearer ${token}` },
  });

  if (res.status === 429) {
    const reset = res.headers.get("x-rate-limit-reset");
    const waitSec = reset
      ? Math.max(parseInt(reset, 10) - Math.floor(Date.now() / 1000), 1)
      : 60;
    throw new Error(`X API rate limited (resets in ${waitSec}s)`);
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new Error(`X API ${res.status}: ${body.slice(0, 200)}`);
  }

  const body: unknown = await res.json();
  const parsed = ResponseSchema.safeParse(body);
  if (!parsed.success) throw new Error("X API returned an unexpected payload");
  return parsed.data;
}

/**
 * Scrape collaborator backed by the X API recent search endpoint.
 */
export function createXSearchSource(options: XSearchOptions = {}): PostSource {
  const base = (options.apiUrl ?? DEFAULT_BASE).replace(/\/+$/, "");
  const languageFilter = options.languageFilter ?? "lang:en";

  return {
    async search(query: string, maxResults: number): Promise<RawPost[]> {
      const token = options.bearerToken;
      if (!token) throw new Error("X_BEARER_TOKEN not set");

      const url = buildSearchUrl(base, query, maxResults, languageFilter);
      console.log(`[x-api] Searching: ${query} (max ${maxResults})`);

      const raw = await apiGet(url, token);
      const posts = parseTweets(raw);
      console.log(`[x-api] ${posts.length} posts returned`);
      return posts;
    },
  };
}

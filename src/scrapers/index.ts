// X API recent search, the post source behind the collector
export { createXSearchSource, parseTweets, buildSearchUrl } from "./twitter-api";
export type { XSearchOptions, RawResponse } from "./twitter-api";

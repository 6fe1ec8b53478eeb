export type { SourceAdapter, FetchLike } from "./types";
export { HackerNewsAdapter } from "./hackernews";
export { FeedAdapter, createRssAdapter, createRedditAdapter } from "./rss";

import type { SourceAdapter } from "./types";
import { HackerNewsAdapter } from "./hackernews";
import { createRedditAdapter, createRssAdapter } from "./rss";

export function createDefaultAdapters(): SourceAdapter[] {
  return [new HackerNewsAdapter(), createRedditAdapter(), createRssAdapter()];
}

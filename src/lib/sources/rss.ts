/**
 * RSS / Atom adapter
 * Fetches each feed over HTTP and parses it with rss-parser. Reddit is the
 * same adapter pointed at subreddit feeds with a browser User-Agent.
 */

import Parser from "rss-parser";
import type { IngestedItem } from "../model";
import { logger } from "../logger";
import { PREFERENCE_KEYS } from "../../config/preferences";
import {
  DEFAULT_RSS_FEEDS,
  DEFAULT_SUBREDDIT_FEEDS,
  REDDIT_USER_AGENT,
  RSS_LOOKBACK_HOURS,
} from "../../config/feeds";
import { createIngestedItem } from "../pipeline/normalize";
import type { FetchLike, SourceAdapter } from "./types";

type FeedFields = { title?: string };
type ItemFields = { author?: string; description?: string; "content:encoded"?: string };
type FeedEntry = Parser.Item & ItemFields;

export interface FeedAdapterOptions {
  name: string;
  preferenceKey: string;
  feeds: readonly string[];
  headers?: Record<string, string>;
  /** Lower bound on the lookback window; feeds publish less often than aggregators */
  minLookbackHours?: number;
  timeoutMs?: number;
  fetchFn?: FetchLike;
}

export class FeedAdapter implements SourceAdapter {
  readonly name: string;
  readonly preferenceKey: string;
  private readonly parser = new Parser<FeedFields, ItemFields>({
    customFields: { item: ["author", "description", "content:encoded"] },
  });
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: FeedAdapterOptions) {
    this.name = options.name;
    this.preferenceKey = options.preferenceKey;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  async fetchItems(lookbackHours: number): Promise<IngestedItem[]> {
    const hours = Math.max(lookbackHours, this.options.minLookbackHours ?? 0);
    const cutoff = Date.now() - hours * 3600 * 1000;
    logger.info(`Fetching ${this.name} feeds: ${this.options.feeds.length} sources (lookback=${hours}h)`);

    const items: IngestedItem[] = [];
    let failures = 0;
    for (const feedUrl of this.options.feeds) {
      try {
        items.push(...(await this.fetchFeed(feedUrl, cutoff)));
      } catch (error) {
        failures++;
        const errorMsg = error instanceof Error ? error.message : String(error);
        logger.warn(`Failed to fetch ${this.name} feed ${feedUrl}`, { error: errorMsg });
      }
    }

    if (failures > 0 && failures === this.options.feeds.length) {
      throw new Error(`All ${this.name} feeds failed`);
    }

    logger.info(`Found ${items.length} ${this.name} items`);
    return items;
  }

  private async fetchFeed(feedUrl: string, cutoff: number): Promise<IngestedItem[]> {
    const response = await this.fetchFn(feedUrl, {
      headers: this.options.headers,
      redirect: "follow",
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000),
    });
    if (!response.ok) {
      throw new Error(`status ${response.status}`);
    }

    const feed = await this.parser.parseString(await response.text());
    const items: IngestedItem[] = [];

    for (const entry of feed.items) {
      if (!entry.link) continue;

      const createdAt = entryDate(entry);
      if (createdAt.getTime() < cutoff) continue;

      items.push(
        createIngestedItem({
          source: this.name,
          title: entry.title?.trim() || "No Title",
          url: entry.link,
          content: entryContent(entry),
          author: entry.author ?? entry.creator ?? feed.title,
          createdAt,
          metadata: { feed_url: feedUrl, feed_title: feed.title ?? "" },
        })
      );
    }

    return items;
  }
}

function entryDate(entry: FeedEntry): Date {
  const raw = entry.isoDate ?? entry.pubDate;
  const parsed = raw ? new Date(raw) : null;
  return parsed && !Number.isNaN(parsed.getTime()) ? parsed : new Date();
}

function entryContent(entry: FeedEntry): string {
  return entry.contentSnippet || entry.summary || entry.description || entry.content || "";
}

export function createRssAdapter(fetchFn?: FetchLike, feeds: readonly string[] = DEFAULT_RSS_FEEDS): FeedAdapter {
  return new FeedAdapter({
    name: "RSS",
    preferenceKey: PREFERENCE_KEYS.SOURCE_RSS_ENABLED,
    feeds,
    minLookbackHours: RSS_LOOKBACK_HOURS,
    fetchFn,
  });
}

export function createRedditAdapter(
  fetchFn?: FetchLike,
  feeds: readonly string[] = DEFAULT_SUBREDDIT_FEEDS
): FeedAdapter {
  return new FeedAdapter({
    name: "Reddit",
    preferenceKey: PREFERENCE_KEYS.SOURCE_REDDIT_ENABLED,
    feeds,
    headers: { "User-Agent": REDDIT_USER_AGENT },
    fetchFn,
  });
}

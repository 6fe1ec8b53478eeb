/**
 * Hacker News adapter
 * Reads the front page and Show HN lists from the public Firebase API
 */

import { z } from "zod";
import type { IngestedItem } from "../model";
import { logger } from "../logger";
import { createLimiter } from "../concurrency";
import { PREFERENCE_KEYS } from "../../config/preferences";
import { createIngestedItem } from "../pipeline/normalize";
import type { FetchLike, SourceAdapter } from "./types";

export const HN_API_BASE = "https://hacker-news.firebaseio.com/v0";
const STORY_LISTS = ["topstories", "showstories"] as const;
const STORIES_PER_LIST = 30;
const MAX_PARALLEL_REQUESTS = 10;

const StoryIdsSchema = z.array(z.number().int());

const HnItemSchema = z.object({
  id: z.number().int(),
  type: z.string().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  text: z.string().optional(),
  by: z.string().optional(),
  time: z.number().optional(),
  score: z.number().optional(),
  descendants: z.number().optional(),
  dead: z.boolean().optional(),
  deleted: z.boolean().optional(),
});

export class HackerNewsAdapter implements SourceAdapter {
  readonly name = "HackerNews";
  readonly preferenceKey = PREFERENCE_KEYS.SOURCE_HN_ENABLED;

  constructor(
    private readonly fetchFn: FetchLike = (input, init) => fetch(input, init),
    private readonly baseUrl: string = HN_API_BASE
  ) {}

  async fetchItems(lookbackHours: number): Promise<IngestedItem[]> {
    logger.info(`Fetching Hacker News stories (lookback=${lookbackHours}h)`);

    const ids = new Set<number>();
    for (const list of STORY_LISTS) {
      const listIds = StoryIdsSchema.parse(await this.getJson(`${this.baseUrl}/${list}.json`));
      listIds.slice(0, STORIES_PER_LIST).forEach((id) => ids.add(id));
    }

    const limit = createLimiter(MAX_PARALLEL_REQUESTS);
    const stories = await Promise.all(Array.from(ids, (id) => limit(() => this.fetchStory(id))));

    const cutoff = Date.now() - lookbackHours * 3600 * 1000;
    const items = stories.filter(
      (item): item is IngestedItem => item !== null && item.createdAt.getTime() > cutoff
    );

    logger.info(`Found ${items.length} Hacker News stories`);
    return items;
  }

  private async fetchStory(id: number): Promise<IngestedItem | null> {
    try {
      const parsed = HnItemSchema.safeParse(await this.getJson(`${this.baseUrl}/item/${id}.json`));
      if (!parsed.success) return null;

      const story = parsed.data;
      if (story.type !== "story" || story.dead || story.deleted || !story.title) {
        return null;
      }

      const score = story.score ?? 0;
      return createIngestedItem({
        source: this.name,
        title: story.title,
        url: story.url ?? `https://news.ycombinator.com/item?id=${story.id}`,
        content: story.text ?? "",
        author: story.by,
        createdAt: new Date((story.time ?? 0) * 1000),
        rawScore: score,
        metadata: { hn_id: story.id, comments: story.descendants ?? 0, score },
      });
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to fetch HN item ${id}`, { error: errorMsg });
      return null;
    }
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.fetchFn(url);
    if (!response.ok) {
      throw new Error(`GET ${url} failed with status ${response.status}`);
    }
    return response.json();
  }
}

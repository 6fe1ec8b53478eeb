/**
 * Item persistence
 */

import { z } from "zod";
import type { IngestedItem } from "../model";
import { logger } from "../logger";
import type { DatabaseClient } from "./driver";
import { nowSeconds } from "./driver";

const ItemRowSchema = z.object({
  id: z.string(),
  source: z.string(),
  title: z.string(),
  url: z.string(),
  content: z.string().nullable(),
  author: z.string().nullable(),
  raw_score: z.coerce.number(),
  metadata: z.string().nullable(),
  created_at: z.coerce.number(),
});

const MetadataSchema = z.record(z.unknown());

function parseMetadata(raw: string | null): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed = MetadataSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

/**
 * Rebuild an item from a stored row. Engagement comes from metadata.score
 * when the source recorded one.
 */
export function rowToItem(row: unknown): IngestedItem {
  const parsed = ItemRowSchema.parse(row);
  const metadata = parseMetadata(parsed.metadata);
  const metadataScore = metadata.score;

  return {
    id: parsed.id,
    source: parsed.source,
    title: parsed.title,
    url: parsed.url,
    content: parsed.content ?? undefined,
    author: parsed.author ?? undefined,
    createdAt: new Date(parsed.created_at * 1000),
    rawScore: typeof metadataScore === "number" ? metadataScore : parsed.raw_score,
    metadata,
  };
}

/**
 * Insert an item. An existing id is left untouched and still counts as saved.
 */
export async function saveItem(client: DatabaseClient, item: IngestedItem): Promise<boolean> {
  try {
    await client.run(
      `INSERT INTO items (id, source, title, url, content, author, raw_score, metadata, created_at, ingested_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (id) DO NOTHING`,
      [
        item.id,
        item.source,
        item.title,
        item.url,
        item.content ?? null,
        item.author ?? null,
        item.rawScore,
        JSON.stringify(item.metadata),
        Math.floor(item.createdAt.getTime() / 1000),
        nowSeconds(),
      ]
    );
    return true;
  } catch (error) {
    logger.error(`Failed to save item ${item.id}`, error);
    return false;
  }
}

/**
 * Most recently created items first
 */
export async function getRecentItems(client: DatabaseClient, limit: number): Promise<IngestedItem[]> {
  const result = await client.query(
    `SELECT id, source, title, url, content, author, raw_score, metadata, created_at
     FROM items
     ORDER BY created_at DESC, ingested_at DESC
     LIMIT ?`,
    [limit]
  );

  const items: IngestedItem[] = [];
  for (const row of result.rows) {
    try {
      items.push(rowToItem(row));
    } catch (error) {
      logger.warn("Skipping malformed item row", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return items;
}

/**
 * Normalization helpers
 * Builds IngestedItem records from adapter output and derives the keys used
 * for deduplication and source grouping
 */

import { createHash } from "crypto";
import type { IngestedItem } from "../model";
import { truncateForEmbedding } from "../embeddings/vectors";

export interface RawItemInput {
  url: string;
  source: string;
  title: string;
  content?: string | null;
  author?: string | null;
  createdAt?: Date;
  rawScore?: number | null;
  metadata?: Record<string, unknown>;
}

/**
 * Stable id for a URL: the same link maps to the same id on every run
 */
export function itemIdFromUrl(url: string): string {
  return createHash("sha256").update(url.trim()).digest("hex").slice(0, 32);
}

/**
 * Lowercase, letters and digits only
 */
export function normalizeTitle(title: string): string {
  return title.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
}

/**
 * In-run dedup key combining URL and normalized title
 */
export function contentKey(item: Pick<IngestedItem, "url" | "title">): string {
  return `${item.url}-${normalizeTitle(item.title)}`;
}

/**
 * Source family of a source tag: "HackerNews: Top" -> "HackerNews"
 */
export function sourceKey(source: string): string {
  return source.split(":")[0].trim();
}

/**
 * Text compared against anchors and indexed for duplicate detection
 */
export function embeddingText(item: Pick<IngestedItem, "title" | "content">): string {
  return truncateForEmbedding(`${item.title} ${item.content ?? ""}`);
}

export function createIngestedItem(input: RawItemInput): IngestedItem {
  const rawScore = input.rawScore ?? 0;
  return {
    id: itemIdFromUrl(input.url),
    url: input.url,
    source: input.source,
    title: input.title,
    content: input.content ?? undefined,
    author: input.author ?? undefined,
    createdAt: input.createdAt ?? new Date(),
    rawScore: Number.isFinite(rawScore) ? Math.trunc(rawScore) : 0,
    metadata: input.metadata ?? {},
  };
}

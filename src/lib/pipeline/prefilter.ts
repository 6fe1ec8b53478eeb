/**
 * Ingestion-time semantic prefilter
 *
 * An item passes when its text is close enough to at least one topic anchor,
 * or when its engagement is high enough to bypass the check. Single-item and
 * batch calls share one code path, so they always agree.
 */

import type { IngestedItem } from "../model";
import type { EmbeddingProvider } from "../embeddings";
import { maxSimilarities } from "../embeddings";
import { createSharedResource, type SharedResource } from "../shared-resource";
import { logger } from "../logger";
import { embeddingText } from "./normalize";

export const PREFILTER_ANCHORS: Readonly<Record<string, string>> = {
  GENAI:
    "Technical details about Large Language Models, AI agents, RAG systems, transformer architectures, " +
    "new model releases like Llama, GPT, Claude, Gemini, fine-tuning, prompt engineering, AI research breakthroughs.",
  PRODUCT:
    "New software startup ideas, B2B SaaS opportunities, market gaps, product launches, innovative apps, " +
    "developer tools, problems enabling new product development, tech entrepreneurship.",
  FINANCE:
    "Financial reports of tech companies, revenue data, funding rounds, IPOs, stock market analysis, " +
    "AI company valuations, venture capital investments, earnings reports.",
};

export const DEFAULT_PREFILTER_THRESHOLD = 0.35;
export const DEFAULT_ENGAGEMENT_BYPASS = 100;

export interface PrefilterOptions {
  threshold?: number;
  engagementBypass?: number; // rawScore strictly above this always passes
  anchors?: Readonly<Record<string, string>>;
}

export class SemanticPrefilter {
  readonly threshold: number;
  readonly engagementBypass: number;
  private readonly anchorVectors: SharedResource<number[][]>;

  constructor(
    private readonly provider: EmbeddingProvider,
    options: PrefilterOptions = {}
  ) {
    this.threshold = options.threshold ?? DEFAULT_PREFILTER_THRESHOLD;
    this.engagementBypass = options.engagementBypass ?? DEFAULT_ENGAGEMENT_BYPASS;
    const anchors = Object.values(options.anchors ?? PREFILTER_ANCHORS);
    if (anchors.length === 0) {
      throw new Error("SemanticPrefilter needs at least one anchor");
    }
    this.anchorVectors = createSharedResource("prefilter anchors", () =>
      this.provider.embedBatch(anchors)
    );
  }

  /**
   * Best anchor similarity per item. Pass `vectors` to reuse embeddings the
   * caller already computed for the same items.
   */
  async scoreBatch(items: IngestedItem[], vectors?: number[][]): Promise<number[]> {
    if (items.length === 0) return [];
    if (vectors && vectors.length !== items.length) {
      throw new Error(`Expected ${items.length} vectors, got ${vectors.length}`);
    }

    const anchors = await this.anchorVectors.get();
    const itemVectors = vectors ?? (await this.provider.embedBatch(items.map(embeddingText)));
    return maxSimilarities(itemVectors, anchors);
  }

  passes(item: IngestedItem, bestSimilarity: number): boolean {
    return bestSimilarity >= this.threshold || item.rawScore > this.engagementBypass;
  }

  async relevanceMask(items: IngestedItem[], vectors?: number[][]): Promise<boolean[]> {
    const scores = await this.scoreBatch(items, vectors);
    return items.map((item, i) => this.passes(item, scores[i]));
  }

  async isRelevant(item: IngestedItem): Promise<boolean> {
    const [relevant] = await this.relevanceMask([item]);
    return relevant;
  }

  async filterBatch(items: IngestedItem[]): Promise<IngestedItem[]> {
    const mask = await this.relevanceMask(items);
    const kept = items.filter((_, i) => mask[i]);
    logger.debug(`Prefilter kept ${kept.length}/${items.length} items`);
    return kept;
  }
}

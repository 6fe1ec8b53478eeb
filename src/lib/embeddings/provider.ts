/**
 * Embedding providers
 * Produces L2-normalized vectors of a fixed dimension (384 by default) using
 * OpenAI text-embedding-3-small with reduced dimensions, or a deterministic
 * hash-based pseudo provider for offline runs
 */

import OpenAI from "openai";
import { logger } from "../logger";
import { getSettings, type Settings } from "../../config/settings";
import { createSharedResource } from "../shared-resource";
import { normalizeEmbedding, truncateForEmbedding } from "./vectors";

export interface EmbeddingProvider {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

const OPENAI_BATCH_SIZE = 100;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    readonly dimension: number
  ) {}

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    const pending: Array<{ index: number; text: string }> = [];

    texts.forEach((text, index) => {
      const truncated = truncateForEmbedding(text);
      if (truncated.trim().length === 0) {
        vectors[index] = new Array(this.dimension).fill(0);
      } else {
        pending.push({ index, text: truncated });
      }
    });

    for (let i = 0; i < pending.length; i += OPENAI_BATCH_SIZE) {
      const batch = pending.slice(i, i + OPENAI_BATCH_SIZE);
      const response = await this.client.embeddings.create({
        model: this.model,
        input: batch.map((entry) => entry.text),
        dimensions: this.dimension,
      });

      if (response.data.length !== batch.length) {
        throw new Error(`Expected ${batch.length} embeddings, got ${response.data.length}`);
      }

      for (const datum of response.data) {
        const target = batch[datum.index];
        if (!target) {
          throw new Error(`Embedding response index ${datum.index} out of range`);
        }
        if (datum.embedding.length !== this.dimension) {
          throw new Error(
            `Embedding dimension mismatch: expected ${this.dimension}, got ${datum.embedding.length}`
          );
        }
        vectors[target.index] = normalizeEmbedding(datum.embedding);
      }
    }

    logger.debug(`Generated ${pending.length} OpenAI embeddings (${this.dimension} dimensions)`);
    return vectors;
  }
}

/**
 * Hashed bag of features (word tokens plus character trigrams), not semantic.
 * Each feature lands in one bucket with a hashed sign, so texts sharing no
 * features come out close to orthogonal and identical text maps to the same
 * unit vector.
 */
export class PseudoEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly dimension: number) {}

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedSync(text));
  }

  private embedSync(text: string): number[] {
    const embedding = new Array<number>(this.dimension).fill(0);

    for (const feature of textFeatures(truncateForEmbedding(text))) {
      const bucket = fnv1a(feature, BUCKET_SEED) % this.dimension;
      const sign = fnv1a(feature, SIGN_SEED) & 1 ? 1 : -1;
      embedding[bucket] += sign;
    }

    return normalizeEmbedding(embedding);
  }
}

const BUCKET_SEED = 0x811c9dc5;
const SIGN_SEED = 0x9747b28c;

function textFeatures(text: string): string[] {
  const features: string[] = [];
  for (const token of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
    features.push(`w:${token}`);
    const padded = `^${token}$`;
    for (let i = 0; i + 3 <= padded.length; i++) {
      features.push(`c:${padded.slice(i, i + 3)}`);
    }
  }
  return features;
}

/**
 * 32-bit FNV-1a, unsigned
 */
function fnv1a(text: string, seed: number): number {
  let hash = seed >>> 0;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function createEmbeddingProvider(settings: Settings): EmbeddingProvider {
  if (settings.EMBEDDING_PROVIDER === "pseudo") {
    logger.warn("Using pseudo-embeddings: similarity reflects shared words, not meaning");
    return new PseudoEmbeddingProvider(settings.EMBEDDING_DIMENSIONS);
  }

  if (!settings.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY is required for EMBEDDING_PROVIDER=openai");
  }

  const client = new OpenAI({
    apiKey: settings.OPENAI_API_KEY,
    baseURL: settings.OPENAI_BASE_URL,
    timeout: settings.LLM_TIMEOUT_MS,
    // Embedding failures are fatal for the run
    maxRetries: 0,
  });
  logger.info(
    `Embedding model ready: ${settings.EMBEDDING_MODEL} (${settings.EMBEDDING_DIMENSIONS} dimensions)`
  );
  return new OpenAIEmbeddingProvider(client, settings.EMBEDDING_MODEL, settings.EMBEDDING_DIMENSIONS);
}

const sharedProvider = createSharedResource("embedding provider", () =>
  createEmbeddingProvider(getSettings())
);

/**
 * Process-wide embedding provider, created on first use
 */
export function getEmbeddingProvider(): Promise<EmbeddingProvider> {
  return sharedProvider.get();
}

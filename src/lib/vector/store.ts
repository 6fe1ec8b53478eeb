/**
 * Vector near-duplicate index
 *
 * Flat inner-product index over unit vectors (inner product == cosine
 * similarity), an ordered id list aligned with the rows, and an id set for
 * O(1) membership. Persisted explicitly to two sidecar files:
 * - vector_index.bin: 16-byte header (magic, version, dimension, count) + float32 rows
 * - vector_ids.json: ids in insertion order (row i <-> ids[i])
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { EmbeddingProvider } from "../embeddings";
import { dotProduct, normalizeEmbedding } from "../embeddings";
import { logger } from "../logger";

const MAGIC = "PDVX";
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;

export const DEFAULT_DUPLICATE_THRESHOLD = 0.85;

export interface VectorIndexPaths {
  indexPath: string;
  idsPath: string;
}

export interface SearchHit {
  id: string;
  similarity: number;
}

const StoredIdsSchema = z.array(z.string());

export function defaultIndexPaths(dataDir: string): VectorIndexPaths {
  return {
    indexPath: path.join(dataDir, "vector_index.bin"),
    idsPath: path.join(dataDir, "vector_ids.json"),
  };
}

export class VectorIndex {
  private rows: Float32Array[] = [];
  private storedIds: string[] = [];
  private idSet = new Set<string>();
  private dim: number;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly paths?: VectorIndexPaths
  ) {
    this.dim = provider.dimension;
  }

  /**
   * Create an index and load its sidecar files when they exist
   */
  static open(provider: EmbeddingProvider, paths: VectorIndexPaths): VectorIndex {
    const index = new VectorIndex(provider, paths);
    index.load();
    logger.info(`VectorIndex initialized with ${index.size} items (${index.dimension} dim)`);
    return index;
  }

  get size(): number {
    return this.rows.length;
  }

  get dimension(): number {
    return this.dim;
  }

  get ids(): readonly string[] {
    return this.storedIds;
  }

  get persistent(): boolean {
    return this.paths !== undefined;
  }

  hasId(id: string): boolean {
    return this.idSet.has(id);
  }

  /**
   * Append a row. Does not deduplicate: callers check hasId / isDuplicate first.
   */
  async add(id: string, textOrVector: string | number[]): Promise<void> {
    const vector = await this.toVector(textOrVector);
    this.rows.push(Float32Array.from(vector));
    this.storedIds.push(id);
    this.idSet.add(id);
  }

  async isDuplicate(
    text: string,
    threshold: number = DEFAULT_DUPLICATE_THRESHOLD,
    vector?: number[]
  ): Promise<boolean> {
    if (this.rows.length === 0) {
      return false;
    }

    const [nearest] = await this.search(vector ?? text, 1);
    if (!nearest) {
      return false;
    }
    if (nearest.similarity >= threshold) {
      logger.debug(`Duplicate of ${nearest.id} (similarity=${nearest.similarity.toFixed(3)})`);
      return true;
    }
    return false;
  }

  /**
   * k nearest rows by similarity, descending. Returns fewer than k when the
   * index holds fewer rows.
   */
  async search(textOrVector: string | number[], k: number = 5): Promise<SearchHit[]> {
    if (this.rows.length === 0 || k <= 0) {
      return [];
    }

    const query = await this.toVector(textOrVector);
    const hits: SearchHit[] = this.rows.map((row, i) => ({
      id: this.storedIds[i],
      similarity: dotProduct(query, row),
    }));

    return hits.sort((a, b) => b.similarity - a.similarity).slice(0, k);
  }

  /**
   * Drop every row and adopt the provider's current dimension
   */
  clear(): void {
    this.rows = [];
    this.storedIds = [];
    this.idSet = new Set();
    this.dim = this.provider.dimension;
  }

  save(): void {
    if (!this.paths) {
      throw new Error("VectorIndex has no sidecar paths configured");
    }

    const { indexPath, idsPath } = this.paths;
    fs.mkdirSync(path.dirname(indexPath), { recursive: true });
    fs.mkdirSync(path.dirname(idsPath), { recursive: true });

    const blob = Buffer.alloc(HEADER_BYTES + this.rows.length * this.dim * 4);
    blob.write(MAGIC, 0, "ascii");
    blob.writeUInt32LE(FORMAT_VERSION, 4);
    blob.writeUInt32LE(this.dim, 8);
    blob.writeUInt32LE(this.rows.length, 12);

    let offset = HEADER_BYTES;
    for (const row of this.rows) {
      for (const value of row) {
        blob.writeFloatLE(value, offset);
        offset += 4;
      }
    }

    fs.writeFileSync(indexPath, blob);
    fs.writeFileSync(idsPath, JSON.stringify(this.storedIds));
    logger.info(`Vector index saved (${this.rows.length} items)`);
  }

  /**
   * Load the sidecar files. A missing pair leaves the index empty; a corrupt
   * pair, misaligned ids or a dimension other than the provider's discards
   * everything and starts over empty.
   */
  load(): void {
    this.clear();
    if (!this.paths) {
      return;
    }

    const { indexPath, idsPath } = this.paths;
    if (!fs.existsSync(indexPath) || !fs.existsSync(idsPath)) {
      return;
    }

    try {
      const blob = fs.readFileSync(indexPath);
      if (blob.length < HEADER_BYTES || blob.toString("ascii", 0, 4) !== MAGIC) {
        throw new Error("unrecognized index header");
      }

      const version = blob.readUInt32LE(4);
      const dimension = blob.readUInt32LE(8);
      const count = blob.readUInt32LE(12);
      if (version !== FORMAT_VERSION) {
        throw new Error(`unsupported index version ${version}`);
      }
      if (blob.length !== HEADER_BYTES + count * dimension * 4) {
        throw new Error(`index size ${blob.length} does not match ${count} x ${dimension} rows`);
      }

      const ids = StoredIdsSchema.parse(JSON.parse(fs.readFileSync(idsPath, "utf-8")));
      if (ids.length !== count) {
        throw new Error(`id list has ${ids.length} entries for ${count} rows`);
      }

      if (dimension !== this.provider.dimension) {
        logger.warn(
          `Index dimension mismatch: found ${dimension}, expected ${this.provider.dimension}. Rebuilding empty index`
        );
        return;
      }

      const rows: Float32Array[] = [];
      let offset = HEADER_BYTES;
      for (let r = 0; r < count; r++) {
        const row = new Float32Array(dimension);
        for (let c = 0; c < dimension; c++) {
          row[c] = blob.readFloatLE(offset);
          offset += 4;
        }
        rows.push(row);
      }

      this.rows = rows;
      this.storedIds = ids;
      this.idSet = new Set(ids);
      this.dim = dimension;
    } catch (error) {
      logger.error("Failed to load vector index, rebuilding empty index", error);
      this.clear();
    }
  }

  private async toVector(textOrVector: string | number[]): Promise<number[]> {
    if (typeof textOrVector === "string") {
      return this.provider.embed(textOrVector);
    }
    if (textOrVector.length !== this.dim) {
      throw new Error(`Vector dimensions must match: ${textOrVector.length} vs ${this.dim}`);
    }
    return normalizeEmbedding(textOrVector);
  }
}

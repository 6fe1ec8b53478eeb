/**
 * Vector math shared by the index, the prefilter and the evaluators
 */

/**
 * Max characters of text sent to the embedding model
 */
export const EMBEDDING_TEXT_LIMIT = 512;

export function truncateForEmbedding(text: string): string {
  return text.length > EMBEDDING_TEXT_LIMIT ? text.slice(0, EMBEDDING_TEXT_LIMIT) : text;
}

/**
 * Dot product of two equal-length vectors.
 * For unit vectors this equals cosine similarity.
 */
export function dotProduct(vecA: ArrayLike<number>, vecB: ArrayLike<number>): number {
  if (vecA.length !== vecB.length) {
    throw new Error(`Vector dimensions must match: ${vecA.length} vs ${vecB.length}`);
  }

  let sum = 0;
  for (let i = 0; i < vecA.length; i++) {
    sum += vecA[i] * vecB[i];
  }
  return sum;
}

/**
 * Similarity matrix of items (rows) against anchors (columns), reduced by row max
 */
export function maxSimilarities(itemVectors: number[][], anchorVectors: number[][]): number[] {
  return itemVectors.map((itemVector) => {
    let max = -Infinity;
    for (const anchor of anchorVectors) {
      const score = dotProduct(itemVector, anchor);
      if (score > max) {
        max = score;
      }
    }
    return max;
  });
}

/**
 * Normalize embedding vector to unit length
 */
export function normalizeEmbedding(embedding: number[]): number[] {
  const magnitude = Math.sqrt(embedding.reduce((sum, x) => sum + x * x, 0));
  if (magnitude === 0) {
    return embedding;
  }
  return embedding.map((x) => x / magnitude);
}

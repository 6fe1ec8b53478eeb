/**
 * Embedding utilities and vector operations
 * Re-exports the providers and the vector math utilities
 */

export {
  OpenAIEmbeddingProvider,
  PseudoEmbeddingProvider,
  createEmbeddingProvider,
  getEmbeddingProvider,
} from "./provider";
export type { EmbeddingProvider } from "./provider";
export {
  EMBEDDING_TEXT_LIMIT,
  truncateForEmbedding,
  dotProduct,
  maxSimilarities,
  normalizeEmbedding,
} from "./vectors";

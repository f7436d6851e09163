/**
 * Hybrid search - Export all public APIs
 */

export { HybridIndex, effectiveWeights, recencyScore } from './hybrid';
export type { HybridIndexOptions, SearchHit } from './hybrid';
export { LexicalIndex } from './lexical';
export { VectorIndex, cosineSimilarity } from './vector';
export type { VectorIndexOptions, VectorMatch } from './vector';
export { tokenize, tokenizeUrl, bookmarkTokens } from './tokenizer';
export { embedBookmark, searchWithEmbedder, bookmarkText } from './embedding';
export type { Embedder } from './embedding';

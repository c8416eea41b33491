/**
 * @file Knowledge Module Entry - Corpus indexing and hybrid retrieval
 * @description Exports loading, chunking, embedding, storage, sparse indexing and retrieval
 * @depends DocumentLoader, Chunker, EmbeddingService, VectorStore, SparseIndex, IndexBuilder, HybridRetriever
 */

export * from './types';

export { DocumentLoader, flattenJson, qaPairsToChunks } from './processors/DocumentLoader';
export {
  Chunker,
  type ChunkerInput,
  cleanText,
  detectLanguage,
  splitSentences,
} from './processors/Chunker';

export { EmbeddingService, type EmbeddingConfig } from './embedding/EmbeddingService';
export { VectorStore } from './storage/VectorStore';

export { Tokenizer, loadCustomTerms } from './sparse/Tokenizer';
export {
  SparseIndex,
  type SparseIndexOptions,
  type SparseMatch,
  DEFAULT_SPARSE_OPTIONS,
} from './sparse/SparseIndex';

export { IndexBuilder, type IndexBuilderOptions } from './IndexBuilder';
export {
  HybridRetriever,
  type HybridRetrieverConfig,
  DEFAULT_HYBRID_CONFIG,
} from './retrieval/HybridRetriever';
export { QuestionDetector, loadQuestionCues } from './retrieval/QuestionDetector';

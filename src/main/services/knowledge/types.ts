/**
 * @file Knowledge Types
 * @description Chunks, source documents, vector records, retrieval results and index snapshots
 * @depends None for data shapes; SparseIndex for the snapshot type
 */

import type { SparseIndex } from './sparse/SparseIndex';

// ====== Documents & Chunks ======

export type ChunkLanguage = 'zh' | 'en';

export interface ChunkMetadata {
  /** Character length of the chunk text */
  length: number;
  sentenceCount: number;
  /** Verbatim question-answer pair; hidden from question-phrased queries */
  isQaPair?: boolean;
  question?: string;
  answer?: string;
  [key: string]: unknown;
}

export interface Chunk {
  /** `${sourceFile}#${index}` */
  id: string;
  text: string;
  sourceFile: string;
  /** Position within the source file, 0-based */
  index: number;
  language: ChunkLanguage;
  metadata: ChunkMetadata;
}

/** One loaded file: either free text to chunk, or chunks built by the loader */
export type SourceDocument =
  | { kind: 'text'; sourceFile: string; text: string }
  | { kind: 'chunks'; sourceFile: string; chunks: Chunk[] };

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

// ====== Vector Store ======

export interface VectorRecord {
  id: string;
  vector: number[];
  text: string;
  metadata: ChunkMetadata;
}

export interface VectorMatch {
  id: string;
  text: string;
  metadata: ChunkMetadata;
  /** Cosine similarity */
  score: number;
}

/** Stored chunk without its vector */
export interface StoredChunk {
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

// ====== Retrieval ======

export interface RetrievalResult {
  chunkId: string;
  text: string;
  metadata: ChunkMetadata;
  denseScore: number;
  sparseScore: number;
  /** denseWeight * norm(dense) + sparseWeight * norm(sparse) */
  combinedScore: number;
}

export interface IndexSnapshot {
  /** Active vector store collection */
  collection: string;
  sparse: SparseIndex;
  /** Indexed chunks by id, for sparse-only candidates */
  chunks: ReadonlyMap<string, StoredChunk>;
  chunkCount: number;
  builtAt: number;
}

// ====== Vector Utilities ======

/**
 * Convert Float32Array or number[] to Buffer (for database storage)
 */
export function float32ToBuffer(arr: Float32Array | number[]): Buffer {
  const float32 = arr instanceof Float32Array ? arr : new Float32Array(arr);
  return Buffer.from(float32.buffer, float32.byteOffset, float32.byteLength);
}

/**
 * Convert Buffer to Float32Array (from database read)
 */
export function bufferToFloat32(buffer: Buffer): Float32Array {
  // Float32Array views need a 4-byte aligned offset
  const source =
    buffer.byteOffset % Float32Array.BYTES_PER_ELEMENT === 0 ? buffer : Buffer.from(buffer);
  return new Float32Array(
    source.buffer,
    source.byteOffset,
    source.length / Float32Array.BYTES_PER_ELEMENT
  );
}

/** Chunks a search should skip */
export type ChunkFilter = (metadata: ChunkMetadata) => boolean;

/**
 * @throws Error when a query vector and an indexed vector differ in length, as after an
 *   embedding model change
 */
export function assertSameDimension(query: ArrayLike<number>, indexed: ArrayLike<number>): void {
  if (query.length !== indexed.length) {
    throw new Error(
      `Query embedding has dimension ${query.length}, but the index expects embedding with dimension ${indexed.length}`
    );
  }
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

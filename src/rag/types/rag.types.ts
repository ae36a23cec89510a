import type { IndexError } from "../errors";

export const EmbeddingIntent = {
  Document: "search_document",
  Query: "search_query",
} as const;

export type EmbeddingIntent = (typeof EmbeddingIntent)[keyof typeof EmbeddingIntent];

export interface TextChunk {
  /** Filename without extension. */
  documentId: string;
  sequenceIndex: number;
  text: string;
  charCount: number;
  tokenStart: number;
  tokenEnd: number;
}

// A type alias (not an interface) so it satisfies Pinecone's RecordMetadata index signature.
export type ChunkMetadata = {
  source: string;
  chunk_index: number;
  total_chunks: number;
  content_preview: string;
  type: string;
  char_count: number;
};

export interface IndexRecord {
  id: string;
  values: number[];
  metadata: ChunkMetadata;
}

export interface IndexMatch {
  id: string;
  score: number;
  metadata: Partial<ChunkMetadata>;
}

export interface SearchResult {
  score: number;
  source: string;
  content: string;
}

export type UpsertBatchResult =
  | { batchIndex: number; size: number; ok: true }
  | { batchIndex: number; size: number; ok: false; error: IndexError };

export type DocumentStatus =
  | "discovered"
  | "extracted"
  | "chunked"
  | "embedded"
  | "upserted"
  | "failed";

export type SkipReason =
  | "extraction_failed"
  | "empty_text"
  | "no_embeddings"
  | "upsert_failed"
  | "unexpected_error";

export interface ChunkFailure {
  source: string;
  chunkIndex: number;
  error: string;
}

export interface BatchFailure {
  source: string;
  batchIndex: number;
  size: number;
  error: string;
}

export interface DocumentReport {
  source: string;
  status: DocumentStatus;
  chunksCreated: number;
  recordsUpserted: number;
  recordIds: string[];
  recordsPruned: number;
  skipReason?: SkipReason;
  error?: string;
}

export interface IngestionSummary {
  documentsFound: number;
  documentsProcessed: number;
  documentsSkipped: Array<{ source: string; reason: SkipReason; error?: string }>;
  chunksCreated: number;
  recordsUpserted: number;
  recordsPruned: number;
  chunkFailures: ChunkFailure[];
  batchFailures: BatchFailure[];
  documents: DocumentReport[];
  processingTimeMs: number;
}

export interface IngestionOptions {
  maxChunkTokens?: number;
  overlapTokens?: number;
  pruneStale?: boolean;
}

export const RAG_CONFIG = {
  CHUNK_MAX_TOKENS: 6000,
  CHUNK_OVERLAP_TOKENS: 200,
  TOKEN_ENCODING: "cl100k_base",
  EMBEDDING_MODEL: "embed-english-v3.0",
  EMBEDDING_DIMENSIONS: 1024,
  EMBED_BATCH_SIZE: 96,
  EMBED_MAX_RETRIES: 2,
  UPSERT_BATCH_SIZE: 100,
  UPSERT_CONCURRENCY: 2,
  DELETE_BATCH_SIZE: 1000,
  INGEST_CONCURRENCY: 4,
  REQUEST_TIMEOUT_MS: 30_000,
  PREVIEW_LENGTH: 300,
  RECORD_TYPE: "policy",
  SEARCH_TOP_K: 3,
  SCORE_PRECISION: 4,
  CHAT_MODEL: "gpt-4o",
  MAX_TOOL_ROUNDS: 3,
} as const;

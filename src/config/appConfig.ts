import { EnvLoader } from "../util/EnvLoader";
import { RAG_CONFIG } from "../rag/types/rag.types";

export interface EmbeddingConfig {
  apiKey: string;
  model: string;
  dimensions: number;
  batchSize: number;
  maxRetries: number;
  timeoutMs: number;
}

export interface IndexConfig {
  apiKey: string;
  indexName: string;
  dimensions: number;
  upsertBatchSize: number;
  upsertConcurrency: number;
  timeoutMs: number;
}

export interface ChunkingConfig {
  maxTokens: number;
  overlapTokens: number;
}

export interface IngestionConfig {
  concurrency: number;
  recordType: string;
}

export interface RetrievalConfig {
  defaultTopK: number;
}

export interface AgentConfig {
  apiKey?: string;
  model: string;
  maxToolRounds: number;
}

export interface HttpConfig {
  port: number;
  allowedOrigins: string[];
}

export interface AppConfig {
  embedding: EmbeddingConfig;
  index: IndexConfig;
  chunking: ChunkingConfig;
  ingestion: IngestionConfig;
  retrieval: RetrievalConfig;
  agent: AgentConfig;
  http: HttpConfig;
}

/**
 * Built once at process start, after loadDotenv(), and handed to
 * createRagServices() and the transports.
 */
export function loadAppConfig(): AppConfig {
  const dimensions = EnvLoader.getPositiveInt("EMBEDDING_DIMENSIONS", RAG_CONFIG.EMBEDDING_DIMENSIONS);
  const timeoutMs = EnvLoader.getPositiveInt("REQUEST_TIMEOUT_MS", RAG_CONFIG.REQUEST_TIMEOUT_MS);

  return {
    embedding: {
      apiKey: EnvLoader.getOrThrow("COHERE_API_KEY"),
      model: EnvLoader.get("EMBEDDING_MODEL") ?? RAG_CONFIG.EMBEDDING_MODEL,
      dimensions,
      batchSize: EnvLoader.getPositiveInt("EMBED_BATCH_SIZE", RAG_CONFIG.EMBED_BATCH_SIZE),
      maxRetries: Math.max(0, EnvLoader.getInt("EMBED_MAX_RETRIES") ?? RAG_CONFIG.EMBED_MAX_RETRIES),
      timeoutMs,
    },
    index: {
      apiKey: EnvLoader.getOrThrow("PINECONE_API_KEY"),
      indexName: EnvLoader.getOrThrow("PINECONE_INDEX"),
      dimensions,
      upsertBatchSize: EnvLoader.getPositiveInt("UPSERT_BATCH_SIZE", RAG_CONFIG.UPSERT_BATCH_SIZE),
      upsertConcurrency: EnvLoader.getPositiveInt("UPSERT_CONCURRENCY", RAG_CONFIG.UPSERT_CONCURRENCY),
      timeoutMs,
    },
    chunking: {
      maxTokens: EnvLoader.getPositiveInt("CHUNK_MAX_TOKENS", RAG_CONFIG.CHUNK_MAX_TOKENS),
      overlapTokens: Math.max(
        0,
        EnvLoader.getInt("CHUNK_OVERLAP_TOKENS") ?? RAG_CONFIG.CHUNK_OVERLAP_TOKENS
      ),
    },
    ingestion: {
      concurrency: EnvLoader.getPositiveInt("INGEST_CONCURRENCY", RAG_CONFIG.INGEST_CONCURRENCY),
      recordType: EnvLoader.get("RECORD_TYPE") ?? RAG_CONFIG.RECORD_TYPE,
    },
    retrieval: {
      defaultTopK: EnvLoader.getPositiveInt("SEARCH_TOP_K", RAG_CONFIG.SEARCH_TOP_K),
    },
    agent: {
      apiKey: EnvLoader.get("OPENAI_API_KEY"),
      model: EnvLoader.get("OPENAI_CHAT_MODEL") ?? RAG_CONFIG.CHAT_MODEL,
      maxToolRounds: RAG_CONFIG.MAX_TOOL_ROUNDS,
    },
    http: {
      port: EnvLoader.getInt("PORT") ?? 8000,
      allowedOrigins: EnvLoader.getList("CORS_ORIGINS"),
    },
  };
}

/**
 * Non-secret view of the configuration for startup logs.
 */
export const describeConfig = (config: AppConfig) => ({
  embeddingModel: config.embedding.model,
  dimensions: config.embedding.dimensions,
  indexName: config.index.indexName,
  chunkMaxTokens: config.chunking.maxTokens,
  chunkOverlapTokens: config.chunking.overlapTokens,
  ingestConcurrency: config.ingestion.concurrency,
  defaultTopK: config.retrieval.defaultTopK,
});

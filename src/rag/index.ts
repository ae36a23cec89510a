import { Pinecone } from "@pinecone-database/pinecone";
import { CohereClient } from "cohere-ai";
import type { AppConfig } from "../config/appConfig";
import logger from "../logger";
import { EmbeddingService } from "./services/EmbeddingService";
import { IngestionService } from "./services/IngestionService";
import { PDFProcessor } from "./services/PDFProcessor";
import { RetrievalService } from "./services/RetrievalService";
import { TextChunker } from "./services/TextChunker";
import { TiktokenTokenizer } from "./services/Tokenizer";
import { VectorStore } from "./services/VectorStore";

export * from "./errors";
export * from "./types/rag.types";
export { EmbeddingService } from "./services/EmbeddingService";
export { IngestionService } from "./services/IngestionService";
export { PDFProcessor } from "./services/PDFProcessor";
export { RetrievalService } from "./services/RetrievalService";
export { TextChunker } from "./services/TextChunker";
export { TiktokenTokenizer } from "./services/Tokenizer";
export { VectorStore } from "./services/VectorStore";

export interface RagServices {
  embeddings: EmbeddingService;
  vectorStore: VectorStore;
  ingestion: IngestionService;
  retrieval: RetrievalService;
}

/**
 * Wires the Cohere and Pinecone clients into the ingestion and retrieval
 * pipelines. Nothing is contacted until the first call.
 */
export function createRagServices(config: AppConfig): RagServices {
  const cohere = new CohereClient({ token: config.embedding.apiKey });
  const pinecone = new Pinecone({ apiKey: config.index.apiKey });

  const embeddings = new EmbeddingService(config.embedding, cohere);
  const vectorStore = new VectorStore(config.index, pinecone.index(config.index.indexName));
  const ingestion = new IngestionService(
    new PDFProcessor(),
    new TextChunker(new TiktokenTokenizer()),
    embeddings,
    vectorStore,
    config.chunking,
    config.ingestion
  );
  const retrieval = new RetrievalService(embeddings, vectorStore, config.retrieval);

  logger.debug("RAG services created", { indexName: config.index.indexName });
  return { embeddings, vectorStore, ingestion, retrieval };
}

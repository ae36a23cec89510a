import logger from "../../logger";
import { sliceCodePoints } from "../../util/codePoints";
import type { RetrievalConfig } from "../../config/appConfig";
import { describeError, EmbeddingError, isRagError, ValidationError } from "../errors";
import { EmbeddingIntent, RAG_CONFIG, type IndexMatch, type SearchResult } from "../types/rag.types";
import type { Embedder } from "./EmbeddingService";
import type { VectorStore } from "./VectorStore";

const UNKNOWN_SOURCE = "Unknown";

export const roundScore = (score: number, precision: number = RAG_CONFIG.SCORE_PRECISION): number => {
  const factor = 10 ** precision;
  return Math.round(score * factor) / factor;
};

export const toSearchResult = (match: IndexMatch): SearchResult => ({
  score: roundScore(match.score),
  source: match.metadata.source ?? UNKNOWN_SOURCE,
  content: sliceCodePoints(match.metadata.content_preview ?? "", RAG_CONFIG.PREVIEW_LENGTH),
});

export class RetrievalService {
  constructor(
    private readonly embedder: Embedder,
    private readonly vectorStore: VectorStore,
    private readonly config: RetrievalConfig
  ) {}

  get defaultTopK(): number {
    return this.config.defaultTopK;
  }

  /**
   * Embeds `query` as a search query and returns the closest chunks, best
   * first. Rejects with a ValidationError before any network call when the
   * input is unusable, otherwise with an EmbeddingError or IndexError.
   */
  async search(query: unknown, topK: number = this.config.defaultTopK): Promise<SearchResult[]> {
    if (typeof query !== "string" || query.trim().length === 0) {
      throw new ValidationError("query is required", "query");
    }
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError(`top_k must be a positive integer (got ${topK})`, "top_k");
    }

    const startTime = Date.now();
    try {
      const [vector] = await this.embedder.embed([query], EmbeddingIntent.Query);
      if (!vector) throw new EmbeddingError("No embedding returned for query", { inputIndex: 0 });

      const matches = await this.vectorStore.query(vector, topK, true);
      const results = matches.map(toSearchResult);

      logger.info("RetrievalService.search completed", {
        topK,
        results: results.length,
        processingTimeMs: Date.now() - startTime,
      });
      return results;
    } catch (error) {
      logger.error("RetrievalService.search failed", { error, topK });
      if (isRagError(error)) throw error;
      throw new EmbeddingError(`Search failed: ${describeError(error)}`, { cause: error });
    }
  }
}

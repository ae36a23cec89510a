import pLimit from "p-limit";
import logger from "../../logger";
import type { IndexConfig } from "../../config/appConfig";
import { withTimeout } from "../../util/withTimeout";
import { ConfigurationError, describeError, IndexError, ValidationError } from "../errors";
import {
  RAG_CONFIG,
  type ChunkMetadata,
  type IndexMatch,
  type IndexRecord,
  type UpsertBatchResult,
} from "../types/rag.types";

interface RawMatch {
  id: string;
  score?: number;
  metadata?: Record<string, unknown>;
}

/**
 * The slice of a Pinecone `Index` this store calls.
 */
export interface PineconeIndexApi {
  upsert(records: IndexRecord[]): Promise<void>;
  query(options: {
    vector: number[];
    topK: number;
    includeMetadata: boolean;
    includeValues: boolean;
  }): Promise<{ matches?: RawMatch[] }>;
  describeIndexStats(): Promise<{ dimension?: number }>;
  listPaginated(options: {
    prefix: string;
    paginationToken?: string;
  }): Promise<{ vectors?: Array<{ id?: string }>; pagination?: { next?: string } }>;
  deleteMany(ids: string[]): Promise<void>;
}

const asText = (value: unknown) => (typeof value === "string" ? value : undefined);
const asCount = (value: unknown) => (typeof value === "number" ? value : undefined);

const decodeMetadata = (raw: Record<string, unknown> = {}): Partial<ChunkMetadata> => ({
  source: asText(raw.source),
  chunk_index: asCount(raw.chunk_index),
  total_chunks: asCount(raw.total_chunks),
  content_preview: asText(raw.content_preview),
  type: asText(raw.type),
  char_count: asCount(raw.char_count),
});

export class VectorStore {
  private dimensionCheck?: Promise<void>;

  constructor(
    private readonly config: IndexConfig,
    private readonly index: PineconeIndexApi
  ) {}

  /**
   * Compares the index's reported dimensionality with the configured one.
   * Runs once per store; a failed lookup is retried on the next call.
   */
  ensureDimension(): Promise<void> {
    if (!this.dimensionCheck) {
      this.dimensionCheck = this.checkDimension().catch((error: unknown) => {
        if (!(error instanceof ConfigurationError)) this.dimensionCheck = undefined;
        throw error;
      });
    }
    return this.dimensionCheck;
  }

  private async checkDimension(): Promise<void> {
    let stats: { dimension?: number };
    try {
      stats = await this.call(this.index.describeIndexStats(), "describeIndexStats");
    } catch (error) {
      throw new IndexError(`Failed to describe index ${this.config.indexName}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (stats.dimension !== undefined && stats.dimension !== this.config.dimensions) {
      throw new ConfigurationError(
        `Index ${this.config.indexName} stores ${stats.dimension}-dimensional vectors ` +
          `but embeddings are configured for ${this.config.dimensions}`
      );
    }
    logger.info("VectorStore dimension verified", {
      indexName: this.config.indexName,
      dimensions: this.config.dimensions,
    });
  }

  private assertDimension(values: number[], id: string): void {
    if (values.length !== this.config.dimensions) {
      throw new ConfigurationError(
        `Vector ${id} has ${values.length} dimensions, index ${this.config.indexName} expects ${this.config.dimensions}`
      );
    }
  }

  /**
   * Writes records in batches of `upsertBatchSize`. Every batch is attempted;
   * the result lists each batch's outcome in batch order.
   */
  async upsert(records: IndexRecord[]): Promise<UpsertBatchResult[]> {
    for (const record of records) this.assertDimension(record.values, record.id);
    if (records.length === 0) return [];

    const batchSize = this.config.upsertBatchSize;
    const batches: IndexRecord[][] = [];
    for (let i = 0; i < records.length; i += batchSize) {
      batches.push(records.slice(i, i + batchSize));
    }

    try {
      await this.ensureDimension();
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      // no batch can be written until the index answers
      return batches.map((batch, batchIndex) => this.failedBatch(batch, batchIndex, error));
    }

    const limit = pLimit(this.config.upsertConcurrency);
    const results = await Promise.all(
      batches.map((batch, batchIndex) =>
        limit(async (): Promise<UpsertBatchResult> => {
          try {
            await this.call(this.index.upsert(batch), "upsert");
            logger.debug("VectorStore.upsert batch written", {
              batch: `${batchIndex + 1}/${batches.length}`,
              size: batch.length,
            });
            return { batchIndex, size: batch.length, ok: true };
          } catch (error) {
            return this.failedBatch(batch, batchIndex, error);
          }
        })
      )
    );

    return results;
  }

  private failedBatch(batch: IndexRecord[], batchIndex: number, error: unknown): UpsertBatchResult {
    logger.error("VectorStore.upsert batch failed", { error, batchIndex, size: batch.length });
    return {
      batchIndex,
      size: batch.length,
      ok: false,
      error: new IndexError(`Upsert of batch ${batchIndex} failed: ${describeError(error)}`, {
        cause: error,
        batchIndex,
      }),
    };
  }

  /**
   * Top-k nearest records, highest score first.
   */
  async query(vector: number[], topK: number, includeMetadata = true): Promise<IndexMatch[]> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError(`topK must be a positive integer (got ${topK})`, "topK");
    }
    this.assertDimension(vector, "query");
    await this.ensureDimension();

    try {
      const response = await this.call(
        this.index.query({ vector, topK, includeMetadata, includeValues: false }),
        "query"
      );

      return (response.matches ?? [])
        .map((match) => ({
          id: match.id,
          score: match.score ?? 0,
          metadata: decodeMetadata(match.metadata),
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, topK);
    } catch (error) {
      logger.error("VectorStore.query failed", { error, topK });
      throw new IndexError(`Index query failed: ${describeError(error)}`, { cause: error });
    }
  }

  async listIds(prefix: string): Promise<string[]> {
    const ids: string[] = [];
    let paginationToken: string | undefined;

    try {
      do {
        const page = await this.call(
          this.index.listPaginated({ prefix, paginationToken }),
          "listPaginated"
        );
        for (const vector of page.vectors ?? []) {
          if (vector.id) ids.push(vector.id);
        }
        paginationToken = page.pagination?.next;
      } while (paginationToken);
    } catch (error) {
      logger.error("VectorStore.listIds failed", { error, prefix });
      throw new IndexError(`Listing ids with prefix ${prefix} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    return ids;
  }

  async deleteIds(ids: string[]): Promise<number> {
    let deleted = 0;
    for (let i = 0; i < ids.length; i += RAG_CONFIG.DELETE_BATCH_SIZE) {
      const batch = ids.slice(i, i + RAG_CONFIG.DELETE_BATCH_SIZE);
      try {
        await this.call(this.index.deleteMany(batch), "deleteMany");
        deleted += batch.length;
      } catch (error) {
        logger.error("VectorStore.deleteIds failed", { error, deletedSoFar: deleted });
        throw new IndexError(`Deleting ${batch.length} records failed: ${describeError(error)}`, {
          cause: error,
        });
      }
    }

    logger.info("VectorStore.deleteIds completed", { deleted });
    return deleted;
  }

  private call<T>(work: Promise<T>, operation: string): Promise<T> {
    return withTimeout(work, this.config.timeoutMs, `Pinecone.${operation}`);
  }
}

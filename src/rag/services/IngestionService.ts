import path from "path";
import fg from "fast-glob";
import pLimit from "p-limit";
import logger from "../../logger";
import { sliceCodePoints } from "../../util/codePoints";
import type { ChunkingConfig, IngestionConfig } from "../../config/appConfig";
import { ConfigurationError, describeError, ExtractionError } from "../errors";
import {
  EmbeddingIntent,
  RAG_CONFIG,
  type BatchFailure,
  type ChunkFailure,
  type DocumentReport,
  type IndexRecord,
  type IngestionOptions,
  type IngestionSummary,
  type TextChunk,
} from "../types/rag.types";
import type { Embedder } from "./EmbeddingService";
import type { DocumentExtractor } from "./PDFProcessor";
import { TextChunker, validateChunkingParameters } from "./TextChunker";
import type { VectorStore } from "./VectorStore";

export type DocumentFinder = (pattern: string) => Promise<string[]>;

export const findDocuments: DocumentFinder = async (pattern) =>
  (await fg(pattern, { onlyFiles: true, absolute: true })).sort();

export const documentIdFor = (filename: string): string => path.parse(filename).name;

export const recordIdFor = (documentId: string, chunkIndex: number): string =>
  `${documentId}-chunk-${chunkIndex}`;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

interface DocumentResult {
  report: DocumentReport;
  chunkFailures: ChunkFailure[];
  batchFailures: BatchFailure[];
}

export class IngestionService {
  constructor(
    private readonly extractor: DocumentExtractor,
    private readonly chunker: TextChunker,
    private readonly embedder: Embedder,
    private readonly vectorStore: VectorStore,
    private readonly chunking: ChunkingConfig,
    private readonly config: IngestionConfig,
    private readonly finder: DocumentFinder = findDocuments
  ) {}

  /**
   * Extracts, chunks, embeds and upserts every document matching
   * `documentPattern`. Failures are isolated per document, chunk and batch;
   * only a ConfigurationError aborts the run.
   */
  async ingest(documentPattern: string, options: IngestionOptions = {}): Promise<IngestionSummary> {
    const startTime = Date.now();
    const maxTokens = options.maxChunkTokens ?? this.chunking.maxTokens;
    const overlapTokens = options.overlapTokens ?? this.chunking.overlapTokens;
    validateChunkingParameters(maxTokens, overlapTokens);

    const files = await this.finder(documentPattern);
    if (files.length === 0) {
      logger.warn("IngestionService.ingest found no documents", { documentPattern });
    } else {
      logger.info("IngestionService.ingest started", {
        documentPattern,
        documents: files.length,
        maxTokens,
        overlapTokens,
      });
    }

    const limit = pLimit(this.config.concurrency);
    const results = await Promise.all(
      files.map((file) =>
        limit(() =>
          this.ingestDocument(file, maxTokens, overlapTokens, options.pruneStale ?? false).catch(
            (error: unknown) => {
              if (error instanceof ConfigurationError) limit.clearQueue();
              throw error;
            }
          )
        )
      )
    );

    const documents = results.map((r) => r.report);
    const summary: IngestionSummary = {
      documentsFound: files.length,
      documentsProcessed: documents.filter((d) => d.status === "upserted").length,
      documentsSkipped: documents.flatMap((d) =>
        d.skipReason ? [{ source: d.source, reason: d.skipReason, error: d.error }] : []
      ),
      chunksCreated: documents.reduce((sum, d) => sum + d.chunksCreated, 0),
      recordsUpserted: documents.reduce((sum, d) => sum + d.recordsUpserted, 0),
      recordsPruned: documents.reduce((sum, d) => sum + d.recordsPruned, 0),
      chunkFailures: results.flatMap((r) => r.chunkFailures),
      batchFailures: results.flatMap((r) => r.batchFailures),
      documents,
      processingTimeMs: Date.now() - startTime,
    };

    logger.info("IngestionService.ingest completed", {
      documentsFound: summary.documentsFound,
      documentsProcessed: summary.documentsProcessed,
      documentsSkipped: summary.documentsSkipped.length,
      chunksCreated: summary.chunksCreated,
      recordsUpserted: summary.recordsUpserted,
      chunkFailures: summary.chunkFailures.length,
      batchFailures: summary.batchFailures.length,
      processingTimeMs: summary.processingTimeMs,
    });

    return summary;
  }

  private async ingestDocument(
    file: string,
    maxTokens: number,
    overlapTokens: number,
    pruneStale: boolean
  ): Promise<DocumentResult> {
    const source = path.basename(file);
    const documentId = documentIdFor(source);
    const report: DocumentReport = {
      source,
      status: "discovered",
      chunksCreated: 0,
      recordsUpserted: 0,
      recordIds: [],
      recordsPruned: 0,
    };
    const result: DocumentResult = { report, chunkFailures: [], batchFailures: [] };

    try {
      let text: string;
      try {
        text = await this.extractor.extract(file);
      } catch (error) {
        report.status = "failed";
        report.skipReason = error instanceof ExtractionError ? "extraction_failed" : "unexpected_error";
        report.error = describeError(error);
        logger.warn("IngestionService skipped document: extraction failed", { source, error });
        return result;
      }
      report.status = "extracted";

      if (!text) {
        report.status = "failed";
        report.skipReason = "empty_text";
        logger.warn("IngestionService skipped document: no text extracted", { source });
        return result;
      }

      const chunks = this.chunker.chunk(text, documentId, maxTokens, overlapTokens);
      report.status = "chunked";
      report.chunksCreated = chunks.length;
      logger.info("IngestionService chunked document", { source, chunks: chunks.length });

      const records = await this.embedChunks(source, chunks, result);
      if (records.length === 0) {
        report.status = "failed";
        report.skipReason = "no_embeddings";
        report.error = "every chunk failed to embed";
        return result;
      }
      report.status = "embedded";

      const batches = await this.vectorStore.upsert(records);
      let offset = 0;
      for (const batch of batches) {
        const written = records.slice(offset, offset + batch.size);
        offset += batch.size;
        if (batch.ok) {
          report.recordIds.push(...written.map((r) => r.id));
        } else {
          result.batchFailures.push({
            source,
            batchIndex: batch.batchIndex,
            size: batch.size,
            error: batch.error.message,
          });
        }
      }
      report.recordsUpserted = report.recordIds.length;
      if (report.recordsUpserted === 0) {
        report.status = "failed";
        report.skipReason = "upsert_failed";
        report.error = "every upsert batch failed";
        return result;
      }
      report.status = "upserted";

      const complete = result.chunkFailures.length === 0 && result.batchFailures.length === 0;
      if (pruneStale && complete) {
        try {
          report.recordsPruned = await this.pruneStaleRecords(documentId, chunks.length);
        } catch (error) {
          report.error = `pruning stale records failed: ${describeError(error)}`;
          logger.warn("IngestionService pruning failed", { source, error });
        }
      }

      return result;
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      report.status = "failed";
      report.skipReason = "unexpected_error";
      report.error = describeError(error);
      logger.error("IngestionService.ingestDocument failed", { source, error });
      return result;
    }
  }

  private async embedChunks(
    source: string,
    chunks: TextChunk[],
    result: DocumentResult
  ): Promise<IndexRecord[]> {
    const outcomes = await this.embedder.embedEach(
      chunks.map((c) => c.text),
      EmbeddingIntent.Document
    );

    const records: IndexRecord[] = [];
    for (const outcome of outcomes) {
      const chunk = chunks[outcome.index];
      if (!chunk) continue;

      if (!outcome.ok) {
        result.chunkFailures.push({
          source,
          chunkIndex: chunk.sequenceIndex,
          error: outcome.error.message,
        });
        logger.warn("IngestionService chunk embedding failed", {
          source,
          chunkIndex: chunk.sequenceIndex,
          error: outcome.error,
        });
        continue;
      }

      records.push({
        id: recordIdFor(chunk.documentId, chunk.sequenceIndex),
        values: outcome.vector,
        metadata: {
          source,
          chunk_index: chunk.sequenceIndex,
          total_chunks: chunks.length,
          content_preview: sliceCodePoints(chunk.text, RAG_CONFIG.PREVIEW_LENGTH),
          type: this.config.recordType,
          char_count: chunk.charCount,
        },
      });
    }

    return records;
  }

  /**
   * Deletes records left behind by an earlier run that produced more chunks.
   */
  private async pruneStaleRecords(documentId: string, totalChunks: number): Promise<number> {
    const prefix = `${documentId}-chunk-`;
    const pattern = new RegExp(`^${escapeRegExp(prefix)}(\\d+)$`);

    const stale = (await this.vectorStore.listIds(prefix)).filter((id) => {
      const match = pattern.exec(id);
      return match?.[1] !== undefined && Number(match[1]) >= totalChunks;
    });
    if (stale.length === 0) return 0;

    logger.info("IngestionService pruning stale records", { documentId, stale: stale.length });
    return this.vectorStore.deleteIds(stale);
  }

  /**
   * Deletes every record of one document. Returns the number removed.
   */
  async removeDocument(filename: string): Promise<number> {
    const documentId = documentIdFor(path.basename(filename));
    const pattern = new RegExp(`^${escapeRegExp(documentId)}-chunk-\\d+$`);
    const ids = (await this.vectorStore.listIds(`${documentId}-chunk-`)).filter((id) =>
      pattern.test(id)
    );

    const deleted = ids.length > 0 ? await this.vectorStore.deleteIds(ids) : 0;
    logger.info("IngestionService.removeDocument completed", { documentId, deleted });
    return deleted;
  }
}

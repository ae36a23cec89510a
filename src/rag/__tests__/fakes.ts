import type { AppConfig } from "../../config/appConfig";
import { EmbeddingError, ExtractionError } from "../errors";
import type { EmbeddingOutcome, Embedder } from "../services/EmbeddingService";
import type { DocumentExtractor } from "../services/PDFProcessor";
import type { Tokenizer } from "../services/Tokenizer";
import type { PineconeIndexApi } from "../services/VectorStore";
import type { EmbeddingIntent, IndexRecord } from "../types/rag.types";

export const DIMENSIONS = 4;

export const testConfig = (): AppConfig => ({
  embedding: {
    apiKey: "test-cohere-key",
    model: "embed-english-v3.0",
    dimensions: DIMENSIONS,
    batchSize: 3,
    maxRetries: 0,
    timeoutMs: 1000,
  },
  index: {
    apiKey: "test-pinecone-key",
    indexName: "policy-faq-test",
    dimensions: DIMENSIONS,
    upsertBatchSize: 2,
    upsertConcurrency: 2,
    timeoutMs: 1000,
  },
  chunking: { maxTokens: 8, overlapTokens: 2 },
  ingestion: { concurrency: 2, recordType: "policy" },
  retrieval: { defaultTopK: 3 },
  agent: { apiKey: "test-openai-key", model: "gpt-4o", maxToolRounds: 3 },
  http: { port: 0, allowedOrigins: ["https://faq.example.test"] },
});

/** One token per whitespace-separated word; token ids index into `vocabulary`. */
export class WordTokenizer implements Tokenizer {
  private readonly vocabulary: string[] = [];

  encode(text: string): number[] {
    return text
      .split(/\s+/)
      .filter((word) => word.length > 0)
      .map((word) => {
        const existing = this.vocabulary.indexOf(word);
        if (existing !== -1) return existing;
        this.vocabulary.push(word);
        return this.vocabulary.length - 1;
      });
  }

  decode(tokens: number[]): string {
    return tokens.map((token) => this.vocabulary[token] ?? "").join(" ");
  }
}

/**
 * Deterministic 4-dimensional vectors: the last component carries the intent,
 * so document and query embeddings of the same text differ.
 */
export const fakeVector = (text: string, intent: EmbeddingIntent): number[] => [
  text.length % 11,
  (text.match(/refund/gi) ?? []).length,
  (text.match(/deliver/gi) ?? []).length,
  intent === "search_query" ? 1 : 0,
];

export class FakeEmbedder implements Embedder {
  readonly calls: Array<{ texts: string[]; intent: EmbeddingIntent }> = [];
  failOn: (text: string) => boolean = () => false;
  vectorFor: (text: string, intent: EmbeddingIntent) => number[] = fakeVector;

  async embed(texts: string[], intent: EmbeddingIntent): Promise<number[][]> {
    this.calls.push({ texts, intent });
    return texts.map((text, index) => {
      if (this.failOn(text)) throw new EmbeddingError("embedding service unavailable", { inputIndex: index });
      return this.vectorFor(text, intent);
    });
  }

  async embedEach(texts: string[], intent: EmbeddingIntent): Promise<EmbeddingOutcome[]> {
    this.calls.push({ texts, intent });
    return texts.map((text, index): EmbeddingOutcome =>
      this.failOn(text)
        ? {
            index,
            ok: false,
            error: new EmbeddingError("embedding service unavailable", { inputIndex: index }),
          }
        : { index, ok: true, vector: this.vectorFor(text, intent) }
    );
  }
}

export class FakePineconeIndex implements PineconeIndexApi {
  readonly records = new Map<string, IndexRecord>();
  readonly upsertCalls: IndexRecord[][] = [];
  readonly queries: Array<{ vector: number[]; topK: number }> = [];
  readonly deleted: string[] = [];
  dimension = DIMENSIONS;
  failUpsert: (batch: IndexRecord[], call: number) => boolean = () => false;
  failQuery = false;
  failDescribe = false;
  pageSize = 100;

  async upsert(records: IndexRecord[]): Promise<void> {
    this.upsertCalls.push(records);
    if (this.failUpsert(records, this.upsertCalls.length - 1)) {
      throw new Error("503 Service Unavailable");
    }
    for (const record of records) this.records.set(record.id, record);
  }

  async query(options: { vector: number[]; topK: number }) {
    this.queries.push({ vector: options.vector, topK: options.topK });
    if (this.failQuery) throw new Error("index unreachable");

    const matches = [...this.records.values()]
      .map((record) => ({
        id: record.id,
        score: record.values.reduce((sum, value, i) => sum + value * (options.vector[i] ?? 0), 0),
        metadata: { ...record.metadata },
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, options.topK);

    return { matches };
  }

  async describeIndexStats() {
    if (this.failDescribe) throw new Error("index stats unavailable");
    return { dimension: this.dimension };
  }

  async listPaginated(options: { prefix: string; paginationToken?: string }) {
    const ids = [...this.records.keys()].filter((id) => id.startsWith(options.prefix)).sort();
    const start = Number(options.paginationToken ?? "0");
    const end = start + this.pageSize;
    return {
      vectors: ids.slice(start, end).map((id) => ({ id })),
      pagination: end < ids.length ? { next: String(end) } : undefined,
    };
  }

  async deleteMany(ids: string[]): Promise<void> {
    for (const id of ids) {
      this.records.delete(id);
      this.deleted.push(id);
    }
  }
}

export class FakeExtractor implements DocumentExtractor {
  readonly extracted: string[] = [];

  constructor(private readonly documents: Record<string, string | Error>) {}

  async extract(path: string): Promise<string> {
    this.extracted.push(path);
    const entry = Object.entries(this.documents).find(([name]) => path.endsWith(name));
    if (!entry) throw new ExtractionError(path, "no such document");
    const [, content] = entry;
    if (content instanceof Error) throw new ExtractionError(path, content.message, { cause: content });
    return content;
  }
}

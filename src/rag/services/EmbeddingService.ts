import logger from "../../logger";
import type { EmbeddingConfig } from "../../config/appConfig";
import { describeError, EmbeddingError } from "../errors";
import type { EmbeddingIntent } from "../types/rag.types";

export interface CohereEmbedRequest {
  texts: string[];
  model: string;
  inputType: EmbeddingIntent;
  embeddingTypes: Array<"float">;
}

export type CohereEmbedResponse =
  | { responseType: "embeddings_floats"; embeddings: number[][] }
  | { responseType: "embeddings_by_type"; embeddings: { float?: number[][] } };

/**
 * The slice of CohereClient this service calls.
 */
export interface CohereEmbedApi {
  embed(
    request: CohereEmbedRequest,
    requestOptions?: { timeoutInSeconds?: number; maxRetries?: number }
  ): Promise<CohereEmbedResponse>;
}

export interface Embedder {
  embed(texts: string[], intent: EmbeddingIntent): Promise<number[][]>;
  embedEach(texts: string[], intent: EmbeddingIntent): Promise<EmbeddingOutcome[]>;
}

export type EmbeddingOutcome =
  | { index: number; ok: true; vector: number[] }
  | { index: number; ok: false; error: EmbeddingError };

const decodeVectors = (response: CohereEmbedResponse): number[][] | undefined => {
  switch (response.responseType) {
    case "embeddings_floats":
      return response.embeddings;
    case "embeddings_by_type":
      return response.embeddings.float;
  }
};

export class EmbeddingService implements Embedder {
  constructor(
    private readonly config: EmbeddingConfig,
    private readonly cohere: CohereEmbedApi
  ) {}

  /**
   * One vector per text, in input order. Texts are sent in batches of
   * `config.batchSize`; any failed batch fails the whole call.
   */
  async embed(texts: string[], intent: EmbeddingIntent): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.config.batchSize) {
      const batch = texts.slice(start, start + this.config.batchSize);
      vectors.push(...(await this.embedBatch(batch, intent, start)));
    }
    return vectors;
  }

  /**
   * Like embed(), but a failure only costs the texts that caused it: a batch
   * that fails is re-sent one text at a time.
   */
  async embedEach(texts: string[], intent: EmbeddingIntent): Promise<EmbeddingOutcome[]> {
    const outcomes: EmbeddingOutcome[] = [];

    for (let start = 0; start < texts.length; start += this.config.batchSize) {
      const batch = texts.slice(start, start + this.config.batchSize);
      try {
        const vectors = await this.embedBatch(batch, intent, start);
        vectors.forEach((vector, offset) =>
          outcomes.push({ index: start + offset, ok: true, vector })
        );
        continue;
      } catch (error) {
        if (batch.length === 1) {
          outcomes.push({ index: start, ok: false, error: this.asEmbeddingError(error, start) });
          continue;
        }
        logger.warn("EmbeddingService.embedEach batch failed, retrying texts one by one", {
          batchStart: start,
          batchSize: batch.length,
          error,
        });
      }

      for (let offset = 0; offset < batch.length; offset++) {
        const index = start + offset;
        try {
          const [vector] = await this.embedBatch(batch.slice(offset, offset + 1), intent, index);
          if (!vector) throw new EmbeddingError("No embedding returned", { inputIndex: index });
          outcomes.push({ index, ok: true, vector });
        } catch (error) {
          outcomes.push({ index, ok: false, error: this.asEmbeddingError(error, index) });
        }
      }
    }

    return outcomes;
  }

  private async embedBatch(
    texts: string[],
    intent: EmbeddingIntent,
    offset: number
  ): Promise<number[][]> {
    const inputIndex = texts.length === 1 ? offset : undefined;

    let response: CohereEmbedResponse;
    try {
      response = await this.cohere.embed(
        {
          texts,
          model: this.config.model,
          inputType: intent,
          embeddingTypes: ["float"],
        },
        {
          timeoutInSeconds: this.config.timeoutMs / 1000,
          maxRetries: this.config.maxRetries,
        }
      );
    } catch (error) {
      logger.error("EmbeddingService.embedBatch failed", {
        error,
        intent,
        offset,
        size: texts.length,
      });
      throw new EmbeddingError(`Embedding request failed: ${describeError(error)}`, {
        cause: error,
        inputIndex,
      });
    }

    const vectors = decodeVectors(response);
    if (!vectors || vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Expected ${texts.length} embeddings, received ${vectors?.length ?? 0}`,
        { inputIndex }
      );
    }
    return vectors;
  }

  private asEmbeddingError(error: unknown, inputIndex: number): EmbeddingError {
    if (error instanceof EmbeddingError && error.inputIndex === inputIndex) return error;
    return new EmbeddingError(describeError(error), { cause: error, inputIndex });
  }
}

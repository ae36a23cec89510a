import { codePointLength } from "../../util/codePoints";
import { ConfigurationError } from "../errors";
import type { TextChunk } from "../types/rag.types";
import type { Tokenizer } from "./Tokenizer";

export interface TokenWindow {
  start: number;
  end: number;
  tokens: number[];
}

export function validateChunkingParameters(maxTokens: number, overlapTokens: number): void {
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new ConfigurationError(`maxTokens must be a positive integer (got ${maxTokens})`);
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
    throw new ConfigurationError(`overlapTokens must be a non-negative integer (got ${overlapTokens})`);
  }
  if (overlapTokens >= maxTokens) {
    throw new ConfigurationError(
      `overlapTokens (${overlapTokens}) must be smaller than maxTokens (${maxTokens})`
    );
  }
}

/**
 * Sliding windows over a token stream. Each window starts
 * `maxTokens - overlapTokens` after the previous one; the last window is the
 * first one that reaches the end of the stream.
 */
export function tokenWindows(
  tokens: number[],
  maxTokens: number,
  overlapTokens: number
): TokenWindow[] {
  validateChunkingParameters(maxTokens, overlapTokens);

  const step = maxTokens - overlapTokens;
  const windows: TokenWindow[] = [];

  for (let start = 0; start < tokens.length; start += step) {
    const end = Math.min(start + maxTokens, tokens.length);
    windows.push({ start, end, tokens: tokens.slice(start, end) });
    if (end === tokens.length) break;
  }

  return windows;
}

export function expectedChunkCount(
  totalTokens: number,
  maxTokens: number,
  overlapTokens: number
): number {
  if (totalTokens === 0) return 0;
  if (totalTokens <= overlapTokens) return 1;
  return Math.ceil((totalTokens - overlapTokens) / (maxTokens - overlapTokens));
}

export class TextChunker {
  constructor(private readonly tokenizer: Tokenizer) {}

  chunk(
    text: string,
    documentId: string,
    maxTokens: number,
    overlapTokens: number
  ): TextChunk[] {
    validateChunkingParameters(maxTokens, overlapTokens);
    if (!text) return [];

    const tokens = this.tokenizer.encode(text);

    return tokenWindows(tokens, maxTokens, overlapTokens).map((window, sequenceIndex) => {
      const chunkText = this.tokenizer.decode(window.tokens);
      return {
        documentId,
        sequenceIndex,
        text: chunkText,
        charCount: codePointLength(chunkText),
        tokenStart: window.start,
        tokenEnd: window.end,
      };
    });
  }
}

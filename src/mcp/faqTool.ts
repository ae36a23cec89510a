import { z } from "zod";
import logger from "../logger";
import { describeError } from "../rag/errors";
import type { RetrievalService } from "../rag/services/RetrievalService";
import type { SearchResult } from "../rag/types/rag.types";

export const SEARCH_FAQ_TOOL = "search_faq";

export const SEARCH_FAQ_DESCRIPTION =
  "Search uploaded policy PDFs (via Cohere embeddings) for answers to questions.";

export const searchFaqInput = {
  query: z.string().describe("Question or text to search for in company policies."),
};

export interface TextToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

const text = (value: string, isError = false): TextToolResult => ({
  content: [{ type: "text", text: value }],
  ...(isError ? { isError } : {}),
});

export const formatSearchResults = (results: SearchResult[]): string => {
  if (results.length === 0) return "No results found.";

  return results
    .map(
      (result) =>
        `Score: ${result.score.toFixed(4)}\n` +
        `Source: ${result.source}\n` +
        `Preview: ${result.content}\n`
    )
    .join("\n---\n");
};

export const handleSearchFaq = async (
  retrieval: RetrievalService,
  query: string,
  topK: number
): Promise<TextToolResult> => {
  if (!query.trim()) return text("Error: Missing 'query' parameter", true);

  try {
    const results = await retrieval.search(query, topK);
    return text(formatSearchResults(results));
  } catch (error) {
    logger.warn(`${SEARCH_FAQ_TOOL} tool call failed`, { error });
    return text(`Error: ${describeError(error)}`, true);
  }
};

import express from "express";
import { z } from "zod";
import logger from "../logger";
import { EmbeddingError, IndexError, isRagError, ValidationError } from "../rag/errors";
import type { RetrievalService } from "../rag/services/RetrievalService";

const searchBodySchema = z.object({
  query: z.string(),
  top_k: z.number().int().positive().optional(),
});

export const statusForError = (error: unknown): number => {
  if (error instanceof ValidationError) return 400;
  if (error instanceof EmbeddingError || error instanceof IndexError) return 502;
  return 500;
};

const errorBody = (error: unknown) =>
  isRagError(error)
    ? { success: false, error: error.message, code: error.code }
    : { success: false, error: "Internal server error", code: "INTERNAL_ERROR" };

export const createSearchRouter = (retrieval: RetrievalService): express.Router => {
  const router = express.Router();

  router.get("/", (_req, res) => {
    res.json({
      service: "policy-faq-search",
      description: "Semantic search over ingested policy documents",
      endpoints: {
        "GET /health": "liveness check",
        "POST /search": "body { query: string, top_k?: integer }",
      },
    });
  });

  router.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  router.post("/search", async (req, res) => {
    const parsed = searchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return res.status(400).json({
        success: false,
        error: issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid request body",
        code: "VALIDATION_ERROR",
      });
    }

    try {
      const { query, top_k } = parsed.data;
      const results = await retrieval.search(query, top_k ?? retrieval.defaultTopK);
      return res.json(results);
    } catch (error) {
      const status = statusForError(error);
      if (status === 500) logger.error("POST /search failed", { error });
      return res.status(status).json(errorBody(error));
    }
  });

  return router;
};

import express, { type ErrorRequestHandler } from "express";
import type { HttpConfig } from "../config/appConfig";
import logger from "../logger";
import { createCorsMiddleware } from "../middleware/cors";
import { describeError } from "../rag/errors";
import type { RetrievalService } from "../rag/services/RetrievalService";
import { createSearchRouter } from "./searchRouter";

// body-parser errors carry an http-errors `status`
const clientErrorStatus = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
};

const jsonErrorHandler: ErrorRequestHandler = (error, _req, res, _next) => {
  if (error instanceof SyntaxError) {
    res.status(400).json({ success: false, error: "Malformed JSON body", code: "VALIDATION_ERROR" });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    logger.warn("Rejected request body", { status, error });
    res.status(status).json({ success: false, error: describeError(error), code: "BAD_REQUEST" });
    return;
  }

  logger.error("Unhandled request error", { error });
  res.status(500).json({ success: false, error: "Internal server error", code: "INTERNAL_ERROR" });
};

export const createApp = (retrieval: RetrievalService, config: HttpConfig): express.Express => {
  const app = express();

  app.use(createCorsMiddleware(config.allowedOrigins));
  app.use(express.json());
  app.use(createSearchRouter(retrieval));
  app.use(jsonErrorHandler);

  return app;
};

import cors from "cors";
import logger from "../logger";

/**
 * Only origins in `allowedOrigins` get CORS headers; list "*" to allow any.
 * Requests without an Origin header (curl, server-to-server) pass through.
 */
export const createCorsMiddleware = (allowedOrigins: string[]) => {
  const allowAll = allowedOrigins.includes("*");
  const allowList = new Set(allowedOrigins);

  return cors({
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    optionsSuccessStatus: 204,

    origin(origin, callback) {
      if (!origin || allowAll || allowList.has(origin)) {
        return callback(null, true);
      }

      logger.warn(`Blocked by CORS: ${origin}`);
      return callback(null, false);
    },
  });
};

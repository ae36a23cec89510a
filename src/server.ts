import { createServer } from "http";
import { loadDotenv, NODE_ENV } from "./env/detector";
import { describeConfig, loadAppConfig } from "./config/appConfig";
import logger from "./logger";
import { createRagServices } from "./rag";
import { describeError } from "./rag/errors";
import { createApp } from "./routers";

const loadedEnvFile = loadDotenv();

try {
  const config = loadAppConfig();

  logger.info(
    `Env initialized: NODE_ENV=${NODE_ENV}` +
      (loadedEnvFile ? `, file=${loadedEnvFile}` : ", file=<process env / .env>")
  );
  logger.info("Configuration loaded", describeConfig(config));
  logger.info(`CORS allowlist: ${config.http.allowedOrigins.join(", ") || "<empty>"}`);

  const { retrieval } = createRagServices(config);
  const httpServer = createServer(createApp(retrieval, config.http));

  httpServer.keepAliveTimeout = 65_000;
  httpServer.headersTimeout = 66_000;

  httpServer.listen(config.http.port, () => {
    logger.info(`FAQ search API listening on http://localhost:${config.http.port}`);
  });

  const shutdown = () => {
    logger.info("Shutting down server...");
    httpServer.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
} catch (error) {
  logger.error(`Server failed to start: ${describeError(error)}`);
  process.exit(1);
}

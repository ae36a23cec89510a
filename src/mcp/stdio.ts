import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadDotenv } from "../env/detector";
import { describeConfig, loadAppConfig } from "../config/appConfig";
import logger from "../logger";
import { createRagServices } from "../rag";
import { describeError } from "../rag/errors";
import { createFaqMcpServer } from "./server";

loadDotenv();

const main = async () => {
  const config = loadAppConfig();
  const { retrieval } = createRagServices(config);
  const server = createFaqMcpServer(retrieval);

  await server.connect(new StdioServerTransport());
  logger.info("MCP server listening on stdio", describeConfig(config));

  const shutdown = () => {
    server
      .close()
      .catch((error: unknown) => logger.error("MCP server close failed", { error }))
      .finally(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
};

main().catch((error: unknown) => {
  logger.error(`MCP server failed to start: ${describeError(error)}`);
  process.exit(1);
});

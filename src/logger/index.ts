import { Logger } from "winston";
import developmentLogger from "./developmentLogger";
import productionLogger from "./productionLogger";
import { NODE_ENV, isProduction, isTest } from "../env/detector";

// Every level goes to stderr: stdout carries CLI output and the MCP stdio protocol.
let logger: Logger;

if (isProduction()) {
  logger = productionLogger();
} else {
  logger = developmentLogger();
}

logger.silent = isTest();

logger.debug(`Logger initialized for environment: ${NODE_ENV}`);

export default logger;

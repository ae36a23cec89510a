import { createLogger, format, Logger, transports } from "winston";
import { plainErrors } from "./formats";

const productionLogger = (): Logger => {
  const levels = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

  return createLogger({
    level: "info",
    format: format.combine(plainErrors(), format.timestamp(), format.json()),
    defaultMeta: { service: "policy-faq-search" },
    transports: [new transports.Console({ stderrLevels: levels })],
  });
};

export default productionLogger;

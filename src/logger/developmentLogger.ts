import { createLogger, format, Logger, transports } from "winston";
import { plainErrors } from "./formats";

const developmentLogger = (): Logger => {
  const levels = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

  return createLogger({
    level: "debug",
    format: format.combine(
      plainErrors(),
      format.colorize(),
      format.timestamp({ format: "HH:mm:ss" }),
      format.printf(({ level, message, timestamp, ...meta }) => {
        const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        return `${timestamp} ${level}: ${message}${extra}`;
      })
    ),
    transports: [new transports.Console({ stderrLevels: levels })],
  });
};

export default developmentLogger;

import logger from "../logger";
import { ConfigurationError } from "../rag/errors";

/**
 * Reads environment values. Call loadDotenv() first.
 */
export class EnvLoader {
  static get(key: string): string | undefined {
    const value = process.env[key];
    return value === "" ? undefined : value;
  }

  /**
   * Throws a ConfigurationError when the variable is unset or empty.
   */
  static getOrThrow(key: string): string {
    const value = process.env[key];
    if (!value) {
      logger.warn(`Missing environment variable ${key}`);
      throw new ConfigurationError(`Environment variable "${key}" is missing.`);
    }
    return value;
  }

  static getInt(key: string): number | undefined {
    const v = process.env[key];
    if (v == null || v === "") return undefined;
    const n = Number.parseInt(v, 10);
    return Number.isNaN(n) ? undefined : n;
  }

  /**
   * `fallback` when unset; a ConfigurationError when set to zero or less.
   */
  static getPositiveInt(key: string, fallback: number): number {
    const value = EnvLoader.getInt(key) ?? fallback;
    if (value <= 0) {
      throw new ConfigurationError(`Environment variable "${key}" must be a positive integer.`);
    }
    return value;
  }

  /**
   * Comma separated list, blanks dropped.
   */
  static getList(key: string): string[] {
    const v = process.env[key];
    if (!v) return [];
    return v
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
}

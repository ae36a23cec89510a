import { readFile } from "fs/promises";
import { PDFParse } from "pdf-parse";
import logger from "../../logger";
import { describeError, ExtractionError } from "../errors";

export interface DocumentExtractor {
  /** Plain text of the document at `path`, or "" when it has no text layer. */
  extract(path: string): Promise<string>;
}

export class PDFProcessor implements DocumentExtractor {
  async extract(path: string): Promise<string> {
    let buffer: Buffer;
    try {
      buffer = await readFile(path);
    } catch (error) {
      logger.error("PDFProcessor.extract read failed", { error, path });
      throw new ExtractionError(path, describeError(error), { cause: error });
    }

    try {
      return await this.extractTextFromBuffer(buffer);
    } catch (error) {
      logger.error("PDFProcessor.extract parse failed", { error, path });
      throw new ExtractionError(path, describeError(error), { cause: error });
    }
  }

  /** Text of every non-empty page, joined by newlines. */
  async extractTextFromBuffer(buffer: Buffer): Promise<string> {
    const parser = new PDFParse({ data: buffer });
    try {
      const result = await parser.getText();
      return result.pages
        .map((page) => page.text)
        .filter((pageText) => pageText.length > 0)
        .join("\n")
        .trim();
    } finally {
      try {
        await parser.destroy();
      } catch (destroyError) {
        logger.warn("PDFProcessor.extractTextFromBuffer destroy failed", {
          error: destroyError,
        });
      }
    }
  }
}

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { ExtractionError } from "../../errors";
import { PDFProcessor } from "../PDFProcessor";

interface ParserState {
  pages: string[];
  failWith?: Error;
  received: Uint8Array[];
  destroyed: number;
}

const parserState = vi.hoisted(() => {
  const state: ParserState = { pages: [], received: [], destroyed: 0 };
  return state;
});

vi.mock("pdf-parse", () => ({
  PDFParse: class {
    constructor(options: { data: Uint8Array }) {
      parserState.received.push(options.data);
    }

    async getText() {
      if (parserState.failWith) throw parserState.failWith;
      return {
        text: parserState.pages.join("\n\n"),
        total: parserState.pages.length,
        pages: parserState.pages.map((text, i) => ({ text, num: i + 1 })),
      };
    }

    async destroy() {
      parserState.destroyed += 1;
    }
  },
}));

let dataDir: string;

beforeEach(async () => {
  dataDir = await mkdtemp(path.join(tmpdir(), "pdf-processor-"));
  parserState.pages = [];
  parserState.failWith = undefined;
  parserState.received = [];
  parserState.destroyed = 0;
});

afterEach(async () => {
  await rm(dataDir, { recursive: true, force: true });
});

const writeDocument = async (name: string) => {
  const filePath = path.join(dataDir, name);
  await writeFile(filePath, "%PDF-1.4 placeholder");
  return filePath;
};

describe("PDFProcessor.extract", () => {
  it("joins pages in order with newlines and trims the result", async () => {
    parserState.pages = ["  Refund policy", "", "Refunds are processed within 14 days.\n\n"];
    const filePath = await writeDocument("refunds.pdf");

    const text = await new PDFProcessor().extract(filePath);

    expect(text).toBe("Refund policy\nRefunds are processed within 14 days.");
    expect(Buffer.from(parserState.received[0] ?? []).toString()).toBe("%PDF-1.4 placeholder");
    expect(parserState.destroyed).toBe(1);
  });

  it("returns an empty string for a document without a text layer", async () => {
    parserState.pages = ["", "  "];
    const filePath = await writeDocument("scan.pdf");

    await expect(new PDFProcessor().extract(filePath)).resolves.toBe("");
  });

  it("reports an unreadable path as an ExtractionError", async () => {
    const missing = path.join(dataDir, "missing.pdf");

    const failure = await new PDFProcessor().extract(missing).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ExtractionError);
    expect(failure).toMatchObject({ code: "EXTRACTION_ERROR", path: missing });
    expect(parserState.received).toHaveLength(0);
  });

  it("wraps parser failures and still releases the parser", async () => {
    parserState.failWith = new Error("Invalid PDF structure");
    const filePath = await writeDocument("corrupt.pdf");

    await expect(new PDFProcessor().extract(filePath)).rejects.toThrow(
      `Failed to extract text from ${filePath}: Invalid PDF structure`
    );
    expect(parserState.destroyed).toBe(1);
  });
});

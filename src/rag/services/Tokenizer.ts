import { getEncoding, type Tiktoken, type TiktokenEncoding } from "js-tiktoken";
import { RAG_CONFIG } from "../types/rag.types";

export interface Tokenizer {
  encode(text: string): number[];
  decode(tokens: number[]): string;
}

export class TiktokenTokenizer implements Tokenizer {
  private readonly encoding: Tiktoken;

  constructor(encodingName: TiktokenEncoding = RAG_CONFIG.TOKEN_ENCODING) {
    this.encoding = getEncoding(encodingName);
  }

  encode(text: string): number[] {
    // special-token markers inside documents are plain text
    return this.encoding.encode(text, [], []);
  }

  decode(tokens: number[]): string {
    return this.encoding.decode(tokens);
  }
}

import { TextDecoder, TextEncoder } from "node:util";
import type { Decoder } from "../types.js";

/**
 * Byte-level BPE vocabularies (GPT-2 and its descendants) store every
 * byte as a printable character: printable Latin-1 bytes stand for
 * themselves, the remaining 68 bytes are shifted to U+0100 and up in
 * byte order (space becomes "Ġ", newline "Ċ", tab "ĉ").
 */
function byteDecoderTable(): Map<string, number> {
  const printable = (from: string, to: string) => {
    const start = from.charCodeAt(0);
    return Array.from({ length: to.charCodeAt(0) - start + 1 }, (_, i) => start + i);
  };
  const direct = new Set([
    ...printable("!", "~"),
    ...printable("¡", "¬"),
    ...printable("®", "ÿ"),
  ]);

  const table = new Map<string, number>();
  let shifted = 0;
  for (let byte = 0; byte < 256; byte++) {
    if (direct.has(byte)) {
      table.set(String.fromCharCode(byte), byte);
    } else {
      table.set(String.fromCharCode(256 + shifted), byte);
      shifted++;
    }
  }
  return table;
}

/**
 * Decodes token ids by looking each one up in a byte-level BPE
 * vocabulary. The pieces are turned back into raw bytes and the whole
 * sequence is decoded as UTF-8 at once, so a character whose bytes are
 * split across tokens comes out whole. Invalid UTF-8 becomes U+FFFD.
 */
export class VocabularyDecoder implements Decoder {
  private vocabulary: readonly string[];
  private bytes: Map<string, number>;
  private utf8 = new TextDecoder("utf-8");
  private encoder = new TextEncoder();

  constructor(vocabulary: readonly string[]) {
    this.vocabulary = vocabulary;
    this.bytes = byteDecoderTable();
  }

  decode(tokens: readonly number[]): string {
    const out: number[] = [];
    for (const id of tokens) {
      const piece = this.vocabulary[id];
      if (piece === undefined) {
        throw new RangeError(
          `Token id ${id} is outside the vocabulary (size ${this.vocabulary.length})`
        );
      }
      for (const char of piece) {
        const byte = this.bytes.get(char);
        if (byte === undefined) {
          // not a byte-level symbol: keep the character as written
          out.push(...this.encoder.encode(char));
        } else {
          out.push(byte);
        }
      }
    }
    return this.utf8.decode(Uint8Array.from(out));
  }
}

import { describe, it, expect } from "vitest";
import { VocabularyDecoder } from "../src/decoder/index.js";

describe("VocabularyDecoder", () => {
  const decoder = new VocabularyDecoder(["The", "Ġcat", "Ġsat", ".", "Ċ"]);

  it("joins pieces and restores spaces and newlines", () => {
    expect(decoder.decode([0, 1, 2, 3, 4, 0])).toBe("The cat sat.\nThe");
  });

  it("maps every shifted byte back, not only spaces and newlines", () => {
    const bpe = new VocabularyDecoder(["Ġcaf", "Ã©", "ĠitâĢĻs", "ĉtab"]);
    expect(bpe.decode([0, 1, 2, 3])).toBe(" café it\u2019s\ttab");
  });

  it("joins a character whose bytes are split across tokens", () => {
    const bpe = new VocabularyDecoder(["Ġcaf", "Ã", "©"]);
    expect(bpe.decode([0, 1, 2])).toBe(" café");
    expect(bpe.decode([0, 1])).toBe(" caf\uFFFD");
  });

  it("keeps characters that are not byte-level symbols", () => {
    expect(new VocabularyDecoder(["日本"]).decode([0])).toBe("日本");
  });

  it("decodes an empty sequence to an empty string", () => {
    expect(decoder.decode([])).toBe("");
  });

  it("rejects ids outside the vocabulary", () => {
    expect(() => decoder.decode([0, 9])).toThrow(
      "Token id 9 is outside the vocabulary (size 5)"
    );
  });
});

import type { Decoder, RawExample } from "../src/types.js";

/**
 * Decodes every token id to `w{id}` and joins them with spaces, so a
 * test can tell exactly which raw example produced which sample.
 */
export const wordDecoder: Decoder = {
  decode: (tokens) => tokens.map((id) => `w${id}`).join(" "),
};

export function examples(...ids: number[]): RawExample[] {
  return ids.map((id) => ({ tokens: [id] }));
}

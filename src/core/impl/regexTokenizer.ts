import type { Term } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

const WORD = /[\p{L}\p{N}]+/gu;

/**
 * Language-agnostic tokenizer:
 * - lowercases
 * - yields every maximal run of Unicode letters/digits
 */
export class RegexTokenizer implements Tokenizer {
  tokenize(text: string, _options?: TokenizeOptions): Iterable<Term> {
    return text.toLowerCase().match(WORD) ?? [];
  }
}

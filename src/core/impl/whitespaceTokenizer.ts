import type { Term } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";
import { stripNonAlphanumeric } from "./text.js";

/** Last-resort tokenizer: whitespace split, each piece reduced to its letters/digits. */
export class WhitespaceTokenizer implements Tokenizer {
  *tokenize(text: string, _options?: TokenizeOptions): Iterable<Term> {
    for (const piece of text.toLowerCase().split(/\s+/)) {
      const term = stripNonAlphanumeric(piece);
      if (term.length) yield term;
    }
  }
}

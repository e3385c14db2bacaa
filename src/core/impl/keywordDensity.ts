import { type Outcome, InvalidArgumentError, assertText } from "../diagnostics.js";
import { DEFAULT_LANGUAGE } from "../languages.js";
import { countOccurrences } from "./text.js";
import type { TokenizerChain } from "./tokenizerChain.js";

/**
 * Keyword density in percent: literal, case-insensitive substring hits per 100 tokens.
 *
 * Matching ignores token boundaries ("seo" also hits "seos"), so a short keyword can
 * exceed 100 on a short text. An empty text gives 0 for every keyword.
 */
export class KeywordDensityScorer {
  constructor(private readonly tokenizer: TokenizerChain) {}

  density(text: string, keywords: readonly string[]): Outcome<Map<string, number>> {
    assertText(text, "text");
    const list: unknown = keywords;
    if (!Array.isArray(list)) throw new InvalidArgumentError("keywords", "must be an array");
    list.forEach((k: unknown, i) => assertText(k, `keywords[${i}]`));

    const { terms, diagnostics } = this.tokenizer.tokenize(text, DEFAULT_LANGUAGE);
    const total = terms.length;
    const lower = text.toLowerCase();

    const out = new Map<string, number>();
    for (const keyword of keywords) {
      const hits = countOccurrences(lower, keyword.toLowerCase());
      out.set(keyword, total > 0 ? (hits / total) * 100 : 0);
    }
    return { result: out, diagnostics };
  }
}

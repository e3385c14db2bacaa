import type { LanguageKey, Term } from "../types.js";
import type { TokenizeOutcome, TokenizerTier } from "../tokenizer.js";
import type { ResourceLoader } from "../resources.js";
import { type Diagnostic, type Logger, errorMessage } from "../diagnostics.js";
import { RegexTokenizer } from "./regexTokenizer.js";
import { SegmenterTokenizer } from "./segmenterTokenizer.js";
import { WhitespaceTokenizer } from "./whitespaceTokenizer.js";

/**
 * Runs tokenizer tiers in order until one succeeds.
 *
 * A tier's output is only accepted once it has been fully materialized, so a tier that
 * fails halfway through a document contributes nothing; the next tier starts over on
 * the whole text.
 */
export class TokenizerChain {
  constructor(
    private readonly tiers: TokenizerTier[],
    private readonly logger: Logger = console,
  ) {}

  tokenize(text: string, language: LanguageKey): TokenizeOutcome {
    const diagnostics: Diagnostic[] = [];

    for (let i = 0; i < this.tiers.length; i++) {
      const tier = this.tiers[i]!;
      let terms: Term[];
      try {
        terms = Array.from(tier.tokenizer.tokenize(text, { language }));
      } catch (e) {
        const next = this.tiers[i + 1]?.strategy ?? "nothing";
        const message = `${tier.strategy} tokenizer failed (${errorMessage(e)}); falling back to ${next}`;
        this.logger.warn(`[Tokenizer] ${message}`);
        diagnostics.push({ code: "RESOURCE_UNAVAILABLE", source: "tokenizer", message, language });
        continue;
      }
      return { terms, strategy: tier.strategy, diagnostics };
    }

    return { terms: [], strategy: null, diagnostics };
  }
}

/** linguistic -> regex -> whitespace */
export function createFullTokenizer(segmenters: ResourceLoader<Intl.Segmenter>, logger?: Logger): TokenizerChain {
  return new TokenizerChain(
    [
      { strategy: "linguistic", tokenizer: new SegmenterTokenizer(segmenters) },
      { strategy: "regex", tokenizer: new RegexTokenizer() },
      { strategy: "whitespace", tokenizer: new WhitespaceTokenizer() },
    ],
    logger,
  );
}

/** regex -> whitespace; for counting, where consistent boundaries matter more than linguistics. */
export function createBasicTokenizer(logger?: Logger): TokenizerChain {
  return new TokenizerChain(
    [
      { strategy: "regex", tokenizer: new RegexTokenizer() },
      { strategy: "whitespace", tokenizer: new WhitespaceTokenizer() },
    ],
    logger,
  );
}

import type { LanguageKey, Term } from "./types.js";
import type { Diagnostic } from "./diagnostics.js";

export interface TokenizeOptions {
  /** Language whose word-boundary rules apply; ignored by language-agnostic tokenizers. */
  language?: LanguageKey;
}

/**
 * Turns text into a stream of terms.
 *
 * Contract notes:
 * - lower-cases the input and emits only letters/digits-only terms
 * - should be deterministic for given input+options
 * - may throw (eagerly or while iterating) when a resource it needs is missing
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Term>;
}

export type TokenizerStrategy = "linguistic" | "regex" | "whitespace";

export interface TokenizerTier {
  strategy: TokenizerStrategy;
  tokenizer: Tokenizer;
}

export interface TokenizeOutcome {
  terms: Term[];
  /** Tier that produced `terms`; null when every tier failed. */
  strategy: TokenizerStrategy | null;
  diagnostics: Diagnostic[];
}

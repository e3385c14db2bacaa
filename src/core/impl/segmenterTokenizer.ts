import type { LanguageKey, Term } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";
import type { ResourceLoader } from "../resources.js";
import { ResourceUnavailableError } from "../diagnostics.js";
import { DEFAULT_LANGUAGE, resolveLanguage } from "../languages.js";
import { isAlphanumeric } from "./text.js";

/**
 * Builds a word segmenter for a language key. Known names map to their BCP 47 tag; anything
 * else is tried as a tag directly and must have locale data in the running ICU build.
 */
export function loadWordSegmenter(language: LanguageKey): Intl.Segmenter {
  const locale = resolveLanguage(language)?.locale ?? language;
  if (Intl.Segmenter.supportedLocalesOf([locale]).length === 0) {
    throw new ResourceUnavailableError("word segmenter", language, `no locale data for "${locale}"`);
  }
  return new Intl.Segmenter(locale, { granularity: "word" });
}

/**
 * Linguistic tokenizer on top of Intl.Segmenter:
 * - lowercases first
 * - keeps word-like segments made only of letters/digits (drops "don't", "3.14", punctuation)
 */
export class SegmenterTokenizer implements Tokenizer {
  constructor(private readonly segmenters: ResourceLoader<Intl.Segmenter>) {}

  *tokenize(text: string, options?: TokenizeOptions): Iterable<Term> {
    const segmenter = this.segmenters.getOrLoad(options?.language ?? DEFAULT_LANGUAGE);

    for (const s of segmenter.segment(text.toLowerCase())) {
      if (s.isWordLike && isAlphanumeric(s.segment)) yield s.segment;
    }
  }
}

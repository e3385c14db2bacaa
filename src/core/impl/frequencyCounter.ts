import type { FrequencyEntry, FrequencyTable, Term, WordStats } from "../types.js";
import type { TopKSelector } from "../selection.js";
import { byCountDesc } from "../selection.js";
import { type Outcome, assertText } from "../diagnostics.js";
import { DEFAULT_LANGUAGE } from "../languages.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import type { TokenizerChain } from "./tokenizerChain.js";

export const DEFAULT_TOP_N = 10;

/** Term -> count; the map's iteration order is first appearance. */
export function countTerms(terms: Iterable<Term>): Map<Term, number> {
  const counts = new Map<Term, number>();
  for (const t of terms) counts.set(t, (counts.get(t) ?? 0) + 1);
  return counts;
}

/** Top `n` by count, ties in first-appearance order. */
export function topTerms(
  counts: Map<Term, number>,
  n: number,
  selector: TopKSelector<FrequencyEntry> = new MinHeapTopKSelector(),
): FrequencyTable {
  const entries = Array.from(counts, ([term, count]) => ({ term, count }));
  return selector.topK(entries, n, byCountDesc);
}

export class FrequencyCounter {
  constructor(
    private readonly tokenizer: TokenizerChain,
    private readonly selector: TopKSelector<FrequencyEntry> = new MinHeapTopKSelector(),
  ) {}

  wordStats(text: string, topN: number = DEFAULT_TOP_N): Outcome<WordStats> {
    assertText(text, "text");
    const { terms, diagnostics } = this.tokenizer.tokenize(text, DEFAULT_LANGUAGE);
    const counts = countTerms(terms);

    return {
      result: {
        totalWords: terms.length,
        uniqueWords: counts.size,
        topFrequency: topTerms(counts, topN, this.selector),
      },
      diagnostics,
    };
  }
}

import type { FrequencyEntry, LanguageKey, SemanticSalience } from "../types.js";
import type { TopKSelector } from "../selection.js";
import { type Outcome, assertText } from "../diagnostics.js";
import { countTerms, DEFAULT_TOP_N, topTerms } from "./frequencyCounter.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import type { StopwordProvider } from "./stopwordProvider.js";
import type { TokenizerChain } from "./tokenizerChain.js";

export const EMPTY_SALIENCE: SemanticSalience = { uniqueMeaningfulCount: 0, topMeaningful: [] };

/** Most frequent tokens once the language's stopwords are removed. */
export class SemanticSalienceAnalyzer {
  constructor(
    private readonly tokenizer: TokenizerChain,
    private readonly stopwords: StopwordProvider,
    private readonly selector: TopKSelector<FrequencyEntry> = new MinHeapTopKSelector(),
  ) {}

  analyze(text: string, language: LanguageKey, topN: number = DEFAULT_TOP_N): Outcome<SemanticSalience> {
    assertText(text, "text");
    const stop = this.stopwords.stopwords(language);
    const tokens = this.tokenizer.tokenize(text, language);

    const meaningful = tokens.terms.filter((t) => !stop.result.has(t));
    const counts = countTerms(meaningful);

    return {
      result: {
        uniqueMeaningfulCount: counts.size,
        topMeaningful: topTerms(counts, topN, this.selector),
      },
      diagnostics: [...stop.diagnostics, ...tokens.diagnostics],
    };
  }
}

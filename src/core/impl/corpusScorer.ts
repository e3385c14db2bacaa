import type { LanguageKey, ScoreEntry, ScoreTable } from "../types.js";
import type { CorpusIndex } from "../corpusIndex.js";
import type { CorpusScoreOptions, DocumentScores, TermWeighting } from "../scorer.js";
import { byScoreDesc } from "../selection.js";
import { type Diagnostic, type Outcome, InvalidArgumentError, assertText } from "../diagnostics.js";
import { DEFAULT_LANGUAGE } from "../languages.js";
import { countTerms } from "./frequencyCounter.js";
import { MemoryCorpusIndex } from "./memoryCorpusIndex.js";
import type { TokenizerChain } from "./tokenizerChain.js";

/** count / length */
export const TERM_FREQUENCY: TermWeighting = {
  scheme: "tf-idf",
  weight: (count, docLength) => (docLength > 0 ? count / docLength : 0),
};

/** ln(1 + count) */
export const WITHIN_DOCUMENT_FREQUENCY: TermWeighting = {
  scheme: "wdf-idf",
  weight: (count) => (count > 0 ? Math.log(1 + count) : 0),
};

/**
 * ln(N / (df + smoothing)). With smoothing 1 this is negative for terms found in every
 * document and zero for terms found in all but one.
 */
export function inverseDocumentFrequency(docCount: number, df: number, smoothing: number): number {
  return Math.log(docCount / (df + smoothing));
}

/** Folds per-document tables in corpus order; a later document's score replaces an earlier one. */
export function mergeScores(perDocument: DocumentScores[]): ScoreTable {
  const merged = new Map<string, number>();
  for (const doc of perDocument) {
    for (const e of doc.scores) merged.set(e.term, e.score);
  }
  return sortScores(Array.from(merged, ([term, score]) => ({ term, score })));
}

function sortScores(entries: ScoreEntry[]): ScoreTable {
  // Array#sort is stable: equal scores stay in insertion order
  return entries.sort(byScoreDesc);
}

export function assertDocuments(documents: unknown): asserts documents is string[] {
  if (!Array.isArray(documents)) throw new InvalidArgumentError("documents", "must be an array");
  documents.forEach((d: unknown, i) => assertText(d, `documents[${i}]`));
}

/**
 * TF-IDF / WDF-IDF over a transient corpus:
 * - every document goes through the full tokenizer chain
 * - scores are computed per document for that document's distinct terms
 * - `tfIdf` / `wdfIdf` merge them into one table, later documents winning
 */
export class CorpusScorer {
  private readonly idfSmoothing: number;

  constructor(
    private readonly tokenizer: TokenizerChain,
    options: CorpusScoreOptions = {},
  ) {
    const smoothing = options.idfSmoothing ?? 1;
    if (!Number.isFinite(smoothing) || smoothing < 0) {
      throw new InvalidArgumentError("idfSmoothing", "must be a finite number >= 0");
    }
    this.idfSmoothing = smoothing;
  }

  buildIndex(documents: string[], language: LanguageKey = DEFAULT_LANGUAGE): Outcome<CorpusIndex> {
    assertDocuments(documents);
    const index = new MemoryCorpusIndex();
    const diagnostics: Diagnostic[] = [];

    for (const text of documents) {
      const tokens = this.tokenizer.tokenize(text, language);
      diagnostics.push(...tokens.diagnostics);
      index.addDocument(countTerms(tokens.terms), tokens.terms.length);
    }
    return { result: index, diagnostics };
  }

  scoreIndex(index: CorpusIndex, weighting: TermWeighting): DocumentScores[] {
    const { docCount } = index.getStats();
    const out: DocumentScores[] = [];

    for (const doc of index.documents()) {
      const scores: ScoreEntry[] = [];
      for (const [term, count] of doc.termCounts) {
        const idf = inverseDocumentFrequency(docCount, index.documentFrequency(term), this.idfSmoothing);
        const score = weighting.weight(count, doc.length) * idf;
        if (Number.isFinite(score)) scores.push({ term, score });
      }
      out.push({ docIndex: doc.docIndex, scores: sortScores(scores) });
    }
    return out;
  }

  scoreDocuments(documents: string[], weighting: TermWeighting, language?: LanguageKey): Outcome<DocumentScores[]> {
    const { result: index, diagnostics } = this.buildIndex(documents, language);
    return { result: this.scoreIndex(index, weighting), diagnostics };
  }

  score(documents: string[], weighting: TermWeighting, language?: LanguageKey): Outcome<ScoreTable> {
    const { result, diagnostics } = this.scoreDocuments(documents, weighting, language);
    return { result: mergeScores(result), diagnostics };
  }

  tfIdf(documents: string[], language?: LanguageKey): Outcome<ScoreTable> {
    return this.score(documents, TERM_FREQUENCY, language);
  }

  wdfIdf(documents: string[], language?: LanguageKey): Outcome<ScoreTable> {
    return this.score(documents, WITHIN_DOCUMENT_FREQUENCY, language);
  }
}

import type { Term } from "./types.js";

export interface IndexedDocument {
  /** 0-based position of the document in the corpus. */
  docIndex: number;
  /** Token count. */
  length: number;
  /** Term -> count, in first-appearance order. */
  termCounts: Map<Term, number>;
}

export interface CorpusStats {
  docCount: number;
}

/**
 * Document-frequency index over one transient corpus.
 *
 * Contract notes:
 * - documents are added in corpus order and iterated back in that order
 * - `documentFrequency` counts documents containing the term at least once
 */
export interface CorpusIndex {
  addDocument(termCounts: Map<Term, number>, length: number): IndexedDocument;
  documentFrequency(term: Term): number;
  documents(): Iterable<IndexedDocument>;
  getStats(): CorpusStats;
}

import type { ScoreTable, WeightingScheme } from "./types.js";

/** Within-document component of a term score. */
export interface TermWeighting {
  scheme: WeightingScheme;
  weight(count: number, docLength: number): number;
}

export interface CorpusScoreOptions {
  /** Added to the document frequency in the IDF denominator. Default 1. */
  idfSmoothing?: number;
}

export interface DocumentScores {
  docIndex: number;
  scores: ScoreTable;
}

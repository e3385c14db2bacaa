/** Shared core types used by module contracts. */

/** A token: lower-cased, letters/digits only. */
export type Term = string;

/** Language key as supplied by callers: a name ("german"), ISO 639-1 ("de") or ISO 639-3 ("deu"). */
export type LanguageKey = string;

/** A document as handed over by the ingestion step. */
export interface DocumentInput {
  id: string;
  /** Paragraphs joined with newlines. */
  text: string;
  /** Raw word count reported by ingestion; informational only. */
  wordCount?: number;
}

export interface FrequencyEntry {
  term: Term;
  count: number;
}

export interface ScoreEntry {
  term: Term;
  score: number;
}

/** Sorted by descending count, ties in first-appearance order. */
export type FrequencyTable = FrequencyEntry[];

/** Sorted by descending score. */
export type ScoreTable = ScoreEntry[];

export interface WordStats {
  totalWords: number;
  uniqueWords: number;
  topFrequency: FrequencyTable;
}

export type ComplexityLabel =
  | "Very difficult"
  | "Difficult"
  | "Somewhat difficult"
  | "Standard"
  | "Easy to understand"
  | "Unknown";

export interface ReadabilityResult {
  /** Flesch Reading Ease; not clamped, may be negative or above 100. */
  ease: number;
  /** Flesch-Kincaid Grade. */
  grade: number;
  label: ComplexityLabel;
}

export interface SemanticSalience {
  uniqueMeaningfulCount: number;
  topMeaningful: FrequencyTable;
}

export type WeightingScheme = "tf-idf" | "wdf-idf";

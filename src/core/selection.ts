import type { FrequencyEntry, ScoreEntry } from "./types.js";

export type Comparator<T> = (a: T, b: T) => number;

export interface TopKSelector<T> {
  /**
   * Returns the best `k` items, best first.
   * Comparator behaves like Array.sort (<0 means a before b); items it considers equal
   * keep the order in which they were iterated.
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}

export const byCountDesc: Comparator<FrequencyEntry> = (a, b) => b.count - a.count;

export const byScoreDesc: Comparator<ScoreEntry> = (a, b) => b.score - a.score;

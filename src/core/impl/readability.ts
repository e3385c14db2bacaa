import type { ComplexityLabel, ReadabilityResult } from "../types.js";
import { type Diagnostic, type Outcome, assertText, errorMessage } from "../diagnostics.js";

/**
 * Readability scoring (Flesch family).
 *
 *   Flesch Reading Ease  = 206.835 − 1.015 × (words / sentences) − 84.6 × (syllables / words)
 *   Flesch-Kincaid Grade = 0.39 × (words / sentences) + 11.8 × (syllables / words) − 15.59
 */

export const UNKNOWN_READABILITY: ReadabilityResult = { ease: 0, grade: 0, label: "Unknown" };

export interface TextCounts {
  words: number;
  sentences: number;
  syllables: number;
}

const WORD = /[\p{L}\p{N}]+/gu;
const SENTENCE_END = /[.!?]+/;
const VOWEL_GROUP = /[aeiouyäöüàáâãåæèéêëìíîïòóôõøùúûý]+/g;

class DegenerateTextError extends Error {}

/** Vowel-group estimate; a trailing silent "e" (but not "-le") is dropped. At least 1. */
export function countSyllables(word: string): number {
  const w = word.toLowerCase().replace(/[^\p{L}]/gu, "");
  if (w.length <= 3) return 1;

  let count = w.match(VOWEL_GROUP)?.length ?? 0;
  if (w.endsWith("e") && !w.endsWith("le") && count > 1) count--;
  return Math.max(1, count);
}

export function countText(text: string): TextCounts {
  const words = text.match(WORD) ?? [];
  const sentences = text.split(SENTENCE_END).filter((s) => /[\p{L}\p{N}]/u.test(s)).length;
  const syllables = words.reduce((sum, w) => sum + countSyllables(w), 0);
  return { words: words.length, sentences: words.length ? Math.max(1, sentences) : 0, syllables };
}

export function fleschReadingEase(c: TextCounts): number {
  return 206.835 - 1.015 * (c.words / c.sentences) - 84.6 * (c.syllables / c.words);
}

export function fleschKincaidGrade(c: TextCounts): number {
  return 0.39 * (c.words / c.sentences) + 11.8 * (c.syllables / c.words) - 15.59;
}

export function classifyEase(ease: number): ComplexityLabel {
  if (ease < 30) return "Very difficult";
  if (ease < 50) return "Difficult";
  if (ease < 60) return "Somewhat difficult";
  if (ease < 70) return "Standard";
  return "Easy to understand";
}

export class ReadabilityScorer {
  score(text: string): Outcome<ReadabilityResult> {
    assertText(text, "text");
    try {
      const counts = countText(text);
      if (counts.words === 0) throw new DegenerateTextError("text contains no words");

      const ease = fleschReadingEase(counts);
      const grade = fleschKincaidGrade(counts);
      if (!Number.isFinite(ease) || !Number.isFinite(grade)) {
        throw new Error(`non-finite score (ease=${ease}, grade=${grade})`);
      }
      return { result: { ease, grade, label: classifyEase(ease) }, diagnostics: [] };
    } catch (e) {
      const diagnostic: Diagnostic = {
        code: e instanceof DegenerateTextError ? "DEGENERATE_INPUT" : "COMPUTATION_FAILED",
        source: "readability",
        message: errorMessage(e),
      };
      return { result: { ...UNKNOWN_READABILITY }, diagnostics: [diagnostic] };
    }
  }
}

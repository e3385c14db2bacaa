import { describe, expect, it } from "vitest";
import { ReadabilityScorer, classifyEase, countSyllables, countText } from "../readability.js";

const scorer = new ReadabilityScorer();

describe("classifyEase", () => {
  it("applies half-open bands", () => {
    expect(classifyEase(29.999)).toBe("Very difficult");
    expect(classifyEase(-12)).toBe("Very difficult");
    expect(classifyEase(30)).toBe("Difficult");
    expect(classifyEase(49.99)).toBe("Difficult");
    expect(classifyEase(50)).toBe("Somewhat difficult");
    expect(classifyEase(60)).toBe("Standard");
    expect(classifyEase(70)).toBe("Easy to understand");
    expect(classifyEase(121.2)).toBe("Easy to understand");
  });
});

describe("countSyllables", () => {
  it("estimates syllables from vowel groups", () => {
    expect(countSyllables("cat")).toBe(1);
    expect(countSyllables("table")).toBe(2);
    expect(countSyllables("make")).toBe(1);
    expect(countSyllables("beautiful")).toBe(3);
    expect(countSyllables("2024")).toBe(1);
  });
});

describe("countText", () => {
  it("counts sentences that contain words", () => {
    expect(countText("Hello there. How are you?! Fine")).toEqual({ words: 6, sentences: 3, syllables: 7 });
    expect(countText("...")).toEqual({ words: 0, sentences: 0, syllables: 0 });
  });
});

describe("ReadabilityScorer", () => {
  it("scores short, simple text as easy", () => {
    const { result, diagnostics } = scorer.score("The cat sat on the mat.");
    // 6 words, 1 sentence, 6 syllables
    expect(result.ease).toBeCloseTo(206.835 - 1.015 * 6 - 84.6, 10);
    expect(result.grade).toBeCloseTo(0.39 * 6 + 11.8 - 15.59, 10);
    expect(result.label).toBe("Easy to understand");
    expect(diagnostics).toEqual([]);
  });

  it("does not clamp the ease score", () => {
    const { result } = scorer.score("Internationalization considerations complicate administration.");
    // 4 words, 1 sentence, 8 + 5 + 3 + 5 syllables
    expect(result.ease).toBeCloseTo(206.835 - 1.015 * 4 - 84.6 * (21 / 4), 10);
    expect(result.label).toBe("Very difficult");
  });

  it("returns the Unknown placeholder for text without words", () => {
    expect(scorer.score("")).toEqual({
      result: { ease: 0, grade: 0, label: "Unknown" },
      diagnostics: [{ code: "DEGENERATE_INPUT", source: "readability", message: "text contains no words" }],
    });
  });
});

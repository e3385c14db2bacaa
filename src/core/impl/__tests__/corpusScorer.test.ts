import { describe, expect, it, vi } from "vitest";
import { InvalidArgumentError } from "../../diagnostics.js";
import {
  CorpusScorer,
  TERM_FREQUENCY,
  WITHIN_DOCUMENT_FREQUENCY,
  assertDocuments,
  inverseDocumentFrequency,
} from "../corpusScorer.js";
import { MemoizedResourceLoader } from "../memoizedResourceLoader.js";
import { loadWordSegmenter } from "../segmenterTokenizer.js";
import { createBasicTokenizer, createFullTokenizer } from "../tokenizerChain.js";

const logger = { warn: vi.fn(), error: vi.fn() };
const scorer = new CorpusScorer(createBasicTokenizer(logger));

describe("CorpusScorer.tfIdf", () => {
  it("merges per-document scores, later documents overwriting shared terms", () => {
    const { result } = scorer.tfIdf(["apple apple pear", "apple kiwi"]);

    expect(result.map((e) => e.term)).toEqual(["pear", "kiwi", "apple"]);
    expect(result[2]?.score).toBeCloseTo(0.5 * Math.log(2 / 3), 12);
    expect(result[0]?.score).toBeCloseTo(0, 12);
  });

  it("keeps each document's own score in the per-document breakdown", () => {
    const { result } = scorer.scoreDocuments(["apple apple pear", "apple kiwi"], TERM_FREQUENCY);

    expect(result.map((d) => d.docIndex)).toEqual([0, 1]);
    expect(result[0]?.scores.find((e) => e.term === "apple")?.score).toBeCloseTo((2 / 3) * Math.log(2 / 3), 12);
    expect(result[1]?.scores.find((e) => e.term === "apple")?.score).toBeCloseTo(0.5 * Math.log(2 / 3), 12);
  });

  it("gives a term found in every document tf * ln(N / (N + 1))", () => {
    const { result } = scorer.tfIdf(["common alpha", "common beta beta", "common"]);
    const common = result.find((e) => e.term === "common");

    // the last document is just "common": tf = 1
    expect(common?.score).toBeCloseTo(Math.log(3 / 4), 12);
    expect(common?.score).toBeLessThan(0);
  });

  it("sorts by non-increasing score and never emits non-finite values", () => {
    const { result } = scorer.tfIdf(["", "one two two", "two three", "four"]);
    for (let i = 1; i < result.length; i++) {
      expect(result[i - 1]!.score).toBeGreaterThanOrEqual(result[i]!.score);
    }
    expect(result.every((e) => Number.isFinite(e.score))).toBe(true);
  });

  it("returns an empty table for an empty corpus", () => {
    expect(scorer.tfIdf([])).toEqual({ result: [], diagnostics: [] });
  });

  it("works with the linguistic tokenizer", () => {
    const full = new CorpusScorer(createFullTokenizer(new MemoizedResourceLoader("word segmenter", loadWordSegmenter), logger));
    const { result, diagnostics } = full.tfIdf(["Hello, world.", "Hello again!"], "english");

    expect(diagnostics).toEqual([]);
    expect(result.map((e) => e.term).sort()).toEqual(["again", "hello", "world"]);
  });
});

describe("CorpusScorer.wdfIdf", () => {
  it("uses ln(1 + count) as the within-document weight", () => {
    const { result } = scorer.wdfIdf(["seo seo seo text", "text", "other"]);

    expect(result.map((e) => e.term)).toEqual(["seo", "other", "text"]);
    expect(result[0]?.score).toBeCloseTo(Math.log(4) * Math.log(3 / 2), 12);
    expect(result[1]?.score).toBeCloseTo(Math.log(2) * Math.log(3 / 2), 12);
    expect(result[2]?.score).toBeCloseTo(0, 12);
  });

  it("exposes the weighting functions", () => {
    expect(WITHIN_DOCUMENT_FREQUENCY.weight(0, 5)).toBe(0);
    expect(TERM_FREQUENCY.weight(2, 0)).toBe(0);
    expect(TERM_FREQUENCY.weight(2, 8)).toBe(0.25);
  });
});

describe("IDF smoothing", () => {
  it("is configurable", () => {
    const unsmoothed = new CorpusScorer(createBasicTokenizer(logger), { idfSmoothing: 0 });
    const { result } = unsmoothed.tfIdf(["a", "b"]);
    expect(result.find((e) => e.term === "a")?.score).toBeCloseTo(Math.log(2), 12);
    expect(inverseDocumentFrequency(4, 1, 1)).toBeCloseTo(Math.log(2), 12);
  });

  it("rejects negative values", () => {
    expect(() => new CorpusScorer(createBasicTokenizer(logger), { idfSmoothing: -1 })).toThrow(InvalidArgumentError);
  });
});

describe("assertDocuments", () => {
  it("rejects non-array and non-string input", () => {
    expect(() => assertDocuments("text")).toThrow(InvalidArgumentError);
    expect(() => assertDocuments(["ok", 3])).toThrow("documents[1]: must be a string");
  });
});

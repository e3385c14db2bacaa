import type {
  DocumentInput,
  LanguageKey,
  ReadabilityResult,
  ScoreTable,
  SemanticSalience,
  WordStats,
} from "../types.js";
import {
  type Diagnostic,
  type Logger,
  type Outcome,
  InvalidArgumentError,
  assertText,
  errorMessage,
} from "../diagnostics.js";
import { DEFAULT_LANGUAGE } from "../languages.js";
import type { TermWeighting } from "../scorer.js";
import { CorpusScorer, TERM_FREQUENCY, WITHIN_DOCUMENT_FREQUENCY, mergeScores } from "./corpusScorer.js";
import { DEFAULT_TOP_N, FrequencyCounter } from "./frequencyCounter.js";
import { KeywordDensityScorer } from "./keywordDensity.js";
import { MemoizedResourceLoader } from "./memoizedResourceLoader.js";
import { ReadabilityScorer, UNKNOWN_READABILITY } from "./readability.js";
import { loadWordSegmenter } from "./segmenterTokenizer.js";
import { EMPTY_SALIENCE, SemanticSalienceAnalyzer } from "./semanticSalience.js";
import { CuratedStopwordProvider, loadCuratedStopwords } from "./stopwordProvider.js";
import { createBasicTokenizer, createFullTokenizer } from "./tokenizerChain.js";

export interface AnalyzeOptions {
  language?: LanguageKey;
  /** Keywords for density scoring. */
  keywords?: string[];
  /** Length of frequency tables. */
  topN?: number;
}

export interface DocumentReport {
  id: string;
  /** Word count reported by ingestion, if any. */
  ingestedWordCount: number | null;
  wordStats: WordStats;
  /** Scores of this document's terms within the batch. */
  tfIdf: ScoreTable;
  wdfIdf: ScoreTable;
  keywordDensity: Map<string, number>;
  readability: ReadabilityResult;
  semantic: SemanticSalience;
  diagnostics: Diagnostic[];
}

export interface BatchSummary {
  documentCount: number;
  totalWords: number;
  ingestedWordCount: number;
  /** Merged over the batch; for a term in several documents the last document's score wins. */
  tfIdf: ScoreTable;
  wdfIdf: ScoreTable;
  diagnostics: Diagnostic[];
}

export interface AnalysisReport {
  language: LanguageKey;
  documents: DocumentReport[];
  summary: BatchSummary;
}

export interface EngineDeps {
  frequency: Pick<FrequencyCounter, "wordStats">;
  corpus: Pick<CorpusScorer, "buildIndex" | "scoreIndex" | "tfIdf" | "wdfIdf">;
  density: Pick<KeywordDensityScorer, "density">;
  readability: Pick<ReadabilityScorer, "score">;
  salience: Pick<SemanticSalienceAnalyzer, "analyze">;
  logger: Logger;
}

export interface EngineDefaults {
  language: LanguageKey;
  topN: number;
  keywords: string[];
}

interface CorpusTables {
  tfIdf: ScoreTable[];
  wdfIdf: ScoreTable[];
}

/**
 * Façade over the scorers.
 *
 * Word statistics always run; every other scorer is isolated so that an unexpected
 * failure turns into that scorer's default result plus a COMPUTATION_FAILED diagnostic.
 * Only invalid calls throw.
 */
export class TextAnalyticsEngine {
  constructor(
    private readonly deps: EngineDeps,
    private readonly defaults: EngineDefaults = { language: DEFAULT_LANGUAGE, topN: DEFAULT_TOP_N, keywords: [] },
  ) {}

  wordStats(text: string, topN: number = this.defaults.topN): Outcome<WordStats> {
    return this.deps.frequency.wordStats(text, checkTopN(topN));
  }

  tfIdf(documents: string[], language: LanguageKey = this.defaults.language): Outcome<ScoreTable> {
    return this.isolate("tf-idf", () => [], () => this.deps.corpus.tfIdf(documents, language));
  }

  wdfIdf(documents: string[], language: LanguageKey = this.defaults.language): Outcome<ScoreTable> {
    return this.isolate("wdf-idf", () => [], () => this.deps.corpus.wdfIdf(documents, language));
  }

  keywordDensity(text: string, keywords: string[] = this.defaults.keywords): Outcome<Map<string, number>> {
    return this.isolate(
      "keyword-density",
      () => new Map(keywords.map((k): [string, number] => [k, 0])),
      () => this.deps.density.density(text, keywords),
    );
  }

  readability(text: string): Outcome<ReadabilityResult> {
    return this.isolate("readability", () => ({ ...UNKNOWN_READABILITY }), () => this.deps.readability.score(text));
  }

  semanticSalience(
    text: string,
    language: LanguageKey = this.defaults.language,
    topN: number = this.defaults.topN,
  ): Outcome<SemanticSalience> {
    return this.isolate(
      "semantic",
      () => ({ ...EMPTY_SALIENCE, topMeaningful: [] }),
      () => this.deps.salience.analyze(text, language, checkTopN(topN)),
    );
  }

  analyze(documents: DocumentInput[], options: AnalyzeOptions = {}): AnalysisReport {
    if (!Array.isArray(documents)) throw new InvalidArgumentError("documents", "must be an array");
    documents.forEach((d: unknown, i) => {
      if (typeof d !== "object" || d === null) throw new InvalidArgumentError(`documents[${i}]`, "must be an object");
    });
    documents.forEach((d, i) => {
      assertText(d.id, `documents[${i}].id`);
      assertText(d.text, `documents[${i}].text`);
    });

    const language = options.language ?? this.defaults.language;
    const keywords = options.keywords ?? this.defaults.keywords;
    const topN = checkTopN(options.topN ?? this.defaults.topN);

    const corpus = this.scoreBatch(documents.map((d) => d.text), language);

    const reports = documents.map((doc, i): DocumentReport => {
      const stats = this.wordStats(doc.text, topN);
      const density = this.keywordDensity(doc.text, keywords);
      const readability = this.readability(doc.text);
      const semantic = this.semanticSalience(doc.text, language, topN);

      return {
        id: doc.id,
        ingestedWordCount: doc.wordCount ?? null,
        wordStats: stats.result,
        tfIdf: corpus.result.tfIdf[i] ?? [],
        wdfIdf: corpus.result.wdfIdf[i] ?? [],
        keywordDensity: density.result,
        readability: readability.result,
        semantic: semantic.result,
        diagnostics: [...stats.diagnostics, ...density.diagnostics, ...readability.diagnostics, ...semantic.diagnostics],
      };
    });

    return {
      language,
      documents: reports,
      summary: {
        documentCount: reports.length,
        totalWords: reports.reduce((sum, r) => sum + r.wordStats.totalWords, 0),
        ingestedWordCount: reports.reduce((sum, r) => sum + (r.ingestedWordCount ?? 0), 0),
        tfIdf: mergeScores(corpus.result.tfIdf.map((scores, docIndex) => ({ docIndex, scores }))),
        wdfIdf: mergeScores(corpus.result.wdfIdf.map((scores, docIndex) => ({ docIndex, scores }))),
        diagnostics: corpus.diagnostics,
      },
    };
  }

  /** Tokenizes the batch once and scores it under both weightings. */
  private scoreBatch(texts: string[], language: LanguageKey): Outcome<CorpusTables> {
    return this.isolate(
      "corpus",
      () => ({ tfIdf: [], wdfIdf: [] }),
      () => {
        const { result: index, diagnostics } = this.deps.corpus.buildIndex(texts, language);
        const tables = (scheme: TermWeighting) => this.deps.corpus.scoreIndex(index, scheme).map((d) => d.scores);
        return {
          result: { tfIdf: tables(TERM_FREQUENCY), wdfIdf: tables(WITHIN_DOCUMENT_FREQUENCY) },
          diagnostics,
        };
      },
    );
  }

  private isolate<T>(source: string, fallback: () => T, run: () => Outcome<T>): Outcome<T> {
    try {
      return run();
    } catch (e) {
      if (e instanceof InvalidArgumentError) throw e;
      const message = `${source} failed: ${errorMessage(e)}`;
      this.deps.logger.warn(`[Engine] ${message}`);
      return { result: fallback(), diagnostics: [{ code: "COMPUTATION_FAILED", source, message }] };
    }
  }
}

function checkTopN(topN: number): number {
  if (!Number.isInteger(topN) || topN < 1) throw new InvalidArgumentError("topN", "must be a positive integer");
  return topN;
}

export interface EngineOptions extends Partial<EngineDefaults> {
  logger?: Logger;
  /** Added to the document frequency in the IDF denominator. Default 1. */
  idfSmoothing?: number;
}

/**
 * Wires the default engine. Each engine owns its resource loaders, so segmenters and
 * stopword lists are loaded once per engine and language.
 */
export function createTextAnalyticsEngine(options: EngineOptions = {}): TextAnalyticsEngine {
  const logger = options.logger ?? console;
  const segmenters = new MemoizedResourceLoader("word segmenter", loadWordSegmenter);
  const stopwordLists = new MemoizedResourceLoader("stopword list", loadCuratedStopwords);

  const full = createFullTokenizer(segmenters, logger);
  const basic = createBasicTokenizer(logger);

  return new TextAnalyticsEngine(
    {
      frequency: new FrequencyCounter(basic),
      corpus: new CorpusScorer(full, { idfSmoothing: options.idfSmoothing }),
      density: new KeywordDensityScorer(basic),
      readability: new ReadabilityScorer(),
      salience: new SemanticSalienceAnalyzer(full, new CuratedStopwordProvider(stopwordLists, logger)),
      logger,
    },
    {
      language: options.language ?? DEFAULT_LANGUAGE,
      topN: options.topN ?? DEFAULT_TOP_N,
      keywords: options.keywords ?? [],
    },
  );
}

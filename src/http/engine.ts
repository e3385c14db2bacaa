import {
  createTextAnalyticsEngine,
  type AnalysisReport,
  type AnalyzeOptions,
  type DocumentReport,
  type Logger,
  type TextAnalyticsEngine,
} from "../core/index.js";
import type { Config } from "../config.js";

export interface AnalyzeDocumentInput {
  id: string;
  text: string;
  wordCount?: number;
}

export interface AnalyzeQuery {
  documents: AnalyzeDocumentInput[];
  options: AnalyzeOptions;
}

/** JSON shape of a document report: keyword density as a plain object. */
export type DocumentReportBody = Omit<DocumentReport, "keywordDensity"> & {
  keywordDensity: Record<string, number>;
};

export type AnalysisReportBody = Omit<AnalysisReport, "documents"> & {
  documents: DocumentReportBody[];
};

export interface AnalysisService {
  analyze(q: AnalyzeQuery): AnalysisReportBody;
}

export function toReportBody(report: AnalysisReport): AnalysisReportBody {
  return {
    ...report,
    documents: report.documents.map((d) => ({ ...d, keywordDensity: Object.fromEntries(d.keywordDensity) })),
  };
}

export function createAnalysisService(
  cfg: Pick<Config, "language" | "topN" | "keywords">,
  logger: Logger = console,
  engine: TextAnalyticsEngine = createTextAnalyticsEngine({
    language: cfg.language,
    topN: cfg.topN,
    keywords: [...cfg.keywords],
    logger,
  }),
): AnalysisService {
  return {
    analyze(q) {
      return toReportBody(engine.analyze(q.documents, q.options));
    },
  };
}

import http from "node:http";
import { randomUUID } from "node:crypto";

import type { AnalyzeOptions, Logger } from "../core/index.js";
import { config as defaultConfig, type Config } from "../config.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { isRecord, pushErr, readInt, readString, readStringArray } from "./validation.js";
import { createAnalysisService, type AnalysisService, type AnalyzeDocumentInput } from "./engine.js";

const SERVICE = "text-metrics";
const VERSION = "0.1.0";
const MAX_ID_LENGTH = 256;
const MAX_TOP_N = 100;

class PayloadTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`request body exceeds ${limit} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

export interface ServerOptions {
  config?: Config;
  logger?: Logger;
  service?: AnalysisService;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const cfg = opts.config ?? defaultConfig;
  const logger = opts.logger ?? console;
  const service = opts.service ?? createAnalysisService(cfg, logger);

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (req.method === "POST" && url.pathname === "/analyze") {
        if (!isJson(req)) {
          return sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }

        let body: unknown;
        try {
          body = await readJson(req, cfg.maxBodyBytes);
        } catch (e) {
          if (e instanceof PayloadTooLargeError) {
            res.setHeader("connection", "close");
            return sendProblem(res, problem({ status: 413, code: "PAYLOAD_TOO_LARGE", detail: e.message, instance: url.pathname, requestId }));
          }
          if (!(e instanceof SyntaxError)) throw e;
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid JSON", instance: url.pathname, requestId }));
        }
        if (!isRecord(body)) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const documents = parseDocuments(body.documents, cfg, errors);
        const options = parseOptions(body.options, errors);

        if (errors.length) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const started = Date.now();
        const report = service.analyze({ documents, options });
        return sendJson(res, 200, { ...report, tookMs: Date.now() - started });
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      logger.error(`[Server] ${req.method ?? "?"} ${url.pathname} failed (${requestId}): ${e instanceof Error ? e.message : String(e)}`);
      return sendProblem(res, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

function parseDocuments(value: unknown, cfg: Config, errors: FieldError[]): AnalyzeDocumentInput[] {
  if (!Array.isArray(value)) {
    pushErr(errors, "$.documents", "must be an array");
    return [];
  }
  if (value.length < 1) pushErr(errors, "$.documents", "must contain at least 1 item");
  if (value.length > cfg.maxDocuments) pushErr(errors, "$.documents", `must contain at most ${cfg.maxDocuments} items`);

  const out: AnalyzeDocumentInput[] = [];
  value.forEach((d: unknown, i) => {
    const path = `$.documents[${i}]`;
    if (!isRecord(d)) {
      pushErr(errors, path, "must be an object");
      return;
    }

    const id = readString(d.id, `${path}.id`, errors, { nonEmpty: true, maxLength: MAX_ID_LENGTH });
    const text = readString(d.text, `${path}.text`, errors, { maxLength: cfg.maxTextLength });
    const wordCount = d.wordCount != null ? readInt(d.wordCount, `${path}.wordCount`, errors, 0) : undefined;

    if (id !== undefined && text !== undefined) out.push({ id, text, wordCount });
  });
  return out;
}

function parseOptions(value: unknown, errors: FieldError[]): AnalyzeOptions {
  if (value == null) return {};
  if (!isRecord(value)) {
    pushErr(errors, "$.options", "must be an object");
    return {};
  }

  const options: AnalyzeOptions = {};
  if (value.language != null) {
    const language = readString(value.language, "$.options.language", errors, { nonEmpty: true });
    if (language !== undefined) options.language = language.trim();
  }
  if (value.keywords != null) {
    const keywords = readStringArray(value.keywords, "$.options.keywords", errors);
    if (keywords) options.keywords = keywords;
  }
  if (value.topN != null) {
    const topN = readInt(value.topN, "$.options.topN", errors, 1, MAX_TOP_N);
    if (topN !== undefined) options.topN = topN;
  }
  return options;
}

export async function startServer(opts: ServerOptions & { port?: number } = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? (opts.config ?? defaultConfig).port;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

/** Reads at most `limit` bytes; past that the rest of the body is drained and dropped. */
async function readJson(req: http.IncomingMessage, limit: number): Promise<unknown> {
  const declared = Number(req.headers["content-length"]);
  if (Number.isFinite(declared) && declared > limit) throw new PayloadTooLargeError(limit);

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const c of req) {
    const chunk = Buffer.isBuffer(c) ? c : Buffer.from(c);
    size += chunk.length;
    if (size > limit) {
      chunks.length = 0;
      continue;
    }
    chunks.push(chunk);
  }
  if (size > limit) throw new PayloadTooLargeError(limit);

  const raw = Buffer.concat(chunks).toString("utf8");
  return raw.length ? JSON.parse(raw) : null;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}

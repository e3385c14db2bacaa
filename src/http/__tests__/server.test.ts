import http from "node:http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../../config.js";
import { startServer } from "../server.js";

let server: http.Server;
let baseUrl: string;

beforeAll(async () => {
  const config = { ...loadConfig({}), language: "english", keywords: ["cat"], maxDocuments: 2, maxBodyBytes: 4096 };
  const started = await startServer({ port: 0, config, logger: { warn: vi.fn(), error: vi.fn() } });
  server = started.server;
  baseUrl = `http://127.0.0.1:${started.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

function post(path: string, body: string, contentType = "application/json"): Promise<Response> {
  return fetch(`${baseUrl}${path}`, { method: "POST", headers: { "content-type": contentType }, body });
}

/** Sends the body in chunks without a content-length header. */
function postChunked(path: string, chunks: string[]): Promise<{ status: number; body: unknown }> {
  return new Promise((resolve, reject) => {
    const req = http.request(`${baseUrl}${path}`, { method: "POST", headers: { "content-type": "application/json" } }, (res) => {
      let raw = "";
      res.setEncoding("utf8");
      res.on("data", (c: string) => (raw += c));
      res.on("end", () => resolve({ status: res.statusCode ?? 0, body: JSON.parse(raw) }));
    });
    req.on("error", reject);
    for (const c of chunks) req.write(c);
    req.end();
  });
}

describe("GET /health", () => {
  it("reports the service", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", service: "text-metrics", version: "0.1.0" });
  });
});

describe("POST /analyze", () => {
  it("returns the report with keyword density as an object", async () => {
    const res = await post("/analyze", JSON.stringify({ documents: [{ id: "a", text: "The cat sat on the cat mat.", wordCount: 7 }] }));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      language: "english",
      documents: [
        {
          id: "a",
          ingestedWordCount: 7,
          wordStats: { totalWords: 7, uniqueWords: 5 },
          keywordDensity: { cat: expect.closeTo(200 / 7, 6) },
          readability: { label: "Easy to understand" },
        },
      ],
      summary: { documentCount: 1, totalWords: 7, ingestedWordCount: 7 },
    });
  });

  it("applies request options", async () => {
    const res = await post(
      "/analyze",
      JSON.stringify({ documents: [{ id: "a", text: "der Hund und der Hund" }], options: { language: "de", keywords: ["hund"], topN: 1 } }),
    );

    expect(await res.json()).toMatchObject({
      language: "de",
      documents: [
        {
          wordStats: { topFrequency: [{ term: "der", count: 2 }] },
          keywordDensity: { hund: 40 },
          semantic: { uniqueMeaningfulCount: 1, topMeaningful: [{ term: "hund", count: 2 }] },
        },
      ],
    });
  });

  it("lists every invalid field", async () => {
    const res = await post(
      "/analyze",
      JSON.stringify({ documents: [{ id: "", text: 1 }, "x", { id: "ok", text: "", wordCount: -1 }], options: { topN: 500 } }),
    );

    expect(res.status).toBe(400);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await res.json()).toMatchObject({
      code: "INVALID_ARGUMENT",
      status: 400,
      errors: [
        { path: "$.documents", message: "must contain at most 2 items" },
        { path: "$.documents[0].id", message: "must be a non-empty string" },
        { path: "$.documents[0].text", message: "must be a string" },
        { path: "$.documents[1]", message: "must be an object" },
        { path: "$.documents[2].wordCount", message: "must be a non-negative integer" },
        { path: "$.options.topN", message: "must be between 1 and 100" },
      ],
    });
  });

  it("rejects malformed JSON", async () => {
    const res = await post("/analyze", "{not json");
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "INVALID_ARGUMENT", detail: "body is not valid JSON" });
  });

  it("rejects a body over the size limit", async () => {
    const res = await post("/analyze", JSON.stringify({ documents: [{ id: "a", text: "b".repeat(5000) }] }));

    expect(res.status).toBe(413);
    expect(res.headers.get("content-type")).toBe("application/problem+json");
    expect(await res.json()).toMatchObject({
      code: "PAYLOAD_TOO_LARGE",
      status: 413,
      title: "Payload too large",
      detail: "request body exceeds 4096 bytes",
    });
  });

  it("stops buffering a chunked body once it passes the size limit", async () => {
    const res = await postChunked("/analyze", ['{"documents":[{"id":"a","text":"', "b".repeat(3000), "b".repeat(3000), '"}]}']);

    expect(res.status).toBe(413);
    expect(res.body).toMatchObject({ code: "PAYLOAD_TOO_LARGE", detail: "request body exceeds 4096 bytes" });
  });

  it("rejects other content types", async () => {
    const res = await post("/analyze", "text", "text/plain");
    expect(res.status).toBe(415);
    expect(await res.json()).toMatchObject({ code: "UNSUPPORTED_MEDIA_TYPE" });
  });
});

describe("unknown routes", () => {
  it("answers 404 with a problem document", async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ code: "NOT_FOUND", instance: "/nope" });
  });
});

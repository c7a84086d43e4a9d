import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type Problem } from "./problem.js";
import { parseSuggestRequest } from "./validation.js";
import { SpellError } from "../core/errors.js";
import type { SuggestionPipeline } from "../core/impl/suggestionPipeline.js";

const SERVICE = "spell-suggest";
const VERSION = "0.1.0";

export interface ServerOptions {
  pipeline: SuggestionPipeline;
  port?: number;
  metricsEnabled?: boolean;
  /** n used when a request leaves it out */
  defaultSuggestions?: number;
  /** upper bound accepted for n */
  maxSuggestions?: number;
}

class BadJsonError extends Error {}

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const { pipeline } = opts;
  const metricsEnabled = opts.metricsEnabled ?? false;
  const limits = { n: opts.defaultSuggestions ?? 3, maxN: opts.maxSuggestions ?? 50 };
  const counters = { requests: 0, noMatch: 0 };

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    res.setHeader("x-request-id", requestId);

    const fail = (status: number, p: Omit<Problem, "type" | "title" | "status" | "instance" | "requestId">): void =>
      sendProblem(res, problem({ status, instance: url.pathname, requestId, ...p }));

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          vocabularySize: pipeline.vocabulary.size,
        });
      }

      if (req.method === "GET" && url.pathname === "/metrics") {
        if (!metricsEnabled) return fail(404, { code: "NOT_FOUND", detail: "metrics not enabled" });
        res.statusCode = 200;
        res.setHeader("content-type", "text/plain; version=0.0.4");
        res.end(`suggest_requests_total ${counters.requests}\nsuggest_no_match_total ${counters.noMatch}\n`);
        return;
      }

      if (req.method === "POST" && url.pathname === "/suggest") {
        if (!isJson(req)) {
          return fail(415, { code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json" });
        }

        const started = Date.now();
        const parsed = parseSuggestRequest(await readJson(req), limits);
        if (!parsed.ok) return fail(400, { code: "INVALID_ARGUMENT", detail: "invalid request", errors: parsed.errors });

        counters.requests++;
        const r = pipeline.explain(parsed.value.word, parsed.value.n);
        if (r.tier === "none") counters.noMatch++;

        return sendJson(res, 200, { ...r, tookMs: Date.now() - started });
      }

      return fail(404, { code: "NOT_FOUND", detail: "not found" });
    } catch (e) {
      if (e instanceof BadJsonError) return fail(400, { code: "INVALID_ARGUMENT", detail: "body is not valid JSON" });
      if (e instanceof SpellError) return fail(400, { code: e.code, detail: e.message });

      console.error(`[${requestId}] ${req.method ?? "?"} ${url.pathname} failed`, e);
      return fail(500, { code: "INTERNAL", detail: "internal error" });
    }
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

/**
 * Closes the server on SIGINT/SIGTERM and exits once it has drained.
 * Returns a function that removes the handlers again.
 */
export function closeOnSignals(server: http.Server, signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"]): () => void {
  const shutdown = (): void => {
    server.close(() => process.exit(0));
  };
  for (const sig of signals) process.on(sig, shutdown);
  return () => {
    for (const sig of signals) process.off(sig, shutdown);
  };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = req.headers["content-type"] ?? "";
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new BadJsonError("invalid json", { cause: e });
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(body));
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(JSON.stringify(body));
}

import http from "node:http";
import { randomUUID } from "node:crypto";

import { InvalidArgumentError, SnapshotError, StateError } from "../core/errors.js";
import { asString, isRecord, pushErr } from "../core/validation.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { createInMemoryEngine, type Engine } from "./engine.js";

const SERVICE = "bayes_classifier";
const VERSION = "0.1.0";

const MAX_DOCUMENTS = 1000;
const MAX_TEXT_LENGTH = 200000;
const MAX_LABEL_LENGTH = 256;

export interface ServerOptions {
  port?: number;
  smoothing?: number;
  engine?: Engine;
  /** Defaults to console.log; pass a no-op to silence. */
  log?: (line: string) => void;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createInMemoryEngine({ smoothing: opts.smoothing });
  const log = opts.log ?? ((line: string) => console.log(line));

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const instance = url.pathname;

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          phase: engine.phase,
        });
      }

      if (req.method === "GET" && url.pathname === "/labels") {
        return sendJson(res, 200, { labels: engine.labels() });
      }

      if (req.method === "GET" && url.pathname === "/model") {
        return sendJson(res, 200, engine.exportModel());
      }

      if (req.method === "POST" && url.pathname === "/documents") {
        if (!isJson(req)) return sendUnsupportedMediaType(res, instance, requestId);
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance, requestId }));
        }

        const errors: FieldError[] = [];
        const docsVal = body.documents;
        if (!Array.isArray(docsVal)) pushErr(errors, "$.documents", "must be an array");
        const docs: unknown[] = Array.isArray(docsVal) ? docsVal : [];
        if (Array.isArray(docsVal) && docsVal.length < 1) pushErr(errors, "$.documents", "must contain at least 1 item");
        if (Array.isArray(docsVal) && docsVal.length > MAX_DOCUMENTS) pushErr(errors, "$.documents", `must contain at most ${MAX_DOCUMENTS} items`);

        if (errors.length) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));
        }
        if (engine.phase === "trained") {
          throw new StateError("ALREADY_TRAINED", "cannot add documents to a trained model");
        }

        let accepted = 0;
        const failures: Array<{ index: number; code: string; message: string }> = [];

        for (let i = 0; i < docs.length; i++) {
          const d = docs[i];
          if (!isRecord(d)) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "document must be an object" });
            continue;
          }

          const text = asString(d.text);
          const label = asString(d.label);

          if (text === undefined) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "text must be a string" });
            continue;
          }
          if (text.length > MAX_TEXT_LENGTH) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "text too long" });
            continue;
          }
          if (!label) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "label must be non-empty" });
            continue;
          }
          if (label.length > MAX_LABEL_LENGTH) {
            failures.push({ index: i, code: "INVALID_ARGUMENT", message: "label too long" });
            continue;
          }

          engine.addDocument({ text, label });
          accepted++;
        }

        const failed = failures.length;
        return sendJson(res, failed > 0 ? 207 : 200, { accepted, failed, failures });
      }

      if (req.method === "POST" && url.pathname === "/train") {
        const summary = engine.train();
        log(`trained ${summary.labels.length} labels on ${summary.documentCount} documents (vocabulary ${summary.vocabularySize})`);
        return sendJson(res, 200, summary);
      }

      if (req.method === "POST" && url.pathname === "/classify") {
        if (!isJson(req)) return sendUnsupportedMediaType(res, instance, requestId);
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance, requestId }));
        }

        const text = asString(body.text);
        const errors: FieldError[] = [];
        if (text === undefined) pushErr(errors, "$.text", "must be a string");
        if (text !== undefined && text.length > MAX_TEXT_LENGTH) pushErr(errors, "$.text", "too long");
        if (text === undefined || errors.length) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));
        }

        return sendJson(res, 200, engine.classify(text));
      }

      if (req.method === "PUT" && url.pathname === "/model") {
        if (!isJson(req)) return sendUnsupportedMediaType(res, instance, requestId);
        engine.importModel(await readJson(req));
        log(`model imported (${engine.labels().length} labels, ${engine.phase})`);
        return sendJson(res, 200, { labels: engine.labels(), phase: engine.phase });
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance, requestId }));
    } catch (e) {
      return sendProblem(res, toProblem(e, instance, requestId));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function toProblem(e: unknown, instance: string, requestId: string): Problem {
  if (e instanceof StateError) {
    return problem({ status: 409, code: "FAILED_PRECONDITION", detail: e.message, instance, requestId });
  }
  if (e instanceof SnapshotError) {
    return problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid snapshot", instance, requestId, errors: e.errors });
  }
  if (e instanceof InvalidArgumentError) {
    return problem({ status: 400, code: "INVALID_ARGUMENT", detail: e.message, instance, requestId });
  }
  if (e instanceof SyntaxError) {
    return problem({ status: 400, code: "INVALID_ARGUMENT", detail: "malformed JSON body", instance, requestId });
  }
  console.error(`[${requestId}] unhandled error on ${instance}`, e);
  return problem({ status: 500, code: "INTERNAL", detail: "internal error", instance, requestId });
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
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
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(JSON.stringify(body));
}

function sendUnsupportedMediaType(res: http.ServerResponse, instance: string, requestId: string): void {
  sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance, requestId }));
}

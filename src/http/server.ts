import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { LIMITS, asBoolean, asInt, asString, boolParam, checkWord, intParam, isRecord, pushErr } from "./validation.js";
import { createInMemoryDictionary, decodeCursor, encodeCursor, type Dictionary } from "./dictionary.js";

const SERVICE = "trie_lexicon";
const VERSION = "0.1.0";
const KNOWN_PATHS = new Set(["/health", "/metrics", "/words", "/corpus", "/lookup", "/complete", "/longest-prefix", "/dump"]);

export interface ServerOptions {
  port?: number;
  metricsEnabled?: boolean;
  dictionary?: Dictionary;
}

type JsonBody = { ok: true; value: unknown } | { ok: false };

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const dictionary = opts.dictionary ?? createInMemoryDictionary();
  const metricsEnabled = opts.metricsEnabled ?? false;
  let requests = 0;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const instance = url.pathname;
    requests++;

    const invalid = (errors: FieldError[]) =>
      sendProblem(res, problem({ code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (req.method === "GET" && url.pathname === "/metrics") {
        if (!metricsEnabled) {
          return sendProblem(res, problem({ code: "NOT_FOUND", detail: "metrics not enabled", instance, requestId }));
        }
        res.statusCode = 200;
        res.setHeader("content-type", "text/plain; version=0.0.4");
        res.end(
          [
            "# TYPE trie_lexicon_words gauge",
            `trie_lexicon_words ${dictionary.size()}`,
            "# TYPE trie_lexicon_requests_total counter",
            `trie_lexicon_requests_total ${requests}`,
            "",
          ].join("\n"),
        );
        return;
      }

      if (req.method === "POST" && url.pathname === "/words") {
        if (!isJson(req)) return sendUnsupportedMediaType(res, instance, requestId);
        const body = await readJson(req);
        if (!body.ok) return sendMalformedJson(res, instance, requestId);
        if (!isRecord(body.value)) {
          return sendProblem(res, problem({ code: "INVALID_ARGUMENT", detail: "body must be an object", instance, requestId }));
        }

        const errors: FieldError[] = [];
        const wordsVal = body.value.words;
        if (!Array.isArray(wordsVal)) pushErr(errors, "$.words", "must be an array");
        const items: unknown[] = Array.isArray(wordsVal) ? wordsVal : [];
        if (Array.isArray(wordsVal) && wordsVal.length < 1) pushErr(errors, "$.words", "must contain at least 1 item");
        if (items.length > LIMITS.batchSize) pushErr(errors, "$.words", `must contain at most ${LIMITS.batchSize} items`);

        const options = body.value.options;
        let count = 1;
        if (isRecord(options) && options.count !== undefined) {
          const c = asInt(options.count);
          if (c === undefined || c < 1 || c > LIMITS.count) {
            pushErr(errors, "$.options.count", `must be an integer between 1 and ${LIMITS.count}`);
          } else {
            count = c;
          }
        }

        if (errors.length) return invalid(errors);

        const accepted: string[] = [];
        const failures: Array<{ index: number; code: string; message: string }> = [];
        items.forEach((item, index) => {
          const message = checkWord(item);
          if (message !== undefined || typeof item !== "string") {
            failures.push({ index, code: "INVALID_ARGUMENT", message: message ?? "must be a string" });
            return;
          }
          accepted.push(item);
        });

        dictionary.addWords(accepted, count);
        const failed = failures.length;
        return sendJson(res, failed > 0 ? 207 : 200, { added: accepted.length, failed, failures });
      }

      if (req.method === "POST" && url.pathname === "/corpus") {
        if (!isJson(req)) return sendUnsupportedMediaType(res, instance, requestId);
        const body = await readJson(req);
        if (!body.ok) return sendMalformedJson(res, instance, requestId);
        if (!isRecord(body.value)) {
          return sendProblem(res, problem({ code: "INVALID_ARGUMENT", detail: "body must be an object", instance, requestId }));
        }

        const errors: FieldError[] = [];
        const text = asString(body.value.text);
        if (text === undefined) pushErr(errors, "$.text", "must be a string");
        if (text && text.length > LIMITS.textLength) pushErr(errors, "$.text", "too long");

        const options = isRecord(body.value.options) ? body.value.options : {};
        const removeStopWords = options.removeStopWords === undefined ? false : asBoolean(options.removeStopWords);
        if (removeStopWords === undefined) pushErr(errors, "$.options.removeStopWords", "must be a boolean");
        const minLength = options.minLength === undefined ? 1 : asInt(options.minLength);
        if (minLength === undefined || minLength < 1 || minLength > LIMITS.wordLength) {
          pushErr(errors, "$.options.minLength", `must be an integer between 1 and ${LIMITS.wordLength}`);
        }

        if (errors.length || text === undefined) return invalid(errors);

        const learned = dictionary.learn(text, { removeStopWords, minLength });
        return sendJson(res, 200, { learned });
      }

      if (req.method === "GET" && url.pathname === "/words") {
        const errors: FieldError[] = [];
        const prefix = url.searchParams.get("prefix") ?? "";
        const prefixErr = checkWord(prefix);
        if (prefixErr) pushErr(errors, "prefix", prefixErr);

        const limit = intParam(url.searchParams, "limit") ?? 100;
        if (!(limit >= 1 && limit <= LIMITS.pageSize)) pushErr(errors, "limit", `must be between 1 and ${LIMITS.pageSize}`);

        let cursor: string | undefined;
        const cursorStr = url.searchParams.get("cursor");
        if (cursorStr !== null) {
          try {
            cursor = decodeCursor(cursorStr).token;
          } catch {
            pushErr(errors, "cursor", "invalid cursor");
          }
        }

        if (errors.length) return invalid(errors);

        const page = dictionary.list({ prefix, limit, cursor });
        return sendJson(res, 200, {
          words: page.words,
          page: { nextCursor: page.nextCursor !== null ? encodeCursor({ token: page.nextCursor }) : null },
        });
      }

      if (req.method === "DELETE" && url.pathname === "/words") {
        const word = url.searchParams.get("word");
        if (word === null) {
          dictionary.clear();
        } else {
          const wordErr = checkWord(word);
          if (wordErr) return invalid([{ path: "word", message: wordErr }]);
          dictionary.remove(word);
        }
        res.statusCode = 204;
        res.end();
        return;
      }

      if (req.method === "GET" && url.pathname === "/lookup") {
        const word = url.searchParams.get("word");
        const wordErr = word === null ? "is required" : checkWord(word);
        if (wordErr || word === null) return invalid([{ path: "word", message: wordErr ?? "is required" }]);
        return sendJson(res, 200, dictionary.lookup(word));
      }

      if (req.method === "GET" && url.pathname === "/complete") {
        const errors: FieldError[] = [];
        const prefix = url.searchParams.get("prefix");
        const prefixErr = prefix === null ? "is required" : checkWord(prefix);
        if (prefixErr) pushErr(errors, "prefix", prefixErr);

        const force = url.searchParams.has("force") ? boolParam(url.searchParams, "force") : false;
        if (force === undefined) pushErr(errors, "force", "must be true or false");

        if (errors.length || prefix === null || force === undefined) return invalid(errors);
        return sendJson(res, 200, dictionary.complete(prefix, force));
      }

      if (req.method === "GET" && url.pathname === "/longest-prefix") {
        const text = url.searchParams.get("text");
        if (text === null) return invalid([{ path: "text", message: "is required" }]);
        if (text.length > LIMITS.textLength) return invalid([{ path: "text", message: "too long" }]);
        return sendJson(res, 200, { text, prefix: dictionary.longestPrefix(text) });
      }

      if (req.method === "GET" && url.pathname === "/dump") {
        return sendJson(res, 200, { edges: dictionary.dump() });
      }

      if (KNOWN_PATHS.has(url.pathname)) {
        return sendProblem(res, problem({ code: "METHOD_NOT_ALLOWED", detail: `${req.method ?? "?"} not allowed`, instance, requestId }));
      }
      return sendProblem(res, problem({ code: "NOT_FOUND", detail: "not found", instance, requestId }));
    } catch (e) {
      console.error(`[${requestId}] ${req.method ?? "?"} ${instance} failed:`, e);
      return sendProblem(res, problem({ code: "INTERNAL", detail: "internal error", instance, requestId }));
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

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return ct.split(";")[0]?.trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<JsonBody> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return { ok: true, value: null };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
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

function sendUnsupportedMediaType(res: http.ServerResponse, instance: string, requestId: string): void {
  sendProblem(res, problem({ code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance, requestId }));
}

function sendMalformedJson(res: http.ServerResponse, instance: string, requestId: string): void {
  sendProblem(res, problem({ code: "MALFORMED_JSON", detail: "body is not valid JSON", instance, requestId }));
}

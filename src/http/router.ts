import { randomUUID } from "node:crypto";

import { InvalidArgumentError } from "../core/index.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError } from "./problem.js";
import { asInt, isRecord, parseIntParam, pushErr } from "./validation.js";
import { createInMemoryIndexService, decodeCursor, type IndexService, type IngestInput } from "./indexService.js";

const SERVICE = "word_index";
const VERSION = "0.1.0";

const MAX_LINES = 10_000;
const MAX_TEXT = 1_000_000;
const MAX_LIST_LIMIT = 1000;
const DEFAULT_LIST_LIMIT = 100;

export interface HttpRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  contentType?: string;
  /** raw body, empty string when there is none */
  body: string;
  requestId?: string;
}

export interface HttpReply {
  status: number;
  contentType: string;
  body: unknown;
}

export type Router = (req: HttpRequest) => HttpReply;

export interface RouterOptions {
  service?: IndexService;
}

const ROUTES: Record<string, string> = {
  "/health": "GET",
  "/stats": "GET",
  "/lines": "POST",
  "/words": "GET",
};

function json(status: number, body: unknown): HttpReply {
  return { status, contentType: "application/json", body };
}

function fail(status: number, code: string, detail: string, instance: string, requestId: string, errors?: FieldError[]): HttpReply {
  return { status, contentType: PROBLEM_CONTENT_TYPE, body: problem({ status, code, detail, instance, requestId, errors }) };
}

function isJson(contentType: string | undefined): boolean {
  return (contentType ?? "").split(";")[0]?.trim().toLowerCase() === "application/json";
}

function parseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  if (!raw.length) return { ok: true, value: null };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

export function createRouter(opts: RouterOptions = {}): Router {
  const start = Date.now();
  const service = opts.service ?? createInMemoryIndexService();

  return (req) => {
    const requestId = req.requestId ?? randomUUID();
    const path = req.path;

    try {
      if (req.method === "GET" && path === "/health") {
        return json(200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (req.method === "GET" && path === "/stats") {
        return json(200, service.stats());
      }

      if (req.method === "POST" && path === "/lines") {
        if (!isJson(req.contentType)) {
          return fail(415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json", path, requestId);
        }
        if (req.body.length > MAX_TEXT * 2) {
          return fail(413, "PAYLOAD_TOO_LARGE", "request body too large", path, requestId);
        }
        const parsed = parseJson(req.body);
        if (!parsed.ok) {
          return fail(400, "INVALID_ARGUMENT", "malformed JSON", path, requestId);
        }
        const body = parsed.value;
        if (!isRecord(body)) {
          return fail(400, "INVALID_ARGUMENT", "body must be an object", path, requestId);
        }

        const errors: FieldError[] = [];
        const input = readIngestInput(body, errors);
        if (!input || errors.length) {
          return fail(400, "INVALID_ARGUMENT", "invalid request", path, requestId, errors);
        }

        return json(200, service.ingest(input));
      }

      if (req.method === "GET" && path === "/words") {
        const errors: FieldError[] = [];

        const limitParam = req.query.get("limit");
        const limit = limitParam === null ? DEFAULT_LIST_LIMIT : parseIntParam(limitParam);
        if (limit === undefined || limit < 1 || limit > MAX_LIST_LIMIT) {
          pushErr(errors, "$.limit", `must be between 1 and ${MAX_LIST_LIMIT}`);
        }

        let after: string | undefined;
        const cursor = req.query.get("cursor");
        if (cursor !== null) {
          try {
            after = decodeCursor(cursor).token;
          } catch {
            pushErr(errors, "$.cursor", "invalid cursor");
          }
        }

        if (limit === undefined || errors.length) {
          return fail(400, "INVALID_ARGUMENT", "invalid request", path, requestId, errors);
        }

        const page = service.list({ limit, after });
        return json(200, { entries: page.entries, page: { nextCursor: page.nextCursor } });
      }

      if (req.method === "GET" && path.startsWith("/words/")) {
        let word: string;
        try {
          word = decodeURIComponent(path.slice("/words/".length));
        } catch {
          return fail(400, "INVALID_ARGUMENT", "invalid request", path, requestId, [{ path: "$.word", message: "malformed percent-encoding" }]);
        }
        return json(200, service.lookup(word));
      }

      const allowed = ROUTES[path] ?? (path.startsWith("/words/") ? "GET" : undefined);
      if (allowed) {
        return fail(405, "METHOD_NOT_ALLOWED", `use ${allowed}`, path, requestId);
      }

      return fail(404, "NOT_FOUND", "not found", path, requestId);
    } catch (e) {
      if (e instanceof InvalidArgumentError) {
        const errors = [{ path: e.path ? `$.${e.path}` : "$", message: e.message }];
        return fail(400, "INVALID_ARGUMENT", "invalid request", path, requestId, errors);
      }
      return fail(500, "INTERNAL", "internal error", path, requestId);
    }
  };
}

function readIngestInput(body: Record<string, unknown>, errors: FieldError[]): IngestInput | undefined {
  let firstLine: number | undefined;
  if (body.firstLine !== undefined) {
    firstLine = asInt(body.firstLine);
    if (firstLine === undefined || firstLine < 1) pushErr(errors, "$.firstLine", "must be a positive integer");
  }

  const hasLines = body.lines !== undefined;
  const hasText = body.text !== undefined;
  if (hasLines === hasText) {
    pushErr(errors, "$", "exactly one of lines or text is required");
    return undefined;
  }

  if (hasText) {
    const text = body.text;
    if (typeof text !== "string") {
      pushErr(errors, "$.text", "must be a string");
      return undefined;
    }
    if (text.length > MAX_TEXT) pushErr(errors, "$.text", "too long");
    return { text, firstLine };
  }

  const linesVal = body.lines;
  if (!Array.isArray(linesVal)) {
    pushErr(errors, "$.lines", "must be an array");
    return undefined;
  }
  if (linesVal.length > MAX_LINES) pushErr(errors, "$.lines", `must contain at most ${MAX_LINES} items`);

  const lines: string[] = [];
  linesVal.forEach((l: unknown, i) => {
    if (typeof l === "string") lines.push(l);
    else pushErr(errors, `$.lines[${i}]`, "must be a string");
  });
  return { lines, firstLine };
}

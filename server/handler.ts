/**
 * Pure HTTP request handler. No server/listen.
 * Injected deps for testability. No domain imports node:http.
 */

import type { IncomingHttpHeaders } from "node:http";
import { Decimal } from "decimal.js";
import { add, compare, subtract } from "../domain/arithmetic.js";
import type { Scalar } from "../domain/core.js";
import type { DurationCulture } from "../domain/culture.js";
import type { Duration } from "../domain/duration.js";
import { ValidationError } from "../domain/errors.js";
import { formatDuration } from "../domain/format.js";
import { durationFromJSON, durationToJSON } from "../domain/json.js";
import { parse, parseExact } from "../domain/parse.js";
import { divide, divideByDuration, modulus, multiply } from "../domain/scaling.js";
import { apiError, mapDomainError, type ErrorCode } from "./apiErrors.js";

const API = "/api/durations";

const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** The parts of an incoming request the handler reads. */
export interface RequestSource extends AsyncIterable<Buffer | string> {
  readonly method?: string | undefined;
  readonly url?: string | undefined;
  readonly headers: IncomingHttpHeaders;
}

/** The parts of a response the handler writes. */
export interface ResponseSink {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

export type RequestHandler = (req: RequestSource, res: ResponseSink) => Promise<void>;

export interface HandlerDeps {
  culture: DurationCulture;
  logger?: { error: (err: unknown) => void };
}

type Body = Record<string, unknown>;

function sendJson(res: ResponseSink, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function sendError(
  res: ResponseSink,
  statusCode: number,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): void {
  sendJson(res, statusCode, apiError(code, message, details));
}

function getPathname(url: string | undefined, host: string | undefined): string {
  if (url === undefined) return "/";
  try {
    const base = host !== undefined ? `http://${host}` : "http://localhost";
    return new URL(url, base).pathname;
  } catch {
    return "/";
  }
}

async function parseBody(req: RequestSource): Promise<Body> {
  let text = "";
  for await (const chunk of req) {
    text += typeof chunk === "string" ? chunk : chunk.toString("utf8");
  }
  if (text.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ValidationError("Request body is not valid JSON");
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError("Request body must be a JSON object");
  }
  return { ...parsed };
}

function requireString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`, { field });
  }
  return value;
}

function optionalString(body: Body, field: string): string | null {
  const value = body[field];
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`, { field });
  }
  return value;
}

function requireDuration(body: Body, field: string): Duration {
  const value = body[field];
  if (value === undefined) {
    throw new ValidationError(`${field} is required`, { field });
  }
  return durationFromJSON(value);
}

/** Numbers pass through; strings keep full precision as decimals. */
function requireScalar(body: Body, field: string): Scalar {
  const value = body[field];
  if (typeof value === "number") return value;
  if (typeof value === "string" && DECIMAL_LITERAL.test(value.trim())) {
    return new Decimal(value.trim());
  }
  throw new ValidationError(`${field} must be a number or a decimal string`, { field });
}

/** JSON has no NaN or Infinity; those travel as their names. */
function ratioToJson(ratio: number): number | string {
  return Number.isFinite(ratio) ? ratio : String(ratio);
}

type Operation = (body: Body, deps: HandlerDeps) => Record<string, unknown>;

const OPERATIONS: Readonly<Record<string, Operation>> = {
  parse: (body, { culture }) => {
    const text = requireString(body, "text");
    const pattern = optionalString(body, "pattern");
    const d = pattern === null ? parse(text, culture) : parseExact(text, pattern, culture);
    return { value: durationToJSON(d) };
  },
  format: (body, { culture }) => ({
    text: formatDuration(requireDuration(body, "value"), optionalString(body, "pattern"), culture),
  }),
  add: (body) => ({ value: durationToJSON(add(requireDuration(body, "left"), requireDuration(body, "right"))) }),
  subtract: (body) => ({
    value: durationToJSON(subtract(requireDuration(body, "left"), requireDuration(body, "right"))),
  }),
  modulus: (body) => ({
    value: durationToJSON(modulus(requireDuration(body, "left"), requireDuration(body, "right"))),
  }),
  compare: (body) => ({ result: compare(requireDuration(body, "left"), requireDuration(body, "right")) }),
  ratio: (body) => ({
    ratio: ratioToJson(divideByDuration(requireDuration(body, "left"), requireDuration(body, "right"))),
  }),
  multiply: (body) => ({
    value: durationToJSON(multiply(requireDuration(body, "value"), requireScalar(body, "scalar"))),
  }),
  divide: (body) => ({
    value: durationToJSON(divide(requireDuration(body, "value"), requireScalar(body, "scalar"))),
  }),
};

export function createHandler(deps: HandlerDeps): RequestHandler {
  return async function handle(req, res) {
    const pathname = getPathname(req.url, req.headers.host);
    const method = req.method ?? "GET";

    if (method === "GET" && pathname === "/health") {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    // POST /api/durations/:operation
    const match = pathname.match(new RegExp(`^${API}/([a-z]+)$`));
    const name = match?.[1];
    const operation = name !== undefined && Object.hasOwn(OPERATIONS, name) ? OPERATIONS[name] : undefined;
    if (method !== "POST" || operation === undefined) {
      sendError(res, 404, "NOT_FOUND", "Not Found", { method, path: pathname });
      return;
    }

    try {
      const body = await parseBody(req);
      sendJson(res, 200, operation(body, deps));
    } catch (err) {
      const mapped = mapDomainError(err);
      if (mapped === null) throw err;
      sendJson(res, mapped.status, mapped.payload);
    }
  };
}

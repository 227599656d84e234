/**
 * Test utils — mock HTTP req/res without sockets.
 * Enables deterministic handler tests with no network.
 */

import type { IncomingHttpHeaders } from "node:http";
import type { RequestSource, ResponseSink } from "./handler.js";

export interface MockReqOptions {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  /** Serialized with JSON.stringify unless already a string. */
  body?: unknown;
}

export function mockReq(opts: MockReqOptions = {}): RequestSource {
  const bodyStr =
    opts.body === undefined ? "" : typeof opts.body === "string" ? opts.body : JSON.stringify(opts.body);
  const headers: IncomingHttpHeaders = {};
  for (const [k, v] of Object.entries(opts.headers ?? {})) {
    headers[k.toLowerCase()] = v;
  }
  return {
    method: opts.method ?? "GET",
    url: opts.url ?? "/",
    headers,
    async *[Symbol.asyncIterator]() {
      if (bodyStr !== "") yield bodyStr;
    },
  };
}

/** Captures what the handler wrote. */
export class MockResponse implements ResponseSink {
  statusCode = 0;
  headers: Record<string, string> = {};
  body = "";

  writeHead(statusCode: number, headers: Record<string, string>): this {
    this.statusCode = statusCode;
    for (const [k, v] of Object.entries(headers)) {
      this.headers[k.toLowerCase()] = v;
    }
    return this;
  }

  end(body: string): this {
    this.body = body;
    return this;
  }

  /** Parsed JSON body. */
  json(): unknown {
    return JSON.parse(this.body);
  }
}

export interface MockReqResResult {
  req: RequestSource;
  res: MockResponse;
}

export function mockReqRes(opts: MockReqOptions = {}): MockReqResResult {
  return { req: mockReq(opts), res: new MockResponse() };
}

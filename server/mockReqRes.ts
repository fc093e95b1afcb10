/**
 * Test utils: in-process req/res for handler tests, no sockets.
 */

import { Readable } from "node:stream";
import type { IncomingMessage, ServerResponse } from "node:http";

export interface MockReqOptions {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  /** Serialized as JSON; a string is sent as-is. */
  body?: unknown;
}

/** Captures what the handler writes. */
export class CapturedResponse {
  statusCode = 0;
  headers: Record<string, string> = {};
  body = "";
  headersSent = false;

  writeHead(code: number, headers?: Record<string, string | string[]>): this {
    this.statusCode = code;
    for (const [k, v] of Object.entries(headers ?? {})) {
      this.headers[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
    }
    this.headersSent = true;
    return this;
  }

  end(chunk?: string | Buffer): this {
    if (chunk != null) this.body = typeof chunk === "string" ? chunk : chunk.toString();
    return this;
  }

  json<T = unknown>(): T {
    return JSON.parse(this.body) as T;
  }
}

export type MockedResponse = ServerResponse & CapturedResponse;

export function mockReq(opts: MockReqOptions = {}): IncomingMessage {
  const raw = opts.body === undefined ? "" : typeof opts.body === "string" ? opts.body : JSON.stringify(opts.body);
  const headers: Record<string, string> = {};
  for (const [k, v] of Object.entries(opts.headers ?? {})) headers[k.toLowerCase()] = v;
  const stream = Readable.from(raw ? [raw] : []);
  return Object.assign(stream, {
    method: opts.method ?? "GET",
    url: opts.url ?? "/",
    headers,
  }) as unknown as IncomingMessage;
}

export function mockRes(): MockedResponse {
  return new CapturedResponse() as unknown as MockedResponse;
}

export function mockReqRes(opts: MockReqOptions = {}): { req: IncomingMessage; res: MockedResponse } {
  return { req: mockReq(opts), res: mockRes() };
}

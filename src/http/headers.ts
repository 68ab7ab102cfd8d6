import type { IncomingMessage } from "node:http";
import { randomUUID } from "node:crypto";

/** Subset of a response the header helpers touch; test doubles implement it. */
export interface HeaderSink {
  setHeader(name: string, value: number | string | readonly string[]): unknown;
}

/** Security headers applied to every response of the API. */
export function applySecurityHeaders(res: HeaderSink): void {
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("Referrer-Policy", "no-referrer");
}

/**
 * Guarantees that the request/response pair carries a stable correlation id.
 * Existing identifiers provided by reverse proxies are preserved to ease log
 * aggregation, otherwise a fresh UUID is minted.
 */
export function ensureRequestId(req: Pick<IncomingMessage, "headers">, res: HeaderSink): string {
  const incoming = req.headers["x-request-id"];
  const requestId = typeof incoming === "string" && incoming.trim() ? incoming.trim() : randomUUID();
  res.setHeader("x-request-id", requestId);
  return requestId;
}

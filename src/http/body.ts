import type { IncomingMessage } from "node:http";
import { Buffer } from "node:buffer";

/** Error carrying the HTTP status the router should answer with. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/** Default upper bound on accepted request bodies. */
export const MAX_JSON_BODY_BYTES = 64 * 1024;

/**
 * Reads and parses a JSON payload while enforcing an upper bound on the
 * number of bytes accepted. An empty body parses as `{}`.
 *
 * @throws {HttpError} 413 past `maxBytes`, 400 on malformed JSON.
 */
export async function readJsonBody(
  req: AsyncIterable<Buffer | string>,
  maxBytes = MAX_JSON_BODY_BYTES,
): Promise<unknown> {
  const buffers: Buffer[] = [];
  let totalBytes = 0;

  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    totalBytes += buffer.length;

    if (totalBytes > maxBytes) {
      throw new HttpError(413, "PAYLOAD_TOO_LARGE", `request body exceeds ${maxBytes} bytes`);
    }

    buffers.push(buffer);
  }

  const raw = Buffer.concat(buffers).toString("utf8");
  if (!raw.trim()) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, "INVALID_JSON", "request body is not valid JSON");
  }
}

/** Whether the request declares a JSON body (or none at all). */
export function acceptsJson(req: Pick<IncomingMessage, "headers">): boolean {
  const type = req.headers["content-type"];
  return type === undefined || type.toLowerCase().startsWith("application/json");
}

/**
 * One SSE message carrying `lines`, one `data:` field per line. Carriage
 * returns are dropped since they would end the field early.
 */
export function formatSseLines(lines: readonly string[]): string {
  return `${lines.map((line) => `data: ${line.replace(/\r/g, "")}\n`).join("")}\n`;
}

/** SSE comment frame, ignored by clients; used as a keep-alive. */
export function formatSseComment(text: string): string {
  return `: ${text}\n\n`;
}

import { Buffer } from "node:buffer";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { StructuredLogger } from "../logger.js";

/** Bytes of log lines retained per viewer when the settings omit an override. */
export const DEFAULT_SSE_MAX_BUFFERED_BYTES = 512 * 1024;

export interface LogLineBufferOptions {
  /** Site streamed to the viewer; injected in overflow warnings. */
  readonly site: string;
  readonly logger: Pick<StructuredLogger, "warn">;
  readonly maxBufferedBytes?: number;
}

/**
 * Bounded queue of log lines awaiting delivery to one SSE viewer. When the
 * viewer falls behind, the oldest lines are discarded and a warning records
 * how many were lost.
 */
export class LogLineBuffer {
  private readonly maxBufferedBytes: number;
  private queue: Array<{ line: string; bytes: number }> = [];
  private bufferedBytes = 0;
  private droppedLines = 0;

  constructor(private readonly options: LogLineBufferOptions) {
    const override = options.maxBufferedBytes;
    this.maxBufferedBytes = override && override > 0 ? override : DEFAULT_SSE_MAX_BUFFERED_BYTES;
  }

  /** Number of lines currently buffered. */
  get size(): number {
    return this.queue.length;
  }

  get bufferedSizeBytes(): number {
    return this.bufferedBytes;
  }

  /** Total number of lines dropped for this viewer. */
  get droppedLineCount(): number {
    return this.droppedLines;
  }

  push(line: string): void {
    const bytes = Buffer.byteLength(line, "utf8");
    this.queue.push({ line, bytes });
    this.bufferedBytes += bytes;
    if (this.bufferedBytes <= this.maxBufferedBytes) {
      return;
    }

    let dropped = 0;
    let freedBytes = 0;
    // The newest line always stays, even when it alone exceeds the capacity.
    while (this.bufferedBytes > this.maxBufferedBytes && this.queue.length > 1) {
      const oldest = this.queue.shift();
      if (!oldest) {
        break;
      }
      this.bufferedBytes -= oldest.bytes;
      dropped += 1;
      freedBytes += oldest.bytes;
    }
    if (dropped > 0) {
      this.droppedLines += dropped;
      this.options.logger.warn("log_stream_overflow", {
        site: this.options.site,
        dropped,
        freed_bytes: freedBytes,
        capacity_bytes: this.maxBufferedBytes,
      });
    }
  }

  /** Removes and returns every buffered line, oldest first. */
  take(): string[] {
    const lines = this.queue.map((entry) => entry.line);
    this.queue = [];
    this.bufferedBytes = 0;
    return lines;
  }
}

import { open, stat, type FileHandle } from "node:fs/promises";
import { StringDecoder } from "node:string_decoder";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { LogIOError } from "../errors.js";
import { errnoCode } from "../nodePrimitives.js";
import { sleep } from "../runtime/timers.js";

export interface WatchLogOptions {
  /** Aborting ends the sequence after the current poll. */
  readonly signal?: AbortSignal;
  /** Delay between two size checks. */
  readonly pollIntervalMs: number;
  /** Characters held for a line without newline before it is emitted in pieces. */
  readonly maxLineLength?: number;
}

/** Largest slice read from the file in one poll. */
const MAX_READ_BYTES = 1024 * 1024;

/** Longest unterminated line held between polls. */
export const DEFAULT_MAX_LINE_LENGTH = 64 * 1024;

interface FileIdentity {
  readonly ino: number;
  readonly size: number;
}

async function identify(path: string): Promise<FileIdentity | null> {
  try {
    const stats = await stat(path);
    return { ino: stats.ino, size: stats.size };
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return null;
    }
    throw new LogIOError(path, error);
  }
}

/**
 * Follows `path` from its current end and yields each line appended after the
 * call, by polling the file size. Every call owns its own cursor. The
 * sequence never completes on its own: it ends when `signal` aborts, when the
 * consumer stops iterating, or with a {@link LogIOError} once the file cannot
 * be read any more.
 *
 * A file that does not exist yet is followed from its first byte once it
 * appears. When the file shrinks, is replaced (new inode) or disappears, the
 * cursor moves to the new end and any buffered partial line is dropped.
 * An unterminated line longer than `maxLineLength` is yielded in slices of
 * that length.
 */
export async function* watchLogLines(path: string, options: WatchLogOptions): AsyncGenerator<string, void, undefined> {
  const { signal, pollIntervalMs } = options;
  const maxLineLength = Math.max(1, options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH);
  let current = await identify(path);
  let offset = current?.size ?? 0;
  let ino = current?.ino ?? null;
  let decoder = new StringDecoder("utf8");
  let partial = "";

  while (!signal?.aborted) {
    current = await identify(path);

    if (current === null) {
      // Gone: resume at the end of whatever replaces it.
      if (ino !== null) {
        ino = -1;
      }
    } else if (ino === null) {
      ino = current.ino;
      offset = 0;
    } else if (current.ino !== ino || current.size < offset) {
      ino = current.ino;
      offset = current.size;
      decoder = new StringDecoder("utf8");
      partial = "";
    }

    if (current !== null && current.size > offset) {
      const chunk = await readRange(path, offset, Math.min(current.size - offset, MAX_READ_BYTES));
      if (chunk !== null) {
        offset += chunk.length;
        const text = partial + decoder.write(chunk);
        const pieces = text.split("\n");
        partial = pieces.pop() ?? "";
        for (const line of pieces) {
          yield line.endsWith("\r") ? line.slice(0, -1) : line;
        }
        while (partial.length >= maxLineLength) {
          yield partial.slice(0, maxLineLength);
          partial = partial.slice(maxLineLength);
        }
        // More data already waiting: read it without sleeping.
        if (chunk.length > 0 && offset < current.size) {
          continue;
        }
      }
    }

    await sleep(pollIntervalMs, signal);
  }
}

/** Reads `length` bytes at `position`; `null` when the file vanished in between. */
async function readRange(path: string, position: number, length: number): Promise<Buffer | null> {
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return null;
    }
    throw new LogIOError(path, error);
  }
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, position);
    return buffer.subarray(0, bytesRead);
  } catch (error) {
    throw new LogIOError(path, error);
  } finally {
    await handle.close();
  }
}

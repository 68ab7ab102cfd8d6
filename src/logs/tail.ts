import { open, type FileHandle } from "node:fs/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { LogIOError } from "../errors.js";
import { errnoCode } from "../nodePrimitives.js";

/** Bytes read per backward step. */
const TAIL_BLOCK_BYTES = 4 * 1024;
const NEWLINE = 0x0a;

/**
 * Splits decoded log text into lines. A trailing newline does not produce an
 * empty final entry and CRLF endings lose their `\r`.
 */
export function splitLogLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/**
 * Returns up to the last `count` lines of `path`, in file order. The file is
 * read backwards in fixed blocks, so a large log costs only the bytes needed.
 * A missing file yields an empty list.
 *
 * @throws {LogIOError} When the file exists but cannot be read.
 */
export async function tailLogLines(path: string, count: number): Promise<string[]> {
  if (!Number.isFinite(count) || count < 1) {
    return [];
  }
  const wanted = Math.floor(count);

  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return [];
    }
    throw new LogIOError(path, error);
  }

  try {
    const { size } = await handle.stat();
    let position = size;
    let newlines = 0;
    const blocks: Buffer[] = [];
    // One extra newline guarantees the first kept line is complete.
    while (position > 0 && newlines <= wanted) {
      const length = Math.min(TAIL_BLOCK_BYTES, position);
      position -= length;
      const block = Buffer.alloc(length);
      const { bytesRead } = await handle.read(block, 0, length, position);
      const chunk = block.subarray(0, bytesRead);
      for (const byte of chunk) {
        if (byte === NEWLINE) {
          newlines += 1;
        }
      }
      blocks.unshift(chunk);
    }

    let lines = splitLogLines(Buffer.concat(blocks).toString("utf8"));
    if (position > 0) {
      // Reading stopped mid-file: the first entry is the tail of a longer line.
      lines = lines.slice(1);
    }
    return lines.slice(-wanted);
  } catch (error) {
    throw new LogIOError(path, error);
  } finally {
    await handle.close();
  }
}

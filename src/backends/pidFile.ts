import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { errnoCode } from "../nodePrimitives.js";
import { pidFilePath } from "../paths.js";

/**
 * Outcome of reading a pid file. `invalid` covers files whose content is not
 * a positive integer (truncated write, manual edit); callers treat them like
 * a stale record.
 */
export type PidFileRecord =
  | { readonly kind: "absent" }
  | { readonly kind: "invalid"; readonly raw: string }
  | { readonly kind: "pid"; readonly pid: number };

/**
 * The pid file is the only durable trace of a background site: one file per
 * site under `pidDir`, holding the process-group id and nothing else.
 */
export class PidFileStore {
  constructor(readonly pidDir: string) {}

  pathFor(siteName: string): string {
    return pidFilePath(this.pidDir, siteName);
  }

  async read(siteName: string): Promise<PidFileRecord> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(siteName), "utf8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return { kind: "absent" };
      }
      throw error;
    }
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) {
      return { kind: "invalid", raw: trimmed };
    }
    const pid = Number.parseInt(trimmed, 10);
    // pid 0 and 1 would address the caller's own group or init.
    if (!Number.isSafeInteger(pid) || pid <= 1) {
      return { kind: "invalid", raw: trimmed };
    }
    return { kind: "pid", pid };
  }

  async write(siteName: string, pid: number): Promise<void> {
    const target = this.pathFor(siteName);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, String(pid), "utf8");
  }

  /** Deletes the record; a missing file is not an error. */
  async remove(siteName: string): Promise<void> {
    await rm(this.pathFor(siteName), { force: true });
  }
}

import type { SiteDescriptor } from "../sites/descriptor.js";
import { sleep } from "../runtime/timers.js";
import type { BackendActionResult, ProcessBackend } from "./types.js";

/** Environment exported to every site so interpreters flush output promptly. */
export const UNBUFFERED_ENV: Readonly<Record<string, string>> = Object.freeze({ PYTHONUNBUFFERED: "1" });

/** Options shaping the script a site runs under. */
export interface LaunchOptions {
  /** Absolute path of `stdbuf`, when installed, to force line-buffered stdio. */
  readonly lineBuffer: string | null;
}

// Quote shell arguments safely for a wrapped `sh -c` command.
export function quoteShellArg(arg: string): string {
  if (arg.length > 0 && !/["'\s;|&$`\\<>()*?#~!{}[\]]/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Builds the shell script running a site's command: unbuffered output, with
 * `stdbuf -oL -eL` in front of the command when available.
 */
export function buildSiteScript(site: Pick<SiteDescriptor, "cmd">, options: LaunchOptions): string {
  const exports = Object.entries(UNBUFFERED_ENV)
    .map(([key, value]) => `export ${key}=${quoteShellArg(value)}; `)
    .join("");
  const prefix = options.lineBuffer ? `${quoteShellArg(options.lineBuffer)} -oL -eL ` : "";
  return `${exports}${prefix}${site.cmd}`;
}

/**
 * Shared `restart` sequence: stop, pause, start. The two halves are separate
 * operations; a failing start leaves the site stopped until the watchdog or
 * the operator intervenes.
 */
export async function stopThenStart(
  backend: Pick<ProcessBackend, "start" | "stop" | "mode">,
  site: SiteDescriptor,
  pauseMs: number,
): Promise<BackendActionResult> {
  const stopped = await backend.stop(site);
  if (pauseMs > 0) {
    await sleep(pauseMs);
  }
  const started = await backend.start(site);
  return {
    site: site.name,
    action: "restart",
    mode: backend.mode,
    changed: true,
    detail: stopped.changed ? `Restarted ${site.name}: ${started.detail}` : started.detail,
    pid: started.pid,
  };
}

import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import { open } from "node:fs/promises";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { BackendError, type SupervisorOperation } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError, errnoCode, type SupervisorSignal } from "../nodePrimitives.js";
import { ensureSiteLogDirectory, isDirectory } from "../paths.js";
import { sleep } from "../runtime/timers.js";
import type { SiteDescriptor } from "../sites/descriptor.js";
import { buildSiteScript, stopThenStart, UNBUFFERED_ENV } from "./launch.js";
import { PidFileStore, type PidFileRecord } from "./pidFile.js";
import type { BackendActionResult, ProcessBackend, RunState } from "./types.js";

/** Signature of `process.kill`; tests swap it to simulate permission errors. */
export type KillFunction = (pid: number, signal?: string | number) => unknown;

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface BackgroundBackendOptions {
  readonly pidDir: string;
  readonly shell: string;
  readonly lineBuffer: string | null;
  /** Time granted to a group between SIGTERM and SIGKILL. */
  readonly stopGraceMs: number;
  readonly restartPauseMs: number;
  readonly logger: StructuredLogger;
  readonly spawnImpl?: SpawnFunction;
  readonly killImpl?: KillFunction;
  /** Liveness polling period while waiting for a group to exit. */
  readonly stopPollMs?: number;
}

const DEFAULT_STOP_POLL_MS = 100;
/** Upper bound on the wait for the kernel to tear a group down after SIGKILL. */
const KILL_SETTLE_MS = 2_000;

/**
 * Runs each site as a detached process group (`<shell> -c <script>`) whose
 * stdout and stderr are appended to the site log. The group id is persisted
 * in `<pidDir>/<name>.pid`, so a restarted supervisor recovers every running
 * site from disk and liveness is always probed with signal 0 on the group.
 */
export class BackgroundBackend implements ProcessBackend {
  readonly mode = "background" as const;
  private readonly pidFiles: PidFileStore;
  private readonly spawnImpl: SpawnFunction;
  private readonly killImpl: KillFunction;

  constructor(private readonly options: BackgroundBackendOptions) {
    this.pidFiles = new PidFileStore(options.pidDir);
    this.spawnImpl = options.spawnImpl ?? nodeSpawn;
    this.killImpl = options.killImpl ?? ((pid, signal) => process.kill(pid, signal));
  }

  async start(site: SiteDescriptor): Promise<BackendActionResult> {
    const running = await this.liveGroup(site, "start");
    if (running !== null) {
      return this.result(site, "start", false, `${site.name} already running (pgid ${running})`, running);
    }
    if (!(await isDirectory(site.cwd))) {
      throw new BackendError(site.name, "start", `working directory does not exist: ${site.cwd}`);
    }

    let pid: number;
    try {
      pid = await this.launch(site);
    } catch (error) {
      throw new BackendError(site.name, "start", error);
    }

    try {
      await this.pidFiles.write(site.name, pid);
    } catch (error) {
      // Without a pid file the group could never be stopped again.
      this.signalGroup(site, "start", pid, "SIGKILL");
      throw new BackendError(site.name, "start", `cannot write pid file: ${describeError(error)}`);
    }

    this.options.logger.info("site_started", { site: site.name, mode: this.mode, pid });
    return this.result(site, "start", true, `Started ${site.name} (pgid ${pid})`, pid);
  }

  async stop(site: SiteDescriptor): Promise<BackendActionResult> {
    const pid = await this.liveGroup(site, "stop");
    if (pid === null) {
      return this.result(site, "stop", false, `${site.name} not running`, null);
    }

    this.signalGroup(site, "stop", pid, "SIGTERM");
    let forced = false;
    if (!(await this.waitForExit(site, pid, this.options.stopGraceMs))) {
      forced = true;
      this.options.logger.warn("site_stop_escalated", { site: site.name, pid, grace_ms: this.options.stopGraceMs });
      this.signalGroup(site, "stop", pid, "SIGKILL");
      if (!(await this.waitForExit(site, pid, KILL_SETTLE_MS))) {
        throw new BackendError(site.name, "stop", `process group ${pid} survived SIGKILL`);
      }
    }

    await this.removePidFile(site, "stop");
    this.options.logger.info("site_stopped", { site: site.name, mode: this.mode, pid, forced });
    return this.result(site, "stop", true, `Stopped ${site.name}`, pid);
  }

  restart(site: SiteDescriptor): Promise<BackendActionResult> {
    return stopThenStart(this, site, this.options.restartPauseMs);
  }

  async status(site: SiteDescriptor): Promise<RunState> {
    return (await this.liveGroup(site, "status")) === null ? "stopped" : "running";
  }

  /**
   * Returns the recorded group id when it is alive. Stale or unreadable
   * records are deleted on the way, which is how status self-heals after a
   * crash or an external kill.
   */
  private async liveGroup(site: SiteDescriptor, operation: SupervisorOperation): Promise<number | null> {
    let record: PidFileRecord;
    try {
      record = await this.pidFiles.read(site.name);
    } catch (error) {
      throw new BackendError(site.name, operation, error);
    }
    if (record.kind === "absent") {
      return null;
    }
    if (record.kind === "pid" && this.isGroupAlive(site, operation, record.pid)) {
      return record.pid;
    }
    await this.removePidFile(site, operation);
    this.options.logger.info("stale_pid_file_removed", {
      site: site.name,
      pid: record.kind === "pid" ? record.pid : null,
      content: record.kind === "invalid" ? record.raw : undefined,
    });
    return null;
  }

  private async launch(site: SiteDescriptor): Promise<number> {
    const logPath = await ensureSiteLogDirectory(site);
    const log = await open(logPath, "a");
    try {
      const script = buildSiteScript(site, { lineBuffer: this.options.lineBuffer });
      const child = this.spawnImpl(this.options.shell, ["-c", script], {
        cwd: site.cwd,
        detached: true,
        stdio: ["ignore", log.fd, log.fd],
        env: { ...process.env, ...UNBUFFERED_ENV },
      });
      await new Promise<void>((resolve, reject) => {
        child.once("spawn", () => resolve());
        child.once("error", reject);
      });
      child.on("error", (error) => {
        this.options.logger.warn("site_process_error", { site: site.name, message: error.message });
      });
      child.unref();
      if (typeof child.pid !== "number") {
        throw new Error("spawned process has no pid");
      }
      // `detached` makes the shell a session leader: its pid is the group id.
      return child.pid;
    } finally {
      await log.close();
    }
  }

  private isGroupAlive(site: SiteDescriptor, operation: SupervisorOperation, pid: number): boolean {
    try {
      this.killImpl(-pid, 0);
      return true;
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ESRCH") {
        return false;
      }
      if (code === "EPERM") {
        // The group exists but belongs to someone else.
        return true;
      }
      throw new BackendError(site.name, operation, error);
    }
  }

  private signalGroup(site: SiteDescriptor, operation: SupervisorOperation, pid: number, signal: SupervisorSignal): void {
    try {
      this.killImpl(-pid, signal);
    } catch (error) {
      if (errnoCode(error) === "ESRCH") {
        return;
      }
      throw new BackendError(site.name, operation, error);
    }
  }

  private async waitForExit(site: SiteDescriptor, pid: number, timeoutMs: number): Promise<boolean> {
    const pollMs = this.options.stopPollMs ?? DEFAULT_STOP_POLL_MS;
    const deadline = Date.now() + timeoutMs;
    while (this.isGroupAlive(site, "stop", pid)) {
      if (Date.now() >= deadline) {
        return false;
      }
      await sleep(pollMs);
    }
    return true;
  }

  private async removePidFile(site: SiteDescriptor, operation: SupervisorOperation): Promise<void> {
    try {
      await this.pidFiles.remove(site.name);
    } catch (error) {
      throw new BackendError(site.name, operation, error);
    }
  }

  private result(
    site: SiteDescriptor,
    action: "start" | "stop",
    changed: boolean,
    detail: string,
    pid: number | null,
  ): BackendActionResult {
    return { site: site.name, action, mode: this.mode, changed, detail, pid };
  }
}

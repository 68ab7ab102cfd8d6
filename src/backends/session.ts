import { BackendError, type SupervisorOperation } from "../errors.js";
import type { CommandResult, CommandRunner } from "../gateways/commandRunner.js";
import type { StructuredLogger } from "../logger.js";
import { ensureSiteLogDirectory, isDirectory } from "../paths.js";
import type { SiteDescriptor } from "../sites/descriptor.js";
import { buildSiteScript, quoteShellArg, stopThenStart } from "./launch.js";
import type { BackendActionResult, ProcessBackend, RunState } from "./types.js";

export interface SessionBackendOptions {
  readonly runner: CommandRunner;
  /** Multiplexer executable (`tmux`). */
  readonly tool: string;
  /** Shell interpreting the site command inside the session. */
  readonly shell: string;
  readonly lineBuffer: string | null;
  readonly restartPauseMs: number;
  readonly logger: StructuredLogger;
}

/**
 * Runs each site inside a detached multiplexer session named after the site.
 * Output goes both to the session's terminal (for `tmux attach`) and, through
 * `tee -a`, to the site log. The session name is the run handle: nothing is
 * persisted on the supervisor side.
 */
export class SessionBackend implements ProcessBackend {
  readonly mode = "session" as const;

  constructor(private readonly options: SessionBackendOptions) {}

  /** Session name for `site`; the `=` prefix makes tmux match it exactly. */
  static target(site: Pick<SiteDescriptor, "name">): string {
    return `=${site.name}`;
  }

  async start(site: SiteDescriptor): Promise<BackendActionResult> {
    if (await this.hasSession(site, "start")) {
      return this.result(site, "start", false, `${site.name} already running in session`);
    }
    if (!(await isDirectory(site.cwd))) {
      throw new BackendError(site.name, "start", `working directory does not exist: ${site.cwd}`);
    }

    let logPath: string;
    try {
      logPath = await ensureSiteLogDirectory(site);
    } catch (error) {
      throw new BackendError(site.name, "start", error);
    }
    // Grouped so every command of a compound line (`a && b`, `a; b`) reaches the pipe.
    const script = `{ ${buildSiteScript(site, { lineBuffer: this.options.lineBuffer })}\n} 2>&1 | tee -a ${quoteShellArg(logPath)}`;
    const sessionCommand = `${quoteShellArg(this.options.shell)} -c ${quoteShellArg(script)}`;
    const result = await this.invoke(site, "start", [
      "new-session",
      "-d",
      "-s",
      site.name,
      "-c",
      site.cwd,
      sessionCommand,
    ]);
    if (result.code !== 0) {
      throw new BackendError(site.name, "start", describeFailure(this.options.tool, result));
    }
    this.options.logger.info("site_started", { site: site.name, mode: this.mode });
    return this.result(site, "start", true, `Started ${site.name} in session`);
  }

  async stop(site: SiteDescriptor): Promise<BackendActionResult> {
    if (!(await this.hasSession(site, "stop"))) {
      return this.result(site, "stop", false, `Session ${site.name} not running`);
    }
    const result = await this.invoke(site, "stop", ["kill-session", "-t", SessionBackend.target(site)]);
    if (result.code !== 0) {
      // The session may have ended on its own between the probe and the kill.
      if (!(await this.hasSession(site, "stop"))) {
        return this.result(site, "stop", false, `Session ${site.name} not running`);
      }
      throw new BackendError(site.name, "stop", describeFailure(this.options.tool, result));
    }
    this.options.logger.info("site_stopped", { site: site.name, mode: this.mode });
    return this.result(site, "stop", true, `Stopped ${site.name}`);
  }

  restart(site: SiteDescriptor): Promise<BackendActionResult> {
    return stopThenStart(this, site, this.options.restartPauseMs);
  }

  async status(site: SiteDescriptor): Promise<RunState> {
    return (await this.hasSession(site, "status")) ? "running" : "stopped";
  }

  private async hasSession(site: SiteDescriptor, operation: SupervisorOperation): Promise<boolean> {
    const result = await this.invoke(site, operation, ["has-session", "-t", SessionBackend.target(site)]);
    return result.code === 0;
  }

  private async invoke(
    site: SiteDescriptor,
    operation: SupervisorOperation,
    args: readonly string[],
  ): Promise<CommandResult> {
    try {
      return await this.options.runner.run(this.options.tool, args);
    } catch (error) {
      throw new BackendError(site.name, operation, error);
    }
  }

  private result(
    site: SiteDescriptor,
    action: "start" | "stop",
    changed: boolean,
    detail: string,
  ): BackendActionResult {
    return { site: site.name, action, mode: this.mode, changed, detail, pid: null };
  }
}

function describeFailure(tool: string, result: CommandResult): string {
  const stderr = result.stderr.trim();
  return stderr.length > 0 ? stderr : `${tool} exited with code ${String(result.code)}`;
}

import type { BackendPreference } from "../config/settings.js";
import type { CommandRunner } from "../gateways/commandRunner.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { BackgroundBackend, type KillFunction, type SpawnFunction } from "./background.js";
import { SessionBackend } from "./session.js";
import type { ProcessBackend } from "./types.js";

/** What the host offers, probed once at startup. */
export interface HostCapabilities {
  /** Whether the session tool answered its version probe. */
  readonly sessionTool: boolean;
  /** Absolute path of `stdbuf`, or `null` when it is not installed. */
  readonly lineBuffer: string | null;
}

export interface ProbeOptions {
  readonly tool: string;
  readonly shell: string;
  readonly timeoutMs?: number;
}

const PROBE_TIMEOUT_MS = 5_000;

/**
 * Probes the session tool (`<tool> -V`) and `stdbuf` (`command -v stdbuf`
 * through the configured shell). A probe that cannot run counts as "absent".
 */
export async function probeHostCapabilities(
  runner: CommandRunner,
  options: ProbeOptions,
  logger?: StructuredLogger,
): Promise<HostCapabilities> {
  const timeoutMs = options.timeoutMs ?? PROBE_TIMEOUT_MS;
  const [sessionTool, lineBuffer] = await Promise.all([
    runner.run(options.tool, ["-V"], { timeoutMs }).then(
      (result) => result.code === 0,
      (error: unknown) => {
        logger?.debug("capability_probe_failed", { probe: options.tool, message: describeError(error) });
        return false;
      },
    ),
    runner.run(options.shell, ["-c", "command -v stdbuf"], { timeoutMs }).then(
      (result) => {
        const found = result.stdout.trim().split("\n")[0]?.trim() ?? "";
        return result.code === 0 && found.length > 0 ? found : null;
      },
      (error: unknown) => {
        logger?.debug("capability_probe_failed", { probe: "stdbuf", message: describeError(error) });
        return null;
      },
    ),
  ]);
  return { sessionTool, lineBuffer };
}

export interface SelectBackendOptions {
  readonly capabilities: HostCapabilities;
  readonly preference: BackendPreference;
  readonly runner: CommandRunner;
  readonly tool: string;
  readonly shell: string;
  readonly pidDir: string;
  readonly stopGraceMs: number;
  readonly restartPauseMs: number;
  readonly logger: StructuredLogger;
  readonly spawnImpl?: SpawnFunction;
  readonly killImpl?: KillFunction;
}

/**
 * Resolves the backend used for the rest of the process lifetime. `auto`
 * prefers sessions when the tool is installed. Requesting `session` on a host
 * without the tool falls back to background mode with a warning.
 */
export function selectBackend(options: SelectBackendOptions): ProcessBackend {
  const { capabilities, preference, logger } = options;
  if (preference === "session" && !capabilities.sessionTool) {
    logger.warn("session_tool_unavailable", { tool: options.tool, fallback: "background" });
  }
  const useSession = preference !== "background" && capabilities.sessionTool;

  const backend: ProcessBackend = useSession
    ? new SessionBackend({
        runner: options.runner,
        tool: options.tool,
        shell: options.shell,
        lineBuffer: capabilities.lineBuffer,
        restartPauseMs: options.restartPauseMs,
        logger,
      })
    : new BackgroundBackend({
        pidDir: options.pidDir,
        shell: options.shell,
        lineBuffer: capabilities.lineBuffer,
        stopGraceMs: options.stopGraceMs,
        restartPauseMs: options.restartPauseMs,
        logger,
        ...(options.spawnImpl ? { spawnImpl: options.spawnImpl } : {}),
        ...(options.killImpl ? { killImpl: options.killImpl } : {}),
      });

  logger.info("backend_selected", {
    mode: backend.mode,
    preference,
    session_tool: capabilities.sessionTool,
    line_buffer: capabilities.lineBuffer,
  });
  return backend;
}

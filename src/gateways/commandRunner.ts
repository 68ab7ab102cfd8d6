/**
 * Gateway used to run short-lived helper commands (the session tool, `command
 * -v` probes) and collect their exit status. The factory validates the
 * command line, enforces a timeout and never goes through a shell, so site
 * names and paths are passed to the tool verbatim.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";

import { runtimeTimers } from "../runtime/timers.js";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Options accepted by {@link CommandRunner.run}. */
export interface RunCommandOptions {
  /** Working directory of the helper process. */
  readonly cwd?: string;
  /** Milliseconds after which the helper is killed (defaults to 10s). */
  readonly timeoutMs?: number;
}

/** Outcome of a completed helper command. */
export interface CommandResult {
  /** Exit code, `null` when the process was terminated by a signal. */
  readonly code: number | null;
  readonly stdout: string;
  readonly stderr: string;
}

/** Error raised when the requested command name is invalid. */
export class InvalidCommandError extends Error {
  constructor(command: string) {
    super(`Command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidCommandError";
  }
}

/** Error raised when an argument contains a NUL byte. */
export class InvalidCommandArgumentError extends TypeError {
  constructor(index: number) {
    super(`Command arguments must not contain NUL bytes (argument ${index}).`);
    this.name = "InvalidCommandArgumentError";
  }
}

/** Error raised when the executable could not be launched at all (e.g. ENOENT). */
export class CommandUnavailableError extends Error {
  public readonly command: string;

  constructor(command: string, cause: unknown) {
    super(`Command "${command}" could not be launched: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "CommandUnavailableError";
    this.command = command;
  }
}

/** Error raised when a helper outlives its timeout. */
export class CommandTimeoutError extends Error {
  constructor(command: string, timeoutMs: number) {
    super(`Command "${command}" exceeded its timeout of ${timeoutMs}ms.`);
    this.name = "CommandTimeoutError";
  }
}

/** Contract exposed by the command runner. */
export interface CommandRunner {
  /**
   * Runs `command` with `args` and resolves once it exits, whatever the exit
   * code. Rejects with {@link CommandUnavailableError} when it cannot start
   * and with {@link CommandTimeoutError} when it hangs.
   */
  run(command: string, args: readonly string[], options?: RunCommandOptions): Promise<CommandResult>;
}

interface CommandRunnerDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Factory returning the command runner. Tests inject {@link spawnImpl} to
 * observe the wiring without launching real commands.
 */
export function createCommandRunner({ spawnImpl = nodeSpawn }: CommandRunnerDeps = {}): CommandRunner {
  return {
    run(command, args, options = {}) {
      if (typeof command !== "string" || command.trim().length === 0) {
        return Promise.reject(new InvalidCommandError(command));
      }
      const badIndex = args.findIndex((value) => value.includes("\u0000"));
      if (badIndex >= 0) {
        return Promise.reject(new InvalidCommandArgumentError(badIndex));
      }

      const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

      return new Promise<CommandResult>((resolve, reject) => {
        let child: ChildProcess;
        try {
          child = spawnImpl(command, [...args], {
            ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
            stdio: ["ignore", "pipe", "pipe"],
            shell: false,
          });
        } catch (error) {
          reject(new CommandUnavailableError(command, error));
          return;
        }

        const stdout: string[] = [];
        const stderr: string[] = [];
        child.stdout?.setEncoding("utf8");
        child.stderr?.setEncoding("utf8");
        child.stdout?.on("data", (chunk: string) => stdout.push(chunk));
        child.stderr?.on("data", (chunk: string) => stderr.push(chunk));

        let settled = false;
        const timer = runtimeTimers.setTimeout(() => {
          if (settled) {
            return;
          }
          settled = true;
          child.kill("SIGKILL");
          reject(new CommandTimeoutError(command, timeoutMs));
        }, timeoutMs);
        timer.unref?.();

        child.once("error", (error) => {
          if (settled) {
            return;
          }
          settled = true;
          runtimeTimers.clearTimeout(timer);
          reject(new CommandUnavailableError(command, error));
        });
        child.once("close", (code) => {
          if (settled) {
            return;
          }
          settled = true;
          runtimeTimers.clearTimeout(timer);
          resolve({ code, stdout: stdout.join(""), stderr: stderr.join("") });
        });
      });
    },
  };
}

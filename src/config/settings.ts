import { tmpdir } from "node:os";
import path from "node:path";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { DEFAULT_SSE_MAX_BUFFERED_BYTES } from "../http/sseBuffer.js";
import { readBool, readEnum, readInt, readOptionalString, readString } from "./env.js";

/** Backend preference accepted by `SITEWARDEN_BACKEND` and `--backend`. */
export type BackendPreference = "auto" | "session" | "background";

export const BACKEND_PREFERENCES: readonly BackendPreference[] = ["auto", "session", "background"];

/** Credentials overriding the `auth` block of the configuration file. */
export interface AuthOverrides {
  username?: string;
  password?: string;
  token?: string;
}

/**
 * Immutable runtime configuration resolved once at startup and handed to every
 * component that needs it. Nothing reads `process.env` after this point.
 */
export interface SupervisorSettings {
  /** Absolute path of the JSON configuration file listing the sites. */
  readonly configPath: string;
  /** Directory holding one `<name>.pid` file per background site. */
  readonly pidDir: string;
  /** Optional mirror of the structured log. */
  readonly logFile: string | null;
  readonly watchdogIntervalMs: number;
  /** Delay before the first watchdog cycle. */
  readonly watchdogInitialDelayMs: number;
  readonly logPollIntervalMs: number;
  /** Grace period between SIGTERM and SIGKILL when stopping a process group. */
  readonly stopGraceMs: number;
  /** Pause inserted between the stop and start halves of a restart. */
  readonly restartPauseMs: number;
  /** Shell used to interpret site commands (`<shell> -c <cmd>`). */
  readonly shell: string;
  /** Executable of the terminal multiplexer driving the session backend. */
  readonly sessionTool: string;
  readonly backend: BackendPreference;
  readonly http: {
    readonly enabled: boolean;
    readonly host: string;
    readonly port: number;
    readonly sseKeepAliveMs: number;
    readonly sseFlushMs: number;
    /** Bytes of unsent log lines kept per SSE viewer. */
    readonly sseMaxBufferedBytes: number;
  };
  readonly watchdogEnabled: boolean;
  readonly auth: AuthOverrides;
}

export const DEFAULT_HTTP_PORT = 8787;

/**
 * Builds the settings from environment variables. `env` and `cwd` are
 * injectable so tests never mutate the real process environment.
 */
export function loadSupervisorSettings(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): SupervisorSettings {
  const baseDir = path.resolve(cwd, readString("SITEWARDEN_BASE_DIR", ".", env));
  const configOverride = readOptionalString("SITEWARDEN_CONFIG", env);
  const logFile = readOptionalString("SITEWARDEN_LOG_FILE", env);

  const auth: AuthOverrides = {};
  const username = readOptionalString("SITEWARDEN_USERNAME", env);
  const password = readOptionalString("SITEWARDEN_PASSWORD", env);
  const token = readOptionalString("SITEWARDEN_TOKEN", env);
  if (username !== undefined) auth.username = username;
  if (password !== undefined) auth.password = password;
  if (token !== undefined) auth.token = token;

  return {
    configPath: configOverride ? path.resolve(cwd, configOverride) : path.join(baseDir, "config.json"),
    pidDir: path.resolve(cwd, readString("SITEWARDEN_PID_DIR", path.join(tmpdir(), "sitewarden_pids"), env)),
    logFile: logFile ? path.resolve(cwd, logFile) : null,
    watchdogIntervalMs: readInt("SITEWARDEN_WATCHDOG_INTERVAL_MS", 3_000, { min: 100 }, env),
    watchdogInitialDelayMs: readInt("SITEWARDEN_WATCHDOG_DELAY_MS", 1_000, { min: 0 }, env),
    logPollIntervalMs: readInt("SITEWARDEN_LOG_POLL_MS", 100, { min: 10, max: 5_000 }, env),
    stopGraceMs: readInt("SITEWARDEN_STOP_GRACE_MS", 5_000, { min: 0 }, env),
    restartPauseMs: readInt("SITEWARDEN_RESTART_PAUSE_MS", 300, { min: 0 }, env),
    shell: readString("SITEWARDEN_SHELL", "/bin/sh", env),
    sessionTool: readString("SITEWARDEN_SESSION_TOOL", "tmux", env),
    backend: readEnum("SITEWARDEN_BACKEND", BACKEND_PREFERENCES, "auto", env),
    http: {
      enabled: readBool("SITEWARDEN_HTTP", true, env),
      host: readString("SITEWARDEN_HTTP_HOST", "127.0.0.1", env),
      port: readInt("SITEWARDEN_HTTP_PORT", DEFAULT_HTTP_PORT, { min: 0, max: 65_535 }, env),
      sseKeepAliveMs: readInt("SITEWARDEN_SSE_KEEPALIVE_MS", 10_000, { min: 1_000 }, env),
      sseFlushMs: readInt("SITEWARDEN_SSE_FLUSH_MS", 250, { min: 10 }, env),
      sseMaxBufferedBytes: readInt("SITEWARDEN_SSE_MAX_BUFFER", DEFAULT_SSE_MAX_BUFFERED_BYTES, { min: 1_024 }, env),
    },
    watchdogEnabled: readBool("SITEWARDEN_WATCHDOG", true, env),
    auth,
  };
}

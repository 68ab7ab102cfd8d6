import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { BACKEND_PREFERENCES, type BackendPreference, type SupervisorSettings } from "./config/settings.js";

/** Settings a command-line flag may override. Absent keys keep the environment's value. */
export interface SupervisorCliOverrides {
  host?: string;
  port?: number;
  configPath?: string;
  pidDir?: string;
  logFile?: string;
  backend?: BackendPreference;
  watchdogEnabled?: boolean;
  httpEnabled?: boolean;
}

/** Raised for a malformed flag value. */
export class CliOptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliOptionError";
  }
}

const FLAG_WITH_VALUE = new Set<string>([
  "--host",
  "--port",
  "--config",
  "--pid-dir",
  "--log-file",
  "--backend",
]);

function parsePort(value: string, flag: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < 0 || num > 65_535) {
    throw new CliOptionError(`Value ${value} for ${flag} must be an integer between 0 and 65535.`);
  }
  return num;
}

function parseBackend(value: string, flag: string): BackendPreference {
  const candidate = BACKEND_PREFERENCES.find((entry) => entry === value.trim().toLowerCase());
  if (!candidate) {
    throw new CliOptionError(`Value ${value} for ${flag} must be one of ${BACKEND_PREFERENCES.join(", ")}.`);
  }
  return candidate;
}

function requireNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new CliOptionError(`${flag} cannot be empty.`);
  }
  return trimmed;
}

/**
 * Parses `process.argv.slice(2)`. Flags accept `--flag value` and
 * `--flag=value`; unknown flags and positional arguments are ignored.
 *
 * @throws {CliOptionError} When a flag lacks its value or the value is invalid.
 */
export function parseSupervisorCliOptions(argv: readonly string[]): SupervisorCliOverrides {
  const overrides: SupervisorCliOverrides = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator >= 0 ? arg.slice(0, separator) : arg;
    let value = separator >= 0 ? arg.slice(separator + 1) : undefined;

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new CliOptionError(`Flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--host":
        overrides.host = requireNonEmpty(value ?? "", flag);
        break;
      case "--port":
        overrides.port = parsePort(value ?? "", flag);
        break;
      case "--config":
        overrides.configPath = requireNonEmpty(value ?? "", flag);
        break;
      case "--pid-dir":
        overrides.pidDir = requireNonEmpty(value ?? "", flag);
        break;
      case "--log-file":
        overrides.logFile = requireNonEmpty(value ?? "", flag);
        break;
      case "--backend":
        overrides.backend = parseBackend(value ?? "", flag);
        break;
      case "--no-watchdog":
        overrides.watchdogEnabled = false;
        break;
      case "--no-http":
        overrides.httpEnabled = false;
        break;
      default:
        break;
    }
  }

  return overrides;
}

/** Returns `settings` with the flags applied; relative paths resolve against `cwd`. */
export function applyCliOverrides(
  settings: SupervisorSettings,
  overrides: SupervisorCliOverrides,
  cwd: string,
): SupervisorSettings {
  return {
    ...settings,
    configPath: overrides.configPath ? path.resolve(cwd, overrides.configPath) : settings.configPath,
    pidDir: overrides.pidDir ? path.resolve(cwd, overrides.pidDir) : settings.pidDir,
    logFile: overrides.logFile ? path.resolve(cwd, overrides.logFile) : settings.logFile,
    backend: overrides.backend ?? settings.backend,
    watchdogEnabled: overrides.watchdogEnabled ?? settings.watchdogEnabled,
    http: {
      ...settings.http,
      enabled: overrides.httpEnabled ?? settings.http.enabled,
      host: overrides.host ?? settings.http.host,
      port: overrides.port ?? settings.http.port,
    },
  };
}

import { describeError } from "./nodePrimitives.js";

/** Operations a backend can fail at. */
export type SupervisorOperation = "start" | "stop" | "restart" | "status" | "probe";

/**
 * Base class of every failure surfaced by the supervisor. Each subclass carries
 * a stable `code` the HTTP layer maps to a status, a short remediation `hint`
 * and structured `details` that end up in the log payload.
 */
export abstract class SupervisorError extends Error {
  abstract readonly code: string;
  abstract readonly hint: string;
  abstract readonly details: Record<string, unknown>;
}

/** Raised when a command references a site the registry does not know. */
export class SiteNotFoundError extends SupervisorError {
  public readonly code = "E-SITE-NOTFOUND";
  public readonly hint = "list the configured sites or reload the configuration";
  public readonly details: { site: string };

  constructor(site: string) {
    super(`site '${site}' is not registered`);
    this.name = "SiteNotFoundError";
    this.details = { site };
  }
}

/**
 * Raised when the session tool or the OS rejects a lifecycle operation
 * (spawn, signal, session creation, pid-file write).
 */
export class BackendError extends SupervisorError {
  public readonly code = "E-BACKEND";
  public readonly hint = "inspect the site log and the supervisor log for the underlying cause";
  public readonly details: { site: string; operation: SupervisorOperation; cause: string };

  constructor(site: string, operation: SupervisorOperation, cause: unknown) {
    const reason = describeError(cause);
    super(`${operation} of '${site}' failed: ${reason}`, { cause });
    this.name = "BackendError";
    this.details = { site, operation, cause: reason };
  }
}

/** Raised when a site's log file cannot be read. Only the calling viewer is affected. */
export class LogIOError extends SupervisorError {
  public readonly code = "E-LOG-IO";
  public readonly hint = "check the log path and its permissions";
  public readonly details: { path: string; cause: string };

  constructor(path: string, cause: unknown) {
    const reason = describeError(cause);
    super(`log file '${path}' is not readable: ${reason}`, { cause });
    this.name = "LogIOError";
    this.details = { path, cause: reason };
  }
}

/** Raised when a site descriptor submitted to the registry is invalid. */
export class SiteValidationError extends SupervisorError {
  public readonly code = "E-SITE-INVALID";
  public readonly hint = "fix the highlighted field and submit the site again";
  public readonly details: { field: string; reason: string };

  constructor(field: string, reason: string) {
    super(`invalid site ${field}: ${reason}`);
    this.name = "SiteValidationError";
    this.details = { field, reason };
  }
}

/** Raised when registering a site whose name is already taken. */
export class SiteConflictError extends SupervisorError {
  public readonly code = "E-SITE-EXISTS";
  public readonly hint = "pick another name or delete the existing site first";
  public readonly details: { site: string };

  constructor(site: string) {
    super(`a site named '${site}' already exists`);
    this.name = "SiteConflictError";
    this.details = { site };
  }
}

/** Raised when the configuration file cannot be read, parsed or written. */
export class ConfigError extends SupervisorError {
  public readonly code = "E-CONFIG";
  public readonly hint = "repair the configuration file or restore it from the .bak copy";
  public readonly details: { path: string; cause: string };

  constructor(path: string, cause: unknown) {
    const reason = describeError(cause);
    super(`configuration '${path}' is unusable: ${reason}`, { cause });
    this.name = "ConfigError";
    this.details = { path, cause: reason };
  }
}

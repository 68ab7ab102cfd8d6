import type { SiteDescriptor } from "../sites/descriptor.js";

/** Which mechanism runs the sites for the lifetime of the supervisor. */
export type BackendMode = "session" | "background";

/** Observed state of a site. Always derived from the live system. */
export type RunState = "running" | "stopped";

export type BackendAction = "start" | "stop" | "restart";

/** Outcome of a lifecycle operation. */
export interface BackendActionResult {
  readonly site: string;
  readonly action: BackendAction;
  readonly mode: BackendMode;
  /** `false` when the site was already in the requested state. */
  readonly changed: boolean;
  /** Human-readable summary suitable for an API response. */
  readonly detail: string;
  /** Process-group id for background starts, `null` otherwise. */
  readonly pid: number | null;
}

/**
 * Lifecycle contract shared by the session and background backends. Every
 * operation is idempotent with respect to the desired state; callers are
 * responsible for serialising operations on the same site.
 */
export interface ProcessBackend {
  readonly mode: BackendMode;
  start(site: SiteDescriptor): Promise<BackendActionResult>;
  stop(site: SiteDescriptor): Promise<BackendActionResult>;
  /** `stop` then `start`; a failure in between leaves the site stopped. */
  restart(site: SiteDescriptor): Promise<BackendActionResult>;
  status(site: SiteDescriptor): Promise<RunState>;
}

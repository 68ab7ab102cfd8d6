import { SiteNotFoundError, SupervisorError } from "../errors.js";
import { KeyedMutex } from "../infra/mutex.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { siteLogPath } from "../paths.js";
import type { SiteDescriptor, SiteDescriptorInput } from "../sites/descriptor.js";
import type { MutableSiteRegistry } from "../sites/registry.js";
import { tailLogLines } from "../logs/tail.js";
import { watchLogLines } from "../logs/watch.js";
import type { BackendAction, BackendActionResult, BackendMode, ProcessBackend, RunState } from "../backends/types.js";

/** Number of lines returned by {@link SiteSupervisor.tail} when none is requested. */
export const DEFAULT_TAIL_LINES = 200;

/** Status of one site, recomputed from the live system on every call. */
export interface SiteStatusReport {
  readonly name: string;
  readonly status: RunState;
  readonly mode: BackendMode;
  readonly port: number | null;
  readonly cwd: string;
  readonly cmd: string;
  /** Absolute path of the log file. */
  readonly log: string;
}

export interface SiteSupervisorOptions {
  readonly registry: MutableSiteRegistry;
  /** Backend chosen once at startup. */
  readonly backend: ProcessBackend;
  readonly logger: StructuredLogger;
  readonly logPollIntervalMs: number;
}

export interface AddSiteResult {
  readonly site: SiteDescriptor;
  /** Outcome of the initial start, when one was requested. */
  readonly started: BackendActionResult | null;
}

/**
 * Command surface of the supervision engine. Every backend call on a given
 * site runs under that site's lock, so API requests and the watchdog never
 * interleave a start with a stop. Different sites proceed in parallel.
 */
export class SiteSupervisor {
  private readonly locks = new KeyedMutex();
  private readonly inflight = new Set<Promise<unknown>>();

  constructor(private readonly options: SiteSupervisorOptions) {}

  get mode(): BackendMode {
    return this.options.backend.mode;
  }

  /** Current registry snapshot. */
  sites(): readonly SiteDescriptor[] {
    return this.options.registry.list();
  }

  /** @throws {SiteNotFoundError} */
  site(name: string): SiteDescriptor {
    const site = this.options.registry.get(name);
    if (!site) {
      throw new SiteNotFoundError(name);
    }
    return site;
  }

  start(name: string): Promise<BackendActionResult> {
    return this.act(name, "start");
  }

  stop(name: string): Promise<BackendActionResult> {
    return this.act(name, "stop");
  }

  /** Stop, pause, start under one lock acquisition. Not atomic. */
  restart(name: string): Promise<BackendActionResult> {
    return this.act(name, "restart");
  }

  async status(name: string): Promise<SiteStatusReport> {
    const site = this.site(name);
    const state = await this.serialized(name, () => this.options.backend.status(site));
    return this.report(site, state);
  }

  /** Status of every registered site, in registry order. */
  async listStatus(): Promise<SiteStatusReport[]> {
    return Promise.all(
      this.sites().map(async (site) => {
        const state = await this.serialized(site.name, () => this.options.backend.status(site));
        return this.report(site, state);
      }),
    );
  }

  async statusAll(): Promise<Record<string, SiteStatusReport>> {
    const reports = await this.listStatus();
    return Object.fromEntries(reports.map((report) => [report.name, report]));
  }

  /** Last `lines` lines of the site's log; empty while the log does not exist. */
  async tail(name: string, lines: number = DEFAULT_TAIL_LINES): Promise<string[]> {
    const site = this.site(name);
    return tailLogLines(siteLogPath(site), lines);
  }

  /**
   * Lines appended to the site's log from now on. The site is resolved
   * eagerly so an unknown name fails before the caller starts iterating.
   */
  watch(name: string, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    const site = this.site(name);
    return watchLogLines(siteLogPath(site), {
      pollIntervalMs: this.options.logPollIntervalMs,
      ...(signal ? { signal } : {}),
    });
  }

  /**
   * Starts the site if it is stopped, checking and starting under a single
   * lock acquisition. Returns `null` when it was already running or has been
   * removed from the registry meanwhile.
   */
  async ensureRunning(name: string): Promise<BackendActionResult | null> {
    return this.serialized(name, async () => {
      const site = this.options.registry.get(name);
      if (!site) {
        return null;
      }
      const state = await this.options.backend.status(site);
      if (state === "running") {
        return null;
      }
      return this.options.backend.start(site);
    });
  }

  async addSite(input: SiteDescriptorInput, options: { start?: boolean } = {}): Promise<AddSiteResult> {
    const site = await this.options.registry.add(input);
    const started = options.start ? await this.start(site.name) : null;
    return { site, started };
  }

  /** Stops the site, then removes it from the registry. */
  async removeSite(name: string): Promise<SiteDescriptor> {
    const site = this.site(name);
    return this.serialized(name, async () => {
      await this.options.backend.stop(site);
      return this.options.registry.remove(name);
    });
  }

  reload(): Promise<void> {
    return this.options.registry.reload();
  }

  /** Resolves once every backend operation started so far has settled. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  private async act(name: string, action: BackendAction): Promise<BackendActionResult> {
    const site = this.site(name);
    const backend = this.options.backend;
    try {
      return await this.serialized(name, () => {
        switch (action) {
          case "start":
            return backend.start(site);
          case "stop":
            return backend.stop(site);
          case "restart":
            return backend.restart(site);
        }
      });
    } catch (error) {
      this.options.logger.warn("site_action_failed", {
        site: name,
        action,
        code: error instanceof SupervisorError ? error.code : undefined,
        message: describeError(error),
      });
      throw error;
    }
  }

  private serialized<T>(name: string, operation: () => Promise<T>): Promise<T> {
    const pending = this.locks.runExclusive(name, operation);
    this.inflight.add(pending);
    const forget = () => {
      this.inflight.delete(pending);
    };
    void pending.then(forget, forget);
    return pending;
  }

  private report(site: SiteDescriptor, status: RunState): SiteStatusReport {
    return {
      name: site.name,
      status,
      mode: this.mode,
      port: site.port,
      cwd: site.cwd,
      cmd: site.cmd,
      log: siteLogPath(site),
    };
  }
}

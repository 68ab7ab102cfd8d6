import { SupervisorError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { runtimeTimers, type TimeoutHandle } from "../runtime/timers.js";
import type { BackendActionResult } from "../backends/types.js";
import type { SiteDescriptor } from "../sites/descriptor.js";

/** Slice of the supervisor the watchdog drives. */
export interface WatchdogTarget {
  sites(): readonly SiteDescriptor[];
  ensureRunning(name: string): Promise<BackendActionResult | null>;
}

export interface WatchdogOptions {
  readonly target: WatchdogTarget;
  readonly logger: StructuredLogger;
  /** Pause between the end of a cycle and the start of the next one. */
  readonly intervalMs: number;
  /** Delay before the first cycle. */
  readonly initialDelayMs: number;
}

/** Last recorded failure of a site, cleared once a cycle finds it healthy. */
export interface WatchdogFailure {
  readonly site: string;
  readonly phase: "autostart" | "autorestart";
  readonly at: string;
  readonly code: string | null;
  readonly message: string;
  /** Consecutive failed attempts. */
  readonly count: number;
}

/**
 * Reconciliation loop keeping `autorestart` sites running. Each cycle checks
 * the sites one after the other through {@link WatchdogTarget.ensureRunning},
 * which shares the per-site lock with API actions. A failing site is recorded
 * and skipped; the next cycle tries again. Cycles never overlap: the next one
 * is scheduled only once the current one has finished.
 */
export class Watchdog {
  private timer: TimeoutHandle | null = null;
  private cycle: Promise<void> | null = null;
  private running = false;
  /** Bumped by every {@link start}; a cycle only reschedules within its own generation. */
  private generation = 0;
  private cycles = 0;
  private readonly failures = new Map<string, WatchdogFailure>();

  constructor(private readonly options: WatchdogOptions) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Number of completed cycles. */
  get cycleCount(): number {
    return this.cycles;
  }

  getFailures(): WatchdogFailure[] {
    return [...this.failures.values()];
  }

  /** Starts every `autostart` site that is not running yet. Meant to run once, before {@link start}. */
  async runAutostart(): Promise<void> {
    for (const site of this.options.target.sites()) {
      if (site.autostart) {
        await this.reconcile(site, "autostart");
      }
    }
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.generation += 1;
    this.options.logger.info("watchdog_started", {
      interval_ms: this.options.intervalMs,
      initial_delay_ms: this.options.initialDelayMs,
    });
    this.schedule(this.options.initialDelayMs, this.generation);
  }

  /** Cancels the next cycle and waits for the one in flight, if any. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== null) {
      runtimeTimers.clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.cycle) {
      await this.cycle;
    }
    this.options.logger.info("watchdog_stopped", { cycles: this.cycles });
  }

  /** Runs one reconciliation pass over the `autorestart` sites. */
  async runCycle(): Promise<void> {
    let sites: readonly SiteDescriptor[];
    try {
      sites = this.options.target.sites();
    } catch (error) {
      this.options.logger.error("watchdog_cycle_failed", { message: describeError(error) });
      return;
    }
    for (const site of sites) {
      if (site.autorestart) {
        await this.reconcile(site, "autorestart");
      }
    }
    this.cycles += 1;
  }

  private schedule(delayMs: number, generation: number): void {
    this.timer = runtimeTimers.setTimeout(() => {
      this.timer = null;
      // A cycle left over from before a stop/start pair finishes first.
      const previous = this.cycle;
      const cycle = (previous ? previous.then(() => this.runCycle()) : this.runCycle()).finally(() => {
        if (this.cycle === cycle) {
          this.cycle = null;
        }
        if (this.running && generation === this.generation) {
          this.schedule(this.options.intervalMs, generation);
        }
      });
      this.cycle = cycle;
    }, delayMs);
  }

  private async reconcile(site: SiteDescriptor, phase: WatchdogFailure["phase"]): Promise<void> {
    try {
      const result = await this.options.target.ensureRunning(site.name);
      this.failures.delete(site.name);
      if (result?.changed) {
        this.options.logger.info(phase === "autostart" ? "site_autostarted" : "watchdog_restarted", {
          site: site.name,
          pid: result.pid,
        });
      }
    } catch (error) {
      const previous = this.failures.get(site.name);
      const failure: WatchdogFailure = {
        site: site.name,
        phase,
        at: new Date().toISOString(),
        code: error instanceof SupervisorError ? error.code : null,
        message: describeError(error),
        count: (previous?.count ?? 0) + 1,
      };
      this.failures.set(site.name, failure);
      this.options.logger.warn("watchdog_start_failed", failure);
    }
  }
}

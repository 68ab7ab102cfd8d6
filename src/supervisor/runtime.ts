import { mkdir } from "node:fs/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { SupervisorSettings } from "../config/settings.js";
import { createCommandRunner, type CommandRunner } from "../gateways/commandRunner.js";
import { startSupervisorServer, type SupervisorServerHandle } from "../http/server.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { ConfigSiteRegistry } from "../sites/registry.js";
import { probeHostCapabilities, selectBackend, type HostCapabilities } from "../backends/selector.js";
import type { KillFunction, SpawnFunction } from "../backends/background.js";
import { SiteSupervisor } from "./supervisor.js";
import { Watchdog } from "./watchdog.js";

export interface SupervisorRuntimeDeps {
  readonly logger: StructuredLogger;
  readonly runner?: CommandRunner;
  readonly spawnImpl?: SpawnFunction;
  readonly killImpl?: KillFunction;
}

/** Everything started by {@link startSupervisorRuntime}. */
export interface SupervisorRuntime {
  readonly registry: ConfigSiteRegistry;
  readonly capabilities: HostCapabilities;
  readonly supervisor: SiteSupervisor;
  readonly watchdog: Watchdog;
  readonly http: SupervisorServerHandle | null;
  /**
   * Stops the watchdog after its current cycle, closes log viewers and the
   * HTTP server, then waits for in-flight backend operations. Sites keep
   * running.
   */
  shutdown(): Promise<void>;
}

/**
 * Wires the supervisor from resolved settings: registry, capability probe,
 * backend selection, autostart, watchdog and HTTP API, in that order.
 */
export async function startSupervisorRuntime(
  settings: SupervisorSettings,
  deps: SupervisorRuntimeDeps,
): Promise<SupervisorRuntime> {
  const { logger } = deps;
  const runner = deps.runner ?? createCommandRunner();

  await mkdir(settings.pidDir, { recursive: true });
  const registry = await ConfigSiteRegistry.open(settings.configPath, {
    authOverrides: settings.auth,
    logger,
  });

  const capabilities = await probeHostCapabilities(
    runner,
    { tool: settings.sessionTool, shell: settings.shell },
    logger,
  );
  const backend = selectBackend({
    capabilities,
    preference: settings.backend,
    runner,
    tool: settings.sessionTool,
    shell: settings.shell,
    pidDir: settings.pidDir,
    stopGraceMs: settings.stopGraceMs,
    restartPauseMs: settings.restartPauseMs,
    logger,
    ...(deps.spawnImpl ? { spawnImpl: deps.spawnImpl } : {}),
    ...(deps.killImpl ? { killImpl: deps.killImpl } : {}),
  });

  const supervisor = new SiteSupervisor({
    registry,
    backend,
    logger,
    logPollIntervalMs: settings.logPollIntervalMs,
  });
  const watchdog = new Watchdog({
    target: supervisor,
    logger,
    intervalMs: settings.watchdogIntervalMs,
    initialDelayMs: settings.watchdogInitialDelayMs,
  });

  await watchdog.runAutostart();
  if (settings.watchdogEnabled) {
    watchdog.start();
  }

  let http: SupervisorServerHandle | null = null;
  if (settings.http.enabled) {
    try {
      http = await startSupervisorServer({
        host: settings.http.host,
        port: settings.http.port,
        supervisor,
        auth: () => registry.auth(),
        logger,
        watchdog,
        sseFlushMs: settings.http.sseFlushMs,
        sseMaxBufferedBytes: settings.http.sseMaxBufferedBytes,
        sseKeepAliveMs: settings.http.sseKeepAliveMs,
      });
    } catch (error) {
      await watchdog.stop();
      throw error;
    }
  }

  logger.info("supervisor_started", {
    mode: supervisor.mode,
    sites: registry.list().length,
    watchdog: settings.watchdogEnabled,
    http: http ? { host: http.host, port: http.port } : null,
  });

  return {
    registry,
    capabilities,
    supervisor,
    watchdog,
    http,
    async shutdown() {
      await watchdog.stop();
      if (http) {
        try {
          await http.close();
        } catch (error) {
          logger.error("http_close_failed", { message: describeError(error) });
        }
      }
      await supervisor.drain();
      logger.info("supervisor_stopped", { mode: supervisor.mode });
    },
  };
}

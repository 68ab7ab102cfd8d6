#!/usr/bin/env node
import { pathToFileURL } from "node:url";
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { loadSupervisorSettings, type SupervisorSettings } from "./config/settings.js";
import { StructuredLogger } from "./logger.js";
import { describeError } from "./nodePrimitives.js";
import { applyCliOverrides, parseSupervisorCliOptions } from "./serverOptions.js";
import { startSupervisorRuntime, type SupervisorRuntime } from "./supervisor/runtime.js";

/**
 * Entry point: resolves settings from the environment and the command line,
 * starts the supervisor and registers the shutdown hooks.
 */
async function main(): Promise<void> {
  const bootLogger = new StructuredLogger();
  let settings: SupervisorSettings;
  try {
    const overrides = parseSupervisorCliOptions(process.argv.slice(2));
    settings = applyCliOverrides(loadSupervisorSettings(), overrides, process.cwd());
  } catch (error) {
    bootLogger.error("cli_options_invalid", { message: describeError(error) });
    process.exit(1);
  }

  const logger = settings.logFile ? new StructuredLogger({ logFile: settings.logFile }) : bootLogger;

  let runtime: SupervisorRuntime;
  try {
    runtime = await startSupervisorRuntime(settings, { logger });
  } catch (error) {
    logger.error("supervisor_start_failed", { message: describeError(error) });
    await logger.flush();
    process.exit(1);
  }

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.warn("shutdown_signal", { signal });
    try {
      await runtime.shutdown();
    } catch (error) {
      logger.error("shutdown_failed", { message: describeError(error) });
    }
    await logger.flush();
    process.exit(0);
  };

  process.on("SIGINT", (signal) => {
    void shutdown(signal);
  });
  process.on("SIGTERM", (signal) => {
    void shutdown(signal);
  });
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  void main();
}

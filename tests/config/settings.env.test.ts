import { describe, it } from "mocha";
import { expect } from "chai";
import { tmpdir } from "node:os";
import path from "node:path";

import { DEFAULT_HTTP_PORT, loadSupervisorSettings } from "../../src/config/settings.js";

describe("config/settings", () => {
  const cwd = "/opt/sitewarden";

  it("resolves defaults relative to the working directory", () => {
    const settings = loadSupervisorSettings({}, cwd);

    expect(settings.configPath).to.equal("/opt/sitewarden/config.json");
    expect(settings.pidDir).to.equal(path.join(tmpdir(), "sitewarden_pids"));
    expect(settings.logFile).to.equal(null);
    expect(settings.backend).to.equal("auto");
    expect(settings.shell).to.equal("/bin/sh");
    expect(settings.sessionTool).to.equal("tmux");
    expect(settings.watchdogIntervalMs).to.equal(3_000);
    expect(settings.stopGraceMs).to.equal(5_000);
    expect(settings.watchdogEnabled).to.equal(true);
    expect(settings.http).to.deep.equal({
      enabled: true,
      host: "127.0.0.1",
      port: DEFAULT_HTTP_PORT,
      sseKeepAliveMs: 10_000,
      sseFlushMs: 250,
      sseMaxBufferedBytes: 512 * 1024,
    });
    expect(settings.auth).to.deep.equal({});
  });

  it("honours overrides from the environment", () => {
    const settings = loadSupervisorSettings(
      {
        SITEWARDEN_BASE_DIR: "state",
        SITEWARDEN_PID_DIR: "run/pids",
        SITEWARDEN_LOG_FILE: "logs/supervisor.log",
        SITEWARDEN_BACKEND: "Background",
        SITEWARDEN_HTTP: "off",
        SITEWARDEN_HTTP_PORT: "9100",
        SITEWARDEN_WATCHDOG: "no",
        SITEWARDEN_WATCHDOG_INTERVAL_MS: "500",
        SITEWARDEN_TOKEN: "test-secret",
      },
      cwd,
    );

    expect(settings.configPath).to.equal("/opt/sitewarden/state/config.json");
    expect(settings.pidDir).to.equal("/opt/sitewarden/run/pids");
    expect(settings.logFile).to.equal("/opt/sitewarden/logs/supervisor.log");
    expect(settings.backend).to.equal("background");
    expect(settings.http.enabled).to.equal(false);
    expect(settings.http.port).to.equal(9100);
    expect(settings.watchdogEnabled).to.equal(false);
    expect(settings.watchdogIntervalMs).to.equal(500);
    expect(settings.auth).to.deep.equal({ token: "test-secret" });
  });

  it("prefers an explicit config path over the base directory", () => {
    const settings = loadSupervisorSettings(
      { SITEWARDEN_BASE_DIR: "state", SITEWARDEN_CONFIG: "/etc/sitewarden.json" },
      cwd,
    );
    expect(settings.configPath).to.equal("/etc/sitewarden.json");
  });

  it("ignores out-of-range numbers and unknown backends", () => {
    const settings = loadSupervisorSettings(
      {
        SITEWARDEN_BACKEND: "docker",
        SITEWARDEN_HTTP_PORT: "70000",
        SITEWARDEN_WATCHDOG_INTERVAL_MS: "10",
      },
      cwd,
    );
    expect(settings.backend).to.equal("auto");
    expect(settings.http.port).to.equal(DEFAULT_HTTP_PORT);
    expect(settings.watchdogIntervalMs).to.equal(3_000);
  });
});

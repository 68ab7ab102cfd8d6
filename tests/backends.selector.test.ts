import { describe, it } from "mocha";
import { expect } from "chai";

import { BackgroundBackend } from "../src/backends/background.js";
import { probeHostCapabilities, selectBackend, type HostCapabilities } from "../src/backends/selector.js";
import { SessionBackend } from "../src/backends/session.js";
import type { BackendPreference } from "../src/config/settings.js";
import { CommandTimeoutError } from "../src/gateways/commandRunner.js";
import { FakeCommandRunner, failed, ok } from "./helpers/fakes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("backends/selector", () => {
  describe("probeHostCapabilities", () => {
    it("detects the session tool and stdbuf", async () => {
      const runner = new FakeCommandRunner((command) => (command === "tmux" ? ok("tmux 3.3a\n") : ok("/usr/bin/stdbuf\n")));

      const capabilities = await probeHostCapabilities(runner, { tool: "tmux", shell: "/bin/sh" });

      expect(capabilities).to.deep.equal({ sessionTool: true, lineBuffer: "/usr/bin/stdbuf" });
      expect(runner.runs.map((run) => [run.command, ...run.args])).to.deep.equal([
        ["tmux", "-V"],
        ["/bin/sh", "-c", "command -v stdbuf"],
      ]);
      expect(runner.runs[0]?.options).to.deep.equal({ timeoutMs: 5_000 });
    });

    it("treats failing or unlaunchable probes as absent", async () => {
      const logger = new RecordingLogger();
      const runner = new FakeCommandRunner((command) =>
        command === "tmux" ? new CommandTimeoutError("tmux", 10) : failed(1),
      );

      const capabilities = await probeHostCapabilities(runner, { tool: "tmux", shell: "/bin/sh", timeoutMs: 10 }, logger);

      expect(capabilities).to.deep.equal({ sessionTool: false, lineBuffer: null });
      expect(logger.payloadOf("capability_probe_failed")).to.deep.equal({
        probe: "tmux",
        message: 'Command "tmux" exceeded its timeout of 10ms.',
      });
    });
  });

  describe("selectBackend", () => {
    function select(preference: BackendPreference, capabilities: HostCapabilities, logger = new RecordingLogger()) {
      return selectBackend({
        capabilities,
        preference,
        runner: new FakeCommandRunner(),
        tool: "tmux",
        shell: "/bin/sh",
        pidDir: "/tmp/sitewarden-selector-pids",
        stopGraceMs: 100,
        restartPauseMs: 0,
        logger,
      });
    }

    const withTool: HostCapabilities = { sessionTool: true, lineBuffer: null };
    const withoutTool: HostCapabilities = { sessionTool: false, lineBuffer: "/usr/bin/stdbuf" };

    it("prefers sessions in auto mode when the tool is installed", () => {
      const logger = new RecordingLogger();
      const backend = select("auto", withTool, logger);

      expect(backend).to.be.instanceOf(SessionBackend);
      expect(logger.payloadOf("backend_selected")).to.deep.equal({
        mode: "session",
        preference: "auto",
        session_tool: true,
        line_buffer: null,
      });
    });

    it("falls back to background mode without the tool", () => {
      expect(select("auto", withoutTool)).to.be.instanceOf(BackgroundBackend);
      expect(select("background", withTool).mode).to.equal("background");
    });

    it("warns when sessions are requested but unavailable", () => {
      const logger = new RecordingLogger();
      const backend = select("session", withoutTool, logger);

      expect(backend.mode).to.equal("background");
      expect(logger.messages()).to.deep.equal(["session_tool_unavailable", "backend_selected"]);
      expect(logger.entries[0]).to.deep.equal({
        level: "warn",
        message: "session_tool_unavailable",
        payload: { tool: "tmux", fallback: "background" },
      });
    });
  });
});

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { SessionBackend } from "../src/backends/session.js";
import { BackendError } from "../src/errors.js";
import { CommandUnavailableError, createCommandRunner, type CommandResult } from "../src/gateways/commandRunner.js";
import { FakeCommandRunner, failed, makeSite, ok } from "./helpers/fakes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Runner emulating tmux sessions keyed by name. */
function tmuxEmulator(sessions: Set<string>): (command: string, args: readonly string[]) => CommandResult {
  return (_command, args) => {
    const target = (args[2] ?? "").replace(/^=/, "");
    switch (args[0]) {
      case "has-session":
        return sessions.has(target) ? ok() : failed(1, `can't find session: ${target}`);
      case "kill-session":
        sessions.delete(target);
        return ok();
      case "new-session": {
        const name = args[3] ?? "";
        if (sessions.has(name)) {
          return failed(1, `duplicate session: ${name}`);
        }
        sessions.add(name);
        return ok();
      }
      default:
        return failed(1, "unknown command");
    }
  };
}

async function captureError(operation: () => Promise<unknown>): Promise<unknown> {
  try {
    await operation();
  } catch (error) {
    return error;
  }
  throw new Error("expected the operation to fail");
}

describe("backends/session", () => {
  let cwd: string;
  let sessions: Set<string>;
  let runner: FakeCommandRunner;
  let logger: RecordingLogger;

  function createBackend(lineBuffer: string | null = null): SessionBackend {
    return new SessionBackend({ runner, tool: "tmux", shell: "/bin/sh", lineBuffer, restartPauseMs: 0, logger });
  }

  beforeEach(async () => {
    cwd = await mkdtemp(path.join(tmpdir(), "sitewarden-session-"));
    sessions = new Set();
    runner = new FakeCommandRunner(tmuxEmulator(sessions));
    logger = new RecordingLogger();
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it("starts a detached session piping output into the site log", async () => {
    const backend = createBackend();
    const site = makeSite({ name: "blog", cwd, cmd: "npm start", log: "logs/app.log" });

    const result = await backend.start(site);

    expect(result).to.deep.equal({
      site: "blog",
      action: "start",
      mode: "session",
      changed: true,
      detail: "Started blog in session",
      pid: null,
    });
    const logPath = path.join(cwd, "logs/app.log");
    expect(runner.runs[1]?.args).to.deep.equal([
      "new-session",
      "-d",
      "-s",
      "blog",
      "-c",
      cwd,
      `/bin/sh -c '{ export PYTHONUNBUFFERED=1; npm start\n} 2>&1 | tee -a ${logPath}'`,
    ]);
    expect((await stat(path.join(cwd, "logs"))).isDirectory()).to.equal(true);
    expect(logger.payloadOf("site_started")).to.deep.equal({ site: "blog", mode: "session" });
  });

  it("prefixes the command with stdbuf when available", async () => {
    const backend = createBackend("/usr/bin/stdbuf");
    await backend.start(makeSite({ name: "blog", cwd, cmd: "node server.js" }));

    const command = runner.runs[1]?.args[6];
    expect(command).to.equal(
      `/bin/sh -c '{ export PYTHONUNBUFFERED=1; /usr/bin/stdbuf -oL -eL node server.js\n} 2>&1 | tee -a ${path.join(cwd, "activity.log")}'`,
    );
  });

  it("sends every command of a compound line to the site log", async () => {
    await createBackend().start(makeSite({ name: "blog", cwd, cmd: "echo hi && echo there; echo oops >&2", log: "out.log" }));
    const sessionCommand = runner.runs[1]?.args[6] ?? "";

    const shell = await createCommandRunner().run("/bin/sh", ["-c", sessionCommand], { cwd, timeoutMs: 5_000 });

    expect(shell.code).to.equal(0);
    expect(await readFile(path.join(cwd, "out.log"), "utf8")).to.equal("hi\nthere\noops\n");
  });

  it("does nothing when the session already exists", async () => {
    sessions.add("blog");
    const result = await createBackend().start(makeSite({ name: "blog", cwd }));

    expect(result.changed).to.equal(false);
    expect(result.detail).to.equal("blog already running in session");
    expect(runner.subcommands("tmux")).to.deep.equal(["has-session"]);
    expect(runner.runs[0]?.args).to.deep.equal(["has-session", "-t", "=blog"]);
  });

  it("refuses to start in a missing working directory", async () => {
    const error = await captureError(() => createBackend().start(makeSite({ name: "blog", cwd: path.join(cwd, "gone") })));

    expect(error).to.be.instanceOf(BackendError);
    expect(error).to.have.nested.property("details.operation", "start");
    expect(runner.subcommands("tmux")).to.deep.equal(["has-session"]);
  });

  it("surfaces the tool's stderr when the session cannot be created", async () => {
    runner.respond((_command, args) => (args[0] === "new-session" ? failed(1, "no server running\n") : failed(1)));

    const error = await captureError(() => createBackend().start(makeSite({ name: "blog", cwd })));
    expect(error).to.be.instanceOf(BackendError);
    expect(error).to.have.property("message", "start of 'blog' failed: no server running");
  });

  it("kills running sessions and reports stopped ones", async () => {
    sessions.add("blog");
    const backend = createBackend();
    const site = makeSite({ name: "blog", cwd });

    const stopped = await backend.stop(site);
    expect(stopped).to.include({ changed: true, detail: "Stopped blog" });
    expect(runner.runs[1]?.args).to.deep.equal(["kill-session", "-t", "=blog"]);
    expect(await backend.status(site)).to.equal("stopped");

    const again = await backend.stop(site);
    expect(again).to.include({ changed: false, detail: "Session blog not running" });
  });

  it("treats a session that ended during the kill as stopped", async () => {
    let probes = 0;
    runner.respond((_command, args) => {
      if (args[0] === "has-session") {
        probes += 1;
        return probes === 1 ? ok() : failed(1);
      }
      return failed(1, "session not found");
    });

    const result = await createBackend().stop(makeSite({ name: "blog", cwd }));
    expect(result).to.include({ changed: false, detail: "Session blog not running" });
  });

  it("restarts by stopping then starting", async () => {
    sessions.add("blog");
    const result = await createBackend().restart(makeSite({ name: "blog", cwd }));

    expect(result).to.include({
      action: "restart",
      changed: true,
      detail: "Restarted blog: Started blog in session",
    });
    expect(runner.subcommands("tmux")).to.deep.equal(["has-session", "kill-session", "has-session", "new-session"]);
    expect(sessions.has("blog")).to.equal(true);
  });

  it("wraps runner failures in a backend error", async () => {
    runner.respond(() => new CommandUnavailableError("tmux", new Error("spawn tmux ENOENT")));

    const error = await captureError(() => createBackend().status(makeSite({ name: "blog", cwd })));
    expect(error).to.be.instanceOf(BackendError);
    expect(error).to.have.nested.property("details.operation", "status");
  });
});

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { ConfigError, SiteConflictError, SiteNotFoundError, SiteValidationError } from "../src/errors.js";
import { ConfigSiteRegistry } from "../src/sites/registry.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

async function captureError(operation: () => Promise<unknown>): Promise<unknown> {
  try {
    await operation();
  } catch (error) {
    return error;
  }
  throw new Error("expected the operation to fail");
}

describe("sites/registry", () => {
  let root: string;
  let siteDir: string;
  let configPath: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "sitewarden-registry-"));
    siteDir = path.join(root, "blog");
    await mkdir(siteDir);
    configPath = path.join(root, "config.json");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("creates a default configuration when the file is missing", async () => {
    const logger = new RecordingLogger();
    const registry = await ConfigSiteRegistry.open(configPath, { logger });

    expect(registry.list()).to.deep.equal([]);
    expect(registry.auth()).to.deep.equal({ username: "admin", password: "password" });
    const written: unknown = JSON.parse(await readFile(configPath, "utf8"));
    expect(written).to.deep.equal({ sites: [], auth: { username: "admin", password: "password" } });
    expect(logger.messages()).to.deep.equal(["config_created", "config_loaded"]);
  });

  it("normalises loose entries from a hand-edited file", async () => {
    await writeFile(
      configPath,
      JSON.stringify({ sites: [{ name: "blog", cwd: siteDir, cmd: " npm start ", port: "3000", log: "" }] }),
    );
    const registry = await ConfigSiteRegistry.open(configPath);

    expect(registry.get("blog")).to.deep.equal({
      name: "blog",
      cwd: siteDir,
      cmd: "npm start",
      port: 3000,
      log: "activity.log",
      autostart: false,
      autorestart: false,
    });
    expect(registry.auth()).to.deep.equal({});
    expect(registry.get("shop")).to.equal(undefined);
  });

  it("warns about sites whose working directory is missing", async () => {
    const missing = path.join(root, "gone");
    await writeFile(configPath, JSON.stringify({ sites: [{ name: "gone", cwd: missing, cmd: "run" }] }));
    const logger = new RecordingLogger();
    await ConfigSiteRegistry.open(configPath, { logger });

    expect(logger.payloadOf("site_cwd_missing")).to.deep.equal({ site: "gone", cwd: missing });
  });

  it("rejects malformed and duplicated configurations", async () => {
    await writeFile(configPath, "{ not json");
    expect(await captureError(() => ConfigSiteRegistry.open(configPath))).to.be.instanceOf(ConfigError);

    await writeFile(
      configPath,
      JSON.stringify({
        sites: [
          { name: "blog", cwd: siteDir, cmd: "a" },
          { name: "blog", cwd: siteDir, cmd: "b" },
        ],
      }),
    );
    const duplicate = await captureError(() => ConfigSiteRegistry.open(configPath));
    expect(duplicate).to.be.instanceOf(ConfigError);
    expect(duplicate).to.have.property("message").that.contains("duplicate site name 'blog'");
  });

  it("persists added sites and keeps a backup of the previous file", async () => {
    const registry = await ConfigSiteRegistry.open(configPath);
    const previous = await readFile(configPath, "utf8");

    const site = await registry.add({ name: "blog", cwd: siteDir, cmd: "npm start", port: 4000, autorestart: true });

    expect(site).to.deep.equal({
      name: "blog",
      cwd: siteDir,
      cmd: "npm start",
      port: 4000,
      log: "activity.log",
      autostart: false,
      autorestart: true,
    });
    expect(registry.list().map((entry) => entry.name)).to.deep.equal(["blog"]);
    expect(await readFile(`${configPath}.bak`, "utf8")).to.equal(previous);

    const reopened = await ConfigSiteRegistry.open(configPath);
    expect(reopened.get("blog")).to.deep.equal(site);
    expect(reopened.auth()).to.deep.equal({ username: "admin", password: "password" });
  });

  it("validates new sites before writing anything", async () => {
    const registry = await ConfigSiteRegistry.open(configPath);

    const badName = await captureError(() => registry.add({ name: "my blog", cwd: siteDir, cmd: "run" }));
    expect(badName).to.be.instanceOf(SiteValidationError);
    expect(badName).to.have.nested.property("details.field", "name");

    const badCwd = await captureError(() => registry.add({ name: "blog", cwd: path.join(root, "nope"), cmd: "run" }));
    expect(badCwd).to.have.nested.property("details.field", "cwd");

    const badLog = await captureError(() => registry.add({ name: "blog", cwd: siteDir, cmd: "run", log: "../x.log" }));
    expect(badLog).to.have.nested.property("details.field", "log");

    const emptyCmd = await captureError(() => registry.add({ name: "blog", cwd: siteDir, cmd: "   " }));
    expect(emptyCmd).to.have.nested.property("details.field", "cmd");

    expect(registry.list()).to.deep.equal([]);
  });

  it("refuses duplicate names and removes sites", async () => {
    const registry = await ConfigSiteRegistry.open(configPath);
    await registry.add({ name: "blog", cwd: siteDir, cmd: "run" });

    expect(await captureError(() => registry.add({ name: "blog", cwd: siteDir, cmd: "other" }))).to.be.instanceOf(
      SiteConflictError,
    );

    const removed = await registry.remove("blog");
    expect(removed.name).to.equal("blog");
    expect(registry.list()).to.deep.equal([]);
    expect(await captureError(() => registry.remove("blog"))).to.be.instanceOf(SiteNotFoundError);
  });

  it("picks up external edits on reload and merges credential overrides", async () => {
    const registry = await ConfigSiteRegistry.open(configPath, { authOverrides: { password: "test-secret" } });
    expect(registry.auth()).to.deep.equal({ username: "admin", password: "test-secret" });

    await writeFile(
      configPath,
      JSON.stringify({ sites: [{ name: "blog", cwd: siteDir, cmd: "run" }], auth: { token: "file-token" } }),
    );
    await registry.reload();

    expect(registry.list().map((site) => site.name)).to.deep.equal(["blog"]);
    expect(registry.auth()).to.deep.equal({ token: "file-token", password: "test-secret" });
  });
});

import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { runWithRequestContext } from "../src/infra/requestContext.js";
import { parseRedactionDirectives, StructuredLogger, type LogEntry } from "../src/logger.js";

describe("StructuredLogger", () => {
  it("rotates the mirrored file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "sitewarden-logger-"));
    const logFile = path.join(directory, "supervisor.log");

    try {
      const logger = new StructuredLogger({ logFile, maxFileSizeBytes: 256, maxFileCount: 3 });
      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }
      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("supervisor.log");
      expect(files).to.include("supervisor.log.1");
      const archived = await readFile(path.join(directory, "supervisor.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("redacts configured secrets and sensitive keys", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      logFile: null,
      redactSecrets: ["test-secret"],
      onEntry: (entry) => entries.push(entry),
    });

    logger.warn("http_unauthorized", { token: "abc", note: "bearer test-secret rejected" });

    expect(entries).to.have.length(1);
    expect(entries[0]?.payload).to.deep.equal({ token: "[REDACTED]", note: "bearer [REDACTED] rejected" });
  });

  it("tags entries emitted while serving a request", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ logFile: null, onEntry: (entry) => entries.push(entry) });

    runWithRequestContext({ requestId: "req-42", method: "POST", path: "/api/sites/blog/start" }, () => {
      logger.info("site_started", { site: "blog" });
    });
    logger.info("site_stopped", { site: "blog" });

    expect(entries.map((entry) => entry.request_id)).to.deep.equal(["req-42", undefined]);
    expect(entries[0]?.level).to.equal("info");
  });

  it("parses redaction directives", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("test-secret, test-secret")).to.deep.equal({
      enabled: true,
      tokens: ["test-secret"],
    });
    expect(parseRedactionDirectives("on, test-secret, off")).to.deep.equal({ enabled: false, tokens: ["test-secret"] });
  });
});

/**
 * Offline guard ensuring that the test suite never performs real network
 * operations. The Mocha bootstrap (`tests/setup.ts`) installs interceptors on
 * the low-level networking primitives; these tests assert they are active.
 */
import { describe, it } from "mocha";
import { expect } from "chai";
import { Socket } from "node:net";

import { deriveConnectionTarget, isAllowedLoopback, normaliseHost } from "./lib/networkGuard.js";

describe("offline guard", () => {
  it("rejects outbound socket connections", () => {
    const socket = new Socket();
    try {
      expect(() => socket.connect({ host: "example.com", port: 80 })).to.throw(
        "network access via net.Socket#connect is disabled during tests",
      );
    } finally {
      socket.destroy();
    }
  });

  it("exposes the guard mode and blocks fetch to remote hosts", async () => {
    const guard: unknown = Reflect.get(globalThis, "__OFFLINE_TEST_GUARD__");
    expect(guard).to.be.oneOf(["loopback-only", "network-blocked"]);

    let failure: unknown;
    try {
      await fetch("http://example.com");
    } catch (error) {
      failure = error;
    }
    expect(failure).to.be.instanceOf(Error);
    expect(failure).to.have.property("message", "network access via fetch is disabled during tests");
    expect(failure).to.have.property("code", "E-NETWORK-BLOCKED");
  });

  it("derives the destination from every connect signature", () => {
    expect(deriveConnectionTarget([{ host: "10.0.0.1", port: 22 }])).to.deep.equal({
      host: "10.0.0.1",
      port: 22,
      path: undefined,
    });
    expect(deriveConnectionTarget([8080, "localhost"])).to.deep.equal({ host: "localhost", port: 8080 });
    expect(deriveConnectionTarget(["/run/app.sock"])).to.deep.equal({ path: "/run/app.sock" });
    expect(deriveConnectionTarget(["3000"])).to.deep.equal({ host: undefined, port: 3000 });
  });

  it("only treats TCP loopback destinations as local", () => {
    expect(normaliseHost(" [::1] ")).to.equal("::1");
    expect(isAllowedLoopback({ host: "LOCALHOST", port: 45000 })).to.equal(true);
    expect(isAllowedLoopback({ port: 45000 })).to.equal(true);
    expect(isAllowedLoopback({ host: "192.168.1.10", port: 80 })).to.equal(false);
    expect(isAllowedLoopback({ path: "/run/app.sock" })).to.equal(false);
  });
});

import { describe, it } from "mocha";
import { expect } from "chai";

import {
  authorizeRequest,
  checkToken,
  parseBasicCredentials,
  parseBearerToken,
  readAuthorizationHeader,
} from "../../src/http/auth.js";
import { basicAuth } from "../helpers/http.js";

describe("http/auth", () => {
  it("compares secrets in constant time and refuses empty values", () => {
    expect(checkToken("test-secret", "test-secret")).to.equal(true);
    expect(checkToken("test-secreT", "test-secret")).to.equal(false);
    expect(checkToken("test", "test-secret")).to.equal(false);
    expect(checkToken(undefined, "test-secret")).to.equal(false);
    expect(checkToken("", "")).to.equal(false);
  });

  it("reads and parses the authorization header", () => {
    expect(readAuthorizationHeader({ authorization: ["  Bearer one ", "Bearer two"] })).to.equal("Bearer one");
    expect(readAuthorizationHeader({})).to.equal("");
    expect(parseBearerToken("bearer   test-token ")).to.equal("test-token");
    expect(parseBearerToken("Basic abc")).to.equal(undefined);
    expect(parseBasicCredentials(basicAuth("admin", "pa:ss"))).to.deep.equal({ username: "admin", password: "pa:ss" });
    expect(parseBasicCredentials(`Basic ${Buffer.from("no-separator").toString("base64")}`)).to.equal(undefined);
    expect(parseBasicCredentials("Bearer test-token")).to.equal(undefined);
  });

  it("lets every request through when no credentials are configured", () => {
    expect(authorizeRequest({}, {})).to.equal(true);
    expect(authorizeRequest({ authorization: "Bearer whatever" }, {})).to.equal(true);
    expect(authorizeRequest({ authorization: basicAuth("admin", "test-secret") }, {})).to.equal(true);
  });

  it("requires both the username and the password for Basic auth", () => {
    const auth = { username: "admin", password: "test-secret" };
    expect(authorizeRequest({ authorization: basicAuth("admin", "test-secret") }, auth)).to.equal(true);
    expect(authorizeRequest({ authorization: basicAuth("admin", "wrong") }, auth)).to.equal(false);
    expect(authorizeRequest({ authorization: basicAuth("root", "test-secret") }, auth)).to.equal(false);
    expect(authorizeRequest({}, auth)).to.equal(false);
    expect(authorizeRequest({ authorization: "Bearer test-secret" }, auth)).to.equal(false);
  });

  it("accepts a configured bearer token alongside Basic credentials", () => {
    const auth = { username: "admin", password: "test-secret", token: "test-token" };
    expect(authorizeRequest({ authorization: "Bearer test-token" }, auth)).to.equal(true);
    expect(authorizeRequest({ authorization: "Bearer nope" }, auth)).to.equal(false);
    expect(authorizeRequest({ authorization: basicAuth("admin", "test-secret") }, auth)).to.equal(true);
    expect(authorizeRequest({ authorization: basicAuth("admin", "test-secret") }, { token: "test-token" })).to.equal(
      false,
    );
  });
});

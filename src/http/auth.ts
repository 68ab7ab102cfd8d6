import { Buffer } from "node:buffer";
import { timingSafeEqual } from "node:crypto";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import type { AuthConfig } from "../sites/descriptor.js";

type HttpHeaders = Record<string, string | string[] | undefined>;

const BEARER_PATTERN = /^Bearer\s+(.+)$/i;
const BASIC_PATTERN = /^Basic\s+(\S+)\s*$/i;

/** Username/password pair decoded from a Basic `Authorization` header. */
export interface BasicCredentials {
  readonly username: string;
  readonly password: string;
}

/**
 * Constant-time comparison between a presented secret and the configured one.
 * Missing input and an empty expected value never match.
 */
export function checkToken(reqToken: string | undefined, expected: string | undefined): boolean {
  if (!reqToken || !expected) {
    return false;
  }

  const provided = Buffer.from(reqToken);
  const reference = Buffer.from(expected);

  if (provided.length !== reference.length) {
    // `timingSafeEqual` throws on length mismatch.
    return false;
  }

  return timingSafeEqual(provided, reference);
}

/** First `Authorization` value, trimmed. */
export function readAuthorizationHeader(headers: HttpHeaders): string {
  const value = headers["authorization"];
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === "string" ? first.trim() : "";
}

/** Token of a `Bearer <token>` header, if that is the scheme used. */
export function parseBearerToken(header: string): string | undefined {
  const match = BEARER_PATTERN.exec(header);
  const token = match?.[1]?.trim();
  return token && token.length > 0 ? token : undefined;
}

/**
 * Decodes `Basic <base64(user:password)>`. Returns `undefined` for any other
 * scheme or when the decoded value lacks the `:` separator. The password may
 * itself contain colons.
 */
export function parseBasicCredentials(header: string): BasicCredentials | undefined {
  const match = BASIC_PATTERN.exec(header);
  const encoded = match?.[1];
  if (!encoded) {
    return undefined;
  }
  const decoded = Buffer.from(encoded, "base64").toString("utf8");
  const separator = decoded.indexOf(":");
  if (separator < 0) {
    return undefined;
  }
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * Decides whether a request may reach the API.
 *
 * - A configured token accepts `Authorization: Bearer <token>`; a Bearer
 *   header with the wrong token is rejected outright.
 * - Basic credentials must match both the configured username and password.
 * - With neither credentials nor a token configured, every request passes.
 */
export function authorizeRequest(headers: HttpHeaders, auth: AuthConfig): boolean {
  if (!auth.username && !auth.password && !auth.token) {
    return true;
  }
  const header = readAuthorizationHeader(headers);

  const bearer = parseBearerToken(header);
  if (auth.token && bearer !== undefined) {
    return checkToken(bearer, auth.token);
  }

  const basic = parseBasicCredentials(header);
  if (basic) {
    // Evaluate both comparisons so timing does not reveal which one failed.
    const userMatches = checkToken(basic.username, auth.username);
    const passwordMatches = checkToken(basic.password, auth.password);
    return userMatches && passwordMatches;
  }

  return false;
}

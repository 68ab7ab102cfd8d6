/**
 * Readers for `SITEWARDEN_*` environment variables. Every helper trims the raw
 * value, treats blanks as unset and falls back to the caller's default when
 * the literal cannot be coerced, so a typo never crashes the supervisor at
 * boot.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

type Env = Record<string, string | undefined>;

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Reads `name` as a boolean ("1", "true", "yes", "on" and their negations). */
export function readBool(name: string, defaultValue: boolean, env: Env = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

export function readOptionalBool(name: string, env: Env = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/**
 * Reads `name` as a base-10 integer. Out-of-range or malformed literals yield
 * the default.
 */
export function readInt(name: string, defaultValue: number, options?: NumberOptions, env: Env = process.env): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

export function readOptionalInt(name: string, options?: NumberOptions, env: Env = process.env): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Reads a trimmed string, treating blanks as unset. */
export function readString(name: string, defaultValue: string, env: Env = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

export function readOptionalString(name: string, env: Env = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

/**
 * Reads an enum-like variable, case-insensitively, returning the canonical
 * spelling from `allowed`.
 */
function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: Env = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: Env = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}

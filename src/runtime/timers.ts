import {
  clearInterval as nodeClearInterval,
  clearTimeout as nodeClearTimeout,
  setInterval as nodeSetInterval,
  setTimeout as nodeSetTimeout,
} from "node:timers";

/**
 * Handle returned by {@link runtimeSetTimeout}. The type mirrors the Node.js
 * timer handle so callers can keep calling `.unref()`.
 */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

/** Handle returned by {@link runtimeSetInterval}. */
export type IntervalHandle = ReturnType<typeof nodeSetInterval>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
  setInterval: nodeSetInterval,
  clearInterval: nodeClearInterval,
} as const;

/**
 * Looks the timer function up on {@link globalThis} at call time. Sinon fake
 * timers install their overrides there, so the watchdog and the log watchers
 * follow the fake clock instead of the captured Node implementation.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate = (globalThis as Record<string, unknown>)[key];
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

export function runtimeSetTimeout(...args: Parameters<typeof nodeSetTimeout>): TimeoutHandle {
  const candidate = resolveTimer("setTimeout");
  if (candidate === fallbackTimers.setTimeout) {
    return candidate(...args);
  }
  return candidate.apply(globalThis, args);
}

export function runtimeClearTimeout(handle: TimeoutHandle | number): void {
  const candidate = resolveTimer("clearTimeout");
  if (candidate === fallbackTimers.clearTimeout) {
    candidate(handle as TimeoutHandle);
    return;
  }
  candidate.apply(globalThis, [handle]);
}

export function runtimeSetInterval(...args: Parameters<typeof nodeSetInterval>): IntervalHandle {
  const candidate = resolveTimer("setInterval");
  if (candidate === fallbackTimers.setInterval) {
    return candidate(...args);
  }
  return candidate.apply(globalThis, args);
}

export function runtimeClearInterval(handle: IntervalHandle | number): void {
  const candidate = resolveTimer("clearInterval");
  if (candidate === fallbackTimers.clearInterval) {
    candidate(handle as IntervalHandle);
    return;
  }
  candidate.apply(globalThis, [handle]);
}

/**
 * Resolves after `ms` milliseconds, or as soon as `signal` aborts. Aborting
 * never rejects: pollers check `signal.aborted` after waking up and leave
 * their loop on their own terms.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve) => {
    const onAbort = () => {
      runtimeClearTimeout(handle);
      resolve();
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Grouped export so call-sites can write `runtimeTimers.setTimeout(...)`. */
export const runtimeTimers = {
  setTimeout: runtimeSetTimeout,
  clearTimeout: runtimeClearTimeout,
  setInterval: runtimeSetInterval,
  clearInterval: runtimeClearInterval,
  sleep,
} as const;

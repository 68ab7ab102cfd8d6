/*
 * Small runtime-dependent helpers shared by the backends and the log readers.
 */

/** POSIX signals the supervisor sends to process groups. */
export type SupervisorSignal = "SIGTERM" | "SIGKILL" | "SIGINT" | "SIGHUP";

/**
 * Lightweight representation of an errno-flavoured error. Only the properties
 * inspected in the codebase are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown rejection to an {@link ErrnoException}. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && (("code" in error && typeof error.code === "string") || "errno" in error);
}

/** Returns the errno code carried by `error`, if any. */
export function errnoCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}

/** Renders an unknown failure as a human-readable message. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

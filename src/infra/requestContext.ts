import { AsyncLocalStorage } from "node:async_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Correlation data attached to every log entry emitted while serving a request. */
export interface RequestContext {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
}

/**
 * AsyncLocalStorage exposing the HTTP request being served to the supervisor
 * and backends, so their log entries can be tied back to the API call that
 * triggered them without threading an id through every signature.
 */
const storage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(context: RequestContext, callback: () => T): T {
  return storage.run(context, callback);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

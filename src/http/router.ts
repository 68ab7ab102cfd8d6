import { Buffer } from "node:buffer";
import type { IncomingMessage, ServerResponse } from "node:http";
import { URL } from "node:url";
import { z } from "zod";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import {
  BackendError,
  SiteConflictError,
  SiteNotFoundError,
  SiteValidationError,
  SupervisorError,
} from "../errors.js";
import { runWithRequestContext } from "../infra/requestContext.js";
import type { StructuredLogger } from "../logger.js";
import { describeError } from "../nodePrimitives.js";
import { runtimeTimers, type IntervalHandle } from "../runtime/timers.js";
import type { AuthConfig } from "../sites/descriptor.js";
import { DEFAULT_TAIL_LINES, type SiteSupervisor } from "../supervisor/supervisor.js";
import type { Watchdog } from "../supervisor/watchdog.js";
import type { BackendAction } from "../backends/types.js";
import { authorizeRequest } from "./auth.js";
import { HttpError, acceptsJson, formatSseComment, formatSseLines, readJsonBody } from "./body.js";
import { applySecurityHeaders, ensureRequestId } from "./headers.js";
import { LogLineBuffer } from "./sseBuffer.js";

/** First SSE frame of every stream; tells the viewer to reset its buffer. */
export const SSE_CLEAR_FRAME = "data: __CLEAR__\n\n";

/** Upper bound on `?lines=` for the log endpoint. */
export const MAX_TAIL_LINES = 10_000;

const AddSiteRequestSchema = z.object({
  name: z.string(),
  cwd: z.string(),
  cmd: z.string(),
  port: z.number().nullable().optional(),
  log: z.string().optional(),
  autostart: z.boolean().optional(),
  autorestart: z.boolean().optional(),
  startAfterAdd: z.boolean().optional(),
});

const SITE_ROUTE = /^\/api\/sites\/([^/]+)(?:\/(start|stop|restart|logs|stream))?$/;

export interface SupervisorRouterOptions {
  readonly supervisor: SiteSupervisor;
  /** Credentials in force; read per request so a reload takes effect. */
  readonly auth: () => AuthConfig;
  readonly logger: StructuredLogger;
  readonly watchdog?: Pick<Watchdog, "getFailures" | "isRunning" | "cycleCount">;
  readonly sseFlushMs: number;
  readonly sseKeepAliveMs: number;
  /** Bytes of unsent log lines kept per viewer before the oldest are dropped. */
  readonly sseMaxBufferedBytes?: number;
}

/** Router returned by {@link createSupervisorRouter}. */
export interface SupervisorRouter {
  handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void>;
  /** Number of connected log viewers. */
  readonly viewerCount: number;
  /** Ends every open log stream. */
  close(): Promise<void>;
}

interface LogViewer {
  readonly site: string;
  readonly res: ServerResponse;
  release(): void;
}

/**
 * Builds the JSON/SSE API in front of the supervisor. The router is a plain
 * request handler so tests can drive it with in-memory request and response
 * doubles.
 */
export function createSupervisorRouter(options: SupervisorRouterOptions): SupervisorRouter {
  const { supervisor, logger } = options;
  const viewers = new Set<LogViewer>();

  const route = async (req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> => {
    const method = req.method ?? "GET";
    const pathname = url.pathname;

    if (method === "GET" && pathname === "/healthz") {
      writeJson(res, 200, { status: "ok", mode: supervisor.mode });
      return;
    }

    if (!authorizeRequest(req.headers, options.auth())) {
      logger.warn("http_unauthorized", { method, path: pathname });
      res.setHeader("WWW-Authenticate", "Basic");
      writeJson(res, 401, { error: "UNAUTHORIZED", message: "Not authenticated" });
      return;
    }

    if (method === "GET" && pathname === "/api/status") {
      writeJson(res, 200, await supervisor.listStatus());
      return;
    }

    if (method === "POST" && pathname === "/api/reload") {
      await supervisor.reload();
      writeJson(res, 200, { status: "reloaded", sites: supervisor.sites().map((site) => site.name) });
      return;
    }

    if (method === "GET" && pathname === "/api/watchdog") {
      writeJson(res, 200, {
        running: options.watchdog?.isRunning ?? false,
        cycles: options.watchdog?.cycleCount ?? 0,
        failures: options.watchdog?.getFailures() ?? [],
      });
      return;
    }

    if (method === "POST" && pathname === "/api/sites") {
      await handleAddSite(req, res);
      return;
    }

    const match = SITE_ROUTE.exec(pathname);
    if (match?.[1]) {
      const name = decodeSiteName(match[1]);
      const action = match[2];

      if (action === undefined && method === "GET") {
        writeJson(res, 200, await supervisor.status(name));
        return;
      }
      if (action === undefined && method === "DELETE") {
        const removed = await supervisor.removeSite(name);
        writeJson(res, 200, { status: "deleted", name: removed.name });
        return;
      }
      if ((action === "start" || action === "stop" || action === "restart") && method === "POST") {
        await handleAction(res, name, action);
        return;
      }
      if (action === "logs" && method === "GET") {
        const lines = await supervisor.tail(name, parseLineCount(url.searchParams.get("lines")));
        writeText(res, 200, lines.join("\n"));
        return;
      }
      if (action === "stream" && method === "GET") {
        openLogStream(res, name);
        return;
      }
      writeJson(res, 405, { error: "METHOD_NOT_ALLOWED" });
      return;
    }

    writeJson(res, 404, { error: "NOT_FOUND" });
  };

  const handleAddSite = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (!acceptsJson(req)) {
      throw new HttpError(415, "UNSUPPORTED_MEDIA_TYPE", "expected application/json");
    }
    const parsed = AddSiteRequestSchema.safeParse(await readJsonBody(req));
    if (!parsed.success) {
      writeJson(res, 400, { error: "INVALID_INPUT", issues: parsed.error.flatten() });
      return;
    }
    const { startAfterAdd, ...input } = parsed.data;
    const result = await supervisor.addSite(input, { start: startAfterAdd ?? false });
    writeJson(res, 201, {
      site: result.site,
      started: result.started !== null,
      detail: result.started?.detail ?? `Added site ${result.site.name}`,
    });
  };

  const handleAction = async (res: ServerResponse, name: string, action: BackendAction): Promise<void> => {
    const result = await supervisor[action](name);
    const report = await supervisor.status(name);
    writeJson(res, 200, {
      name,
      action,
      changed: result.changed,
      detail: result.detail,
      pid: result.pid,
      status: report.status,
    });
  };

  const openLogStream = (res: ServerResponse, name: string): void => {
    const controller = new AbortController();
    // Resolves the site before any byte is written so an unknown name is still a 404.
    const lines = supervisor.watch(name, controller.signal);

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-store",
      Connection: "keep-alive",
    });
    res.write(SSE_CLEAR_FRAME);

    const pending = new LogLineBuffer({
      site: name,
      logger,
      ...(options.sseMaxBufferedBytes !== undefined ? { maxBufferedBytes: options.sseMaxBufferedBytes } : {}),
    });
    // Set while the socket buffer is full; nothing is written until it drains.
    let congested = false;
    let flushTimer: IntervalHandle | null = null;
    let keepAliveTimer: IntervalHandle | null = null;
    let released = false;

    const send = (frame: string) => {
      if (!res.write(frame)) {
        congested = true;
        res.once("drain", () => {
          congested = false;
        });
      }
    };

    const flush = () => {
      if (congested || pending.size === 0) {
        return;
      }
      send(formatSseLines(pending.take()));
    };

    const viewer: LogViewer = {
      site: name,
      res,
      release: () => {
        if (released) {
          return;
        }
        released = true;
        controller.abort();
        if (flushTimer !== null) {
          runtimeTimers.clearInterval(flushTimer);
        }
        if (keepAliveTimer !== null) {
          runtimeTimers.clearInterval(keepAliveTimer);
        }
        viewers.delete(viewer);
        logger.info("log_viewer_disconnected", { site: name, viewers: viewers.size });
      },
    };

    flushTimer = runtimeTimers.setInterval(flush, options.sseFlushMs);
    keepAliveTimer = runtimeTimers.setInterval(() => {
      if (!congested) {
        send(formatSseComment("keep-alive"));
      }
    }, options.sseKeepAliveMs);
    viewers.add(viewer);
    res.on("close", viewer.release);
    logger.info("log_viewer_connected", { site: name, viewers: viewers.size });

    void (async () => {
      try {
        for await (const line of lines) {
          pending.push(line);
        }
      } catch (error) {
        logger.warn("log_stream_failed", { site: name, message: describeError(error) });
        if (!released) {
          if (pending.size > 0) {
            res.write(formatSseLines(pending.take()));
          }
          res.write(`event: error\n${formatSseLines([describeError(error)])}`);
          res.end();
        }
      } finally {
        viewer.release();
      }
    })();
  };

  const handler = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    applySecurityHeaders(res);
    const requestId = ensureRequestId(req, res);

    if (!req.url) {
      writeJson(res, 400, { error: "BAD_REQUEST", message: "missing URL" });
      return;
    }
    const url = new URL(req.url, "http://sitewarden.local");
    const context = { requestId, method: req.method ?? "GET", path: url.pathname };

    await runWithRequestContext(context, async () => {
      try {
        await route(req, res, url);
      } catch (error) {
        const status = statusForError(error);
        const level = status >= 500 ? "error" : "warn";
        logger[level]("http_request_failed", {
          method: context.method,
          path: context.path,
          status,
          message: describeError(error),
        });
        if (!res.headersSent) {
          writeJson(res, status, errorBody(error));
        } else {
          res.end();
        }
      }
    });
  };

  return {
    handleRequest: handler,
    get viewerCount() {
      return viewers.size;
    },
    async close() {
      for (const viewer of [...viewers]) {
        viewer.release();
        viewer.res.end();
      }
      viewers.clear();
    },
  };
}

/** Maps a failure to the HTTP status the API answers with. */
export function statusForError(error: unknown): number {
  if (error instanceof HttpError) {
    return error.status;
  }
  if (error instanceof SiteNotFoundError) {
    return 404;
  }
  if (error instanceof SiteValidationError) {
    return 400;
  }
  if (error instanceof SiteConflictError) {
    return 409;
  }
  if (error instanceof BackendError) {
    return 502;
  }
  return 500;
}

function errorBody(error: unknown): Record<string, unknown> {
  if (error instanceof SupervisorError) {
    return { error: error.code, message: error.message, hint: error.hint, details: error.details };
  }
  if (error instanceof HttpError) {
    return { error: error.code, message: error.message };
  }
  return { error: "INTERNAL_ERROR", message: "internal error" };
}

function decodeSiteName(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new HttpError(400, "BAD_REQUEST", "malformed site name");
  }
}

/** `?lines=` value clamped to `[0, MAX_TAIL_LINES]`; absent or malformed means the default. */
export function parseLineCount(raw: string | null): number {
  if (raw === null || !/^-?\d+$/.test(raw.trim())) {
    return DEFAULT_TAIL_LINES;
  }
  const value = Number.parseInt(raw.trim(), 10);
  return Math.min(Math.max(value, 0), MAX_TAIL_LINES);
}

/** Serialises a response as JSON with the appropriate headers. */
function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  const json = JSON.stringify(payload);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(json),
    "Cache-Control": "no-store",
  });
  res.end(json);
}

function writeText(res: ServerResponse, status: number, payload: string): void {
  res.writeHead(status, {
    "Content-Type": "text/plain; charset=utf-8",
    "Content-Length": Buffer.byteLength(payload),
    "Cache-Control": "no-store",
  });
  res.end(payload);
}

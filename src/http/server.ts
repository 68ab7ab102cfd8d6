import { createServer } from "node:http";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { createSupervisorRouter, type SupervisorRouterOptions } from "./router.js";

/** Handle returned once the API server listens. */
export interface SupervisorServerHandle {
  /** Host the HTTP server is bound to. */
  readonly host: string;
  /** Port actually bound (resolved when `0` was requested). */
  readonly port: number;
  /** Ends open log streams, then stops accepting connections. */
  close(): Promise<void>;
}

export interface SupervisorServerOptions extends SupervisorRouterOptions {
  readonly host: string;
  readonly port: number;
}

/**
 * Starts the HTTP server in front of {@link createSupervisorRouter}; the
 * server only adds the listening socket.
 */
export async function startSupervisorServer(options: SupervisorServerOptions): Promise<SupervisorServerHandle> {
  const router = createSupervisorRouter(options);

  const server = createServer((req, res) => {
    void router.handleRequest(req, res);
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const resolvedPort = typeof address === "object" && address ? address.port : options.port;

  options.logger.info("http_listening", { host: options.host, port: resolvedPort });

  return {
    host: options.host,
    port: resolvedPort,
    async close() {
      await router.close();
      await new Promise<void>((resolve, reject) => {
        server.close((closeError) => {
          if (closeError) {
            reject(closeError);
          } else {
            resolve();
          }
        });
        server.closeIdleConnections();
      });
    },
  };
}

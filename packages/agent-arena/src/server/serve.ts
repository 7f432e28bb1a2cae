/**
 * HTTP server for the Hono app, via @hono/node-server.
 *
 * Callers use ServerHandle and never touch the node:http server directly.
 */

import { serve } from "@hono/node-server";

export interface ServerHandle {
  /** Actual port the server is listening on */
  port: number;
  /** Stop accepting connections and wait for open ones to finish */
  close(): Promise<void>;
}

export interface ServeOptions {
  /** 0 picks a free port */
  port: number;
  hostname?: string;
}

/** Anything with a fetch handler, e.g. a Hono app */
export interface FetchApp {
  fetch: (request: Request) => Response | Promise<Response>;
}

export function startHttpServer(app: FetchApp, options: ServeOptions): Promise<ServerHandle> {
  return new Promise<ServerHandle>((resolve, reject) => {
    const server = serve(
      {
        fetch: app.fetch,
        port: options.port,
        hostname: options.hostname,
      },
      (info) => {
        resolve({
          port: info.port,
          close: () =>
            new Promise<void>((done, fail) => server.close((error) => (error ? fail(error) : done()))),
        });
      },
    );

    server.on("error", reject);
  });
}

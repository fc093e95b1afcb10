/**
 * Handler plus node:http server. No routing here.
 */

import { createServer, type Server } from "node:http";
import { apiError } from "./apiErrors.js";
import { createDeps } from "./deps.js";
import { createHandler, type HandlerDeps, type RequestHandler } from "./handler.js";

export interface App {
  readonly handle: RequestHandler;
  readonly server: Server;
}

/** Create handler + server. Pass `deps` in tests; defaults read process.env. */
export function createApp(options: { deps?: HandlerDeps } = {}): App {
  const deps = options.deps ?? createDeps();
  const handle = createHandler(deps);
  const server = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      deps.logger.error(`${req.method ?? "GET"} ${req.url ?? "/"} failed`, err);
      if (res.headersSent) {
        res.end();
        return;
      }
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify(apiError("INTERNAL_ERROR", "Internal Server Error")));
    });
  });
  return { handle, server };
}

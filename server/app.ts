/**
 * HTTP app — wires the handler into a node:http server.
 * No business logic in routing; delegates to domain.
 */

import { createServer, type Server } from "node:http";
import { INVARIANT_CULTURE } from "../domain/culture.js";
import { apiError } from "./apiErrors.js";
import { createHandler, type HandlerDeps, type RequestHandler } from "./handler.js";

export interface App {
  /** Handles one request; unexpected errors become a 500 payload. */
  readonly handle: RequestHandler;
  readonly server: Server;
}

/** Create the app. `handle` for socket-free tests, `server` for listen. */
export function createApp(deps: HandlerDeps = { culture: INVARIANT_CULTURE }): App {
  const logger = deps.logger ?? console;
  const inner = createHandler(deps);

  const handle: RequestHandler = async (req, res) => {
    try {
      await inner(req, res);
    } catch (err) {
      logger.error(err);
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify(apiError("INTERNAL_ERROR", "Internal Server Error")));
    }
  };

  const server = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => logger.error(err));
  });

  return { handle, server };
}

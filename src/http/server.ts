import * as http from "node:http";
import { ValidationError, errorMessage } from "../errors.js";
import { createConsoleLogger, type GatewayLogger } from "../log.js";
import type { Router } from "./router.js";
import { sendError } from "./respond.js";

// ---------------------------------------------------------------------------
// Request dispatch
// ---------------------------------------------------------------------------

/**
 * Build the node:http listener for `app`.
 *
 * Every handler runs inside one boundary: ValidationError becomes a 400,
 * anything else a generic 500 with the message logged, never sent.
 */
export function createRequestListener(
  app: Router,
  log: GatewayLogger = createConsoleLogger(),
): http.RequestListener {
  return (req, res) => {
    dispatch(app, req, res).catch((err: unknown) => {
      log.error(`${req.method ?? "GET"} ${req.url ?? "/"} failed: ${errorMessage(err)}`);
      if (res.headersSent) {
        res.end();
        return;
      }
      if (err instanceof ValidationError) {
        sendError(res, err.status, err.message);
        return;
      }
      sendError(res, 500, "Internal server error");
    });
  };
}

async function dispatch(
  app: Router,
  req: http.IncomingMessage,
  res: http.ServerResponse,
): Promise<void> {
  const url = requestUrl(req.url ?? "/");
  const method = req.method ?? "GET";

  const match = app.match(method, decodePath(url.pathname));
  switch (match.kind) {
    case "handler":
      await match.handler({ req, res, path: match.path, query: url.searchParams });
      return;
    case "method_not_allowed":
      res.setHeader("Allow", match.allowed.join(", "));
      sendError(res, 405, "Method not allowed");
      return;
    case "not_found":
      sendError(res, 404, "Not found");
      return;
  }
}

/**
 * Parse an origin-form request target. Prepending the origin keeps a target
 * such as `//api/docs` a path instead of a protocol-relative URL.
 */
export function requestUrl(target: string): URL {
  return target.startsWith("/")
    ? new URL(`http://localhost${target}`)
    : new URL(target, "http://localhost");
}

function decodePath(pathname: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch {
    throw new ValidationError("Malformed request path");
  }
}

// ---------------------------------------------------------------------------
// Listener
// ---------------------------------------------------------------------------

export interface ListenOptions {
  host: string;
  port: number;
  log?: GatewayLogger;
}

/**
 * Start serving `app`. Rejects if the port cannot be bound, which the
 * CLI treats as fatal.
 */
export function listen(app: Router, options: ListenOptions): Promise<http.Server> {
  const server = http.createServer(createRequestListener(app, options.log));

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

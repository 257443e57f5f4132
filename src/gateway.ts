import type { GatewayConfig } from "./config/schema.js";
import { Router } from "./http/router.js";
import { sendJson } from "./http/respond.js";
import { createConsoleLogger, type GatewayLogger } from "./log.js";
import {
  registerRoutes,
  type RegistrationOutcome,
  type RouteDescriptor,
} from "./registry/registry.js";
import { buildRouteTable } from "./registry/table.js";
import { homePageHandler } from "./routes/home.js";
import { loadStaticRouteTable } from "./routes/static-routes.js";

// ---------------------------------------------------------------------------
// Composition root
// ---------------------------------------------------------------------------

export interface GatewayOptions {
  log?: GatewayLogger;
  startedAt?: Date;
  /** Replaces the built-in route table. */
  descriptors?: readonly RouteDescriptor[];
  staticRoutesFile?: URL | string;
}

export interface Gateway {
  app: Router;
  outcomes: RegistrationOutcome[];
}

/**
 * Assemble the application router.
 *
 * The health check and home page are attached before registration so
 * they never depend on a route group loading. Registry outcomes are
 * served at `/api/registry` once registration has finished.
 */
export async function createGateway(
  config: GatewayConfig,
  options: GatewayOptions = {},
): Promise<Gateway> {
  const log = options.log ?? createConsoleLogger();
  const app = new Router();

  app.get("/healthcheck", ({ res }) => {
    sendJson(res, 200, { status: "ok" });
  });
  app.get("/", homePageHandler(() => app.prefixes()));

  const descriptors =
    options.descriptors ??
    buildRouteTable({
      config,
      staticRoutes: await loadStaticRouteTable(options.staticRoutesFile),
      startedAt: options.startedAt ?? new Date(),
      log,
    });

  const outcomes = await registerRoutes(descriptors, app, log);

  app.get("/api/registry", ({ res }) => {
    sendJson(res, 200, { outcomes });
  });

  return { app, outcomes };
}

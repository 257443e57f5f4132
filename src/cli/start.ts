import { intro, log, outro } from "@clack/prompts";
import { resolveConfig } from "../config/load.js";
import type { GatewayConfig } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import { createGateway } from "../gateway.js";
import { closeServer, listen } from "../http/server.js";
import { summarizeOutcomes } from "../registry/registry.js";

// ---------------------------------------------------------------------------
// Start Command
// ---------------------------------------------------------------------------

/**
 * Start the gateway:
 *   1. Resolve config from the environment
 *   2. Register every route group (failures are reported, not fatal)
 *   3. Bind 0.0.0.0:$PORT
 *
 * Exits 1 when config or route data is invalid, or the port cannot be bound.
 */
export async function runStart(): Promise<void> {
  intro("introspect-gateway");

  // -------------------------------------------------------------------------
  // 1. Config
  // -------------------------------------------------------------------------

  let config: GatewayConfig;
  try {
    config = resolveConfig();
  } catch (err) {
    log.error(errorMessage(err));
    process.exit(1);
  }
  log.info(`Default provider: ${config.defaultProvider}`);

  // -------------------------------------------------------------------------
  // 2. Route groups
  // -------------------------------------------------------------------------

  let gateway: Awaited<ReturnType<typeof createGateway>>;
  try {
    gateway = await createGateway(config, { log });
  } catch (err) {
    log.error(`Startup failed: ${errorMessage(err)}`);
    process.exit(1);
  }

  const { mounted, failed, total } = summarizeOutcomes(gateway.outcomes);
  if (failed > 0) {
    log.warn(`${mounted}/${total} route groups mounted, ${failed} failed`);
  } else {
    log.success(`${mounted}/${total} route groups mounted`);
  }

  // -------------------------------------------------------------------------
  // 3. Listen
  // -------------------------------------------------------------------------

  let server: import("node:http").Server;
  try {
    server = await listen(gateway.app, { host: config.host, port: config.port, log });
  } catch (err) {
    log.error(`Cannot listen on ${config.host}:${config.port}: ${errorMessage(err)}`);
    process.exit(1);
  }

  outro(`Listening on http://${config.host}:${config.port}`);

  // -------------------------------------------------------------------------
  // 4. Shutdown handling
  // -------------------------------------------------------------------------

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down...");
    closeServer(server).then(
      () => process.exit(0),
      (err: unknown) => {
        log.error(errorMessage(err));
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

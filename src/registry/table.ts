import type { GatewayConfig } from "../config/schema.js";
import type { GatewayLogger } from "../log.js";
import { createProxyRouter } from "../proxy/routes.js";
import { staticDescriptors, type StaticRouteTable } from "../routes/static-routes.js";
import { parsePluginList, type RouteDescriptor } from "./registry.js";

export interface RouteTableOptions {
  config: GatewayConfig;
  staticRoutes: StaticRouteTable;
  startedAt: Date;
  log?: GatewayLogger;
}

/**
 * The ordered list of route groups the gateway registers at startup:
 * static groups from the data file, the completion proxy, then any
 * external groups named in `GATEWAY_PLUGINS`.
 */
export function buildRouteTable(options: RouteTableOptions): RouteDescriptor[] {
  const { config, staticRoutes, startedAt, log } = options;

  return [
    ...staticDescriptors(staticRoutes, { startedAt }),
    {
      name: "ai-proxy",
      urlPrefix: "/api/ai-proxy",
      load: () =>
        createProxyRouter({
          providers: config.providers,
          defaultProvider: config.defaultProvider,
          timeoutMs: config.upstreamTimeoutMs,
          log,
        }),
    },
    ...parsePluginList(config.plugins),
  ];
}

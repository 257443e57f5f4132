export { createGateway } from "./gateway.js";
export type { Gateway, GatewayOptions } from "./gateway.js";

export { Router } from "./http/router.js";
export type { RequestContext, RouteHandler, HttpMethod } from "./http/router.js";
export { listen, closeServer, createRequestListener } from "./http/server.js";
export { sendJson, sendHtml, readJsonBody } from "./http/respond.js";

export { registerRoutes, fromModule, parsePluginList, summarizeOutcomes } from "./registry/registry.js";
export type { RouteDescriptor, RegistrationOutcome } from "./registry/registry.js";

export { handlePrompt, pingProviders } from "./proxy/prompt-handler.js";
export type { PromptHandlerDeps, PingResult } from "./proxy/prompt-handler.js";

export { resolveConfig } from "./config/load.js";
export type { GatewayConfig, ProviderConfig } from "./config/schema.js";

export type { GatewayLogger } from "./log.js";
export * from "./errors.js";

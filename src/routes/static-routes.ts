import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { HTTP_METHODS, Router } from "../http/router.js";
import { sendJson } from "../http/respond.js";
import type { RouteDescriptor } from "../registry/registry.js";

// ---------------------------------------------------------------------------
// Route data
// ---------------------------------------------------------------------------

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const StaticRouteSchema = z.strictObject({
  method: z.enum(HTTP_METHODS).default("GET"),
  path: z.string().startsWith("/"),
  status: z.number().int().min(100).max(599).default(200),
  body: JsonValueSchema,
});

export const StaticRouteGroupSchema = z.strictObject({
  name: z.string().min(1),
  urlPrefix: z.string().startsWith("/"),
  routes: z.array(StaticRouteSchema).min(1),
});

export const StaticRouteTableSchema = z.strictObject({
  groups: z.array(StaticRouteGroupSchema),
});

export type StaticRouteGroup = z.infer<typeof StaticRouteGroupSchema>;
export type StaticRouteTable = z.infer<typeof StaticRouteTableSchema>;

export const DEFAULT_STATIC_ROUTES_FILE = new URL("../../data/static-routes.json", import.meta.url);

/**
 * Read and validate the static route table. Throws ConfigError, the file
 * ships with the gateway and a broken copy is a startup failure.
 */
export async function loadStaticRouteTable(
  file: URL | string = DEFAULT_STATIC_ROUTES_FILE,
): Promise<StaticRouteTable> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(file, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read static routes from ${String(file)}`, { cause: err });
  }

  const result = StaticRouteTableSchema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first ? `${first.path.join(".")}: ${first.message}` : "unknown issue";
    throw new ConfigError(`Invalid static routes in ${String(file)} (${where})`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

export interface TemplateContext {
  now: Date;
  startedAt: Date;
  /** Names of every static group. */
  groups: readonly string[];
  random: () => number;
}

const WHOLE_TOKEN = /^\{\{(\w+)\}\}$/;
const INLINE_TOKEN = /\{\{(\w+)\}\}/g;

function tokenValue(token: string, ctx: TemplateContext): JsonValue | undefined {
  switch (token) {
    case "now":
      return Math.floor(ctx.now.getTime() / 1000);
    case "isoNow":
      return ctx.now.toISOString();
    case "sessionId":
      return `session-${1000 + Math.floor(ctx.random() * 9000)}`;
    case "uptimeSeconds":
      return Math.max(0, Math.floor((ctx.now.getTime() - ctx.startedAt.getTime()) / 1000));
    case "groups":
      return [...ctx.groups];
    default:
      return undefined;
  }
}

/**
 * Fill `{{token}}` placeholders. A string made of a single token takes the
 * token's JSON value; tokens inside longer strings are interpolated.
 * Unknown tokens stay as written.
 */
export function renderTemplate(value: JsonValue, ctx: TemplateContext): JsonValue {
  if (typeof value === "string") {
    const whole = WHOLE_TOKEN.exec(value);
    if (whole) return tokenValue(whole[1], ctx) ?? value;
    return value.replace(INLINE_TOKEN, (raw: string, token: string) => {
      const resolved = tokenValue(token, ctx);
      if (resolved === undefined) return raw;
      return typeof resolved === "string" ? resolved : JSON.stringify(resolved);
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => renderTemplate(item, ctx));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, renderTemplate(item, ctx)]),
    );
  }
  return value;
}

// ---------------------------------------------------------------------------
// Routers
// ---------------------------------------------------------------------------

export interface StaticRouterOptions {
  startedAt: Date;
  groups: readonly string[];
  clock?: () => Date;
  random?: () => number;
}

export function createStaticRouter(group: StaticRouteGroup, options: StaticRouterOptions): Router {
  const clock = options.clock ?? (() => new Date());
  const random = options.random ?? Math.random;
  const router = new Router();

  for (const route of group.routes) {
    router.on(route.method, route.path, ({ res }) => {
      const ctx: TemplateContext = {
        now: clock(),
        startedAt: options.startedAt,
        groups: options.groups,
        random,
      };
      sendJson(res, route.status, renderTemplate(route.body, ctx));
    });
  }
  return router;
}

export function staticDescriptors(
  table: StaticRouteTable,
  options: Omit<StaticRouterOptions, "groups">,
): RouteDescriptor[] {
  const groups = table.groups.map((g) => g.name);
  return table.groups.map((group) => ({
    name: group.name,
    urlPrefix: group.urlPrefix,
    load: () => createStaticRouter(group, { ...options, groups }),
  }));
}

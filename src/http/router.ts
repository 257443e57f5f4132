import type * as http from "node:http";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const HTTP_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

export interface RequestContext {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  /** Path relative to the router the handler is registered on. */
  path: string;
  query: URLSearchParams;
}

export type RouteHandler = (ctx: RequestContext) => void | Promise<void>;

export type RouteMatch =
  | { kind: "handler"; handler: RouteHandler; path: string }
  | { kind: "method_not_allowed"; allowed: HttpMethod[] }
  | { kind: "not_found" };

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

/**
 * Exact-path router with prefix mounts.
 *
 * Own routes are checked first, then mounted routers by longest prefix.
 * Mounting a second router at a prefix replaces the first.
 */
export class Router {
  private readonly routes = new Map<string, Map<HttpMethod, RouteHandler>>();
  private readonly mounts = new Map<string, Router>();

  get(path: string, handler: RouteHandler): this {
    return this.on("GET", path, handler);
  }

  post(path: string, handler: RouteHandler): this {
    return this.on("POST", path, handler);
  }

  on(method: HttpMethod, path: string, handler: RouteHandler): this {
    const key = normalizePath(path);
    let byMethod = this.routes.get(key);
    if (!byMethod) {
      byMethod = new Map();
      this.routes.set(key, byMethod);
    }
    byMethod.set(method, handler);
    return this;
  }

  /**
   * Mount `router` under `prefix`. Returns true when it replaced a router
   * already mounted there.
   */
  mount(prefix: string, router: Router): boolean {
    const key = normalizePrefix(prefix);
    const replaced = this.mounts.has(key);
    // Delete first so the replacement takes the latest insertion slot.
    this.mounts.delete(key);
    this.mounts.set(key, router);
    return replaced;
  }

  /** Mounted prefixes in registration order. */
  prefixes(): string[] {
    return [...this.mounts.keys()];
  }

  /** `METHOD /path` for every reachable route, mounts included. */
  describe(base = ""): string[] {
    const lines: string[] = [];
    for (const [path, byMethod] of this.routes) {
      const full = joinPath(base, path);
      for (const method of byMethod.keys()) {
        lines.push(`${method} ${full}`);
      }
    }
    for (const [prefix, router] of this.mounts) {
      lines.push(...router.describe(joinPath(base, prefix)));
    }
    return lines;
  }

  match(method: string, rawPath: string): RouteMatch {
    const path = normalizePath(rawPath);

    const byMethod = this.routes.get(path);
    if (byMethod) {
      // HEAD is served by the GET handler; node:http drops the body
      const upper = method.toUpperCase();
      const lookup = upper === "HEAD" ? "GET" : upper;
      const handler = isHttpMethod(lookup) ? byMethod.get(lookup) : undefined;
      if (handler) return { kind: "handler", handler, path };
    }

    let notAllowed: RouteMatch | undefined =
      byMethod ? { kind: "method_not_allowed", allowed: [...byMethod.keys()] } : undefined;

    for (const prefix of this.prefixesByLength()) {
      const rest = stripPrefix(path, prefix);
      if (rest === undefined) continue;
      const router = this.mounts.get(prefix);
      if (!router) continue;
      const inner = router.match(method, rest);
      if (inner.kind === "handler") return inner;
      if (inner.kind === "method_not_allowed") notAllowed ??= inner;
    }

    return notAllowed ?? { kind: "not_found" };
  }

  private prefixesByLength(): string[] {
    return [...this.mounts.keys()].sort((a, b) => b.length - a.length);
  }
}

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

export function normalizePath(path: string): string {
  const withSlash = path.startsWith("/") ? path : `/${path}`;
  const collapsed = withSlash.replace(/\/{2,}/g, "/");
  return collapsed.length > 1 ? collapsed.replace(/\/$/, "") : collapsed;
}

export function normalizePrefix(prefix: string): string {
  const normalized = normalizePath(prefix);
  if (normalized === "/") {
    throw new Error("Cannot mount a router at the root prefix");
  }
  return normalized;
}

function stripPrefix(path: string, prefix: string): string | undefined {
  if (path === prefix) return "/";
  if (path.startsWith(`${prefix}/`)) return path.slice(prefix.length);
  return undefined;
}

function joinPath(base: string, path: string): string {
  if (!base) return path;
  return path === "/" ? base : `${base}${path}`;
}

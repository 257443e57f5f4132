import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { RegistrationError, errorMessage } from "../errors.js";
import { Router, normalizePrefix } from "../http/router.js";
import { createConsoleLogger, type GatewayLogger } from "../log.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RouteDescriptor {
  /** Label used in diagnostics. */
  name: string;
  urlPrefix: string;
  load: () => Router | Promise<Router>;
}

export type RegistrationOutcome =
  | { status: "mounted"; name: string; urlPrefix: string; replaced: boolean }
  | { status: "failed"; name: string; urlPrefix: string; reason: string };

// ---------------------------------------------------------------------------
// registerRoutes
// ---------------------------------------------------------------------------

/**
 * Load and mount each descriptor onto `app`, in order.
 *
 * A descriptor that throws, rejects or yields something other than a
 * Router is recorded as failed and the loop moves on. When two descriptors
 * share a prefix the later one wins.
 */
export async function registerRoutes(
  descriptors: readonly RouteDescriptor[],
  app: Router,
  log: GatewayLogger = createConsoleLogger(),
): Promise<RegistrationOutcome[]> {
  const outcomes: RegistrationOutcome[] = [];

  for (const descriptor of descriptors) {
    const { name, urlPrefix } = descriptor;
    try {
      const router = await resolveRouter(descriptor);
      const replaced = app.mount(urlPrefix, router);
      outcomes.push({ status: "mounted", name, urlPrefix, replaced });
      if (replaced) {
        log.warn(`${name} mounted at ${urlPrefix}, replacing an earlier group`);
      } else {
        log.info(`${name} mounted at ${urlPrefix}`);
      }
    } catch (err) {
      const reason = errorMessage(err);
      outcomes.push({ status: "failed", name, urlPrefix, reason });
      log.error(`${name} failed: ${reason}`);
    }
  }

  return outcomes;
}

async function resolveRouter(descriptor: RouteDescriptor): Promise<Router> {
  // Validate before loading so a bad prefix never runs module side effects
  try {
    normalizePrefix(descriptor.urlPrefix);
  } catch (err) {
    throw new RegistrationError(descriptor.name, errorMessage(err));
  }

  const router = await descriptor.load();
  if (!(router instanceof Router)) {
    throw new RegistrationError(descriptor.name, "load() did not return a router");
  }
  return router;
}

export function summarizeOutcomes(outcomes: readonly RegistrationOutcome[]): {
  mounted: number;
  failed: number;
  total: number;
} {
  const mounted = outcomes.filter((o) => o.status === "mounted").length;
  return { mounted, failed: outcomes.length - mounted, total: outcomes.length };
}

// ---------------------------------------------------------------------------
// String-based descriptors
// ---------------------------------------------------------------------------

/**
 * Turn a plugin module path into an import specifier. Relative and absolute
 * file paths resolve against `cwd`; package names and URLs pass through.
 */
export function resolveModuleSpecifier(modulePath: string, cwd = process.cwd()): string {
  if (modulePath.startsWith(".") || path.isAbsolute(modulePath)) {
    return pathToFileURL(path.resolve(cwd, modulePath)).href;
  }
  return modulePath;
}

/**
 * Descriptor for a route group living in another module. The named export
 * may be a Router or a zero-argument factory returning one (sync or async).
 */
export function fromModule(
  modulePath: string,
  exportName: string,
  urlPrefix: string,
): RouteDescriptor {
  const name = `${modulePath}#${exportName}`;
  return {
    name,
    urlPrefix,
    async load() {
      let mod: Record<string, unknown>;
      try {
        mod = await import(resolveModuleSpecifier(modulePath));
      } catch (err) {
        throw new RegistrationError(name, `cannot import ${modulePath}: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      const exported = mod[exportName];
      if (exported === undefined) {
        throw new RegistrationError(name, `export "${exportName}" not found in ${modulePath}`);
      }
      if (exported instanceof Router) return exported;
      if (typeof exported === "function") {
        const built: unknown = await exported();
        if (built instanceof Router) return built;
      }
      throw new RegistrationError(
        name,
        `export "${exportName}" in ${modulePath} is not a router or router factory`,
      );
    },
  };
}

/**
 * Parse `GATEWAY_PLUGINS`: comma-separated `<module>#<export>@<prefix>`.
 *
 * A malformed entry still yields a descriptor, one whose load rejects, so
 * it is reported alongside the other outcomes instead of aborting startup.
 */
export function parsePluginList(value: string | undefined): RouteDescriptor[] {
  if (!value) return [];

  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const match = /^(.+)#([A-Za-z_$][\w$]*)@(\/.*)$/.exec(entry);
      if (!match) {
        return {
          name: entry,
          urlPrefix: "(invalid)",
          load: () => {
            throw new RegistrationError(
              entry,
              `expected <module>#<export>@<prefix>, got "${entry}"`,
            );
          },
        };
      }
      const [, modulePath, exportName, urlPrefix] = match;
      return fromModule(modulePath, exportName, urlPrefix);
    });
}

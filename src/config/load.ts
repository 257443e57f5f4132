import { ConfigError } from "../errors.js";
import {
  GatewayConfigSchema,
  type GatewayConfig,
  type ProviderConfig,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Provider defaults
// ---------------------------------------------------------------------------

const DEFAULT_PROVIDER_URLS = {
  groq: "https://api.groq.com/openai/v1",
  together: "https://api.together.xyz/v1",
  openai: "https://api.openai.com/v1",
} as const;

const DEFAULT_PROVIDER_MODELS = {
  groq: ["llama-3.3-70b-versatile", "mistral-saba-24b"],
  together: ["mistralai/Mixtral-8x7B-Instruct-v0.1"],
  openai: ["gpt-4o-mini"],
} as const;

export type Env = Record<string, string | undefined>;

export interface ConfigOverrides {
  host?: string;
  port?: number;
  upstreamTimeoutMs?: number;
  defaultProvider?: string;
  providers?: ProviderConfig[];
  plugins?: string;
}

// ---------------------------------------------------------------------------
// resolveConfig
// ---------------------------------------------------------------------------

/**
 * Resolve the gateway config.
 *
 * Priority: programmatic overrides > environment variables > defaults.
 *
 * Environment variables:
 * - `PORT` listening port (default 5000)
 * - `GATEWAY_HOST` bind address (default "0.0.0.0")
 * - `GATEWAY_UPSTREAM_TIMEOUT_MS` completion call timeout (default 90000)
 * - `GATEWAY_DEFAULT_PROVIDER` provider used when a request names none
 * - `GATEWAY_PLUGINS` extra route groups, `<module>#<export>@<prefix>,...`
 * - `GROQ_API_KEY`, `TOGETHER_API_KEY`, `OPENAI_API_KEY`
 * - `UPSTREAM_GROQ_URL`, `UPSTREAM_TOGETHER_URL`, `UPSTREAM_OPENAI_URL`
 *
 * Throws ConfigError listing every invalid field.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env,
): GatewayConfig {
  const providers: ProviderConfig[] = overrides.providers ?? [
    {
      id: "groq",
      baseUrl: env.UPSTREAM_GROQ_URL || DEFAULT_PROVIDER_URLS.groq,
      apiKey: env.GROQ_API_KEY || undefined,
      models: [...DEFAULT_PROVIDER_MODELS.groq],
    },
    {
      id: "together",
      baseUrl: env.UPSTREAM_TOGETHER_URL || DEFAULT_PROVIDER_URLS.together,
      apiKey: env.TOGETHER_API_KEY || undefined,
      models: [...DEFAULT_PROVIDER_MODELS.together],
    },
    {
      id: "openai",
      baseUrl: env.UPSTREAM_OPENAI_URL || DEFAULT_PROVIDER_URLS.openai,
      apiKey: env.OPENAI_API_KEY || undefined,
      models: [...DEFAULT_PROVIDER_MODELS.openai],
    },
  ];

  const result = GatewayConfigSchema.safeParse({
    host: overrides.host ?? (env.GATEWAY_HOST || undefined),
    port: overrides.port ?? parseIntEnv(env.PORT),
    upstreamTimeoutMs:
      overrides.upstreamTimeoutMs ?? parseIntEnv(env.GATEWAY_UPSTREAM_TIMEOUT_MS),
    defaultProvider:
      overrides.defaultProvider ??
      (env.GATEWAY_DEFAULT_PROVIDER?.toLowerCase() || undefined),
    providers,
    plugins: overrides.plugins ?? env.GATEWAY_PLUGINS,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/** Undefined for unset vars, NaN for garbage so the schema reports it. */
function parseIntEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return /^\d+$/.test(value.trim()) ? parseInt(value, 10) : Number.NaN;
}

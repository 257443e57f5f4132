import type { ProviderConfig, ProviderId } from "../config/schema.js";
import { ValidationError, errorMessage } from "../errors.js";
import { silentLogger, type GatewayLogger } from "../log.js";
import {
  ProxyRequestSchema,
  type ChatCompletionRequest,
  type ProxyResponse,
} from "../schemas/proxy.js";
import { buildChainPrompt } from "./chain-prompt.js";
import {
  buildCompletionBody,
  requestCompletion,
  type CompletionResult,
  type CompletionTarget,
} from "./completion-client.js";
import { selectProvider } from "./providers.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CompletionFn = (
  target: CompletionTarget,
  body: ChatCompletionRequest,
) => Promise<CompletionResult>;

export interface PromptHandlerDeps {
  providers: readonly ProviderConfig[];
  defaultProvider: ProviderId;
  timeoutMs: number;
  /** Swappable for tests; defaults to the node:http client. */
  complete?: CompletionFn;
  log?: GatewayLogger;
}

// ---------------------------------------------------------------------------
// handlePrompt
// ---------------------------------------------------------------------------

/**
 * Validate a prompt and relay it to the selected provider.
 *
 * Throws ValidationError for a missing or empty query. Every upstream
 * failure resolves to `{ error }`; this function never rejects for those.
 */
export async function handlePrompt(
  input: unknown,
  deps: PromptHandlerDeps,
): Promise<ProxyResponse> {
  const parsed = ProxyRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid request");
  }
  const request = parsed.data;
  const log = deps.log ?? silentLogger;

  const { provider, fellBack } = selectProvider(
    deps.providers,
    request.provider,
    deps.defaultProvider,
  );
  if (fellBack && request.provider) {
    log.warn(`Unknown provider "${request.provider}", using ${provider.id}`);
  }

  if (!provider.apiKey) {
    return { error: `Provider ${provider.id} is not configured (missing API key)` };
  }

  const prompt = request.chain ? buildChainPrompt(request.query) : request.query;
  const complete = deps.complete ?? requestCompletion;

  try {
    const result = await complete(
      { baseUrl: provider.baseUrl, apiKey: provider.apiKey, timeoutMs: deps.timeoutMs },
      buildCompletionBody(provider.models[0], prompt),
    );
    return { content: result.content };
  } catch (err) {
    const message = errorMessage(err);
    log.error(`${provider.id} completion failed: ${message}`);
    return { error: message };
  }
}

// ---------------------------------------------------------------------------
// pingProviders
// ---------------------------------------------------------------------------

export const PING_PROMPT = "Say 'Ping' and identify your model.";
export const PING_TIMEOUT_MS = 15_000;

export type PingResult =
  | {
      status: "online";
      provider: ProviderId;
      model: string;
      latency_ms: number;
      response: string;
      timestamp: string;
    }
  | { status: "offline"; reason: string; timestamp: string };

/**
 * Try each model of the default provider with a tiny prompt and report
 * the first one that answers.
 */
export async function pingProviders(
  deps: PromptHandlerDeps,
  now: () => number = Date.now,
): Promise<PingResult> {
  const { provider } = selectProvider(deps.providers, undefined, deps.defaultProvider);
  const timestamp = (): string => new Date(now()).toISOString();

  if (!provider.apiKey) {
    return {
      status: "offline",
      reason: `Provider ${provider.id} is not configured`,
      timestamp: timestamp(),
    };
  }

  const complete = deps.complete ?? requestCompletion;
  const target: CompletionTarget = {
    baseUrl: provider.baseUrl,
    apiKey: provider.apiKey,
    timeoutMs: Math.min(deps.timeoutMs, PING_TIMEOUT_MS),
  };

  for (const model of provider.models) {
    const start = now();
    try {
      const result = await complete(
        target,
        buildCompletionBody(model, PING_PROMPT, { temperature: 0, max_tokens: 20 }),
      );
      return {
        status: "online",
        provider: provider.id,
        model,
        latency_ms: now() - start,
        response: result.content,
        timestamp: timestamp(),
      };
    } catch (err) {
      deps.log?.warn(`Ping ${provider.id}/${model} failed: ${errorMessage(err)}`);
    }
  }

  return { status: "offline", reason: "No working models", timestamp: timestamp() };
}

import type { ProviderConfig, ProviderId } from "../config/schema.js";

export interface ProviderSelection {
  provider: ProviderConfig;
  /** True when the requested id was missing or unknown. */
  fellBack: boolean;
}

/**
 * Pick the provider for a request. Ids match case-insensitively; anything
 * unrecognized falls back to the default provider rather than failing.
 */
export function selectProvider(
  providers: readonly ProviderConfig[],
  requested: string | undefined,
  defaultId: ProviderId,
): ProviderSelection {
  const wanted = requested?.trim().toLowerCase();
  const exact = wanted ? providers.find((p) => p.id === wanted) : undefined;
  if (exact) return { provider: exact, fellBack: false };

  const fallback = providers.find((p) => p.id === defaultId) ?? providers[0];
  if (!fallback) {
    throw new Error("No completion providers configured");
  }
  return { provider: fallback, fellBack: true };
}

import { z } from "zod";

export const PROVIDER_IDS = ["groq", "together", "openai"] as const;

export const ProviderIdSchema = z.enum(PROVIDER_IDS);

export type ProviderId = z.infer<typeof ProviderIdSchema>;

export const ProviderConfigSchema = z.object({
  id: ProviderIdSchema,
  baseUrl: z.string().url(),
  apiKey: z.string().min(1).optional(),
  models: z.array(z.string().min(1)).min(1),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;

export const GatewayConfigSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.number().int().min(0).max(65_535).default(5000),

  // Outbound completion calls
  upstreamTimeoutMs: z.number().int().positive().default(90_000),
  defaultProvider: ProviderIdSchema.default("groq"),
  providers: z.array(ProviderConfigSchema).min(1),

  // External route groups, `<module>#<export>@<prefix>` comma-separated
  plugins: z.string().default(""),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

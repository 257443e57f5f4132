import { z } from "zod";

// ---------------------------------------------------------------------------
// POST /api/ai-proxy
// ---------------------------------------------------------------------------

export const ProxyRequestSchema = z.object({
  query: z
    .string({
      required_error: "query is required",
      invalid_type_error: "query must be a string",
    })
    .trim()
    .min(1, "query must not be empty"),
  provider: z.string().optional(),
  chain: z.boolean().optional(),
});

export type ProxyRequest = z.infer<typeof ProxyRequestSchema>;

export const ProxySuccessSchema = z.strictObject({
  content: z.string(),
});

export const ProxyFailureSchema = z.strictObject({
  error: z.string(),
});

export const ProxyResponseSchema = z.union([ProxySuccessSchema, ProxyFailureSchema]);

export type ProxyResponse = z.infer<typeof ProxyResponseSchema>;

// ---------------------------------------------------------------------------
// Upstream chat-completions (OpenAI-compatible)
// ---------------------------------------------------------------------------

export const ChatCompletionRequestSchema = z.object({
  model: z.string().min(1),
  messages: z
    .array(
      z.object({
        role: z.enum(["system", "user", "assistant"]),
        content: z.string(),
      }),
    )
    .min(1),
  temperature: z.number().min(0).max(2),
  max_tokens: z.number().int().positive(),
  stream: z.literal(false),
});

export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;

/** Only the fields the gateway reads; providers add many more. */
export const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string().optional(),
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

import * as http from "node:http";
import * as https from "node:https";
import { UpstreamError } from "../errors.js";
import {
  ChatCompletionResponseSchema,
  type ChatCompletionRequest,
} from "../schemas/proxy.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CompletionTarget {
  baseUrl: string; // e.g. "https://api.groq.com/openai/v1"
  apiKey: string;
  timeoutMs: number;
}

export interface CompletionResult {
  content: string;
  model: string;
}

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1000;

export function buildCompletionBody(
  model: string,
  prompt: string,
  overrides?: Partial<Pick<ChatCompletionRequest, "temperature" | "max_tokens">>,
): ChatCompletionRequest {
  return {
    model,
    messages: [{ role: "user", content: prompt }],
    temperature: overrides?.temperature ?? DEFAULT_TEMPERATURE,
    max_tokens: overrides?.max_tokens ?? DEFAULT_MAX_TOKENS,
    stream: false,
  };
}

// ---------------------------------------------------------------------------
// requestCompletion
// ---------------------------------------------------------------------------

/**
 * POST an OpenAI-compatible chat-completions request and return the first
 * choice's text.
 *
 * Uses node:http/node:https directly. `timeoutMs` bounds the whole exchange,
 * from sending the request to the last byte of the response, so a provider
 * that trickles bytes cannot hold the call open past it.
 * Rejects with UpstreamError on network failure, timeout, 4xx/5xx,
 * invalid JSON or an unexpected response shape.
 */
export function requestCompletion(
  target: CompletionTarget,
  body: ChatCompletionRequest,
): Promise<CompletionResult> {
  return new Promise((settleOk, settleErr) => {
    let deadline: NodeJS.Timeout | undefined;
    const resolve = (result: CompletionResult): void => {
      clearTimeout(deadline);
      settleOk(result);
    };
    const reject = (err: Error): void => {
      clearTimeout(deadline);
      settleErr(err);
    };

    let url: URL;
    try {
      url = new URL(`${target.baseUrl.replace(/\/$/, "")}/chat/completions`);
    } catch {
      reject(new UpstreamError(`Invalid provider URL: ${target.baseUrl}`));
      return;
    }
    const isHttps = url.protocol === "https:";
    const transport = isHttps ? https : http;

    const bodyStr = JSON.stringify(body);

    const options: http.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (isHttps ? 443 : 80),
      path: url.pathname + url.search,
      method: "POST",
      headers: {
        "Content-Type": "application/json; charset=utf-8",
        "Content-Length": Buffer.byteLength(bodyStr, "utf-8"),
        Authorization: `Bearer ${target.apiKey}`,
      },
    };

    const req = transport.request(options, (res) => {
      const chunks: Buffer[] = [];

      res.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
      });

      res.on("end", () => {
        const raw = Buffer.concat(chunks).toString("utf-8");
        const status = res.statusCode ?? 0;

        if (status < 200 || status >= 300) {
          reject(
            new UpstreamError(
              `Provider error (status ${status}): ${raw.slice(0, 200)}`,
              status,
            ),
          );
          return;
        }

        let parsed: unknown;
        try {
          parsed = JSON.parse(raw);
        } catch {
          reject(
            new UpstreamError(
              `Provider returned invalid JSON (status ${status}): ${raw.slice(0, 200)}`,
              status,
            ),
          );
          return;
        }

        const result = ChatCompletionResponseSchema.safeParse(parsed);
        if (!result.success) {
          reject(new UpstreamError("Provider response has no completion text", status));
          return;
        }

        const [choice] = result.data.choices;
        resolve({ content: choice.message.content, model: result.data.model ?? body.model });
      });

      res.on("error", (err) => {
        reject(new UpstreamError(`Provider connection failed: ${err.message}`, undefined, { cause: err }));
      });
    });

    deadline = setTimeout(() => {
      reject(new UpstreamError(`Provider request timed out after ${target.timeoutMs}ms`));
      req.destroy();
    }, target.timeoutMs);

    // After the deadline fires the promise is already settled; this is a no-op then
    req.on("error", (err) => {
      reject(new UpstreamError(`Provider request failed: ${err.message}`, undefined, { cause: err }));
    });

    req.write(bodyStr);
    req.end();
  });
}

import { Router } from "../http/router.js";
import { readJsonBody, sendJson } from "../http/respond.js";
import { handlePrompt, pingProviders, type PromptHandlerDeps } from "./prompt-handler.js";

/**
 * Routes under `/api/ai-proxy`:
 *   POST /      prompt relay, 200 `{content}` or 502 `{error}`
 *   GET  /test  provider ping, 200 online or 503 offline
 *
 * ValidationError from handlePrompt propagates to the server boundary,
 * which answers 400.
 */
export function createProxyRouter(deps: PromptHandlerDeps): Router {
  return new Router()
    .post("/", async ({ req, res }) => {
      const body = await readJsonBody(req);
      const result = await handlePrompt(body, deps);
      sendJson(res, "error" in result ? 502 : 200, result);
    })
    .get("/test", async ({ res }) => {
      const result = await pingProviders(deps);
      sendJson(res, result.status === "online" ? 200 : 503, result);
    });
}

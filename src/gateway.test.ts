import type * as http from "node:http";
import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { resolveConfig } from "./config/load.js";
import type { GatewayConfig } from "./config/schema.js";
import { createGateway, type GatewayOptions } from "./gateway.js";
import { Router } from "./http/router.js";
import { sendJson } from "./http/respond.js";
import { closeServer, listen } from "./http/server.js";
import type { GatewayLogger } from "./log.js";
import { ErrorBodySchema } from "./schemas/errors.js";
import { ProxyResponseSchema } from "./schemas/proxy.js";
import {
  completionBody,
  startTestUpstream,
  type TestUpstream,
} from "./proxy/__fixtures__/test-upstream.js";

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const FIXTURE = new URL("./registry/__fixtures__/sample-routes.ts", import.meta.url).href;

function createLog(): GatewayLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function testConfig(upstream: TestUpstream, overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    ...resolveConfig(
      {
        host: "127.0.0.1",
        port: 0,
        upstreamTimeoutMs: 300,
        providers: [
          { id: "groq", baseUrl: upstream.baseUrl, apiKey: "test-key", models: ["llama-test"] },
        ],
      },
      {},
    ),
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("gateway", () => {
  let upstream: TestUpstream;
  let server: http.Server | undefined;
  let base: string;

  beforeEach(async () => {
    upstream = await startTestUpstream();
  });

  afterEach(async () => {
    if (server) await closeServer(server);
    server = undefined;
    await upstream.close();
  });

  async function boot(config: GatewayConfig, options?: GatewayOptions) {
    const gateway = await createGateway(config, { log: createLog(), ...options });
    server = await listen(gateway.app, { host: "127.0.0.1", port: 0, log: createLog() });
    const addr = server.address();
    const port = typeof addr === "object" && addr !== null ? addr.port : 0;
    base = `http://127.0.0.1:${port}`;
    return gateway;
  }

  function postPrompt(body: unknown): Promise<Response> {
    return fetch(`${base}/api/ai-proxy`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("mounts every built-in group", async () => {
    const { outcomes } = await boot(testConfig(upstream));

    expect(outcomes.map((o) => `${o.status} ${o.urlPrefix}`)).toEqual([
      "mounted /api/meta/model",
      "mounted /api/persona",
      "mounted /api/memory/explore",
      "mounted /api/docs",
      "mounted /api/interface",
      "mounted /api/system",
      "mounted /api/status",
      "mounted /api/ai-proxy",
    ]);
  });

  it("answers the health check", async () => {
    await boot(testConfig(upstream));
    const res = await fetch(`${base}/healthcheck`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("answers the health check even when every group fails", async () => {
    const { outcomes } = await boot(testConfig(upstream), {
      descriptors: [
        {
          name: "broken",
          urlPrefix: "/api/broken",
          load: () => {
            throw new Error("nope");
          },
        },
      ],
    });

    expect(outcomes[0].status).toBe("failed");
    const res = await fetch(`${base}/healthcheck`);
    expect(res.status).toBe(200);
  });

  it("serves static groups", async () => {
    await boot(testConfig(upstream));

    const res = await fetch(`${base}/api/persona/self`);
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ name: "Sable" });

    const snapshot = await fetch(`${base}/api/meta/model/snapshot`);
    expect(await snapshot.json()).toMatchObject({
      system: "introspect-gateway",
      modules: ["meta", "persona", "memory", "docs", "interface", "system", "status"],
    });
  });

  it("serves the home page listing mounted prefixes", async () => {
    await boot(testConfig(upstream));

    const res = await fetch(`${base}/`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    const html = await res.text();
    expect(html).toContain('<li><a href="/api/ai-proxy">/api/ai-proxy</a></li>');
  });

  it("exposes registration outcomes", async () => {
    const gateway = await boot(testConfig(upstream));
    const res = await fetch(`${base}/api/registry`);
    expect(await res.json()).toEqual({ outcomes: gateway.outcomes });
  });

  it("mounts plugins named in the config after the built-in groups", async () => {
    const { outcomes } = await boot(
      testConfig(upstream, { plugins: `${FIXTURE}#sampleRoutes@/api/sample, broken-entry` }),
    );

    expect(outcomes.slice(-2)).toEqual([
      { status: "mounted", name: `${FIXTURE}#sampleRoutes`, urlPrefix: "/api/sample", replaced: false },
      {
        status: "failed",
        name: "broken-entry",
        urlPrefix: "(invalid)",
        reason: 'expected <module>#<export>@<prefix>, got "broken-entry"',
      },
    ]);
    const res = await fetch(`${base}/api/sample/ping`);
    expect(await res.json()).toEqual({ pong: true });
  });

  it("serves the later of two groups sharing a prefix", async () => {
    await boot(testConfig(upstream), {
      descriptors: [
        {
          name: "first",
          urlPrefix: "/api/dup",
          load: () => new Router().get("/", ({ res }) => sendJson(res, 200, { from: "first" })),
        },
        {
          name: "second",
          urlPrefix: "/api/dup",
          load: () => new Router().get("/", ({ res }) => sendJson(res, 200, { from: "second" })),
        },
      ],
    });

    const res = await fetch(`${base}/api/dup`);
    expect(await res.json()).toEqual({ from: "second" });
  });

  // -------------------------------------------------------------------------
  // /api/ai-proxy
  // -------------------------------------------------------------------------

  it("relays a prompt to the provider", async () => {
    upstream.respondWith({ kind: "reply", status: 200, body: completionBody("Hi from upstream") });
    await boot(testConfig(upstream));

    const res = await postPrompt({ query: "hello", provider: "groq" });

    expect(res.status).toBe(200);
    expect(ProxyResponseSchema.parse(await res.json())).toEqual({ content: "Hi from upstream" });
    expect(upstream.requests[0].body).toMatchObject({
      model: "llama-test",
      messages: [{ role: "user", content: "hello" }],
    });
  });

  it("answers 400 for an empty query without calling the provider", async () => {
    await boot(testConfig(upstream));

    const res = await postPrompt({ query: "" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "query must not be empty" });
    expect(upstream.requests).toHaveLength(0);
  });

  it("answers 400 for an empty body", async () => {
    await boot(testConfig(upstream));
    const res = await fetch(`${base}/api/ai-proxy`, { method: "POST" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "query is required" });
  });

  it("answers 400 for malformed JSON", async () => {
    await boot(testConfig(upstream));
    const res = await fetch(`${base}/api/ai-proxy`, { method: "POST", body: "{" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("answers 502 with the reason when the provider times out", async () => {
    upstream.respondWith({ kind: "hang" });
    await boot(testConfig(upstream));

    const res = await postPrompt({ query: "slow" });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Provider request timed out after 300ms" });
  });

  it("answers 405 for GET on the proxy endpoint", async () => {
    await boot(testConfig(upstream));
    const res = await fetch(`${base}/api/ai-proxy`);
    expect(res.status).toBe(405);
  });

  it("reports provider health at /api/ai-proxy/test", async () => {
    upstream.respondWith({ kind: "reply", status: 200, body: completionBody("Ping") });
    await boot(testConfig(upstream));

    const online = await fetch(`${base}/api/ai-proxy/test`);
    expect(online.status).toBe(200);
    expect(await online.json()).toMatchObject({
      status: "online",
      provider: "groq",
      model: "llama-test",
      response: "Ping",
    });

    upstream.respondWith({ kind: "reply", status: 500, body: "down" });
    const offline = await fetch(`${base}/api/ai-proxy/test`);
    expect(offline.status).toBe(503);
    expect(await offline.json()).toMatchObject({ status: "offline", reason: "No working models" });
  });

  it("answers 404 for unknown paths", async () => {
    await boot(testConfig(upstream));
    const res = await fetch(`${base}/api/nowhere`);
    expect(res.status).toBe(404);
    expect(ErrorBodySchema.parse(await res.json())).toEqual({ error: "Not found" });
  });
});

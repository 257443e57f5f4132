import * as http from "node:http";

// ---------------------------------------------------------------------------
// In-process stand-in for an OpenAI-compatible provider (tests only)
// ---------------------------------------------------------------------------

export interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: unknown;
}

export type UpstreamBehavior =
  | { kind: "reply"; status: number; body: string }
  | { kind: "hang" }
  /** 200 headers, then one space every `intervalMs` for `ticks` ticks, then `body`. */
  | { kind: "trickle"; intervalMs: number; ticks: number; body: string }
  | { kind: "drop" };

export interface TestUpstream {
  baseUrl: string;
  requests: RecordedRequest[];
  respondWith(behavior: UpstreamBehavior): void;
  close(): Promise<void>;
}

export function completionBody(content: string, model = "test-model"): string {
  return JSON.stringify({
    id: "cmpl-1",
    model,
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
  });
}

/** Start a provider stand-in on a random port. */
export function startTestUpstream(): Promise<TestUpstream> {
  let behavior: UpstreamBehavior = { kind: "reply", status: 200, body: completionBody("ok") };
  const requests: RecordedRequest[] = [];

  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const text = Buffer.concat(chunks).toString("utf-8");
      requests.push({
        method: req.method ?? "",
        url: req.url ?? "",
        headers: req.headers,
        body: text ? JSON.parse(text) : undefined,
      });

      switch (behavior.kind) {
        case "reply":
          res.writeHead(behavior.status, { "Content-Type": "application/json" });
          res.end(behavior.body);
          return;
        case "drop":
          req.socket.destroy();
          return;
        case "hang":
          return;
        case "trickle": {
          const { intervalMs, body } = behavior;
          let remaining = behavior.ticks;
          res.writeHead(200, { "Content-Type": "application/json" });
          const timer = setInterval(() => {
            if (res.destroyed) {
              clearInterval(timer);
              return;
            }
            if (remaining-- > 0) {
              res.write(" ");
              return;
            }
            clearInterval(timer);
            res.end(body);
          }, intervalMs);
          res.on("close", () => clearInterval(timer));
          return;
        }
      }
    });
  });

  return new Promise((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr !== null ? addr.port : 0;
      resolve({
        baseUrl: `http://127.0.0.1:${port}/v1`,
        requests,
        respondWith(next) {
          behavior = next;
        },
        close() {
          return new Promise((done) => {
            server.close(() => done());
            server.closeAllConnections();
          });
        },
      });
    });
  });
}

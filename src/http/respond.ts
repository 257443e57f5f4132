import type * as http from "node:http";
import { ValidationError } from "../errors.js";
import type { ErrorBody } from "../schemas/errors.js";

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(payload, "utf-8"),
  });
  res.end(payload);
}

export function sendError(res: http.ServerResponse, status: number, message: string): void {
  const body: ErrorBody = { error: message };
  sendJson(res, status, body);
}

export function sendHtml(res: http.ServerResponse, status: number, html: string): void {
  res.writeHead(status, {
    "Content-Type": "text/html; charset=utf-8",
    "Content-Length": Buffer.byteLength(html, "utf-8"),
  });
  res.end(html);
}

// ---------------------------------------------------------------------------
// Request bodies
// ---------------------------------------------------------------------------

export const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Buffer the request body. Past `limit` the rest of the body is drained and
 * discarded so the connection stays open for the 400 response.
 */
export function readBody(req: http.IncomingMessage, limit = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflowed = false;
    req.on("data", (chunk: Buffer) => {
      if (overflowed) return;
      size += chunk.length;
      if (size > limit) {
        overflowed = true;
        chunks.length = 0;
        reject(new ValidationError(`Request body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

/**
 * Read and parse a JSON body. An empty body parses as `{}` so schema
 * validation reports the missing fields instead of a parse error.
 */
export async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const text = await readBody(req);
  if (!text.trim()) return {};
  try {
    return JSON.parse(text);
  } catch {
    throw new ValidationError("Invalid JSON body");
  }
}

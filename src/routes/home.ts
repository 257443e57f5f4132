import type { RouteHandler } from "../http/router.js";
import { sendHtml } from "../http/respond.js";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

export function renderHomePage(prefixes: readonly string[]): string {
  const items = prefixes
    .map((prefix) => `      <li><a href="${escapeHtml(prefix)}">${escapeHtml(prefix)}</a></li>`)
    .join("\n");

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <title>introspect-gateway</title>
  </head>
  <body>
    <h1>introspect-gateway</h1>
    <p>Mounted route groups:</p>
    <ul>
${items}
    </ul>
  </body>
</html>
`;
}

/** `GET /`, listing whatever `prefixes()` returns at request time. */
export function homePageHandler(prefixes: () => readonly string[]): RouteHandler {
  return ({ res }) => {
    sendHtml(res, 200, renderHomePage(prefixes()));
  };
}

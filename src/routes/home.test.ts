import { describe, it, expect } from "vitest";
import { escapeHtml, renderHomePage } from "./home.js";

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
    );
  });
});

describe("renderHomePage", () => {
  it("links every prefix", () => {
    const html = renderHomePage(["/api/docs", "/api/<x>"]);
    expect(html).toContain('      <li><a href="/api/docs">/api/docs</a></li>\n');
    expect(html).toContain('      <li><a href="/api/&lt;x&gt;">/api/&lt;x&gt;</a></li>\n');
  });

  it("renders an empty list", () => {
    expect(renderHomePage([])).toContain("<ul>\n\n    </ul>");
  });
});

import { describe, expect, it } from "vitest";
import { escapeHtml, formatExpiration, renderLandingPage, renderPreviewPage } from "../../src/views.js";
import type { ShortLink } from "../../src/storage.js";

const link: ShortLink = {
  id: 7,
  longUrl: 'https://example.com/?q="<x>"&y=1',
  shortCode: "abc",
  clicks: 4,
  expiresAt: new Date("2031-05-06T00:00:00Z"),
  createdAt: new Date("2030-01-01T00:00:00Z")
};

describe("views", () => {
  it("escapes html metacharacters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;"
    );
  });

  it("formats expirations as dates or Never", () => {
    expect(formatExpiration(new Date("2031-05-06T00:00:00Z"))).toBe("2031-05-06");
    expect(formatExpiration(null)).toBe("Never");
  });

  it("renders the history table with preview and delete controls", () => {
    const html = renderLandingPage({ links: [link] });

    expect(html).toContain('<a href="/abc" target="_blank">abc</a> <a href="/abc+" title="Preview">+</a>');
    expect(html).toContain("<td>4</td>");
    expect(html).toContain("<td>2031-05-06</td>");
    expect(html).toContain('<input type="hidden" name="short_code" value="abc">');
  });

  it("omits the table when there are no links", () => {
    expect(renderLandingPage({ links: [] })).not.toContain("<table>");
  });

  it("shows the created short url and errors", () => {
    const html = renderLandingPage({ links: [], shortUrl: "https://sho.rt/abc", error: "Custom code already exists." });

    expect(html).toContain('<a href="https://sho.rt/abc" target="_blank">https://sho.rt/abc</a>');
    expect(html).toContain('<p class="error">Custom code already exists.</p>');
  });

  it("refills the form after an error", () => {
    const html = renderLandingPage({ links: [], form: { long_url: "https://example.com/\"x", custom_code: "mine" } });

    expect(html).toContain('value="https://example.com/&quot;x" required');
    expect(html).toContain('placeholder="e.g. mylink" value="mine"');
  });

  it("renders the preview with escaped destination and click count", () => {
    const html = renderPreviewPage(link);

    expect(html).toContain(
      '<a href="https://example.com/?q=&quot;&lt;x&gt;&quot;&amp;y=1" rel="noopener noreferrer">https://example.com/?q=&quot;&lt;x&gt;&quot;&amp;y=1</a>'
    );
    expect(html).toContain("<p>Clicks: 4</p>");
    expect(html).toContain('<form method="get" action="/abc">');
  });
});

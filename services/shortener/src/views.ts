import type { ShortLink } from "./storage.js";
import type { LinkForm } from "./validate_link.js";
import { PREVIEW_SUFFIX } from "./resolver.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatExpiration(expiresAt: Date | null): string {
  return expiresAt ? expiresAt.toISOString().slice(0, 10) : "Never";
}

const STYLE = `
    body { font-family: system-ui, sans-serif; max-width: 720px; margin: 40px auto; padding: 0 20px; color: #222; }
    form.create { display: grid; gap: 8px; margin-bottom: 24px; }
    input { padding: 8px; font-size: 16px; }
    button { padding: 8px 16px; font-size: 16px; cursor: pointer; }
    .error { color: #b91c1c; }
    .result { padding: 12px; background: #f0fdf4; border: 1px solid #86efac; word-break: break-all; }
    table { width: 100%; border-collapse: collapse; margin-top: 24px; }
    th, td { text-align: left; padding: 6px; border-bottom: 1px solid #e5e7eb; }
    .inline { display: inline; }`;

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <style>${STYLE}
  </style>
</head>
<body>
${body}
</body>
</html>
`;
}

function historyRow(link: ShortLink): string {
  const code = escapeHtml(link.shortCode);
  return `    <tr>
      <td><a href="/${code}" target="_blank">${code}</a> <a href="/${code}${PREVIEW_SUFFIX}" title="Preview">${PREVIEW_SUFFIX}</a></td>
      <td>${link.clicks}</td>
      <td>${formatExpiration(link.expiresAt)}</td>
      <td>
        <form class="inline" method="post" action="/delete">
          <input type="hidden" name="short_code" value="${code}">
          <button type="submit">Delete</button>
        </form>
      </td>
    </tr>`;
}

export interface LandingPageModel {
  links: ShortLink[];
  shortUrl?: string;
  error?: string;
  form?: LinkForm;
}

export function renderLandingPage({ links, shortUrl, error, form = {} }: LandingPageModel): string {
  const parts: string[] = [
    `  <h1>Shorten a link</h1>
  <form class="create" method="post" action="/">
    <input name="long_url" type="url" placeholder="Enter a long URL to shorten" value="${escapeHtml(form.long_url ?? "")}" required>
    <details>
      <summary>Custom code and expiration</summary>
      <label>Custom short code (optional)
        <input name="custom_code" type="text" placeholder="e.g. mylink" value="${escapeHtml(form.custom_code ?? "")}">
      </label>
      <label>Expiration date (optional)
        <input name="expiration_date" type="date" value="${escapeHtml(form.expiration_date ?? "")}">
      </label>
    </details>
    <button type="submit">Shorten</button>
  </form>`
  ];

  if (error) {
    parts.push(`  <p class="error">${escapeHtml(error)}</p>`);
  }

  if (shortUrl) {
    const href = escapeHtml(shortUrl);
    parts.push(`  <div class="result"><strong>Your shortened URL:</strong> <a href="${href}" target="_blank">${href}</a></div>`);
  }

  if (links.length > 0) {
    parts.push(`  <table>
    <tr><th>Short</th><th>Clicks</th><th>Expires</th><th>Action</th></tr>
${links.map(historyRow).join("\n")}
  </table>`);
  }

  return page("Shorten a link", parts.join("\n"));
}

export function renderPreviewPage(link: ShortLink): string {
  const code = escapeHtml(link.shortCode);
  const longUrl = escapeHtml(link.longUrl);
  return page(
    `Preview ${link.shortCode}`,
    `  <h1>Link preview</h1>
  <p>/${code} leads to:</p>
  <p class="result"><a href="${longUrl}" rel="noopener noreferrer">${longUrl}</a></p>
  <p>Clicks: ${link.clicks}</p>
  <form method="get" action="/${code}"><button type="submit">Continue to link</button></form>`
  );
}

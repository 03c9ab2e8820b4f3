// renderArt.ts
import fs from "node:fs/promises";
import { marked } from "marked";
import puppeteer from "puppeteer-core";
import type { Theme } from "./theme.js";

export const ART_WIDTH = 1920;
export const ART_HEIGHT = 1080;

export type ArtContent =
  | { kind: "markdown"; markdown: string }
  | { kind: "goals"; goals: string[]; title?: string };

export async function markdownToHtml(markdown: string): Promise<string> {
  return await marked.parse(markdown);
}

/**
 * One goal per non-blank line. List markers and checkboxes are dropped, so a
 * goals file can be written as plain lines or as a markdown task list.
 */
export function parseGoals(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim()
      .replace(/^(?:[-*+]|\d+[.)])\s+/, "")
      .replace(/^\[[ xX]\]\s*/, "")
      .trim())
    .filter(Boolean);
}

export function goalsToHtml(goals: string[], title?: string): string {
  const heading = title ? `<h1>${escapeHtml(title)}</h1>\n` : "";
  const items = goals.map(g => `  <li>${escapeHtml(g)}</li>`).join("\n");
  return `${heading}<ul class="goals">\n${items}\n</ul>`;
}

export async function contentToHtml(content: ArtContent): Promise<string> {
  return content.kind === "markdown"
    ? markdownToHtml(content.markdown)
    : goalsToHtml(content.goals, content.title);
}

export function buildArtHtml(opts: { bodyHtml: string; css: string }): string {
  return `<!doctype html>
<html>
<head>
  <meta charset="utf-8"/>
  <meta name="viewport" content="width=${ART_WIDTH}, initial-scale=1"/>
  <style>
${opts.css}
  </style>
  <style>
    html, body { width:${ART_WIDTH}px; height:${ART_HEIGHT}px; overflow:hidden; }
  </style>
</head>
<body>
  <div class="container">
${opts.bodyHtml}
  </div>
</body>
</html>`;
}

export async function renderArtPNG(
  opts: {
    content: ArtContent;
    theme: Theme;
    outPath: string;                // PNG is written here
    browserPath?: string;           // Chrome/Chromium binary; falls back to the installed Chrome channel
    debug?: boolean;                // true to also save HTML + PNG to the cwd
  }
): Promise<Buffer> {
  const html = buildArtHtml({ bodyHtml: await contentToHtml(opts.content), css: opts.theme.css });

  if (opts.debug) {
    const htmlPath = `debug-art.html`;
    await fs.writeFile(htmlPath, html, "utf8");
    console.log(`[RENDER] Debug HTML written to: ${htmlPath}`);
  }

  const browser = await puppeteer.launch({
    headless: true,
    ...(opts.browserPath ? { executablePath: opts.browserPath } : { channel: "chrome" as const }),
    args: ["--no-sandbox", "--disable-setuid-sandbox", "--hide-scrollbars"],
  });

  try {
    const page = await browser.newPage();
    await page.setViewport({ width: ART_WIDTH, height: ART_HEIGHT, deviceScaleFactor: 1 });
    await page.setContent(html, { waitUntil: "load" });

    const png = Buffer.from(await page.screenshot({ type: "png" }));
    await fs.writeFile(opts.outPath, png);
    console.log(`[RENDER] ${ART_WIDTH}x${ART_HEIGHT} PNG written to: ${opts.outPath}`);

    if (opts.debug) {
      const pngPath = `debug-art.png`;
      await fs.writeFile(pngPath, png);
      console.log(`[RENDER] Debug PNG written to: ${pngPath}`);
    }

    return png;
  } finally {
    await browser.close();
  }
}

export function escapeHtml(s: string): string {
  const map: Record<string, string> = { "&": "&amp;", "<": "&lt;", ">": "&gt;", '"': "&quot;", "'": "&#39;" };
  return s.replace(/[&<>"']/g, m => map[m] ?? m);
}

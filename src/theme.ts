// theme.ts
import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "./errors.js";

export type Theme = {
  name: string;
  css: string;       // assets already inlined
  baseDir: string;   // where relative url(...) references were resolved from
  source: string;    // the stylesheet that was loaded
};

/** Themes shipped with the package: <root>/themes */
export const BUILTIN_THEMES_DIR = path.resolve(__dirname, "..", "themes");

const ENTRY_FILE = "theme.css";

const MIME_BY_EXT: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".svg": "image/svg+xml",
  ".avif": "image/avif",
  ".woff": "font/woff",
  ".woff2": "font/woff2",
  ".ttf": "font/ttf",
  ".otf": "font/otf",
};

/**
 * Find a theme by name and return its CSS with local assets embedded.
 * Search dirs are tried in order (user override first, then built-ins); within
 * each dir a folder `<name>/theme.css` wins over a flat `<name>.css`.
 */
export function resolveTheme(
  name: string,
  opts: { searchDirs: string[] }
): Theme {
  if (!isPlainName(name)) {
    throw new ConfigError("theme-not-found", `Theme not found: ${name}`);
  }

  for (const dir of opts.searchDirs) {
    const candidates = [path.join(dir, name, ENTRY_FILE), path.join(dir, `${name}.css`)];
    for (const file of candidates) {
      if (!isFile(file)) continue;
      const baseDir = path.dirname(file);
      const raw = fs.readFileSync(file, "utf8");
      console.log(`[THEME] ${name} -> ${file}`);
      return { name, css: inlineThemeAssets(raw, baseDir), baseDir, source: file };
    }
  }

  const available = listThemes(opts.searchDirs);
  throw new ConfigError(
    "theme-not-found",
    `Theme not found: ${name} (available: ${available.length ? available.join(", ") : "none"})`
  );
}

/** Theme names visible across the search dirs, first dir wins on duplicates. */
export function listThemes(searchDirs: string[]): string[] {
  const seen = new Set<string>();
  for (const dir of searchDirs) {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      continue; // a missing override dir is normal
    }
    for (const e of entries) {
      if (e.isDirectory() && isFile(path.join(dir, e.name, ENTRY_FILE))) seen.add(e.name);
      else if (e.isFile() && e.name.endsWith(".css")) seen.add(e.name.slice(0, -".css".length));
    }
  }
  return [...seen].sort();
}

/**
 * Replace relative local url(...) references with data: URIs so the page
 * renders the same no matter where the browser thinks it is loaded from.
 */
export function inlineThemeAssets(css: string, baseDir: string): string {
  return css.replace(/url\(\s*(['"]?)([^'")]+?)\1\s*\)/g, (match, _quote: string, ref: string) => {
    if (!isRelativeLocal(ref)) return match;

    const file = path.resolve(baseDir, ref);
    if (!isFile(file)) return match;

    const mime = MIME_BY_EXT[path.extname(file).toLowerCase()] ?? "application/octet-stream";
    const b64 = fs.readFileSync(file).toString("base64");
    return `url("data:${mime};base64,${b64}")`;
  });
}

/* ------------- helpers ------------- */

function isRelativeLocal(ref: string): boolean {
  if (ref.startsWith("#") || ref.startsWith("/") || ref.startsWith("\\")) return false;
  if (path.isAbsolute(ref)) return false;
  // data:, http:, https:, file:, and friends
  return !/^[a-z][a-z0-9+.-]*:/i.test(ref);
}

function isPlainName(name: string): boolean {
  return name.length > 0 && name !== "." && name !== ".." && !/[\\/]/.test(name);
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

// run.ts
import { createArtConnector } from "./art-channel.js";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { pushArtwork } from "./push-art.js";
import { renderArtPNG } from "./render-art.js";
import { BUILTIN_THEMES_DIR, resolveTheme } from "./theme.js";
import { ensureArtMode } from "./tv-session.js";

// Load environment variables
import dotenv from "dotenv";
dotenv.config();

async function run() {
  const config = loadConfig(process.env);
  console.log("[CONFIG] TV:", `${config.tv.ip}:${config.tv.port}`);
  console.log("[CONFIG] Source:", config.source.kind, config.source.file);

  const theme = resolveTheme(config.theme, { searchDirs: [config.themesDir, BUILTIN_THEMES_DIR] });

  const contentId = await pushArtwork(config, theme, {
    connect: createArtConnector({ timeoutMs: config.tv.timeoutMs, token: config.tv.token }),
    render: renderArtPNG,
    ensureArtMode,
  });
  console.log(`Done! ${contentId}`);
}

run().catch(e => {
  console.error("[ERROR]", e instanceof ConfigError ? e.message : e);
  process.exit(1);
});

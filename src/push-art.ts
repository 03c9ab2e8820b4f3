// pushArt.ts
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ContentSource, FrameConfig } from "./config.js";
import { parseGoals, type ArtContent, type renderArtPNG } from "./render-art.js";
import { ArtworkStateStore } from "./state-store.js";
import type { Theme } from "./theme.js";
import type { ArtConnector, ensureArtMode } from "./tv-session.js";
import { uploadArtBuffer } from "./upload-art.js";

export type PushDeps = {
  connect: ArtConnector;
  render: typeof renderArtPNG;
  ensureArtMode: typeof ensureArtMode;
};

export async function loadContent(source: ContentSource): Promise<ArtContent> {
  const text = await fs.readFile(source.file, "utf8");
  return source.kind === "markdown"
    ? { kind: "markdown", markdown: text }
    : { kind: "goals", goals: parseGoals(text), title: source.title };
}

/**
 * render -> wake/art mode -> delete previous -> upload -> select -> remember.
 * The rendered PNG lives in a temp dir that is removed however this ends.
 */
export async function pushArtwork(config: FrameConfig, theme: Theme, deps: PushDeps): Promise<string> {
  const content = await loadContent(config.source);
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "frame-art-"));
  try {
    console.log("[RENDER] Rendering image...");
    const png = await deps.render({
      content,
      theme,
      outPath: path.join(tmpDir, "art.png"),
      browserPath: config.browserPath,
      debug: config.debug,
    });

    await deps.ensureArtMode({
      ip: config.tv.ip,
      port: config.tv.port,
      mac: config.tv.mac,
      connect: deps.connect,
      retryDelayMs: config.tv.wakeDelayMs,
    });

    return await uploadArtBuffer({
      ip: config.tv.ip,
      port: config.tv.port,
      image: png,
      store: new ArtworkStateStore(config.stateFile),
      connect: deps.connect,
      matte: config.matte,
    });
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
}

// config.ts
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors.js";
import { defaultStateFilePath } from "./state-store.js";
import { ART_PORT } from "./tv-session.js";

export type Env = Record<string, string | undefined>;

export const DEFAULT_WAKE_DELAY_MS = 15000;
export const DEFAULT_TV_TIMEOUT_MS = 10000;

export type TvConfig = {
  ip: string;
  port: number;
  mac?: string;
  token?: string;
  wakeDelayMs: number;
  timeoutMs: number;
};

export type ContentSource =
  | { kind: "markdown"; file: string }
  | { kind: "goals"; file: string; title: string };

export type FrameConfig = {
  tv: TvConfig;
  source: ContentSource;
  theme: string;
  themesDir: string;
  matte: string;
  stateFile: string;
  browserPath?: string;
  debug: boolean;
};

const IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;
const MAC = /^[0-9a-f]{2}([:-]?[0-9a-f]{2}){5}$/i;

/** Only what talking to the TV needs (used by tv-off as well as run). */
export function loadTvConfig(env: Env): TvConfig {
  const ip = required(env, "FRAME_TV_IP");
  if (!IPV4.test(ip)) {
    throw new ConfigError("invalid-env", `FRAME_TV_IP must be an IPv4 address, got "${ip}"`);
  }

  const mac = optional(env, "FRAME_TV_MAC");
  if (mac !== undefined && !MAC.test(mac)) {
    throw new ConfigError("invalid-env", `FRAME_TV_MAC must be a hardware address like aa:bb:cc:dd:ee:ff, got "${mac}"`);
  }

  return {
    ip,
    port: positiveInt(env, "FRAME_TV_PORT", ART_PORT),
    mac,
    token: optional(env, "FRAME_TV_TOKEN"),
    wakeDelayMs: positiveInt(env, "FRAME_WAKE_DELAY_MS", DEFAULT_WAKE_DELAY_MS),
    timeoutMs: positiveInt(env, "FRAME_TV_TIMEOUT_MS", DEFAULT_TV_TIMEOUT_MS),
  };
}

export function loadConfig(env: Env): FrameConfig {
  const tv = loadTvConfig(env);

  const contentFile = optional(env, "FRAME_CONTENT_FILE");
  const goalsFile = optional(env, "FRAME_GOALS_FILE");
  if (contentFile && goalsFile) {
    throw new ConfigError("conflicting-env", "Set either FRAME_CONTENT_FILE or FRAME_GOALS_FILE, not both");
  }
  if (!contentFile && !goalsFile) {
    throw new ConfigError("missing-env", "FRAME_CONTENT_FILE or FRAME_GOALS_FILE environment variable is required");
  }

  const source: ContentSource = contentFile
    ? { kind: "markdown", file: path.resolve(contentFile) }
    : { kind: "goals", file: path.resolve(goalsFile ?? ""), title: optional(env, "FRAME_GOALS_TITLE") ?? "Goals" };

  if (!fs.existsSync(source.file)) {
    throw new ConfigError("content-file-missing", `Content file not found: ${source.file}`);
  }

  return {
    tv,
    source,
    theme: optional(env, "FRAME_THEME") ?? "default",
    themesDir: optional(env, "FRAME_THEMES_DIR") ?? path.join(os.homedir(), ".frame-automation", "themes"),
    matte: optional(env, "FRAME_MATTE") ?? "none",
    stateFile: optional(env, "FRAME_STATE_FILE") ?? defaultStateFilePath(),
    browserPath: optional(env, "FRAME_BROWSER_PATH"),
    debug: env.FRAME_RENDER_DEBUG === "true",
  };
}

/* ------------- helpers ------------- */

function optional(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function required(env: Env, name: string): string {
  const v = optional(env, name);
  if (v === undefined) {
    throw new ConfigError("missing-env", `${name} environment variable is required`);
  }
  return v;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const v = optional(env, name);
  if (v === undefined) return fallback;
  const n = Number(v);
  if (!/^\d+$/.test(v) || !Number.isSafeInteger(n) || n <= 0) {
    throw new ConfigError("invalid-env", `${name} must be a positive integer, got "${v}"`);
  }
  return n;
}

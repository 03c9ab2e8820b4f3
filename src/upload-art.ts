/**
 * Samsung Frame TV art-mode uploader.
 *
 * Every upload replaces the previous one:
 *  - read the content id we uploaded last time (state file)
 *  - delete it on the TV (best-effort, the user may have removed it already)
 *  - upload the new image, "none" matte
 *  - select it as the artwork on screen
 *  - remember the new content id
 *
 * Run directly to push an existing image file; it is letterboxed to 1920 x 1080.
 */

import path from "node:path";
import { argv } from "node:process";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import sharp from "sharp";
import { createArtConnector } from "./art-channel.js";
import { DEFAULT_TV_TIMEOUT_MS } from "./config.js";
import { ART_HEIGHT, ART_WIDTH } from "./render-art.js";
import { ArtworkStateStore, defaultStateFilePath } from "./state-store.js";
import { ART_PORT, closeSession, deleteArtwork, type ArtConnector, type ImageFileType } from "./tv-session.js";

export type FitMode = "contain" | "cover" | "fill";

export const FIT_MODES: readonly FitMode[] = ["contain", "cover", "fill"];

/**
 * Upload an already-rendered image and make it the active artwork.
 * Returns the new content id.
 */
export async function uploadArtBuffer({
  ip,
  port = ART_PORT,
  image,
  store,
  connect,
  fileType = "PNG",
  matte = "none",
}: {
  ip: string;
  port?: number;
  image: Buffer;
  store: ArtworkStateStore;
  connect: ArtConnector;
  fileType?: ImageFileType;
  matte?: string;
}): Promise<string> {
  console.log(`[TV] Connecting to ${ip}:${port}`);
  const session = await connect(ip, port);
  try {
    const previous = await store.read();
    if (previous) {
      await deleteArtwork(session, previous);
    } else {
      console.log("[TV] No previous artwork recorded");
    }

    console.log(`[TV] Uploading ${image.length} bytes`);
    const contentId = await session.upload(image, { fileType, matte });
    console.log(`[TV] Content ID: ${contentId}`);

    await session.select(contentId);
    console.log("[TV] Set as active artwork");

    await store.write(contentId);
    return contentId;
  } finally {
    await closeSession(session);
  }
}

/** Fit any image onto the 1920 x 1080 canvas as a PNG, black letterbox. */
export async function rasterizeForFrame(input: string, fit: FitMode): Promise<Buffer> {
  return sharp(input)
    .resize(ART_WIDTH, ART_HEIGHT, { fit, background: { r: 0, g: 0, b: 0, alpha: 1 } })
    .flatten({ background: "#000000" })
    .png()
    .toBuffer();
}

/**
 * Process an image file and upload it to the TV
 */
export async function uploadArtFile({
  ip,
  input,
  port = ART_PORT,
  fit = "contain",
  matte = "none",
  store = new ArtworkStateStore(),
  connect = createArtConnector({ timeoutMs: DEFAULT_TV_TIMEOUT_MS }),
}: {
  ip: string;
  input: string;
  port?: number;
  fit?: FitMode;
  matte?: string;
  store?: ArtworkStateStore;
  connect?: ArtConnector;
}): Promise<string> {
  const imgPath = path.resolve(input);
  console.log(`[ART] Rasterizing ${imgPath} -> ${ART_WIDTH}x${ART_HEIGHT}, fit=${fit}`);
  const image = await rasterizeForFrame(imgPath, fit);
  return uploadArtBuffer({ ip, port, image, store, connect, matte });
}

async function main() {
  const args = await yargs(hideBin(argv))
    .scriptName("upload-art")
    .usage("$0 --ip <addr> --input <image> [--port 8001] [--fit contain|cover|fill] [--matte none]")
    .option("ip",         { type: "string", demandOption: true, describe: "TV IP (e.g., 192.168.1.100)" })
    .option("input",      { type: "string", demandOption: true, describe: "Path to image file (png/jpg/etc.)" })
    .option("port",       { type: "number", default: ART_PORT, describe: "Art-mode port (8002 for the TLS port)" })
    .option("fit",        { type: "string", default: "contain", choices: FIT_MODES, describe: `Resize strategy to ${ART_WIDTH}x${ART_HEIGHT}` })
    .option("matte",      { type: "string", default: "none", describe: "Matte id, none for no matte" })
    .option("token",      { type: "string", describe: "Pairing token (only used on 8002)" })
    .option("state-file", { type: "string", default: defaultStateFilePath(), describe: "Where the last content id is kept" })
    .strict()
    .parse();

  await uploadArtFile({
    ip: args.ip,
    input: args.input,
    port: args.port,
    fit: toFitMode(args.fit),
    matte: args.matte,
    store: new ArtworkStateStore(args.stateFile),
    connect: createArtConnector({ timeoutMs: DEFAULT_TV_TIMEOUT_MS, token: args.token }),
  });
}

function toFitMode(s: string): FitMode {
  const fit = FIT_MODES.find(m => m === s);
  if (!fit) throw new Error(`Unsupported fit: ${s}. Use one of: ${FIT_MODES.join(", ")}`);
  return fit;
}

// Only run CLI if this is the main module
if (require.main === module) {
  main().catch(err => {
    console.error("[ERROR]", err instanceof Error ? err.stack : String(err));
    process.exit(1);
  });
}

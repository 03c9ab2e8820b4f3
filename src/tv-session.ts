// tvSession.ts
import { setTimeout as delay } from "node:timers/promises";
import { TvConnectionError } from "./errors.js";
import { sendWakePackets, WAKE_PACKET_COUNT } from "./wake-on-lan.js";

export const ART_PORT = 8001;
export const REMOTE_PORT = 8002;
export const POWER_HOLD_MS = 3000;
export const POWER_KEY = "KEY_POWER";

export type ImageFileType = "PNG" | "JPEG";

export type UploadOptions = {
  fileType: ImageFileType;
  matte: string;        // "none" = no matte
};

/** The art-mode operations we use. One open channel to the TV. */
export interface ArtSession {
  upload(image: Buffer, opts: UploadOptions): Promise<string>;
  select(contentId: string): Promise<void>;
  delete(contentId: string): Promise<void>;
  getArtMode(): Promise<boolean>;
  setArtMode(on: boolean): Promise<void>;
  close(): Promise<void>;
}

/** Rejects with TvConnectionError when the TV cannot be reached. */
export type ArtConnector = (ip: string, port: number) => Promise<ArtSession>;

export interface RemoteSession {
  holdKey(key: string, durationMs: number): Promise<void>;
  close(): Promise<void>;
}

export type RemoteConnector = (ip: string, port: number) => Promise<RemoteSession>;

/**
 * Delete a previous upload. The user may have removed it on the TV already,
 * so any failure is logged and reported as `false`.
 */
export async function deleteArtwork(session: ArtSession, contentId: string): Promise<boolean> {
  try {
    await session.delete(contentId);
    console.log(`[TV] Deleted previous artwork ${contentId}`);
    return true;
  } catch (e) {
    console.warn(`[TV] Could not delete previous artwork ${contentId}:`, e instanceof Error ? e.message : e);
    return false;
  }
}

/**
 * Close a session without letting a failed close hide the error that got us
 * here. The failure is logged and dropped.
 */
export async function closeSession(session: { close(): Promise<void> }): Promise<void> {
  try {
    await session.close();
  } catch (e) {
    console.warn("[TV] Could not close the session:", e instanceof Error ? e.message : e);
  }
}

/** Hold the power key on the remote-control port. */
export async function turnOff(
  ip: string,
  opts: { connectRemote: RemoteConnector; holdMs?: number }
): Promise<void> {
  const remote = await opts.connectRemote(ip, REMOTE_PORT);
  try {
    const holdMs = opts.holdMs ?? POWER_HOLD_MS;
    console.log(`[TV] Holding ${POWER_KEY} for ${holdMs}ms on ${ip}:${REMOTE_PORT}`);
    await remote.holdKey(POWER_KEY, holdMs);
  } finally {
    await closeSession(remote);
  }
}

export type EnsureArtModeState = "disconnected" | "wake-sent" | "connected" | "done" | "failed";

export type EnsureArtModeOptions = {
  ip: string;
  port?: number;
  mac?: string;                              // without it there is no wake, only one attempt
  connect: ArtConnector;
  retryDelayMs: number;
  sendWake?: (mac: string, ip: string) => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  onState?: (state: EnsureArtModeState) => void;
};

/**
 * Make sure the TV is showing art mode.
 *
 *   disconnected -> connected -> done
 *   disconnected -> wake-sent -> (retryDelayMs) -> disconnected -> connected -> done
 *   ... -> failed
 *
 * Only a connection failure leads to a wake, and only once. Errors after the
 * channel is open (reading or setting art mode) propagate as they are.
 */
export async function ensureArtMode(opts: EnsureArtModeOptions): Promise<void> {
  const port = opts.port ?? ART_PORT;
  const sendWake = opts.sendWake ?? ((mac: string, ip: string) => sendWakePackets({ mac, ip, count: WAKE_PACKET_COUNT }));
  const sleep = opts.sleep ?? ((ms: number) => delay(ms));

  let woken = false;
  const enter = (next: EnsureArtModeState) => opts.onState?.(next);

  enter("disconnected");
  for (;;) {
    let session: ArtSession;
    try {
      session = await opts.connect(opts.ip, port);
    } catch (e) {
      if (!(e instanceof TvConnectionError) || !opts.mac || woken) {
        enter("failed");
        throw e;
      }
      console.log(`[TV] ${opts.ip} unreachable, sending wake-on-LAN`);
      await sendWake(opts.mac, opts.ip);
      woken = true;
      enter("wake-sent");
      await sleep(opts.retryDelayMs);
      enter("disconnected");
      continue;
    }

    enter("connected");
    try {
      const on = await session.getArtMode();
      console.log(`[TV] Art mode is ${on ? "on" : "off"}`);
      if (!on) await session.setArtMode(true);
    } catch (e) {
      enter("failed");
      throw e;
    } finally {
      await closeSession(session);
    }
    enter("done");
    return;
  }
}

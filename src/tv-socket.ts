// tvSocket.ts
import WebSocket from "ws";
import { TvConnectionError } from "./errors.js";

export const CLIENT_NAME = "FrameArt";

export type JsonRecord = Record<string, unknown>;

export function channelUrl({
  ip,
  port,
  channel,
  name = CLIENT_NAME,
  token,
}: {
  ip: string;
  port: number;
  channel: string;
  name?: string;
  token?: string;
}): string {
  // 8002 is the TLS port and the only one that accepts a pairing token
  const scheme = port === 8002 ? "wss" : "ws";
  const url = new URL(`${scheme}://${ip}:${port}/api/v2/channels/${channel}`);
  url.searchParams.set("name", Buffer.from(name).toString("base64"));
  if (token && scheme === "wss") url.searchParams.set("token", token);
  return url.toString();
}

/**
 * Open a channel and wait until the TV sends `readyEvent`.
 * Anything else (refused, timed out, unauthorized) is a TvConnectionError.
 */
export function openChannel(opts: { url: string; readyEvent: string; timeoutMs: number }): Promise<WebSocket> {
  return new Promise<WebSocket>((resolve, reject) => {
    const ws = new WebSocket(opts.url, {
      rejectUnauthorized: false, // the TV presents a self-signed certificate
      handshakeTimeout: opts.timeoutMs,
    });

    const fail = (message: string, cause?: unknown) => {
      clearTimeout(timer);
      ws.removeAllListeners();
      ws.on("error", () => undefined); // late errors from terminate()
      ws.terminate();
      reject(new TvConnectionError(message, { cause }));
    };

    const timer = setTimeout(() => fail(`No ${opts.readyEvent} from ${opts.url} within ${opts.timeoutMs}ms`), opts.timeoutMs);

    ws.on("message", raw => {
      const msg = parseJsonRecord(raw.toString());
      const event = msg?.event;
      if (event === opts.readyEvent) {
        clearTimeout(timer);
        ws.removeAllListeners();
        const data = msg?.data;
        if (isRecord(data) && typeof data.token === "string") {
          console.log(`[TV] Paired, token: ${data.token}`);
        }
        resolve(ws);
      } else if (event === "ms.channel.unauthorized" || event === "ms.channel.timeOut") {
        fail(`${opts.url} refused the connection (${event})`);
      }
    });
    ws.once("error", err => fail(`Cannot connect to ${opts.url}: ${err.message}`, err));
    ws.once("close", () => fail(`${opts.url} closed before ${opts.readyEvent}`));
  });
}

export function closeChannel(ws: WebSocket): Promise<void> {
  if (ws.readyState === WebSocket.CLOSED) return Promise.resolve();
  return new Promise<void>(resolve => {
    ws.once("close", () => resolve());
    ws.close();
  });
}

export function parseJsonRecord(text: string): JsonRecord | undefined {
  let v: unknown;
  try {
    v = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isRecord(v) ? v : undefined;
}

export function isRecord(v: unknown): v is JsonRecord {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

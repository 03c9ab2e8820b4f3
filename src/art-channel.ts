/**
 * Client for the Frame TV's art-mode channel (com.samsung.art-app).
 *
 * Requests go out as `ms.channel.emit` / `art_app_request` with a JSON string
 * payload; answers come back as `d2d_service_message` events carrying the same
 * request id. Image bytes do not travel over the WebSocket: `send_image` is
 * answered with `ready_to_use` naming a TCP endpoint, the image is streamed
 * there behind a length-prefixed JSON header, and the TV then reports
 * `image_added` with the new content id.
 */

import { randomInt, randomUUID } from "node:crypto";
import net from "node:net";
import tls from "node:tls";
import type WebSocket from "ws";
import { TvConnectionError, TvRequestError } from "./errors.js";
import { channelUrl, closeChannel, isRecord, openChannel, parseJsonRecord, type JsonRecord } from "./tv-socket.js";
import type { ArtConnector, ArtSession, UploadOptions } from "./tv-session.js";

export const ART_CHANNEL = "com.samsung.art-app";

// image_added can take a while on a busy TV
const UPLOAD_TIMEOUT_FACTOR = 3;

type Waiter = {
  request: string;
  expect?: string;
  resolve: (data: JsonRecord) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
};

export type ConnInfo = { ip: string; port: number; key: string; secured: boolean };

export function createArtConnector(opts: { timeoutMs: number; token?: string }): ArtConnector {
  return (ip, port) => ArtChannel.open(ip, port, opts);
}

export class ArtChannel implements ArtSession {
  private readonly waiters = new Map<string, Waiter>();

  private constructor(
    private readonly ws: WebSocket,
    private readonly ip: string,
    private readonly timeoutMs: number,
  ) {
    ws.on("message", raw => this.onMessage(raw.toString()));
    ws.on("error", err => this.failAll(new TvConnectionError(`Art channel error on ${ip}: ${err.message}`, { cause: err })));
    ws.on("close", () => this.failAll(new TvConnectionError(`Art channel to ${ip} closed`)));
  }

  static async open(ip: string, port: number, opts: { timeoutMs: number; token?: string }): Promise<ArtChannel> {
    const url = channelUrl({ ip, port, channel: ART_CHANNEL, token: opts.token });
    console.log(`[ART] Connecting to ${ip}:${port}`);
    const ws = await openChannel({ url, readyEvent: "ms.channel.ready", timeoutMs: opts.timeoutMs });
    return new ArtChannel(ws, ip, opts.timeoutMs);
  }

  async getArtMode(): Promise<boolean> {
    const data = await this.request({ request: "get_artmode_status" });
    return data.value === "on";
  }

  async setArtMode(on: boolean): Promise<void> {
    console.log(`[ART] set_artmode_status ${on ? "on" : "off"}`);
    await this.request({ request: "set_artmode_status", value: on ? "on" : "off" });
  }

  async select(contentId: string): Promise<void> {
    console.log(`[ART] select_image ${contentId}`);
    await this.request({ request: "select_image", category_id: null, content_id: contentId, show: true });
  }

  async delete(contentId: string): Promise<void> {
    console.log(`[ART] delete_image_list ${contentId}`);
    await this.request(
      { request: "delete_image_list", content_id_list: [{ content_id: contentId }] },
      "image_deleted",
    );
  }

  async upload(image: Buffer, opts: UploadOptions): Promise<string> {
    const fileType = opts.fileType.toLowerCase();
    const id = randomUUID();

    console.log(`[ART] send_image ${image.length} bytes (${fileType}, matte=${opts.matte})`);
    const ready = await this.request(
      {
        request: "send_image",
        file_type: fileType,
        request_id: id,
        conn_info: { d2d_mode: "socket", connection_id: randomInt(0, 2 ** 32), id },
        image_date: formatImageDate(new Date()),
        matte_id: opts.matte,
        portrait_matte_id: "shadowbox_polar",
        file_size: image.length,
      },
      "ready_to_use",
      id,
    );

    const conn = parseConnInfo(ready.conn_info);
    const added = this.waitFor(id, "send_image", "image_added", this.timeoutMs * UPLOAD_TIMEOUT_FACTOR);
    await streamImage(conn, image, fileType, this.timeoutMs * UPLOAD_TIMEOUT_FACTOR)
      .catch((err: Error) => this.settle(id, err)); // surfaces through `added`

    const data = await added;
    if (typeof data.content_id !== "string" || !data.content_id) {
      throw new TvRequestError("send_image", "image_added without a content_id");
    }
    console.log(`[ART] image_added ${data.content_id}`);
    return data.content_id;
  }

  async close(): Promise<void> {
    this.failAll(new TvConnectionError(`Art channel to ${this.ip} closed`));
    await closeChannel(this.ws);
  }

  /* ------------- plumbing ------------- */

  private request(body: JsonRecord & { request: string }, expect?: string, id: string = randomUUID()): Promise<JsonRecord> {
    const answer = this.waitFor(id, body.request, expect, this.timeoutMs);
    const payload = JSON.stringify({
      method: "ms.channel.emit",
      params: {
        event: "art_app_request",
        to: "host",
        data: JSON.stringify({ ...body, id }),
      },
    });
    this.ws.send(payload, err => {
      if (err) this.settle(id, new TvConnectionError(`Cannot send ${body.request}: ${err.message}`, { cause: err }));
    });
    return answer;
  }

  private waitFor(id: string, request: string, expect: string | undefined, timeoutMs: number): Promise<JsonRecord> {
    return new Promise<JsonRecord>((resolve, reject) => {
      const timer = setTimeout(
        () => this.settle(id, new TvRequestError(request, `no ${expect ?? "answer"} within ${timeoutMs}ms`)),
        timeoutMs,
      );
      this.waiters.set(id, { request, expect, resolve, reject, timer });
    });
  }

  private onMessage(text: string): void {
    const msg = parseJsonRecord(text);
    if (msg?.event !== "d2d_service_message" || typeof msg.data !== "string") return;

    const data = parseJsonRecord(msg.data);
    if (!data) return;
    const id = typeof data.request_id === "string" ? data.request_id : typeof data.id === "string" ? data.id : undefined;
    if (!id) return;

    const waiter = this.waiters.get(id);
    if (!waiter) return;

    if (data.event === "error") {
      this.settle(id, new TvRequestError(waiter.request, `error_code ${String(data.error_code ?? "unknown")}`));
    } else if (!waiter.expect || data.event === waiter.expect) {
      this.settle(id, data);
    }
  }

  private settle(id: string, outcome: JsonRecord | Error): void {
    const waiter = this.waiters.get(id);
    if (!waiter) return;
    this.waiters.delete(id);
    clearTimeout(waiter.timer);
    if (outcome instanceof Error) waiter.reject(outcome);
    else waiter.resolve(outcome);
  }

  private failAll(err: Error): void {
    for (const id of [...this.waiters.keys()]) this.settle(id, err);
  }
}

/** `conn_info` arrives as a JSON string inside the ready_to_use event. */
export function parseConnInfo(raw: unknown): ConnInfo {
  const info = typeof raw === "string" ? parseJsonRecord(raw) : isRecord(raw) ? raw : undefined;
  const port = Number(info?.port);
  if (!info || typeof info.ip !== "string" || !Number.isInteger(port) || typeof info.key !== "string") {
    throw new TvRequestError("send_image", "ready_to_use without usable conn_info");
  }
  return { ip: info.ip, port, key: info.key, secured: info.secured === true };
}

/** 4-byte big-endian header length, the JSON header, then the image. */
export function buildUploadFrame(image: Buffer, fileType: string, key: string): Buffer {
  const header = Buffer.from(JSON.stringify({
    num: 0,
    total: 1,
    fileLength: image.length,
    fileName: "dummy",
    fileType,
    secKey: key,
    version: "0.0.1",
  }), "ascii");
  const len = Buffer.alloc(4);
  len.writeUInt32BE(header.length, 0);
  return Buffer.concat([len, header, image]);
}

/** "YYYY:MM:DD HH:MM:SS" in local time, the format the TV stores with the image. */
export function formatImageDate(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}:${p(d.getMonth() + 1)}:${p(d.getDate())} ${p(d.getHours())}:${p(d.getMinutes())}:${p(d.getSeconds())}`;
}

function streamImage(conn: ConnInfo, image: Buffer, fileType: string, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const socket: net.Socket = conn.secured
      ? tls.connect({ host: conn.ip, port: conn.port, rejectUnauthorized: false })
      : net.connect({ host: conn.ip, port: conn.port });

    socket.setTimeout(timeoutMs, () => socket.destroy(new Error(`image transfer to ${conn.ip}:${conn.port} timed out`)));
    socket.once("error", err => reject(new TvRequestError("send_image", err.message)));
    socket.once("close", hadError => {
      if (!hadError) resolve();
    });
    socket.end(buildUploadFrame(image, fileType, conn.key));
  });
}

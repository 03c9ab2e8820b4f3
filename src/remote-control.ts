// remoteControl.ts
import { setTimeout as delay } from "node:timers/promises";
import type WebSocket from "ws";
import { TvConnectionError } from "./errors.js";
import { channelUrl, closeChannel, openChannel } from "./tv-socket.js";
import type { RemoteConnector, RemoteSession } from "./tv-session.js";

export const REMOTE_CHANNEL = "samsung.remote.control";

export type KeyCommand = "Click" | "Press" | "Release";

export function keyMessage(cmd: KeyCommand, key: string): string {
  return JSON.stringify({
    method: "ms.remote.control",
    params: {
      Cmd: cmd,
      DataOfCmd: key,
      Option: "false",
      TypeOfRemote: "SendRemoteKey",
    },
  });
}

export function createRemoteConnector(opts: { timeoutMs: number; token?: string }): RemoteConnector {
  return async (ip, port) => {
    const url = channelUrl({ ip, port, channel: REMOTE_CHANNEL, token: opts.token });
    const ws = await openChannel({ url, readyEvent: "ms.channel.connect", timeoutMs: opts.timeoutMs });
    return new RemoteControl(ws, ip);
  };
}

class RemoteControl implements RemoteSession {
  private readonly broken = new AbortController();
  private failure: TvConnectionError | undefined;

  constructor(private readonly ws: WebSocket, ip: string) {
    ws.on("error", err => this.fail(new TvConnectionError(`Remote channel error on ${ip}: ${err.message}`, { cause: err })));
    ws.on("close", () => this.fail(new TvConnectionError(`Remote channel to ${ip} closed`)));
  }

  async holdKey(key: string, durationMs: number): Promise<void> {
    await this.send(keyMessage("Press", key));
    try {
      await delay(durationMs, undefined, { signal: this.broken.signal });
    } catch (e) {
      throw this.failure ?? e;
    }
    await this.send(keyMessage("Release", key));
  }

  close(): Promise<void> {
    return closeChannel(this.ws);
  }

  private fail(err: TvConnectionError): void {
    if (this.failure) return;
    this.failure = err;
    this.broken.abort(err);
  }

  private send(payload: string): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    return new Promise<void>((resolve, reject) => {
      this.ws.send(payload, err => (err ? reject(err) : resolve()));
    });
  }
}

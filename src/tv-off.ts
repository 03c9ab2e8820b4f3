// tvOff.ts
import { loadTvConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createRemoteConnector } from "./remote-control.js";
import { turnOff } from "./tv-session.js";

import dotenv from "dotenv";
dotenv.config();

async function main() {
  const tv = loadTvConfig(process.env);
  await turnOff(tv.ip, {
    connectRemote: createRemoteConnector({ timeoutMs: tv.timeoutMs, token: tv.token }),
  });
  console.log("[TV] Power off sent");
}

main().catch(e => {
  console.error("[ERROR]", e instanceof ConfigError ? e.message : e);
  process.exit(1);
});

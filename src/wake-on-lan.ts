// wakeOnLan.ts
import dgram from "node:dgram";

export const WOL_PORT = 9;
export const WAKE_PACKET_COUNT = 3;

export type PacketSender = (packet: Buffer, address: string, port: number) => Promise<void>;

/** "aa:bb:cc:dd:ee:ff", "AA-BB-CC-DD-EE-FF" or "aabbccddeeff" -> 6 bytes */
export function parseMac(mac: string): Buffer {
  const hex = mac.replace(/[:-]/g, "");
  if (!/^[0-9a-f]{12}$/i.test(hex)) {
    throw new Error(`Invalid hardware address: ${mac}`);
  }
  return Buffer.from(hex, "hex");
}

/** 6 x 0xFF followed by the hardware address repeated 16 times (102 bytes). */
export function magicPacket(mac: string): Buffer {
  const addr = parseMac(mac);
  const packet = Buffer.alloc(6 + 16 * addr.length, 0xff);
  for (let i = 0; i < 16; i++) addr.copy(packet, 6 + i * addr.length);
  return packet;
}

/** 192.168.1.100 -> 192.168.1.255 (assumes a /24, which is what home routers hand out) */
export function broadcastAddressFor(ip: string): string {
  const octets = ip.split(".");
  if (octets.length !== 4) throw new Error(`Invalid IPv4 address: ${ip}`);
  return [...octets.slice(0, 3), "255"].join(".");
}

export async function sendWakePackets({
  mac,
  ip,
  count = WAKE_PACKET_COUNT,
  port = WOL_PORT,
  send = createUdpSender(),
}: {
  mac: string;
  ip: string;
  count?: number;
  port?: number;
  send?: PacketSender;
}): Promise<void> {
  const packet = magicPacket(mac);
  const address = broadcastAddressFor(ip);
  console.log(`[WOL] ${count} magic packets for ${mac} -> ${address}:${port}`);
  for (let i = 0; i < count; i++) {
    await send(packet, address, port);
  }
}

export function createUdpSender(): PacketSender {
  return (packet, address, port) => new Promise<void>((resolve, reject) => {
    const socket = dgram.createSocket("udp4");
    socket.once("error", err => {
      socket.close();
      reject(err);
    });
    socket.bind(() => {
      socket.setBroadcast(true);
      socket.send(packet, port, address, err => {
        socket.close();
        if (err) reject(err);
        else resolve();
      });
    });
  });
}

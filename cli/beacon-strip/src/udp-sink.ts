import { createSocket, type Socket } from "node:dgram";

import { createLogger } from "./log.js";
import type { LedSink, PixelBuffer } from "./schema.js";

const log = createLogger("udp");

const DRGB_HEADER = Buffer.from("DRGB", "ascii");

export const DEFAULT_UDP_PORT = 21324;

/** `DRGB` followed by one R,G,B byte triple per pixel. */
export function encodeDrgbPacket(pixels: PixelBuffer): Buffer {
  const packet = Buffer.alloc(DRGB_HEADER.length + pixels.length * 3);
  DRGB_HEADER.copy(packet, 0);
  let offset = DRGB_HEADER.length;
  for (const [r, g, b] of pixels) {
    packet[offset++] = r;
    packet[offset++] = g;
    packet[offset++] = b;
  }
  return packet;
}

/**
 * Fire-and-forget WLED realtime sink. Send errors are logged and dropped;
 * there is nothing meaningful to retry on a datagram.
 */
export class UdpDrgbSink implements LedSink {
  private socket: Socket;

  constructor(private host: string, private port = DEFAULT_UDP_PORT) {
    this.socket = createSocket("udp4");
    this.socket.on("error", (err) => log.warn(`socket error: ${err.message}`));
  }

  update(pixels: PixelBuffer) {
    const packet = encodeDrgbPacket(pixels);
    this.socket.send(packet, this.port, this.host, (err) => {
      if (err) log.debug(`send to ${this.host}:${this.port} failed: ${err.message}`);
    });
  }

  close(): Promise<void> {
    return new Promise((resolve) => this.socket.close(() => resolve()));
  }
}

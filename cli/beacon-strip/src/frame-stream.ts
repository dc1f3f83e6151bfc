import { WebSocketServer, WebSocket } from "ws";

import { createLogger } from "./log.js";
import type { LedSink, PixelBuffer } from "./schema.js";
import { nowMs } from "./util.js";

const log = createLogger("frames");

export type FrameMessage = {
  t: number;
  pixels: PixelBuffer;
};

/**
 * Broadcasts every frame as JSON to connected WebSocket clients, for live
 * viewers running next to the real strip.
 */
export class FrameStreamSink implements LedSink {
  private wss: WebSocketServer;
  private clients: Set<WebSocket> = new Set();

  constructor(port: number, host?: string) {
    this.wss = new WebSocketServer({ port, host });
    this.wss.on("connection", (ws) => {
      this.clients.add(ws);
      ws.on("close", () => this.clients.delete(ws));
      ws.on("error", (err) => log.debug(`client error: ${err.message}`));
    });
    this.wss.on("error", (err) => log.error(`frame stream server error: ${err.message}`));
    this.wss.on("listening", () => log.info(`frame stream listening on ws://${host ?? "localhost"}:${this.port()}`));
  }

  /** Bound port, or 0 before the server is listening. */
  port(): number {
    const addr = this.wss.address();
    return typeof addr === "object" && addr !== null ? addr.port : 0;
  }

  ready(): Promise<void> {
    if (this.port() !== 0) return Promise.resolve();
    return new Promise((resolve) => this.wss.once("listening", () => resolve()));
  }

  clientCount(): number {
    return this.clients.size;
  }

  update(pixels: PixelBuffer) {
    if (this.clients.size === 0) return;
    const message: FrameMessage = { t: nowMs(), pixels };
    const payload = JSON.stringify(message);
    for (const ws of this.clients) {
      if (ws.readyState === WebSocket.OPEN) ws.send(payload);
    }
  }

  close(): Promise<void> {
    for (const ws of this.clients) ws.terminate();
    this.clients.clear();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

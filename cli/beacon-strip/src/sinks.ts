import type { AppConfig } from "./config.js";
import { FrameStreamSink } from "./frame-stream.js";
import { HttpJsonSink } from "./http-sink.js";
import { createLogger } from "./log.js";
import type { LedSink, PixelBuffer } from "./schema.js";
import { UdpDrgbSink } from "./udp-sink.js";
import { errorMessage } from "./util.js";

const log = createLogger("sink");

/** Hands the same frame to several sinks; one failing never starves the others. */
export class FanoutSink implements LedSink {
  constructor(private sinks: LedSink[]) {}

  async update(pixels: PixelBuffer): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(async (sink) => sink.update(pixels)));
    for (const result of results) {
      if (result.status === "rejected") log.error(`sink update failed: ${errorMessage(result.reason)}`);
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map(async (sink) => sink.close?.()));
  }
}

export function createDeviceSink(config: AppConfig): LedSink {
  if (config.outputMode === "udp") {
    log.info(`using WLED UDP output at ${config.wledHost}:${config.udpPort} with ${config.ledCount} LEDs`);
    return new UdpDrgbSink(config.wledHost, config.udpPort);
  }
  log.info(`using WLED HTTP output at ${config.wledHost} with ${config.ledCount} LEDs`);
  return new HttpJsonSink(config.wledHost, {
    timeoutMs: config.httpTimeoutSec * 1000,
    maxRetries: config.httpMaxRetries,
  });
}

/** Device sink, plus the WebSocket frame stream when a port is configured. */
export function createOutputSink(config: AppConfig): LedSink {
  const device = createDeviceSink(config);
  if (config.wsPort === undefined) return device;
  return new FanoutSink([device, new FrameStreamSink(config.wsPort)]);
}

import { BeaconRegistry } from "./beacon-registry.js";
import { connectBeaconBus } from "./bus.js";
import type { AppConfig } from "./config.js";
import { BeaconIngestor } from "./ingest.js";
import { createLogger } from "./log.js";
import { RenderLoop, type RenderSummary } from "./render-loop.js";
import { createOutputSink } from "./sinks.js";

const log = createLogger("bridge");

/**
 * MQTT beacons in, WLED frames out, until `signal` aborts.
 */
export async function runBridge(config: AppConfig, signal?: AbortSignal): Promise<RenderSummary> {
  const registry = new BeaconRegistry({
    timeoutMs: config.beaconTimeoutSec * 1000,
    fadeOutMs: config.beaconFadeOutSec * 1000,
  });
  const ingestor = new BeaconIngestor(registry, config.mqttLocation);
  const bus = connectBeaconBus(
    {
      broker: config.mqttBroker,
      port: config.mqttPort,
      baseTopic: config.mqttBaseTopic,
      username: config.mqttUsername,
      password: config.mqttPassword,
    },
    ingestor,
  );
  log.info(`MQTT listener started for location '${config.mqttLocation}' on ${config.mqttBroker}:${config.mqttPort}`);

  const sink = createOutputSink(config);
  const loop = new RenderLoop({
    registry,
    sink,
    trackLength: config.ledCount,
    trailLength: config.trailLength,
    fadeFactor: config.fadeFactor,
    intervalMs: config.updateIntervalSec * 1000,
  });

  log.info(`starting animation loop with interval ${config.updateIntervalSec.toFixed(2)}s`);
  try {
    const summary = await loop.run({ signal });
    const counters = ingestor.getCounters();
    log.info(
      `stopped after ${summary.frames} frames; ${counters.accepted} beacon updates accepted, ${counters.rejected} rejected`,
    );
    return summary;
  } finally {
    await bus.stop();
    await sink.close?.();
  }
}

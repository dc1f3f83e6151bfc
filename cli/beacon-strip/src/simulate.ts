import { BeaconRegistry } from "./beacon-registry.js";
import { getArg, hasFlag, numberArg } from "./args.js";
import { connectBeaconBus, type BeaconBus } from "./bus.js";
import { BeaconIngestor, type IngestCounters } from "./ingest.js";
import { createLogger } from "./log.js";
import { MockBeaconFeed, MockBeaconGenerator } from "./mock-beacons.js";
import { RenderLoop, type RenderSummary } from "./render-loop.js";
import { TerminalSimulatorSink } from "./simulator.js";

const log = createLogger("simulate");

const SIM_TIMEOUT_MS = 3000;
const SIM_FADE_OUT_MS = 2000;

export type SimulatorRunOptions = {
  ledCount: number;
  rows: number;
  cols: number;
  beacons: number;
  updateIntervalSec: number;
  trailLength: number;
  fadeFactor: number;
  durationSec?: number;
  mqtt?: {
    broker: string;
    port: number;
    location: string;
    baseTopic: string;
    username?: string;
    password?: string;
  };
};

export function parseSimulatorArgs(args: string[]): SimulatorRunOptions {
  const options: SimulatorRunOptions = {
    ledCount: numberArg(args, "--led-count", 60),
    rows: numberArg(args, "--rows", 10),
    cols: numberArg(args, "--cols", 6),
    beacons: numberArg(args, "--beacons", 3),
    updateIntervalSec: numberArg(args, "--update-interval", 0.1),
    trailLength: numberArg(args, "--trail-length", 8),
    fadeFactor: numberArg(args, "--fade-factor", 0.7),
  };
  const duration = getArg(args, "--duration");
  if (duration !== undefined) options.durationSec = numberArg(args, "--duration", 0);
  if (hasFlag(args, "--mqtt")) {
    options.mqtt = {
      broker: getArg(args, "--mqtt-broker", "localhost") ?? "localhost",
      port: numberArg(args, "--mqtt-port", 1883),
      location: getArg(args, "--mqtt-location", "balkon") ?? "balkon",
      baseTopic: getArg(args, "--mqtt-base-topic", "espresense/devices") ?? "espresense/devices",
      username: getArg(args, "--mqtt-username"),
      password: getArg(args, "--mqtt-password"),
    };
  }

  if (!Number.isInteger(options.ledCount) || options.ledCount < 1) throw new Error("--led-count must be a positive integer");
  if (options.rows * options.cols !== options.ledCount) {
    throw new Error(
      `rows (${options.rows}) x cols (${options.cols}) = ${options.rows * options.cols} does not equal led_count (${options.ledCount})`,
    );
  }
  if (!Number.isInteger(options.beacons) || options.beacons < 1) throw new Error("--beacons must be a positive integer");
  if (!(options.updateIntervalSec > 0)) throw new Error("--update-interval must be > 0");
  if (!Number.isInteger(options.trailLength) || options.trailLength < 1) throw new Error("--trail-length must be a positive integer");
  if (!(options.fadeFactor > 0 && options.fadeFactor <= 1)) throw new Error("--fade-factor must be between 0 and 1");
  if (options.durationSec !== undefined && !(options.durationSec > 0)) throw new Error("--duration must be > 0");
  return options;
}

export function formatStatusLine(counters: IngestCounters, activeBeacons: number, frames: number, now: number): string {
  const elapsedSec = Math.max(0, (now - counters.started_at) / 1000);
  const rate = elapsedSec > 0 ? counters.accepted / elapsedSec : 0;
  const fps = elapsedSec > 0 ? frames / elapsedSec : 0;
  const mm = String(Math.floor(elapsedSec / 60)).padStart(2, "0");
  const ss = String(Math.floor(elapsedSec % 60)).padStart(2, "0");
  return (
    `MQTT: ${String(counters.accepted).padStart(4)} msgs | ` +
    `${rate.toFixed(1).padStart(6)} msg/s | ` +
    `Beacons: ${String(activeBeacons).padStart(2)} | ` +
    `FPS: ${fps.toFixed(1).padStart(5)} | ` +
    `Time: ${mm}:${ss}`
  );
}

/** Startup summary of a simulator run, one line per setting. */
export function describeSimulatorRun(options: SimulatorRunOptions): string[] {
  const source = options.mqtt
    ? `MQTT (${options.mqtt.broker}:${options.mqtt.port}, location=${options.mqtt.location})`
    : `mock generator (${options.beacons} beacons)`;
  const lines = [
    `LED count: ${options.ledCount} (${options.rows}x${options.cols} grid)`,
    `Beacon source: ${source}`,
    `Update interval: ${options.updateIntervalSec.toFixed(2)}s`,
    `Trail length: ${options.trailLength}`,
    `Fade factor: ${options.fadeFactor}`,
  ];
  if (options.durationSec !== undefined) lines.push(`Duration: ${options.durationSec.toFixed(1)}s`);
  return lines;
}

export async function runSimulator(options: SimulatorRunOptions, signal?: AbortSignal): Promise<RenderSummary> {
  const intervalMs = options.updateIntervalSec * 1000;
  const registry = new BeaconRegistry({ timeoutMs: SIM_TIMEOUT_MS, fadeOutMs: SIM_FADE_OUT_MS });
  const sink = new TerminalSimulatorSink({ ledCount: options.ledCount, rows: options.rows, cols: options.cols });

  let feed: MockBeaconFeed | undefined;
  let bus: BeaconBus | undefined;
  let ingestor: BeaconIngestor | undefined;

  if (options.mqtt) {
    const { mqtt } = options;
    log.info(`connecting to MQTT broker at ${mqtt.broker}:${mqtt.port}, listening to location '${mqtt.location}'`);
    ingestor = new BeaconIngestor(registry, mqtt.location);
    bus = connectBeaconBus(mqtt, ingestor);
  } else {
    log.info(`initializing mock beacon generator with ${options.beacons} beacons`);
    feed = new MockBeaconFeed(new MockBeaconGenerator({ count: options.beacons }), registry, intervalMs);
    feed.start();
  }

  for (const line of describeSimulatorRun(options)) log.info(line);

  const statsFrom = ingestor;
  const loop = new RenderLoop({
    registry,
    sink,
    trackLength: options.ledCount,
    trailLength: options.trailLength,
    fadeFactor: options.fadeFactor,
    intervalMs,
    onFrame: statsFrom
      ? (_pixels, index) => {
          const line = formatStatusLine(statsFrom.getCounters(), registry.size, index, Date.now());
          process.stdout.write(`\r${line}`);
        }
      : undefined,
  });

  try {
    const summary = await loop.run({
      signal,
      durationMs: options.durationSec === undefined ? undefined : options.durationSec * 1000,
    });
    log.info(`simulation complete: rendered ${summary.frames} frames in ${(summary.elapsedMs / 1000).toFixed(2)}s`);
    return summary;
  } finally {
    feed?.stop();
    await bus?.stop();
  }
}

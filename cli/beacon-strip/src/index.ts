export * from "./schema.js";
export { BeaconRegistry, type BeaconRegistryOptions } from "./beacon-registry.js";
export { PositionTracker } from "./position-tracker.js";
export { createPixelBuffer, paintTrail } from "./trail.js";
export {
  colorFor,
  estimateDistance,
  gradientColor,
  hueOffset,
  DEFAULT_COLOR_OPTIONS,
  type ColorMapperOptions,
} from "./color.js";
export { BeaconIngestor, parseBeaconMessage, type IngestCounters, type IngestOutcome } from "./ingest.js";
export { connectBeaconBus, type BeaconBus, type BeaconBusOptions } from "./bus.js";
export { RenderLoop, type RenderLoopOptions, type RenderRunOptions, type RenderSummary } from "./render-loop.js";
export { UdpDrgbSink, encodeDrgbPacket } from "./udp-sink.js";
export { HttpJsonSink, wledStatePayload, type HttpSinkOptions } from "./http-sink.js";
export { TerminalSimulatorSink, renderGrid } from "./simulator.js";
export { FrameStreamSink, type FrameMessage } from "./frame-stream.js";
export { FanoutSink, createOutputSink } from "./sinks.js";
export { MockBeaconFeed, MockBeaconGenerator } from "./mock-beacons.js";
export { loadConfig, loadEnvFile, describeConfig, ConfigError, type AppConfig } from "./config.js";
export { runBridge } from "./bridge.js";
export { createLogger, setLogLevel, type LogLevel, type Logger } from "./log.js";

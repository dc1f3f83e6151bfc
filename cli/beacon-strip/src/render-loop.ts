import type { BeaconRegistry } from "./beacon-registry.js";
import { colorFor, DEFAULT_COLOR_OPTIONS, type ColorMapperOptions } from "./color.js";
import { createLogger } from "./log.js";
import { PositionTracker } from "./position-tracker.js";
import type { LedSink, PixelBuffer } from "./schema.js";
import { createPixelBuffer, paintTrail } from "./trail.js";
import { errorMessage, isAbortError, nowMs, sleep } from "./util.js";

const log = createLogger("render");

export type RenderLoopOptions = {
  registry: BeaconRegistry;
  sink: LedSink;
  trackLength: number;
  trailLength: number;
  fadeFactor: number;
  intervalMs: number;
  tracker?: PositionTracker;
  color?: ColorMapperOptions;
  onFrame?: (pixels: PixelBuffer, index: number) => void;
};

export type RenderRunOptions = {
  signal?: AbortSignal;
  durationMs?: number;
};

export type RenderSummary = {
  frames: number;
  elapsedMs: number;
};

export type RenderState = "idle" | "running" | "stopped";

export class RenderLoop {
  private readonly tracker: PositionTracker;
  private readonly color: ColorMapperOptions;
  private state: RenderState = "idle";
  private frames = 0;

  constructor(private options: RenderLoopOptions) {
    this.tracker = options.tracker ?? new PositionTracker(options.trackLength);
    this.color = options.color ?? DEFAULT_COLOR_OPTIONS;
  }

  getState(): RenderState {
    return this.state;
  }

  getFrameCount(): number {
    return this.frames;
  }

  /** Composites the current registry snapshot into a fresh buffer. */
  renderFrame(): PixelBuffer {
    const { registry, trackLength, trailLength, fadeFactor } = this.options;
    const pixels = createPixelBuffer(trackLength);
    const beacons = registry.snapshot();
    for (const [identity, beacon] of beacons) {
      const position = this.tracker.advance(identity);
      const color = colorFor(identity, beacon.signalStrength, beacon.visibility, this.color);
      paintTrail(pixels, position, color, trailLength, fadeFactor);
    }
    this.tracker.retain(beacons.keys());
    return pixels;
  }

  async tick(): Promise<PixelBuffer> {
    const pixels = this.renderFrame();
    try {
      await this.options.sink.update(pixels);
    } catch (err) {
      log.error(`sink update failed: ${errorMessage(err)}`);
    }
    this.frames++;
    this.options.onFrame?.(pixels, this.frames);
    return pixels;
  }

  /**
   * Renders until the signal aborts or `durationMs` elapses. Both are checked
   * before every frame, and an abort also cuts the wait between frames short.
   */
  async run(runOptions: RenderRunOptions = {}): Promise<RenderSummary> {
    const { signal, durationMs } = runOptions;
    const startedAt = nowMs();
    const startFrames = this.frames;
    this.state = "running";
    try {
      while (true) {
        if (signal?.aborted) break;
        if (durationMs !== undefined && nowMs() - startedAt >= durationMs) {
          log.info("duration limit reached");
          break;
        }
        await this.tick();
        try {
          await sleep(this.options.intervalMs, signal);
        } catch (err) {
          if (isAbortError(err)) break;
          throw err;
        }
      }
    } finally {
      this.state = "stopped";
    }
    return { frames: this.frames - startFrames, elapsedMs: nowMs() - startedAt };
  }
}

import type { BeaconRegistry } from "./beacon-registry.js";

export type MockBeaconOptions = {
  count?: number;
  rssiRange?: [number, number];
};

/**
 * Synthetic beacons circling the receiver: each one's RSSI follows its
 * position on the circle plus a little sinusoidal noise.
 */
export class MockBeaconGenerator {
  readonly ids: string[];
  private readonly minRssi: number;
  private readonly maxRssi: number;
  private time = 0;

  constructor(options: MockBeaconOptions = {}) {
    const count = options.count ?? 3;
    const [minRssi, maxRssi] = options.rssiRange ?? [-90, -30];
    this.minRssi = minRssi;
    this.maxRssi = maxRssi;
    this.ids = Array.from({ length: count }, (_, i) => `beacon_${i}`);
  }

  step(dtSec = 0.1): Map<string, number> {
    this.time += dtSec;
    const out = new Map<string, number>();
    const n = this.ids.length;
    this.ids.forEach((id, i) => {
      const angle = 2 * Math.PI * (this.time / 10 + i / n);
      const pos = 0.5 + 0.4 * Math.cos(angle);
      const noise = 3 * Math.sin(this.time * 2 + i);
      const rssi = this.minRssi + pos * (this.maxRssi - this.minRssi) + noise;
      out.set(id, Math.trunc(rssi));
    });
    return out;
  }
}

/** Pushes generator output into a registry on a timer, like a live bus would. */
export class MockBeaconFeed {
  private timer?: NodeJS.Timeout;

  constructor(
    private generator: MockBeaconGenerator,
    private registry: BeaconRegistry,
    private intervalMs: number,
  ) {}

  pump() {
    for (const [id, rssi] of this.generator.step(this.intervalMs / 1000)) {
      this.registry.update(id, rssi);
    }
  }

  start() {
    this.stop();
    this.pump();
    this.timer = setInterval(() => this.pump(), this.intervalMs);
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
  }
}

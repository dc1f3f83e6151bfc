import type { BeaconMap } from "./schema.js";
import { nowMs } from "./util.js";

type BeaconRecord = {
  signalStrength: number;
  lastSeen: number;
};

export type BeaconRegistryOptions = {
  /** How long a beacon stays at full visibility after its last update. */
  timeoutMs: number;
  /** Linear fade from full to zero visibility once the timeout has passed. */
  fadeOutMs: number;
  now?: () => number;
};

/**
 * Last-value-wins store of beacon signal strength with time-based decay.
 *
 * Visibility is never stored: every snapshot derives it from the age of the
 * last update, and entries whose visibility has reached zero are dropped
 * while the snapshot is taken. `update` and `snapshot` are synchronous, so
 * the event loop serializes them and a snapshot never sees a half-applied
 * update.
 */
export class BeaconRegistry {
  private beacons = new Map<string, BeaconRecord>();
  private readonly timeoutMs: number;
  private readonly fadeOutMs: number;
  private readonly now: () => number;

  constructor(options: BeaconRegistryOptions) {
    if (!(options.timeoutMs >= 0)) throw new RangeError(`timeoutMs must be >= 0, got ${options.timeoutMs}`);
    if (!(options.fadeOutMs >= 0)) throw new RangeError(`fadeOutMs must be >= 0, got ${options.fadeOutMs}`);
    this.timeoutMs = options.timeoutMs;
    this.fadeOutMs = options.fadeOutMs;
    this.now = options.now ?? nowMs;
  }

  get size(): number {
    return this.beacons.size;
  }

  update(identity: string, signalStrength: number) {
    this.beacons.set(identity, { signalStrength, lastSeen: this.now() });
  }

  snapshot(): BeaconMap {
    const now = this.now();
    const active: BeaconMap = new Map();
    for (const [identity, record] of this.beacons) {
      const visibility = this.visibilityAt(now - record.lastSeen);
      if (visibility <= 0) {
        this.beacons.delete(identity);
        continue;
      }
      active.set(identity, { signalStrength: record.signalStrength, visibility });
    }
    return active;
  }

  private visibilityAt(age: number): number {
    if (age <= this.timeoutMs) return 1;
    return Math.max(0, 1 - (age - this.timeoutMs) / this.fadeOutMs);
  }
}

/**
 * Per-beacon cursor that walks the strip one pixel per call and wraps.
 */
export class PositionTracker {
  private positions = new Map<string, number>();

  constructor(private readonly trackLength: number) {
    if (!Number.isInteger(trackLength) || trackLength < 1) {
      throw new RangeError(`trackLength must be a positive integer, got ${trackLength}`);
    }
  }

  get size(): number {
    return this.positions.size;
  }

  advance(identity: string): number {
    const previous = this.positions.get(identity) ?? -1;
    const next = (previous + 1) % this.trackLength;
    this.positions.set(identity, next);
    return next;
  }

  /** Forget every cursor whose identity is not in `identities`. */
  retain(identities: Iterable<string>) {
    const keep = new Set(identities);
    for (const identity of this.positions.keys()) {
      if (!keep.has(identity)) this.positions.delete(identity);
    }
  }
}

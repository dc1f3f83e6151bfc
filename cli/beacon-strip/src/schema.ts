export type Rgb = [number, number, number];

export type PixelBuffer = Rgb[];

export type BeaconSnapshot = {
  signalStrength: number;
  visibility: number;
};

export type BeaconMap = Map<string, BeaconSnapshot>;

/**
 * Anything that consumes a finished frame. Implementations must not throw on
 * transient transport failures; a returned promise delays the next frame.
 */
export interface LedSink {
  update(pixels: PixelBuffer): void | Promise<void>;
  close?(): void | Promise<void>;
}

export type OutputMode = "udp" | "http";

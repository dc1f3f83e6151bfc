import { createHash } from "node:crypto";

import type { Rgb } from "./schema.js";
import { clamp, lerp } from "./util.js";

export type ColorMapperOptions = {
  /** RSSI measured at one metre, in dBm. */
  referencePower: number;
  pathLossExponent: number;
  nearMeters: number;
  farMeters: number;
  /** Width of the per-beacon hue shift, as a fraction of the hue circle. */
  hueBand: number;
};

export const DEFAULT_COLOR_OPTIONS: ColorMapperOptions = {
  referencePower: -59,
  pathLossExponent: 2.0,
  nearMeters: 0.5,
  farMeters: 10.0,
  hueBand: 0.08,
};

type UnitRgb = [number, number, number];

/** Log-distance path loss model. */
export function estimateDistance(
  signalStrength: number,
  referencePower = DEFAULT_COLOR_OPTIONS.referencePower,
  pathLossExponent = DEFAULT_COLOR_OPTIONS.pathLossExponent,
): number {
  return 10 ** ((referencePower - signalStrength) / (10 * pathLossExponent));
}

/**
 * Two-segment gradient over the clamped [near, far] range, channels in 0..1.
 * The first half ramps red up against full green, the second half drains green.
 */
export function gradientColor(
  distance: number,
  near = DEFAULT_COLOR_OPTIONS.nearMeters,
  far = DEFAULT_COLOR_OPTIONS.farMeters,
): UnitRgb {
  const d = clamp(distance, near, far);
  const t = (d - near) / (far - near);
  if (t < 0.5) return [lerp(0, 1, t / 0.5), 1, 0];
  return [1, lerp(1, 0, (t - 0.5) / 0.5), 0];
}

/** Stable hue shift in [0, band) derived from the first 24 bits of SHA-256. */
export function hueOffset(identity: string, band = DEFAULT_COLOR_OPTIONS.hueBand): number {
  const digest = createHash("sha256").update(identity, "utf8").digest("hex");
  return (parseInt(digest.slice(0, 6), 16) / 0xffffff) * band;
}

export function rgbToHsv([r, g, b]: UnitRgb): UnitRgb {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const v = max;
  if (max === min) return [0, 0, v];
  const delta = max - min;
  const s = delta / max;
  const rc = (max - r) / delta;
  const gc = (max - g) / delta;
  const bc = (max - b) / delta;
  let h: number;
  if (r === max) h = bc - gc;
  else if (g === max) h = 2 + rc - bc;
  else h = 4 + gc - rc;
  h = (h / 6) % 1;
  if (h < 0) h += 1;
  return [h, s, v];
}

export function hsvToRgb([h, s, v]: UnitRgb): UnitRgb {
  if (s === 0) return [v, v, v];
  const i = Math.floor(h * 6);
  const f = h * 6 - i;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));
  switch (((i % 6) + 6) % 6) {
    case 0:
      return [v, t, p];
    case 1:
      return [q, v, p];
    case 2:
      return [p, v, t];
    case 3:
      return [p, q, v];
    case 4:
      return [t, p, v];
    default:
      return [v, p, q];
  }
}

/**
 * Beacon color: distance gradient, shifted by the identity's hue offset,
 * value scaled by visibility. Channels are truncated toward zero.
 */
export function colorFor(
  identity: string,
  signalStrength: number,
  visibility: number,
  options: ColorMapperOptions = DEFAULT_COLOR_OPTIONS,
): Rgb {
  const distance = estimateDistance(signalStrength, options.referencePower, options.pathLossExponent);
  const base = gradientColor(distance, options.nearMeters, options.farMeters);
  const [h, s, v] = rgbToHsv(base);
  const shifted = (h + hueOffset(identity, options.hueBand)) % 1;
  const [r, g, b] = hsvToRgb([shifted, s, v * visibility]);
  return [Math.trunc(r * 255), Math.trunc(g * 255), Math.trunc(b * 255)];
}

import type { PixelBuffer, Rgb } from "./schema.js";

export function createPixelBuffer(length: number): PixelBuffer {
  return Array.from({ length }, (): Rgb => [0, 0, 0]);
}

/**
 * Additively paints `color` at `position` and a trail behind it, each step
 * attenuated by another factor of `fadeFactor`. Indices wrap around the
 * buffer, so a trail longer than the strip stacks onto itself. Channels are
 * truncated toward zero and clamped at 255.
 */
export function paintTrail(
  pixels: PixelBuffer,
  position: number,
  color: Rgb,
  trailLength: number,
  fadeFactor: number,
) {
  const len = pixels.length;
  if (len === 0) return;
  const [r, g, b] = color;
  for (let i = 0; i < trailLength; i += 1) {
    const idx = (((position - i) % len) + len) % len;
    const fade = fadeFactor ** i;
    const px = pixels[idx];
    if (!px) continue;
    px[0] = Math.min(255, Math.trunc(px[0] + r * fade));
    px[1] = Math.min(255, Math.trunc(px[1] + g * fade));
    px[2] = Math.min(255, Math.trunc(px[2] + b * fade));
  }
}

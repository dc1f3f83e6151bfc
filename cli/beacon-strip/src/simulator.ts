import type { Writable } from "node:stream";

import type { LedSink, PixelBuffer, Rgb } from "./schema.js";

const ESC = "\u001b";
const CLEAR = `${ESC}[H${ESC}[J`;
const RESET = `${ESC}[0m`;

export type SimulatorOptions = {
  ledCount: number;
  rows: number;
  cols: number;
  output?: Writable;
};

/** Mean of the per-pixel integer channel average. */
export function averageBrightness(pixels: PixelBuffer): number {
  if (pixels.length === 0) return 0;
  const total = pixels.reduce((sum, [r, g, b]) => sum + Math.floor((r + g + b) / 3), 0);
  return total / pixels.length;
}

export function renderGrid(pixels: PixelBuffer, rows: number, cols: number): string {
  const rule = "=".repeat(cols * 4 + 2);
  const lines = ["LED Strip Simulator - Press Ctrl+C to exit", rule];
  for (let row = 0; row < rows; row += 1) {
    let line = "";
    for (let col = 0; col < cols; col += 1) {
      const [r, g, b] = pixels[row * cols + col] ?? [0, 0, 0];
      line += `${ESC}[38;2;${r};${g};${b}m█${RESET}  `;
    }
    lines.push(line);
  }
  lines.push(rule);
  lines.push(`Average brightness: ${averageBrightness(pixels).toFixed(1)}/255`);
  return lines.join("\n") + "\n";
}

/**
 * Terminal stand-in for a WLED strip: redraws the strip as a rows x cols grid
 * of 24-bit colored blocks on every frame.
 */
export class TerminalSimulatorSink implements LedSink {
  readonly rows: number;
  readonly cols: number;
  private current: PixelBuffer;
  private output: Writable;

  constructor(options: SimulatorOptions) {
    const { ledCount, rows, cols } = options;
    if (rows * cols !== ledCount) {
      throw new RangeError(`rows (${rows}) x cols (${cols}) = ${rows * cols} does not equal led_count (${ledCount})`);
    }
    this.rows = rows;
    this.cols = cols;
    this.current = Array.from({ length: ledCount }, (): Rgb => [0, 0, 0]);
    this.output = options.output ?? process.stdout;
  }

  update(pixels: PixelBuffer) {
    this.current = pixels.map(([r, g, b]): Rgb => [r, g, b]);
    this.output.write(CLEAR + renderGrid(this.current, this.rows, this.cols));
  }

  getSnapshot(): PixelBuffer {
    return this.current.map(([r, g, b]): Rgb => [r, g, b]);
  }
}

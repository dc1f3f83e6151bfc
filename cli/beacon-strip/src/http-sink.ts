import { createLogger } from "./log.js";
import type { LedSink, PixelBuffer } from "./schema.js";
import { errorMessage, isRecord, sleep } from "./util.js";

const log = createLogger("http");

export type HttpSinkOptions = {
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  fetch?: typeof fetch;
};

export type WledStatePayload = {
  on: true;
  seg: Array<{ id: 0; i: PixelBuffer }>;
};

export function wledStatePayload(pixels: PixelBuffer): WledStatePayload {
  return { on: true, seg: [{ id: 0, i: pixels }] };
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ETIMEDOUT",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/** Timeouts and connection failures are worth another attempt; nothing else is. */
function isTransient(err: unknown): boolean {
  // fetch wraps socket failures in a TypeError whose cause has the errno code
  if (err instanceof TypeError) {
    const cause = err.cause;
    return isRecord(cause) && typeof cause.code === "string" && NETWORK_ERROR_CODES.has(cause.code);
  }
  const name = err instanceof Error || err instanceof DOMException ? err.name : "";
  return name === "TimeoutError" || name === "AbortError";
}

/**
 * Posts each frame to WLED's JSON API. Transient failures are retried a few
 * times with a short pause; after that the frame is dropped.
 */
export class HttpJsonSink implements LedSink {
  readonly url: string;
  private timeoutMs: number;
  private maxRetries: number;
  private retryDelayMs: number;
  private fetchImpl: typeof fetch;

  constructor(private host: string, options: HttpSinkOptions = {}) {
    this.url = `http://${host}/json/state`;
    this.timeoutMs = options.timeoutMs ?? 1000;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 50;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async update(pixels: PixelBuffer): Promise<void> {
    const body = JSON.stringify(wledStatePayload(pixels));
    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      try {
        const res = await this.fetchImpl(this.url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        await res.arrayBuffer();
        if (!res.ok) log.error(`HTTP ${res.status} from ${this.host}`);
        return;
      } catch (err) {
        if (!isTransient(err)) {
          log.error(`HTTP request error for ${this.host}: ${errorMessage(err)}`);
          return;
        }
        if (attempt < this.maxRetries) {
          log.warn(`HTTP timeout on attempt ${attempt}/${this.maxRetries} for ${this.host}, retrying`);
          await sleep(this.retryDelayMs);
        } else {
          log.error(`HTTP request failed after ${this.maxRetries} attempts for ${this.host}: ${errorMessage(err)}`);
        }
      }
    }
  }
}

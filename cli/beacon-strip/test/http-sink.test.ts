import { afterEach, describe, expect, it, vi } from "vitest";

import { HttpJsonSink, wledStatePayload } from "../src/http-sink.js";

function timeoutError() {
  return new DOMException("The operation was aborted due to timeout", "TimeoutError");
}

function refused() {
  return Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:80"), { code: "ECONNREFUSED" });
}

describe("wledStatePayload", () => {
  it("turns the strip on and sets segment 0 per pixel", () => {
    expect(wledStatePayload([[1, 2, 3]])).toEqual({ on: true, seg: [{ id: 0, i: [[1, 2, 3]] }] });
  });
});

describe("HttpJsonSink", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts the frame as JSON to /json/state", async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response("{}", { status: 200 }));
    const sink = new HttpJsonSink("wled.test", { fetch: fetchMock });
    await sink.update([[9, 8, 7]]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://wled.test/json/state");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"on":true,"seg":[{"id":0,"i":[[9,8,7]]}]}');
  });

  it("retries timeouts and succeeds on a later attempt", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const fetchMock = vi
      .fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response("{}", { status: 200 }))
      .mockRejectedValueOnce(timeoutError());
    const sink = new HttpJsonSink("wled.test", { fetch: fetchMock, retryDelayMs: 0 });
    await sink.update([[0, 0, 0]]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("drops the frame after exhausting retries without throwing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed", { cause: refused() });
    });
    const sink = new HttpJsonSink("wled.test", { fetch: fetchMock, maxRetries: 3, retryDelayMs: 0 });
    await expect(sink.update([[0, 0, 0]])).resolves.toBeUndefined();
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toContain("HTTP request failed after 3 attempts for wled.test: fetch failed");
  });

  it("does not retry non-transient errors", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new Error("boom");
    });
    const sink = new HttpJsonSink("wled.test", { fetch: fetchMock, retryDelayMs: 0 });
    await sink.update([[0, 0, 0]]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toContain("HTTP request error for wled.test: boom");
  });

  it("does not retry a TypeError without a network cause", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError("Invalid URL");
    });
    const sink = new HttpJsonSink("wled.test", { fetch: fetchMock, retryDelayMs: 0 });
    await sink.update([[0, 0, 0]]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toContain("HTTP request error for wled.test: Invalid URL");
  });

  it("logs error responses once", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response("nope", { status: 500 }));
    const sink = new HttpJsonSink("wled.test", { fetch: fetchMock });
    await sink.update([[0, 0, 0]]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0]?.[0])).toContain("HTTP 500 from wled.test");
  });
});

import { afterEach, describe, expect, it, vi } from "vitest";

import { BeaconRegistry } from "../src/beacon-registry.js";
import { BeaconIngestor, parseBeaconMessage } from "../src/ingest.js";

function payload(value: unknown) {
  return Buffer.from(JSON.stringify(value));
}

describe("parseBeaconMessage", () => {
  it("accepts a matching message and truncates rssi", () => {
    expect(parseBeaconMessage("root/devices/beaconA/zoneX", payload({ id: "beaconA", rssi: -50.9 }), "zoneX")).toEqual({
      kind: "accepted",
      identity: "beaconA",
      signalStrength: -50,
    });
  });

  it("ignores short topics", () => {
    expect(parseBeaconMessage("root/beaconA/zoneX", payload({ id: "beaconA", rssi: -50 }), "zoneX")).toEqual({
      kind: "ignored",
      reason: "topic_shape",
    });
  });

  it("ignores other locations", () => {
    expect(parseBeaconMessage("root/devices/beaconA/zoneY", payload({ id: "beaconA", rssi: -50 }), "zoneX")).toEqual({
      kind: "ignored",
      reason: "location",
    });
  });

  it("rejects payloads that are not JSON objects", () => {
    const bad = parseBeaconMessage("root/devices/beaconA/zoneX", "{not json", "zoneX");
    expect(bad.kind).toBe("rejected");
    expect(bad.kind === "rejected" && bad.reason).toBe("bad_json");

    const array = parseBeaconMessage("root/devices/beaconA/zoneX", "[1,2]", "zoneX");
    expect(array.kind === "rejected" && array.reason).toBe("bad_json");
  });

  it("rejects missing or unusable fields", () => {
    for (const body of [{ rssi: -50 }, { id: "beaconA" }, { id: "", rssi: -50 }, { id: "beaconA", rssi: "-50" }]) {
      const outcome = parseBeaconMessage("root/devices/beaconA/zoneX", payload(body), "zoneX");
      expect(outcome.kind === "rejected" && outcome.reason).toBe("missing_fields");
    }
  });

  it("rejects a payload id that disagrees with the topic", () => {
    const outcome = parseBeaconMessage("root/devices/beaconA/zoneX", payload({ id: "beaconB", rssi: -50 }), "zoneX");
    expect(outcome).toEqual({
      kind: "rejected",
      reason: "identity_mismatch",
      detail: "beacon id mismatch - topic: beaconA, payload: beaconB",
    });
  });

  it("ignores extra payload fields", () => {
    const outcome = parseBeaconMessage(
      "espresense/devices/tile:1/balkon",
      payload({ id: "tile:1", rssi: -71, distance: 3.2, name: "keys" }),
      "balkon",
    );
    expect(outcome).toEqual({ kind: "accepted", identity: "tile:1", signalStrength: -71 });
  });
});

describe("BeaconIngestor", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("puts accepted beacons into the registry", () => {
    const registry = new BeaconRegistry({ timeoutMs: 1000, fadeOutMs: 1000 });
    const ingestor = new BeaconIngestor(registry, "zoneX");
    ingestor.handleMessage("root/devices/beaconA/zoneX", payload({ id: "beaconA", rssi: -50 }));
    expect(registry.snapshot().get("beaconA")).toEqual({ signalStrength: -50, visibility: 1 });
  });

  it("leaves the registry empty for another location", () => {
    const registry = new BeaconRegistry({ timeoutMs: 1000, fadeOutMs: 1000 });
    const ingestor = new BeaconIngestor(registry, "zoneY");
    ingestor.handleMessage("root/devices/beaconA/zoneX", payload({ id: "beaconA", rssi: -50 }));
    expect(registry.snapshot().size).toBe(0);
  });

  it("tracks beaconA for its own location and nothing for another", () => {
    const message = payload({ id: "beaconA", rssi: -50 });

    const here = new BeaconRegistry({ timeoutMs: 1000, fadeOutMs: 1000 });
    new BeaconIngestor(here, "zoneX").handleMessage("root/devices/beaconA/zoneX", message);
    expect([...here.snapshot()]).toEqual([["beaconA", { signalStrength: -50, visibility: 1 }]]);

    const elsewhere = new BeaconRegistry({ timeoutMs: 1000, fadeOutMs: 1000 });
    new BeaconIngestor(elsewhere, "zoneY").handleMessage("root/devices/beaconA/zoneX", message);
    expect(elsewhere.snapshot().size).toBe(0);
  });

  it("drops three-segment topics before they reach the registry", () => {
    const registry = new BeaconRegistry({ timeoutMs: 1000, fadeOutMs: 1000 });
    const ingestor = new BeaconIngestor(registry, "zoneX");
    expect(ingestor.handleMessage("root/beaconA/zoneX", payload({ id: "beaconA", rssi: -50 }))).toEqual({
      kind: "ignored",
      reason: "topic_shape",
    });
    expect(registry.snapshot().size).toBe(0);
  });

  it("warns about rejected messages and leaves state alone", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const registry = new BeaconRegistry({ timeoutMs: 1000, fadeOutMs: 1000 });
    const ingestor = new BeaconIngestor(registry, "zoneX");
    ingestor.handleMessage("root/devices/beaconA/zoneX", payload({ id: "beaconB", rssi: -50 }));
    expect(registry.size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain("WARN [ingest] beacon id mismatch - topic: beaconA, payload: beaconB");
  });

  it("counts messages by outcome and beacon", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const registry = new BeaconRegistry({ timeoutMs: 1000, fadeOutMs: 1000 });
    const ingestor = new BeaconIngestor(registry, "zoneX", () => 5000);
    ingestor.handleMessage("root/devices/a/zoneX", payload({ id: "a", rssi: -50 }));
    ingestor.handleMessage("root/devices/a/zoneX", payload({ id: "a", rssi: -52 }));
    ingestor.handleMessage("root/devices/b/zoneX", payload({ id: "b", rssi: -60 }));
    ingestor.handleMessage("root/devices/b/zoneZ", payload({ id: "b", rssi: -60 }));
    ingestor.handleMessage("root/devices/b/zoneX", "oops");
    expect(ingestor.getCounters()).toEqual({
      messages_in: 5,
      accepted: 3,
      ignored: 1,
      rejected: 1,
      started_at: 5000,
      by_beacon: { a: 2, b: 1 },
    });
  });
});

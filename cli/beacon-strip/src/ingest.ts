import type { BeaconRegistry } from "./beacon-registry.js";
import { createLogger } from "./log.js";
import { isRecord, nowMs, safeJsonParse } from "./util.js";

const log = createLogger("ingest");

export type IngestOutcome =
  | { kind: "accepted"; identity: string; signalStrength: number }
  | { kind: "ignored"; reason: "topic_shape" | "location" }
  | { kind: "rejected"; reason: "bad_json" | "missing_fields" | "identity_mismatch"; detail: string };

export type IngestCounters = {
  messages_in: number;
  accepted: number;
  ignored: number;
  rejected: number;
  started_at: number;
  by_beacon: Record<string, number>;
};

/**
 * Parses one `<root>/<identity>/<location>` message. Topic problems and other
 * locations are ignored; payload problems are rejected with a reason.
 */
export function parseBeaconMessage(topic: string, payload: Buffer | string, location: string): IngestOutcome {
  const parts = topic.split("/");
  if (parts.length < 4) return { kind: "ignored", reason: "topic_shape" };

  const topicLocation = parts[parts.length - 1];
  const identity = parts[parts.length - 2] ?? "";
  if (topicLocation !== location) return { kind: "ignored", reason: "location" };

  const raw = typeof payload === "string" ? payload : payload.toString("utf8");
  const parsed = safeJsonParse(raw);
  if (!parsed.ok) {
    return { kind: "rejected", reason: "bad_json", detail: `failed to decode payload from ${identity}: ${parsed.error}` };
  }
  if (!isRecord(parsed.value)) {
    return { kind: "rejected", reason: "bad_json", detail: `payload from ${identity} is not an object: ${raw}` };
  }

  const { id, rssi } = parsed.value;
  if (typeof id !== "string" || id === "" || typeof rssi !== "number" || !Number.isFinite(rssi)) {
    return { kind: "rejected", reason: "missing_fields", detail: `missing id or rssi in payload from ${identity}: ${raw}` };
  }
  if (id !== identity) {
    return { kind: "rejected", reason: "identity_mismatch", detail: `beacon id mismatch - topic: ${identity}, payload: ${id}` };
  }
  return { kind: "accepted", identity, signalStrength: Math.trunc(rssi) };
}

/**
 * Feeds accepted beacon messages into the registry and keeps message counters.
 */
export class BeaconIngestor {
  private counters: IngestCounters;

  constructor(
    private registry: BeaconRegistry,
    private location: string,
    now: () => number = nowMs,
  ) {
    this.counters = { messages_in: 0, accepted: 0, ignored: 0, rejected: 0, started_at: now(), by_beacon: {} };
  }

  getLocation() {
    return this.location;
  }

  getCounters(): IngestCounters {
    return { ...this.counters, by_beacon: { ...this.counters.by_beacon } };
  }

  handleMessage(topic: string, payload: Buffer | string): IngestOutcome {
    this.counters.messages_in++;
    const outcome = parseBeaconMessage(topic, payload, this.location);
    switch (outcome.kind) {
      case "accepted":
        this.counters.accepted++;
        this.counters.by_beacon[outcome.identity] = (this.counters.by_beacon[outcome.identity] ?? 0) + 1;
        this.registry.update(outcome.identity, outcome.signalStrength);
        break;
      case "ignored":
        this.counters.ignored++;
        break;
      case "rejected":
        this.counters.rejected++;
        log.warn(outcome.detail);
        break;
    }
    return outcome;
  }
}

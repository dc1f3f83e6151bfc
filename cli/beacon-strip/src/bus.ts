import { connect, type IClientOptions, type MqttClient } from "mqtt";

import type { BeaconIngestor } from "./ingest.js";
import { createLogger } from "./log.js";

const log = createLogger("mqtt");

export type BeaconBusOptions = {
  broker: string;
  port: number;
  baseTopic: string;
  username?: string;
  password?: string;
  keepaliveSec?: number;
  reconnectPeriodMs?: number;
};

export type BeaconBus = {
  client: MqttClient;
  topic: string;
  stop(): Promise<void>;
};

/**
 * Connects to the broker and forwards every message under
 * `<baseTopic>/+/+` to the ingestor. Reconnects are left to the client.
 */
export function connectBeaconBus(options: BeaconBusOptions, ingestor: BeaconIngestor): BeaconBus {
  const topic = `${options.baseTopic.replace(/\/+$/, "")}/+/+`;
  const clientOptions: IClientOptions = {
    keepalive: options.keepaliveSec ?? 30,
    reconnectPeriod: options.reconnectPeriodMs ?? 2000,
  };
  if (options.username && options.password) {
    clientOptions.username = options.username;
    clientOptions.password = options.password;
    log.debug(`authentication configured for user ${options.username}`);
  }

  const client = connect(`mqtt://${options.broker}:${options.port}`, clientOptions);

  client.on("connect", () => {
    client.subscribe(topic, { qos: 0 }, (err) => {
      if (err) {
        log.error(`subscribe to ${topic} failed: ${err.message}`);
        return;
      }
      log.info(`connected to ${options.broker}:${options.port}, subscribed to ${topic} (location ${ingestor.getLocation()})`);
    });
  });
  client.on("message", (msgTopic, payload) => {
    ingestor.handleMessage(msgTopic, payload);
  });
  client.on("reconnect", () => log.debug(`reconnecting to ${options.broker}:${options.port}`));
  client.on("offline", () => log.warn(`broker ${options.broker}:${options.port} offline`));
  client.on("error", (err) => log.error(`mqtt error: ${err.message}`));

  return {
    client,
    topic,
    stop: () =>
      new Promise<void>((resolve) => {
        client.end(false, {}, () => resolve());
      }),
  };
}

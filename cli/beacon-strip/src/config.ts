import { existsSync } from "node:fs";

import { config as loadDotenv } from "dotenv";

import { createLogger, type LogLevel } from "./log.js";
import type { OutputMode } from "./schema.js";
import { asNumber } from "./util.js";

const log = createLogger("config");

export type AppConfig = {
  wledHost: string;
  ledCount: number;
  outputMode: OutputMode;
  httpTimeoutSec: number;
  httpMaxRetries: number;
  udpPort: number;
  mqttBroker: string;
  mqttPort: number;
  mqttLocation: string;
  mqttBaseTopic: string;
  mqttUsername?: string;
  mqttPassword?: string;
  beaconTimeoutSec: number;
  beaconFadeOutSec: number;
  updateIntervalSec: number;
  trailLength: number;
  fadeFactor: number;
  logLevel: LogLevel;
  wsPort?: number;
};

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`invalid configuration:\n  ${problems.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

const LOG_LEVELS: Record<string, LogLevel> = {
  DEBUG: "debug",
  INFO: "info",
  WARNING: "warn",
  WARN: "warn",
  ERROR: "error",
  CRITICAL: "error",
};

/** Loads `path` into process.env without overriding variables already set. */
export function loadEnvFile(path = ".env"): boolean {
  if (!existsSync(path)) {
    log.warn(`configuration file ${path} not found`);
    return false;
  }
  const result = loadDotenv({ path });
  if (result.error) throw result.error;
  log.info(`loaded configuration from ${path}`);
  return true;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const problems: string[] = [];

  const str = (key: string, fallback: string) => {
    const value = (env[key] ?? fallback).trim();
    if (!value) problems.push(`${key} must not be empty`);
    return value;
  };
  const optional = (key: string) => {
    const value = env[key]?.trim();
    return value ? value : undefined;
  };
  const num = (key: string, fallback: number, ok: (n: number) => boolean, rule: string) => {
    const raw = env[key];
    const n = raw === undefined ? fallback : asNumber(raw, NaN);
    if (!Number.isFinite(n) || !ok(n)) problems.push(`${key} ${rule}, got ${raw ?? n}`);
    return n;
  };
  const isInt = (n: number) => Number.isInteger(n);
  const isPort = (n: number) => isInt(n) && n >= 1 && n <= 65535;

  const mode = (env.OUTPUT_MODE ?? "udp").trim().toLowerCase();
  if (mode !== "udp" && mode !== "http") problems.push(`OUTPUT_MODE must be 'udp' or 'http', got ${mode}`);

  const levelName = (env.LOG_LEVEL ?? "INFO").trim().toUpperCase();
  const logLevel = LOG_LEVELS[levelName];
  if (!logLevel) problems.push(`LOG_LEVEL must be one of DEBUG, INFO, WARNING, ERROR, CRITICAL, got ${levelName}`);

  const wsRaw = optional("WS_PORT");
  const wsPort = wsRaw === undefined ? undefined : num("WS_PORT", 0, isPort, "must be a port between 1 and 65535");

  const config: AppConfig = {
    wledHost: str("WLED_HOST", "wled.local"),
    ledCount: num("LED_COUNT", 60, (n) => isInt(n) && n > 0, "must be a positive integer"),
    outputMode: mode === "http" ? "http" : "udp",
    httpTimeoutSec: num("HTTP_TIMEOUT", 1, (n) => n > 0, "must be > 0"),
    httpMaxRetries: num("HTTP_MAX_RETRIES", 3, (n) => isInt(n) && n >= 1, "must be an integer >= 1"),
    udpPort: num("UDP_PORT", 21324, isPort, "must be a port between 1 and 65535"),
    mqttBroker: str("MQTT_BROKER", "localhost"),
    mqttPort: num("MQTT_PORT", 1883, isPort, "must be a port between 1 and 65535"),
    mqttLocation: str("MQTT_LOCATION", "balkon"),
    mqttBaseTopic: str("MQTT_BASE_TOPIC", "espresense/devices"),
    mqttUsername: optional("MQTT_USERNAME"),
    mqttPassword: optional("MQTT_PASSWORD"),
    beaconTimeoutSec: num("BEACON_TIMEOUT_SECONDS", 6, (n) => n >= 0, "must be >= 0"),
    beaconFadeOutSec: num("BEACON_FADE_OUT_SECONDS", 4, (n) => n >= 0, "must be >= 0"),
    updateIntervalSec: num("UPDATE_INTERVAL", 0.2, (n) => n > 0, "must be > 0"),
    trailLength: num("TRAIL_LENGTH", 10, (n) => isInt(n) && n >= 1, "must be an integer >= 1"),
    fadeFactor: num("FADE_FACTOR", 0.75, (n) => n > 0 && n <= 1, "must be between 0 and 1"),
    logLevel: logLevel ?? "info",
    wsPort,
  };

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}

/** Config as printable key/value pairs, password masked. */
export function describeConfig(config: AppConfig): Record<string, string | number | undefined> {
  return {
    wled_host: config.wledHost,
    led_count: config.ledCount,
    output_mode: config.outputMode,
    http_timeout: config.httpTimeoutSec,
    http_max_retries: config.httpMaxRetries,
    udp_port: config.udpPort,
    mqtt_broker: config.mqttBroker,
    mqtt_port: config.mqttPort,
    mqtt_location: config.mqttLocation,
    mqtt_base_topic: config.mqttBaseTopic,
    mqtt_username: config.mqttUsername,
    mqtt_password: config.mqttPassword ? "********" : undefined,
    beacon_timeout_seconds: config.beaconTimeoutSec,
    beacon_fade_out_seconds: config.beaconFadeOutSec,
    update_interval: config.updateIntervalSec,
    trail_length: config.trailLength,
    fade_factor: config.fadeFactor,
    log_level: config.logLevel,
    ws_port: config.wsPort,
  };
}

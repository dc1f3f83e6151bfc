#!/usr/bin/env node
import { getArg, hasFlag } from "./args.js";
import { runBridge } from "./bridge.js";
import { ConfigError, describeConfig, loadConfig, loadEnvFile } from "./config.js";
import { setLogLevel } from "./log.js";
import { parseSimulatorArgs, runSimulator } from "./simulate.js";
import { errorMessage } from "./util.js";

const args = process.argv.slice(2);
const cmd = args[0] ?? "help";

function usage(exitCode = 0): never {
  console.log(`beacon-strip <command> [options]

Commands:
  run [--env <path>]
  simulate [--led-count <n>] [--rows <n>] [--cols <n>] [--beacons <n>]
           [--update-interval <s>] [--trail-length <n>] [--fade-factor <f>] [--duration <s>]
           [--mqtt] [--mqtt-broker <host>] [--mqtt-port <port>] [--mqtt-location <name>]
           [--mqtt-base-topic <topic>] [--mqtt-username <user>] [--mqtt-password <pass>]
  config [--env <path>]

Defaults:
  --env .env
  simulate: 60 LEDs as 10x6, 3 mock beacons, 0.1s interval, trail 8, fade 0.7
`);
  process.exit(exitCode);
}

function stopSignal(): AbortSignal {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  return controller.signal;
}

function loadAppConfig() {
  loadEnvFile(getArg(args, "--env", ".env"));
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return config;
}

async function cmdRun() {
  const config = loadAppConfig();
  await runBridge(config, stopSignal());
}

async function cmdSimulate() {
  const options = parseSimulatorArgs(args.slice(1));
  await runSimulator(options, stopSignal());
  console.log("\nSimulation stopped.");
}

function cmdConfig() {
  const config = loadAppConfig();
  console.log(JSON.stringify(describeConfig(config), null, 2));
}

async function main() {
  if (hasFlag(args, "--help") || cmd === "help") usage(0);
  switch (cmd) {
    case "run":
      return cmdRun();
    case "simulate":
      return cmdSimulate();
    case "config":
      return cmdConfig();
    default:
      return usage(1);
  }
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error(errorMessage(err, "beacon-strip failed"));
  }
  process.exit(1);
});

#!/usr/bin/env node
/**
 * @module main
 * @description Process entry point.
 *
 *   beacon-safe-zone [settings.json]
 *
 * Connects to the broker, loads the watchlist and runs until SIGINT or
 * SIGTERM. SIGHUP re-reads the watchlist file.
 */

import { createLogger } from "./config/logger.js";
import { loadSettings } from "./config/settings.js";
import { BeaconMonitor } from "./monitor.js";
import { LogStatusDisplay } from "./display.js";
import { loggingHooks } from "./forwarder.js";
import { ChirpStackMqttBridge, connectMqttSession } from "./transports/mqtt.js";
import { InMemoryDownlinkTransport } from "./transports/in-memory.js";

async function main(argv: readonly string[]): Promise<void> {
  const settings = await loadSettings(argv[2], process.env, createLogger());
  const logger = createLogger({ level: settings.logging.level });

  const session = connectMqttSession({
    url: settings.mqtt.url,
    clientId: settings.mqtt.clientId,
    username: settings.mqtt.username,
    password: settings.mqtt.password,
    logger,
  });
  const bridge = new ChirpStackMqttBridge(session, {
    uplinkTopic: settings.mqtt.uplinkTopic,
    applicationId: settings.mqtt.applicationId,
    logger,
  });

  if (settings.alarm.dryRun) {
    logger.warn("dry run: downlinks are logged, not published");
  }
  const monitor = new BeaconMonitor({
    settings,
    transport: settings.alarm.dryRun
      ? new InMemoryDownlinkTransport(logger, { historyLimit: 0 })
      : bridge,
    display: new LogStatusDisplay(logger),
    hooks: loggingHooks(logger),
    logger,
  });

  bridge.onUplink((report) => {
    monitor.handleReport(report);
  });

  await monitor.start();
  await bridge.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");
    monitor.stop();
    await monitor.whenIdle();
    await bridge.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }
  process.on("SIGHUP", () => {
    logger.info("SIGHUP: reloading watchlist");
    monitor.reloadWatchlist().catch((err: unknown) => {
      logger.error({ err }, "watchlist reload failed");
    });
  });
}

main(process.argv).catch((err: unknown) => {
  createLogger().fatal({ err }, "startup failed");
  process.exitCode = 1;
});

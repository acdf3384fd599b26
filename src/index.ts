/**
 * Teleinfo Signals - Application Entry Point
 *
 * Reads decoded meter frames from stdin, one JSON object per line, and:
 * - Relays every line to a UDP observer
 * - Derives load-shedding, hot-water, tariff and day-color signals
 * - Publishes them to the MQTT broker
 * - Fills an unknown next-day color from the tempo calendar service
 */
import {
  config,
  fieldCodes,
  getPipelineConfig,
  getRelayConfig,
  getTempoConfig,
  mqttTopics,
} from "./config.js";
import { openLineReader } from "./input/index.js";
import { createLogger } from "./logger.js";
import {
  disconnectMqttClient,
  initializeMqttClient,
  publishBatch,
} from "./mqtt/index.js";
import { createPipeline, runPipeline } from "./pipeline/index.js";
import { createUdpRelay } from "./relay/index.js";
import { createTempoScheduler, fetchTempoCalendar } from "./tempo/index.js";

const log = createLogger("pipeline");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  TELEINFO SIGNALS");
console.log("========================================");
console.log("");

const pipelineConfig = getPipelineConfig();

// Log configuration summary (non-sensitive values only)
log.info(
  {
    env: config.NODE_ENV,
    mqttBroker: config.MQTT_BROKER_URL,
    retain: config.MQTT_RETAIN,
    skipCount: pipelineConfig.skipCount,
    vaThreshold: pipelineConfig.threshold,
    timeConstant: pipelineConfig.timeConstant,
    redPeakTariffIndex: pipelineConfig.redPeakTariffIndex,
  },
  "Configuration loaded",
);

const relayConfig = getRelayConfig();
if (relayConfig) {
  log.info(relayConfig, "UDP relay: ENABLED");
} else {
  log.info("UDP relay: DISABLED");
}

const tempoConfig = getTempoConfig();
if (tempoConfig) {
  log.info(
    { calendarUrl: tempoConfig.calendarUrl, window: tempoConfig.window },
    "Calendar fallback: ENABLED",
  );
} else {
  log.info("Calendar fallback: DISABLED");
}

console.log("");

// =============================================================================
// WIRING
// =============================================================================

initializeMqttClient(
  config.MQTT_BROKER_URL,
  {
    ...(config.MQTT_CLIENT_ID ? { clientId: config.MQTT_CLIENT_ID } : {}),
    retain: config.MQTT_RETAIN,
  },
  {
    onConnect: () => log.info("Publishing enabled"),
    onDisconnect: () => log.warn("Publishing paused until the broker is back"),
  },
);

const relay = relayConfig ? createUdpRelay(relayConfig) : null;

const scheduler = tempoConfig
  ? createTempoScheduler({
      fetchEntry: () => fetchTempoCalendar(tempoConfig),
      window: tempoConfig.window,
    })
  : null;

const pipeline = createPipeline({
  options: {
    codes: fieldCodes,
    filter: {
      threshold: pipelineConfig.threshold,
      timeConstant: pipelineConfig.timeConstant,
    },
    extract: { redPeakTariffIndex: pipelineConfig.redPeakTariffIndex },
    skipCount: pipelineConfig.skipCount,
    topics: mqttTopics,
  },
  publish: publishBatch,
  relay,
  scheduler,
});

const reader = openLineReader(process.stdin);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);
  reader.close();
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

// =============================================================================
// MAIN LOOP
// =============================================================================

async function main(): Promise<void> {
  const count = await runPipeline(reader.lines, pipeline);
  log.info({ lines: count }, "Input ended");

  await pipeline.settle();
  await relay?.close();
  disconnectMqttClient();

  log.info("Shutdown complete");
}

main().catch((error: unknown) => {
  log.fatal({ error }, "Pipeline crashed");
  process.exit(1);
});

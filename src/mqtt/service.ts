/**
 * MQTT Module - Service Layer
 *
 * MQTT client management and signal publication.
 * Connects to the broker and publishes each batch of derived signals.
 */
import { type Result, err, ok } from "neverthrow";
import mqtt from "mqtt";
import type { MqttClient } from "mqtt";

import { createLogger } from "../logger.js";
import type { PublishError } from "./errors.js";
import { notConnected, publishFailed } from "./errors.js";
import type { MqttClientOptions, SignalMessage } from "./schema.js";

const log = createLogger("mqtt");

// =============================================================================
// Module State
// =============================================================================

let mqttClient: MqttClient | null = null;
let retain = false;

/**
 * Callback types for MQTT connection events.
 */
export type MqttEventHandlers = {
  onConnect?: () => void;
  onDisconnect?: () => void;
  onError?: (error: Error) => void;
};

let eventHandlers: MqttEventHandlers = {};

// =============================================================================
// MQTT Client Management
// =============================================================================

/**
 * Initialize and connect the MQTT client.
 *
 * QoS 0 messages are not queued while offline: a batch missed during an
 * outage is dropped, not replayed later.
 *
 * @param brokerUrl - Broker connection URL
 * @param options - Client id and retain flag
 * @param handlers - Connection event handlers
 * @returns true if connection initiated successfully
 */
export function initializeMqttClient(
  brokerUrl: string,
  options: MqttClientOptions,
  handlers: MqttEventHandlers = {},
): boolean {
  if (mqttClient) {
    log.warn("MQTT client already initialized");
    return true;
  }

  eventHandlers = handlers;
  retain = options.retain;

  log.info({ broker: brokerUrl }, "Connecting to MQTT broker...");

  try {
    mqttClient = mqtt.connect(brokerUrl, {
      reconnectPeriod: 5000, // Reconnect every 5 seconds
      connectTimeout: 10000, // 10 second connection timeout
      queueQoSZero: false,
      ...(options.clientId ? { clientId: options.clientId } : {}),
    });

    setupClientHandlers(mqttClient);

    return true;
  } catch (error) {
    log.error({ error }, "Failed to initialize MQTT client");
    return false;
  }
}

/**
 * Set up MQTT client event handlers.
 */
function setupClientHandlers(client: MqttClient): void {
  client.on("connect", () => {
    log.info("Connected to MQTT broker");
    eventHandlers.onConnect?.();
  });

  client.on("error", (error) => {
    log.error({ error: error.message }, "MQTT client error");
    eventHandlers.onError?.(error);
  });

  client.on("close", () => {
    log.warn("MQTT connection closed");
    eventHandlers.onDisconnect?.();
  });

  client.on("reconnect", () => {
    log.info("Reconnecting to MQTT broker...");
  });

  client.on("offline", () => {
    log.warn("MQTT client offline");
  });
}

// =============================================================================
// Publication
// =============================================================================

/**
 * Publish one batch of signal messages.
 *
 * All messages are handed to the client together and the batch succeeds
 * only when every message was accepted.
 *
 * @param messages - Messages of one sampling instant
 * @returns Result with void on success or error
 */
export async function publishBatch(
  messages: ReadonlyArray<SignalMessage>,
): Promise<Result<void, PublishError>> {
  const client = mqttClient;
  if (!client || !client.connected) {
    return err(notConnected("MQTT client is not connected"));
  }

  const topics = messages.map((message) => message.topic);

  try {
    await Promise.all(
      messages.map((message) =>
        client.publishAsync(message.topic, message.payload, { qos: 0, retain }),
      ),
    );

    log.debug({ topics }, "Signal batch published");
    return ok(undefined);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(publishFailed(cause.message, topics, cause));
  }
}

// =============================================================================
// Client Control
// =============================================================================

/**
 * Check if MQTT client is connected.
 */
export function isConnected(): boolean {
  return mqttClient?.connected ?? false;
}

/**
 * Disconnect and clean up MQTT client.
 */
export function disconnectMqttClient(): void {
  if (mqttClient) {
    log.info("Disconnecting MQTT client...");
    mqttClient.end();
    mqttClient = null;
    eventHandlers = {};
  }
}

/**
 * MQTT Module - Schemas and Types
 *
 * Defines the data shapes published to the broker.
 */

/**
 * Topic of each derived signal.
 */
export type SignalTopics = Readonly<{
  loadShed: string;
  hotWater: string;
  peak: string;
  dayColor: string;
  nextDayColor: string;
  power: string;
}>;

/**
 * One message of a publication batch.
 */
export type SignalMessage = Readonly<{
  topic: string;
  payload: string;
}>;

/**
 * Client options taken from configuration.
 */
export type MqttClientOptions = Readonly<{
  clientId?: string;
  retain: boolean;
}>;

/**
 * Typed configuration - all config lives in the environment, parsed with Zod at startup.
 * The process exits immediately on invalid config.
 *
 * Covers:
 * - Runtime and logging
 * - UDP relay of raw frames
 * - MQTT publication of derived signals
 * - Load-shedding filter and tariff override
 * - Field codes of the decoded frames
 * - Tempo calendar fallback
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val : undefined));

/**
 * Local wall-clock time as HH:MM.
 */
const timeOfDay = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "Expected HH:MM")
  .transform((val) => {
    const [hour, minute] = val.split(":").map(Number);
    return { hour: hour ?? 0, minute: minute ?? 0 };
  });

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("TeleinfoSignals").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // UDP Relay
  // ==========================================================================
  UDP_RELAY_ENABLED: envBoolean(true).describe("Relay raw frames over UDP"),
  UDP_RELAY_HOST: z
    .string()
    .min(1)
    .default("127.0.0.1")
    .describe("Destination host for relayed frames"),
  UDP_RELAY_PORT: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(8094)
    .describe("Destination UDP port for relayed frames"),

  // ==========================================================================
  // MQTT Configuration
  // ==========================================================================
  MQTT_BROKER_URL: z
    .string()
    .min(1, "MQTT_BROKER_URL is required")
    .describe("MQTT broker connection URL"),
  MQTT_CLIENT_ID: optionalString.describe("MQTT client identifier"),
  MQTT_RETAIN: envBoolean(false).describe("Publish signals as retained"),
  MQTT_SKIP: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(8)
    .describe("Valid frames skipped between two publications"),
  MQTT_TOPIC_LOAD_SHED: z
    .string()
    .default("sensors/switch/delest")
    .describe("Topic for the load-shedding flag"),
  MQTT_TOPIC_HOT_WATER: z
    .string()
    .default("sensors/switch/ecs")
    .describe("Topic for the hot water allow flag"),
  MQTT_TOPIC_PEAK: z
    .string()
    .default("sensors/tic/hphc")
    .describe("Topic for the peak/off-peak state"),
  MQTT_TOPIC_DAY_COLOR: z
    .string()
    .default("sensors/tic/tempo/today")
    .describe("Topic for today's tempo color"),
  MQTT_TOPIC_NEXT_DAY_COLOR: z
    .string()
    .default("sensors/tic/tempo/tomorrow")
    .describe("Topic for tomorrow's tempo color"),
  MQTT_TOPIC_POWER: z
    .string()
    .default("sensors/tic/power")
    .describe("Topic for the apparent power reading"),

  // ==========================================================================
  // Load Shedding
  // ==========================================================================
  VA_THRESHOLD: z.coerce
    .number()
    .positive()
    .default(9000)
    .describe("Apparent power threshold (VA) above which load is shed"),
  FILTER_TIME_CONSTANT: z.coerce
    .number()
    .min(1)
    .default(60)
    .describe("Falling-edge averaging time constant, in samples"),
  RED_PEAK_TARIFF_INDEX: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(6)
    .describe("Tariff index that forces load shedding (0 disables)"),

  // ==========================================================================
  // Frame Field Codes
  // ==========================================================================
  FIELD_VALIDITY: z.string().default("_tvalide").describe("Frame validity key"),
  FIELD_POWER: z.string().default("SINSTS").describe("Apparent power label"),
  FIELD_TARIFF: z.string().default("NTARF").describe("Tariff index label"),
  FIELD_RELAYS: z.string().default("RELAIS").describe("Relay bitmask label"),
  FIELD_STATUS: z.string().default("STGE").describe("Status register label"),
  FIELD_MESSAGE: z.string().default("MSG1").describe("Meter message label"),

  // ==========================================================================
  // Tempo Calendar Fallback
  // ==========================================================================
  TEMPO_CLIENT_ID: optionalString.describe("Calendar API client id"),
  TEMPO_CLIENT_SECRET: optionalString.describe("Calendar API client secret"),
  TEMPO_TOKEN_URL: z
    .string()
    .url()
    .default("https://digital.iservices.rte-france.com/token/oauth/")
    .describe("OAuth client-credentials token endpoint"),
  TEMPO_CALENDAR_URL: z
    .string()
    .url()
    .default(
      "https://digital.iservices.rte-france.com/open_api/tempo_like_supply_contract/v1/tempo_like_calendars",
    )
    .describe("Tempo calendar endpoint"),
  TEMPO_FETCH_START: timeOfDay
    .default("10:40")
    .describe("Local time at which calendar fetches may start"),
  TEMPO_FETCH_WINDOW_MINUTES: z.coerce
    .number()
    .int()
    .positive()
    .default(10)
    .describe("Minutes during which failed fetches are retried"),
  TEMPO_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("HTTP timeout for calendar requests (ms)"),
});

// Parse at startup - exits immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Load-shedding and publication settings for the pipeline.
 */
export function getPipelineConfig(): Readonly<{
  skipCount: number;
  threshold: number;
  timeConstant: number;
  redPeakTariffIndex: number | null;
}> {
  return {
    skipCount: config.MQTT_SKIP,
    threshold: config.VA_THRESHOLD,
    timeConstant: config.FILTER_TIME_CONSTANT,
    redPeakTariffIndex:
      config.RED_PEAK_TARIFF_INDEX === 0 ? null : config.RED_PEAK_TARIFF_INDEX,
  };
}

/**
 * UDP relay destination.
 * Returns null if the relay is disabled.
 */
export function getRelayConfig(): Readonly<{
  host: string;
  port: number;
}> | null {
  if (!config.UDP_RELAY_ENABLED) {
    return null;
  }

  return {
    host: config.UDP_RELAY_HOST,
    port: config.UDP_RELAY_PORT,
  };
}

/**
 * Tempo calendar fallback configuration.
 * Returns null if credentials are not configured.
 */
export function getTempoConfig(): Readonly<{
  clientId: string;
  clientSecret: string;
  tokenUrl: string;
  calendarUrl: string;
  timeoutMs: number;
  window: Readonly<{ hour: number; minute: number; durationMinutes: number }>;
}> | null {
  if (!config.TEMPO_CLIENT_ID || !config.TEMPO_CLIENT_SECRET) {
    return null;
  }

  return {
    clientId: config.TEMPO_CLIENT_ID,
    clientSecret: config.TEMPO_CLIENT_SECRET,
    tokenUrl: config.TEMPO_TOKEN_URL,
    calendarUrl: config.TEMPO_CALENDAR_URL,
    timeoutMs: config.TEMPO_TIMEOUT_MS,
    window: {
      hour: config.TEMPO_FETCH_START.hour,
      minute: config.TEMPO_FETCH_START.minute,
      durationMinutes: config.TEMPO_FETCH_WINDOW_MINUTES,
    },
  };
}

/**
 * MQTT topics configuration.
 */
export const mqttTopics = {
  loadShed: config.MQTT_TOPIC_LOAD_SHED,
  hotWater: config.MQTT_TOPIC_HOT_WATER,
  peak: config.MQTT_TOPIC_PEAK,
  dayColor: config.MQTT_TOPIC_DAY_COLOR,
  nextDayColor: config.MQTT_TOPIC_NEXT_DAY_COLOR,
  power: config.MQTT_TOPIC_POWER,
} as const;

/**
 * Field codes of the decoded frames.
 */
export const fieldCodes = {
  validity: config.FIELD_VALIDITY,
  power: config.FIELD_POWER,
  tariff: config.FIELD_TARIFF,
  relays: config.FIELD_RELAYS,
  status: config.FIELD_STATUS,
  message: config.FIELD_MESSAGE,
} as const;

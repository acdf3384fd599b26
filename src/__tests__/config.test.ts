/**
 * Configuration Tests
 *
 * Each test sets its own environment and loads the module fresh.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

async function loadConfig() {
  vi.resetModules();
  return import("../config.js");
}

describe("config", () => {
  beforeEach(() => {
    vi.stubEnv("MQTT_BROKER_URL", "mqtt://localhost:1883");
    vi.stubEnv("TEMPO_CLIENT_ID", "");
    vi.stubEnv("TEMPO_CLIENT_SECRET", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  test("applies defaults", async () => {
    const { getPipelineConfig, getRelayConfig, mqttTopics } = await loadConfig();

    expect(getRelayConfig()).toEqual({ host: "127.0.0.1", port: 8094 });
    expect(mqttTopics.loadShed).toBe("sensors/switch/delest");
    expect(getPipelineConfig().timeConstant).toBe(60);
    expect(getPipelineConfig().redPeakTariffIndex).toBe(6);
  });

  test("a red peak tariff index of 0 disables the override", async () => {
    vi.stubEnv("RED_PEAK_TARIFF_INDEX", "0");
    const { getPipelineConfig } = await loadConfig();

    expect(getPipelineConfig().redPeakTariffIndex).toBeNull();
  });

  test("reads booleans from their string form", async () => {
    vi.stubEnv("UDP_RELAY_ENABLED", "false");
    vi.stubEnv("MQTT_RETAIN", "TRUE");
    const { config, getRelayConfig } = await loadConfig();

    expect(getRelayConfig()).toBeNull();
    expect(config.MQTT_RETAIN).toBe(true);
  });

  test("disables the calendar fallback without credentials", async () => {
    const { getTempoConfig } = await loadConfig();

    expect(getTempoConfig()).toBeNull();
  });

  test("parses the calendar fetch window", async () => {
    vi.stubEnv("TEMPO_CLIENT_ID", "test-id");
    vi.stubEnv("TEMPO_CLIENT_SECRET", "test-secret");
    vi.stubEnv("TEMPO_FETCH_START", "09:05");
    vi.stubEnv("TEMPO_FETCH_WINDOW_MINUTES", "15");
    const { getTempoConfig } = await loadConfig();

    expect(getTempoConfig()?.window).toEqual({
      hour: 9,
      minute: 5,
      durationMinutes: 15,
    });
    expect(getTempoConfig()?.clientSecret).toBe("test-secret");
  });

  test("exits on invalid configuration", async () => {
    vi.stubEnv("UDP_RELAY_PORT", "not-a-port");
    const exit = vi.spyOn(process, "exit").mockImplementation((): never => {
      throw new Error("process.exit");
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    await expect(loadConfig()).rejects.toThrow("process.exit");
    expect(exit).toHaveBeenCalledWith(1);
  });
});

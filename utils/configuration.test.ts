import { describe, expect, it } from "vitest";
import { DEFAULT_PLANNER_MODEL, ensureConfiguration, loadEnvironment } from "./configuration";
import { ConfigurationError } from "./errors";

describe("ensureConfiguration", () => {
  it("fills in defaults", () => {
    expect(ensureConfiguration()).toEqual({
      plannerModel: DEFAULT_PLANNER_MODEL,
      maxToolCalls: 5,
      maxConcurrentFetches: 5,
      fetchTimeoutMs: 15_000,
      requestTimeoutMs: 10_000,
      forecastSampleCount: 40,
      forecastHorizonDays: 5,
    });
  });

  it("keeps configured values", () => {
    const config = ensureConfiguration({
      configurable: { plannerModel: "openai/gpt-4o", maxToolCalls: 2, fetchTimeoutMs: 500 },
    });

    expect(config.plannerModel).toBe("openai/gpt-4o");
    expect(config.maxToolCalls).toBe(2);
    expect(config.fetchTimeoutMs).toBe(500);
    expect(config.maxConcurrentFetches).toBe(5);
  });
});

describe("loadEnvironment", () => {
  it("requires the weather API key", () => {
    expect(() => loadEnvironment({})).toThrow(ConfigurationError);
    expect(() => loadEnvironment({})).toThrow(
      "CRITICAL: OPENWEATHERMAP_API_KEY environment variable not set."
    );
  });

  it("applies defaults and coerces the port", () => {
    expect(loadEnvironment({ OPENWEATHERMAP_API_KEY: "test-secret", PORT: "8080" })).toEqual({
      OPENWEATHERMAP_API_KEY: "test-secret",
      GCP_LOCATION: "us-central1",
      PLANNER_MODEL: DEFAULT_PLANNER_MODEL,
      PORT: 8080,
    });
  });

  it("reads the Vertex AI project when given", () => {
    const env = loadEnvironment({
      OPENWEATHERMAP_API_KEY: "test-secret",
      GCP_PROJECT_ID: "test-project",
      GCP_LOCATION: "europe-west4",
    });

    expect(env.GCP_PROJECT_ID).toBe("test-project");
    expect(env.GCP_LOCATION).toBe("europe-west4");
    expect(env.PORT).toBe(3000);
  });
});

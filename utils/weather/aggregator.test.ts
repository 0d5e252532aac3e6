import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NO_CITIES_MESSAGE, WeatherAggregator, type ForecastSource } from "./aggregator";
import type { CityRequest, ForecastOutcome } from "./fetcher";

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function report(city: string): ForecastOutcome {
  return { ok: true, report: `Weather forecast for ${city}:` };
}

/** Source that records how many fetches run at once. */
function trackingSource(ms = 10) {
  let inFlight = 0;
  let peak = 0;
  const fetched: string[] = [];
  const source: ForecastSource = {
    async fetch(request: CityRequest) {
      inFlight++;
      peak = Math.max(peak, inFlight);
      fetched.push(request.city);
      await delay(ms);
      inFlight--;
      return report(request.city);
    },
  };
  return { source, fetched, peak: () => peak };
}

function cities(count: number): CityRequest[] {
  return Array.from({ length: count }, (_, i) => ({
    city: `City ${i + 1}`,
    start_date: "2025-06-01",
    end_date: "2025-06-02",
  }));
}

describe("WeatherAggregator", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns a fixed message and fetches nothing for an empty list", async () => {
    const tracking = trackingSource();
    const aggregator = new WeatherAggregator(tracking.source);

    await expect(aggregator.aggregate([])).resolves.toBe(NO_CITIES_MESSAGE);
    expect(tracking.fetched).toEqual([]);
  });

  it("never runs more than five fetches at once", async () => {
    const tracking = trackingSource();
    const aggregator = new WeatherAggregator(tracking.source);

    const output = await aggregator.aggregate(cities(8));

    expect(tracking.fetched).toHaveLength(8);
    expect(tracking.peak()).toBeLessThanOrEqual(5);
    expect(output.split("\n")).toHaveLength(8);
  });

  it("honours a smaller pool size", async () => {
    const tracking = trackingSource();
    const aggregator = new WeatherAggregator(tracking.source, { maxConcurrent: 2 });

    await aggregator.aggregate(cities(6));

    expect(tracking.fetched).toHaveLength(6);
    expect(tracking.peak()).toBeLessThanOrEqual(2);
  });

  it("joins reports in completion order", async () => {
    const source: ForecastSource = {
      async fetch(request) {
        await delay(request.city === "Slow" ? 40 : 0);
        return report(request.city);
      },
    };
    const aggregator = new WeatherAggregator(source);

    const output = await aggregator.aggregate([{ city: "Slow" }, { city: "Fast" }]);

    expect(output).toBe("Weather forecast for Fast:\nWeather forecast for Slow:");
  });

  it("includes failed outcomes as their error message", async () => {
    const source: ForecastSource = {
      async fetch(request) {
        if (request.city === "Atlantis") {
          return {
            ok: false,
            error: { kind: "not_found", message: "Weather for Atlantis: not found" },
          };
        }
        await delay(20);
        return report(request.city);
      },
    };
    const aggregator = new WeatherAggregator(source);

    const output = await aggregator.aggregate([{ city: "Paris" }, { city: "Atlantis" }]);

    expect(output).toBe("Weather for Atlantis: not found\nWeather forecast for Paris:");
  });

  it("turns a thrown error into a per-city line", async () => {
    const source: ForecastSource = {
      async fetch(request) {
        if (request.city === "Brokenville") {
          throw new Error("socket hang up");
        }
        await delay(20);
        return report(request.city);
      },
    };
    const aggregator = new WeatherAggregator(source);

    const output = await aggregator.aggregate([{ city: "Brokenville" }, { city: "Paris" }]);

    expect(output).toBe(
      "Error fetching weather for Brokenville: socket hang up\nWeather forecast for Paris:"
    );
  });

  it("gives up on a slow city and aborts its request", async () => {
    let aborted = false;
    const source: ForecastSource = {
      fetch(request, signal) {
        if (request.city !== "Slowtown") {
          return Promise.resolve(report(request.city));
        }
        return new Promise((resolve) => {
          signal?.addEventListener("abort", () => {
            aborted = true;
            resolve(report(request.city));
          });
        });
      },
    };
    const aggregator = new WeatherAggregator(source, { fetchTimeoutMs: 20 });

    const output = await aggregator.aggregate([{ city: "Slowtown" }, { city: "Paris" }]);
    const lines = output.split("\n");

    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe("Weather forecast for Paris:");
    expect(lines[1].startsWith("Error fetching weather for Slowtown: ")).toBe(true);
    expect(lines[1]).toMatch(/timed out/i);
    expect(aborted).toBe(true);
  });

  it("classifies an expired job as a timeout", async () => {
    const source: ForecastSource = {
      fetch(request, signal) {
        return new Promise((resolve) => {
          signal?.addEventListener("abort", () => resolve(report(request.city)));
        });
      },
    };
    const aggregator = new WeatherAggregator(source, { fetchTimeoutMs: 20 });

    const [outcome] = await aggregator.collect([{ city: "Slowtown" }]);

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.kind).toBe("timeout");
  });

  it("does not mistake an error mentioning a timeout for an expired job", async () => {
    const source: ForecastSource = {
      async fetch() {
        throw new Error("upstream request timed out");
      },
    };
    const aggregator = new WeatherAggregator(source);

    const outcomes = await aggregator.collect([{ city: "Paris" }]);

    expect(outcomes).toEqual([
      {
        ok: false,
        error: {
          kind: "transport",
          message: "Error fetching weather for Paris: upstream request timed out",
        },
      },
    ]);
  });
});

import Bottleneck from "bottleneck";
import { getErrorMessage } from "../errors";
import { outcomeText, type CityRequest, type ForecastOutcome } from "./fetcher";

export const NO_CITIES_MESSAGE = "No cities provided for weather forecast.";

/** Anything that can produce a forecast outcome for one city. */
export interface ForecastSource {
  fetch(request: CityRequest, signal?: AbortSignal): Promise<ForecastOutcome>;
}

export interface WeatherAggregatorOptions {
  maxConcurrent?: number;
  fetchTimeoutMs?: number;
}

/**
 * Fans forecast requests for several cities out over a small pool and merges
 * the reports. A failing or slow city turns into a one-line error in the
 * output; it never fails the batch.
 */
export class WeatherAggregator {
  private readonly maxConcurrent: number;
  private readonly fetchTimeoutMs: number;

  constructor(
    private readonly source: ForecastSource,
    options: WeatherAggregatorOptions = {}
  ) {
    this.maxConcurrent = options.maxConcurrent ?? 5;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 15_000;
  }

  /**
   * Output order follows completion order, not input order.
   */
  async aggregate(cityDateRanges: readonly CityRequest[]): Promise<string> {
    if (cityDateRanges.length === 0) {
      return NO_CITIES_MESSAGE;
    }

    const outcomes = await this.collect(cityDateRanges);
    return outcomes.map(outcomeText).join("\n");
  }

  /** Fetches every entry and returns the outcomes in completion order. */
  async collect(cityDateRanges: readonly CityRequest[]): Promise<ForecastOutcome[]> {
    if (cityDateRanges.length === 0) {
      return [];
    }

    const limiter = new Bottleneck({
      maxConcurrent: Math.min(cityDateRanges.length, this.maxConcurrent),
    });

    const outcomes: ForecastOutcome[] = [];
    await Promise.all(
      cityDateRanges.map(async (entry) => {
        outcomes.push(await this.fetchWithDeadline(limiter, entry));
      })
    );
    return outcomes;
  }

  private async fetchWithDeadline(
    limiter: Bottleneck,
    entry: CityRequest
  ): Promise<ForecastOutcome> {
    const controller = new AbortController();
    try {
      return await limiter.schedule({ expiration: this.fetchTimeoutMs }, () =>
        this.source.fetch(entry, controller.signal)
      );
    } catch (error) {
      // Expired or crashed: stop the HTTP call if it is still running
      controller.abort();
      const message = `Error fetching weather for ${entry.city}: ${getErrorMessage(error)}`;
      console.error(`[WEATHER] ${message}`);
      // Without a stop() or a queue limit, job expiry is the only BottleneckError
      const kind = error instanceof Bottleneck.BottleneckError ? "timeout" : "transport";
      return { ok: false, error: { kind, message } };
    }
  }
}

import axios, { type AxiosInstance } from "axios";
import forecastResponseSchema, { type ForecastEntry } from "../../schemas/forecastSchema";
import { addDays, formatIsoDate, parseIsoDate, toLocalIsoDate } from "../dates";
import { getErrorMessage } from "../errors";
import { WeatherCache } from "./cache";
import { OPENWEATHER_API } from "./client";

export interface CityRequest {
  city: string;
  start_date?: string;
  end_date?: string;
}

export type ForecastErrorKind =
  | "transport"
  | "malformed"
  | "not_found"
  | "no_data"
  | "timeout";

export type ForecastOutcome =
  | { ok: true; report: string }
  | { ok: false; error: { kind: ForecastErrorKind; message: string } };

export interface DailySummary {
  date: string;
  avgTemp: number;
  minTemp: number;
  maxTemp: number;
  condition: string;
  avgHumidity: number;
  avgWindSpeed: number;
}

export interface ForecastSample {
  /** Unix seconds shifted into the city's local time. */
  localTime: number;
  temperature: number;
  condition: string;
  humidity: number;
  windSpeed: number;
}

export interface WeatherFetcherOptions {
  sampleCount?: number;
  requestTimeoutMs?: number;
  now?: () => Date;
}

function failure(kind: ForecastErrorKind, message: string): ForecastOutcome {
  return { ok: false, error: { kind, message } };
}

function notFoundMessage(city: string, code: string): string {
  return `Weather for ${city}: No forecast data available or city not found (code: ${code || "unknown"})`;
}

export function outcomeText(outcome: ForecastOutcome): string {
  return outcome.ok ? outcome.report : outcome.error.message;
}

function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Most frequent value; on a tie the one seen first wins. */
function mostFrequent(values: string[]): string {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  let best = "";
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

function toSample(entry: ForecastEntry, utcOffsetSeconds: number): ForecastSample {
  return {
    localTime: entry.dt + utcOffsetSeconds,
    temperature: entry.main.temp,
    condition: entry.weather[0].description,
    humidity: entry.main.humidity ?? 0,
    windSpeed: entry.wind?.speed ?? 0,
  };
}

/**
 * Groups samples by calendar day and reduces each day to a summary,
 * earliest day first.
 */
export function summarizeByDay(samples: ForecastSample[]): DailySummary[] {
  const byDay = new Map<string, ForecastSample[]>();
  for (const sample of samples) {
    const day = formatIsoDate(new Date(sample.localTime * 1000));
    const bucket = byDay.get(day);
    if (bucket) {
      bucket.push(sample);
    } else {
      byDay.set(day, [sample]);
    }
  }

  return [...byDay.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, daySamples]) => {
      const temps = daySamples.map((s) => s.temperature);
      return {
        date,
        avgTemp: average(temps),
        minTemp: Math.min(...temps),
        maxTemp: Math.max(...temps),
        condition: mostFrequent(daySamples.map((s) => s.condition)),
        avgHumidity: average(daySamples.map((s) => s.humidity)),
        avgWindSpeed: average(daySamples.map((s) => s.windSpeed)),
      };
    });
}

/**
 * Fixed-point text of `value` with exact ties rounded to the even digit
 * (20.25 -> "20.2", 62.5 -> "62"). `toFixed` alone rounds them up.
 */
export function formatDecimal(value: number, digits: number): string {
  // toFixed(100) spells out the stored binary value exactly
  const exact = value.toFixed(100);
  const point = exact.indexOf(".");
  if (point === -1) {
    return value.toFixed(digits);
  }
  const kept = exact.slice(0, digits > 0 ? point + 1 + digits : point);
  const rest = exact.slice(point + 1 + digits);
  if (!/^50*$/.test(rest)) {
    return value.toFixed(digits);
  }
  if (Number(kept[kept.length - 1]) % 2 === 0) {
    return Number(kept).toFixed(digits);
  }
  const step = 10 ** -digits;
  return (Number(kept) + (value < 0 ? -step : step)).toFixed(digits);
}

export function renderReport(city: string, days: DailySummary[]): string {
  const lines = days.map(
    (day) =>
      `- ${day.date}: ${formatDecimal(day.avgTemp, 1)}°C ` +
      `(min: ${formatDecimal(day.minTemp, 1)}°C, max: ${formatDecimal(day.maxTemp, 1)}°C), ` +
      `${day.condition}, humidity: ${formatDecimal(day.avgHumidity, 0)}%, ` +
      `wind: ${formatDecimal(day.avgWindSpeed, 1)} m/s`
  );
  return [`Weather forecast for ${city}:`, ...lines].join("\n");
}

/**
 * Fetches a city's 5-day / 3-hour forecast and turns it into a per-day report.
 *
 * Per-city problems never throw: they come back as a failed `ForecastOutcome`
 * so sibling cities keep going.
 */
export class WeatherFetcher {
  private readonly sampleCount: number;
  private readonly requestTimeoutMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly client: AxiosInstance,
    private readonly cache: WeatherCache,
    options: WeatherFetcherOptions = {}
  ) {
    this.sampleCount = options.sampleCount ?? 40;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(request: CityRequest, signal?: AbortSignal): Promise<ForecastOutcome> {
    const { city, start_date: startDate, end_date: endDate } = request;

    const cacheKey = WeatherCache.keyFor(city, toLocalIsoDate(this.now()));
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      console.log(`[WEATHER] Returning cached weather for ${city}`);
      return { ok: true, report: cached };
    }

    console.log(`[WEATHER] Fetching weather for ${city} from ${startDate} to ${endDate}`);

    let body: unknown;
    try {
      const response = await this.client.get<unknown>(OPENWEATHER_API.ENDPOINTS.FORECAST, {
        params: { q: city, cnt: this.sampleCount },
        timeout: this.requestTimeoutMs,
        signal,
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        // 404 and friends still carry the provider's { cod, message } body
        const rejected = forecastResponseSchema.safeParse(error.response?.data);
        if (rejected.success) {
          return failure("not_found", notFoundMessage(city, rejected.data.cod));
        }
      }
      return failure(
        "transport",
        `Weather for ${city}: API request failed - ${getErrorMessage(error)}`
      );
    }

    const parsed = forecastResponseSchema.safeParse(body);
    if (!parsed.success) {
      return failure("malformed", `Weather for ${city}: Invalid response format`);
    }

    const data = parsed.data;
    if (!data.list?.length || data.cod !== "200") {
      return failure("not_found", notFoundMessage(city, data.cod));
    }

    const offset = data.city?.timezone ?? 0;
    let samples = data.list.map((entry) => toSample(entry, offset));

    const start = startDate ? parseIsoDate(startDate) : undefined;
    const end = endDate ? parseIsoDate(endDate) : undefined;
    if (start && end) {
      // end + 1 day keeps every sample of the last day
      const from = start.getTime() / 1000;
      const until = addDays(end, 1).getTime() / 1000;
      samples = samples.filter((s) => s.localTime >= from && s.localTime < until);
    } else {
      console.warn(
        `[WEATHER] Missing or invalid date range for ${city}: ${startDate} to ${endDate}; using all samples`
      );
    }

    if (samples.length === 0) {
      return failure(
        "no_data",
        `Weather for ${city}: No forecast data available for the requested date range`
      );
    }

    const report = renderReport(city, summarizeByDay(samples));
    this.cache.put(cacheKey, report);
    return { ok: true, report };
  }
}

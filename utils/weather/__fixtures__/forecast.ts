import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";

export interface ProviderReply {
  status: number;
  data: unknown;
}

/**
 * In-process stand-in for the OpenWeatherMap API: answers every request with
 * `handler` and records the request configs it saw.
 */
export function fakeProvider(
  handler: (config: InternalAxiosRequestConfig) => ProviderReply | Promise<ProviderReply>
) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = await handler(config);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }
    return response;
  };
  return { adapter, calls };
}

/** Adapter that fails every request before any response arrives. */
export function unreachableProvider(message = "connect ECONNREFUSED 127.0.0.1:80") {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    throw new AxiosError(message, "ECONNREFUSED", config);
  };
  return { adapter, calls };
}

export function sample(
  isoDateTime: string,
  temp: number,
  description = "clear sky",
  humidity = 50,
  windSpeed = 3
) {
  return {
    dt: Date.parse(isoDateTime) / 1000,
    main: { temp, humidity },
    weather: [{ description }],
    wind: { speed: windSpeed },
  };
}

export function forecastPayload(
  list: ReturnType<typeof sample>[],
  extra: { timezone?: number } = {}
) {
  return {
    cod: "200",
    cnt: list.length,
    list,
    city: { name: "Test City", timezone: extra.timezone },
  };
}

/** Three days in Paris, deliberately out of order. */
export const PARIS_SAMPLES = [
  sample("2025-06-03T12:00:00Z", 25, "clear sky", 40, 2),
  sample("2025-06-01T09:00:00Z", 18, "clear sky", 60, 3),
  sample("2025-06-02T09:00:00Z", 15, "light rain", 80, 6),
  sample("2025-06-01T15:00:00Z", 22, "clear sky", 50, 5),
  sample("2025-06-02T12:00:00Z", 17, "light rain", 90, 7),
  sample("2025-06-02T15:00:00Z", 19, "few clouds", 70, 5),
];

export const PARIS_REPORT = [
  "Weather forecast for Paris:",
  "- 2025-06-01: 20.0°C (min: 18.0°C, max: 22.0°C), clear sky, humidity: 55%, wind: 4.0 m/s",
  "- 2025-06-02: 17.0°C (min: 15.0°C, max: 19.0°C), light rain, humidity: 80%, wind: 6.0 m/s",
  "- 2025-06-03: 25.0°C (min: 25.0°C, max: 25.0°C), clear sky, humidity: 40%, wind: 2.0 m/s",
].join("\n");

import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { ConfigurationError, getErrorMessage } from "../errors";

export const OPENWEATHER_API = {
  BASE_URL: "http://api.openweathermap.org/data/2.5",
  ENDPOINTS: {
    FORECAST: "forecast",
  },
  VALIDATION_CITY: "London",
  VALIDATION_TIMEOUT_MS: 5_000,
} as const;

/**
 * Axios instance preconfigured with the API key and metric units.
 * `adapter` lets tests answer requests in process.
 */
export function createWeatherClient(
  apiKey: string,
  options: { adapter?: AxiosAdapter } = {}
): AxiosInstance {
  return axios.create({
    baseURL: OPENWEATHER_API.BASE_URL,
    params: {
      appid: apiKey,
      units: "metric",
    },
    adapter: options.adapter,
  });
}

/**
 * Makes a one-sample forecast request to check the key.
 *
 * A 401 means the key is wrong and is fatal. Anything else (offline, DNS,
 * provider hiccup) is logged and ignored so the planner can still start.
 */
export async function validateApiKey(client: AxiosInstance): Promise<void> {
  console.log("[WEATHER] Validating OpenWeatherMap API key...");
  try {
    await client.get(OPENWEATHER_API.ENDPOINTS.FORECAST, {
      params: { q: OPENWEATHER_API.VALIDATION_CITY, cnt: 1 },
      timeout: OPENWEATHER_API.VALIDATION_TIMEOUT_MS,
    });
    console.log("[WEATHER] OpenWeatherMap API key validation successful.");
  } catch (error) {
    if (axios.isAxiosError(error) && error.response?.status === 401) {
      throw new ConfigurationError(
        "OpenWeatherMap API key is invalid or expired.",
        { cause: error }
      );
    }
    console.warn(
      `[WEATHER] Could not validate API key (continuing anyway): ${getErrorMessage(error)}`
    );
  }
}

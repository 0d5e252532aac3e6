import { z } from "zod";

export const cityDateRangeSchema = z.object({
  city: z.string().min(1).describe("The city name."),
  start_date: z.string().describe("Start date in YYYY-MM-DD format."),
  end_date: z.string().describe("End date in YYYY-MM-DD format."),
});

const weatherToolArgsSchema = z.object({
  city_date_ranges: z
    .array(cityDateRangeSchema)
    .describe("A list of cities and the date ranges to get weather for."),
});

/**
 * What the handler accepts. Dates may be missing on some entries; the fetcher
 * then uses every sample for that city instead of rejecting the whole batch.
 */
export const receivedWeatherToolArgsSchema = z.object({
  city_date_ranges: z.array(
    cityDateRangeSchema.extend({
      start_date: z.string().optional(),
      end_date: z.string().optional(),
    })
  ),
});

export type WeatherToolArgs = z.infer<typeof receivedWeatherToolArgsSchema>;

export default weatherToolArgsSchema;

import { z } from "zod";

/**
 * One 3-hour step of the OpenWeatherMap `/forecast` response.
 */
const forecastEntrySchema = z.object({
  dt: z.number(),
  main: z.object({
    temp: z.number(),
    humidity: z.number().optional(),
  }),
  weather: z
    .array(z.object({ description: z.string() }))
    .min(1),
  wind: z.object({ speed: z.number().optional() }).optional(),
});

const forecastResponseSchema = z.object({
  // The provider sends "200" on success but a number on most errors
  cod: z.union([z.string(), z.number()]).transform(String),
  message: z.union([z.string(), z.number()]).optional(),
  list: z.array(forecastEntrySchema).optional(),
  city: z
    .object({
      name: z.string().optional(),
      timezone: z.number().optional(),
    })
    .optional(),
});

export type ForecastEntry = z.infer<typeof forecastEntrySchema>;
export type ForecastResponse = z.infer<typeof forecastResponseSchema>;

export default forecastResponseSchema;

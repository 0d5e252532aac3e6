import { z } from "zod";

export const PREFERENCE_CHOICES = ["1", "2", "3"] as const;

export type PreferenceChoice = (typeof PREFERENCE_CHOICES)[number];

/**
 * Body of a plan request coming from the web form or a JSON client.
 */
const tripRequestSchema = z.object({
  region: z.string().trim().min(1, "Destination is required"),
  startDate: z.string().trim().min(1, "Start date is required"),
  endDate: z.string().trim().min(1, "End date is required"),
  preference: z.enum(PREFERENCE_CHOICES, {
    errorMap: () => ({ message: "Travel style must be 1, 2 or 3" }),
  }),
});

export type TripRequest = z.infer<typeof tripRequestSchema>;

export default tripRequestSchema;

import express, { type Request, type Response } from "express";
import cors from "cors";
import tripRequestSchema, { type TripRequest } from "./schemas/tripRequest";
import { addDays, formatIsoDate } from "./utils/dates";
import { getErrorMessage, TripPlannerError } from "./utils/errors";
import {
  createErrorResponse,
  createSuccessResponse,
  type ErrorResponse,
  type SuccessResponse,
} from "./utils/responses";
import { renderPlanPage, type PlanPageValues } from "./utils/templates";
import { startOfToday } from "./utils/validation";

/** What the web layer needs from the planner. */
export interface PlanGenerator {
  generatePlan(
    region: string,
    startDate: string,
    endDate: string,
    preferenceChoice: string
  ): Promise<string>;
}

export interface PlanResult {
  status: number;
  body: SuccessResponse<{ itinerary: string }> | ErrorResponse;
}

export function defaultFormValues(now: Date = new Date()): PlanPageValues {
  const today = startOfToday(now);
  return {
    region: "Paris, France",
    startDate: formatIsoDate(addDays(today, 7)),
    endDate: formatIsoDate(addDays(today, 14)),
    preference: "1",
  };
}

/**
 * Validates a plan request body and runs the planner.
 * Never throws: every outcome maps to a status and an envelope.
 */
export async function handlePlanRequest(
  planner: PlanGenerator,
  body: unknown
): Promise<PlanResult> {
  const parsed = tripRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      status: 400,
      body: createErrorResponse(
        "Invalid trip request",
        parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        }))
      ),
    };
  }

  const { region, startDate, endDate, preference }: TripRequest = parsed.data;
  try {
    const itinerary = await planner.generatePlan(region, startDate, endDate, preference);
    return { status: 200, body: createSuccessResponse({ itinerary }) };
  } catch (error) {
    if (error instanceof TripPlannerError) {
      return { status: 422, body: createErrorResponse(error.message) };
    }
    console.error("[API] Unexpected error while planning:", error);
    return {
      status: 500,
      body: createErrorResponse(`An unexpected error occurred: ${getErrorMessage(error)}`),
    };
  }
}

const FORM_FIELDS = ["region", "startDate", "endDate", "preference"] as const;

function formValues(body: unknown, fallback: PlanPageValues): PlanPageValues {
  const values = { ...fallback };
  if (typeof body === "object" && body !== null) {
    for (const key of FORM_FIELDS) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === "string") {
        values[key] = value;
      }
    }
  }
  return values;
}

export function createApp(planner: PlanGenerator): express.Express {
  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(cors());

  app.get("/", (req: Request, res: Response) => {
    res.type("html").send(renderPlanPage({ values: defaultFormValues() }));
  });

  app.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.post("/plan", async (req: Request, res: Response) => {
    console.log("[API] Plan request received");
    const result = await handlePlanRequest(planner, req.body);

    if (!req.is("application/x-www-form-urlencoded")) {
      res.status(result.status).json(result.body);
      return;
    }

    const values = formValues(req.body, defaultFormValues());
    const page = result.body.success
      ? renderPlanPage({ values, itinerary: result.body.data.itinerary })
      : renderPlanPage({
          values,
          error:
            result.body.errors?.map((issue) => issue.message).join("; ") ??
            result.body.message,
        });
    res.status(result.status).type("html").send(page);
  });

  return app;
}

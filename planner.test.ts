import { AIMessage, HumanMessage, type BaseMessage } from "@langchain/core/messages";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NO_RESPONSE_MESSAGE, TripPlanner } from "./planner";
import type { ModelReply } from "./utils/chatSession";
import { WeatherCache } from "./utils/weather/cache";
import { InputValidationError, TripPlannerError } from "./utils/errors";
import { PREFERENCE_INSTRUCTIONS } from "./utils/prompts";
import { WEATHER_TOOL_NAME } from "./utils/tools";
import { createWeatherClient } from "./utils/weather/client";
import {
  PARIS_REPORT,
  PARIS_SAMPLES,
  fakeProvider,
  forecastPayload,
} from "./utils/weather/__fixtures__/forecast";

const NOW = new Date(2025, 5, 1, 12, 0, 0);

function toolCallReply(name: string, args: Record<string, unknown>) {
  return new AIMessage({
    content: "",
    tool_calls: [{ name, args, id: "call-1", type: "tool_call" }],
  });
}

function setup(...replies: Array<ModelReply | Error>) {
  return setupWithCache(new WeatherCache(), ...replies);
}

function setupWithCache(cache: WeatherCache, ...replies: Array<ModelReply | Error>) {
  const invoke = vi.fn<(input: BaseMessage[]) => Promise<ModelReply>>();
  for (const reply of replies) {
    if (reply instanceof Error) {
      invoke.mockRejectedValueOnce(reply);
    } else {
      invoke.mockResolvedValueOnce(reply);
    }
  }
  const provider = fakeProvider(() => ({ status: 200, data: forecastPayload(PARIS_SAMPLES) }));
  const planner = new TripPlanner({
    model: { invoke },
    weatherClient: createWeatherClient("test-secret", { adapter: provider.adapter }),
    cache,
    now: () => NOW,
  });
  return { planner, invoke, provider };
}

function promptOf(input: BaseMessage[]): string {
  const first = input[0];
  return typeof first.content === "string" ? first.content : "";
}

describe("TripPlanner", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches forecasts for the cities the model picks", async () => {
    const { planner, invoke, provider } = setup(
      toolCallReply(WEATHER_TOOL_NAME, {
        city_date_ranges: [{ city: "Paris", start_date: "2025-06-01", end_date: "2025-06-03" }],
      }),
      new AIMessage("Itinerary A\n\nItinerary B")
    );

    const plan = await planner.generatePlan("Ile-de-France", "2025-06-01", "2025-06-03", "1");

    expect(plan).toBe("Itinerary A\n\nItinerary B");
    expect(invoke).toHaveBeenCalledTimes(2);
    expect(provider.calls).toHaveLength(1);

    const firstInput = invoke.mock.calls[0][0];
    expect(firstInput).toHaveLength(1);
    expect(firstInput[0]).toBeInstanceOf(HumanMessage);
    const prompt = promptOf(firstInput);
    expect(prompt).toContain('- **Region:** "Ile-de-France"');
    expect(prompt).toContain("2025-06-01 to 2025-06-03 (A 3-day trip)");
    expect(prompt).toContain(PREFERENCE_INSTRUCTIONS["1"]);

    const secondInput = invoke.mock.calls[1][0];
    expect(secondInput).toHaveLength(3);
    expect(secondInput[2].content).toBe(PARIS_REPORT);
    expect(planner.cache.size).toBe(1);
  });

  it("still fetches every city when one entry has no end date", async () => {
    const { planner, invoke, provider } = setup(
      toolCallReply(WEATHER_TOOL_NAME, {
        city_date_ranges: [
          { city: "Paris", start_date: "2025-06-01", end_date: "2025-06-03" },
          { city: "Lyon", start_date: "2025-06-01" },
        ],
      }),
      new AIMessage("Itinerary")
    );

    await expect(
      planner.generatePlan("Auvergne-Rhone-Alpes", "2025-06-01", "2025-06-03", "3")
    ).resolves.toBe("Itinerary");

    expect(provider.calls).toHaveLength(2);
    const toolResult = invoke.mock.calls[1][0][2].content;
    expect(typeof toolResult).toBe("string");
    expect(toolResult).toContain(PARIS_REPORT);
    expect(toolResult).toContain(PARIS_REPORT.replace("Paris", "Lyon"));
  });

  it("plans from seasonal patterns when the trip is beyond the forecast window", async () => {
    const { planner, invoke, provider } = setup(new AIMessage("Seasonal itinerary"));

    const plan = await planner.generatePlan("Provence", "2025-07-01", "2025-07-03", "3");

    expect(plan).toBe(
      "\nNote: Your trip starts 30 days from now. " +
        "Real-time weather forecasts are only available for the next 5 days. " +
        "The AI will use seasonal weather patterns for your destination instead.\n" +
        "Seasonal itinerary"
    );
    expect(invoke).toHaveBeenCalledTimes(1);
    const prompt = promptOf(invoke.mock.calls[0][0]);
    expect(prompt).toContain("taking place in the month of July");
    expect(prompt).toContain("- **Season:** summer in the northern hemisphere");
    expect(provider.calls).toHaveLength(0);
  });

  it("treats a trip starting on the last forecast day as forecastable", async () => {
    const { planner, invoke } = setup(
      toolCallReply(WEATHER_TOOL_NAME, { city_date_ranges: [] }),
      new AIMessage("Plan")
    );

    await expect(planner.generatePlan("Lyon", "2025-06-06", "2025-06-07", "2")).resolves.toBe(
      "Plan"
    );
    expect(invoke.mock.calls[1][0][2].content).toBe("No cities provided for weather forecast.");
  });

  it("drops cached forecasts from earlier days", async () => {
    const cache = new WeatherCache();
    cache.put(WeatherCache.keyFor("Paris", "2025-05-31"), "stale report");
    cache.put(WeatherCache.keyFor("Rome", "2025-06-01"), "today's report");
    const { planner } = setupWithCache(cache, new AIMessage("Seasonal itinerary"));

    await planner.generatePlan("Provence", "2025-07-01", "2025-07-03", "3");

    expect(cache.has("paris-2025-05-31")).toBe(false);
    expect(cache.get("rome-2025-06-01")).toBe("today's report");
  });

  it("rejects bad dates before calling the model", async () => {
    const { planner, invoke } = setup();

    await expect(
      planner.generatePlan("Paris", "2025-06-03", "2025-06-01", "1")
    ).rejects.toBeInstanceOf(InputValidationError);
    await expect(planner.generatePlan("Paris", "June 1", "2025-06-03", "1")).rejects.toThrow(
      'Invalid date format: "June 1" does not match YYYY-MM-DD'
    );
    expect(invoke).not.toHaveBeenCalled();
  });

  it("rejects an unknown travel style", async () => {
    const { planner, invoke } = setup();

    await expect(planner.generatePlan("Paris", "2025-06-01", "2025-06-03", "4")).rejects.toThrow(
      new InputValidationError("Invalid preference choice.")
    );
    expect(invoke).not.toHaveBeenCalled();
  });

  it("falls back to a fixed message when the model says nothing", async () => {
    const { planner } = setup(toolCallReply("book_hotel", { city: "Paris" }));

    await expect(planner.generatePlan("Paris", "2025-06-01", "2025-06-03", "1")).resolves.toBe(
      NO_RESPONSE_MESSAGE
    );
  });

  it("wraps model failures", async () => {
    const { planner } = setup(new Error("quota exceeded"));

    const result = planner.generatePlan("Paris", "2025-06-01", "2025-06-03", "1");

    await expect(result).rejects.toBeInstanceOf(TripPlannerError);
    await expect(result).rejects.toThrow("An unexpected error occurred: quota exceeded");
  });
});

import { HumanMessage } from "@langchain/core/messages";
import type { RunnableConfig } from "@langchain/core/runnables";
import type { AxiosInstance } from "axios";
import {
  ensureConfiguration,
  loadChatModel,
  type Environment,
  type PlannerConfiguration,
} from "./utils/configuration";
import { ChatSession, type ChatRunnable } from "./utils/chatSession";
import { daysBetween, getSeason, monthName, toLocalIsoDate } from "./utils/dates";
import {
  ConfigurationError,
  getErrorMessage,
  InputValidationError,
  TripPlannerError,
} from "./utils/errors";
import { PREFERENCE_INSTRUCTIONS, SEASONAL_PROMPT, WEATHER_AWARE_PROMPT } from "./utils/prompts";
import { ToolCallMediator } from "./utils/toolCallMediator";
import { MODEL_TOOLS, WEATHER_TOOL_NAME } from "./utils/tools";
import { formatPrompt, getTextContent } from "./utils/util";
import { isPreferenceChoice, startOfToday, validateDateRange } from "./utils/validation";
import { WeatherAggregator } from "./utils/weather/aggregator";
import { WeatherCache } from "./utils/weather/cache";
import { createWeatherClient, validateApiKey } from "./utils/weather/client";
import { WeatherFetcher } from "./utils/weather/fetcher";

export const NO_RESPONSE_MESSAGE = "No response generated. Please try again.";

export interface TripPlannerDependencies {
  /** Chat model with the planner tools already bound. */
  model: ChatRunnable;
  weatherClient: AxiosInstance;
  cache?: WeatherCache;
  configuration?: PlannerConfiguration;
  now?: () => Date;
}

/**
 * Writes weather-aware itineraries: builds the prompt, talks to the model and
 * lets it look up forecasts through the weather tool.
 */
export class TripPlanner {
  readonly cache: WeatherCache;
  private readonly model: ChatRunnable;
  private readonly configuration: PlannerConfiguration;
  private readonly aggregator: WeatherAggregator;
  private readonly mediator: ToolCallMediator;
  private readonly now: () => Date;

  constructor(deps: TripPlannerDependencies) {
    this.model = deps.model;
    this.cache = deps.cache ?? new WeatherCache();
    this.configuration = deps.configuration ?? ensureConfiguration();
    this.now = deps.now ?? (() => new Date());

    const fetcher = new WeatherFetcher(deps.weatherClient, this.cache, {
      sampleCount: this.configuration.forecastSampleCount,
      requestTimeoutMs: this.configuration.requestTimeoutMs,
      now: this.now,
    });
    this.aggregator = new WeatherAggregator(fetcher, {
      maxConcurrent: this.configuration.maxConcurrentFetches,
      fetchTimeoutMs: this.configuration.fetchTimeoutMs,
    });
    this.mediator = new ToolCallMediator(
      {
        [WEATHER_TOOL_NAME]: (args) => this.aggregator.aggregate(args.city_date_ranges),
      },
      this.configuration.maxToolCalls
    );
  }

  /**
   * Builds a planner from the environment: checks the weather API key once,
   * then loads the chat model and binds the planner tools to it.
   *
   * @throws ConfigurationError when the key is rejected or the model cannot be loaded.
   */
  static async create(env: Environment, config?: RunnableConfig): Promise<TripPlanner> {
    const configuration = ensureConfiguration({
      ...config,
      configurable: { plannerModel: env.PLANNER_MODEL, ...config?.configurable },
    });

    const weatherClient = createWeatherClient(env.OPENWEATHERMAP_API_KEY);
    await validateApiKey(weatherClient);

    const isVertex = configuration.plannerModel.startsWith("google-vertexai/");
    if (isVertex && !env.GCP_PROJECT_ID) {
      throw new ConfigurationError("Project ID and location must be provided");
    }

    let model: ChatRunnable;
    try {
      console.log(`[PLANNER] Initializing model: ${configuration.plannerModel}`);
      const rawModel = await loadChatModel(
        configuration.plannerModel,
        isVertex
          ? { location: env.GCP_LOCATION, authOptions: { projectId: env.GCP_PROJECT_ID } }
          : {}
      );
      if (!rawModel.bindTools) {
        throw new Error("Chat model does not support tool binding");
      }
      model = rawModel.bindTools(MODEL_TOOLS);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to initialize chat model: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
    if (isVertex) {
      console.log(
        `[PLANNER] Initialized Vertex AI with project: ${env.GCP_PROJECT_ID}, location: ${env.GCP_LOCATION}`
      );
    }

    return new TripPlanner({ model, weatherClient, configuration });
  }

  /**
   * Generates two alternative itineraries for the region and dates.
   *
   * Trips starting within the forecast window get real forecasts through the
   * weather tool; later trips get a seasonal plan prefixed with a note.
   *
   * @throws TripPlannerError for every failure; InputValidationError before any network call.
   */
  async generatePlan(
    region: string,
    startDateStr: string,
    endDateStr: string,
    preferenceChoice: string
  ): Promise<string> {
    try {
      const now = this.now();
      const { startDate, durationDays } = validateDateRange(startDateStr, endDateStr, now);

      if (!isPreferenceChoice(preferenceChoice)) {
        throw new InputValidationError("Invalid preference choice.");
      }
      const preference = PREFERENCE_INSTRUCTIONS[preferenceChoice];

      const horizon = this.configuration.forecastHorizonDays;
      const daysUntilStart = daysBetween(startOfToday(now), startDate);
      const forecastAvailable = daysUntilStart <= horizon;

      const note = forecastAvailable
        ? ""
        : `\nNote: Your trip starts ${daysUntilStart} days from now. ` +
          `Real-time weather forecasts are only available for the next ${horizon} days. ` +
          "The AI will use seasonal weather patterns for your destination instead.\n";

      const values = {
        region,
        startDate: startDateStr,
        endDate: endDateStr,
        duration: durationDays,
        preference,
      };
      const prompt = forecastAvailable
        ? formatPrompt(WEATHER_AWARE_PROMPT, values)
        : formatPrompt(SEASONAL_PROMPT, {
            ...values,
            month: monthName(startDate),
            season: getSeason(startDate),
          });

      const evicted = this.cache.evictStale(toLocalIsoDate(now));
      if (evicted > 0) {
        console.log(`[PLANNER] Dropped ${evicted} cached forecasts from earlier days`);
      }

      const startedAt = Date.now();
      const session = new ChatSession(this.model);
      let response = await session.sendMessage(new HumanMessage(prompt));
      if (forecastAvailable) {
        response = await this.mediator.resolve(session, response);
      }
      const elapsed = (Date.now() - startedAt) / 1000;
      console.log(`[PLANNER] Total processing time: ${elapsed.toFixed(2)} seconds`);

      const finalText = getTextContent(response.content);
      if (!finalText.trim()) {
        return NO_RESPONSE_MESSAGE;
      }
      return note + finalText;
    } catch (error) {
      if (error instanceof TripPlannerError) {
        console.error(`[PLANNER] Trip planning error in generatePlan: ${error.message}`);
        throw error;
      }
      console.error("[PLANNER] Unexpected error in generatePlan:", error);
      throw new TripPlannerError(
        `An unexpected error occurred: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }
}

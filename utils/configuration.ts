/**
 * Define the configurable parameters for the planner.
 */
import type { RunnableConfig } from "@langchain/core/runnables";
import { Annotation } from "@langchain/langgraph";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { initChatModel } from "langchain/chat_models/universal";
import { z } from "zod";
import { ConfigurationError } from "./errors";

export const DEFAULT_PLANNER_MODEL = "google-vertexai/gemini-2.5-pro";

/**
 * The complete configuration for the planner.
 */
export const ConfigurationAnnotation = Annotation.Root({
  /**
   * The language model used for writing itineraries. Should be in the form: provider/model-name.
   */
  plannerModel: Annotation<string>,

  /**
   * The maximum number of tool calls the model may make while answering one request.
   */
  maxToolCalls: Annotation<number>,

  /**
   * Upper bound on forecast requests in flight during one aggregation.
   */
  maxConcurrentFetches: Annotation<number>,

  /**
   * Time allotted to each city's forecast before it is cancelled.
   */
  fetchTimeoutMs: Annotation<number>,

  /**
   * Timeout of a single HTTP request to the forecast provider.
   */
  requestTimeoutMs: Annotation<number>,

  /**
   * Number of forecast samples requested per city (3-hour steps).
   */
  forecastSampleCount: Annotation<number>,

  /**
   * How many days ahead the provider has forecasts for.
   */
  forecastHorizonDays: Annotation<number>,
});

export type PlannerConfiguration = typeof ConfigurationAnnotation.State;

/**
 * Create a PlannerConfiguration instance from a RunnableConfig object.
 *
 * @param config - The configuration object to use.
 * @returns The configuration with defaults filled in.
 */
export function ensureConfiguration(
  config: RunnableConfig | undefined = undefined
): PlannerConfiguration {
  const configurable = (config?.configurable ?? {}) as Partial<PlannerConfiguration>;

  return {
    plannerModel: configurable.plannerModel || DEFAULT_PLANNER_MODEL,
    maxToolCalls: configurable.maxToolCalls ?? 5,
    maxConcurrentFetches: configurable.maxConcurrentFetches ?? 5,
    fetchTimeoutMs: configurable.fetchTimeoutMs ?? 15_000,
    requestTimeoutMs: configurable.requestTimeoutMs ?? 10_000,
    forecastSampleCount: configurable.forecastSampleCount ?? 40,
    forecastHorizonDays: configurable.forecastHorizonDays ?? 5,
  };
}

const EnvironmentSchema = z.object({
  OPENWEATHERMAP_API_KEY: z
    .string({ required_error: "OPENWEATHERMAP_API_KEY environment variable not set." })
    .min(1, "OPENWEATHERMAP_API_KEY environment variable not set."),
  // Only needed when the planner model is served by Vertex AI
  GCP_PROJECT_ID: z.string().min(1).optional(),
  GCP_LOCATION: z.string().min(1).default("us-central1"),
  PLANNER_MODEL: z.string().min(1).default(DEFAULT_PLANNER_MODEL),
  PORT: z.coerce.number().int().positive().default(3000),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Read and validate the process environment.
 *
 * @throws ConfigurationError when a required variable is missing or malformed.
 */
export function loadEnvironment(
  env: NodeJS.ProcessEnv = process.env
): Environment {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigurationError(`CRITICAL: ${details}`);
  }
  return parsed.data;
}

export type ChatModelOptions = {
  temperature?: number;
  /** Vertex AI region. */
  location?: string;
  authOptions?: { projectId?: string };
};

/**
 * Load a chat model from a fully specified name.
 * @param fullySpecifiedName - String in the format 'provider/model' or just 'model'.
 * @returns A Promise that resolves to a BaseChatModel instance.
 */
export async function loadChatModel(
  fullySpecifiedName: string,
  options: ChatModelOptions = {}
): Promise<BaseChatModel> {
  const index = fullySpecifiedName.indexOf("/");
  if (index === -1) {
    // If there's no "/", assume it's just the model
    return await initChatModel(fullySpecifiedName, options);
  } else {
    const provider = fullySpecifiedName.slice(0, index);
    const model = fullySpecifiedName.slice(index + 1);
    return await initChatModel(model, {
      modelProvider: provider,
      ...options,
    });
  }
}

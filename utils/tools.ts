import type { ToolCall } from "@langchain/core/messages/tool";
import weatherToolArgsSchema, {
  receivedWeatherToolArgsSchema,
  type WeatherToolArgs,
} from "../schemas/weatherToolArgs";

export const WEATHER_TOOL_NAME = "get_daily_weather_forecasts";

/**
 * Tool definitions bound to the chat model. These only describe the tools;
 * `runTool` below is what actually executes them.
 */
export const MODEL_TOOLS = [
  {
    name: WEATHER_TOOL_NAME,
    description: "Get the day-by-day weather forecast for a list of cities.",
    schema: weatherToolArgsSchema,
  },
];

/**
 * Every tool the planner understands. Adding a tool means adding a member
 * here, a handler in `ToolHandlers` and a case in `runTool`.
 */
export type ToolRequest = {
  kind: typeof WEATHER_TOOL_NAME;
  args: Record<string, unknown>;
};

export interface ToolHandlers {
  [WEATHER_TOOL_NAME]: (args: WeatherToolArgs) => Promise<string>;
}

/** Maps a model tool call onto a known tool, or undefined for unknown names. */
export function parseToolRequest(call: ToolCall): ToolRequest | undefined {
  switch (call.name) {
    case WEATHER_TOOL_NAME:
      return { kind: WEATHER_TOOL_NAME, args: call.args };
    default:
      return undefined;
  }
}

/**
 * Validates the model-supplied arguments and runs the handler.
 * Throws on invalid arguments or handler failure.
 */
export async function runTool(
  request: ToolRequest,
  handlers: ToolHandlers
): Promise<string> {
  switch (request.kind) {
    case WEATHER_TOOL_NAME:
      return handlers[WEATHER_TOOL_NAME](receivedWeatherToolArgsSchema.parse(request.args));
    default: {
      const unhandled: never = request.kind;
      throw new Error(`Unhandled tool: ${String(unhandled)}`);
    }
  }
}

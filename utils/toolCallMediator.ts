import { ToolMessage } from "@langchain/core/messages";
import type { ToolCall } from "@langchain/core/messages/tool";
import type { MessageSender, ModelReply } from "./chatSession";
import { getErrorMessage } from "./errors";
import { parseToolRequest, runTool, type ToolHandlers } from "./tools";

export const TOOL_ERROR_PREFIX = "Tool unavailable due to error:";
export const SKIPPED_CALL_MESSAGE =
  "Not run: only one tool call is handled per turn. Call it again if the result is still needed.";

export interface ToolCallState {
  callsMade: number;
  maxCalls: number;
}

function firstToolCall(reply: ModelReply): ToolCall | undefined {
  return reply.tool_calls?.[0];
}

/** Every call in a reply needs an answer; the ones after the first are skipped. */
function skippedCalls(reply: ModelReply): ToolMessage[] {
  return (reply.tool_calls ?? []).slice(1).map(
    (call) =>
      new ToolMessage({
        name: call.name,
        content: SKIPPED_CALL_MESSAGE,
        tool_call_id: call.id ?? "",
      })
  );
}

/**
 * Runs the tool-call loop for one assistant turn.
 *
 * While the latest reply asks for a tool and the ceiling is not reached, the
 * tool runs and its result goes back to the model. Tool failures are reported
 * to the model as text, never thrown. When a reply holds several calls only
 * the first runs; the others are answered as skipped. The last reply is
 * returned as-is, which may still be a tool call when the ceiling was hit or
 * the tool is unknown.
 */
export class ToolCallMediator {
  constructor(
    private readonly handlers: ToolHandlers,
    private readonly maxCalls = 5
  ) {}

  async resolve(session: MessageSender, response: ModelReply): Promise<ModelReply> {
    const state: ToolCallState = { callsMade: 0, maxCalls: this.maxCalls };
    let current = response;
    let call = firstToolCall(current);

    while (call && state.callsMade < state.maxCalls) {
      state.callsMade++;
      console.log(`[TOOLS] Tool call #${state.callsMade}: ${call.name}`);

      const request = parseToolRequest(call);
      if (!request) {
        console.warn(`[TOOLS] Unknown function call: ${call.name}`);
        return current;
      }

      let content: string;
      try {
        content = await runTool(request, this.handlers);
      } catch (error) {
        console.error(`[TOOLS] Error in ${call.name} tool call:`, error);
        content = `${TOOL_ERROR_PREFIX} ${getErrorMessage(error)}`;
      }

      current = await session.sendMessages([
        new ToolMessage({
          name: call.name,
          content,
          tool_call_id: call.id ?? "",
        }),
        ...skippedCalls(current),
      ]);
      call = firstToolCall(current);
    }

    if (call) {
      console.warn(
        `[TOOLS] Maximum tool calls reached (${state.maxCalls}); returning the last response`
      );
    }
    return current;
  }
}

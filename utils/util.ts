import type { BaseMessage, MessageContent } from "@langchain/core/messages";

/**
 * Helper function to extract text content from various message types.
 * Non-text parts such as function calls are skipped.
 *
 * @param content - The message content to process
 * @returns The extracted text content, possibly empty
 */
export function getTextContent(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) =>
      "text" in part && typeof part.text === "string" ? part.text : ""
    )
    .join("");
}

export function getMessageText(msg: BaseMessage): string {
  return getTextContent(msg.content).trim();
}

export function formatList(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

/**
 * Fills every `{name}` placeholder in one pass, so text substituted for one
 * placeholder is never read as another. Unknown placeholders are left as-is.
 */
export function formatPrompt(
  template: string,
  values: Record<string, string | number>
): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
    Object.hasOwn(values, key) ? String(values[key]) : placeholder
  );
}

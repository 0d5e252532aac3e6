import type {
  AIMessage,
  AIMessageChunk,
  BaseMessage,
} from "@langchain/core/messages";

export type ModelReply = AIMessage | AIMessageChunk;

/** The part of a tool-bound chat model the session needs. */
export interface ChatRunnable {
  invoke(input: BaseMessage[]): Promise<ModelReply>;
}

/** Anything a reply can be sent back through. */
export interface MessageSender {
  sendMessages(messages: BaseMessage[]): Promise<ModelReply>;
}

/**
 * One conversation with the model: every message sent and every reply
 * received is kept, so each call sees the whole exchange so far.
 */
export class ChatSession implements MessageSender {
  private readonly history: BaseMessage[] = [];

  constructor(private readonly model: ChatRunnable) {}

  sendMessage(message: BaseMessage): Promise<ModelReply> {
    return this.sendMessages([message]);
  }

  /** Appends all of `messages` and asks the model once. */
  async sendMessages(messages: BaseMessage[]): Promise<ModelReply> {
    this.history.push(...messages);
    const reply = await this.model.invoke([...this.history]);
    this.history.push(reply);
    return reply;
  }

  get messages(): readonly BaseMessage[] {
    return this.history;
  }
}

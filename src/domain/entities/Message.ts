export type MessageRole = "user" | "assistant" | "system" | "tool";

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface Message {
  role: MessageRole;
  content: string;
  toolCalls?: ToolCall[];
  /** Set on `tool` messages: the id of the call this message answers. */
  toolCallId?: string;
  /** Set on `tool` messages: the tool that produced the result. */
  name?: string;
}

export function hasToolCalls(message: Message): boolean {
  return message.role === "assistant" && (message.toolCalls?.length ?? 0) > 0;
}

/**
 * Public view of a transcript: user and assistant turns with something to show.
 */
export function toTranscript(messages: Message[]): Message[] {
  return messages
    .filter(m => (m.role === "assistant" || m.role === "user") && m.content.trim().length > 0)
    .map(m => ({ role: m.role, content: m.content }));
}

import { z } from "zod";
import { Message } from "./Message";

export interface ConversationState {
  messages: Message[];
  longTermMemoryContext: string;
}

export interface StateUpdate {
  messages: Message[];
  longTermMemoryContext?: string;
}

export function emptyState(): ConversationState {
  return { messages: [], longTermMemoryContext: "" };
}

// Messages are only ever appended; earlier entries keep their position.
export function applyUpdate(state: ConversationState, update: StateUpdate): ConversationState {
  return {
    messages: [...state.messages, ...update.messages],
    longTermMemoryContext: update.longTermMemoryContext ?? state.longTermMemoryContext
  };
}

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown())
});

export const messageSchema = z.object({
  role: z.enum(["user", "assistant", "system", "tool"]),
  content: z.string(),
  toolCalls: z.array(toolCallSchema).optional(),
  toolCallId: z.string().optional(),
  name: z.string().optional()
});

export const conversationStateSchema = z.object({
  messages: z.array(messageSchema),
  longTermMemoryContext: z.string()
});

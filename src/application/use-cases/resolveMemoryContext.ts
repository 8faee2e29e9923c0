import type { Logger } from "pino";
import { Message } from "../../domain/entities/Message";
import { describeCause } from "../../domain/errors/AgentErrors";
import { ILongTermMemory } from "../contracts/ILongTermMemory";

export const NO_RELEVANT_MEMORY = "No relevant memory found.";

/**
 * Recalls what is known about the user, keyed on their latest message. Memory
 * is an enhancement: any failure yields the placeholder.
 */
export async function resolveMemoryContext(
  memory: ILongTermMemory,
  userId: string,
  messages: Message[],
  logger: Logger
): Promise<string> {
  let query: string | undefined;
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === "user") {
      query = messages[i].content;
      break;
    }
  }
  if (!query) return NO_RELEVANT_MEMORY;

  try {
    const facts = await memory.search(userId, query);
    return facts.length > 0 ? facts.map(fact => `* ${fact}`).join("\n") : NO_RELEVANT_MEMORY;
  } catch (error) {
    logger.warn({ userId, error: describeCause(error) }, "long_term_memory_search_failed");
    return NO_RELEVANT_MEMORY;
  }
}

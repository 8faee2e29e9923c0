import { z } from "zod";
import type { Logger } from "pino";
import { IFactExtractor } from "../../application/contracts/ILongTermMemory";
import { IModelBackend } from "../../application/contracts/IModelBackend";
import { Message } from "../../domain/entities/Message";

const factsSchema = z.object({
  facts: z.array(z.string())
});

/**
 * Asks an auxiliary model which durable facts about the user a conversation
 * reveals. Only user and assistant text is shown to the model.
 */
export class LLMFactExtractor implements IFactExtractor {
  constructor(
    private readonly model: IModelBackend,
    private readonly instructions: string,
    private readonly logger: Logger
  ) {}

  async extract(messages: Message[]): Promise<string[]> {
    const dialogue = messages.filter(
      m => (m.role === "user" || m.role === "assistant") && m.content.trim().length > 0
    );
    if (!dialogue.some(m => m.role === "user")) return [];

    const transcript = dialogue.map(m => `${m.role}: ${m.content}`).join("\n");
    const reply = await this.model.invoke(
      [
        { role: "system", content: this.instructions },
        { role: "user", content: transcript }
      ],
      []
    );

    const facts = parseFacts(reply.content);
    this.logger.debug({ count: facts.length }, "memory_facts_extracted");
    return facts;
  }
}

export function parseFacts(raw: string): string[] {
  const json = raw.replace(/^\s*```(?:json)?\s*/i, "").replace(/\s*```\s*$/, "");
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch {
    throw new Error(`Fact extraction returned non-JSON output: ${raw.slice(0, 200)}`);
  }
  return factsSchema
    .parse(value)
    .facts.map(fact => fact.trim())
    .filter(fact => fact.length > 0);
}

import { v4 as uuidv4 } from "uuid";
import type { Logger } from "pino";
import {
  IEmbedder,
  IFactExtractor,
  ILongTermMemory,
  IVectorStore
} from "../../application/contracts/ILongTermMemory";
import { Message } from "../../domain/entities/Message";
import { factKey } from "../../domain/entities/MemoryFact";
import { describeCause, MemoryUnavailableError } from "../../domain/errors/AgentErrors";

export interface LongTermMemoryOptions {
  topK: number;
  logger: Logger;
  now?: () => Date;
}

/**
 * Cross-session facts about a user, recalled by semantic similarity.
 */
export class LongTermMemory implements ILongTermMemory {
  private readonly topK: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly extractor: IFactExtractor,
    private readonly embedder: IEmbedder,
    private readonly store: IVectorStore,
    options: LongTermMemoryOptions
  ) {
    this.topK = options.topK;
    this.logger = options.logger.child({ component: "long-term-memory" });
    this.now = options.now ?? (() => new Date());
  }

  async search(userId: string, query: string): Promise<string[]> {
    try {
      const [embedding] = await this.embedder.embed([query]);
      if (!embedding) return [];
      const facts = await this.store.search(userId, embedding, this.topK);
      return facts.map(fact => fact.text);
    } catch (error) {
      throw new MemoryUnavailableError(`Long-term memory search failed: ${describeCause(error)}`, { cause: error });
    }
  }

  async add(messages: Message[], userId: string): Promise<void> {
    const extracted = await this.extractor.extract(messages);

    const unique = new Map<string, string>();
    for (const fact of extracted) {
      const key = factKey(fact);
      if (!unique.has(key)) unique.set(key, fact);
    }
    const facts = Array.from(unique.values());
    if (facts.length === 0) return;

    const embeddings = await this.embedder.embed(facts);
    if (embeddings.length !== facts.length) {
      throw new MemoryUnavailableError(
        `Embedder returned ${embeddings.length} vectors for ${facts.length} facts`
      );
    }
    let stored = 0;
    for (let i = 0; i < facts.length; i++) {
      const inserted = await this.store.upsert({
        id: uuidv4(),
        userId,
        text: facts[i],
        embedding: embeddings[i],
        createdAt: this.now()
      });
      if (inserted) stored++;
    }

    this.logger.info({ userId, extracted: facts.length, stored }, "long_term_memory_updated");
  }
}

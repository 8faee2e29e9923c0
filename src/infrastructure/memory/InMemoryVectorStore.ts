import { IVectorStore } from "../../application/contracts/ILongTermMemory";
import { cosineSimilarity, factKey, MemoryFact, ScoredFact } from "../../domain/entities/MemoryFact";

export class InMemoryVectorStore implements IVectorStore {
  private readonly facts = new Map<string, Map<string, MemoryFact>>();

  async upsert(fact: MemoryFact): Promise<boolean> {
    const userFacts = this.facts.get(fact.userId) ?? new Map<string, MemoryFact>();
    const key = factKey(fact.text);
    if (userFacts.has(key)) return false;

    userFacts.set(key, fact);
    this.facts.set(fact.userId, userFacts);
    return true;
  }

  async search(userId: string, embedding: number[], limit: number): Promise<ScoredFact[]> {
    const userFacts = this.facts.get(userId);
    if (!userFacts) return [];

    return Array.from(userFacts.values())
      .map(fact => ({
        text: fact.text,
        score: cosineSimilarity(fact.embedding, embedding),
        createdAt: fact.createdAt
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  size(userId: string): number {
    return this.facts.get(userId)?.size ?? 0;
  }
}

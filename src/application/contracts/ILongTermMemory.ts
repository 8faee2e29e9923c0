import { Message } from "../../domain/entities/Message";
import { MemoryFact, ScoredFact } from "../../domain/entities/MemoryFact";

export interface ILongTermMemory {
  search(userId: string, query: string): Promise<string[]>;
  add(messages: Message[], userId: string): Promise<void>;
}

export interface IEmbedder {
  embed(texts: string[]): Promise<number[][]>;
}

export interface IFactExtractor {
  extract(messages: Message[]): Promise<string[]>;
}

export interface IVectorStore {
  /** Resolves to false when the user already holds the same fact. */
  upsert(fact: MemoryFact): Promise<boolean>;
  search(userId: string, embedding: number[], limit: number): Promise<ScoredFact[]>;
}

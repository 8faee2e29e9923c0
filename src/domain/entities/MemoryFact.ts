import { createHash } from "crypto";

export interface MemoryFact {
  id: string;
  userId: string;
  text: string;
  embedding: number[];
  createdAt: Date;
}

export interface ScoredFact {
  text: string;
  score: number;
  createdAt: Date;
}

export function normalizeFact(text: string): string {
  return text.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Identity of a fact for a user; two facts with the same key are the same fact. */
export function factKey(text: string): string {
  return createHash("sha256").update(normalizeFact(text)).digest("hex");
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Embedding size mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

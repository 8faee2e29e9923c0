import { Pool } from "pg";
import type { Logger } from "pino";
import { IVectorStore } from "../../application/contracts/ILongTermMemory";
import { factKey, MemoryFact, ScoredFact } from "../../domain/entities/MemoryFact";
import { toResourceExhausted } from "../persistence/pgPool";

type FactRow = {
  text: string;
  score: number;
  created_at: Date;
};

function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

/** Memory facts in Postgres with the pgvector extension. */
export class PgVectorStore implements IVectorStore {
  private readonly logger: Logger;

  constructor(
    private readonly pool: Pool,
    private readonly dimensions: number,
    logger: Logger
  ) {
    this.logger = logger.child({ component: "vector-store" });
  }

  async initialize(): Promise<void> {
    await this.pool.query("CREATE EXTENSION IF NOT EXISTS vector");
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS memory_facts (
        id           UUID        PRIMARY KEY,
        user_id      TEXT        NOT NULL,
        text         TEXT        NOT NULL,
        content_hash TEXT        NOT NULL,
        embedding    vector(${this.dimensions}) NOT NULL,
        created_at   TIMESTAMPTZ NOT NULL DEFAULT now(),
        UNIQUE (user_id, content_hash)
      )
    `);
    await this.pool.query("CREATE INDEX IF NOT EXISTS memory_facts_user_idx ON memory_facts (user_id)");
    this.logger.info({ dimensions: this.dimensions }, "memory_table_ready");
  }

  async upsert(fact: MemoryFact): Promise<boolean> {
    try {
      const result = await this.pool.query(
        `INSERT INTO memory_facts (id, user_id, text, content_hash, embedding, created_at)
         VALUES ($1, $2, $3, $4, $5::vector, $6)
         ON CONFLICT (user_id, content_hash) DO NOTHING`,
        [fact.id, fact.userId, fact.text, factKey(fact.text), toVectorLiteral(fact.embedding), fact.createdAt]
      );
      return result.rowCount === 1;
    } catch (error) {
      throw toResourceExhausted(error);
    }
  }

  async search(userId: string, embedding: number[], limit: number): Promise<ScoredFact[]> {
    try {
      const result = await this.pool.query<FactRow>(
        `SELECT text, 1 - (embedding <=> $2::vector) AS score, created_at
           FROM memory_facts
          WHERE user_id = $1
          ORDER BY embedding <=> $2::vector
          LIMIT $3`,
        [userId, toVectorLiteral(embedding), limit]
      );
      return result.rows.map(row => ({ text: row.text, score: Number(row.score), createdAt: row.created_at }));
    } catch (error) {
      throw toResourceExhausted(error);
    }
  }
}

import { Pool } from "pg";
import type { Logger } from "pino";
import { ICheckpointStore } from "../../application/contracts/ICheckpointStore";
import { CheckpointRecord, CheckpointSnapshot, isNextNode } from "../../domain/entities/CheckpointRecord";
import { conversationStateSchema } from "../../domain/entities/ConversationState";
import {
  AgentError,
  CheckpointConflictError,
  CheckpointWriteError,
  describeCause,
  ResourceExhaustedError
} from "../../domain/errors/AgentErrors";
import { isPoolTimeout, pgErrorCode, toResourceExhausted, UNIQUE_VIOLATION } from "./pgPool";

type CheckpointRow = {
  thread_id: string;
  sequence_no: number;
  next_node: string;
  state: unknown;
  created_at: Date;
};

/**
 * Append-only checkpoint log in Postgres. The primary key on
 * (thread_id, sequence_no) makes a stale writer fail instead of forking the
 * thread.
 */
export class PgCheckpointStore implements ICheckpointStore {
  private readonly logger: Logger;

  constructor(private readonly pool: Pool, logger: Logger) {
    this.logger = logger.child({ component: "checkpoint-store" });
  }

  async initialize(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        thread_id   TEXT        NOT NULL,
        sequence_no INTEGER     NOT NULL,
        next_node   TEXT        NOT NULL,
        state       JSONB       NOT NULL,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
        PRIMARY KEY (thread_id, sequence_no)
      )
    `);
    this.logger.info("checkpoint_table_ready");
  }

  async getLatest(threadId: string): Promise<CheckpointRecord | null> {
    let rows: CheckpointRow[];
    try {
      const result = await this.pool.query<CheckpointRow>(
        `SELECT thread_id, sequence_no, next_node, state, created_at
           FROM checkpoints
          WHERE thread_id = $1
          ORDER BY sequence_no DESC
          LIMIT 1`,
        [threadId]
      );
      rows = result.rows;
    } catch (error) {
      throw toResourceExhausted(error);
    }

    const row = rows.at(0);
    return row ? this.toRecord(row) : null;
  }

  async append(threadId: string, snapshot: CheckpointSnapshot, previousSequenceNo: number | null): Promise<number> {
    const sequenceNo = (previousSequenceNo ?? 0) + 1;
    try {
      await this.pool.query(
        `INSERT INTO checkpoints (thread_id, sequence_no, next_node, state)
         VALUES ($1, $2, $3, $4)`,
        [threadId, sequenceNo, snapshot.next, JSON.stringify(snapshot.state)]
      );
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        throw new CheckpointConflictError(threadId, previousSequenceNo);
      }
      if (isPoolTimeout(error)) {
        throw new ResourceExhaustedError("Database connection pool exhausted", { cause: error });
      }
      throw new CheckpointWriteError(threadId, describeCause(error), { cause: error });
    }

    this.logger.debug({ threadId, sequenceNo, next: snapshot.next }, "checkpoint_written");
    return sequenceNo;
  }

  private toRecord(row: CheckpointRow): CheckpointRecord {
    const state = conversationStateSchema.safeParse(row.state);
    if (!state.success || !isNextNode(row.next_node)) {
      throw new AgentError(`Corrupt checkpoint ${row.thread_id}#${row.sequence_no}`);
    }
    return {
      threadId: row.thread_id,
      sequenceNo: row.sequence_no,
      next: row.next_node,
      state: state.data,
      createdAt: row.created_at
    };
  }
}

import { ICheckpointStore } from "../../application/contracts/ICheckpointStore";
import { CheckpointRecord, CheckpointSnapshot } from "../../domain/entities/CheckpointRecord";
import { CheckpointConflictError } from "../../domain/errors/AgentErrors";

/**
 * Process-local checkpoint log. Used when no database is configured and as the
 * store behind tests; applies the same expected-version check as Postgres.
 */
export class InMemoryCheckpointStore implements ICheckpointStore {
  private readonly threads = new Map<string, CheckpointRecord[]>();

  async getLatest(threadId: string): Promise<CheckpointRecord | null> {
    const latest = this.threads.get(threadId)?.at(-1);
    return latest ? structuredClone(latest) : null;
  }

  async append(threadId: string, snapshot: CheckpointSnapshot, previousSequenceNo: number | null): Promise<number> {
    const records = this.threads.get(threadId) ?? [];
    const latest = records.at(-1)?.sequenceNo ?? null;
    if (latest !== previousSequenceNo) {
      throw new CheckpointConflictError(threadId, previousSequenceNo);
    }

    const sequenceNo = (latest ?? 0) + 1;
    records.push({
      threadId,
      sequenceNo,
      next: snapshot.next,
      state: structuredClone(snapshot.state),
      createdAt: new Date()
    });
    this.threads.set(threadId, records);
    return sequenceNo;
  }

  /** Every checkpoint of a thread, oldest first. */
  history(threadId: string): CheckpointRecord[] {
    return structuredClone(this.threads.get(threadId) ?? []);
  }
}

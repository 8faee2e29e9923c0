import { CheckpointRecord, CheckpointSnapshot } from "../../domain/entities/CheckpointRecord";

export interface ICheckpointStore {
  getLatest(threadId: string): Promise<CheckpointRecord | null>;

  /**
   * Appends a snapshot after `previousSequenceNo` (null for a new thread) and
   * returns the new sequence number. Rejects with CheckpointConflictError when
   * the thread has moved on, and CheckpointWriteError when nothing was stored.
   */
  append(threadId: string, snapshot: CheckpointSnapshot, previousSequenceNo: number | null): Promise<number>;
}

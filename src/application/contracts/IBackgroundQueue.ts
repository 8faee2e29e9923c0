export interface BackgroundJob {
  name: string;
  meta?: Record<string, unknown>;
  run: () => Promise<void>;
}

export interface IBackgroundQueue {
  /** Returns false when the job was refused. */
  enqueue(job: BackgroundJob): boolean;
}

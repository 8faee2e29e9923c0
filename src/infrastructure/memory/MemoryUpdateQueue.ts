import type { Logger } from "pino";
import { BackgroundJob, IBackgroundQueue } from "../../application/contracts/IBackgroundQueue";

export interface MemoryUpdateQueueOptions {
  logger: Logger;
  maxQueueSize?: number;
  concurrency?: number;
}

/**
 * Bounded FIFO drained by a small worker pool. Jobs run at most once: a
 * failure is logged and the job is dropped. On overflow the oldest waiting
 * job is discarded.
 */
export class MemoryUpdateQueue implements IBackgroundQueue {
  private readonly queue: BackgroundJob[] = [];
  private readonly logger: Logger;
  private readonly maxQueueSize: number;
  private readonly concurrency: number;
  private active = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: MemoryUpdateQueueOptions) {
    this.logger = options.logger.child({ component: "memory-update-queue" });
    this.maxQueueSize = options.maxQueueSize ?? 100;
    this.concurrency = Math.max(1, options.concurrency ?? 2);
  }

  get pending(): number {
    return this.queue.length;
  }

  get running(): number {
    return this.active;
  }

  enqueue(job: BackgroundJob): boolean {
    if (this.closed) {
      this.logger.warn({ job: job.name, ...job.meta }, "background_job_rejected_queue_closed");
      return false;
    }

    if (this.queue.length >= this.maxQueueSize) {
      const dropped = this.queue.shift();
      if (dropped) {
        this.logger.warn({ job: dropped.name, ...dropped.meta }, "background_job_dropped_queue_full");
      }
    }

    this.queue.push(job);
    this.pump();
    return true;
  }

  /** Resolves once nothing is queued or running. */
  async drain(): Promise<void> {
    if (this.isIdle()) return;
    await new Promise<void>(resolve => this.idleWaiters.push(resolve));
  }

  /** Stops accepting jobs and waits for the ones already accepted. */
  async close(): Promise<void> {
    this.closed = true;
    await this.drain();
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private pump(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const job = this.queue.shift();
      if (!job) break;
      this.active++;
      void this.run(job);
    }
  }

  private async run(job: BackgroundJob): Promise<void> {
    try {
      await job.run();
      this.logger.debug({ job: job.name, ...job.meta }, "background_job_completed");
    } catch (error) {
      this.logger.error({ job: job.name, ...job.meta, err: error }, "background_job_failed");
    } finally {
      this.active--;
      this.pump();
      if (this.isIdle()) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach(resolve => resolve());
      }
    }
  }
}

import type { Logger } from "pino";

export interface CleanupTask {
  name: string;
  run: () => Promise<void>;
}

export interface GracefulShutdownOptions {
  logger: Logger;
  timeoutMs: number;
  exit?: (code: number) => void;
}

/**
 * Runs cleanup tasks in registration order once a termination signal arrives.
 * A task that fails is logged and the rest still run; the process exits with
 * 1 if any failed or the timeout fires first.
 */
export class GracefulShutdown {
  private readonly tasks: CleanupTask[] = [];
  private readonly logger: Logger;
  private readonly exit: (code: number) => void;
  private shuttingDown = false;

  constructor(private readonly options: GracefulShutdownOptions) {
    this.logger = options.logger.child({ component: "shutdown" });
    this.exit = options.exit ?? (code => process.exit(code));
  }

  addCleanupTask(name: string, run: () => Promise<void>): void {
    this.tasks.push({ name, run });
  }

  listen(signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"]): void {
    for (const signal of signals) {
      process.once(signal, () => {
        void this.shutdown(signal);
      });
    }
  }

  async shutdown(reason: string): Promise<void> {
    if (this.shuttingDown) {
      this.logger.warn({ reason }, "shutdown_already_in_progress");
      return;
    }
    this.shuttingDown = true;
    this.logger.info({ reason }, "shutdown_started");

    const timer = setTimeout(() => {
      this.logger.error({ timeoutMs: this.options.timeoutMs }, "shutdown_timed_out");
      this.exit(1);
    }, this.options.timeoutMs);

    let failed = false;
    for (const task of this.tasks) {
      try {
        await task.run();
        this.logger.info({ task: task.name }, "cleanup_task_completed");
      } catch (error) {
        failed = true;
        this.logger.error({ task: task.name, err: error }, "cleanup_task_failed");
      }
    }

    clearTimeout(timer);
    this.logger.info({ failed }, "shutdown_completed");
    this.exit(failed ? 1 : 0);
  }
}

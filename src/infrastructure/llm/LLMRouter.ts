import type { Logger } from "pino";
import { BoundModel, IChatModel, IModelBackend } from "../../application/contracts/IModelBackend";
import { ToolSpec } from "../../application/contracts/ITool";
import { Message } from "../../domain/entities/Message";
import {
  AllBackendsExhaustedError,
  BackendExhaustedError,
  ConfigurationError,
  describeCause
} from "../../domain/errors/AgentErrors";
import { classifyBackendError } from "./errorClassification";

export interface LLMRouterOptions {
  logger: Logger;
  /** Backend the cursor starts on; defaults to the highest priority one. */
  defaultBackend?: string;
  /** Attempts per backend before rotating. */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Dispatches chat calls over a ranked list of backends.
 *
 * Each call retries transient failures on the current backend with
 * exponential backoff, then rotates circularly to the next backend. The cursor
 * is sticky: a call that succeeds on a fallback leaves the next call starting
 * there rather than on the primary.
 */
export class LLMRouter implements IChatModel {
  private readonly backends: IModelBackend[];
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private cursor: number;
  private tools: ToolSpec[] = [];
  private readonly bound = new Map<IModelBackend, BoundModel>();

  constructor(backends: IModelBackend[], options: LLMRouterOptions) {
    if (backends.length === 0) {
      throw new ConfigurationError("LLMRouter needs at least one model backend");
    }
    this.backends = [...backends].sort((a, b) => a.config.priority - b.config.priority);
    this.logger = options.logger.child({ component: "llm-router" });
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = options.baseDelayMs ?? 2000;
    this.maxDelayMs = options.maxDelayMs ?? 10_000;
    this.sleep = options.sleep ?? defaultSleep;

    const preferred = this.backends.findIndex(b => b.config.name === options.defaultBackend);
    if (options.defaultBackend && preferred === -1) {
      this.logger.warn({ defaultBackend: options.defaultBackend }, "default_backend_not_registered");
    }
    this.cursor = Math.max(0, preferred);
    this.rebind(this.current);
  }

  get current(): IModelBackend {
    return this.backends[this.cursor];
  }

  get backendNames(): string[] {
    return this.backends.map(b => b.config.name);
  }

  bindTools(tools: ToolSpec[]): this {
    this.tools = [...tools];
    this.bound.clear();
    this.rebind(this.current);
    return this;
  }

  countTokens(messages: Message[]): number {
    return this.current.countTokens(messages);
  }

  /**
   * Each call walks the ring from where the cursor stood when it started, so
   * overlapping calls never skip or repeat a backend because of each other.
   */
  async call(messages: Message[]): Promise<Message> {
    const start = this.cursor;
    const attempted: string[] = [];
    let lastError: unknown;

    for (let tried = 0; tried < this.backends.length; tried++) {
      const index = (start + tried) % this.backends.length;
      const backend = this.backends[index];
      attempted.push(backend.config.name);

      try {
        const response = await this.callWithRetry(backend, messages);
        this.cursor = index;
        return response;
      } catch (error) {
        lastError = error;
        this.logger.error(
          { backend: backend.config.name, err: error },
          "backend_exhausted"
        );
        this.rotateFrom(index);
      }
    }

    this.logger.error({ attempted }, "all_backends_exhausted");
    throw new AllBackendsExhaustedError(attempted, { cause: lastError });
  }

  private async callWithRetry(backend: IModelBackend, messages: Message[]): Promise<Message> {
    const name = backend.config.name;

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.boundTo(backend).invoke(messages);
        this.logger.debug({ backend: name, attempt }, "backend_call_succeeded");
        return response;
      } catch (error) {
        const kind = classifyBackendError(error);
        if (kind === "structural" || attempt >= this.maxAttempts) {
          throw new BackendExhaustedError(name, attempt, { cause: error });
        }
        const delayMs = this.backoff(attempt);
        this.logger.warn(
          { backend: name, attempt, delayMs, error: describeCause(error) },
          "backend_call_retry"
        );
        await this.sleep(delayMs);
      }
    }
  }

  private backoff(attempt: number): number {
    return Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
  }

  /** Advances the shared cursor past `index` unless another call already moved it. */
  private rotateFrom(index: number): void {
    if (this.cursor !== index) return;
    const from = this.current.config.name;
    this.cursor = (index + 1) % this.backends.length;
    this.rebind(this.current);
    this.logger.warn({ from, to: this.current.config.name }, "backend_rotated");
  }

  private boundTo(backend: IModelBackend): BoundModel {
    return this.bound.get(backend) ?? this.rebind(backend);
  }

  private rebind(backend: IModelBackend): BoundModel {
    const model = backend.bindTools(this.tools);
    this.bound.set(backend, model);
    return model;
  }
}

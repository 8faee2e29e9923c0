export class AgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rate limit, timeout or upstream 5xx: worth another attempt on the same backend. */
export class TransientBackendError extends AgentError {
  constructor(readonly backend: string, message: string, options?: { cause?: unknown }) {
    super(`[${backend}] ${message}`, options);
  }
}

/** Bad request, auth failure or an unusable response: retrying will not help. */
export class StructuralBackendError extends AgentError {
  constructor(readonly backend: string, message: string, options?: { cause?: unknown }) {
    super(`[${backend}] ${message}`, options);
  }
}

export class BackendExhaustedError extends AgentError {
  constructor(readonly backend: string, readonly attempts: number, options?: { cause?: unknown }) {
    super(`Backend ${backend} failed after ${attempts} attempt(s)`, options);
  }
}

export class AllBackendsExhaustedError extends AgentError {
  constructor(readonly attempted: string[], options?: { cause?: unknown }) {
    super(`All model backends exhausted: ${attempted.join(", ")}`, options);
  }
}

export class ToolExecutionError extends AgentError {
  constructor(readonly toolName: string, options?: { cause?: unknown }) {
    super(`Tool ${toolName} failed: ${describeCause(options?.cause)}`, options);
  }
}

export class MemoryUnavailableError extends AgentError {}

export class CheckpointWriteError extends AgentError {
  constructor(readonly threadId: string, message: string, options?: { cause?: unknown }) {
    super(`Checkpoint write failed for thread ${threadId}: ${message}`, options);
  }
}

/** Another writer appended to the thread since its latest checkpoint was read. */
export class CheckpointConflictError extends CheckpointWriteError {
  constructor(threadId: string, readonly expectedSequenceNo: number | null) {
    super(threadId, `expected latest sequence ${expectedSequenceNo ?? "none"}`);
  }
}

export class ResourceExhaustedError extends AgentError {}

export class ConfigurationError extends AgentError {}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  return String(cause);
}

import { Pool } from "pg";
import type { Logger } from "pino";
import { ResourceExhaustedError } from "../../domain/errors/AgentErrors";

export interface PoolConfig {
  connectionString: string;
  maxConnections: number;
  /** How long a query waits for a free connection before failing. */
  acquireTimeoutMs: number;
}

export function createPool(config: PoolConfig, logger: Logger): Pool {
  const pool = new Pool({
    connectionString: config.connectionString,
    max: config.maxConnections,
    connectionTimeoutMillis: config.acquireTimeoutMs
  });

  pool.on("error", error => {
    logger.error({ err: error }, "postgres_idle_client_error");
  });

  return pool;
}

// node-postgres reports an exhausted pool with this message once connectionTimeoutMillis passes.
export function isPoolTimeout(error: unknown): boolean {
  return error instanceof Error && /timeout exceeded when trying to connect/i.test(error.message);
}

export function toResourceExhausted(error: unknown): unknown {
  return isPoolTimeout(error)
    ? new ResourceExhaustedError("Database connection pool exhausted", { cause: error })
    : error;
}

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

export const UNIQUE_VIOLATION = "23505";

import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export interface LoggerConfig {
  level?: "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
  pretty?: boolean;
  base?: Record<string, unknown>;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? "info",
    base: config.base ?? { service: "agent-service" }
  };

  if (config.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname"
      }
    };
  }

  return pino(options);
}

/** Logger that discards everything; for wiring components in tests and scripts. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

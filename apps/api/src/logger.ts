import pino, { type BaseLogger, type Logger, type LoggerOptions } from "pino";
import type { Env } from "./env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Where the pipeline reports what happened. Fire-and-forget: a sink never
 * throws back into the caller and never changes control flow.
 */
export interface DiagnosticsSink {
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
}

export function loggerOptions(env: Pick<Env, "NODE_ENV" | "LOG_LEVEL">): LoggerOptions {
  return {
    name: "catalog-builder",
    level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    transport:
      env.NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: {
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname"
            }
          }
        : undefined
  };
}

export function createLogger(env: Pick<Env, "NODE_ENV" | "LOG_LEVEL">): Logger {
  return pino(loggerOptions(env));
}

// Takes Fastify's request logger as well as a root pino instance.
export function createDiagnosticsSink(logger: Pick<BaseLogger, LogLevel>): DiagnosticsSink {
  return {
    log(level, message, context) {
      if (context) logger[level](context, message);
      else logger[level](message);
    }
  };
}

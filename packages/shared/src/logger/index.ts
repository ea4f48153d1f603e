/**
 * SealVote Logger
 * Structured logging with Pino
 *
 * Salts and unrevealed vote bits never leave the process through a log line:
 * every field that can carry them is censored at the serializer.
 */

import pino, { type Logger, type LoggerOptions } from "pino";
import type { z } from "zod";
import { envSchema } from "../schemas/env.js";

// ============================================
// LOGGER CONFIGURATION
// ============================================

const loggerEnvSchema = envSchema.pick({ LOG_LEVEL: true, LOG_FORMAT: true, NODE_ENV: true });

export type LoggerEnv = z.infer<typeof loggerEnvSchema>;

/** Paths censored in every log line */
export const REDACTED_PATHS = [
  "salt",
  "*.salt",
  "vote",
  "*.vote",
  "*.secret",
  "*.password",
];

export function buildLoggerOptions(env: LoggerEnv): LoggerOptions {
  const options: LoggerOptions = {
    level: env.LOG_LEVEL,
    base: { service: "sealvote", env: env.NODE_ENV },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACTED_PATHS, censor: "[REDACTED]" },
  };

  if (env.NODE_ENV === "development" && env.LOG_FORMAT === "pretty") {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
    };
  }
  return options;
}

// ============================================
// LOGGER INSTANCE
// ============================================

export const logger: Logger = pino(buildLoggerOptions(loggerEnvSchema.parse(process.env)));

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

export const governanceLogger = createServiceLogger("governance");
export const sdkLogger = createServiceLogger("sdk");

// ============================================
// AUDIT LOGGING
// ============================================

export interface AuditLogEntry {
  action: string;
  entityType: "dao" | "proposal" | "vote" | "delegation" | "treasury" | "voter_weight";
  entityId?: string;
  actor: string;
  details?: Record<string, unknown>;
}

/**
 * One line per committed state transition, keyed by the record it touched.
 */
export function audit(entry: AuditLogEntry, target: Logger = governanceLogger): void {
  const subject = entry.entityId ? `${entry.entityType} ${entry.entityId}` : entry.entityType;
  target.info({ audit: true, ...entry }, `${entry.action}: ${subject} by ${entry.actor}`);
}

// ============================================
// ERROR LOGGING
// ============================================

/**
 * Logs anything that was thrown. Governance errors keep their code.
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {},
  message?: string,
  target: Logger = logger
): void {
  const err = error instanceof Error ? error : new Error(String(error));
  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;

  target.error(
    {
      err: { name: err.name, message: err.message, stack: err.stack, ...(code !== undefined ? { code } : {}) },
      ...context,
    },
    message ?? err.message
  );
}

// ============================================
// REQUEST TIMING
// ============================================

/**
 * Starts a timer; the returned function logs and returns elapsed milliseconds.
 */
export function createTimer(operation: string, target: Logger = logger): () => number {
  const start = performance.now();

  return () => {
    const durationMs = Math.round((performance.now() - start) * 100) / 100;
    target.debug({ operation, durationMs }, `${operation} took ${durationMs}ms`);
    return durationMs;
  };
}

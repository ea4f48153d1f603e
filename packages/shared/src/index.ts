/**
 * @sealvote/shared
 * Shared logger, schemas and protocol constants
 */

// Export schemas (includes type definitions)
export * from "./schemas/index.js";

// Export constants (LIMITS, COMMITMENT, REVEAL_INCENTIVE, ...)
export * from "./constants/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  governanceLogger,
  sdkLogger,
  audit,
  logError,
  createTimer,
  buildLoggerOptions,
  REDACTED_PATHS,
  type LoggerEnv,
  type AuditLogEntry,
} from "./logger/index.js";

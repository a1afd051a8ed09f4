/**
 * Structured Logging System - Public API
 *
 * @example
 * ```typescript
 * import { ConsoleLogger } from "./logger-index.js";
 *
 * const logger = new ConsoleLogger({ level: "debug", component: "worktrack-channel" });
 * logger.info("Server started", { port: 8787 });
 * ```
 */

export type { LogLevel, LogEntry, Logger } from "./logger-types.js";

export { LOG_LEVEL_VALUES, isLogLevel } from "./logger-types.js";

export { BaseLogger } from "./logger-types.js";

export { NoOpLogger, ConsoleLogger, MemoryLogger } from "./logger-types.js";

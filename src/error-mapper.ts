/**
 * Error taxonomy for the command channel.
 *
 * Every ErrorCode has a fixed category, severity and (for transient failures)
 * a retry hint. Collaborators throw AppError; anything else is an internal
 * error whose detail is logged but never sent to the client.
 */

import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import type { CommandError, ErrorCategory, ErrorCode, ErrorSeverity, JsonValue } from "./types.js";

// ============================================================================
// CODE TABLE
// ============================================================================

interface ErrorCodeInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  /** Default retry hint in seconds */
  retryAfter?: number;
}

const ERROR_CODES: Record<ErrorCode, ErrorCodeInfo> = {
  AUTHENTICATION_FAILED: { category: "authentication", severity: "high" },
  TOKEN_EXPIRED: { category: "authentication", severity: "medium" },
  TOKEN_INVALID: { category: "authentication", severity: "high" },
  INVALID_SIGNATURE: { category: "security", severity: "critical" },
  REPLAY_ATTACK: { category: "security", severity: "critical" },
  MESSAGE_EXPIRED: { category: "security", severity: "high" },
  INVALID_MESSAGE_FORMAT: { category: "security", severity: "high" },
  PRINCIPAL_MISMATCH: { category: "security", severity: "critical" },
  NO_WORKSPACE: { category: "authorization", severity: "low" },
  PERMISSION_DENIED: { category: "authorization", severity: "medium" },
  COMMAND_NOT_FOUND: { category: "validation", severity: "low" },
  COMMAND_INVALID: { category: "validation", severity: "low" },
  COMMAND_FAILED: { category: "system", severity: "medium" },
  COMMAND_TIMEOUT: { category: "system", severity: "medium", retryAfter: 5 },
  IDEMPOTENCY_KEY_REQUIRED: { category: "validation", severity: "low" },
  VALIDATION_FAILED: { category: "validation", severity: "low" },
  RATE_LIMIT_EXCEEDED: { category: "ratelimit", severity: "medium" },
  NOT_FOUND: { category: "business", severity: "low" },
  CONFLICT: { category: "business", severity: "low" },
  INTERNAL_ERROR: { category: "system", severity: "critical" },
  DATABASE_ERROR: { category: "database", severity: "high", retryAfter: 10 },
  SERVICE_UNAVAILABLE: { category: "system", severity: "high", retryAfter: 30 },
  CONNECTION_LOST: { category: "network", severity: "medium" },
  MESSAGE_TOO_LARGE: { category: "validation", severity: "medium" },
};

export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return ERROR_CODES[code].category;
}

export function getErrorSeverity(code: ErrorCode): ErrorSeverity {
  return ERROR_CODES[code].severity;
}

export function getDefaultRetryAfter(code: ErrorCode): number | undefined {
  return ERROR_CODES[code].retryAfter;
}

/**
 * Build a wire error for a code. Retryable codes get their default hint
 * unless the caller supplies one.
 */
export function createCommandError(
  code: ErrorCode,
  message: string,
  options: { field?: string; details?: JsonValue; retryAfter?: number } = {}
): CommandError {
  const error: CommandError = {
    code,
    message,
    error_type: getErrorCategory(code),
  };
  if (options.field !== undefined) error.field = options.field;
  if (options.details !== undefined) error.details = options.details;
  const retryAfter = options.retryAfter ?? getDefaultRetryAfter(code);
  if (retryAfter !== undefined) error.retry_after = retryAfter;
  return error;
}

// ============================================================================
// COLLABORATOR ERRORS
// ============================================================================

export type AppErrorKind =
  | "validation"
  | "not_found"
  | "conflict"
  | "forbidden"
  | "no_workspace"
  | "unavailable"
  | "timeout"
  | "database"
  | "internal";

const KIND_TO_CODE: Record<AppErrorKind, ErrorCode> = {
  validation: "VALIDATION_FAILED",
  not_found: "NOT_FOUND",
  conflict: "CONFLICT",
  forbidden: "PERMISSION_DENIED",
  no_workspace: "NO_WORKSPACE",
  unavailable: "SERVICE_UNAVAILABLE",
  timeout: "COMMAND_TIMEOUT",
  database: "DATABASE_ERROR",
  internal: "INTERNAL_ERROR",
};

/** Kinds whose message may contain implementation detail. */
const OPAQUE_KINDS: ReadonlySet<AppErrorKind> = new Set(["database", "internal"]);

/**
 * Error thrown by domain collaborators.
 *
 * @example
 * throw new AppError("conflict", "Label with this name already exists", { field: "name" });
 */
export class AppError extends Error {
  readonly kind: AppErrorKind;
  readonly field?: string;
  readonly details?: JsonValue;
  /** Retry hint in seconds; overrides the code's default */
  readonly retryAfter?: number;

  constructor(
    kind: AppErrorKind,
    message: string,
    options: { field?: string; details?: JsonValue; retryAfter?: number } = {}
  ) {
    super(message);
    this.name = "AppError";
    this.kind = kind;
    this.field = options.field;
    this.details = options.details;
    this.retryAfter = options.retryAfter;
  }

  static notFound(what: string, id: string): AppError {
    return new AppError("not_found", `${what} not found`, { details: { id } });
  }
}

/**
 * Map any thrown value to a wire error.
 * Internal and database detail is logged and replaced with a generic message.
 */
export function toCommandError(error: unknown, logger: Logger = new NoOpLogger()): CommandError {
  if (error instanceof AppError) {
    const code = KIND_TO_CODE[error.kind];
    if (OPAQUE_KINDS.has(error.kind)) {
      logger.logError(`Collaborator ${error.kind} error`, error);
      return createCommandError(code, error.kind === "database" ? "Database error" : "Internal server error");
    }
    return createCommandError(code, error.message, {
      field: error.field,
      details: error.details,
      retryAfter: error.retryAfter,
    });
  }

  const err = error instanceof Error ? error : new Error(String(error));
  logger.logError("Unexpected error during command execution", err);
  return createCommandError("INTERNAL_ERROR", "Internal server error");
}

// ============================================================================
// STATISTICS
// ============================================================================

export interface RecordedError {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  category: ErrorCategory;
  timestamp: number;
  commandType?: string;
  userId?: string;
}

export interface ErrorStatsSnapshot {
  total: number;
  byCode: Partial<Record<ErrorCode, number>>;
  bySeverity: Partial<Record<ErrorSeverity, number>>;
  byCategory: Partial<Record<ErrorCategory, number>>;
  recent: RecordedError[];
}

const DEFAULT_MAX_RECENT = 1000;

/**
 * Counts errors sent to clients and keeps the most recent ones.
 */
export class ErrorStats {
  private total = 0;
  private readonly byCode = new Map<ErrorCode, number>();
  private readonly bySeverity = new Map<ErrorSeverity, number>();
  private readonly byCategory = new Map<ErrorCategory, number>();
  private readonly recent: RecordedError[] = [];
  private readonly maxRecent: number;

  constructor(maxRecent = DEFAULT_MAX_RECENT) {
    this.maxRecent = maxRecent > 0 ? maxRecent : DEFAULT_MAX_RECENT;
  }

  record(error: CommandError, context: { commandType?: string; userId?: string } = {}, now = Date.now()): void {
    const severity = getErrorSeverity(error.code);
    this.total++;
    this.byCode.set(error.code, (this.byCode.get(error.code) ?? 0) + 1);
    this.bySeverity.set(severity, (this.bySeverity.get(severity) ?? 0) + 1);
    this.byCategory.set(error.error_type, (this.byCategory.get(error.error_type) ?? 0) + 1);

    this.recent.push({
      code: error.code,
      message: error.message,
      severity,
      category: error.error_type,
      timestamp: now,
      commandType: context.commandType,
      userId: context.userId,
    });
    if (this.recent.length > this.maxRecent) {
      this.recent.splice(0, this.recent.length - this.maxRecent);
    }
  }

  getStats(): ErrorStatsSnapshot {
    return {
      total: this.total,
      byCode: Object.fromEntries(this.byCode),
      bySeverity: Object.fromEntries(this.bySeverity),
      byCategory: Object.fromEntries(this.byCategory),
      recent: [...this.recent],
    };
  }

  reset(): void {
    this.total = 0;
    this.byCode.clear();
    this.bySeverity.clear();
    this.byCategory.clear();
    this.recent.length = 0;
  }
}

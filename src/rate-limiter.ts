/**
 * RateLimiter - sliding-window request limits per principal.
 *
 * Two limits apply to every request:
 * - the principal's total within the window (maxRequests)
 * - the principal's count for the command type, where an override exists
 *
 * A rejected request is not recorded, so a client backing off as told by
 * retry_after is never penalised for the rejected attempts.
 */

import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import { MetricNames, MetricsEmitter } from "./metrics-index.js";

// ============================================================================
// CONFIG
// ============================================================================

export interface RateLimiterConfig {
  /** Window length in milliseconds (default: 60000) */
  windowMs: number;
  /** Maximum requests per principal per window (default: 100) */
  maxRequests: number;
  /** Per-command limits per principal per window */
  commandLimits: Record<string, number>;
  /** Sweep interval in milliseconds (default: 60000) */
  cleanupIntervalMs: number;
}

export const DEFAULT_COMMAND_LIMITS: Readonly<Record<string, number>> = {
  create_label: 10,
  update_label: 20,
  delete_label: 5,
  ping: 60,
};

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  windowMs: 60_000,
  maxRequests: 100,
  commandLimits: { ...DEFAULT_COMMAND_LIMITS },
  cleanupIntervalMs: 60_000,
};

// ============================================================================
// TYPES
// ============================================================================

export type RateLimitScope = "global" | "command";

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | {
      allowed: false;
      reason: string;
      /** Whole seconds until the oldest counted request leaves the window, at least 1 */
      retryAfter: number;
      limit: number;
      scope: RateLimitScope;
    };

export interface RateLimitUserStats {
  total_requests: number;
  command_counts: Record<string, number>;
  window_seconds: number;
}

interface RateLimitEntry {
  timestamp: number;
  commandType?: string;
}

// ============================================================================
// LIMITER
// ============================================================================

export class RateLimiter {
  private readonly windows = new Map<string, RateLimitEntry[]>();
  private readonly config: RateLimiterConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsEmitter;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private rejected = 0;

  constructor(
    config: Partial<RateLimiterConfig> = {},
    logger: Logger = new NoOpLogger(),
    metrics: MetricsEmitter = new MetricsEmitter()
  ) {
    this.config = {
      windowMs:
        typeof config.windowMs === "number" && config.windowMs > 0
          ? config.windowMs
          : DEFAULT_RATE_LIMITER_CONFIG.windowMs,
      maxRequests:
        typeof config.maxRequests === "number" && config.maxRequests > 0
          ? config.maxRequests
          : DEFAULT_RATE_LIMITER_CONFIG.maxRequests,
      commandLimits: { ...(config.commandLimits ?? DEFAULT_COMMAND_LIMITS) },
      cleanupIntervalMs:
        typeof config.cleanupIntervalMs === "number" && config.cleanupIntervalMs > 0
          ? config.cleanupIntervalMs
          : DEFAULT_RATE_LIMITER_CONFIG.cleanupIntervalMs,
    };
    this.logger = logger;
    this.metrics = metrics;
  }

  /**
   * Check a request and record it when admitted.
   * Check and record happen without an await between them.
   */
  check(principalId: string, commandType?: string, now = Date.now()): RateLimitDecision {
    const entries = this.liveEntries(principalId, now);

    if (entries.length >= this.config.maxRequests) {
      return this.reject(principalId, entries, now, this.config.maxRequests, "global", commandType);
    }

    const commandLimit = commandType !== undefined ? this.config.commandLimits[commandType] : undefined;
    if (commandType !== undefined && commandLimit !== undefined) {
      const commandEntries = entries.filter((e) => e.commandType === commandType);
      if (commandEntries.length >= commandLimit) {
        return this.reject(principalId, commandEntries, now, commandLimit, "command", commandType);
      }
    }

    entries.push({ timestamp: now, commandType });
    this.windows.set(principalId, entries);
    return { allowed: true, remaining: this.config.maxRequests - entries.length };
  }

  /**
   * Boolean form of check(). Records the request when it is admitted.
   */
  isRateLimited(principalId: string, commandType?: string, now = Date.now()): boolean {
    return !this.check(principalId, commandType, now).allowed;
  }

  getUserStats(principalId: string, now = Date.now()): RateLimitUserStats {
    const entries = this.liveEntries(principalId, now);
    const commandCounts: Record<string, number> = {};
    for (const entry of entries) {
      if (entry.commandType !== undefined) {
        commandCounts[entry.commandType] = (commandCounts[entry.commandType] ?? 0) + 1;
      }
    }
    return {
      total_requests: entries.length,
      command_counts: commandCounts,
      window_seconds: Math.floor(this.config.windowMs / 1000),
    };
  }

  /**
   * Forget every request recorded for a principal.
   */
  reset(principalId: string): void {
    this.windows.delete(principalId);
  }

  /**
   * Drop entries outside the window and principals left with none.
   * Returns the number of principals removed.
   */
  cleanupExpired(now = Date.now()): number {
    let removed = 0;
    for (const principalId of [...this.windows.keys()]) {
      if (this.liveEntries(principalId, now).length === 0) {
        this.windows.delete(principalId);
        removed++;
      }
    }
    return removed;
  }

  startPeriodicCleanup(): void {
    if (this.cleanupTimer) return;

    this.cleanupTimer = setInterval(() => {
      this.cleanupExpired();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stopPeriodicCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  getStats(): { trackedPrincipals: number; rejected: number; windowMs: number; maxRequests: number } {
    return {
      trackedPrincipals: this.windows.size,
      rejected: this.rejected,
      windowMs: this.config.windowMs,
      maxRequests: this.config.maxRequests,
    };
  }

  // ==========================================================================
  // PRIVATE
  // ==========================================================================

  /**
   * Entries still inside the window, oldest first. Prunes the stored list.
   */
  private liveEntries(principalId: string, now: number): RateLimitEntry[] {
    const stored = this.windows.get(principalId);
    if (!stored) return [];
    const windowStart = now - this.config.windowMs;
    const live = stored.filter((e) => e.timestamp > windowStart);
    if (live.length !== stored.length) {
      this.windows.set(principalId, live);
    }
    return live;
  }

  private reject(
    principalId: string,
    counted: RateLimitEntry[],
    now: number,
    limit: number,
    scope: RateLimitScope,
    commandType: string | undefined
  ): RateLimitDecision {
    const oldest = counted[0]?.timestamp ?? now;
    const retryAfter = Math.max(1, Math.ceil((oldest + this.config.windowMs - now) / 1000));

    this.rejected++;
    this.metrics.counter(MetricNames.RATE_LIMIT_REJECTED_TOTAL, 1, { scope, command_type: commandType });
    this.logger.debug("Rate limit exceeded", { principalId, commandType, scope, limit, retryAfter });

    const windowSeconds = Math.floor(this.config.windowMs / 1000);
    return {
      allowed: false,
      reason:
        scope === "global"
          ? `Rate limit exceeded (${limit} requests per ${windowSeconds}s)`
          : `Rate limit exceeded for ${commandType ?? "command"} (${limit} requests per ${windowSeconds}s)`,
      retryAfter,
      limit,
      scope,
    };
  }
}

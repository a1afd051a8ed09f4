/**
 * Idempotency Cache - at-most-once execution per (principal, idempotency key).
 *
 * Responsibilities:
 * - Completed responses, replayed unchanged for the TTL
 * - Single-flight: racing submissions of one key share one execution
 * - Fingerprint mismatch detection (same key, different payload)
 * - Bounded retention with a fixed TTL that reads never extend
 *
 * Records leave only by TTL. Every execution reserves its slot before it
 * starts; when records plus in-flight executions reach maxRecords, a new key
 * is refused with a retryable SERVICE_UNAVAILABLE instead of forgetting a
 * key that already ran.
 */

import { BoundedMap } from "./bounded-map.js";
import { AppError } from "./error-mapper.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import { canonicalJson } from "./message-authenticator.js";
import { MetricNames, MetricsEmitter } from "./metrics-index.js";
import type { Command, CommandResponse } from "./types.js";
import { SYNTHETIC_KEY_PREFIX } from "./validation.js";

/** How long completed responses are replayable (5 minutes). */
const DEFAULT_TTL_MS = 5 * 60 * 1000;

/** Maximum number of records plus in-flight executions. */
const DEFAULT_MAX_RECORDS = 10_000;

const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;

/**
 * Record of a completed execution.
 */
export interface IdempotencyRecord {
  commandType: string;
  fingerprint: string;
  response: CommandResponse;
}

interface InFlightRecord {
  fingerprint: string;
  promise: Promise<CommandResponse>;
}

/**
 * What a compute function reports back to the cache.
 * `cacheable: false` keeps the response out of the cache (retryable failures).
 */
export interface ComputeOutcome {
  response: CommandResponse;
  cacheable: boolean;
}

/**
 * Where a getOrCompute response came from.
 */
export type IdempotencySource = "cache" | "inflight" | "computed";

export interface IdempotencyResult {
  response: CommandResponse;
  source: IdempotencySource;
}

export interface IdempotencyCacheOptions {
  ttlMs?: number;
  maxRecords?: number;
  cleanupIntervalMs?: number;
}

export interface IdempotencyCacheStats {
  records: number;
  inFlight: number;
  hits: number;
  misses: number;
  /** New keys refused because the store was full */
  refused: number;
  payloadMismatches: number;
  ttlMs: number;
  maxRecords: number;
}

export class IdempotencyCache {
  private readonly records: BoundedMap<string, IdempotencyRecord>;
  private readonly inFlight = new Map<string, InFlightRecord>();
  private readonly ttlMs: number;
  private readonly maxRecords: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsEmitter;

  private hits = 0;
  private misses = 0;
  private refused = 0;
  private payloadMismatches = 0;

  /** Sequence for synthetic keys when the client sends none. */
  private syntheticSequence = 0;
  /** Distinguishes synthetic keys across restarts. */
  private readonly processStartTime = Date.now();

  constructor(
    options: IdempotencyCacheOptions = {},
    logger: Logger = new NoOpLogger(),
    metrics: MetricsEmitter = new MetricsEmitter()
  ) {
    this.ttlMs = typeof options.ttlMs === "number" && options.ttlMs > 0 ? options.ttlMs : DEFAULT_TTL_MS;
    this.maxRecords =
      typeof options.maxRecords === "number" && options.maxRecords > 0 ? options.maxRecords : DEFAULT_MAX_RECORDS;
    this.records = new BoundedMap({
      ttlMs: this.ttlMs,
      maxSize: this.maxRecords,
      cleanupIntervalMs:
        typeof options.cleanupIntervalMs === "number" && options.cleanupIntervalMs > 0
          ? options.cleanupIntervalMs
          : DEFAULT_CLEANUP_INTERVAL_MS,
    });
    this.logger = logger;
    this.metrics = metrics;
  }

  // ==========================================================================
  // KEYS AND FINGERPRINTS
  // ==========================================================================

  /**
   * Generate a key for a command sent without one. Synthetic keys are never cached.
   */
  createSyntheticKey(): string {
    this.syntheticSequence += 1;
    return `${SYNTHETIC_KEY_PREFIX}${this.processStartTime}:${this.syntheticSequence}`;
  }

  isSyntheticKey(key: string): boolean {
    return key.startsWith(SYNTHETIC_KEY_PREFIX);
  }

  /**
   * Fingerprint of a command's business payload.
   * Excludes idempotency_key and request_id, which identify the attempt, not the work.
   */
  fingerprint(command: Command): string {
    const { idempotency_key: _key, request_id: _requestId, ...rest } = command;
    return canonicalJson(rest);
  }

  private scopedKey(scope: string, key: string): string {
    return `${scope}:${key}`;
  }

  // ==========================================================================
  // LOOKUP AND STORE
  // ==========================================================================

  /**
   * Cached response for a key, or undefined if absent or expired.
   */
  isProcessed(scope: string, key: string, now = Date.now()): CommandResponse | undefined {
    return this.records.get(this.scopedKey(scope, key), now)?.response;
  }

  /**
   * Store a completed response. An existing record for the key is kept;
   * the first result wins.
   */
  markProcessed(
    scope: string,
    key: string,
    response: CommandResponse,
    fingerprint = "",
    now = Date.now()
  ): void {
    const scoped = this.scopedKey(scope, key);
    if (this.records.has(scoped, now)) return;
    if (!this.records.set(scoped, { commandType: response.command_type, fingerprint, response }, now)) {
      this.logger.warn("Idempotency store full; response not recorded", { key: scoped });
    }
  }

  /**
   * Return the cached response for a key, join an in-flight execution of it,
   * or run `compute` and cache its outcome.
   *
   * Lookup and in-flight registration happen synchronously, so concurrent
   * callers on one key can never both run `compute`.
   *
   * @throws AppError("unavailable") when a new key finds the store full
   */
  async getOrCompute(
    scope: string,
    key: string,
    fingerprint: string,
    compute: () => Promise<ComputeOutcome>,
    now = Date.now()
  ): Promise<IdempotencyResult> {
    const scoped = this.scopedKey(scope, key);

    const cached = this.records.get(scoped, now);
    if (cached) {
      this.hits++;
      this.metrics.counter(MetricNames.IDEMPOTENCY_HITS_TOTAL, 1, { source: "cache" });
      this.checkFingerprint(scoped, cached.fingerprint, fingerprint);
      return { response: cached.response, source: "cache" };
    }

    const pending = this.inFlight.get(scoped);
    if (pending) {
      this.hits++;
      this.metrics.counter(MetricNames.IDEMPOTENCY_HITS_TOTAL, 1, { source: "inflight" });
      this.checkFingerprint(scoped, pending.fingerprint, fingerprint);
      return { response: await pending.promise, source: "inflight" };
    }

    if (!this.records.hasRoom(now, this.inFlight.size)) {
      this.refused++;
      const retryAfter = this.retryAfterSeconds(now);
      this.logger.warn("Idempotency store full; refusing new key", { key: scoped, retryAfter });
      throw new AppError("unavailable", "Too many recent commands to track; retry later", { retryAfter });
    }

    this.misses++;
    const record: InFlightRecord = {
      fingerprint,
      promise: this.runCompute(scoped, fingerprint, compute, now),
    };
    this.inFlight.set(scoped, record);

    try {
      return { response: await record.promise, source: "computed" };
    } finally {
      if (this.inFlight.get(scoped) === record) {
        this.inFlight.delete(scoped);
      }
    }
  }

  /**
   * Remove expired records. Returns the count removed.
   */
  cleanupExpired(now = Date.now()): number {
    const removed = this.records.cleanup(now);
    if (removed > 0) {
      this.logger.debug("Expired idempotency records removed", { removed });
    }
    return removed;
  }

  startPeriodicCleanup(): void {
    this.records.startPeriodicCleanup();
  }

  stopPeriodicCleanup(): void {
    this.records.stopPeriodicCleanup();
  }

  getStats(): IdempotencyCacheStats {
    return {
      records: this.records.size,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
      refused: this.refused,
      payloadMismatches: this.payloadMismatches,
      ttlMs: this.ttlMs,
      maxRecords: this.maxRecords,
    };
  }

  /**
   * Clear all state. The synthetic sequence is not reset.
   */
  clear(): void {
    this.records.clear();
    this.inFlight.clear();
    this.hits = 0;
    this.misses = 0;
    this.refused = 0;
    this.payloadMismatches = 0;
  }

  // ==========================================================================
  // PRIVATE
  // ==========================================================================

  private async runCompute(
    scoped: string,
    fingerprint: string,
    compute: () => Promise<ComputeOutcome>,
    now: number
  ): Promise<CommandResponse> {
    const outcome = await compute();
    if (
      outcome.cacheable &&
      !this.records.set(scoped, { commandType: outcome.response.command_type, fingerprint, response: outcome.response }, now)
    ) {
      this.logger.warn("Idempotency store full; response not recorded", { key: scoped });
    }
    return outcome.response;
  }

  private retryAfterSeconds(now: number): number {
    const next = this.records.nextExpiry() ?? now + this.ttlMs;
    return Math.max(1, Math.ceil((next - now) / 1000));
  }

  private checkFingerprint(scoped: string, original: string, current: string): void {
    if (original === "" || original === current) return;
    this.payloadMismatches++;
    this.metrics.counter(MetricNames.IDEMPOTENCY_PAYLOAD_MISMATCH_TOTAL);
    this.logger.warn("Idempotency key reused with a different payload; returning the first result", {
      key: scoped,
    });
  }
}

/**
 * Unit tests for idempotency-cache.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { AppError } from "./error-mapper.js";
import { IdempotencyCache, type ComputeOutcome } from "./idempotency-cache.js";
import { MemoryLogger } from "./logger-types.js";
import { MemorySink, MetricNames, MetricsEmitter } from "./metrics-index.js";
import type { Command, CommandResponse } from "./types.js";

const T0 = 1_700_000_000_000;

function response(key: string, data: string): CommandResponse {
  return {
    command_type: "create_label",
    idempotency_key: key,
    success: true,
    data,
    timestamp: new Date(T0).toISOString(),
  };
}

function outcome(key: string, data: string, cacheable = true): ComputeOutcome {
  return { response: response(key, data), cacheable };
}

describe("idempotency-cache", () => {
  // ==========================================================================
  // getOrCompute
  // ==========================================================================

  describe("getOrCompute", () => {
    it("computes once and serves the cached response afterwards", async () => {
      const cache = new IdempotencyCache();
      let calls = 0;
      const compute = async () => {
        calls++;
        return outcome("k1", "first");
      };

      const first = await cache.getOrCompute("u-1", "k1", "fp", compute, T0);
      const second = await cache.getOrCompute("u-1", "k1", "fp", compute, T0 + 1000);

      assert.strictEqual(calls, 1);
      assert.strictEqual(first.source, "computed");
      assert.strictEqual(second.source, "cache");
      assert.deepStrictEqual(second.response, first.response);
    });

    it("runs one computation for concurrent submissions of a key", async () => {
      const cache = new IdempotencyCache();
      let calls = 0;
      let release: (() => void) | undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const compute = async () => {
        calls++;
        await gate;
        return outcome("k1", "shared");
      };

      const a = cache.getOrCompute("u-1", "k1", "fp", compute, T0);
      const b = cache.getOrCompute("u-1", "k1", "fp", compute, T0);
      assert.strictEqual(cache.getStats().inFlight, 1);
      release?.();

      const [ra, rb] = await Promise.all([a, b]);
      assert.strictEqual(calls, 1);
      assert.strictEqual(ra.source, "computed");
      assert.strictEqual(rb.source, "inflight");
      assert.strictEqual(rb.response.data, "shared");
      assert.strictEqual(cache.getStats().inFlight, 0);
    });

    it("scopes keys per principal", async () => {
      const cache = new IdempotencyCache();
      await cache.getOrCompute("u-1", "k1", "fp", async () => outcome("k1", "one"), T0);
      const other = await cache.getOrCompute("u-2", "k1", "fp", async () => outcome("k1", "two"), T0);

      assert.strictEqual(other.source, "computed");
      assert.strictEqual(other.response.data, "two");
    });

    it("does not cache outcomes marked uncacheable", async () => {
      const cache = new IdempotencyCache();
      let calls = 0;
      const compute = async () => {
        calls++;
        return outcome("k1", `attempt-${calls}`, false);
      };

      await cache.getOrCompute("u-1", "k1", "fp", compute, T0);
      const retry = await cache.getOrCompute("u-1", "k1", "fp", compute, T0);

      assert.strictEqual(calls, 2);
      assert.strictEqual(retry.response.data, "attempt-2");
      assert.strictEqual(cache.getStats().records, 0);
    });

    it("recomputes once the TTL has elapsed", async () => {
      const cache = new IdempotencyCache({ ttlMs: 1000 });
      let calls = 0;
      const compute = async () => {
        calls++;
        return outcome("k1", `attempt-${calls}`);
      };

      await cache.getOrCompute("u-1", "k1", "fp", compute, T0);
      const hit = await cache.getOrCompute("u-1", "k1", "fp", compute, T0 + 999);
      const expired = await cache.getOrCompute("u-1", "k1", "fp", compute, T0 + 1000);

      assert.strictEqual(hit.source, "cache");
      assert.strictEqual(expired.source, "computed");
      assert.strictEqual(expired.response.data, "attempt-2");
    });

    it("returns the first result for a reused key with a different payload", async () => {
      const logger = new MemoryLogger();
      const sink = new MemorySink();
      const cache = new IdempotencyCache({}, logger, new MetricsEmitter({ sink }));

      await cache.getOrCompute("u-1", "k1", "fp-a", async () => outcome("k1", "original"), T0);
      const reused = await cache.getOrCompute("u-1", "k1", "fp-b", async () => outcome("k1", "other"), T0);

      assert.strictEqual(reused.source, "cache");
      assert.strictEqual(reused.response.data, "original");
      assert.strictEqual(cache.getStats().payloadMismatches, 1);
      assert.strictEqual(sink.getCounterTotal(MetricNames.IDEMPOTENCY_PAYLOAD_MISMATCH_TOTAL), 1);
      assert.deepStrictEqual(logger.messages("warn"), [
        "Idempotency key reused with a different payload; returning the first result",
      ]);
    });

    it("releases the in-flight slot when the computation throws", async () => {
      const cache = new IdempotencyCache();
      await assert.rejects(
        cache.getOrCompute("u-1", "k1", "fp", async () => {
          throw new Error("boom");
        }),
        /boom/
      );
      assert.strictEqual(cache.getStats().inFlight, 0);

      const retry = await cache.getOrCompute("u-1", "k1", "fp", async () => outcome("k1", "ok"), T0);
      assert.strictEqual(retry.source, "computed");
    });
  });

  // ==========================================================================
  // CAPACITY
  // ==========================================================================

  describe("capacity", () => {
    it("refuses a new key when full and keeps serving the recorded one", async () => {
      const logger = new MemoryLogger();
      const cache = new IdempotencyCache({ maxRecords: 1 }, logger);
      let calls = 0;
      const compute = async () => {
        calls++;
        return outcome("k1", "first");
      };

      await cache.getOrCompute("u-1", "k1", "fp", compute, T0);
      await assert.rejects(
        cache.getOrCompute("u-1", "k2", "fp", compute, T0 + 1000),
        (error: unknown) =>
          error instanceof AppError &&
          error.kind === "unavailable" &&
          error.retryAfter === 299 &&
          error.message === "Too many recent commands to track; retry later"
      );

      const again = await cache.getOrCompute("u-1", "k1", "fp", compute, T0 + 2000);
      assert.strictEqual(again.source, "cache");
      assert.strictEqual(calls, 1);
      assert.strictEqual(cache.getStats().refused, 1);
      assert.deepStrictEqual(logger.messages("warn"), ["Idempotency store full; refusing new key"]);
    });

    it("counts in-flight executions against the limit", async () => {
      const cache = new IdempotencyCache({ maxRecords: 1 });
      let release: (() => void) | undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const first = cache.getOrCompute(
        "u-1",
        "k1",
        "fp",
        async () => {
          await gate;
          return outcome("k1", "first");
        },
        T0
      );

      await assert.rejects(
        cache.getOrCompute("u-1", "k2", "fp", async () => outcome("k2", "second"), T0),
        (error: unknown) => error instanceof AppError && error.kind === "unavailable"
      );

      release?.();
      assert.strictEqual((await first).source, "computed");
      assert.strictEqual(cache.getStats().records, 1);
    });

    it("accepts new keys again once records expire", async () => {
      const cache = new IdempotencyCache({ ttlMs: 1000, maxRecords: 1 });
      await cache.getOrCompute("u-1", "k1", "fp", async () => outcome("k1", "a"), T0);
      const later = await cache.getOrCompute("u-1", "k2", "fp", async () => outcome("k2", "b"), T0 + 1000);
      assert.strictEqual(later.source, "computed");
    });
  });

  // ==========================================================================
  // isProcessed / markProcessed
  // ==========================================================================

  describe("markProcessed", () => {
    it("keeps the first record for a key", () => {
      const cache = new IdempotencyCache();
      cache.markProcessed("u-1", "k1", response("k1", "first"), "", T0);
      cache.markProcessed("u-1", "k1", response("k1", "second"), "", T0);

      assert.strictEqual(cache.isProcessed("u-1", "k1", T0)?.data, "first");
      assert.strictEqual(cache.isProcessed("u-2", "k1", T0), undefined);
    });
  });

  describe("cleanupExpired", () => {
    it("drops records older than the TTL", () => {
      const cache = new IdempotencyCache({ ttlMs: 1000 });
      cache.markProcessed("u-1", "k1", response("k1", "a"), "", T0);
      cache.markProcessed("u-1", "k2", response("k2", "b"), "", T0 + 500);

      assert.strictEqual(cache.cleanupExpired(T0 + 1000), 1);
      assert.strictEqual(cache.getStats().records, 1);
    });
  });

  // ==========================================================================
  // KEYS
  // ==========================================================================

  describe("keys and fingerprints", () => {
    it("generates distinct synthetic keys with the reserved prefix", () => {
      const cache = new IdempotencyCache();
      const a = cache.createSyntheticKey();
      const b = cache.createSyntheticKey();

      assert.notStrictEqual(a, b);
      assert.strictEqual(cache.isSyntheticKey(a), true);
      assert.strictEqual(cache.isSyntheticKey("client-key"), false);
    });

    it("ignores idempotency_key and request_id in the fingerprint", () => {
      const cache = new IdempotencyCache();
      const a: Command = { type: "delete_label", label_id: "l-1", idempotency_key: "k1", request_id: "r1" };
      const b: Command = { type: "delete_label", label_id: "l-1", idempotency_key: "k2" };
      const c: Command = { type: "delete_label", label_id: "l-2", idempotency_key: "k1" };

      assert.strictEqual(cache.fingerprint(a), cache.fingerprint(b));
      assert.notStrictEqual(cache.fingerprint(a), cache.fingerprint(c));
      assert.strictEqual(cache.fingerprint(a), '{"label_id":"l-1","type":"delete_label"}');
    });
  });
});

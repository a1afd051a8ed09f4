/**
 * Unit tests for rate-limiter.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { MemorySink, MetricNames, MetricsEmitter } from "./metrics-index.js";
import { NoOpLogger } from "./logger-types.js";
import { RateLimiter } from "./rate-limiter.js";

const T0 = 1_700_000_000_000;

describe("rate-limiter", () => {
  describe("check", () => {
    it("admits up to maxRequests per window and rejects the next", () => {
      const limiter = new RateLimiter({ windowMs: 60_000, maxRequests: 3, commandLimits: {} });

      assert.deepStrictEqual(limiter.check("u-1", "query_labels", T0), { allowed: true, remaining: 2 });
      assert.deepStrictEqual(limiter.check("u-1", "query_labels", T0 + 1), { allowed: true, remaining: 1 });
      assert.deepStrictEqual(limiter.check("u-1", "query_labels", T0 + 2), { allowed: true, remaining: 0 });

      assert.deepStrictEqual(limiter.check("u-1", "query_labels", T0 + 10_000), {
        allowed: false,
        reason: "Rate limit exceeded (3 requests per 60s)",
        retryAfter: 50,
        limit: 3,
        scope: "global",
      });
    });

    it("applies command overrides below the global limit", () => {
      const limiter = new RateLimiter({ maxRequests: 100, commandLimits: { delete_label: 2 } });
      limiter.check("u-1", "delete_label", T0);
      limiter.check("u-1", "delete_label", T0);

      const decision = limiter.check("u-1", "delete_label", T0 + 500);
      assert.deepStrictEqual(decision, {
        allowed: false,
        reason: "Rate limit exceeded for delete_label (2 requests per 60s)",
        retryAfter: 60,
        limit: 2,
        scope: "command",
      });
      assert.strictEqual(limiter.check("u-1", "query_labels", T0 + 500).allowed, true);
    });

    it("uses the default overrides when none are configured", () => {
      const limiter = new RateLimiter();
      for (let i = 0; i < 5; i++) {
        assert.strictEqual(limiter.check("u-1", "delete_label", T0).allowed, true);
      }
      assert.strictEqual(limiter.check("u-1", "delete_label", T0).allowed, false);
    });

    it("keeps principals independent", () => {
      const limiter = new RateLimiter({ maxRequests: 1, commandLimits: {} });
      assert.strictEqual(limiter.check("u-1", "ping", T0).allowed, true);
      assert.strictEqual(limiter.check("u-2", "ping", T0).allowed, true);
      assert.strictEqual(limiter.check("u-1", "ping", T0).allowed, false);
    });

    it("admits again once the oldest request leaves the window", () => {
      const limiter = new RateLimiter({ windowMs: 1000, maxRequests: 1, commandLimits: {} });
      limiter.check("u-1", "ping", T0);

      assert.strictEqual(limiter.check("u-1", "ping", T0 + 999).allowed, false);
      assert.strictEqual(limiter.check("u-1", "ping", T0 + 1000).allowed, true);
    });

    it("does not record rejected requests", () => {
      const limiter = new RateLimiter({ windowMs: 1000, maxRequests: 2, commandLimits: {} });
      limiter.check("u-1", "ping", T0);
      limiter.check("u-1", "ping", T0 + 100);
      for (let i = 0; i < 5; i++) {
        limiter.check("u-1", "ping", T0 + 200);
      }

      assert.strictEqual(limiter.getUserStats("u-1", T0 + 200).total_requests, 2);
      // Only the first request has left the window
      assert.strictEqual(limiter.check("u-1", "ping", T0 + 1000).allowed, true);
    });

    it("never reports retryAfter below one second", () => {
      const limiter = new RateLimiter({ windowMs: 1000, maxRequests: 1, commandLimits: {} });
      limiter.check("u-1", "ping", T0);
      const decision = limiter.check("u-1", "ping", T0 + 999);
      assert.strictEqual(decision.allowed, false);
      if (!decision.allowed) assert.strictEqual(decision.retryAfter, 1);
    });

    it("counts rejections in metrics", () => {
      const sink = new MemorySink();
      const limiter = new RateLimiter(
        { maxRequests: 1, commandLimits: {} },
        new NoOpLogger(),
        new MetricsEmitter({ sink })
      );
      limiter.check("u-1", "ping", T0);
      limiter.check("u-1", "ping", T0);

      assert.strictEqual(sink.getCounterTotal(MetricNames.RATE_LIMIT_REJECTED_TOTAL), 1);
      assert.strictEqual(limiter.getStats().rejected, 1);
    });
  });

  describe("isRateLimited", () => {
    it("is the boolean form of check", () => {
      const limiter = new RateLimiter({ maxRequests: 1, commandLimits: {} });
      assert.strictEqual(limiter.isRateLimited("u-1", undefined, T0), false);
      assert.strictEqual(limiter.isRateLimited("u-1", undefined, T0), true);
    });
  });

  describe("getUserStats", () => {
    it("reports totals and per-command counts inside the window", () => {
      const limiter = new RateLimiter({ windowMs: 60_000 });
      limiter.check("u-1", "create_label", T0);
      limiter.check("u-1", "create_label", T0);
      limiter.check("u-1", "ping", T0);
      limiter.check("u-1", undefined, T0);

      assert.deepStrictEqual(limiter.getUserStats("u-1", T0), {
        total_requests: 4,
        command_counts: { create_label: 2, ping: 1 },
        window_seconds: 60,
      });
    });
  });

  describe("reset", () => {
    it("forgets a principal's requests", () => {
      const limiter = new RateLimiter({ maxRequests: 1, commandLimits: {} });
      limiter.check("u-1", "ping", T0);
      limiter.reset("u-1");
      assert.strictEqual(limiter.check("u-1", "ping", T0).allowed, true);
    });
  });

  describe("cleanupExpired", () => {
    it("removes principals with no requests left in the window", () => {
      const limiter = new RateLimiter({ windowMs: 1000 });
      limiter.check("u-1", "ping", T0);
      limiter.check("u-2", "ping", T0 + 500);

      assert.strictEqual(limiter.cleanupExpired(T0 + 1000), 1);
      assert.strictEqual(limiter.getStats().trackedPrincipals, 1);
    });
  });
});

/**
 * Unit tests for bounded-map.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { BoundedMap } from "./bounded-map.js";

describe("bounded-map", () => {
  describe("ttl", () => {
    it("serves an entry until its TTL elapses", () => {
      const map = new BoundedMap<string, number>({ ttlMs: 1000 });
      map.set("a", 1, 0);

      assert.strictEqual(map.get("a", 999), 1);
      assert.strictEqual(map.get("a", 1000), undefined);
      assert.strictEqual(map.getStats().ttlEvictions, 1);
    });

    it("does not extend the TTL on read", () => {
      const map = new BoundedMap<string, number>({ ttlMs: 1000 });
      map.set("a", 1, 0);
      map.get("a", 900);
      assert.strictEqual(map.has("a", 1000), false);
    });

    it("restarts the TTL when a key is set again", () => {
      const map = new BoundedMap<string, number>({ ttlMs: 1000 });
      map.set("a", 1, 0);
      map.set("a", 2, 500);
      assert.deepStrictEqual(map.getEntry("a", 1200), { value: 2, insertedAt: 500 });
    });

    it("keeps entries forever when ttlMs is 0", () => {
      const map = new BoundedMap<string, number>();
      map.set("a", 1, 0);
      assert.strictEqual(map.get("a", Number.MAX_SAFE_INTEGER), 1);
      assert.strictEqual(map.cleanup(Number.MAX_SAFE_INTEGER), 0);
    });

    it("honours a per-entry TTL", () => {
      const map = new BoundedMap<string, number>({ ttlMs: 1000 });
      map.set("a", 1, 0, 5000);
      assert.strictEqual(map.get("a", 4999), 1);
      assert.strictEqual(map.get("a", 5000), undefined);
    });
  });

  describe("maxSize", () => {
    it("refuses a new key instead of evicting a live entry", () => {
      const map = new BoundedMap<string, number>({ maxSize: 2 });
      assert.strictEqual(map.set("a", 1, 0), true);
      assert.strictEqual(map.set("b", 2, 1), true);
      assert.strictEqual(map.set("c", 3, 2), false);

      assert.strictEqual(map.get("a", 3), 1);
      assert.strictEqual(map.get("b", 3), 2);
      assert.strictEqual(map.has("c", 3), false);
      assert.strictEqual(map.getStats().rejectedWhenFull, 1);
    });

    it("still replaces an existing key when full", () => {
      const map = new BoundedMap<string, number>({ maxSize: 1 });
      map.set("a", 1, 0);
      assert.strictEqual(map.set("a", 2, 1), true);
      assert.strictEqual(map.get("a", 2), 2);
    });

    it("makes room by dropping expired entries", () => {
      const map = new BoundedMap<string, number>({ maxSize: 2, ttlMs: 100 });
      map.set("a", 1, 0);
      map.set("b", 2, 150);
      assert.strictEqual(map.set("c", 3, 160), true);

      assert.strictEqual(map.get("b", 170), 2);
      assert.strictEqual(map.getStats().rejectedWhenFull, 0);
      assert.strictEqual(map.getStats().ttlEvictions, 1);
    });

    it("counts reserved slots in hasRoom", () => {
      const map = new BoundedMap<string, number>({ maxSize: 3 });
      map.set("a", 1, 0);
      assert.strictEqual(map.hasRoom(0, 1), true);
      assert.strictEqual(map.hasRoom(0, 2), false);
    });
  });

  describe("nextExpiry", () => {
    it("returns the earliest expiry", () => {
      const map = new BoundedMap<string, number>({ ttlMs: 1000 });
      assert.strictEqual(map.nextExpiry(), undefined);
      map.set("a", 1, 500);
      map.set("b", 2, 100, 200);
      assert.strictEqual(map.nextExpiry(), 300);
    });
  });

  describe("cleanup", () => {
    it("removes expired entries and reports the count", () => {
      const map = new BoundedMap<string, number>({ ttlMs: 100 });
      map.set("a", 1, 0);
      map.set("b", 2, 50);
      map.set("c", 3, 90);

      assert.strictEqual(map.cleanup(140), 1);
      assert.strictEqual(map.size, 2);
    });

    it("starts and stops periodic cleanup idempotently", () => {
      const map = new BoundedMap<string, number>({ ttlMs: 100, cleanupIntervalMs: 10 });
      map.startPeriodicCleanup();
      map.startPeriodicCleanup();
      map.stopPeriodicCleanup();
      map.stopPeriodicCleanup();
      assert.strictEqual(map.size, 0);
    });
  });

  describe("delete", () => {
    it("counts deletions of present keys only", () => {
      const map = new BoundedMap<string, number>();
      map.set("a", 1, 0);
      assert.strictEqual(map.delete("a"), true);
      assert.strictEqual(map.delete("a"), false);
      assert.strictEqual(map.getStats().deletions, 1);
    });
  });
});

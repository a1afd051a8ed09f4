/**
 * Unit tests for command-lanes.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { CommandLanes, withTimeout } from "./command-lanes.js";
import { AppError } from "./error-mapper.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("command-lanes", () => {
  describe("runOnLane", () => {
    it("runs tasks on one lane in submission order", async () => {
      const lanes = new CommandLanes();
      const order: string[] = [];

      const slow = lanes.runOnLane("connection:a", async () => {
        await delay(20);
        order.push("first");
        return 1;
      });
      const fast = lanes.runOnLane("connection:a", async () => {
        order.push("second");
        return 2;
      });

      assert.deepStrictEqual(await Promise.all([slow, fast]), [1, 2]);
      assert.deepStrictEqual(order, ["first", "second"]);
    });

    it("runs different lanes concurrently", async () => {
      const lanes = new CommandLanes();
      const order: string[] = [];

      const a = lanes.runOnLane("connection:a", async () => {
        await delay(20);
        order.push("a");
      });
      const b = lanes.runOnLane("connection:b", async () => {
        order.push("b");
      });

      await Promise.all([a, b]);
      assert.deepStrictEqual(order, ["b", "a"]);
    });

    it("keeps a lane going after a task fails", async () => {
      const lanes = new CommandLanes();
      const failing = lanes.runOnLane("connection:a", async () => {
        throw new Error("boom");
      });
      const next = lanes.runOnLane("connection:a", async () => "ok");

      await assert.rejects(failing, /boom/);
      assert.strictEqual(await next, "ok");
    });

    it("drops a lane once it drains", async () => {
      const lanes = new CommandLanes();
      const running = lanes.runOnLane("connection:a", async () => delay(5));
      assert.strictEqual(lanes.getStats().laneCount, 1);
      await running;
      assert.strictEqual(lanes.getStats().laneCount, 0);
    });

    it("keys lanes by connection id", () => {
      assert.strictEqual(CommandLanes.forConnection("c-1"), "connection:c-1");
    });
  });

  describe("withTimeout", () => {
    it("passes through a result that arrives in time", async () => {
      assert.strictEqual(await withTimeout(Promise.resolve("done"), 1000, "ping"), "done");
    });

    it("passes through a rejection that arrives in time", async () => {
      await assert.rejects(withTimeout(Promise.reject(new Error("failed")), 1000, "ping"), /failed/);
    });

    it("rejects with a timeout AppError when the deadline passes", async () => {
      const never = new Promise<never>(() => undefined);
      await assert.rejects(withTimeout(never, 10, "query_issues"), (error: unknown) => {
        assert.ok(error instanceof AppError);
        assert.strictEqual(error.kind, "timeout");
        assert.strictEqual(error.message, "Command 'query_issues' timed out after 10ms");
        return true;
      });
    });
  });
});

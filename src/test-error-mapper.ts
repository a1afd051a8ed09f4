/**
 * Unit tests for error-mapper.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import {
  AppError,
  ErrorStats,
  createCommandError,
  getErrorCategory,
  getErrorSeverity,
  toCommandError,
} from "./error-mapper.js";
import { MemoryLogger } from "./logger-types.js";

describe("error-mapper", () => {
  describe("createCommandError", () => {
    it("fills in the category for the code", () => {
      assert.deepStrictEqual(createCommandError("NOT_FOUND", "Label not found", { details: { id: "l-1" } }), {
        code: "NOT_FOUND",
        message: "Label not found",
        error_type: "business",
        details: { id: "l-1" },
      });
    });

    it("adds the default retry hint for transient codes", () => {
      assert.strictEqual(createCommandError("SERVICE_UNAVAILABLE", "busy").retry_after, 30);
      assert.strictEqual(createCommandError("DATABASE_ERROR", "db").retry_after, 10);
      assert.strictEqual(createCommandError("COMMAND_TIMEOUT", "slow").retry_after, 5);
      assert.strictEqual(createCommandError("CONFLICT", "dup").retry_after, undefined);
    });

    it("lets the caller override the retry hint", () => {
      const error = createCommandError("RATE_LIMIT_EXCEEDED", "slow down", { retryAfter: 42 });
      assert.strictEqual(error.retry_after, 42);
      assert.strictEqual(error.error_type, "ratelimit");
    });
  });

  describe("code table", () => {
    it("classifies security failures as critical where tampering is likely", () => {
      assert.strictEqual(getErrorCategory("REPLAY_ATTACK"), "security");
      assert.strictEqual(getErrorSeverity("REPLAY_ATTACK"), "critical");
      assert.strictEqual(getErrorSeverity("INVALID_SIGNATURE"), "critical");
      assert.strictEqual(getErrorSeverity("MESSAGE_EXPIRED"), "high");
    });

    it("classifies client mistakes as low severity validation errors", () => {
      assert.strictEqual(getErrorCategory("VALIDATION_FAILED"), "validation");
      assert.strictEqual(getErrorSeverity("VALIDATION_FAILED"), "low");
      assert.strictEqual(getErrorCategory("NO_WORKSPACE"), "authorization");
    });
  });

  describe("toCommandError", () => {
    it("maps an AppError to its code and keeps field and details", () => {
      const error = new AppError("conflict", "Label with this name already exists", { field: "name" });
      assert.deepStrictEqual(toCommandError(error), {
        code: "CONFLICT",
        message: "Label with this name already exists",
        error_type: "business",
        field: "name",
      });
    });

    it("builds not-found errors with the id in details", () => {
      assert.deepStrictEqual(toCommandError(AppError.notFound("Team", "t-9")), {
        code: "NOT_FOUND",
        message: "Team not found",
        error_type: "business",
        details: { id: "t-9" },
      });
    });

    it("hides database detail from the client and logs it", () => {
      const logger = new MemoryLogger();
      const error = toCommandError(new AppError("database", "relation \"labels\" does not exist"), logger);

      assert.deepStrictEqual(error, {
        code: "DATABASE_ERROR",
        message: "Database error",
        error_type: "database",
        retry_after: 10,
      });
      assert.deepStrictEqual(logger.messages("error"), ["Collaborator database error"]);
    });

    it("maps unknown throwables to INTERNAL_ERROR", () => {
      const logger = new MemoryLogger();
      assert.deepStrictEqual(toCommandError("kaboom", logger), {
        code: "INTERNAL_ERROR",
        message: "Internal server error",
        error_type: "system",
      });
      assert.strictEqual(logger.entries[0]?.error?.message, "kaboom");
    });
  });

  describe("ErrorStats", () => {
    it("counts by code, severity and category", () => {
      const stats = new ErrorStats();
      stats.record(createCommandError("NOT_FOUND", "a"), { commandType: "get_issue", userId: "u-1" }, 1000);
      stats.record(createCommandError("NOT_FOUND", "b"), {}, 2000);
      stats.record(createCommandError("REPLAY_ATTACK", "c"), {}, 3000);

      const snapshot = stats.getStats();
      assert.strictEqual(snapshot.total, 3);
      assert.deepStrictEqual(snapshot.byCode, { NOT_FOUND: 2, REPLAY_ATTACK: 1 });
      assert.deepStrictEqual(snapshot.bySeverity, { low: 2, critical: 1 });
      assert.deepStrictEqual(snapshot.byCategory, { business: 2, security: 1 });
      assert.deepStrictEqual(snapshot.recent[0], {
        code: "NOT_FOUND",
        message: "a",
        severity: "low",
        category: "business",
        timestamp: 1000,
        commandType: "get_issue",
        userId: "u-1",
      });
    });

    it("keeps only the most recent errors", () => {
      const stats = new ErrorStats(2);
      stats.record(createCommandError("CONFLICT", "1"));
      stats.record(createCommandError("CONFLICT", "2"));
      stats.record(createCommandError("CONFLICT", "3"));

      assert.deepStrictEqual(
        stats.getStats().recent.map((e) => e.message),
        ["2", "3"]
      );
      stats.reset();
      assert.strictEqual(stats.getStats().total, 0);
    });
  });
});

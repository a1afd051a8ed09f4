/**
 * Unit tests for validation.ts and type-guards.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import {
  getCommandPaging,
  isJsonValue,
  isPageResult,
  looksLikeSecureMessage,
  peekCommandType,
  peekIdempotencyKey,
  peekRequestId,
} from "./type-guards.js";
import { formatValidationErrors, parseCommand, validateCommand } from "./validation.js";

function errorsOf(input: unknown): Array<{ field: string; message: string }> {
  const result = parseCommand(input);
  return result.ok ? [] : result.errors;
}

describe("validation", () => {
  // ==========================================================================
  // ENVELOPE
  // ==========================================================================

  describe("parseCommand envelope", () => {
    it("rejects non-objects", () => {
      assert.deepStrictEqual(parseCommand([1, 2]), {
        ok: false,
        errors: [{ field: "root", message: "Command must be an object" }],
        unknownType: false,
      });
    });

    it("rejects a missing type", () => {
      assert.deepStrictEqual(errorsOf({ label_id: "l-1" }), [
        { field: "type", message: "Command must have a string 'type' field" },
      ]);
    });

    it("flags unknown types separately", () => {
      assert.deepStrictEqual(parseCommand({ type: "drop_tables" }), {
        ok: false,
        errors: [{ field: "type", message: "Unknown command type 'drop_tables'" }],
        unknownType: true,
      });
    });

    it("keeps idempotency_key and request_id", () => {
      const result = parseCommand({ type: "ping", idempotency_key: "k-1", request_id: "r-1" });
      assert.strictEqual(result.ok, true);
      if (result.ok) {
        assert.strictEqual(result.command.idempotency_key, "k-1");
        assert.strictEqual(result.command.request_id, "r-1");
      }
    });

    it("rejects keys in the reserved synthetic namespace", () => {
      assert.deepStrictEqual(errorsOf({ type: "ping", idempotency_key: "anon:1:2" }), [
        { field: "idempotency_key", message: "Must not start with reserved prefix 'anon:'" },
      ]);
    });

    it("rejects blank keys", () => {
      assert.deepStrictEqual(errorsOf({ type: "ping", idempotency_key: "   " }), [
        { field: "idempotency_key", message: "Must not be blank if provided" },
      ]);
    });

    it("ignores fields the command does not define", () => {
      const result = parseCommand({ type: "delete_label", label_id: "l-1", extra: { nested: true } });
      assert.strictEqual(result.ok, true);
      if (result.ok) assert.strictEqual("extra" in result.command, false);
    });
  });

  // ==========================================================================
  // PAYLOADS
  // ==========================================================================

  describe("parseCommand payloads", () => {
    it("builds a typed label command", () => {
      const result = parseCommand({
        type: "create_label",
        idempotency_key: "k-1",
        data: { name: "Bug", color: "#ff0000", level: "issue" },
      });
      assert.strictEqual(result.ok, true);
      if (result.ok && result.command.type === "create_label") {
        assert.deepStrictEqual(result.command.data, { name: "Bug", color: "#ff0000", level: "issue" });
      }
    });

    it("reports every missing field of a payload", () => {
      assert.deepStrictEqual(errorsOf({ type: "create_label" }), [
        { field: "data", message: "Required object" },
        { field: "data.name", message: "Required non-empty string" },
        { field: "data.color", message: "Required non-empty string" },
        { field: "data.level", message: "Must be one of: project, issue" },
      ]);
    });

    it("checks formats and enums", () => {
      assert.deepStrictEqual(errorsOf({ type: "create_label", data: { name: "Bug", color: "red", level: "issue" } }), [
        { field: "data.color", message: "Must be a hex color like #ff0000" },
      ]);
      assert.deepStrictEqual(
        errorsOf({ type: "create_team", data: { name: "Core", team_key: "core", is_private: false } }),
        [{ field: "data.team_key", message: "Must be 1-10 uppercase letters or digits" }]
      );
    });

    it("rejects control characters in names", () => {
      assert.deepStrictEqual(errorsOf({ type: "create_label", data: { name: "Bug\nfix", color: "#f00", level: "project" } }), [
        { field: "data.name", message: "Must not contain control characters" },
      ]);
    });

    it("enforces string length limits", () => {
      assert.deepStrictEqual(errorsOf({ type: "delete_issue", issue_id: "x".repeat(129) }), [
        { field: "issue_id", message: "Too long (max 128 chars)" },
      ]);
    });

    it("validates page bounds in filters", () => {
      assert.deepStrictEqual(errorsOf({ type: "query_labels", filters: { limit: 0 } }), [
        { field: "filters.limit", message: "Must be an integer between 1 and 100" },
      ]);
      assert.deepStrictEqual(errorsOf({ type: "query_issues", filters: { offset: -1 } }), [
        { field: "filters.offset", message: `Must be an integer between 0 and ${Number.MAX_SAFE_INTEGER}` },
      ]);
    });

    it("accepts a query without filters", () => {
      assert.deepStrictEqual(validateCommand({ type: "query_labels" }), []);
    });
  });

  // ==========================================================================
  // ARRAYS
  // ==========================================================================

  describe("parseCommand arrays", () => {
    it("requires non-empty batches", () => {
      assert.deepStrictEqual(errorsOf({ type: "batch_delete_labels", label_ids: [] }), [
        { field: "label_ids", message: "Required non-empty array" },
      ]);
    });

    it("caps batch size at 100", () => {
      const ids = Array.from({ length: 101 }, (_, i) => `l-${i}`);
      assert.deepStrictEqual(errorsOf({ type: "batch_delete_labels", label_ids: ids }), [
        { field: "label_ids", message: "Too many items (max 100)" },
      ]);
    });

    it("points at the offending element", () => {
      assert.deepStrictEqual(errorsOf({ type: "batch_delete_labels", label_ids: ["l-1", 5] }), [
        { field: "label_ids[1]", message: "Must be a non-empty string (max 128 chars)" },
      ]);
      assert.deepStrictEqual(
        errorsOf({
          type: "batch_update_labels",
          updates: [{ label_id: "l-1", data: { color: "blue" } }],
        }),
        [{ field: "updates[0].data.color", message: "Must be a hex color like #ff0000" }]
      );
    });

    it("validates subscription topics", () => {
      assert.deepStrictEqual(errorsOf({ type: "subscribe", topics: ["labels", ""] }), [
        { field: "topics[1]", message: "Must be a non-empty string (max 128 chars)" },
      ]);
    });
  });

  describe("formatValidationErrors", () => {
    it("joins field and message pairs", () => {
      assert.strictEqual(
        formatValidationErrors([
          { field: "data.name", message: "Required non-empty string" },
          { field: "data.level", message: "Must be one of: project, issue" },
        ]),
        "data.name: Required non-empty string; data.level: Must be one of: project, issue"
      );
    });
  });
});

describe("type-guards", () => {
  describe("isJsonValue", () => {
    it("accepts plain JSON and rejects the rest", () => {
      assert.strictEqual(isJsonValue({ a: [1, "x", null, { b: true }] }), true);
      assert.strictEqual(isJsonValue(Number.NaN), false);
      assert.strictEqual(isJsonValue({ a: undefined }), false);
      assert.strictEqual(isJsonValue(() => 1), false);
    });
  });

  describe("looksLikeSecureMessage", () => {
    it("checks the envelope shape", () => {
      const envelope = {
        message_id: "m-1",
        timestamp: 1,
        nonce: "n",
        signature: "s",
        sender_principal_id: "u-1",
        payload: { type: "ping" },
      };
      assert.strictEqual(looksLikeSecureMessage(envelope), true);
      assert.strictEqual(looksLikeSecureMessage({ ...envelope, timestamp: "1" }), false);
      assert.strictEqual(looksLikeSecureMessage({ type: "ping" }), false);
    });
  });

  describe("peek helpers", () => {
    it("read fields from unvalidated payloads", () => {
      const raw = { type: "create_label", request_id: "r-1", idempotency_key: "k-1" };
      assert.strictEqual(peekCommandType(raw), "create_label");
      assert.strictEqual(peekRequestId(raw), "r-1");
      assert.strictEqual(peekIdempotencyKey(raw), "k-1");
      assert.strictEqual(peekCommandType("nope"), "unknown");
      assert.strictEqual(peekRequestId({ request_id: 7 }), undefined);
    });
  });

  describe("getCommandPaging", () => {
    it("returns filters of paged queries only", () => {
      assert.deepStrictEqual(getCommandPaging({ type: "query_issues", filters: { limit: 10, offset: 20 } }), {
        limit: 10,
        offset: 20,
      });
      assert.strictEqual(getCommandPaging({ type: "query_teams" }), undefined);
    });
  });

  describe("isPageResult", () => {
    it("recognises items and total", () => {
      assert.strictEqual(isPageResult({ items: [], total: 0 }), true);
      assert.strictEqual(isPageResult({ items: [] }), false);
      assert.strictEqual(isPageResult([1, 2]), false);
    });
  });
});

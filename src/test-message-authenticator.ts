/**
 * Unit tests for message-authenticator.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { createHmac } from "node:crypto";
import {
  MessageAuthenticator,
  canonicalJson,
  securityErrorToCommandError,
} from "./message-authenticator.js";
import { MemoryLogger } from "./logger-types.js";
import type { JsonValue, SecureMessage } from "./types.js";

const SECRET = "test-secret-value-123";
const T0 = 1_700_000_000_000;

function createAuth(windowSeconds = 300): MessageAuthenticator {
  return new MessageAuthenticator({ secret: SECRET, windowSeconds });
}

describe("message-authenticator", () => {
  // ==========================================================================
  // CANONICAL JSON
  // ==========================================================================

  describe("canonicalJson", () => {
    it("sorts keys at every depth", () => {
      assert.strictEqual(canonicalJson({ b: 1, a: { d: [1, 2], c: "x" } }), '{"a":{"c":"x","d":[1,2]},"b":1}');
    });

    it("omits undefined members and writes undefined array items as null", () => {
      assert.strictEqual(canonicalJson({ a: undefined, b: [undefined, 1] }), '{"b":[null,1]}');
    });

    it("serialises scalars like JSON.stringify", () => {
      assert.strictEqual(canonicalJson("x"), '"x"');
      assert.strictEqual(canonicalJson(null), "null");
      assert.strictEqual(canonicalJson(3), "3");
    });
  });

  // ==========================================================================
  // SIGN
  // ==========================================================================

  describe("sign", () => {
    it("produces an HMAC over id, timestamp, nonce, payload and sender", () => {
      const auth = createAuth();
      const payload: JsonValue = { type: "ping" };
      const message = auth.sign(payload, "u-1", T0);

      assert.strictEqual(message.timestamp, 1_700_000_000);
      assert.strictEqual(message.sender_principal_id, "u-1");
      assert.match(message.nonce, /^[0-9a-f]{32}$/);
      const expected = createHmac("sha256", SECRET)
        .update(`${message.message_id}:${message.timestamp}:${message.nonce}:{"type":"ping"}:u-1`)
        .digest("hex");
      assert.strictEqual(message.signature, expected);
    });

    it("uses a fresh message id each time", () => {
      const auth = createAuth();
      const a = auth.sign({ type: "ping" }, "u-1", T0);
      const b = auth.sign({ type: "ping" }, "u-1", T0);
      assert.notStrictEqual(a.message_id, b.message_id);
    });
  });

  // ==========================================================================
  // VERIFY
  // ==========================================================================

  describe("verify", () => {
    it("accepts a freshly signed message", () => {
      const auth = createAuth();
      const message = auth.sign({ type: "ping" }, "u-1", T0);
      const result = auth.verify(message, "u-1", T0);
      assert.strictEqual(result.ok, true);
    });

    it("accepts a payload whose keys were reordered in transit", () => {
      const auth = createAuth();
      const message = auth.sign({ type: "create_label", data: { name: "Bug", color: "#f00" } }, "u-1", T0);
      const reordered: SecureMessage = { ...message, payload: { data: { color: "#f00", name: "Bug" }, type: "create_label" } };
      assert.strictEqual(auth.verify(reordered, "u-1", T0).ok, true);
    });

    it("rejects the second delivery of a message as a replay", () => {
      const auth = createAuth();
      const message = auth.sign({ type: "ping" }, "u-1", T0);
      assert.strictEqual(auth.verify(message, "u-1", T0).ok, true);

      const second = auth.verify(message, "u-1", T0 + 1000);
      assert.deepStrictEqual(second, { ok: false, error: { kind: "ReplayAttack", message_id: message.message_id } });
    });

    it("rejects a message older than the window with the timing details", () => {
      const auth = createAuth(300);
      const message = auth.sign({ type: "ping" }, "u-1", T0);
      const result = auth.verify(message, "u-1", T0 + 301_000);
      assert.deepStrictEqual(result, {
        ok: false,
        error: {
          kind: "MessageExpired",
          message_timestamp: 1_700_000_000,
          server_timestamp: 1_700_000_301,
          difference_seconds: 301,
          window_seconds: 300,
        },
      });
    });

    it("accepts a message exactly at the edge of the window", () => {
      const auth = createAuth(300);
      const message = auth.sign({ type: "ping" }, "u-1", T0);
      assert.strictEqual(auth.verify(message, "u-1", T0 + 300_000).ok, true);
    });

    it("rejects timestamps too far in the future", () => {
      const auth = createAuth(300);
      const message = auth.sign({ type: "ping" }, "u-1", T0 + 400_000);
      const result = auth.verify(message, "u-1", T0);
      assert.strictEqual(result.ok, false);
      if (!result.ok) assert.strictEqual(result.error.kind, "MessageExpired");
    });

    it("rejects a tampered payload", () => {
      const auth = createAuth();
      const message = auth.sign({ type: "delete_label", label_id: "l-1" }, "u-1", T0);
      const tampered: SecureMessage = { ...message, payload: { type: "delete_label", label_id: "l-2" } };
      assert.deepStrictEqual(auth.verify(tampered, "u-1", T0), { ok: false, error: { kind: "InvalidSignature" } });
    });

    it("rejects a message signed with another secret", () => {
      const other = new MessageAuthenticator({ secret: "other-test-secret-456" });
      const message = other.sign({ type: "ping" }, "u-1", T0);
      const result = createAuth().verify(message, "u-1", T0);
      assert.deepStrictEqual(result, { ok: false, error: { kind: "InvalidSignature" } });
    });

    it("rejects a sender other than the connection principal", () => {
      const auth = createAuth();
      const message = auth.sign({ type: "ping" }, "u-2", T0);
      assert.deepStrictEqual(auth.verify(message, "u-1", T0), {
        ok: false,
        error: { kind: "PrincipalMismatch", expected: "u-1", actual: "u-2" },
      });
    });

    it("does not consume the id of a rejected message", () => {
      const auth = createAuth();
      const message = auth.sign({ type: "ping" }, "u-1", T0);
      assert.strictEqual(auth.verify(message, "u-other", T0).ok, false);
      assert.strictEqual(auth.verify(message, "u-1", T0).ok, true);
    });

    it("rejects malformed envelopes", () => {
      const auth = createAuth();
      const result = auth.verify({ type: "ping" }, "u-1", T0);
      assert.strictEqual(result.ok, false);
      if (!result.ok) assert.strictEqual(result.error.kind, "InvalidMessageFormat");

      const message = auth.sign({ type: "ping" }, "u-1", T0);
      const badSignature = auth.verify({ ...message, signature: "not-hex" }, "u-1", T0);
      assert.deepStrictEqual(badSignature, {
        ok: false,
        error: { kind: "InvalidMessageFormat", reason: "signature must be a hex HMAC-SHA256 digest" },
      });
    });

    it("counts verified and rejected messages and logs rejections", () => {
      const logger = new MemoryLogger();
      const auth = new MessageAuthenticator({ secret: SECRET }, logger);
      const message = auth.sign({ type: "ping" }, "u-1", T0);
      auth.verify(message, "u-1", T0);
      auth.verify(message, "u-1", T0);

      const stats = auth.getStats();
      assert.strictEqual(stats.verified, 1);
      assert.strictEqual(stats.rejected.ReplayAttack, 1);
      assert.strictEqual(stats.trackedMessages, 1);
      assert.deepStrictEqual(logger.messages("warn"), ["Message rejected"]);
    });
  });

  // ==========================================================================
  // REPLAY HORIZON
  // ==========================================================================

  describe("replay horizon", () => {
    it("rejects a replay of a future-stamped message at the far edge of the window", () => {
      const auth = createAuth(300);
      const message = auth.sign({ type: "ping" }, "u-1", T0 + 300_000);

      assert.strictEqual(auth.verify(message, "u-1", T0).ok, true);
      assert.deepStrictEqual(auth.verify(message, "u-1", T0 + 600_000), {
        ok: false,
        error: { kind: "ReplayAttack", message_id: message.message_id },
      });
      const late = auth.verify(message, "u-1", T0 + 601_000);
      assert.ok(!late.ok);
      assert.strictEqual(late.error.kind, "MessageExpired");
    });

    it("refuses new messages instead of forgetting live ids when full", () => {
      const logger = new MemoryLogger();
      const auth = new MessageAuthenticator({ secret: SECRET, maxTrackedMessages: 2 }, logger);
      const first = auth.sign({ type: "ping" }, "u-1", T0);
      assert.strictEqual(auth.verify(first, "u-1", T0).ok, true);
      assert.strictEqual(auth.verify(auth.sign({ type: "ping" }, "u-1", T0), "u-1", T0).ok, true);

      const third = auth.sign({ type: "ping" }, "u-1", T0);
      assert.deepStrictEqual(auth.verify(third, "u-1", T0), {
        ok: false,
        error: { kind: "ReplayStoreFull", retry_after_seconds: 301 },
      });
      assert.deepStrictEqual(auth.verify(first, "u-1", T0 + 1000), {
        ok: false,
        error: { kind: "ReplayAttack", message_id: first.message_id },
      });
      assert.strictEqual(auth.getStats().rejected.ReplayStoreFull, 1);
      assert.deepStrictEqual(logger.messages("warn"), ["Replay store full; refusing message", "Message rejected"]);

      // The refused message was not recorded, so it passes once room frees up.
      assert.strictEqual(auth.verify(auth.sign({ type: "ping" }, "u-1", T0 + 301_000), "u-1", T0 + 301_000).ok, true);
    });
  });

  describe("cleanupExpired", () => {
    it("forgets an id once its timestamp can no longer pass", () => {
      const auth = createAuth(300);
      auth.verify(auth.sign({ type: "ping" }, "u-1", T0), "u-1", T0);

      assert.strictEqual(auth.cleanupExpired(T0 + 300_999), 0);
      assert.strictEqual(auth.cleanupExpired(T0 + 301_000), 1);
      assert.strictEqual(auth.getStats().trackedMessages, 0);
    });
  });

  describe("constructor", () => {
    it("refuses an empty secret", () => {
      assert.throws(() => new MessageAuthenticator({ secret: "" }), /non-empty secret/);
    });
  });

  // ==========================================================================
  // WIRE MAPPING
  // ==========================================================================

  describe("securityErrorToCommandError", () => {
    it("maps replay to REPLAY_ATTACK in the security category", () => {
      assert.deepStrictEqual(securityErrorToCommandError({ kind: "ReplayAttack", message_id: "m-1" }), {
        code: "REPLAY_ATTACK",
        message: "Message has already been processed",
        error_type: "security",
        details: { message_id: "m-1" },
      });
    });

    it("maps a full replay store to a retryable SERVICE_UNAVAILABLE", () => {
      assert.deepStrictEqual(securityErrorToCommandError({ kind: "ReplayStoreFull", retry_after_seconds: 12 }), {
        code: "SERVICE_UNAVAILABLE",
        message: "Too many recent messages to track; retry later",
        error_type: "system",
        retry_after: 12,
      });
    });

    it("uses the format reason as the message", () => {
      const error = securityErrorToCommandError({ kind: "InvalidMessageFormat", reason: "nonce must be a non-empty string" });
      assert.strictEqual(error.code, "INVALID_MESSAGE_FORMAT");
      assert.strictEqual(error.message, "nonce must be a non-empty string");
    });
  });
});

/**
 * Unit tests for auth.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { StaticTokenIdentityProvider, extractRecoveryToken, extractToken } from "./auth.js";

const T0 = 1_700_000_000_000;

function provider(): StaticTokenIdentityProvider {
  return new StaticTokenIdentityProvider(
    new Map([
      ["tok-alice", { principal: { user_id: "u-1", username: "alice", workspace_id: "w-1" } }],
      ["tok-old", { principal: { user_id: "u-2", username: "bob" }, expiresAt: T0 }],
    ])
  );
}

describe("auth", () => {
  // ==========================================================================
  // TOKEN EXTRACTION
  // ==========================================================================

  describe("extractToken", () => {
    it("reads the token query parameter", () => {
      assert.strictEqual(extractToken({ url: "/ws?token=abc", headers: {} }), "abc");
    });

    it("reads a bearer header", () => {
      assert.strictEqual(extractToken({ url: "/ws", headers: { authorization: "Bearer xyz" } }), "xyz");
    });

    it("prefers the query parameter", () => {
      assert.strictEqual(extractToken({ url: "/?token=q", headers: { authorization: "Bearer h" } }), "q");
    });

    it("ignores other schemes and empty bearers", () => {
      assert.strictEqual(extractToken({ url: "/", headers: { authorization: "Basic dXNlcg==" } }), undefined);
      assert.strictEqual(extractToken({ url: "/", headers: { authorization: "Bearer   " } }), undefined);
      assert.strictEqual(extractToken({ url: undefined, headers: {} }), undefined);
    });
  });

  describe("extractRecoveryToken", () => {
    it("reads the recovery_token parameter", () => {
      assert.strictEqual(extractRecoveryToken({ url: "/?token=a&recovery_token=r-1" }), "r-1");
      assert.strictEqual(extractRecoveryToken({ url: "/?token=a" }), undefined);
    });
  });

  // ==========================================================================
  // PROVIDERS
  // ==========================================================================

  describe("StaticTokenIdentityProvider", () => {
    it("resolves a known token to its principal", () => {
      assert.deepStrictEqual(provider().authenticate("tok-alice", T0), {
        allowed: true,
        principal: { user_id: "u-1", username: "alice", workspace_id: "w-1" },
      });
    });

    it("returns a copy of the principal", () => {
      const auth = provider();
      const first = auth.authenticate("tok-alice", T0);
      if (first.allowed) first.principal.workspace_id = "w-9";
      const second = auth.authenticate("tok-alice", T0);
      assert.ok(second.allowed);
      assert.strictEqual(second.principal.workspace_id, "w-1");
    });

    it("refuses missing, unknown and expired tokens", () => {
      const auth = provider();
      assert.deepStrictEqual(auth.authenticate("", T0), {
        allowed: false,
        code: "MISSING_TOKEN",
        reason: "Missing authentication token",
      });
      assert.deepStrictEqual(auth.authenticate("tok-nope", T0), {
        allowed: false,
        code: "TOKEN_INVALID",
        reason: "Invalid token",
      });
      assert.deepStrictEqual(auth.authenticate("tok-old", T0), {
        allowed: false,
        code: "TOKEN_EXPIRED",
        reason: "Token has expired",
      });
      assert.strictEqual(auth.authenticate("tok-old", T0 - 1).allowed, true);
    });
  });
});

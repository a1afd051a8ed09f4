/**
 * Unit tests for config.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { ConfigError, DEFAULT_CONFIG, loadConfigFromEnv, parseTokenList, validateConfig } from "./config.js";

const SECRET = "test-secret-value-123";

function issuesOf(env: Record<string, string>): Array<{ variable: string; message: string }> {
  try {
    loadConfigFromEnv(env);
  } catch (error) {
    assert.ok(error instanceof ConfigError);
    return error.issues;
  }
  throw new Error("expected a ConfigError");
}

describe("config", () => {
  describe("loadConfigFromEnv", () => {
    it("applies defaults when only the secret is set", () => {
      const config = loadConfigFromEnv({ WORKTRACK_SECRET: SECRET });
      assert.strictEqual(config.port, 8080);
      assert.strictEqual(config.host, "0.0.0.0");
      assert.strictEqual(config.securityEnabled, true);
      assert.strictEqual(config.secret, SECRET);
      assert.strictEqual(config.maxMessageBytes, 1_048_576);
      assert.strictEqual(config.logLevel, "info");
      assert.deepStrictEqual(config.commandLimits, DEFAULT_CONFIG.commandLimits);
      assert.strictEqual(config.tokens.size, 0);
    });

    it("reads overrides", () => {
      const config = loadConfigFromEnv({
        WORKTRACK_PORT: "9000",
        WORKTRACK_HOST: " 127.0.0.1 ",
        WORKTRACK_SECURITY_ENABLED: "no",
        WORKTRACK_RATE_LIMIT_MAX_REQUESTS: "20",
        WORKTRACK_LOG_LEVEL: "debug",
        WORKTRACK_LOG_JSON: "1",
        WORKTRACK_COMMAND_LIMITS: "delete_label=2, query_issues=30",
      });
      assert.strictEqual(config.port, 9000);
      assert.strictEqual(config.host, "127.0.0.1");
      assert.strictEqual(config.securityEnabled, false);
      assert.strictEqual(config.rateLimitMaxRequests, 20);
      assert.strictEqual(config.logLevel, "debug");
      assert.strictEqual(config.logJson, true);
      assert.strictEqual(config.commandLimits.delete_label, 2);
      assert.strictEqual(config.commandLimits.query_issues, 30);
      assert.strictEqual(config.commandLimits.create_label, 10);
    });

    it("treats blank values as unset", () => {
      const config = loadConfigFromEnv({ WORKTRACK_SECRET: SECRET, WORKTRACK_PORT: "  " });
      assert.strictEqual(config.port, 8080);
    });

    it("loads handshake tokens", () => {
      const config = loadConfigFromEnv({
        WORKTRACK_SECRET: SECRET,
        WORKTRACK_TOKENS: "tok-a:u-1:alice:w-1,tok-b:u-2:bob",
      });
      assert.deepStrictEqual(config.tokens.get("tok-a"), {
        principal: { user_id: "u-1", username: "alice", workspace_id: "w-1" },
      });
      assert.deepStrictEqual(config.tokens.get("tok-b"), { principal: { user_id: "u-2", username: "bob" } });
    });

    it("reports every invalid variable at once", () => {
      assert.deepStrictEqual(
        issuesOf({
          WORKTRACK_PORT: "abc",
          WORKTRACK_MAX_CONNECTIONS: "0",
          WORKTRACK_SECURITY_ENABLED: "maybe",
          WORKTRACK_LOG_LEVEL: "loud",
        }),
        [
          { variable: "WORKTRACK_PORT", message: 'expected an integer, got "abc"' },
          { variable: "WORKTRACK_SECURITY_ENABLED", message: 'expected true or false, got "maybe"' },
          { variable: "WORKTRACK_MAX_CONNECTIONS", message: `must be between 1 and ${Number.MAX_SAFE_INTEGER}, got 0` },
          { variable: "WORKTRACK_LOG_LEVEL", message: 'unknown level "loud"' },
          { variable: "WORKTRACK_SECRET", message: "must be at least 16 characters when security is enabled" },
        ]
      );
    });

    it("rejects an out-of-range port", () => {
      assert.deepStrictEqual(issuesOf({ WORKTRACK_SECRET: SECRET, WORKTRACK_PORT: "70000" }), [
        { variable: "WORKTRACK_PORT", message: "must be between 1 and 65535, got 70000" },
      ]);
    });

    it("rejects malformed command limits and tokens", () => {
      assert.deepStrictEqual(
        issuesOf({ WORKTRACK_SECRET: SECRET, WORKTRACK_COMMAND_LIMITS: "ping=x", WORKTRACK_TOKENS: "just-a-token" }),
        [
          { variable: "WORKTRACK_COMMAND_LIMITS", message: 'malformed entry "ping=x" (expected command=limit)' },
          {
            variable: "WORKTRACK_TOKENS",
            message: 'malformed entry "just-a-token" (expected token:userId:username[:workspaceId])',
          },
        ]
      );
    });

    it("names the variables in the error message", () => {
      assert.throws(
        () => loadConfigFromEnv({}),
        (error: unknown) => {
          assert.ok(error instanceof ConfigError);
          assert.strictEqual(
            error.message,
            "Invalid configuration: WORKTRACK_SECRET: must be at least 16 characters when security is enabled"
          );
          return true;
        }
      );
    });
  });

  describe("validateConfig", () => {
    it("accepts a short secret when security is disabled", () => {
      assert.deepStrictEqual(validateConfig({ ...DEFAULT_CONFIG, securityEnabled: false }), []);
    });

    it("rejects a per-user cap above the global cap", () => {
      assert.deepStrictEqual(
        validateConfig({ ...DEFAULT_CONFIG, secret: SECRET, maxConnections: 5, maxConnectionsPerUser: 6 }),
        [{ variable: "WORKTRACK_MAX_CONNECTIONS_PER_USER", message: "must not exceed WORKTRACK_MAX_CONNECTIONS" }]
      );
    });
  });

  describe("parseTokenList", () => {
    it("skips empty entries and reports malformed ones", () => {
      const { tokens, errors } = parseTokenList("tok-a:u-1:alice, ,a:b:c:d:e");
      assert.strictEqual(tokens.size, 1);
      assert.deepStrictEqual(errors, ['malformed entry "a:b:c:d:e" (expected token:userId:username[:workspaceId])']);
    });
  });
});

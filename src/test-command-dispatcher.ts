/**
 * Pipeline tests for command-dispatcher.ts over the in-memory collaborators
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { setTimeout as delay } from "node:timers/promises";
import { buildPagination, CommandDispatcher, type DispatchOutcome, idempotencyScope } from "./command-dispatcher.js";
import { CommandRouter } from "./command-router.js";
import { Connection } from "./connection.js";
import { ConnectionRegistry } from "./connection-registry.js";
import { AppError, ErrorStats } from "./error-mapper.js";
import { EventBroadcaster } from "./event-broadcaster.js";
import { IdempotencyCache, type IdempotencyCacheOptions } from "./idempotency-cache.js";
import { MemoryLogger } from "./logger-types.js";
import { MessageAuthenticator } from "./message-authenticator.js";
import { MemorySink, MetricNames, MetricsEmitter } from "./metrics-index.js";
import { createMemoryServices } from "./memory-services.js";
import { RateLimiter, type RateLimiterConfig } from "./rate-limiter.js";
import type { LabelService, Services } from "./services.js";
import { RecordingTransport } from "./testing.js";
import { isRecord } from "./type-guards.js";
import type { CommandResponse, JsonValue } from "./types.js";

const T0 = 1_700_000_000_000;
const T0_ISO = "2023-11-14T22:13:20.000Z";
const SECRET = "test-secret-value-123";

interface HarnessOptions {
  securityEnabled?: boolean;
  workspace?: string | null;
  rateLimit?: Partial<RateLimiterConfig>;
  services?: Services;
  commandTimeoutMs?: number;
  idempotency?: IdempotencyCacheOptions;
  maxTrackedMessages?: number;
}

function responseOf(outcome: DispatchOutcome): CommandResponse {
  const message = outcome.message;
  assert.ok("command_type" in message, `expected a command response, got ${JSON.stringify(message)}`);
  return message;
}

function record(value: JsonValue | undefined): Record<string, unknown> {
  assert.ok(isRecord(value), `expected an object, got ${JSON.stringify(value)}`);
  return value;
}

function harness(options: HarnessOptions = {}) {
  const sink = new MemorySink();
  const metrics = new MetricsEmitter({ sink });
  const logger = new MemoryLogger();
  const registry = new ConnectionRegistry({}, logger, metrics);
  const transport = new RecordingTransport();
  const workspaceId = options.workspace === null ? undefined : (options.workspace ?? "w-1");
  const connection = new Connection({
    principal: { user_id: "u-1", username: "alice", workspace_id: workspaceId },
    transport,
    id: "c-1",
    now: T0,
  });
  registry.add(connection);

  const authenticator = new MessageAuthenticator(
    { secret: SECRET, maxTrackedMessages: options.maxTrackedMessages },
    logger
  );
  const errorStats = new ErrorStats();
  const dispatcher = new CommandDispatcher(
    {
      router: new CommandRouter(options.services ?? createMemoryServices(() => new Date(T0)), logger),
      idempotency: new IdempotencyCache(options.idempotency ?? {}, logger, metrics),
      rateLimiter: new RateLimiter(options.rateLimit ?? {}, logger, metrics),
      authenticator,
      broadcaster: new EventBroadcaster(registry, logger, metrics),
      errorStats,
      logger,
      metrics,
    },
    { securityEnabled: options.securityEnabled ?? false, commandTimeoutMs: options.commandTimeoutMs ?? 30_000 }
  );

  const send = async (raw: unknown, now = T0): Promise<CommandResponse> =>
    responseOf(await dispatcher.dispatch(connection, raw, now));

  /** Another connection of the same user */
  const connect = (id: string): Connection => {
    const other = new Connection({
      principal: { user_id: "u-1", username: "alice", workspace_id: workspaceId },
      transport: new RecordingTransport(),
      id,
      now: T0,
    });
    registry.add(other);
    return other;
  };

  return { dispatcher, connection, transport, authenticator, errorStats, logger, sink, send, connect };
}

/** LabelService that counts executions and answers after `delayMs`. */
function countingLabels(delayMs: number): { labels: LabelService; calls: () => number } {
  let calls = 0;
  return {
    labels: {
      execute: async () => {
        calls++;
        await delay(delayMs);
        return { id: "l-1", name: "Bug" };
      },
    },
    calls: () => calls,
  };
}

const BUG = { name: "Bug", color: "#ff0000", level: "issue" };

describe("command-dispatcher", () => {
  // ==========================================================================
  // AUTHENTICATION
  // ==========================================================================

  describe("signed messages", () => {
    it("executes the payload of a valid envelope", async () => {
      const { dispatcher, connection, authenticator } = harness({ securityEnabled: true });
      const outcome = await dispatcher.dispatch(connection, authenticator.sign({ type: "ping" }, "u-1", T0), T0);
      const response = responseOf(outcome);

      assert.strictEqual(outcome.close, undefined);
      assert.strictEqual(response.command_type, "ping");
      assert.strictEqual(response.success, true);
      assert.deepStrictEqual(response.data, { message: "pong" });
      assert.match(response.idempotency_key, /^anon:/);
      assert.strictEqual(response.timestamp, T0_ISO);
    });

    it("closes the connection on an unsigned message", async () => {
      const { dispatcher, connection, sink, logger } = harness({ securityEnabled: true });
      const outcome = await dispatcher.dispatch(connection, { type: "ping" }, T0);

      assert.deepStrictEqual(outcome.close, { code: 1008, reason: "INVALID_MESSAGE_FORMAT" });
      assert.strictEqual("type" in outcome.message ? outcome.message.type : undefined, "error");
      assert.strictEqual(sink.getCounterTotal(MetricNames.SECURITY_REJECTED_TOTAL), 1);
      assert.deepStrictEqual(logger.messages("warn"), ["Message rejected", "Security check failed; closing connection"]);
    });

    it("closes the connection on a replayed envelope", async () => {
      const { dispatcher, connection, authenticator } = harness({ securityEnabled: true });
      const signed = authenticator.sign({ type: "ping" }, "u-1", T0);

      assert.strictEqual((await dispatcher.dispatch(connection, signed, T0)).close, undefined);
      const replay = await dispatcher.dispatch(connection, signed, T0 + 1000);
      assert.deepStrictEqual(replay.close, { code: 1008, reason: "REPLAY_ATTACK" });
    });

    it("closes the connection when the sender is someone else", async () => {
      const { dispatcher, connection, authenticator } = harness({ securityEnabled: true });
      const outcome = await dispatcher.dispatch(connection, authenticator.sign({ type: "ping" }, "u-2", T0), T0);
      assert.deepStrictEqual(outcome.close, { code: 1008, reason: "PRINCIPAL_MISMATCH" });
    });

    it("answers a full replay store with a retryable error and keeps the connection", async () => {
      const { dispatcher, connection, authenticator, sink } = harness({ securityEnabled: true, maxTrackedMessages: 1 });
      await dispatcher.dispatch(connection, authenticator.sign({ type: "ping" }, "u-1", T0), T0);

      const outcome = await dispatcher.dispatch(
        connection,
        authenticator.sign({ type: "ping", request_id: "r-2" }, "u-1", T0),
        T0
      );
      assert.strictEqual(outcome.close, undefined);
      assert.deepStrictEqual(responseOf(outcome), {
        command_type: "ping",
        idempotency_key: "",
        success: false,
        error: {
          code: "SERVICE_UNAVAILABLE",
          message: "Too many recent messages to track; retry later",
          error_type: "system",
          retry_after: 301,
        },
        timestamp: T0_ISO,
        request_id: "r-2",
      });
      assert.strictEqual(sink.getCounterTotal(MetricNames.SECURITY_REJECTED_TOTAL), 0);
    });

    it("accepts plain commands when security is disabled", async () => {
      const { send } = harness({ securityEnabled: false });
      const response = await send({ type: "ping", request_id: "r-1" });
      assert.strictEqual(response.success, true);
      assert.strictEqual(response.request_id, "r-1");
    });

    it("requires an authenticator when security is enabled", () => {
      const services = createMemoryServices();
      assert.throws(
        () =>
          new CommandDispatcher({
            router: new CommandRouter(services),
            idempotency: new IdempotencyCache(),
            rateLimiter: new RateLimiter(),
          }),
        /security is enabled but no authenticator was provided/
      );
    });
  });

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  describe("validation", () => {
    it("answers an invalid payload with every field error", async () => {
      const { send } = harness();
      const response = await send({
        type: "create_label",
        idempotency_key: "k-1",
        request_id: "r-1",
        data: { name: "", color: "#f00", level: "issue" },
      });

      assert.deepStrictEqual(response, {
        command_type: "create_label",
        idempotency_key: "k-1",
        success: false,
        error: {
          code: "VALIDATION_FAILED",
          message: "data.name: Required non-empty string",
          error_type: "validation",
          field: "data.name",
          details: [{ field: "data.name", message: "Required non-empty string" }],
        },
        timestamp: T0_ISO,
        request_id: "r-1",
      });
    });

    it("reports an unknown command type", async () => {
      const { send } = harness();
      assert.deepStrictEqual(await send({ type: "launch" }), {
        command_type: "launch",
        idempotency_key: "",
        success: false,
        error: {
          code: "COMMAND_INVALID",
          message: "Unknown command type 'launch'",
          error_type: "validation",
          field: "type",
        },
        timestamp: T0_ISO,
      });
    });

    it("requires an idempotency key for mutations", async () => {
      const { send, errorStats } = harness();
      const response = await send({ type: "create_label", data: BUG });

      assert.deepStrictEqual(response.error, {
        code: "IDEMPOTENCY_KEY_REQUIRED",
        message: "Command 'create_label' changes state and requires an idempotency_key",
        error_type: "validation",
        field: "idempotency_key",
      });
      assert.strictEqual(errorStats.getStats().byCode.IDEMPOTENCY_KEY_REQUIRED, 1);
    });
  });

  // ==========================================================================
  // IDEMPOTENCY
  // ==========================================================================

  describe("idempotency", () => {
    it("returns the stored response for a repeated key and publishes once", async () => {
      const { send, connection, transport } = harness();
      connection.subscribe(["labels"]);

      const first = await send({ type: "create_label", idempotency_key: "k-1", data: BUG });
      const second = await send({ type: "create_label", idempotency_key: "k-1", data: BUG }, T0 + 5000);

      assert.strictEqual(first.success, true);
      assert.deepStrictEqual(second, first);

      const labels = record((await send({ type: "query_labels" })).data);
      assert.strictEqual(labels.total, 1);

      const events = transport.ofType("event");
      assert.strictEqual(events.length, 1);
      assert.strictEqual(events[0].event, "label.created");
      assert.strictEqual(events[0].topic, "labels");
      assert.strictEqual(events[0].workspace_id, "w-1");
      assert.strictEqual(events[0].actor_id, "u-1");
      assert.deepStrictEqual(events[0].data, first.data);
    });

    it("joins a concurrent duplicate to the running execution", async () => {
      const { send } = harness();
      const [a, b] = await Promise.all([
        send({ type: "create_label", idempotency_key: "k-1", data: BUG }),
        send({ type: "create_label", idempotency_key: "k-1", data: BUG }),
      ]);

      assert.deepStrictEqual(a, b);
      assert.strictEqual(record((await send({ type: "query_labels" })).data).total, 1);
    });

    it("executes once for ten concurrent submissions of one key", async () => {
      const counting = countingLabels(5);
      const { send } = harness({ services: { ...createMemoryServices(), labels: counting.labels } });

      const responses = await Promise.all(
        Array.from({ length: 10 }, () => send({ type: "create_label", idempotency_key: "k-1", data: BUG }))
      );

      assert.strictEqual(counting.calls(), 1);
      assert.strictEqual(responses[0].success, true);
      for (const response of responses) {
        assert.deepStrictEqual(response, responses[0]);
      }
    });

    it("keeps a timed-out key in flight until the collaborator settles", async () => {
      const counting = countingLabels(50);
      const { send, connection, transport, logger } = harness({
        services: { ...createMemoryServices(), labels: counting.labels },
        commandTimeoutMs: 10,
      });
      connection.subscribe(["labels"]);
      const command = { type: "create_label", idempotency_key: "k-1", data: BUG };

      const first = await send(command);
      assert.deepStrictEqual(first.error, {
        code: "COMMAND_TIMEOUT",
        message: "Command 'create_label' timed out after 10ms",
        error_type: "system",
        retry_after: 5,
      });
      const joined = await send(command);
      assert.strictEqual(joined.error?.code, "COMMAND_TIMEOUT");

      await delay(80);
      const settled = await send(command);
      assert.strictEqual(settled.success, true);
      assert.deepStrictEqual(settled.data, { id: "l-1", name: "Bug" });
      assert.strictEqual(counting.calls(), 1);
      assert.strictEqual(transport.ofType("event").length, 1);
      assert.deepStrictEqual(
        logger.messages("warn").filter((m) => m.startsWith("Command timed out")),
        [
          "Command timed out; execution continues in the background",
          "Command timed out; execution continues in the background",
        ]
      );
    });

    it("refuses a new key when the store is full without forgetting recorded keys", async () => {
      const { send } = harness({ idempotency: { maxRecords: 1 } });
      const first = await send({ type: "create_label", idempotency_key: "k-1", data: BUG });

      const refused = await send({ type: "create_label", idempotency_key: "k-2", data: BUG });
      assert.deepStrictEqual(refused, {
        command_type: "create_label",
        idempotency_key: "k-2",
        success: false,
        error: {
          code: "SERVICE_UNAVAILABLE",
          message: "Too many recent commands to track; retry later",
          error_type: "system",
          retry_after: 300,
        },
        timestamp: T0_ISO,
      });

      assert.deepStrictEqual(await send({ type: "create_label", idempotency_key: "k-1", data: BUG }), first);
      assert.strictEqual(record((await send({ type: "query_labels" })).data).total, 1);
    });

    it("scopes channel command keys to the connection", async () => {
      const { dispatcher, connection, connect } = harness();
      const other = connect("c-2");
      const command = { type: "subscribe", topics: ["labels"], idempotency_key: "k-1" };

      const a = responseOf(await dispatcher.dispatch(connection, command, T0));
      const b = responseOf(await dispatcher.dispatch(other, command, T0));
      assert.strictEqual(a.success, true);
      assert.strictEqual(b.success, true);
      assert.strictEqual(connection.isSubscribed("labels"), true);
      assert.strictEqual(other.isSubscribed("labels"), true);

      const info = { type: "get_connection_info", idempotency_key: "k-2" };
      const infoA = responseOf(await dispatcher.dispatch(connection, info, T0));
      const infoB = responseOf(await dispatcher.dispatch(other, info, T0));
      assert.strictEqual(record(infoA.data).connection_id, "c-1");
      assert.strictEqual(record(infoB.data).connection_id, "c-2");
    });

    it("keeps the first result when a key is reused with another payload", async () => {
      const { send, logger } = harness();
      await send({ type: "create_label", idempotency_key: "k-1", data: BUG });
      const reused = await send({
        type: "create_label",
        idempotency_key: "k-1",
        data: { name: "Feature", color: "#00ff00", level: "issue" },
      });

      assert.strictEqual(record(reused.data).name, "Bug");
      assert.ok(logger.messages("warn").includes("Idempotency key reused with a different payload; returning the first result"));
    });

    it("caches a business failure", async () => {
      const { send, errorStats } = harness();
      const first = await send({ type: "delete_label", idempotency_key: "k-1", label_id: "missing" });
      const second = await send({ type: "delete_label", idempotency_key: "k-1", label_id: "missing" });

      assert.strictEqual(first.error?.code, "NOT_FOUND");
      assert.deepStrictEqual(second, first);
      assert.strictEqual(errorStats.getStats().total, 1);
    });

    it("runs a retryable failure again", async () => {
      let calls = 0;
      const labels: LabelService = {
        execute: async () => {
          calls++;
          if (calls === 1) throw new AppError("unavailable", "Label store is restarting");
          return { ok: true };
        },
      };
      const { send } = harness({ services: { ...createMemoryServices(), labels } });

      const first = await send({ type: "delete_label", idempotency_key: "k-1", label_id: "l-1" });
      assert.deepStrictEqual(first.error, {
        code: "SERVICE_UNAVAILABLE",
        message: "Label store is restarting",
        error_type: "system",
        retry_after: 30,
      });

      const second = await send({ type: "delete_label", idempotency_key: "k-1", label_id: "l-1" });
      assert.strictEqual(second.success, true);
      assert.deepStrictEqual(second.data, { ok: true });
      assert.strictEqual(calls, 2);
    });
  });

  // ==========================================================================
  // RATE LIMITING AND AUTHORIZATION
  // ==========================================================================

  describe("rate limiting", () => {
    it("rejects over the global limit", async () => {
      const { send } = harness({ rateLimit: { maxRequests: 1, commandLimits: {} } });
      await send({ type: "ping" });
      const limited = await send({ type: "ping" });

      assert.deepStrictEqual(limited.error, {
        code: "RATE_LIMIT_EXCEEDED",
        message: "Rate limit exceeded (1 requests per 60s)",
        error_type: "ratelimit",
        details: { limit: 1, scope: "global" },
        retry_after: 60,
      });
    });

    it("does not store a rate-limited response under its key", async () => {
      const { send } = harness({ rateLimit: { maxRequests: 1, commandLimits: {} } });
      await send({ type: "query_labels" });

      const limited = await send({ type: "create_label", idempotency_key: "k-1", data: BUG });
      assert.strictEqual(limited.error?.code, "RATE_LIMIT_EXCEEDED");

      const retried = await send({ type: "create_label", idempotency_key: "k-1", data: BUG }, T0 + 60_000);
      assert.strictEqual(retried.success, true);
    });
  });

  describe("workspace authorization", () => {
    it("refuses workspace commands without a current workspace", async () => {
      const { send } = harness({ workspace: null });
      const response = await send({ type: "create_label", idempotency_key: "k-1", data: BUG });

      assert.deepStrictEqual(response.error, {
        code: "NO_WORKSPACE",
        message: "A current workspace is required for this command. Create or switch to a workspace first.",
        error_type: "authorization",
      });
    });

    it("allows creating a workspace without one", async () => {
      const { send } = harness({ workspace: null });
      const response = await send({
        type: "create_workspace",
        idempotency_key: "k-1",
        data: { name: "Acme", url_key: "acme" },
      });
      assert.strictEqual(response.success, true);
      assert.strictEqual(record(response.data).name, "Acme");
    });
  });

  // ==========================================================================
  // EXECUTION
  // ==========================================================================

  describe("execution", () => {
    it("adds pagination meta to paged queries", async () => {
      const { send } = harness();
      for (const [i, name] of ["A", "B", "C"].entries()) {
        await send({
          type: "create_label",
          idempotency_key: `k-${i}`,
          data: { name, color: "#000000", level: "project" },
        });
      }

      const response = await send({ type: "query_labels", filters: { limit: 2, offset: 2 } });
      assert.strictEqual(response.meta?.total_count, 3);
      assert.deepStrictEqual(response.meta?.pagination, {
        page: 2,
        per_page: 2,
        total_pages: 2,
        has_next: false,
        has_prev: true,
      });
      assert.strictEqual(typeof response.meta?.execution_time_ms, "number");
    });

    it("adds batch statistics to batch commands", async () => {
      const { send } = harness();
      const response = await send({
        type: "batch_create_labels",
        idempotency_key: "k-1",
        data: [BUG, BUG],
      });
      assert.deepStrictEqual(response.meta?.batch_stats, { total: 2, successful: 1, failed: 1, skipped: 0 });
    });

    it("times out a collaborator that never answers", async () => {
      const labels: LabelService = { execute: () => new Promise<JsonValue>(() => undefined) };
      const { send } = harness({ services: { ...createMemoryServices(), labels }, commandTimeoutMs: 20 });

      const response = await send({ type: "query_labels" });
      assert.deepStrictEqual(response.error, {
        code: "COMMAND_TIMEOUT",
        message: "Command 'query_labels' timed out after 20ms",
        error_type: "system",
        retry_after: 5,
      });
    });

    it("refuses commands on a connection that is not connected", async () => {
      const { send, connection } = harness();
      connection.transition("suspended");

      const response = await send({ type: "ping" });
      assert.deepStrictEqual(response.error, {
        code: "CONNECTION_LOST",
        message: "Connection is suspended",
        error_type: "network",
      });
    });
  });
});

describe("idempotencyScope", () => {
  it("scopes domain commands to the user and channel commands to the connection", () => {
    const connection = new Connection({
      principal: { user_id: "u-1", username: "alice" },
      transport: new RecordingTransport(),
      id: "c-1",
      now: T0,
    });
    assert.strictEqual(idempotencyScope(connection, { type: "delete_label", label_id: "l-1" }), "u-1");
    assert.strictEqual(idempotencyScope(connection, { type: "unsubscribe", topics: ["labels"] }), "u-1/c-1");
  });
});

describe("buildPagination", () => {
  it("positions a middle page", () => {
    assert.deepStrictEqual(buildPagination(45, 20, 20, 20), {
      page: 2,
      per_page: 20,
      total_pages: 3,
      has_next: true,
      has_prev: true,
    });
  });

  it("uses the returned count when no limit was given", () => {
    assert.deepStrictEqual(buildPagination(3, 3, undefined, undefined), {
      page: 1,
      per_page: 3,
      total_pages: 1,
      has_next: false,
      has_prev: false,
    });
  });

  it("handles an empty result", () => {
    assert.deepStrictEqual(buildPagination(0, 0, undefined, undefined), {
      page: 1,
      per_page: 1,
      total_pages: 0,
      has_next: false,
      has_prev: false,
    });
  });
});

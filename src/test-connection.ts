/**
 * Unit tests for connection.ts, connection-registry.ts and event-broadcaster.ts
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { Connection, canTransition } from "./connection.js";
import { CLOSE_CODE_STALE, ConnectionRegistry } from "./connection-registry.js";
import { EventBroadcaster } from "./event-broadcaster.js";
import { MemorySink, MetricNames, MetricsEmitter } from "./metrics-index.js";
import { RecordingTransport } from "./testing.js";
import type { Principal } from "./types.js";

const T0 = 1_700_000_000_000;

const ALICE: Principal = { user_id: "u-1", username: "alice", workspace_id: "w-1" };
const BOB: Principal = { user_id: "u-2", username: "bob", workspace_id: "w-1" };
const CAROL: Principal = { user_id: "u-3", username: "carol", workspace_id: "w-2" };

function open(principal: Principal, id?: string): { connection: Connection; transport: RecordingTransport } {
  const transport = new RecordingTransport();
  const connection = new Connection({ principal, transport, id, now: T0 });
  return { connection, transport };
}

describe("connection", () => {
  // ==========================================================================
  // STATE MACHINE
  // ==========================================================================

  describe("transition", () => {
    it("follows the lifecycle graph", () => {
      assert.strictEqual(canTransition("connecting", "connected"), true);
      assert.strictEqual(canTransition("connected", "suspended"), true);
      assert.strictEqual(canTransition("suspended", "reconnecting"), true);
      assert.strictEqual(canTransition("reconnecting", "connected"), true);
      assert.strictEqual(canTransition("connected", "reconnecting"), false);
      assert.strictEqual(canTransition("suspended", "connected"), false);
      assert.strictEqual(canTransition("closed", "connected"), false);
    });

    it("leaves the state unchanged on an illegal move", () => {
      const { connection } = open(ALICE);
      assert.strictEqual(connection.transition("suspended"), false);
      assert.strictEqual(connection.state, "connecting");
    });

    it("accepts commands only while connected", () => {
      const { connection } = open(ALICE);
      assert.strictEqual(connection.isAcceptingCommands(), false);
      connection.transition("connected");
      assert.strictEqual(connection.isAcceptingCommands(), true);
      connection.transition("suspended");
      assert.strictEqual(connection.isAcceptingCommands(), false);
    });
  });

  // ==========================================================================
  // OUTBOUND
  // ==========================================================================

  describe("send", () => {
    it("writes JSON to the transport while live", () => {
      const { connection, transport } = open(ALICE);
      connection.transition("connected");
      assert.strictEqual(connection.send({ type: "x", n: 1 }), "sent");
      assert.deepStrictEqual(transport.sent, ['{"type":"x","n":1}']);
    });

    it("reports a transport drop", () => {
      const { connection, transport } = open(ALICE);
      connection.transition("connected");
      transport.result = "dropped";
      assert.strictEqual(connection.send({ type: "x" }, { critical: false }), "dropped");
    });

    it("queues while suspended and flushes in order", () => {
      const { connection, transport } = open(ALICE);
      connection.transition("connected");
      connection.transition("suspended");

      assert.strictEqual(connection.send({ n: 1 }), "queued");
      assert.strictEqual(connection.send({ n: 2 }), "queued");
      assert.strictEqual(connection.queueSize, 2);
      assert.deepStrictEqual(transport.sent, []);

      assert.strictEqual(connection.flushQueue(), 2);
      assert.deepStrictEqual(transport.sent, ['{"n":1}', '{"n":2}']);
      assert.strictEqual(connection.queueSize, 0);
    });

    it("drops the oldest queued message when the queue is full", () => {
      const transport = new RecordingTransport();
      const connection = new Connection({ principal: ALICE, transport, maxQueueSize: 2, now: T0 });
      connection.transition("connected");
      connection.transition("suspended");
      connection.send({ n: 1 });
      connection.send({ n: 2 });
      connection.send({ n: 3 });

      connection.flushQueue();
      assert.deepStrictEqual(transport.sent, ['{"n":2}', '{"n":3}']);
      assert.strictEqual(connection.info().dropped_messages, 1);
    });
  });

  describe("close", () => {
    it("is terminal and closes the transport once", () => {
      const { connection, transport } = open(ALICE);
      connection.transition("connected");
      connection.close(4000, "bye");
      connection.close(1000, "again");

      assert.strictEqual(connection.state, "closed");
      assert.deepStrictEqual(transport.closes, [{ code: 4000, reason: "bye" }]);
      assert.strictEqual(connection.send({ type: "x" }), "closed");
      assert.strictEqual(connection.transition("connected"), false);
    });
  });

  describe("info", () => {
    it("describes the connection", () => {
      const { connection } = open(ALICE, "c-1");
      connection.transition("connected");
      connection.subscribe(["labels", "issues"]);
      connection.unsubscribe(["issues"]);
      connection.touch(T0 + 1000);

      assert.deepStrictEqual(connection.info(), {
        connection_id: "c-1",
        user_id: "u-1",
        username: "alice",
        connected_at: "2023-11-14T22:13:20.000Z",
        last_ping: "2023-11-14T22:13:21.000Z",
        subscriptions: ["labels"],
        message_queue_size: 0,
        dropped_messages: 0,
        state: "connected",
      });
    });
  });
});

describe("connection-registry", () => {
  // ==========================================================================
  // ADMISSION
  // ==========================================================================

  describe("add", () => {
    it("connects and sends the welcome message", () => {
      const registry = new ConnectionRegistry({ serverVersion: "9.9.9", protocolVersion: "2.0" });
      const { connection, transport } = open(ALICE, "c-1");

      const result = registry.add(connection);

      assert.strictEqual(result.ok, true);
      assert.strictEqual(connection.state, "connected");
      assert.deepStrictEqual(transport.messages(), [
        {
          type: "welcome",
          data: {
            message: "Connected successfully",
            connection_id: "c-1",
            recovery_token: connection.recoveryToken,
            online_users: 1,
            server_version: "9.9.9",
            protocol_version: "2.0",
          },
        },
      ]);
    });

    it("enforces the per-user cap", () => {
      const registry = new ConnectionRegistry({ maxConnectionsPerUser: 1 });
      registry.add(open(ALICE).connection);
      const second = open(ALICE).connection;

      const result = registry.add(second);
      assert.deepStrictEqual(result, {
        ok: false,
        code: "USER_CONNECTION_LIMIT",
        reason: "Too many connections for user (1 max)",
      });
      assert.strictEqual(second.state, "connecting");
      assert.strictEqual(registry.add(open(BOB).connection).ok, true);
    });

    it("enforces the global cap and counts rejections", () => {
      const sink = new MemorySink();
      const registry = new ConnectionRegistry({ maxConnections: 1 }, undefined, new MetricsEmitter({ sink }));
      registry.add(open(ALICE).connection);

      const result = registry.add(open(BOB).connection);
      assert.strictEqual(result.ok, false);
      if (!result.ok) assert.strictEqual(result.code, "CONNECTION_LIMIT");
      assert.strictEqual(sink.getCounterTotal(MetricNames.CONNECTIONS_REJECTED_TOTAL), 1);
    });

    it("tells workspace peers when a user joins", () => {
      const registry = new ConnectionRegistry();
      const alice = open(ALICE);
      const carol = open(CAROL);
      registry.add(alice.connection);
      registry.add(carol.connection);
      registry.add(open(BOB).connection);

      const joined = alice.transport.ofType("event");
      assert.strictEqual(joined.length, 1);
      assert.strictEqual(joined[0]?.event, "user_joined");
      assert.strictEqual(joined[0]?.topic, "presence");
      assert.strictEqual(joined[0]?.actor_id, "u-2");
      assert.deepStrictEqual(joined[0]?.data, { user_id: "u-2", username: "bob", online_users: 3 });
      // Carol is in another workspace
      assert.deepStrictEqual(carol.transport.ofType("event"), []);
    });

    it("announces only a user's first connection", () => {
      const registry = new ConnectionRegistry();
      const bob = open(BOB);
      registry.add(bob.connection);
      registry.add(open(ALICE).connection);
      registry.add(open(ALICE).connection);

      assert.strictEqual(bob.transport.ofType("event").length, 1);
      assert.deepStrictEqual(registry.listOnline(), [
        { user_id: "u-2", username: "bob", connections: 1 },
        { user_id: "u-1", username: "alice", connections: 2 },
      ]);
    });
  });

  describe("remove", () => {
    it("closes the connection and tells peers the user left", () => {
      const registry = new ConnectionRegistry();
      const alice = open(ALICE);
      const bob = open(BOB, "c-bob");
      registry.add(alice.connection);
      registry.add(bob.connection);

      assert.strictEqual(registry.remove("c-bob", 1000, "done"), true);
      assert.strictEqual(registry.remove("c-bob"), false);

      assert.deepStrictEqual(bob.transport.closes, [{ code: 1000, reason: "done" }]);
      const left = alice.transport.ofType("event").filter((m) => m.event === "user_left");
      assert.deepStrictEqual(left[0]?.data, { user_id: "u-2", username: "bob", online_users: 1 });
      assert.strictEqual(registry.count(), 1);
    });
  });

  // ==========================================================================
  // RECOVERY
  // ==========================================================================

  describe("suspend and resume", () => {
    it("queues while suspended and replays on resume", () => {
      const registry = new ConnectionRegistry();
      const { connection } = open(ALICE, "c-1");
      registry.add(connection);

      assert.strictEqual(registry.suspend("c-1"), true);
      assert.strictEqual(registry.send("c-1", { type: "note" }), "queued");
      assert.strictEqual(registry.count(), 1);
      assert.deepStrictEqual(registry.connected(), []);

      const fresh = new RecordingTransport();
      const resumed = registry.resume(connection.recoveryToken, "u-1", fresh, T0 + 5000);

      assert.strictEqual(resumed, connection);
      assert.strictEqual(connection.state, "connected");
      assert.strictEqual(connection.lastPing, T0 + 5000);
      assert.deepStrictEqual(fresh.messages(), [
        { type: "note" },
        { type: "resumed", data: { connection_id: "c-1", replayed_messages: 1 } },
      ]);
    });

    it("refuses a token presented by another user", () => {
      const registry = new ConnectionRegistry();
      const { connection } = open(ALICE, "c-1");
      registry.add(connection);
      registry.suspend("c-1");

      assert.strictEqual(registry.resume(connection.recoveryToken, "u-2", new RecordingTransport()), undefined);
      assert.strictEqual(connection.state, "suspended");
    });

    it("refuses unknown tokens and live connections", () => {
      const registry = new ConnectionRegistry();
      const { connection } = open(ALICE, "c-1");
      registry.add(connection);

      assert.strictEqual(registry.resume("nope", "u-1", new RecordingTransport()), undefined);
      assert.strictEqual(registry.resume(connection.recoveryToken, "u-1", new RecordingTransport()), undefined);
      assert.strictEqual(connection.state, "connected");
    });

    it("forgets the token once the connection is removed", () => {
      const registry = new ConnectionRegistry();
      const { connection } = open(ALICE, "c-1");
      registry.add(connection);
      registry.suspend("c-1");
      registry.remove("c-1");

      assert.strictEqual(registry.resume(connection.recoveryToken, "u-1", new RecordingTransport()), undefined);
    });
  });

  // ==========================================================================
  // DELIVERY
  // ==========================================================================

  describe("delivery", () => {
    it("broadcasts to connected connections only", () => {
      const registry = new ConnectionRegistry();
      registry.add(open(ALICE, "c-1").connection);
      registry.add(open(BOB, "c-2").connection);
      registry.add(open(CAROL, "c-3").connection);
      registry.suspend("c-3");

      assert.deepStrictEqual(registry.broadcast({ type: "notice" }), { sent: 2, dropped: 0, queued: 0 });
    });

    it("queues for a user's suspended connections", () => {
      const registry = new ConnectionRegistry();
      registry.add(open(ALICE, "c-1").connection);
      registry.add(open(ALICE, "c-2").connection);
      registry.suspend("c-2");

      assert.deepStrictEqual(registry.sendToUser("u-1", { type: "notice" }), { sent: 1, dropped: 0, queued: 1 });
      assert.deepStrictEqual(registry.sendToUser("u-9", { type: "notice" }), { sent: 0, dropped: 0, queued: 0 });
    });

    it("targets a workspace", () => {
      const registry = new ConnectionRegistry();
      registry.add(open(ALICE).connection);
      registry.add(open(BOB).connection);
      const carol = open(CAROL);
      registry.add(carol.connection);

      assert.deepStrictEqual(registry.sendToWorkspace("w-2", { type: "notice" }), { sent: 1, dropped: 0, queued: 0 });
      assert.deepStrictEqual(carol.transport.last(), { type: "notice" });
    });
  });

  // ==========================================================================
  // STALE SWEEP
  // ==========================================================================

  describe("cleanupStale", () => {
    it("removes connections idle past the threshold", () => {
      const registry = new ConnectionRegistry();
      const alice = open(ALICE, "c-1");
      const bob = open(BOB, "c-2");
      registry.add(alice.connection);
      registry.add(bob.connection);
      registry.updatePing("c-2", T0 + 200_000);

      assert.deepStrictEqual(registry.cleanupStale(300, T0 + 300_000), []);
      assert.deepStrictEqual(registry.cleanupStale(300, T0 + 300_001), ["c-1"]);
      assert.deepStrictEqual(alice.transport.closes, [{ code: CLOSE_CODE_STALE, reason: "Connection idle timeout" }]);
      assert.strictEqual(registry.count(), 1);
    });
  });

  describe("closeAll", () => {
    it("closes every connection with the shutdown code", () => {
      const registry = new ConnectionRegistry();
      const alice = open(ALICE);
      const bob = open(BOB);
      registry.add(alice.connection);
      registry.add(bob.connection);

      registry.closeAll();

      assert.strictEqual(registry.count(), 0);
      assert.deepStrictEqual(alice.transport.closes, [{ code: 1001, reason: "Server shutting down" }]);
      assert.deepStrictEqual(bob.transport.closes, [{ code: 1001, reason: "Server shutting down" }]);
    });
  });
});

describe("event-broadcaster", () => {
  describe("publish", () => {
    it("delivers to subscribed connections in the event's workspace", () => {
      const registry = new ConnectionRegistry();
      const alice = open(ALICE);
      const bob = open(BOB);
      const carol = open(CAROL);
      for (const c of [alice, bob, carol]) registry.add(c.connection);
      alice.connection.subscribe(["labels"]);
      carol.connection.subscribe(["labels"]);

      const broadcaster = new EventBroadcaster(registry);
      const result = broadcaster.publish(
        { topic: "labels", event: "label.created", workspace_id: "w-1", actor_id: "u-2", data: { id: "l-1" } },
        T0
      );

      assert.deepStrictEqual(result, { delivered: 1, dropped: 0 });
      assert.deepStrictEqual(alice.transport.last(), {
        type: "event",
        timestamp: "2023-11-14T22:13:20.000Z",
        topic: "labels",
        event: "label.created",
        workspace_id: "w-1",
        actor_id: "u-2",
        data: { id: "l-1" },
      });
    });

    it("reaches every workspace when the event names none", () => {
      const registry = new ConnectionRegistry();
      const alice = open(ALICE);
      const carol = open(CAROL);
      registry.add(alice.connection);
      registry.add(carol.connection);
      alice.connection.subscribe(["system"]);
      carol.connection.subscribe(["system"]);

      const result = new EventBroadcaster(registry).publish({ topic: "system", event: "notice", data: null }, T0);
      assert.deepStrictEqual(result, { delivered: 2, dropped: 0 });
    });

    it("drops events for consumers under backpressure and counts them", () => {
      const sink = new MemorySink();
      const registry = new ConnectionRegistry();
      const alice = open(ALICE);
      const bob = open(BOB);
      registry.add(alice.connection);
      registry.add(bob.connection);
      alice.connection.subscribe(["labels"]);
      bob.connection.subscribe(["labels"]);
      bob.transport.result = "dropped";

      const broadcaster = new EventBroadcaster(registry, undefined, new MetricsEmitter({ sink }));
      const result = broadcaster.publish({ topic: "labels", event: "label.deleted", workspace_id: "w-1", data: {} }, T0);

      assert.deepStrictEqual(result, { delivered: 1, dropped: 1 });
      assert.deepStrictEqual(broadcaster.getStats(), { published: 1, delivered: 1, dropped: 1 });
      assert.strictEqual(sink.getCounterTotal(MetricNames.EVENTS_DROPPED_TOTAL), 1);
    });
  });
});

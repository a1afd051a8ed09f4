/**
 * Unit tests for server.ts: the socket transport and server wiring
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { setTimeout as delay } from "node:timers/promises";
import { ConfigError, DEFAULT_CONFIG } from "./config.js";
import { Connection } from "./connection.js";
import { MemoryLogger } from "./logger-types.js";
import { createMemoryServices } from "./memory-services.js";
import {
  BACKPRESSURE_CRITICAL_BYTES,
  BACKPRESSURE_THRESHOLD_BYTES,
  ChannelServer,
  type SocketLike,
  WebSocketTransport,
} from "./server.js";
import type { LabelService } from "./services.js";
import { RecordingTransport } from "./testing.js";

const SECRET = "test-secret-value-123";

const OPEN = 1;
const CLOSING = 2;
const CLOSED = 3;

class FakeSocket implements SocketLike {
  readyState = OPEN;
  bufferedAmount = 0;
  failSend = false;
  readonly sent: string[] = [];
  readonly closes: Array<{ code?: number; reason?: string }> = [];

  send(data: string): void {
    if (this.failSend) throw new Error("socket write failed");
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closes.push({ code, reason });
    this.readyState = CLOSING;
  }
}

describe("WebSocketTransport", () => {
  // ==========================================================================
  // SEND
  // ==========================================================================

  describe("send", () => {
    it("writes to an open socket", () => {
      const socket = new FakeSocket();
      const transport = new WebSocketTransport(socket, new MemoryLogger());
      assert.strictEqual(transport.send('{"type":"note"}', { critical: false }), "sent");
      assert.deepStrictEqual(socket.sent, ['{"type":"note"}']);
    });

    it("reports a socket that is no longer open", () => {
      const socket = new FakeSocket();
      socket.readyState = CLOSED;
      const transport = new WebSocketTransport(socket, new MemoryLogger());
      assert.strictEqual(transport.send("{}", { critical: true }), "closed");
      assert.deepStrictEqual(socket.sent, []);
    });

    it("drops non-critical messages under backpressure", () => {
      const socket = new FakeSocket();
      socket.bufferedAmount = BACKPRESSURE_THRESHOLD_BYTES + 1;
      const transport = new WebSocketTransport(socket, new MemoryLogger());

      assert.strictEqual(transport.send("event", { critical: false }), "dropped");
      assert.strictEqual(transport.send("response", { critical: true }), "sent");
      assert.deepStrictEqual(socket.sent, ["response"]);
    });

    it("closes the socket under critical backpressure", () => {
      const socket = new FakeSocket();
      socket.bufferedAmount = BACKPRESSURE_CRITICAL_BYTES + 1;
      const logger = new MemoryLogger();
      const transport = new WebSocketTransport(socket, logger);

      assert.strictEqual(transport.send("response", { critical: true }), "dropped");
      assert.deepStrictEqual(socket.closes, [{ code: 1011, reason: "Server overloaded - backpressure critical" }]);
      assert.deepStrictEqual(logger.messages("warn"), ["Closing connection under critical backpressure"]);
    });

    it("reports a failed write as dropped", () => {
      const socket = new FakeSocket();
      socket.failSend = true;
      const logger = new MemoryLogger();
      const transport = new WebSocketTransport(socket, logger);

      assert.strictEqual(transport.send("{}", { critical: true }), "dropped");
      assert.deepStrictEqual(logger.messages("error"), ["WebSocket send failed"]);
    });
  });

  describe("close", () => {
    it("closes an open socket once", () => {
      const socket = new FakeSocket();
      const transport = new WebSocketTransport(socket, new MemoryLogger());
      transport.close(1000, "bye");
      transport.close(1000, "bye");
      assert.deepStrictEqual(socket.closes, [{ code: 1000, reason: "bye" }]);
    });
  });
});

describe("ChannelServer", () => {
  it("refuses an invalid configuration", () => {
    assert.throws(
      () => new ChannelServer({ config: { ...DEFAULT_CONFIG, secret: "short" }, logger: new MemoryLogger() }),
      (error: unknown) => error instanceof ConfigError
    );
  });

  it("builds an authenticator only when security is enabled", () => {
    const secured = new ChannelServer({ config: { ...DEFAULT_CONFIG, secret: SECRET }, logger: new MemoryLogger() });
    const open = new ChannelServer({
      config: { ...DEFAULT_CONFIG, securityEnabled: false },
      logger: new MemoryLogger(),
    });
    assert.notStrictEqual(secured.authenticator, undefined);
    assert.strictEqual(open.authenticator, undefined);
  });

  it("reports component stats before starting", () => {
    const server = new ChannelServer({ config: { ...DEFAULT_CONFIG, secret: SECRET }, logger: new MemoryLogger() });
    const stats = server.getStats();
    assert.strictEqual(stats.connections, 0);
    assert.strictEqual(stats.online, 0);
  });

  it("answers every frame of a connection in arrival order", async () => {
    const labels: LabelService = {
      execute: async () => {
        await delay(20);
        return { items: [], total: 0 };
      },
    };
    const server = new ChannelServer({
      config: { ...DEFAULT_CONFIG, securityEnabled: false },
      services: { ...createMemoryServices(), labels },
      logger: new MemoryLogger(),
    });
    const transport = new RecordingTransport();
    const connection = new Connection({
      principal: { user_id: "u-1", username: "alice", workspace_id: "w-1" },
      transport,
      id: "c-1",
    });
    server.registry.add(connection);
    const before = transport.sent.length;

    const oversized = Buffer.alloc(DEFAULT_CONFIG.maxMessageBytes + 1, 0x20);
    await Promise.all([
      server.receive(connection, Buffer.from(JSON.stringify({ type: "query_labels", request_id: "r-1" }))),
      server.receive(connection, oversized),
      server.receive(connection, Buffer.from("{not json")),
    ]);

    const sent = transport.messages().slice(before);
    assert.strictEqual(sent.length, 3);
    assert.strictEqual(sent[0].request_id, "r-1");
    assert.strictEqual(sent[0].success, true);
    assert.deepStrictEqual(
      sent.slice(1).map((m) => m.type),
      ["error", "error"]
    );
    assert.deepStrictEqual(sent[1].error, {
      code: "MESSAGE_TOO_LARGE",
      message: `Message size ${DEFAULT_CONFIG.maxMessageBytes + 1} exceeds limit of ${DEFAULT_CONFIG.maxMessageBytes} bytes`,
      error_type: "validation",
    });
    assert.deepStrictEqual(sent[2].error, {
      code: "COMMAND_INVALID",
      message: "Message is not valid JSON",
      error_type: "validation",
    });
  });

  it("shuts down once", async () => {
    const logger = new MemoryLogger();
    const server = new ChannelServer({ config: { ...DEFAULT_CONFIG, secret: SECRET }, logger });

    await server.stop();
    await server.stop();
    assert.strictEqual(server.isInShutdown(), true);
    assert.deepStrictEqual(
      logger.messages("info").filter((m) => m === "Graceful shutdown initiated"),
      ["Graceful shutdown initiated"]
    );
  });
});

/**
 * A client connection and its lifecycle state machine.
 *
 *   connecting → connected → suspended → reconnecting → connected
 *   any state → closed; nothing leaves closed
 *
 * While suspended or reconnecting, outbound messages are queued (bounded,
 * oldest dropped first) and flushed when the connection is resumed.
 */

import { randomBytes, randomUUID } from "node:crypto";
import type { JsonObject, JsonValue, Principal } from "./types.js";

export type ConnectionState = "connecting" | "connected" | "suspended" | "reconnecting" | "closed";

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  connecting: ["connected", "closed"],
  connected: ["suspended", "closed"],
  suspended: ["reconnecting", "closed"],
  reconnecting: ["connected", "closed"],
  closed: [],
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Outcome of handing one message to a transport.
 * - sent: written to the socket
 * - dropped: the transport refused it (backpressure on a non-critical message)
 * - closed: the transport is gone
 */
export type TransportSendResult = "sent" | "dropped" | "closed";

export type SendResult = TransportSendResult | "queued";

/**
 * The socket side of a connection. The server adapts a `ws` WebSocket to this;
 * tests use an in-memory recorder.
 */
export interface ConnectionTransport {
  /**
   * @param critical - non-critical messages may be dropped under backpressure
   */
  send(data: string, options: { critical: boolean }): TransportSendResult;
  close(code: number, reason: string): void;
}

export interface ConnectionOptions {
  principal: Principal;
  transport: ConnectionTransport;
  id?: string;
  /** Outbound queue bound while suspended (default: 1000) */
  maxQueueSize?: number;
  metadata?: Record<string, JsonValue>;
  now?: number;
}

const DEFAULT_MAX_QUEUE_SIZE = 1000;

export class Connection {
  readonly id: string;
  readonly principal: Principal;
  readonly connectedAt: number;
  readonly recoveryToken: string;
  readonly subscriptions = new Set<string>();
  readonly metadata: Record<string, JsonValue>;

  private _state: ConnectionState = "connecting";
  private _lastPing: number;
  private transport: ConnectionTransport;
  private readonly queue: string[] = [];
  private readonly maxQueueSize: number;
  private droppedMessages = 0;

  constructor(options: ConnectionOptions) {
    const now = options.now ?? Date.now();
    this.id = options.id ?? randomUUID();
    this.principal = options.principal;
    this.transport = options.transport;
    this.connectedAt = now;
    this._lastPing = now;
    this.recoveryToken = randomBytes(24).toString("hex");
    this.metadata = options.metadata ?? {};
    this.maxQueueSize =
      typeof options.maxQueueSize === "number" && options.maxQueueSize > 0
        ? options.maxQueueSize
        : DEFAULT_MAX_QUEUE_SIZE;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get lastPing(): number {
    return this._lastPing;
  }

  get queueSize(): number {
    return this.queue.length;
  }

  /**
   * Move to a new state. Returns false (and changes nothing) for an illegal transition.
   */
  transition(to: ConnectionState): boolean {
    if (!canTransition(this._state, to)) return false;
    this._state = to;
    return true;
  }

  /**
   * Commands are accepted only from a live connection.
   */
  isAcceptingCommands(): boolean {
    return this._state === "connected";
  }

  touch(now = Date.now()): void {
    this._lastPing = now;
  }

  // ==========================================================================
  // SUBSCRIPTIONS
  // ==========================================================================

  subscribe(topics: string[]): string[] {
    for (const topic of topics) this.subscriptions.add(topic);
    return [...this.subscriptions];
  }

  unsubscribe(topics: string[]): string[] {
    for (const topic of topics) this.subscriptions.delete(topic);
    return [...this.subscriptions];
  }

  isSubscribed(topic: string): boolean {
    return this.subscriptions.has(topic);
  }

  // ==========================================================================
  // OUTBOUND
  // ==========================================================================

  /**
   * Send a JSON message. Queued while the connection is suspended or
   * reconnecting, and a no-op once closed.
   */
  send(message: object, options: { critical?: boolean } = {}): SendResult {
    const critical = options.critical ?? true;
    switch (this._state) {
      case "closed":
        return "closed";
      case "suspended":
      case "reconnecting":
        this.enqueue(JSON.stringify(message));
        return "queued";
      case "connecting":
      case "connected":
        return this.transport.send(JSON.stringify(message), { critical });
    }
  }

  /**
   * Swap in the socket of a reconnecting client.
   */
  attach(transport: ConnectionTransport): void {
    this.transport = transport;
  }

  /**
   * Write queued messages to the transport. Returns the count written.
   */
  flushQueue(): number {
    let flushed = 0;
    while (this.queue.length > 0) {
      const data = this.queue.shift();
      if (data === undefined) break;
      if (this.transport.send(data, { critical: true }) === "sent") {
        flushed++;
      }
    }
    return flushed;
  }

  /**
   * Close the transport and enter the terminal state.
   */
  close(code = 1000, reason = "Connection closed"): void {
    if (this._state === "closed") return;
    this._state = "closed";
    this.queue.length = 0;
    this.transport.close(code, reason);
  }

  info(): JsonObject {
    return {
      connection_id: this.id,
      user_id: this.principal.user_id,
      username: this.principal.username,
      connected_at: new Date(this.connectedAt).toISOString(),
      last_ping: new Date(this._lastPing).toISOString(),
      subscriptions: [...this.subscriptions],
      message_queue_size: this.queue.length,
      dropped_messages: this.droppedMessages,
      state: this._state,
    };
  }

  private enqueue(data: string): void {
    if (this.queue.length >= this.maxQueueSize) {
      this.queue.shift();
      this.droppedMessages++;
    }
    this.queue.push(data);
  }
}

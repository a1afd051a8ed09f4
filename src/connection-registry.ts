/**
 * ConnectionRegistry - every live (and recoverable) connection in the process.
 *
 * Responsibilities:
 * - Admission (global and per-user caps), welcome message, presence events
 * - Targeted and broadcast delivery
 * - Suspension on socket loss and resumption by recovery token
 * - Stale connection sweep by last ping
 */

import type { Connection, ConnectionTransport, SendResult } from "./connection.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import { MetricNames, MetricsEmitter } from "./metrics-index.js";
import type { ChannelEvent, ServerMessage } from "./types.js";

// ============================================================================
// CONFIG
// ============================================================================

export interface ConnectionRegistryConfig {
  /** Maximum connections in the registry, suspended ones included (default: 1000) */
  maxConnections: number;
  /** Maximum connections per user (default: 10) */
  maxConnectionsPerUser: number;
  /** Idle time after which a connection is stale, seconds (default: 300) */
  staleTimeoutSeconds: number;
  /** Stale sweep interval in milliseconds (default: 60000) */
  cleanupIntervalMs: number;
  serverVersion: string;
  protocolVersion: string;
}

export const DEFAULT_REGISTRY_CONFIG: ConnectionRegistryConfig = {
  maxConnections: 1000,
  maxConnectionsPerUser: 10,
  staleTimeoutSeconds: 300,
  cleanupIntervalMs: 60_000,
  serverVersion: "1.0.0",
  protocolVersion: "1.0",
};

/** Close code for a connection removed by the stale sweep. */
export const CLOSE_CODE_STALE = 4000;

export type AddConnectionResult =
  | { ok: true; connection: Connection }
  | { ok: false; reason: string; code: "CONNECTION_LIMIT" | "USER_CONNECTION_LIMIT" | "INVALID_STATE" };

export interface OnlineUser {
  user_id: string;
  username: string;
  connections: number;
}

export interface DeliveryStats {
  sent: number;
  dropped: number;
  queued: number;
}

// ============================================================================
// REGISTRY
// ============================================================================

export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();
  private readonly byUser = new Map<string, Set<string>>();
  private readonly byRecoveryToken = new Map<string, string>();
  private readonly config: ConnectionRegistryConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsEmitter;
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(
    config: Partial<ConnectionRegistryConfig> = {},
    logger: Logger = new NoOpLogger(),
    metrics: MetricsEmitter = new MetricsEmitter()
  ) {
    this.config = { ...DEFAULT_REGISTRY_CONFIG, ...config };
    this.logger = logger;
    this.metrics = metrics;
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /**
   * Admit a new connection: connecting → connected.
   * Sends the welcome message and, for a user's first connection, user_joined.
   */
  add(connection: Connection): AddConnectionResult {
    if (this.connections.size >= this.config.maxConnections) {
      return this.rejectAdmission("CONNECTION_LIMIT", `Server at capacity (${this.config.maxConnections} connections)`);
    }

    const userId = connection.principal.user_id;
    const userConnections = this.byUser.get(userId);
    if (userConnections && userConnections.size >= this.config.maxConnectionsPerUser) {
      return this.rejectAdmission(
        "USER_CONNECTION_LIMIT",
        `Too many connections for user (${this.config.maxConnectionsPerUser} max)`
      );
    }

    if (!connection.transition("connected")) {
      return { ok: false, code: "INVALID_STATE", reason: `Cannot admit connection in state ${connection.state}` };
    }

    const firstForUser = !userConnections || userConnections.size === 0;
    this.connections.set(connection.id, connection);
    this.byRecoveryToken.set(connection.recoveryToken, connection.id);
    if (userConnections) {
      userConnections.add(connection.id);
    } else {
      this.byUser.set(userId, new Set([connection.id]));
    }

    this.metrics.counter(MetricNames.CONNECTIONS_TOTAL);
    this.updateActiveGauge();
    this.logger.info("Connection added", { connectionId: connection.id, userId });

    const welcome: ServerMessage = {
      type: "welcome",
      data: {
        message: "Connected successfully",
        connection_id: connection.id,
        recovery_token: connection.recoveryToken,
        online_users: this.listOnline().length,
        server_version: this.config.serverVersion,
        protocol_version: this.config.protocolVersion,
      },
    };
    connection.send(welcome);

    if (firstForUser) {
      this.metrics.event(MetricNames.EVENT_USER_JOINED, { userId });
      this.publishPresence("user_joined", connection);
    }

    return { ok: true, connection };
  }

  /**
   * Close and forget a connection. Missing ids are a no-op.
   * Sends user_left when it was the user's last connection.
   */
  remove(connectionId: string, code = 1000, reason = "Connection closed"): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) return false;

    this.connections.delete(connectionId);
    this.byRecoveryToken.delete(connection.recoveryToken);
    connection.close(code, reason);

    const userId = connection.principal.user_id;
    const userConnections = this.byUser.get(userId);
    userConnections?.delete(connectionId);
    const lastForUser = !userConnections || userConnections.size === 0;
    if (lastForUser) {
      this.byUser.delete(userId);
    }

    this.updateActiveGauge();
    this.logger.info("Connection removed", { connectionId, userId, code, reason });

    if (lastForUser) {
      this.metrics.event(MetricNames.EVENT_USER_LEFT, { userId });
      this.publishPresence("user_left", connection);
    }
    return true;
  }

  /**
   * Keep a connection whose socket dropped so its client can resume it.
   * Returns false for a missing id or a connection that was not connected.
   */
  suspend(connectionId: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection || !connection.transition("suspended")) return false;
    this.updateActiveGauge();
    this.logger.debug("Connection suspended", { connectionId });
    return true;
  }

  /**
   * Resume a suspended connection on a new socket:
   * suspended → reconnecting → connected, then flush its queue.
   *
   * The token must belong to a connection of the same user.
   */
  resume(recoveryToken: string, userId: string, transport: ConnectionTransport, now = Date.now()): Connection | undefined {
    const connectionId = this.byRecoveryToken.get(recoveryToken);
    const connection = connectionId !== undefined ? this.connections.get(connectionId) : undefined;
    if (!connection || connection.principal.user_id !== userId) {
      return undefined;
    }
    if (!connection.transition("reconnecting")) {
      return undefined;
    }

    connection.attach(transport);
    connection.touch(now);
    connection.transition("connected");
    const replayed = connection.flushQueue();

    const resumed: ServerMessage = {
      type: "resumed",
      data: { connection_id: connection.id, replayed_messages: replayed },
    };
    connection.send(resumed);

    this.metrics.counter(MetricNames.CONNECTIONS_RESUMED_TOTAL);
    this.updateActiveGauge();
    this.logger.info("Connection resumed", { connectionId: connection.id, userId, replayed });
    return connection;
  }

  get(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  /**
   * Record liveness. Missing ids are a no-op.
   */
  updatePing(connectionId: string, now = Date.now()): void {
    this.connections.get(connectionId)?.touch(now);
  }

  // ==========================================================================
  // DELIVERY
  // ==========================================================================

  send(connectionId: string, message: object, options: { critical?: boolean } = {}): SendResult | undefined {
    return this.connections.get(connectionId)?.send(message, options);
  }

  /**
   * Deliver to every connected connection. Suspended and closed ones are skipped.
   */
  broadcast(message: object, options: { critical?: boolean } = {}): DeliveryStats {
    return this.deliver(this.connected(), message, options);
  }

  /**
   * Deliver to every connection of a user, queuing for suspended ones.
   */
  sendToUser(userId: string, message: object, options: { critical?: boolean } = {}): DeliveryStats {
    const ids = this.byUser.get(userId) ?? new Set<string>();
    const targets: Connection[] = [];
    for (const id of ids) {
      const connection = this.connections.get(id);
      if (connection) targets.push(connection);
    }
    return this.deliver(targets, message, options);
  }

  /**
   * Deliver to every connected connection whose principal is in the workspace.
   */
  sendToWorkspace(workspaceId: string, message: object, options: { critical?: boolean } = {}): DeliveryStats {
    const targets = this.connected().filter((c) => c.principal.workspace_id === workspaceId);
    return this.deliver(targets, message, options);
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * Connections not yet closed, suspended ones included.
   */
  count(): number {
    return this.connections.size;
  }

  connected(): Connection[] {
    const result: Connection[] = [];
    for (const connection of this.connections.values()) {
      if (connection.state === "connected") result.push(connection);
    }
    return result;
  }

  /**
   * Users with at least one connected connection.
   */
  listOnline(): OnlineUser[] {
    const users = new Map<string, OnlineUser>();
    for (const connection of this.connected()) {
      const existing = users.get(connection.principal.user_id);
      if (existing) {
        existing.connections++;
      } else {
        users.set(connection.principal.user_id, {
          user_id: connection.principal.user_id,
          username: connection.principal.username,
          connections: 1,
        });
      }
    }
    return [...users.values()];
  }

  // ==========================================================================
  // STALE SWEEP
  // ==========================================================================

  /**
   * Remove connections whose last ping is older than the threshold.
   * Returns the removed ids.
   */
  cleanupStale(maxIdleSeconds = this.config.staleTimeoutSeconds, now = Date.now()): string[] {
    const cutoff = now - maxIdleSeconds * 1000;
    const stale: string[] = [];
    for (const connection of this.connections.values()) {
      if (connection.lastPing < cutoff) stale.push(connection.id);
    }

    for (const id of stale) {
      this.remove(id, CLOSE_CODE_STALE, "Connection idle timeout");
    }
    if (stale.length > 0) {
      this.metrics.counter(MetricNames.CONNECTIONS_STALE_REMOVED_TOTAL, stale.length);
      this.logger.warn("Removed stale connections", { count: stale.length });
    }
    return stale;
  }

  startPeriodicCleanup(): void {
    if (this.cleanupTimer) return;

    this.cleanupTimer = setInterval(() => {
      this.cleanupStale();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stopPeriodicCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  /**
   * Close every connection (shutdown).
   */
  closeAll(code = 1001, reason = "Server shutting down"): void {
    for (const id of [...this.connections.keys()]) {
      this.remove(id, code, reason);
    }
  }

  // ==========================================================================
  // PRIVATE
  // ==========================================================================

  private deliver(targets: Iterable<Connection>, message: object, options: { critical?: boolean }): DeliveryStats {
    const stats: DeliveryStats = { sent: 0, dropped: 0, queued: 0 };
    for (const connection of targets) {
      const result = connection.send(message, options);
      if (result === "sent") stats.sent++;
      else if (result === "queued") stats.queued++;
      else stats.dropped++;
    }
    return stats;
  }

  private publishPresence(event: "user_joined" | "user_left", connection: Connection): void {
    const presence: ChannelEvent = {
      topic: "presence",
      event,
      workspace_id: connection.principal.workspace_id,
      actor_id: connection.principal.user_id,
      data: {
        user_id: connection.principal.user_id,
        username: connection.principal.username,
        online_users: this.listOnline().length,
      },
    };
    const message: ServerMessage = { type: "event", timestamp: new Date().toISOString(), ...presence };
    const targets = this.connected().filter(
      (c) =>
        c.id !== connection.id &&
        (presence.workspace_id === undefined || c.principal.workspace_id === presence.workspace_id)
    );
    this.deliver(targets, message, { critical: false });
  }

  private rejectAdmission(code: "CONNECTION_LIMIT" | "USER_CONNECTION_LIMIT", reason: string): AddConnectionResult {
    this.metrics.counter(MetricNames.CONNECTIONS_REJECTED_TOTAL, 1, { reason: code });
    this.logger.warn("Connection rejected", { code, reason });
    return { ok: false, code, reason };
  }

  private updateActiveGauge(): void {
    this.metrics.gauge(MetricNames.CONNECTIONS_ACTIVE, this.connected().length);
  }
}

#!/usr/bin/env node
/**
 * worktrack-channel - real-time command channel for the work tracker
 *
 * Authenticated WebSocket clients send signed commands; each one is
 * verified, deduplicated, rate limited, executed against the domain
 * collaborators and answered on the same socket. Successful mutations fan
 * out as events to subscribed connections of the same workspace.
 */

import type { IncomingMessage } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import {
  type AuthFailureCode,
  type IdentityProvider,
  StaticTokenIdentityProvider,
  extractRecoveryToken,
  extractToken,
} from "./auth.js";
import { CommandDispatcher } from "./command-dispatcher.js";
import { CommandLanes } from "./command-lanes.js";
import { CommandRouter } from "./command-router.js";
import { type ChannelConfig, ConfigError, DEFAULT_CONFIG, loadConfigFromEnv, validateConfig } from "./config.js";
import { Connection, type ConnectionTransport, type TransportSendResult } from "./connection.js";
import { ConnectionRegistry } from "./connection-registry.js";
import { ErrorStats, createCommandError } from "./error-mapper.js";
import { EventBroadcaster } from "./event-broadcaster.js";
import { IdempotencyCache } from "./idempotency-cache.js";
import { type Logger, ConsoleLogger } from "./logger-index.js";
import { createMemoryServices } from "./memory-services.js";
import { MessageAuthenticator } from "./message-authenticator.js";
import { MetricsEmitter, type MetricsSink, NoOpSink, MemorySink, CompositeSink, MetricNames } from "./metrics-index.js";
import { RateLimiter } from "./rate-limiter.js";
import type { Services } from "./services.js";
import type { CommandError, ErrorCode, ServerMessage } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const SERVER_VERSION = "1.0.0";
export const PROTOCOL_VERSION = "1.0";

/** WebSocket backpressure threshold (64KB). Beyond this, we start dropping non-critical messages. */
export const BACKPRESSURE_THRESHOLD_BYTES = 64 * 1024;

/** WebSocket critical backpressure threshold (1MB). Beyond this, we close the connection. */
export const BACKPRESSURE_CRITICAL_BYTES = 1024 * 1024;

/** WebSocket heartbeat interval (30 seconds). */
const HEARTBEAT_INTERVAL_MS = 30 * 1000;

/** WebSocket heartbeat timeout (10 seconds). If no pong received, close connection. */
const HEARTBEAT_TIMEOUT_MS = 10 * 1000;

/** Poll interval while draining in-flight commands on shutdown. */
const DRAIN_POLL_MS = 50;

const AUTH_FAILURE_CODES: Record<AuthFailureCode, ErrorCode> = {
  MISSING_TOKEN: "AUTHENTICATION_FAILED",
  TOKEN_INVALID: "TOKEN_INVALID",
  TOKEN_EXPIRED: "TOKEN_EXPIRED",
};

// ============================================================================
// TRANSPORT
// ============================================================================

/**
 * The part of a ws socket the transport touches.
 */
export interface SocketLike {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * Backpressure-aware ConnectionTransport over a WebSocket.
 *
 * - Non-critical messages are dropped above 64KB buffered
 * - Above 1MB buffered the socket is closed with 1011
 * - Critical messages are attempted under mild backpressure
 */
export class WebSocketTransport implements ConnectionTransport {
  constructor(
    private readonly ws: SocketLike,
    private readonly logger: Logger
  ) {}

  send(data: string, options: { critical: boolean }): TransportSendResult {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return "closed";
    }

    const buffered = this.ws.bufferedAmount;

    // Critical backpressure: close connection to prevent OOM
    if (buffered > BACKPRESSURE_CRITICAL_BYTES) {
      this.logger.warn("Closing connection under critical backpressure", { buffered });
      this.close(1011, "Server overloaded - backpressure critical");
      return "dropped";
    }

    // Mild backpressure: drop non-critical messages
    if (buffered > BACKPRESSURE_THRESHOLD_BYTES && !options.critical) {
      return "dropped";
    }

    try {
      this.ws.send(data);
      return "sent";
    } catch (error) {
      this.logger.logError("WebSocket send failed", error instanceof Error ? error : new Error(String(error)));
      return "dropped";
    }
  }

  close(code: number, reason: string): void {
    if (this.ws.readyState === WebSocket.CLOSED || this.ws.readyState === WebSocket.CLOSING) {
      return;
    }
    try {
      this.ws.close(code, reason);
    } catch (error) {
      this.logger.debug("WebSocket close failed", { error: String(error) });
    }
  }
}

/**
 * Heartbeat timers for one socket.
 */
interface HeartbeatState {
  waitingForPong: boolean;
  lastPongAt: number;
  heartbeatTimer: NodeJS.Timeout | null;
  pongTimeoutTimer: NodeJS.Timeout | null;
  /** Set on cleanup so in-flight timer callbacks do nothing */
  cleanedUp: boolean;
}

/**
 * Ping periodically; close with 1001 when a pong does not come back in time.
 */
function startHeartbeat(ws: WebSocket, state: HeartbeatState, logger: Logger): void {
  state.lastPongAt = Date.now();
  state.waitingForPong = false;
  state.cleanedUp = false;

  const timeout = () => {
    logger.warn("Heartbeat timeout, closing connection", { elapsedMs: Date.now() - state.lastPongAt });
    stopHeartbeat(state);
    ws.close(1001, "Heartbeat timeout");
  };

  state.heartbeatTimer = setInterval(() => {
    if (state.cleanedUp || ws.readyState !== WebSocket.OPEN) {
      stopHeartbeat(state);
      return;
    }
    if (state.waitingForPong) {
      timeout();
      return;
    }

    state.waitingForPong = true;
    ws.ping();

    state.pongTimeoutTimer = setTimeout(() => {
      if (state.cleanedUp) return;
      if (state.waitingForPong && ws.readyState === WebSocket.OPEN) {
        timeout();
      }
    }, HEARTBEAT_TIMEOUT_MS);
  }, HEARTBEAT_INTERVAL_MS);
}

function stopHeartbeat(state: HeartbeatState): void {
  state.cleanedUp = true;
  if (state.heartbeatTimer) {
    clearInterval(state.heartbeatTimer);
    state.heartbeatTimer = null;
  }
  if (state.pongTimeoutTimer) {
    clearTimeout(state.pongTimeoutTimer);
    state.pongTimeoutTimer = null;
  }
  state.waitingForPong = false;
}

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ============================================================================
// SERVER
// ============================================================================

export interface ChannelServerOptions {
  /** Settings; the secret must be set when security is enabled */
  config: ChannelConfig;
  /** Domain collaborators (default: in-memory) */
  services?: Services;
  /** Handshake authentication (default: static tokens from config) */
  identityProvider?: IdentityProvider;
  /** Metrics sink(s) for observability. Can be a single sink or CompositeSink. */
  metricsSink?: MetricsSink;
  /** Include a MemorySink readable through getMemoryMetrics (default: true) */
  includeMemoryMetrics?: boolean;
  /** Logger for structured logging (default: ConsoleLogger from config) */
  logger?: Logger;
}

export class ChannelServer {
  private wss: WebSocketServer | null = null;
  private readonly config: ChannelConfig;
  private readonly identityProvider: IdentityProvider;
  private readonly logger: Logger;
  private readonly metrics: MetricsEmitter;
  private readonly memorySink: MemorySink | null = null;
  private readonly serverStartTime = Date.now();
  private shuttingDown = false;

  readonly registry: ConnectionRegistry;
  readonly dispatcher: CommandDispatcher;
  readonly authenticator: MessageAuthenticator | undefined;
  readonly idempotency: IdempotencyCache;
  readonly rateLimiter: RateLimiter;
  readonly broadcaster: EventBroadcaster;
  readonly lanes: CommandLanes;
  readonly errorStats = new ErrorStats();

  constructor(options: ChannelServerOptions) {
    this.config = options.config;
    const issues = validateConfig(this.config);
    if (issues.length > 0) {
      throw new ConfigError(issues);
    }

    this.logger =
      options.logger ??
      new ConsoleLogger({
        level: this.config.logLevel,
        json: this.config.logJson,
        component: "worktrack-channel",
      });

    // Setup metrics system
    const sinks: MetricsSink[] = [];
    if (options.metricsSink) {
      sinks.push(options.metricsSink);
    }
    if (options.includeMemoryMetrics ?? true) {
      this.memorySink = new MemorySink({ maxEvents: 1000 });
      sinks.push(this.memorySink);
    }
    const sink = sinks.length > 0 ? new CompositeSink(sinks) : new NoOpSink();
    this.metrics = new MetricsEmitter({ sink });

    this.identityProvider = options.identityProvider ?? new StaticTokenIdentityProvider(this.config.tokens);

    const cleanupIntervalMs = this.config.cleanupIntervalSeconds * 1000;
    this.registry = new ConnectionRegistry(
      {
        maxConnections: this.config.maxConnections,
        maxConnectionsPerUser: this.config.maxConnectionsPerUser,
        staleTimeoutSeconds: this.config.staleTimeoutSeconds,
        cleanupIntervalMs,
        serverVersion: SERVER_VERSION,
        protocolVersion: PROTOCOL_VERSION,
      },
      this.logger.child({ component: "registry" }),
      this.metrics
    );
    this.authenticator = this.config.securityEnabled
      ? new MessageAuthenticator(
          {
            secret: this.config.secret,
            windowSeconds: this.config.messageWindowSeconds,
            cleanupIntervalMs,
          },
          this.logger.child({ component: "authenticator" })
        )
      : undefined;
    this.idempotency = new IdempotencyCache(
      {
        ttlMs: this.config.idempotencyTtlSeconds * 1000,
        maxRecords: this.config.idempotencyMaxRecords,
        cleanupIntervalMs,
      },
      this.logger.child({ component: "idempotency" }),
      this.metrics
    );
    this.rateLimiter = new RateLimiter(
      {
        windowMs: this.config.rateLimitWindowSeconds * 1000,
        maxRequests: this.config.rateLimitMaxRequests,
        commandLimits: this.config.commandLimits,
        cleanupIntervalMs,
      },
      this.logger.child({ component: "rate-limiter" }),
      this.metrics
    );
    this.broadcaster = new EventBroadcaster(this.registry, this.logger.child({ component: "broadcaster" }), this.metrics);
    this.lanes = new CommandLanes(this.logger.child({ component: "lanes" }));

    const dispatcherLogger = this.logger.child({ component: "dispatcher" });
    this.dispatcher = new CommandDispatcher(
      {
        router: new CommandRouter(options.services ?? createMemoryServices(), dispatcherLogger),
        idempotency: this.idempotency,
        rateLimiter: this.rateLimiter,
        authenticator: this.authenticator,
        broadcaster: this.broadcaster,
        errorStats: this.errorStats,
        logger: dispatcherLogger,
        metrics: this.metrics,
      },
      { securityEnabled: this.config.securityEnabled, commandTimeoutMs: this.config.commandTimeoutMs }
    );
  }

  async start(): Promise<void> {
    const { port, host } = this.config;
    // Oversized frames get a MESSAGE_TOO_LARGE answer below; far larger ones are cut by ws.
    this.wss = new WebSocketServer({ port, host, maxPayload: this.config.maxMessageBytes * 2 });
    this.setupWebSocket(this.wss);

    await new Promise<void>((resolve, reject) => {
      const onListening = () => {
        this.wss?.off("error", onError);
        resolve();
      };
      const onError = (error: Error) => {
        this.wss?.off("listening", onListening);
        reject(error);
      };

      this.wss?.once("listening", onListening);
      this.wss?.once("error", onError);
    }).catch((error: unknown) => {
      throw new Error(
        `Failed to start WebSocket server on ${host}:${port}: ${error instanceof Error ? error.message : String(error)}`
      );
    });

    this.registry.startPeriodicCleanup();
    this.idempotency.startPeriodicCleanup();
    this.rateLimiter.startPeriodicCleanup();
    this.authenticator?.startPeriodicCleanup();

    this.logger.info("Server started", {
      version: SERVER_VERSION,
      protocol: PROTOCOL_VERSION,
      host,
      port,
      securityEnabled: this.config.securityEnabled,
    });
  }

  isInShutdown(): boolean {
    return this.shuttingDown;
  }

  getMetrics(): MetricsEmitter {
    return this.metrics;
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Memory sink contents. Undefined if includeMemoryMetrics was false.
   */
  getMemoryMetrics(): Record<string, unknown> | undefined {
    return this.memorySink?.getMetrics();
  }

  /**
   * Snapshot of every component's counters.
   */
  getStats(): Record<string, unknown> {
    return {
      uptimeMs: Date.now() - this.serverStartTime,
      connections: this.registry.count(),
      online: this.registry.listOnline().length,
      authenticator: this.authenticator?.getStats(),
      idempotency: this.idempotency.getStats(),
      rateLimiter: this.rateLimiter.getStats(),
      broadcaster: this.broadcaster.getStats(),
      lanes: this.lanes.getStats(),
      errors: this.errorStats.getStats(),
    };
  }

  /**
   * Graceful shutdown.
   * 1. Stop accepting new connections and stop the sweeps
   * 2. Drain in-flight commands
   * 3. Close every connection with 1001
   * 4. Flush metrics
   */
  async stop(timeoutMs = this.config.shutdownTimeoutMs): Promise<void> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      timeoutMs = DEFAULT_CONFIG.shutdownTimeoutMs;
    }
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.logger.info("Graceful shutdown initiated");

    this.registry.stopPeriodicCleanup();
    this.idempotency.stopPeriodicCleanup();
    this.rateLimiter.stopPeriodicCleanup();
    this.authenticator?.stopPeriodicCleanup();

    if (this.identityProvider.dispose) {
      try {
        await Promise.resolve(this.identityProvider.dispose());
      } catch (error) {
        this.logger.logError(
          "Identity provider dispose failed",
          error instanceof Error ? error : new Error(String(error))
        );
      }
    }

    if (this.wss) {
      this.wss.close(() => {
        this.logger.debug("WebSocket server closed (no new connections)");
      });
    }

    const deadline = Date.now() + timeoutMs;
    while (this.lanes.getStats().laneCount > 0 && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, DRAIN_POLL_MS));
    }
    const pending = this.lanes.getStats().laneCount;
    if (pending > 0) {
      this.logger.warn("Shutdown timed out", { timeoutMs, pending });
    } else {
      this.logger.info("All in-flight commands completed");
    }

    this.logger.info("Closing connections", { count: this.registry.count() });
    this.registry.closeAll(1001, "Server shutting down");

    const uptimeMs = Date.now() - this.serverStartTime;
    await this.metrics.flush();
    this.logger.info("Shutdown complete", { uptimeMs });
  }

  // ==========================================================================
  // WEBSOCKET TRANSPORT
  // ==========================================================================

  private setupWebSocket(wss: WebSocketServer): void {
    wss.on("connection", (ws: WebSocket, request: IncomingMessage) => {
      this.handleConnection(ws, request).catch((error: unknown) => {
        this.logger.logError("Connection setup failed", error instanceof Error ? error : new Error(String(error)));
        ws.close(1011, "Internal server error");
      });
    });
  }

  private async handleConnection(ws: WebSocket, request: IncomingMessage): Promise<void> {
    if (this.shuttingDown) {
      ws.close(1001, "Server shutting down");
      return;
    }

    const transport = new WebSocketTransport(ws, this.logger);
    const remoteAddress = request.socket.remoteAddress;

    // Authenticate connection
    const token = extractToken(request);
    const authResult = token
      ? await Promise.resolve(this.identityProvider.authenticate(token))
      : ({ allowed: false, code: "MISSING_TOKEN", reason: "Missing authentication token" } as const);
    if (!authResult.allowed) {
      this.logger.warn("Authentication failed", { reason: authResult.reason, code: authResult.code, remoteAddress });
      this.metrics.counter(MetricNames.CONNECTIONS_REJECTED_TOTAL, 1, { reason: authResult.code });
      this.sendError(transport, createCommandError(AUTH_FAILURE_CODES[authResult.code], authResult.reason));
      transport.close(1008, authResult.reason);
      return;
    }
    const principal = authResult.principal;

    // Resume a suspended connection, or register a new one
    let connection: Connection | undefined;
    const recoveryToken = extractRecoveryToken(request);
    if (recoveryToken) {
      connection = this.registry.resume(recoveryToken, principal.user_id, transport);
      if (!connection) {
        this.logger.info("Recovery token not usable, starting a new connection", { userId: principal.user_id });
      }
    }
    if (!connection) {
      connection = new Connection({ principal, transport, metadata: { remoteAddress: remoteAddress ?? null } });
      const added = this.registry.add(connection);
      if (!added.ok) {
        this.logger.warn("Connection rejected", { reason: added.reason, code: added.code });
        this.sendError(transport, createCommandError("SERVICE_UNAVAILABLE", added.reason));
        transport.close(1013, added.reason);
        return;
      }
    }

    this.bindSocket(ws, connection);
  }

  private bindSocket(ws: WebSocket, connection: Connection): void {
    const connectionId = connection.id;
    const heartbeat: HeartbeatState = {
      waitingForPong: false,
      lastPongAt: Date.now(),
      heartbeatTimer: null,
      pongTimeoutTimer: null,
      cleanedUp: false,
    };
    startHeartbeat(ws, heartbeat, this.logger.child({ connectionId }));

    ws.on("pong", () => {
      heartbeat.waitingForPong = false;
      heartbeat.lastPongAt = Date.now();
      if (heartbeat.pongTimeoutTimer) {
        clearTimeout(heartbeat.pongTimeoutTimer);
        heartbeat.pongTimeoutTimer = null;
      }
      this.registry.updatePing(connectionId);
    });

    ws.on("message", (data: RawData) => {
      this.registry.updatePing(connectionId);
      this.receive(connection, rawDataToBuffer(data)).catch((error: unknown) => {
        this.logger.logError("Message handling failed", error instanceof Error ? error : new Error(String(error)), {
          connectionId,
        });
      });
    });

    ws.on("close", (code: number) => {
      stopHeartbeat(heartbeat);
      // A client that says goodbye is gone; any other drop may come back with its recovery token.
      if (code === 1000 || code === 1001 || this.shuttingDown) {
        this.registry.remove(connectionId, code, "Client closed");
      } else if (!this.registry.suspend(connectionId)) {
        this.registry.remove(connectionId, code, "Connection dropped");
      }
    });

    ws.on("error", (error: Error) => {
      this.logger.logError("WebSocket connection error", error, { connectionId });
    });
  }

  /**
   * Handle one inbound frame. Every frame of a connection, malformed ones
   * included, is answered on that connection's lane in arrival order.
   */
  async receive(connection: Connection, data: Buffer): Promise<void> {
    await this.lanes.runOnLane(CommandLanes.forConnection(connection.id), async () => {
      if (data.length > this.config.maxMessageBytes) {
        this.sendError(
          connection,
          createCommandError(
            "MESSAGE_TOO_LARGE",
            `Message size ${data.length} exceeds limit of ${this.config.maxMessageBytes} bytes`
          )
        );
        return;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(data.toString("utf8"));
      } catch {
        this.sendError(connection, createCommandError("COMMAND_INVALID", "Message is not valid JSON"));
        return;
      }

      const outcome = await this.dispatcher.dispatch(connection, raw);
      connection.send(outcome.message, { critical: true });
      if (outcome.close) {
        this.registry.remove(connection.id, outcome.close.code, outcome.close.reason);
      }
    });
  }

  private sendError(target: Pick<ConnectionTransport, "send"> | Connection, error: CommandError): void {
    const message: ServerMessage = { type: "error", error, timestamp: new Date().toISOString() };
    if (target instanceof Connection) {
      target.send(message, { critical: true });
    } else {
      target.send(JSON.stringify(message), { critical: true });
    }
  }
}

// ============================================================================
// MAIN
// ============================================================================

async function main(): Promise<void> {
  let config: ChannelConfig;
  try {
    config = loadConfigFromEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        console.error(`Invalid ${issue.variable}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }

  const server = new ChannelServer({ config });
  await server.start();

  // Graceful shutdown handlers
  const handleShutdown = async (signal: string) => {
    server.getLogger().info("Signal received, initiating shutdown", { signal });
    await server.stop(config.shutdownTimeoutMs);
    process.exit(0);
  };

  process.on("SIGINT", () => void handleShutdown("SIGINT"));
  process.on("SIGTERM", () => void handleShutdown("SIGTERM"));
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

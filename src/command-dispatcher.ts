/**
 * Command Dispatcher - the per-message pipeline.
 *
 *   Received → Authenticated → Validated → IdempotencyChecked →
 *   RateLimitChecked → Authorized → Executed → Responded
 *
 * Security failures end the connection. Every other failure becomes an error
 * response. Only executed outcomes without a retry hint are cached; a
 * rejection before execution (rate limit, missing workspace) is not.
 *
 * The execution deadline bounds how long the caller waits, not the work.
 * A timed-out execution keeps its idempotency key in flight until the
 * collaborator settles, and its real outcome is what later retries receive.
 *
 * Channel commands (subscribe, unsubscribe, get_connection_info, ping) act on
 * one connection, so their keys are scoped to it rather than to the user.
 */

import { classifyCommand, getChangeTopic } from "./command-classification.js";
import { withTimeout } from "./command-lanes.js";
import type { CommandRouter, RouteResult } from "./command-router.js";
import type { Connection } from "./connection.js";
import type { ErrorStats } from "./error-mapper.js";
import { createCommandError, toCommandError } from "./error-mapper.js";
import type { EventBroadcaster } from "./event-broadcaster.js";
import type { ComputeOutcome, IdempotencyCache } from "./idempotency-cache.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import type { MessageAuthenticator } from "./message-authenticator.js";
import { isSecurityError, securityErrorToCommandError } from "./message-authenticator.js";
import { commandTags, MetricNames, MetricsEmitter } from "./metrics-index.js";
import type { RateLimiter } from "./rate-limiter.js";
import {
  getCommandIdempotencyKey,
  getCommandPaging,
  isPageResult,
  looksLikeSecureMessage,
  peekCommandType,
  peekIdempotencyKey,
  peekRequestId,
} from "./type-guards.js";
import type {
  Command,
  CommandError,
  CommandResponse,
  JsonValue,
  Pagination,
  ResponseMeta,
  ServerMessage,
} from "./types.js";
import { formatValidationErrors, parseCommand } from "./validation.js";

// =============================================================================
// TYPES
// =============================================================================

/** Close code sent when a message fails authentication. */
export const CLOSE_CODE_POLICY_VIOLATION = 1008;

export interface DispatcherConfig {
  /** Require signed envelopes (default: true) */
  securityEnabled: boolean;
  /** Collaborator execution deadline in milliseconds (default: 30000) */
  commandTimeoutMs: number;
}

export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
  securityEnabled: true,
  commandTimeoutMs: 30_000,
};

export interface DispatcherDeps {
  router: CommandRouter;
  idempotency: IdempotencyCache;
  rateLimiter: RateLimiter;
  /** Required when security is enabled */
  authenticator?: MessageAuthenticator;
  broadcaster?: EventBroadcaster;
  errorStats?: ErrorStats;
  logger?: Logger;
  metrics?: MetricsEmitter;
}

/**
 * What to send back, and whether the connection must then close.
 */
export interface DispatchOutcome {
  message: CommandResponse | ServerMessage;
  close?: { code: number; reason: string };
}

// =============================================================================
// DISPATCHER
// =============================================================================

export class CommandDispatcher {
  private readonly config: DispatcherConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsEmitter;

  constructor(
    private readonly deps: DispatcherDeps,
    config: Partial<DispatcherConfig> = {}
  ) {
    this.config = { ...DEFAULT_DISPATCHER_CONFIG, ...config };
    if (this.config.securityEnabled && !deps.authenticator) {
      throw new Error("CommandDispatcher: security is enabled but no authenticator was provided");
    }
    this.logger = deps.logger ?? new NoOpLogger();
    this.metrics = deps.metrics ?? new MetricsEmitter();
  }

  /**
   * Run one inbound message through the pipeline.
   */
  async dispatch(connection: Connection, raw: unknown, now = Date.now()): Promise<DispatchOutcome> {
    if (!connection.isAcceptingCommands()) {
      return {
        message: this.errorResponse(
          raw,
          createCommandError("CONNECTION_LOST", `Connection is ${connection.state}`),
          connection,
          now
        ),
      };
    }

    // 1. Authenticate
    let payload: unknown = raw;
    if (this.config.securityEnabled && this.deps.authenticator) {
      const verified = this.deps.authenticator.verify(raw, connection.principal.user_id, now);
      if (!verified.ok && !isSecurityError(verified.error)) {
        const error = securityErrorToCommandError(verified.error);
        const inner = looksLikeSecureMessage(raw) ? raw.payload : raw;
        this.countRejection(peekCommandType(inner), error);
        return { message: this.errorResponse(inner, error, connection, now) };
      }
      if (!verified.ok) {
        const error = securityErrorToCommandError(verified.error);
        this.metrics.counter(MetricNames.SECURITY_REJECTED_TOTAL, 1, { code: error.code });
        this.recordError(error, connection, "unknown");
        this.logger.warn("Security check failed; closing connection", {
          connectionId: connection.id,
          userId: connection.principal.user_id,
          code: error.code,
        });
        return {
          message: { type: "error", error, timestamp: new Date(now).toISOString() },
          close: { code: CLOSE_CODE_POLICY_VIOLATION, reason: error.code },
        };
      }
      payload = verified.message.payload;
    }

    // 2. Validate
    const parsed = parseCommand(payload);
    if (!parsed.ok) {
      const first = parsed.errors[0];
      const error = parsed.unknownType
        ? createCommandError("COMMAND_INVALID", first.message, { field: first.field })
        : createCommandError("VALIDATION_FAILED", formatValidationErrors(parsed.errors), {
            field: first.field,
            details: parsed.errors.map((e) => ({ field: e.field, message: e.message })),
          });
      this.countRejection(peekCommandType(payload), error);
      return { message: this.errorResponse(payload, error, connection, now) };
    }
    const command = parsed.command;

    // 3. Idempotency key
    const classification = classifyCommand(command.type);
    const clientKey = getCommandIdempotencyKey(command);
    if (classification.isMutation && clientKey === undefined) {
      const error = createCommandError(
        "IDEMPOTENCY_KEY_REQUIRED",
        `Command '${command.type}' changes state and requires an idempotency_key`,
        { field: "idempotency_key" }
      );
      this.countRejection(command.type, error);
      return { message: this.errorResponse(payload, error, connection, now) };
    }

    // 4-8. Cached, joined or computed, within the execution deadline
    const key = clientKey ?? this.deps.idempotency.createSyntheticKey();
    const pending =
      clientKey === undefined
        ? this.process(connection, command, key, now).then((outcome) => outcome.response)
        : this.deps.idempotency
            .getOrCompute(
              idempotencyScope(connection, command),
              clientKey,
              this.deps.idempotency.fingerprint(command),
              () => this.process(connection, command, clientKey, now),
              now
            )
            .then((result) => result.response);

    try {
      return { message: await withTimeout(pending, this.config.commandTimeoutMs, command.type) };
    } catch (error) {
      const failure = toCommandError(
        error,
        this.logger.child({ commandType: command.type, userId: connection.principal.user_id })
      );
      if (failure.code === "COMMAND_TIMEOUT") {
        this.logger.warn("Command timed out; execution continues in the background", {
          connectionId: connection.id,
          commandType: command.type,
          idempotencyKey: key,
        });
      }
      this.countRejection(command.type, failure);
      this.recordError(failure, connection, command.type);
      return { message: this.buildResponse(command, key, { error: failure }, now) };
    }
  }

  // ===========================================================================
  // PIPELINE
  // ===========================================================================

  /**
   * Rate limit, authorize, execute and frame the response.
   */
  private async process(connection: Connection, command: Command, key: string, now: number): Promise<ComputeOutcome> {
    const userId = connection.principal.user_id;

    // 5. Rate limit
    const decision = this.deps.rateLimiter.check(userId, command.type, now);
    if (!decision.allowed) {
      const error = createCommandError("RATE_LIMIT_EXCEEDED", decision.reason, {
        retryAfter: decision.retryAfter,
        details: { limit: decision.limit, scope: decision.scope },
      });
      this.countRejection(command.type, error);
      return { response: this.buildResponse(command, key, { error }, now), cacheable: false };
    }

    // 6. Authorize
    const workspaceId = connection.principal.workspace_id;
    if (classifyCommand(command.type).requiresWorkspace && workspaceId === undefined) {
      const error = createCommandError(
        "NO_WORKSPACE",
        "A current workspace is required for this command. Create or switch to a workspace first."
      );
      this.countRejection(command.type, error);
      return { response: this.buildResponse(command, key, { error }, now), cacheable: false };
    }

    // 7. Execute
    const timer = this.metrics.startTimer(MetricNames.COMMANDS_DURATION_MS, { command: command.type });
    let routed: RouteResult | undefined;
    let failure: CommandError | undefined;
    try {
      routed = await this.deps.router.execute(
        { connection, user_id: userId, workspace_id: workspaceId, idempotency_key: key },
        command
      );
    } catch (error) {
      failure = toCommandError(error, this.logger.child({ commandType: command.type, userId }));
    }
    const executionTimeMs = timer.end({ success: failure === undefined });

    // 8. Frame
    if (failure) {
      this.metrics.counter(MetricNames.COMMANDS_TOTAL, 1, commandTags(command.type, false, failure.code));
      this.recordError(failure, connection, command.type);
      return {
        response: this.buildResponse(command, key, { error: failure }, now, { execution_time_ms: executionTimeMs }),
        cacheable: failure.retry_after === undefined,
      };
    }

    this.metrics.counter(MetricNames.COMMANDS_TOTAL, 1, commandTags(command.type, true));
    const meta: ResponseMeta = { execution_time_ms: executionTimeMs };
    if (routed?.batchStats) {
      meta.batch_stats = routed.batchStats;
    }
    const data = routed?.data ?? null;
    const paging = getCommandPaging(command);
    if (isPageResult(data)) {
      meta.total_count = data.total;
      meta.pagination = buildPagination(data.total, data.items.length, paging?.limit, paging?.offset);
    }
    if (classifyCommand(command.type).isMutation) {
      this.publishChange(connection, command, data, now);
    }
    return { response: this.buildResponse(command, key, { data }, now, meta), cacheable: true };
  }

  private publishChange(connection: Connection, command: Command, data: JsonValue, now: number): void {
    const broadcaster = this.deps.broadcaster;
    const topic = getChangeTopic(command.type);
    const event = classifyCommand(command.type).changeEvent;
    if (!broadcaster || topic === undefined || event === undefined) return;

    broadcaster.publish(
      {
        topic,
        event,
        workspace_id: connection.principal.workspace_id,
        actor_id: connection.principal.user_id,
        data,
      },
      now
    );
  }

  // ===========================================================================
  // RESPONSES
  // ===========================================================================

  private buildResponse(
    command: Command,
    key: string,
    body: { data: JsonValue } | { error: CommandError },
    now: number,
    meta?: ResponseMeta
  ): CommandResponse {
    const response: CommandResponse = {
      command_type: command.type,
      idempotency_key: key,
      success: "data" in body,
      timestamp: new Date(now).toISOString(),
    };
    if (command.request_id !== undefined) response.request_id = command.request_id;
    if ("data" in body) response.data = body.data;
    else response.error = body.error;
    if (meta) response.meta = meta;
    return response;
  }

  /**
   * Error response for a message that never became a valid command.
   */
  private errorResponse(raw: unknown, error: CommandError, connection: Connection, now: number): CommandResponse {
    const commandType = peekCommandType(raw);
    this.recordError(error, connection, commandType);
    const response: CommandResponse = {
      command_type: commandType,
      idempotency_key: peekIdempotencyKey(raw) ?? "",
      success: false,
      error,
      timestamp: new Date(now).toISOString(),
    };
    const requestId = peekRequestId(raw);
    if (requestId !== undefined) response.request_id = requestId;
    return response;
  }

  private countRejection(commandType: string, error: CommandError): void {
    this.metrics.counter(MetricNames.COMMANDS_REJECTED_TOTAL, 1, commandTags(commandType, false, error.code));
  }

  private recordError(error: CommandError, connection: Connection, commandType: string): void {
    this.deps.errorStats?.record(error, { commandType, userId: connection.principal.user_id });
  }
}

/**
 * Idempotency scope for a command: the user, or the connection for
 * connection-local channel commands.
 */
export function idempotencyScope(connection: Connection, command: Command): string {
  const userId = connection.principal.user_id;
  return classifyCommand(command.type).domain === "channel" ? `${userId}/${connection.id}` : userId;
}

/**
 * Page position from a query's limit/offset and the page it returned.
 */
export function buildPagination(
  total: number,
  returned: number,
  limit: number | undefined,
  offset: number | undefined
): Pagination {
  const start = offset ?? 0;
  const perPage = limit ?? Math.max(returned, 1);
  return {
    page: Math.floor(start / perPage) + 1,
    per_page: perPage,
    total_pages: Math.ceil(total / perPage),
    has_next: start + returned < total,
    has_prev: start > 0,
  };
}

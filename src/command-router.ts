/**
 * Command Router - routes each validated command to its collaborator.
 *
 * The switch is exhaustive over Command["type"]: a new command variant that
 * is not routed fails to compile. Channel commands are handled here against
 * the caller's connection; batch label commands fan out to the label
 * collaborator item by item.
 */

import type { Connection } from "./connection.js";
import { AppError, toCommandError } from "./error-mapper.js";
import type { Logger } from "./logger-types.js";
import { NoOpLogger } from "./logger-types.js";
import type { CommandIn, Services } from "./services.js";
import type {
  BatchStats,
  ChannelCommand,
  Command,
  CommandOf,
  JsonObject,
  JsonValue,
  UserContext,
  WorkspaceContext,
} from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export interface RouteContext {
  connection: Connection;
  user_id: string;
  workspace_id?: string;
  idempotency_key: string;
}

export interface RouteResult {
  data: JsonValue;
  batchStats?: BatchStats;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

// =============================================================================
// ROUTER
// =============================================================================

export class CommandRouter {
  constructor(
    private readonly services: Services,
    private readonly logger: Logger = new NoOpLogger()
  ) {}

  async execute(ctx: RouteContext, command: Command): Promise<RouteResult> {
    const user: UserContext = {
      user_id: ctx.user_id,
      workspace_id: ctx.workspace_id,
      idempotency_key: ctx.idempotency_key,
    };

    switch (command.type) {
      case "create_label":
      case "update_label":
      case "delete_label":
      case "query_labels":
        return { data: await this.services.labels.execute(this.workspaceOf(user), command) };

      case "batch_create_labels":
        return this.batchCreateLabels(this.workspaceOf(user), command);
      case "batch_update_labels":
        return this.batchUpdateLabels(this.workspaceOf(user), command);
      case "batch_delete_labels":
        return this.batchDeleteLabels(this.workspaceOf(user), command);

      case "subscribe":
      case "unsubscribe":
      case "get_connection_info":
      case "ping":
        return { data: this.handleChannel(ctx.connection, command) };

      case "create_team":
      case "update_team":
      case "delete_team":
      case "query_teams":
      case "add_team_member":
      case "update_team_member":
      case "remove_team_member":
      case "list_team_members":
        return { data: await this.services.teams.execute(this.workspaceOf(user), command) };

      case "invite_workspace_member":
      case "accept_invitation":
      case "query_workspace_members":
        return { data: await this.services.workspaceMembers.execute(user, command) };

      case "create_project_status":
      case "update_project_status":
      case "delete_project_status":
      case "query_project_statuses":
      case "get_project_status_by_id":
        return { data: await this.services.projectStatuses.execute(this.workspaceOf(user), command) };

      case "create_workspace":
      case "update_workspace":
      case "delete_workspace":
      case "get_current_workspace":
        return { data: await this.services.workspaces.execute(user, command) };

      case "update_profile":
        return { data: await this.services.profile.execute(user, command) };

      case "create_project":
      case "update_project":
      case "delete_project":
      case "query_projects":
        return { data: await this.services.projects.execute(this.workspaceOf(user), command) };

      case "create_issue":
      case "update_issue":
      case "delete_issue":
      case "query_issues":
      case "get_issue":
        return { data: await this.services.issues.execute(this.workspaceOf(user), command) };

      default:
        return assertNever(command);
    }
  }

  // ===========================================================================
  // CHANNEL
  // ===========================================================================

  private handleChannel(connection: Connection, command: CommandIn<ChannelCommand>): JsonObject {
    switch (command.type) {
      case "subscribe":
        connection.subscribe(command.topics);
        return { subscribed_topics: command.topics, message: "Successfully subscribed to topics" };
      case "unsubscribe":
        connection.unsubscribe(command.topics);
        return { unsubscribed_topics: command.topics, message: "Successfully unsubscribed from topics" };
      case "get_connection_info":
        return connection.info();
      case "ping":
        return { message: "pong" };
    }
  }

  // ===========================================================================
  // BATCH LABELS
  // ===========================================================================

  private async batchCreateLabels(
    ctx: WorkspaceContext,
    command: CommandOf<"batch_create_labels">
  ): Promise<RouteResult> {
    const created: JsonValue[] = [];
    const errors: JsonObject[] = [];
    for (const [index, data] of command.data.entries()) {
      try {
        created.push(await this.services.labels.execute(ctx, { type: "create_label", data }));
      } catch (error) {
        errors.push(this.itemError(index, error));
      }
    }
    return {
      data: { created, errors, total_created: created.length, total_errors: errors.length },
      batchStats: { total: command.data.length, successful: created.length, failed: errors.length, skipped: 0 },
    };
  }

  private async batchUpdateLabels(
    ctx: WorkspaceContext,
    command: CommandOf<"batch_update_labels">
  ): Promise<RouteResult> {
    const updated: JsonValue[] = [];
    const errors: JsonObject[] = [];
    for (const [index, update] of command.updates.entries()) {
      try {
        updated.push(
          await this.services.labels.execute(ctx, { type: "update_label", label_id: update.label_id, data: update.data })
        );
      } catch (error) {
        errors.push({ ...this.itemError(index, error), label_id: update.label_id });
      }
    }
    return {
      data: { updated, errors, total_updated: updated.length, total_errors: errors.length },
      batchStats: { total: command.updates.length, successful: updated.length, failed: errors.length, skipped: 0 },
    };
  }

  private async batchDeleteLabels(
    ctx: WorkspaceContext,
    command: CommandOf<"batch_delete_labels">
  ): Promise<RouteResult> {
    const deleted: JsonValue[] = [];
    const errors: JsonObject[] = [];
    for (const [index, labelId] of command.label_ids.entries()) {
      try {
        deleted.push(await this.services.labels.execute(ctx, { type: "delete_label", label_id: labelId }));
      } catch (error) {
        errors.push({ ...this.itemError(index, error), label_id: labelId });
      }
    }
    return {
      data: { deleted, errors, total_deleted: deleted.length, total_errors: errors.length },
      batchStats: { total: command.label_ids.length, successful: deleted.length, failed: errors.length, skipped: 0 },
    };
  }

  private itemError(index: number, error: unknown): JsonObject {
    const mapped = toCommandError(error, this.logger);
    return { index, code: mapped.code, error: mapped.message };
  }

  // ===========================================================================
  // CONTEXT
  // ===========================================================================

  private workspaceOf(user: UserContext): WorkspaceContext {
    if (user.workspace_id === undefined) {
      throw new AppError("no_workspace", "No current workspace selected");
    }
    return { ...user, workspace_id: user.workspace_id };
  }
}

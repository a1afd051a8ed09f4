/**
 * Command Classification - single source of truth for command behavior.
 *
 * Classification dimensions:
 * - Domain: which collaborator executes the command
 * - Mutation: does the command change shared state (needs an idempotency key)?
 * - Workspace: must the principal have a current workspace?
 * - Change event: what gets published after a successful mutation
 *
 * The table is keyed by CommandType, so adding a command variant without
 * classifying it fails to compile.
 */

import type { CommandType } from "./types.js";

export type CommandDomain =
  | "labels"
  | "channel"
  | "teams"
  | "workspace_members"
  | "project_statuses"
  | "workspaces"
  | "profile"
  | "projects"
  | "issues";

export interface CommandClassification {
  domain: CommandDomain;
  /** Changes shared state. Mutations require an idempotency key. */
  isMutation: boolean;
  /** Fails with NO_WORKSPACE when the principal has no current workspace. */
  requiresWorkspace: boolean;
  /** Event name published on the domain topic after a successful execution. */
  changeEvent?: string;
}

function query(domain: CommandDomain, requiresWorkspace = true): CommandClassification {
  return { domain, isMutation: false, requiresWorkspace };
}

function mutation(domain: CommandDomain, changeEvent: string, requiresWorkspace = true): CommandClassification {
  return { domain, isMutation: true, requiresWorkspace, changeEvent };
}

const CLASSIFICATION: Record<CommandType, CommandClassification> = {
  // Labels
  create_label: mutation("labels", "label.created"),
  update_label: mutation("labels", "label.updated"),
  delete_label: mutation("labels", "label.deleted"),
  query_labels: query("labels"),
  batch_create_labels: mutation("labels", "labels.batch_created"),
  batch_update_labels: mutation("labels", "labels.batch_updated"),
  batch_delete_labels: mutation("labels", "labels.batch_deleted"),

  // Channel (connection-local, never need a workspace)
  subscribe: query("channel", false),
  unsubscribe: query("channel", false),
  get_connection_info: query("channel", false),
  ping: query("channel", false),

  // Teams
  create_team: mutation("teams", "team.created"),
  update_team: mutation("teams", "team.updated"),
  delete_team: mutation("teams", "team.deleted"),
  query_teams: query("teams"),
  add_team_member: mutation("teams", "team.member_added"),
  update_team_member: mutation("teams", "team.member_updated"),
  remove_team_member: mutation("teams", "team.member_removed"),
  list_team_members: query("teams"),

  // Workspace members
  invite_workspace_member: mutation("workspace_members", "workspace_member.invited"),
  accept_invitation: mutation("workspace_members", "workspace_member.joined", false),
  query_workspace_members: query("workspace_members"),

  // Project statuses
  create_project_status: mutation("project_statuses", "project_status.created"),
  update_project_status: mutation("project_statuses", "project_status.updated"),
  delete_project_status: mutation("project_statuses", "project_status.deleted"),
  query_project_statuses: query("project_statuses"),
  get_project_status_by_id: query("project_statuses"),

  // Workspaces (target workspace is explicit or being created)
  create_workspace: mutation("workspaces", "workspace.created", false),
  update_workspace: mutation("workspaces", "workspace.updated", false),
  delete_workspace: mutation("workspaces", "workspace.deleted", false),
  get_current_workspace: query("workspaces"),

  // Profile
  update_profile: mutation("profile", "profile.updated", false),

  // Projects
  create_project: mutation("projects", "project.created"),
  update_project: mutation("projects", "project.updated"),
  delete_project: mutation("projects", "project.deleted"),
  query_projects: query("projects"),

  // Issues
  create_issue: mutation("issues", "issue.created"),
  update_issue: mutation("issues", "issue.updated"),
  delete_issue: mutation("issues", "issue.deleted"),
  query_issues: query("issues"),
  get_issue: query("issues"),
};

/**
 * All command types known to the channel.
 */
export const COMMAND_TYPES: ReadonlySet<string> = new Set(Object.keys(CLASSIFICATION));

/**
 * Type guard: true if the string names a known command.
 */
export function isCommandType(value: string): value is CommandType {
  return COMMAND_TYPES.has(value);
}

/**
 * Get full classification for a command type.
 */
export function classifyCommand(commandType: CommandType): CommandClassification {
  return CLASSIFICATION[commandType];
}

/**
 * Topic that change events for this command are published on.
 * Channel commands publish nothing.
 */
export function getChangeTopic(commandType: CommandType): string | undefined {
  const classification = CLASSIFICATION[commandType];
  if (classification.domain === "channel" || !classification.changeEvent) {
    return undefined;
  }
  return classification.domain;
}

/**
 * Protocol types for the work-tracking command channel.
 * Wire fields are snake_case; the JSON on the socket is exactly these shapes.
 */

// ============================================================================
// JSON
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// IDENTITY
// ============================================================================

/**
 * The authenticated identity attached to a connection.
 */
export interface Principal {
  user_id: string;
  username: string;
  email?: string;
  name?: string;
  avatar_url?: string;
  /** Current workspace; required for workspace-scoped commands. */
  workspace_id?: string;
}

/** Context passed to collaborators that work without a workspace. */
export interface UserContext {
  user_id: string;
  workspace_id?: string;
  idempotency_key?: string;
}

/** Context passed to workspace-scoped collaborators. */
export interface WorkspaceContext extends UserContext {
  workspace_id: string;
}

// ============================================================================
// COMMAND PAYLOADS
// ============================================================================

export type LabelLevel = "project" | "issue";

export interface CreateLabelData {
  name: string;
  color: string;
  level: LabelLevel;
}

export interface UpdateLabelData {
  name?: string;
  color?: string;
  level?: LabelLevel;
}

export interface Paging {
  limit?: number;
  offset?: number;
}

export interface LabelFilters extends Paging {
  level?: LabelLevel;
  name_pattern?: string;
  color?: string;
  /** ISO-8601 */
  created_after?: string;
  /** ISO-8601 */
  created_before?: string;
}

export interface LabelUpdate {
  label_id: string;
  data: UpdateLabelData;
}

export interface CreateTeamData {
  name: string;
  team_key: string;
  description?: string;
  icon_url?: string;
  is_private: boolean;
}

export interface UpdateTeamData {
  name?: string;
  team_key?: string;
  description?: string;
  icon_url?: string;
  is_private?: boolean;
}

export type TeamMemberRole = "admin" | "member";

export interface AddTeamMemberData {
  user_id: string;
  role: TeamMemberRole;
}

export type WorkspaceMemberRole = "owner" | "admin" | "member";

export interface InviteWorkspaceMemberData {
  email: string;
  role: WorkspaceMemberRole;
}

export interface WorkspaceMemberFilters {
  role?: WorkspaceMemberRole;
  user_id?: string;
  search?: string;
}

export type ProjectStatusCategory = "backlog" | "planned" | "in_progress" | "completed" | "canceled";

export interface CreateProjectStatusData {
  name: string;
  description?: string;
  color: string;
  category: ProjectStatusCategory;
  position?: number;
}

export interface UpdateProjectStatusData {
  name?: string;
  description?: string;
  color?: string;
  category?: ProjectStatusCategory;
  position?: number;
}

export interface CreateWorkspaceData {
  name: string;
  url_key: string;
  logo_url?: string;
}

export interface UpdateWorkspaceData {
  name?: string;
  url_key?: string;
  logo_url?: string;
}

export interface UpdateProfileData {
  name?: string;
  username?: string;
  email?: string;
  avatar_url?: string;
}

export type ProjectPriority = "none" | "low" | "medium" | "high" | "urgent";

export interface CreateProjectData {
  name: string;
  description?: string;
  team_id?: string;
  status_id?: string;
  lead_id?: string;
  priority?: ProjectPriority;
  /** ISO-8601 date */
  target_date?: string;
}

export interface UpdateProjectData {
  name?: string;
  description?: string;
  team_id?: string;
  status_id?: string;
  lead_id?: string;
  priority?: ProjectPriority;
  target_date?: string;
}

export interface ProjectFilters extends Paging {
  team_id?: string;
  status_id?: string;
  lead_id?: string;
  search?: string;
}

export type IssuePriority = "none" | "low" | "medium" | "high" | "urgent";

export interface CreateIssueData {
  title: string;
  description?: string;
  team_id: string;
  project_id?: string;
  assignee_id?: string;
  workflow_state_id?: string;
  priority?: IssuePriority;
  label_ids?: string[];
}

export interface UpdateIssueData {
  title?: string;
  description?: string;
  project_id?: string;
  assignee_id?: string;
  workflow_state_id?: string;
  priority?: IssuePriority;
  label_ids?: string[];
}

export interface IssueFilters extends Paging {
  team_id?: string;
  project_id?: string;
  assignee_id?: string;
  priority?: IssuePriority;
  search?: string;
}

// ============================================================================
// COMMANDS
// ============================================================================

export type LabelCommand =
  | { type: "create_label"; data: CreateLabelData }
  | { type: "update_label"; label_id: string; data: UpdateLabelData }
  | { type: "delete_label"; label_id: string }
  | { type: "query_labels"; filters?: LabelFilters };

export type LabelBatchCommand =
  | { type: "batch_create_labels"; data: CreateLabelData[] }
  | { type: "batch_update_labels"; updates: LabelUpdate[] }
  | { type: "batch_delete_labels"; label_ids: string[] };

export type ChannelCommand =
  | { type: "subscribe"; topics: string[] }
  | { type: "unsubscribe"; topics: string[] }
  | { type: "get_connection_info" }
  | { type: "ping" };

export type TeamCommand =
  | { type: "create_team"; data: CreateTeamData }
  | { type: "update_team"; team_id: string; data: UpdateTeamData }
  | { type: "delete_team"; team_id: string }
  | { type: "query_teams" }
  | { type: "add_team_member"; team_id: string; data: AddTeamMemberData }
  | { type: "update_team_member"; team_id: string; member_user_id: string; data: { role: TeamMemberRole } }
  | { type: "remove_team_member"; team_id: string; member_user_id: string }
  | { type: "list_team_members"; team_id: string };

export type WorkspaceMemberCommand =
  | { type: "invite_workspace_member"; data: InviteWorkspaceMemberData }
  | { type: "accept_invitation"; invitation_id: string }
  | { type: "query_workspace_members"; filters?: WorkspaceMemberFilters };

export type ProjectStatusCommand =
  | { type: "create_project_status"; data: CreateProjectStatusData }
  | { type: "update_project_status"; status_id: string; data: UpdateProjectStatusData }
  | { type: "delete_project_status"; status_id: string }
  | { type: "query_project_statuses" }
  | { type: "get_project_status_by_id"; status_id: string };

export type WorkspaceCommand =
  | { type: "create_workspace"; data: CreateWorkspaceData }
  | { type: "update_workspace"; workspace_id: string; data: UpdateWorkspaceData }
  | { type: "delete_workspace"; workspace_id: string }
  | { type: "get_current_workspace" };

export type ProfileCommand = { type: "update_profile"; data: UpdateProfileData };

export type ProjectCommand =
  | { type: "create_project"; data: CreateProjectData }
  | { type: "update_project"; project_id: string; data: UpdateProjectData }
  | { type: "delete_project"; project_id: string }
  | { type: "query_projects"; filters?: ProjectFilters };

export type IssueCommand =
  | { type: "create_issue"; data: CreateIssueData }
  | { type: "update_issue"; issue_id: string; data: UpdateIssueData }
  | { type: "delete_issue"; issue_id: string }
  | { type: "query_issues"; filters?: IssueFilters }
  | { type: "get_issue"; issue_id: string };

/**
 * Fields every command may carry.
 */
export interface CommandEnvelope {
  /** Client token making the command execute at most once. Required for mutations. */
  idempotency_key?: string;
  /** Echoed back on the response for client-side correlation. */
  request_id?: string;
}

export type Command = (
  | LabelCommand
  | LabelBatchCommand
  | ChannelCommand
  | TeamCommand
  | WorkspaceMemberCommand
  | ProjectStatusCommand
  | WorkspaceCommand
  | ProfileCommand
  | ProjectCommand
  | IssueCommand
) &
  CommandEnvelope;

export type CommandType = Command["type"];

/** Narrow the command union to one variant. */
export type CommandOf<T extends CommandType> = Extract<Command, { type: T }>;

// ============================================================================
// SECURE ENVELOPE
// ============================================================================

/**
 * Signed wrapper around a command envelope.
 */
export interface SecureMessage {
  /** UUID, remembered for the replay horizon */
  message_id: string;
  /** Unix seconds */
  timestamp: number;
  nonce: string;
  /** Hex HMAC-SHA256 */
  signature: string;
  payload: JsonValue;
  sender_principal_id: string;
}

// ============================================================================
// ERRORS
// ============================================================================

export type ErrorCode =
  // Authentication and message security
  | "AUTHENTICATION_FAILED"
  | "TOKEN_EXPIRED"
  | "TOKEN_INVALID"
  | "INVALID_SIGNATURE"
  | "REPLAY_ATTACK"
  | "MESSAGE_EXPIRED"
  | "INVALID_MESSAGE_FORMAT"
  | "PRINCIPAL_MISMATCH"
  // Authorization
  | "NO_WORKSPACE"
  | "PERMISSION_DENIED"
  // Commands
  | "COMMAND_NOT_FOUND"
  | "COMMAND_INVALID"
  | "COMMAND_FAILED"
  | "COMMAND_TIMEOUT"
  | "IDEMPOTENCY_KEY_REQUIRED"
  | "VALIDATION_FAILED"
  // Rate limiting
  | "RATE_LIMIT_EXCEEDED"
  // Business
  | "NOT_FOUND"
  | "CONFLICT"
  // System
  | "INTERNAL_ERROR"
  | "DATABASE_ERROR"
  | "SERVICE_UNAVAILABLE"
  // Transport
  | "CONNECTION_LOST"
  | "MESSAGE_TOO_LARGE";

export type ErrorCategory =
  | "security"
  | "authentication"
  | "authorization"
  | "validation"
  | "business"
  | "ratelimit"
  | "system"
  | "network"
  | "database";

export type ErrorSeverity = "low" | "medium" | "high" | "critical";

export interface CommandError {
  code: ErrorCode;
  message: string;
  field?: string;
  details?: JsonValue;
  error_type: ErrorCategory;
  /** Seconds the client should wait before retrying. Only on retryable errors. */
  retry_after?: number;
}

// ============================================================================
// RESPONSES
// ============================================================================

export interface Pagination {
  page: number;
  per_page: number;
  total_pages: number;
  has_next: boolean;
  has_prev: boolean;
}

export interface BatchStats {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
}

export interface ResponseMeta {
  execution_time_ms?: number;
  pagination?: Pagination;
  total_count?: number;
  batch_stats?: BatchStats;
}

export interface CommandResponse {
  command_type: string;
  idempotency_key: string;
  request_id?: string;
  success: boolean;
  data?: JsonValue;
  error?: CommandError;
  meta?: ResponseMeta;
  /** ISO-8601 */
  timestamp: string;
}

// ============================================================================
// SERVER-PUSHED MESSAGES
// ============================================================================

/**
 * A domain or presence event fanned out to subscribed connections.
 */
export interface ChannelEvent {
  /** Subscription topic, e.g. "labels" or "presence" */
  topic: string;
  /** Event name, e.g. "label.created" */
  event: string;
  /** Restricts delivery to connections in this workspace */
  workspace_id?: string;
  /** User whose action produced the event */
  actor_id?: string;
  data: JsonValue;
}

export type ServerMessage =
  | {
      type: "welcome";
      data: {
        message: string;
        connection_id: string;
        recovery_token: string;
        online_users: number;
        server_version: string;
        protocol_version: string;
      };
    }
  | {
      type: "resumed";
      data: { connection_id: string; replayed_messages: number };
    }
  | ({ type: "event"; timestamp: string } & ChannelEvent)
  | {
      /** Failure not tied to a parsed command */
      type: "error";
      error: CommandError;
      timestamp: string;
    };

/**
 * Input validation for channel commands.
 *
 * Parses an untrusted JSON value into the closed Command union. Every field
 * is checked before a typed command is built, so nothing downstream sees a
 * malformed payload:
 * - Missing required fields
 * - Invalid field types and enum values
 * - Oversized strings and arrays
 */

import { isCommandType } from "./command-classification.js";
import { isRecord } from "./type-guards.js";
import type {
  AddTeamMemberData,
  Command,
  CommandEnvelope,
  CommandType,
  CreateIssueData,
  CreateLabelData,
  CreateProjectData,
  CreateProjectStatusData,
  CreateTeamData,
  CreateWorkspaceData,
  IssueFilters,
  IssuePriority,
  LabelFilters,
  LabelLevel,
  LabelUpdate,
  ProjectFilters,
  ProjectPriority,
  ProjectStatusCategory,
  TeamMemberRole,
  UpdateIssueData,
  UpdateLabelData,
  UpdateProfileData,
  UpdateProjectData,
  UpdateProjectStatusData,
  UpdateTeamData,
  UpdateWorkspaceData,
  WorkspaceMemberFilters,
  WorkspaceMemberRole,
} from "./types.js";

export interface ValidationError {
  field: string;
  message: string;
}

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; errors: ValidationError[]; unknownType: boolean };

/** Reserved prefix for server-generated idempotency keys. */
export const SYNTHETIC_KEY_PREFIX = "anon:";

const MAX_ID_LENGTH = 128;
const MAX_KEY_LENGTH = 255;
const MAX_NAME_LENGTH = 255;
const MAX_TEXT_LENGTH = 20_000;
const MAX_URL_LENGTH = 2048;
const MAX_BATCH_SIZE = 100;
const MAX_TOPICS = 50;
const MAX_TOPIC_LENGTH = 128;
const MAX_PAGE_SIZE = 100;

const COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const TEAM_KEY_PATTERN = /^[A-Z0-9]{1,10}$/;
const URL_KEY_PATTERN = /^[a-z0-9-]{1,64}$/;

const LABEL_LEVELS: readonly LabelLevel[] = ["project", "issue"];
const TEAM_ROLES: readonly TeamMemberRole[] = ["admin", "member"];
const WORKSPACE_ROLES: readonly WorkspaceMemberRole[] = ["owner", "admin", "member"];
const STATUS_CATEGORIES: readonly ProjectStatusCategory[] = [
  "backlog",
  "planned",
  "in_progress",
  "completed",
  "canceled",
];
const PRIORITIES: readonly (IssuePriority & ProjectPriority)[] = ["none", "low", "medium", "high", "urgent"];

function hasControlCharacters(value: string): boolean {
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code <= 31 || code === 127) return true;
  }
  return false;
}

// =============================================================================
// FIELD READER
// =============================================================================

/**
 * Reads typed fields from a raw object, collecting errors as it goes.
 * On error a placeholder is returned; callers discard the built command
 * whenever `errors` is non-empty.
 */
class FieldReader {
  constructor(
    private readonly source: Record<string, unknown>,
    readonly errors: ValidationError[] = [],
    private readonly prefix = ""
  ) {}

  private path(name: string): string {
    return this.prefix ? `${this.prefix}.${name}` : name;
  }

  private fail(name: string, message: string): void {
    this.errors.push({ field: this.path(name), message });
  }

  has(name: string): boolean {
    return this.source[name] !== undefined && this.source[name] !== null;
  }

  string(name: string, maxLength = MAX_NAME_LENGTH): string {
    const value = this.source[name];
    if (typeof value !== "string" || value.trim().length === 0) {
      this.fail(name, "Required non-empty string");
      return "";
    }
    if (value.length > maxLength) {
      this.fail(name, `Too long (max ${maxLength} chars)`);
    }
    return value;
  }

  optionalString(name: string, maxLength = MAX_NAME_LENGTH): string | undefined {
    if (!this.has(name)) return undefined;
    const value = this.source[name];
    if (typeof value !== "string") {
      this.fail(name, "Must be a string if provided");
      return undefined;
    }
    if (value.length > maxLength) {
      this.fail(name, `Too long (max ${maxLength} chars)`);
    }
    return value;
  }

  /** Single-line display name. */
  name(name: string): string {
    const value = this.string(name);
    if (hasControlCharacters(value)) {
      this.fail(name, "Must not contain control characters");
    }
    return value;
  }

  optionalName(name: string): string | undefined {
    const value = this.optionalString(name);
    if (value !== undefined && value.trim().length === 0) {
      this.fail(name, "Must not be blank if provided");
    } else if (value !== undefined && hasControlCharacters(value)) {
      this.fail(name, "Must not contain control characters");
    }
    return value;
  }

  id(name: string): string {
    return this.string(name, MAX_ID_LENGTH);
  }

  optionalId(name: string): string | undefined {
    const value = this.optionalString(name, MAX_ID_LENGTH);
    if (value !== undefined && value.length === 0) {
      this.fail(name, "Must not be empty if provided");
    }
    return value;
  }

  pattern(name: string, pattern: RegExp, description: string): string {
    const value = this.string(name);
    if (value && !pattern.test(value)) {
      this.fail(name, `Must be ${description}`);
    }
    return value;
  }

  optionalPattern(name: string, pattern: RegExp, description: string): string | undefined {
    const value = this.optionalString(name);
    if (value !== undefined && !pattern.test(value)) {
      this.fail(name, `Must be ${description}`);
    }
    return value;
  }

  boolean(name: string): boolean {
    const value = this.source[name];
    if (typeof value !== "boolean") {
      this.fail(name, "Required boolean");
      return false;
    }
    return value;
  }

  optionalBoolean(name: string): boolean | undefined {
    if (!this.has(name)) return undefined;
    const value = this.source[name];
    if (typeof value !== "boolean") {
      this.fail(name, "Must be a boolean if provided");
      return undefined;
    }
    return value;
  }

  optionalInt(name: string, min: number, max: number): number | undefined {
    if (!this.has(name)) return undefined;
    const value = this.source[name];
    if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
      this.fail(name, `Must be an integer between ${min} and ${max}`);
      return undefined;
    }
    return value;
  }

  oneOf<T extends string>(name: string, values: readonly T[]): T {
    const value = this.source[name];
    const match = values.find((candidate) => candidate === value);
    if (match === undefined) {
      this.fail(name, `Must be one of: ${values.join(", ")}`);
      return values[0];
    }
    return match;
  }

  optionalOneOf<T extends string>(name: string, values: readonly T[]): T | undefined {
    if (!this.has(name)) return undefined;
    return this.oneOf(name, values);
  }

  optionalDate(name: string): string | undefined {
    const value = this.optionalString(name, 64);
    if (value !== undefined && Number.isNaN(Date.parse(value))) {
      this.fail(name, "Must be an ISO-8601 date");
    }
    return value;
  }

  object(name: string): FieldReader {
    const value = this.source[name];
    if (!isRecord(value)) {
      this.fail(name, "Required object");
      return new FieldReader({}, this.errors, this.path(name));
    }
    return new FieldReader(value, this.errors, this.path(name));
  }

  optionalObject(name: string): FieldReader | undefined {
    if (!this.has(name)) return undefined;
    return this.object(name);
  }

  /** Non-empty array, each element read by `item`. */
  array<T>(name: string, maxItems: number, item: (value: unknown, field: string) => T): T[] {
    const value = this.source[name];
    if (!Array.isArray(value) || value.length === 0) {
      this.fail(name, "Required non-empty array");
      return [];
    }
    if (value.length > maxItems) {
      this.fail(name, `Too many items (max ${maxItems})`);
      return [];
    }
    return value.map((element, index) => item(element, this.path(`${name}[${index}]`)));
  }

  optionalIdArray(name: string): string[] | undefined {
    if (!this.has(name)) return undefined;
    const value = this.source[name];
    if (!Array.isArray(value)) {
      this.fail(name, "Must be an array if provided");
      return undefined;
    }
    return value.map((element, index) => this.idElement(element, this.path(`${name}[${index}]`)));
  }

  /** Element reader for arrays of ids. */
  idElement(value: unknown, field: string): string {
    if (typeof value !== "string" || value.length === 0 || value.length > MAX_ID_LENGTH) {
      this.errors.push({ field, message: `Must be a non-empty string (max ${MAX_ID_LENGTH} chars)` });
      return "";
    }
    return value;
  }

  /** Element reader for arrays of objects. */
  objectElement(value: unknown, field: string): FieldReader {
    if (!isRecord(value)) {
      this.errors.push({ field, message: "Must be an object" });
      return new FieldReader({}, this.errors, field);
    }
    return new FieldReader(value, this.errors, field);
  }
}

// =============================================================================
// PAYLOAD READERS
// =============================================================================

function readCreateLabel(r: FieldReader): CreateLabelData {
  return {
    name: r.name("name"),
    color: r.pattern("color", COLOR_PATTERN, "a hex color like #ff0000"),
    level: r.oneOf("level", LABEL_LEVELS),
  };
}

function readUpdateLabel(r: FieldReader): UpdateLabelData {
  return {
    name: r.optionalName("name"),
    color: r.optionalPattern("color", COLOR_PATTERN, "a hex color like #ff0000"),
    level: r.optionalOneOf("level", LABEL_LEVELS),
  };
}

function readLabelFilters(r: FieldReader | undefined): LabelFilters | undefined {
  if (!r) return undefined;
  return {
    level: r.optionalOneOf("level", LABEL_LEVELS),
    name_pattern: r.optionalString("name_pattern"),
    color: r.optionalString("color", 32),
    created_after: r.optionalDate("created_after"),
    created_before: r.optionalDate("created_before"),
    limit: r.optionalInt("limit", 1, MAX_PAGE_SIZE),
    offset: r.optionalInt("offset", 0, Number.MAX_SAFE_INTEGER),
  };
}

function readCreateTeam(r: FieldReader): CreateTeamData {
  return {
    name: r.name("name"),
    team_key: r.pattern("team_key", TEAM_KEY_PATTERN, "1-10 uppercase letters or digits"),
    description: r.optionalString("description", MAX_TEXT_LENGTH),
    icon_url: r.optionalString("icon_url", MAX_URL_LENGTH),
    is_private: r.boolean("is_private"),
  };
}

function readUpdateTeam(r: FieldReader): UpdateTeamData {
  return {
    name: r.optionalName("name"),
    team_key: r.optionalPattern("team_key", TEAM_KEY_PATTERN, "1-10 uppercase letters or digits"),
    description: r.optionalString("description", MAX_TEXT_LENGTH),
    icon_url: r.optionalString("icon_url", MAX_URL_LENGTH),
    is_private: r.optionalBoolean("is_private"),
  };
}

function readAddTeamMember(r: FieldReader): AddTeamMemberData {
  return { user_id: r.id("user_id"), role: r.oneOf("role", TEAM_ROLES) };
}

function readWorkspaceMemberFilters(r: FieldReader | undefined): WorkspaceMemberFilters | undefined {
  if (!r) return undefined;
  return {
    role: r.optionalOneOf("role", WORKSPACE_ROLES),
    user_id: r.optionalId("user_id"),
    search: r.optionalString("search"),
  };
}

function readCreateProjectStatus(r: FieldReader): CreateProjectStatusData {
  return {
    name: r.name("name"),
    description: r.optionalString("description", MAX_TEXT_LENGTH),
    color: r.pattern("color", COLOR_PATTERN, "a hex color like #ff0000"),
    category: r.oneOf("category", STATUS_CATEGORIES),
    position: r.optionalInt("position", 0, 10_000),
  };
}

function readUpdateProjectStatus(r: FieldReader): UpdateProjectStatusData {
  return {
    name: r.optionalName("name"),
    description: r.optionalString("description", MAX_TEXT_LENGTH),
    color: r.optionalPattern("color", COLOR_PATTERN, "a hex color like #ff0000"),
    category: r.optionalOneOf("category", STATUS_CATEGORIES),
    position: r.optionalInt("position", 0, 10_000),
  };
}

function readCreateWorkspace(r: FieldReader): CreateWorkspaceData {
  return {
    name: r.name("name"),
    url_key: r.pattern("url_key", URL_KEY_PATTERN, "lowercase letters, digits and dashes"),
    logo_url: r.optionalString("logo_url", MAX_URL_LENGTH),
  };
}

function readUpdateWorkspace(r: FieldReader): UpdateWorkspaceData {
  return {
    name: r.optionalName("name"),
    url_key: r.optionalPattern("url_key", URL_KEY_PATTERN, "lowercase letters, digits and dashes"),
    logo_url: r.optionalString("logo_url", MAX_URL_LENGTH),
  };
}

function readUpdateProfile(r: FieldReader): UpdateProfileData {
  return {
    name: r.optionalName("name"),
    username: r.optionalName("username"),
    email: r.optionalPattern("email", EMAIL_PATTERN, "an email address"),
    avatar_url: r.optionalString("avatar_url", MAX_URL_LENGTH),
  };
}

function readCreateProject(r: FieldReader): CreateProjectData {
  return {
    name: r.name("name"),
    description: r.optionalString("description", MAX_TEXT_LENGTH),
    team_id: r.optionalId("team_id"),
    status_id: r.optionalId("status_id"),
    lead_id: r.optionalId("lead_id"),
    priority: r.optionalOneOf("priority", PRIORITIES),
    target_date: r.optionalDate("target_date"),
  };
}

function readUpdateProject(r: FieldReader): UpdateProjectData {
  return {
    name: r.optionalName("name"),
    description: r.optionalString("description", MAX_TEXT_LENGTH),
    team_id: r.optionalId("team_id"),
    status_id: r.optionalId("status_id"),
    lead_id: r.optionalId("lead_id"),
    priority: r.optionalOneOf("priority", PRIORITIES),
    target_date: r.optionalDate("target_date"),
  };
}

function readProjectFilters(r: FieldReader | undefined): ProjectFilters | undefined {
  if (!r) return undefined;
  return {
    team_id: r.optionalId("team_id"),
    status_id: r.optionalId("status_id"),
    lead_id: r.optionalId("lead_id"),
    search: r.optionalString("search"),
    limit: r.optionalInt("limit", 1, MAX_PAGE_SIZE),
    offset: r.optionalInt("offset", 0, Number.MAX_SAFE_INTEGER),
  };
}

function readCreateIssue(r: FieldReader): CreateIssueData {
  return {
    title: r.name("title"),
    description: r.optionalString("description", MAX_TEXT_LENGTH),
    team_id: r.id("team_id"),
    project_id: r.optionalId("project_id"),
    assignee_id: r.optionalId("assignee_id"),
    workflow_state_id: r.optionalId("workflow_state_id"),
    priority: r.optionalOneOf("priority", PRIORITIES),
    label_ids: r.optionalIdArray("label_ids"),
  };
}

function readUpdateIssue(r: FieldReader): UpdateIssueData {
  return {
    title: r.optionalName("title"),
    description: r.optionalString("description", MAX_TEXT_LENGTH),
    project_id: r.optionalId("project_id"),
    assignee_id: r.optionalId("assignee_id"),
    workflow_state_id: r.optionalId("workflow_state_id"),
    priority: r.optionalOneOf("priority", PRIORITIES),
    label_ids: r.optionalIdArray("label_ids"),
  };
}

function readIssueFilters(r: FieldReader | undefined): IssueFilters | undefined {
  if (!r) return undefined;
  return {
    team_id: r.optionalId("team_id"),
    project_id: r.optionalId("project_id"),
    assignee_id: r.optionalId("assignee_id"),
    priority: r.optionalOneOf("priority", PRIORITIES),
    search: r.optionalString("search"),
    limit: r.optionalInt("limit", 1, MAX_PAGE_SIZE),
    offset: r.optionalInt("offset", 0, Number.MAX_SAFE_INTEGER),
  };
}

function readTopics(r: FieldReader): string[] {
  return r.array("topics", MAX_TOPICS, (value, field) => {
    if (typeof value !== "string" || value.trim().length === 0 || value.length > MAX_TOPIC_LENGTH) {
      r.errors.push({ field, message: `Must be a non-empty string (max ${MAX_TOPIC_LENGTH} chars)` });
      return "";
    }
    return value;
  });
}

// =============================================================================
// COMMAND PARSING
// =============================================================================

/**
 * Build the typed command body for a known type.
 * The switch is exhaustive over CommandType.
 */
function readCommandBody(type: CommandType, r: FieldReader): Command {
  switch (type) {
    case "create_label":
      return { type, data: readCreateLabel(r.object("data")) };
    case "update_label":
      return { type, label_id: r.id("label_id"), data: readUpdateLabel(r.object("data")) };
    case "delete_label":
      return { type, label_id: r.id("label_id") };
    case "query_labels":
      return { type, filters: readLabelFilters(r.optionalObject("filters")) };
    case "batch_create_labels":
      return {
        type,
        data: r.array("data", MAX_BATCH_SIZE, (value, field) => readCreateLabel(r.objectElement(value, field))),
      };
    case "batch_update_labels":
      return {
        type,
        updates: r.array("updates", MAX_BATCH_SIZE, (value, field): LabelUpdate => {
          const item = r.objectElement(value, field);
          return { label_id: item.id("label_id"), data: readUpdateLabel(item.object("data")) };
        }),
      };
    case "batch_delete_labels":
      return { type, label_ids: r.array("label_ids", MAX_BATCH_SIZE, (value, field) => r.idElement(value, field)) };

    case "subscribe":
      return { type, topics: readTopics(r) };
    case "unsubscribe":
      return { type, topics: readTopics(r) };
    case "get_connection_info":
      return { type };
    case "ping":
      return { type };

    case "create_team":
      return { type, data: readCreateTeam(r.object("data")) };
    case "update_team":
      return { type, team_id: r.id("team_id"), data: readUpdateTeam(r.object("data")) };
    case "delete_team":
      return { type, team_id: r.id("team_id") };
    case "query_teams":
      return { type };
    case "add_team_member":
      return { type, team_id: r.id("team_id"), data: readAddTeamMember(r.object("data")) };
    case "update_team_member":
      return {
        type,
        team_id: r.id("team_id"),
        member_user_id: r.id("member_user_id"),
        data: { role: r.object("data").oneOf("role", TEAM_ROLES) },
      };
    case "remove_team_member":
      return { type, team_id: r.id("team_id"), member_user_id: r.id("member_user_id") };
    case "list_team_members":
      return { type, team_id: r.id("team_id") };

    case "invite_workspace_member": {
      const data = r.object("data");
      return {
        type,
        data: {
          email: data.pattern("email", EMAIL_PATTERN, "an email address"),
          role: data.oneOf("role", WORKSPACE_ROLES),
        },
      };
    }
    case "accept_invitation":
      return { type, invitation_id: r.id("invitation_id") };
    case "query_workspace_members":
      return { type, filters: readWorkspaceMemberFilters(r.optionalObject("filters")) };

    case "create_project_status":
      return { type, data: readCreateProjectStatus(r.object("data")) };
    case "update_project_status":
      return { type, status_id: r.id("status_id"), data: readUpdateProjectStatus(r.object("data")) };
    case "delete_project_status":
      return { type, status_id: r.id("status_id") };
    case "get_project_status_by_id":
      return { type, status_id: r.id("status_id") };
    case "query_project_statuses":
      return { type };

    case "create_workspace":
      return { type, data: readCreateWorkspace(r.object("data")) };
    case "update_workspace":
      return { type, workspace_id: r.id("workspace_id"), data: readUpdateWorkspace(r.object("data")) };
    case "delete_workspace":
      return { type, workspace_id: r.id("workspace_id") };
    case "get_current_workspace":
      return { type };

    case "update_profile":
      return { type, data: readUpdateProfile(r.object("data")) };

    case "create_project":
      return { type, data: readCreateProject(r.object("data")) };
    case "update_project":
      return { type, project_id: r.id("project_id"), data: readUpdateProject(r.object("data")) };
    case "delete_project":
      return { type, project_id: r.id("project_id") };
    case "query_projects":
      return { type, filters: readProjectFilters(r.optionalObject("filters")) };

    case "create_issue":
      return { type, data: readCreateIssue(r.object("data")) };
    case "update_issue":
      return { type, issue_id: r.id("issue_id"), data: readUpdateIssue(r.object("data")) };
    case "delete_issue":
      return { type, issue_id: r.id("issue_id") };
    case "get_issue":
      return { type, issue_id: r.id("issue_id") };
    case "query_issues":
      return { type, filters: readIssueFilters(r.optionalObject("filters")) };
  }
}

function readEnvelope(r: FieldReader): CommandEnvelope {
  const idempotencyKey = r.optionalString("idempotency_key", MAX_KEY_LENGTH);
  if (idempotencyKey !== undefined) {
    if (idempotencyKey.trim().length === 0) {
      r.errors.push({ field: "idempotency_key", message: "Must not be blank if provided" });
    } else if (idempotencyKey.startsWith(SYNTHETIC_KEY_PREFIX)) {
      r.errors.push({
        field: "idempotency_key",
        message: `Must not start with reserved prefix '${SYNTHETIC_KEY_PREFIX}'`,
      });
    }
  }
  return {
    idempotency_key: idempotencyKey,
    request_id: r.optionalString("request_id", MAX_KEY_LENGTH),
  };
}

/**
 * Parse an untrusted value into a Command.
 */
export function parseCommand(input: unknown): ParseResult {
  if (!isRecord(input)) {
    return { ok: false, errors: [{ field: "root", message: "Command must be an object" }], unknownType: false };
  }

  const type = input.type;
  if (typeof type !== "string" || type.length === 0) {
    return {
      ok: false,
      errors: [{ field: "type", message: "Command must have a string 'type' field" }],
      unknownType: false,
    };
  }

  if (!isCommandType(type)) {
    return {
      ok: false,
      errors: [{ field: "type", message: `Unknown command type '${type}'` }],
      unknownType: true,
    };
  }

  const reader = new FieldReader(input);
  const envelope = readEnvelope(reader);
  const body = readCommandBody(type, reader);

  if (reader.errors.length > 0) {
    return { ok: false, errors: reader.errors, unknownType: false };
  }

  return { ok: true, command: { ...body, ...envelope } };
}

/**
 * Validate a command. Returns array of errors (empty if valid).
 */
export function validateCommand(input: unknown): ValidationError[] {
  const result = parseCommand(input);
  return result.ok ? [] : result.errors;
}

/**
 * Format validation errors as a human-readable string.
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.field}: ${e.message}`).join("; ");
}

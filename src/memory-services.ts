/**
 * In-memory domain collaborators.
 *
 * Used by the standalone server and as the stand-in for the persistence
 * layer in tests. Business rules are limited to what the channel relies on:
 * workspace scoping, not-found and name/key conflicts.
 */

import { randomUUID } from "node:crypto";
import { AppError } from "./error-mapper.js";
import type {
  CommandIn,
  IssueService,
  LabelService,
  ProfileService,
  ProjectService,
  ProjectStatusService,
  Services,
  TeamService,
  WorkspaceMemberService,
  WorkspaceService,
} from "./services.js";
import type {
  IssueCommand,
  JsonObject,
  JsonValue,
  LabelCommand,
  Paging,
  ProfileCommand,
  ProjectCommand,
  ProjectStatusCommand,
  TeamCommand,
  UserContext,
  WorkspaceCommand,
  WorkspaceContext,
  WorkspaceMemberCommand,
} from "./types.js";

// ============================================================================
// RECORDS
// ============================================================================

type LabelRecord = {
  id: string;
  workspace_id: string;
  name: string;
  color: string;
  level: string;
  created_at: string;
  updated_at: string;
};

type TeamRecord = {
  id: string;
  workspace_id: string;
  name: string;
  team_key: string;
  description: string | null;
  icon_url: string | null;
  is_private: boolean;
  created_at: string;
  updated_at: string;
};

type TeamMemberRecord = {
  team_id: string;
  user_id: string;
  role: string;
  joined_at: string;
};

type InvitationRecord = {
  id: string;
  workspace_id: string;
  email: string;
  role: string;
  invited_by: string;
  status: string;
  created_at: string;
};

type WorkspaceMemberRecord = {
  workspace_id: string;
  user_id: string;
  role: string;
  joined_at: string;
};

type ProjectStatusRecord = {
  id: string;
  workspace_id: string;
  name: string;
  description: string | null;
  color: string;
  category: string;
  position: number;
  created_at: string;
  updated_at: string;
};

type WorkspaceRecord = {
  id: string;
  name: string;
  url_key: string;
  logo_url: string | null;
  created_at: string;
};

type ProfileRecord = {
  user_id: string;
  name: string | null;
  username: string | null;
  email: string | null;
  avatar_url: string | null;
  updated_at: string;
};

type ProjectRecord = {
  id: string;
  workspace_id: string;
  name: string;
  description: string | null;
  team_id: string | null;
  status_id: string | null;
  lead_id: string | null;
  priority: string;
  target_date: string | null;
  created_by: string;
  created_at: string;
  updated_at: string;
};

type IssueRecord = {
  id: string;
  workspace_id: string;
  team_id: string;
  number: number;
  identifier: string;
  title: string;
  description: string | null;
  project_id: string | null;
  assignee_id: string | null;
  workflow_state_id: string | null;
  priority: string;
  label_ids: string[];
  created_by: string;
  created_at: string;
  updated_at: string;
};

// ============================================================================
// HELPERS
// ============================================================================

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function page<T extends JsonValue>(items: T[], paging: Paging | undefined): JsonObject {
  const offset = paging?.offset ?? 0;
  const limit = paging?.limit ?? items.length;
  return { items: items.slice(offset, offset + limit), total: items.length };
}

function matchesPattern(value: string, pattern: string | undefined): boolean {
  return pattern === undefined || value.toLowerCase().includes(pattern.toLowerCase());
}

/** Apply only the fields present in a partial update. */
function pick<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

// ============================================================================
// LABELS
// ============================================================================

export class MemoryLabelService implements LabelService {
  private readonly labels = new Map<string, LabelRecord>();

  constructor(private readonly clock: Clock = systemClock) {}

  async execute(ctx: WorkspaceContext, command: CommandIn<LabelCommand>): Promise<JsonValue> {
    switch (command.type) {
      case "create_label": {
        this.assertUniqueName(ctx.workspace_id, command.data.name);
        const now = this.clock().toISOString();
        const label: LabelRecord = {
          id: randomUUID(),
          workspace_id: ctx.workspace_id,
          name: command.data.name,
          color: command.data.color,
          level: command.data.level,
          created_at: now,
          updated_at: now,
        };
        this.labels.set(label.id, label);
        return label;
      }
      case "update_label": {
        const label = this.find(ctx, command.label_id);
        if (command.data.name !== undefined && command.data.name !== label.name) {
          this.assertUniqueName(ctx.workspace_id, command.data.name);
        }
        const updated: LabelRecord = {
          ...label,
          name: pick(command.data.name, label.name),
          color: pick(command.data.color, label.color),
          level: pick(command.data.level, label.level),
          updated_at: this.clock().toISOString(),
        };
        this.labels.set(updated.id, updated);
        return updated;
      }
      case "delete_label": {
        this.find(ctx, command.label_id);
        this.labels.delete(command.label_id);
        return { deleted: true, label_id: command.label_id };
      }
      case "query_labels": {
        const filters = command.filters;
        const after = filters?.created_after !== undefined ? Date.parse(filters.created_after) : undefined;
        const before = filters?.created_before !== undefined ? Date.parse(filters.created_before) : undefined;
        const items = [...this.labels.values()].filter(
          (label) =>
            label.workspace_id === ctx.workspace_id &&
            (filters?.level === undefined || label.level === filters.level) &&
            (filters?.color === undefined || label.color.toLowerCase() === filters.color.toLowerCase()) &&
            matchesPattern(label.name, filters?.name_pattern) &&
            (after === undefined || Date.parse(label.created_at) >= after) &&
            (before === undefined || Date.parse(label.created_at) <= before)
        );
        return page(items, filters);
      }
    }
  }

  private find(ctx: WorkspaceContext, labelId: string): LabelRecord {
    const label = this.labels.get(labelId);
    if (!label || label.workspace_id !== ctx.workspace_id) {
      throw AppError.notFound("Label", labelId);
    }
    return label;
  }

  private assertUniqueName(workspaceId: string, name: string): void {
    for (const label of this.labels.values()) {
      if (label.workspace_id === workspaceId && label.name.toLowerCase() === name.toLowerCase()) {
        throw new AppError("conflict", "Label with this name already exists", { field: "name" });
      }
    }
  }
}

// ============================================================================
// TEAMS
// ============================================================================

export class MemoryTeamService implements TeamService {
  private readonly teams = new Map<string, TeamRecord>();
  private readonly members: TeamMemberRecord[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  async execute(ctx: WorkspaceContext, command: CommandIn<TeamCommand>): Promise<JsonValue> {
    switch (command.type) {
      case "create_team": {
        this.assertUniqueKey(ctx.workspace_id, command.data.team_key);
        const now = this.clock().toISOString();
        const team: TeamRecord = {
          id: randomUUID(),
          workspace_id: ctx.workspace_id,
          name: command.data.name,
          team_key: command.data.team_key,
          description: command.data.description ?? null,
          icon_url: command.data.icon_url ?? null,
          is_private: command.data.is_private,
          created_at: now,
          updated_at: now,
        };
        this.teams.set(team.id, team);
        this.members.push({ team_id: team.id, user_id: ctx.user_id, role: "admin", joined_at: now });
        return team;
      }
      case "update_team": {
        const team = this.find(ctx, command.team_id);
        if (command.data.team_key !== undefined && command.data.team_key !== team.team_key) {
          this.assertUniqueKey(ctx.workspace_id, command.data.team_key);
        }
        const updated: TeamRecord = {
          ...team,
          name: pick(command.data.name, team.name),
          team_key: pick(command.data.team_key, team.team_key),
          description: pick(command.data.description, team.description),
          icon_url: pick(command.data.icon_url, team.icon_url),
          is_private: pick(command.data.is_private, team.is_private),
          updated_at: this.clock().toISOString(),
        };
        this.teams.set(updated.id, updated);
        return updated;
      }
      case "delete_team": {
        this.find(ctx, command.team_id);
        this.teams.delete(command.team_id);
        this.removeMembers((m) => m.team_id === command.team_id);
        return { deleted: true, team_id: command.team_id };
      }
      case "query_teams":
        return [...this.teams.values()].filter((team) => team.workspace_id === ctx.workspace_id);
      case "add_team_member": {
        this.find(ctx, command.team_id);
        if (this.findMember(command.team_id, command.data.user_id)) {
          throw new AppError("conflict", "User is already a member of this team", { field: "user_id" });
        }
        const member: TeamMemberRecord = {
          team_id: command.team_id,
          user_id: command.data.user_id,
          role: command.data.role,
          joined_at: this.clock().toISOString(),
        };
        this.members.push(member);
        return member;
      }
      case "update_team_member": {
        this.find(ctx, command.team_id);
        const member = this.findMember(command.team_id, command.member_user_id);
        if (!member) throw AppError.notFound("Team member", command.member_user_id);
        member.role = command.data.role;
        return { ...member };
      }
      case "remove_team_member": {
        this.find(ctx, command.team_id);
        if (!this.findMember(command.team_id, command.member_user_id)) {
          throw AppError.notFound("Team member", command.member_user_id);
        }
        this.removeMembers((m) => m.team_id === command.team_id && m.user_id === command.member_user_id);
        return { removed: true, team_id: command.team_id, user_id: command.member_user_id };
      }
      case "list_team_members":
        this.find(ctx, command.team_id);
        return this.members.filter((m) => m.team_id === command.team_id).map((m) => ({ ...m }));
    }
  }

  private find(ctx: WorkspaceContext, teamId: string): TeamRecord {
    const team = this.teams.get(teamId);
    if (!team || team.workspace_id !== ctx.workspace_id) {
      throw AppError.notFound("Team", teamId);
    }
    return team;
  }

  private findMember(teamId: string, userId: string): TeamMemberRecord | undefined {
    return this.members.find((m) => m.team_id === teamId && m.user_id === userId);
  }

  private removeMembers(predicate: (member: TeamMemberRecord) => boolean): void {
    for (let i = this.members.length - 1; i >= 0; i--) {
      if (predicate(this.members[i])) this.members.splice(i, 1);
    }
  }

  private assertUniqueKey(workspaceId: string, teamKey: string): void {
    for (const team of this.teams.values()) {
      if (team.workspace_id === workspaceId && team.team_key === teamKey) {
        throw new AppError("conflict", "Team with this key already exists", { field: "team_key" });
      }
    }
  }
}

// ============================================================================
// WORKSPACES AND MEMBERS
// ============================================================================

export class MemoryWorkspaceStore {
  readonly workspaces = new Map<string, WorkspaceRecord>();
  readonly members: WorkspaceMemberRecord[] = [];
  readonly invitations = new Map<string, InvitationRecord>();

  isMember(workspaceId: string, userId: string): boolean {
    return this.members.some((m) => m.workspace_id === workspaceId && m.user_id === userId);
  }

  addMember(workspaceId: string, userId: string, role: string, joinedAt: string): void {
    if (!this.isMember(workspaceId, userId)) {
      this.members.push({ workspace_id: workspaceId, user_id: userId, role, joined_at: joinedAt });
    }
  }
}

export class MemoryWorkspaceService implements WorkspaceService {
  constructor(
    private readonly store: MemoryWorkspaceStore,
    private readonly clock: Clock = systemClock
  ) {}

  async execute(ctx: UserContext, command: CommandIn<WorkspaceCommand>): Promise<JsonValue> {
    switch (command.type) {
      case "create_workspace": {
        this.assertUniqueUrlKey(command.data.url_key);
        const now = this.clock().toISOString();
        const workspace: WorkspaceRecord = {
          id: randomUUID(),
          name: command.data.name,
          url_key: command.data.url_key,
          logo_url: command.data.logo_url ?? null,
          created_at: now,
        };
        this.store.workspaces.set(workspace.id, workspace);
        this.store.addMember(workspace.id, ctx.user_id, "owner", now);
        return workspace;
      }
      case "update_workspace": {
        const workspace = this.findForMember(ctx, command.workspace_id);
        if (command.data.url_key !== undefined && command.data.url_key !== workspace.url_key) {
          this.assertUniqueUrlKey(command.data.url_key);
        }
        const updated: WorkspaceRecord = {
          ...workspace,
          name: pick(command.data.name, workspace.name),
          url_key: pick(command.data.url_key, workspace.url_key),
          logo_url: pick(command.data.logo_url, workspace.logo_url),
        };
        this.store.workspaces.set(updated.id, updated);
        return updated;
      }
      case "delete_workspace": {
        this.findForMember(ctx, command.workspace_id);
        this.store.workspaces.delete(command.workspace_id);
        return { deleted: true, workspace_id: command.workspace_id };
      }
      case "get_current_workspace": {
        if (ctx.workspace_id === undefined) {
          throw new AppError("no_workspace", "No current workspace selected");
        }
        const workspace = this.store.workspaces.get(ctx.workspace_id);
        if (!workspace) throw AppError.notFound("Workspace", ctx.workspace_id);
        return workspace;
      }
    }
  }

  private findForMember(ctx: UserContext, workspaceId: string): WorkspaceRecord {
    const workspace = this.store.workspaces.get(workspaceId);
    if (!workspace) throw AppError.notFound("Workspace", workspaceId);
    if (!this.store.isMember(workspaceId, ctx.user_id)) {
      throw new AppError("forbidden", "Not a member of this workspace");
    }
    return workspace;
  }

  private assertUniqueUrlKey(urlKey: string): void {
    for (const workspace of this.store.workspaces.values()) {
      if (workspace.url_key === urlKey) {
        throw new AppError("conflict", "Workspace URL key is already taken", { field: "url_key" });
      }
    }
  }
}

export class MemoryWorkspaceMemberService implements WorkspaceMemberService {
  constructor(
    private readonly store: MemoryWorkspaceStore,
    private readonly clock: Clock = systemClock
  ) {}

  async execute(ctx: UserContext, command: CommandIn<WorkspaceMemberCommand>): Promise<JsonValue> {
    switch (command.type) {
      case "invite_workspace_member": {
        const workspaceId = this.requireWorkspace(ctx);
        const email = command.data.email.toLowerCase();
        for (const invitation of this.store.invitations.values()) {
          if (invitation.workspace_id === workspaceId && invitation.email === email && invitation.status === "pending") {
            throw new AppError("conflict", "An invitation for this email is already pending", { field: "email" });
          }
        }
        const invitation: InvitationRecord = {
          id: randomUUID(),
          workspace_id: workspaceId,
          email,
          role: command.data.role,
          invited_by: ctx.user_id,
          status: "pending",
          created_at: this.clock().toISOString(),
        };
        this.store.invitations.set(invitation.id, invitation);
        return invitation;
      }
      case "accept_invitation": {
        const invitation = this.store.invitations.get(command.invitation_id);
        if (!invitation) throw AppError.notFound("Invitation", command.invitation_id);
        if (invitation.status !== "pending") {
          throw new AppError("conflict", `Invitation is already ${invitation.status}`);
        }
        const accepted: InvitationRecord = { ...invitation, status: "accepted" };
        this.store.invitations.set(accepted.id, accepted);
        this.store.addMember(accepted.workspace_id, ctx.user_id, accepted.role, this.clock().toISOString());
        return { accepted: true, invitation_id: accepted.id, workspace_id: accepted.workspace_id };
      }
      case "query_workspace_members": {
        const workspaceId = this.requireWorkspace(ctx);
        const filters = command.filters;
        return this.store.members
          .filter(
            (m) =>
              m.workspace_id === workspaceId &&
              (filters?.role === undefined || m.role === filters.role) &&
              (filters?.user_id === undefined || m.user_id === filters.user_id) &&
              matchesPattern(m.user_id, filters?.search)
          )
          .map((m) => ({ ...m }));
      }
    }
  }

  private requireWorkspace(ctx: UserContext): string {
    if (ctx.workspace_id === undefined) {
      throw new AppError("no_workspace", "No current workspace selected");
    }
    return ctx.workspace_id;
  }
}

// ============================================================================
// PROJECT STATUSES
// ============================================================================

export class MemoryProjectStatusService implements ProjectStatusService {
  private readonly statuses = new Map<string, ProjectStatusRecord>();

  constructor(private readonly clock: Clock = systemClock) {}

  async execute(ctx: WorkspaceContext, command: CommandIn<ProjectStatusCommand>): Promise<JsonValue> {
    switch (command.type) {
      case "create_project_status": {
        const now = this.clock().toISOString();
        const status: ProjectStatusRecord = {
          id: randomUUID(),
          workspace_id: ctx.workspace_id,
          name: command.data.name,
          description: command.data.description ?? null,
          color: command.data.color,
          category: command.data.category,
          position: command.data.position ?? this.list(ctx).length,
          created_at: now,
          updated_at: now,
        };
        this.statuses.set(status.id, status);
        return status;
      }
      case "update_project_status": {
        const status = this.find(ctx, command.status_id);
        const updated: ProjectStatusRecord = {
          ...status,
          name: pick(command.data.name, status.name),
          description: pick(command.data.description, status.description),
          color: pick(command.data.color, status.color),
          category: pick(command.data.category, status.category),
          position: pick(command.data.position, status.position),
          updated_at: this.clock().toISOString(),
        };
        this.statuses.set(updated.id, updated);
        return updated;
      }
      case "delete_project_status":
        this.find(ctx, command.status_id);
        this.statuses.delete(command.status_id);
        return { deleted: true, status_id: command.status_id };
      case "query_project_statuses":
        return this.list(ctx);
      case "get_project_status_by_id":
        return this.find(ctx, command.status_id);
    }
  }

  private list(ctx: WorkspaceContext): ProjectStatusRecord[] {
    return [...this.statuses.values()]
      .filter((s) => s.workspace_id === ctx.workspace_id)
      .sort((a, b) => a.position - b.position);
  }

  private find(ctx: WorkspaceContext, statusId: string): ProjectStatusRecord {
    const status = this.statuses.get(statusId);
    if (!status || status.workspace_id !== ctx.workspace_id) {
      throw AppError.notFound("Project status", statusId);
    }
    return status;
  }
}

// ============================================================================
// PROFILE
// ============================================================================

export class MemoryProfileService implements ProfileService {
  private readonly profiles = new Map<string, ProfileRecord>();

  constructor(private readonly clock: Clock = systemClock) {}

  async execute(ctx: UserContext, command: CommandIn<ProfileCommand>): Promise<JsonValue> {
    const current: ProfileRecord = this.profiles.get(ctx.user_id) ?? {
      user_id: ctx.user_id,
      name: null,
      username: null,
      email: null,
      avatar_url: null,
      updated_at: this.clock().toISOString(),
    };
    const updated: ProfileRecord = {
      ...current,
      name: pick(command.data.name, current.name),
      username: pick(command.data.username, current.username),
      email: pick(command.data.email, current.email),
      avatar_url: pick(command.data.avatar_url, current.avatar_url),
      updated_at: this.clock().toISOString(),
    };
    this.profiles.set(ctx.user_id, updated);
    return updated;
  }
}

// ============================================================================
// PROJECTS
// ============================================================================

export class MemoryProjectService implements ProjectService {
  private readonly projects = new Map<string, ProjectRecord>();

  constructor(private readonly clock: Clock = systemClock) {}

  async execute(ctx: WorkspaceContext, command: CommandIn<ProjectCommand>): Promise<JsonValue> {
    switch (command.type) {
      case "create_project": {
        const now = this.clock().toISOString();
        const project: ProjectRecord = {
          id: randomUUID(),
          workspace_id: ctx.workspace_id,
          name: command.data.name,
          description: command.data.description ?? null,
          team_id: command.data.team_id ?? null,
          status_id: command.data.status_id ?? null,
          lead_id: command.data.lead_id ?? null,
          priority: command.data.priority ?? "none",
          target_date: command.data.target_date ?? null,
          created_by: ctx.user_id,
          created_at: now,
          updated_at: now,
        };
        this.projects.set(project.id, project);
        return project;
      }
      case "update_project": {
        const project = this.find(ctx, command.project_id);
        const updated: ProjectRecord = {
          ...project,
          name: pick(command.data.name, project.name),
          description: pick(command.data.description, project.description),
          team_id: pick(command.data.team_id, project.team_id),
          status_id: pick(command.data.status_id, project.status_id),
          lead_id: pick(command.data.lead_id, project.lead_id),
          priority: pick(command.data.priority, project.priority),
          target_date: pick(command.data.target_date, project.target_date),
          updated_at: this.clock().toISOString(),
        };
        this.projects.set(updated.id, updated);
        return updated;
      }
      case "delete_project":
        this.find(ctx, command.project_id);
        this.projects.delete(command.project_id);
        return { deleted: true, project_id: command.project_id };
      case "query_projects": {
        const filters = command.filters;
        const items = [...this.projects.values()].filter(
          (p) =>
            p.workspace_id === ctx.workspace_id &&
            (filters?.team_id === undefined || p.team_id === filters.team_id) &&
            (filters?.status_id === undefined || p.status_id === filters.status_id) &&
            (filters?.lead_id === undefined || p.lead_id === filters.lead_id) &&
            matchesPattern(p.name, filters?.search)
        );
        return page(items, filters);
      }
    }
  }

  private find(ctx: WorkspaceContext, projectId: string): ProjectRecord {
    const project = this.projects.get(projectId);
    if (!project || project.workspace_id !== ctx.workspace_id) {
      throw AppError.notFound("Project", projectId);
    }
    return project;
  }
}

// ============================================================================
// ISSUES
// ============================================================================

export class MemoryIssueService implements IssueService {
  private readonly issues = new Map<string, IssueRecord>();
  private readonly sequenceByTeam = new Map<string, number>();

  constructor(private readonly clock: Clock = systemClock) {}

  async execute(ctx: WorkspaceContext, command: CommandIn<IssueCommand>): Promise<JsonValue> {
    switch (command.type) {
      case "create_issue": {
        const now = this.clock().toISOString();
        const number = (this.sequenceByTeam.get(command.data.team_id) ?? 0) + 1;
        this.sequenceByTeam.set(command.data.team_id, number);
        const issue: IssueRecord = {
          id: randomUUID(),
          workspace_id: ctx.workspace_id,
          team_id: command.data.team_id,
          number,
          identifier: `ISS-${number}`,
          title: command.data.title,
          description: command.data.description ?? null,
          project_id: command.data.project_id ?? null,
          assignee_id: command.data.assignee_id ?? null,
          workflow_state_id: command.data.workflow_state_id ?? null,
          priority: command.data.priority ?? "none",
          label_ids: command.data.label_ids ?? [],
          created_by: ctx.user_id,
          created_at: now,
          updated_at: now,
        };
        this.issues.set(issue.id, issue);
        return issue;
      }
      case "update_issue": {
        const issue = this.find(ctx, command.issue_id);
        const updated: IssueRecord = {
          ...issue,
          title: pick(command.data.title, issue.title),
          description: pick(command.data.description, issue.description),
          project_id: pick(command.data.project_id, issue.project_id),
          assignee_id: pick(command.data.assignee_id, issue.assignee_id),
          workflow_state_id: pick(command.data.workflow_state_id, issue.workflow_state_id),
          priority: pick(command.data.priority, issue.priority),
          label_ids: pick(command.data.label_ids, issue.label_ids),
          updated_at: this.clock().toISOString(),
        };
        this.issues.set(updated.id, updated);
        return updated;
      }
      case "delete_issue":
        this.find(ctx, command.issue_id);
        this.issues.delete(command.issue_id);
        return { deleted: true, issue_id: command.issue_id };
      case "query_issues": {
        const filters = command.filters;
        const items = [...this.issues.values()].filter(
          (i) =>
            i.workspace_id === ctx.workspace_id &&
            (filters?.team_id === undefined || i.team_id === filters.team_id) &&
            (filters?.project_id === undefined || i.project_id === filters.project_id) &&
            (filters?.assignee_id === undefined || i.assignee_id === filters.assignee_id) &&
            (filters?.priority === undefined || i.priority === filters.priority) &&
            matchesPattern(i.title, filters?.search)
        );
        return page(items, filters);
      }
      case "get_issue":
        return this.find(ctx, command.issue_id);
    }
  }

  private find(ctx: WorkspaceContext, issueId: string): IssueRecord {
    const issue = this.issues.get(issueId);
    if (!issue || issue.workspace_id !== ctx.workspace_id) {
      throw AppError.notFound("Issue", issueId);
    }
    return issue;
  }
}

// ============================================================================
// FACTORY
// ============================================================================

/**
 * A complete set of in-memory collaborators sharing one workspace store.
 */
export function createMemoryServices(clock: Clock = systemClock): Services {
  const workspaceStore = new MemoryWorkspaceStore();
  return {
    labels: new MemoryLabelService(clock),
    teams: new MemoryTeamService(clock),
    workspaceMembers: new MemoryWorkspaceMemberService(workspaceStore, clock),
    projectStatuses: new MemoryProjectStatusService(clock),
    workspaces: new MemoryWorkspaceService(workspaceStore, clock),
    profile: new MemoryProfileService(clock),
    projects: new MemoryProjectService(clock),
    issues: new MemoryIssueService(clock),
  };
}

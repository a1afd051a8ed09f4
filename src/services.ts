/**
 * Domain collaborators consumed by the command router.
 *
 * One interface per domain. Each receives the caller's context and the
 * validated command, and resolves to the JSON result sent back as `data`.
 * Failures are thrown as AppError.
 */

import type {
  Command,
  IssueCommand,
  JsonValue,
  LabelCommand,
  ProfileCommand,
  ProjectCommand,
  ProjectStatusCommand,
  TeamCommand,
  UserContext,
  WorkspaceCommand,
  WorkspaceContext,
  WorkspaceMemberCommand,
} from "./types.js";

/** The Command variants (with envelope) whose type belongs to a sub-union. */
export type CommandIn<U extends { type: string }> = Extract<Command, { type: U["type"] }>;

export interface DomainService<C, Ctx extends UserContext = WorkspaceContext> {
  execute(context: Ctx, command: C): Promise<JsonValue>;
}

export type LabelService = DomainService<CommandIn<LabelCommand>>;
export type TeamService = DomainService<CommandIn<TeamCommand>>;
/** accept_invitation runs before the user belongs to the workspace. */
export type WorkspaceMemberService = DomainService<CommandIn<WorkspaceMemberCommand>, UserContext>;
export type ProjectStatusService = DomainService<CommandIn<ProjectStatusCommand>>;
export type WorkspaceService = DomainService<CommandIn<WorkspaceCommand>, UserContext>;
export type ProfileService = DomainService<CommandIn<ProfileCommand>, UserContext>;
export type ProjectService = DomainService<CommandIn<ProjectCommand>>;
export type IssueService = DomainService<CommandIn<IssueCommand>>;

export interface Services {
  labels: LabelService;
  teams: TeamService;
  workspaceMembers: WorkspaceMemberService;
  projectStatuses: ProjectStatusService;
  workspaces: WorkspaceService;
  profile: ProfileService;
  projects: ProjectService;
  issues: IssueService;
}

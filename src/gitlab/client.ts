export const ACCESS = {
  none: 0,
  minimal: 5,
  guest: 10,
  reporter: 20,
  developer: 30,
  maintainer: 40,
  owner: 50
} as const;

export type Attributes = Readonly<Record<string, unknown>>;

export type RemoteGroup = {
  id: number;
  name: string;
  full_path: string;
  parent_id: number | null;
};

export type RemoteProjectSummary = {
  id: number;
  path: string;
};

export type RemoteProject = {
  id: number;
  name: string;
  path: string;
  path_with_namespace: string;
  description: string | null;
  creator_id: number;
  last_activity_at: string;
  web_url: string;
  ssh_url_to_repo: string;
  default_branch: string | null;
  namespace_id: number;
  attributes: Attributes;
};

export type AccessLevelEntry = {
  access_level: number;
  access_level_description: string;
};

export type ProtectedBranch = {
  name: string;
  merge_access_levels: AccessLevelEntry[];
  push_access_levels: AccessLevelEntry[];
};

export type ApprovalRule = {
  id: number;
  name: string;
  approvals_required: number;
};

export type NewApprovalRule = {
  name: string;
  approvals_required: number;
  rule_type: "regular";
  user_ids: number[];
};

export type Integration = {
  active: boolean;
  properties: Attributes;
};

export type Member = {
  username: string;
  access_level: number;
};

export type RemoteUser = {
  id: number;
  username: string;
  name: string;
  email?: string;
  public_email?: string;
};

export type BranchProtection = {
  name: string;
  push_access_level: number;
  merge_access_level: number;
};

// Every list call returns the fully paginated collection. Lookups of a
// missing resource throw RemoteNotFoundError; any other failure throws
// RemoteOperationError.
export interface GitlabClient {
  getGroup(idOrPath: number | string): RemoteGroup;
  listSubgroups(groupId: number): RemoteGroup[];
  listGroupProjects(groupId: number): RemoteProjectSummary[];
  listGroupMembers(groupId: number): Member[];

  getProject(id: number): RemoteProject;
  createProject(name: string, namespaceId: number): RemoteProject;
  updateProject(id: number, patch: Record<string, unknown>): void;

  listProtectedBranches(projectId: number): ProtectedBranch[];
  protectBranch(projectId: number, rule: BranchProtection): void;
  unprotectBranch(projectId: number, name: string): void;

  getApprovalSettings(projectId: number): Attributes;
  updateApprovalSettings(projectId: number, patch: Record<string, unknown>): void;
  listApprovalRules(projectId: number): ApprovalRule[];
  createApprovalRule(projectId: number, rule: NewApprovalRule): void;
  updateApprovalRule(projectId: number, ruleId: number, patch: { approvals_required: number }): void;

  getIntegration(projectId: number, slug: string): Integration;
  updateIntegration(projectId: number, slug: string, data: Record<string, unknown>): void;

  getUser(id: number): RemoteUser;
  searchUsers(term: string): RemoteUser[];

  listBranches(projectId: number): Array<{ name: string }>;
  listCommits(projectId: number): Array<{ id: string }>;
  listOpenMergeRequests(projectId: number): Array<{ iid: number }>;
}

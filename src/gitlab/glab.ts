import { spawnSync } from "node:child_process";
import { z } from "zod";
import { RemoteNotFoundError, RemoteOperationError, errorMessage } from "../errors.js";
import type {
  ApprovalRule,
  Attributes,
  BranchProtection,
  GitlabClient,
  Integration,
  Member,
  NewApprovalRule,
  ProtectedBranch,
  RemoteGroup,
  RemoteProject,
  RemoteProjectSummary,
  RemoteUser
} from "./client.js";

export type GlabResult = { status: number; stdout: string; stderr: string };

export type GlabExec = (args: string[], input?: string) => GlabResult;

type Method = "GET" | "POST" | "PUT" | "DELETE";

const PER_PAGE = 100;

const attributesSchema = z.record(z.unknown());

const groupSchema = z.object({
  id: z.number(),
  name: z.string(),
  full_path: z.string(),
  parent_id: z.number().nullable().default(null)
});

const projectSummarySchema = z.object({ id: z.number(), path: z.string() });

const projectSchema = z.object({
  id: z.number(),
  name: z.string(),
  path: z.string(),
  path_with_namespace: z.string(),
  description: z.string().nullable().default(null),
  creator_id: z.number(),
  last_activity_at: z.string(),
  web_url: z.string(),
  ssh_url_to_repo: z.string(),
  default_branch: z.string().nullable().default(null),
  namespace: z.object({ id: z.number() })
});

const accessLevelSchema = z.object({
  access_level: z.number(),
  access_level_description: z.string().default("")
});

const protectedBranchSchema = z.object({
  name: z.string(),
  merge_access_levels: z.array(accessLevelSchema).default([]),
  push_access_levels: z.array(accessLevelSchema).default([])
});

const approvalRuleSchema = z.object({
  id: z.number(),
  name: z.string(),
  approvals_required: z.number()
});

const integrationSchema = z.object({
  active: z.boolean(),
  properties: attributesSchema.nullable().default({})
});

const memberSchema = z.object({ username: z.string(), access_level: z.number() });

const userSchema = z.object({
  id: z.number(),
  username: z.string(),
  name: z.string(),
  email: z.string().optional(),
  public_email: z.string().nullable().optional()
});

export function spawnGlab(args: string[], input?: string): GlabResult {
  const result = spawnSync("glab", args, {
    encoding: "utf8",
    env: process.env,
    input
  });
  if (result.error) {
    return { status: 127, stdout: "", stderr: `glab failed to start: ${result.error.message}` };
  }
  return {
    status: result.status ?? 1,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? ""
  };
}

function withQuery(endpoint: string, query: Record<string, string>): string {
  const params = new URLSearchParams(query).toString();
  if (!params) {
    return endpoint;
  }
  return `${endpoint}${endpoint.includes("?") ? "&" : "?"}${params}`;
}

export class GlabClient implements GitlabClient {
  private readonly hostname?: string;
  private readonly exec: GlabExec;

  constructor(opts: { hostname?: string; exec?: GlabExec } = {}) {
    this.hostname = opts.hostname;
    this.exec = opts.exec ?? spawnGlab;
  }

  private request(method: Method, endpoint: string, body?: Record<string, unknown>): unknown {
    const args = ["api", endpoint, "-X", method];
    if (this.hostname) {
      args.push("--hostname", this.hostname);
    }
    let input: string | undefined;
    if (body) {
      args.push("-H", "Content-Type: application/json", "--input", "-");
      input = JSON.stringify(body);
    }

    const result = this.exec(args, input);
    if (result.status !== 0) {
      const message = (result.stderr || result.stdout || `glab api ${method} ${endpoint} failed`).trim();
      if (/\b404\b/.test(message)) {
        throw new RemoteNotFoundError(endpoint, message);
      }
      throw new RemoteOperationError(endpoint, message);
    }

    const out = result.stdout.trim();
    if (!out) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(out);
      return parsed;
    } catch (error) {
      throw new RemoteOperationError(endpoint, `Invalid JSON from ${endpoint}: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  private get<S extends z.ZodTypeAny>(endpoint: string, schema: S): z.infer<S> {
    return this.parse(endpoint, schema, this.request("GET", endpoint));
  }

  private list<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    query: Record<string, string> = {}
  ): Array<z.infer<S>> {
    const items: Array<z.infer<S>> = [];
    for (let page = 1; ; page += 1) {
      const url = withQuery(endpoint, { ...query, per_page: String(PER_PAGE), page: String(page) });
      const batch = this.parse(url, z.array(schema), this.request("GET", url));
      items.push(...batch);
      if (batch.length < PER_PAGE) {
        return items;
      }
    }
  }

  private parse<S extends z.ZodTypeAny>(endpoint: string, schema: S, value: unknown): z.infer<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new RemoteOperationError(endpoint, `Unexpected response from ${endpoint}: ${result.error.message}`, {
        cause: result.error
      });
    }
    return result.data;
  }

  private toProject(endpoint: string, raw: unknown): RemoteProject {
    const project = this.parse(endpoint, projectSchema, raw);
    return {
      id: project.id,
      name: project.name,
      path: project.path,
      path_with_namespace: project.path_with_namespace,
      description: project.description,
      creator_id: project.creator_id,
      last_activity_at: project.last_activity_at,
      web_url: project.web_url,
      ssh_url_to_repo: project.ssh_url_to_repo,
      default_branch: project.default_branch,
      namespace_id: project.namespace.id,
      attributes: this.parse(endpoint, attributesSchema, raw)
    };
  }

  getGroup(idOrPath: number | string): RemoteGroup {
    const key = typeof idOrPath === "number" ? String(idOrPath) : encodeURIComponent(idOrPath);
    return this.get(`groups/${key}`, groupSchema);
  }

  listSubgroups(groupId: number): RemoteGroup[] {
    return this.list(`groups/${groupId}/subgroups`, groupSchema);
  }

  listGroupProjects(groupId: number): RemoteProjectSummary[] {
    return this.list(`groups/${groupId}/projects`, projectSummarySchema, {
      with_shared: "false",
      archived: "false"
    });
  }

  listGroupMembers(groupId: number): Member[] {
    return this.list(`groups/${groupId}/members`, memberSchema);
  }

  getProject(id: number): RemoteProject {
    const endpoint = `projects/${id}`;
    return this.toProject(endpoint, this.request("GET", endpoint));
  }

  createProject(name: string, namespaceId: number): RemoteProject {
    return this.toProject("projects", this.request("POST", "projects", { name, namespace_id: namespaceId }));
  }

  updateProject(id: number, patch: Record<string, unknown>): void {
    this.request("PUT", `projects/${id}`, patch);
  }

  listProtectedBranches(projectId: number): ProtectedBranch[] {
    return this.list(`projects/${projectId}/protected_branches`, protectedBranchSchema);
  }

  protectBranch(projectId: number, rule: BranchProtection): void {
    this.request("POST", `projects/${projectId}/protected_branches`, { ...rule });
  }

  unprotectBranch(projectId: number, name: string): void {
    this.request("DELETE", `projects/${projectId}/protected_branches/${encodeURIComponent(name)}`);
  }

  getApprovalSettings(projectId: number): Attributes {
    return this.get(`projects/${projectId}/approvals`, attributesSchema);
  }

  updateApprovalSettings(projectId: number, patch: Record<string, unknown>): void {
    this.request("POST", `projects/${projectId}/approvals`, patch);
  }

  listApprovalRules(projectId: number): ApprovalRule[] {
    return this.list(`projects/${projectId}/approval_rules`, approvalRuleSchema);
  }

  createApprovalRule(projectId: number, rule: NewApprovalRule): void {
    this.request("POST", `projects/${projectId}/approval_rules`, { ...rule });
  }

  updateApprovalRule(projectId: number, ruleId: number, patch: { approvals_required: number }): void {
    this.request("PUT", `projects/${projectId}/approval_rules/${ruleId}`, { ...patch });
  }

  getIntegration(projectId: number, slug: string): Integration {
    const integration = this.get(`projects/${projectId}/integrations/${slug}`, integrationSchema);
    return { active: integration.active, properties: integration.properties ?? {} };
  }

  updateIntegration(projectId: number, slug: string, data: Record<string, unknown>): void {
    this.request("PUT", `projects/${projectId}/integrations/${slug}`, data);
  }

  getUser(id: number): RemoteUser {
    return this.toUser(this.get(`users/${id}`, userSchema));
  }

  searchUsers(term: string): RemoteUser[] {
    return this.list("users", userSchema, { search: term }).map((user) => this.toUser(user));
  }

  private toUser(user: z.infer<typeof userSchema>): RemoteUser {
    const out: RemoteUser = { id: user.id, username: user.username, name: user.name };
    if (user.email) {
      out.email = user.email;
    }
    if (user.public_email) {
      out.public_email = user.public_email;
    }
    return out;
  }

  listBranches(projectId: number): Array<{ name: string }> {
    return this.list(`projects/${projectId}/repository/branches`, z.object({ name: z.string() }));
  }

  listCommits(projectId: number): Array<{ id: string }> {
    return this.list(`projects/${projectId}/repository/commits`, z.object({ id: z.string() }), { all: "true" });
  }

  listOpenMergeRequests(projectId: number): Array<{ iid: number }> {
    return this.list(`projects/${projectId}/merge_requests`, z.object({ iid: z.number() }), { state: "opened" });
  }
}

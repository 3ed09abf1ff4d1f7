import { ProjectNotFoundError } from "./errors.js";
import type { GitlabClient } from "./gitlab/client.js";
import { byPath, type GroupNode, type HierarchyWalker, type ProjectNode } from "./hierarchy.js";
import { emptyOutcome, type Outcome } from "./log.js";
import { resolvePath, validateProjectName } from "./paths.js";

export type ProjectDetails = {
  "Project path": string;
  Description: string;
  "Created By": string;
  "Last Activity": string;
  Branches: number;
  Commits: number;
  "Open MRs": number;
};

export function activityDate(timestamp: string): string {
  const parsed = new Date(timestamp);
  return Number.isNaN(parsed.getTime()) ? "" : parsed.toISOString().slice(0, 10);
}

export function describeProject(client: GitlabClient, project: ProjectNode): ProjectDetails {
  return {
    "Project path": project.pathWithNamespace,
    Description: project.description,
    "Created By": client.getUser(project.creatorId).name,
    "Last Activity": activityDate(project.lastActivityAt),
    Branches: client.listBranches(project.id).length,
    Commits: client.listCommits(project.id).length,
    "Open MRs": client.listOpenMergeRequests(project.id).length
  };
}

function projectExists(walker: HierarchyWalker, name: string, group: GroupNode): boolean {
  try {
    walker.resolveProject(name, group);
    return true;
  } catch (error) {
    if (error instanceof ProjectNotFoundError) {
      return false;
    }
    throw error;
  }
}

export function createProject(
  client: GitlabClient,
  walker: HierarchyWalker,
  raw: string,
  opts: { dryRun: boolean }
): Outcome {
  const { groupPath, name } = resolvePath(raw);
  validateProjectName(name);
  const group = walker.resolveGroup(byPath(groupPath ?? walker.root));

  const outcome = emptyOutcome();
  const subject = `${group.fullPath}/${name}`;
  if (projectExists(walker, name, group)) {
    outcome.findings.push({ severity: "warning", subject, message: "project already exists" });
    return outcome;
  }

  outcome.changes.push({
    action: "create",
    subject,
    description: `project in group ${group.fullPath}`,
    dryRun: opts.dryRun
  });
  if (!opts.dryRun) {
    client.createProject(name, group.id);
  }
  return outcome;
}

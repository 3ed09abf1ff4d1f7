import { loadConfig, type GovernanceConfig } from "./config.js";
import { ProjectNotFoundError, errorMessage } from "./errors.js";
import type { GitlabClient } from "./gitlab/client.js";
import { GlabClient } from "./gitlab/glab.js";
import { HierarchyWalker, byPath, type ProjectNode } from "./hierarchy.js";
import { Reporter, type Finding, type LogMode, type Outcome } from "./log.js";
import { MembershipIndex } from "./membership.js";
import { writeMirrorHook, writeRejectPushHook } from "./migrate.js";
import { applyProject, checkProject, type PolicyContext } from "./policy.js";
import { createProject, describeProject } from "./projects.js";
import { commandExists, runCommand, type CommandRunner } from "./runner.js";

export type SessionOptions = {
  configFile?: string;
  hostname?: string;
  dryRun: boolean;
  mode: LogMode;
  client?: GitlabClient;
  reporter?: Reporter;
  runner?: CommandRunner;
};

export type Session = {
  config: GovernanceConfig;
  client: GitlabClient;
  walker: HierarchyWalker;
  membership: MembershipIndex;
  policy: PolicyContext;
  reporter: Reporter;
  runner: CommandRunner;
  dryRun: boolean;
};

export function createSession(opts: SessionOptions): Session {
  const config = loadConfig(opts.configFile);
  const hostname = opts.hostname ?? config.hostname;
  const client = opts.client ?? new GlabClient(hostname ? { hostname } : {});
  const walker = new HierarchyWalker(client, { root: config.rootGroup });
  const policy: PolicyContext = {
    client,
    dryRun: opts.dryRun,
    primaryBranch: config.primaryBranch,
    users: config.users
  };
  if (config.slackWebhook) {
    policy.slackWebhook = config.slackWebhook;
  }

  return {
    config,
    client,
    walker,
    membership: new MembershipIndex(client, walker),
    policy,
    reporter: opts.reporter ?? new Reporter(opts.mode),
    runner: opts.runner ?? runCommand,
    dryRun: opts.dryRun
  };
}

function* projectsUnder(session: Session, path: string): Generator<ProjectNode> {
  for (const node of session.walker.walkProjects(path)) {
    if (node.kind === "project") {
      yield node;
    }
  }
}

function requireProject(session: Session, path: string): ProjectNode {
  const { project } = session.walker.parsePath(path);
  if (!project) {
    throw new ProjectNotFoundError(`'${path}' is a group, not a project`);
  }
  return project;
}

function reconcileTree(
  session: Session,
  path: string,
  label: string,
  reconcile: (project: ProjectNode) => Outcome
): void {
  const { reporter } = session;
  let seen = 0;
  let failed = 0;

  for (const project of projectsUnder(session, path)) {
    seen += 1;
    reporter.line(`==> ${project.pathWithNamespace}`);
    try {
      reporter.outcome(reconcile(project));
    } catch (error) {
      failed += 1;
      reporter.error(`Failed: ${project.pathWithNamespace} ${errorMessage(error)}`);
    }
  }

  const { ok, warning, error: errors, changes } = reporter.tally;
  reporter.line(
    `Summary: seen=${seen} ok=${ok} warnings=${warning} errors=${errors} changes=${changes} failed=${failed} dry-run=${session.dryRun ? 1 : 0}`
  );
  if (failed > 0 || errors > 0) {
    throw new Error(`${label} finished with ${failed > 0 ? "failures" : "errors"}`);
  }
}

export function runCheckFlow(session: Session, path: string): void {
  reconcileTree(session, path, "Check", (project) => ({
    findings: checkProject(session.policy, project),
    changes: []
  }));
}

export function runApplyFlow(session: Session, path: string): void {
  reconcileTree(session, path, "Apply", (project) => applyProject(session.policy, project));
}

export function runProjectsFlow(session: Session, path: string): void {
  const { reporter } = session;
  for (const node of session.walker.walkProjects(path, { includeGroups: true })) {
    if (node.kind === "group") {
      reporter.line(`==> ${node.fullPath}`);
      continue;
    }
    for (const [field, value] of Object.entries(describeProject(session.client, node))) {
      reporter.line(`  ${field}: ${value}`);
    }
    reporter.line("  ---");
  }
}

export function runGroupsFlow(session: Session, path: string | undefined, maxDepth?: number): void {
  const { reporter, walker } = session;
  const base = walker.rooted(path).split("/").length;
  for (const group of walker.walkGroups(byPath(path ?? walker.root), maxDepth)) {
    const depth = group.fullPath.split("/").length - base;
    reporter.line(`${"  ".repeat(Math.max(depth, 0))}${group.fullPath}`);
  }
}

export function runMembershipFlow(session: Session, username: string): void {
  const { reporter } = session;
  let count = 0;
  for (const line of session.membership.membershipOf(username)) {
    count += 1;
    reporter.line(`- ${line}`);
  }
  if (count === 0) {
    reporter.line(`[skip] ${username} has no group memberships`);
  }
}

export function runCreateFlow(session: Session, path: string): void {
  session.reporter.outcome(createProject(session.client, session.walker, path, { dryRun: session.dryRun }));
}

export function runMirrorFlow(session: Session, projectPath: string, legacyPath: string): void {
  const project = requireProject(session, projectPath);
  session.reporter.line(`==> Mirroring ${legacyPath} to ${project.webUrl}`);
  session.reporter.outcome(writeMirrorHook(project, legacyPath, { dryRun: session.dryRun, runner: session.runner }));
}

export function runBlockFlow(session: Session, projectPath: string, legacyPath: string): void {
  const project = requireProject(session, projectPath);
  session.reporter.line(`==> Blocking pushes to ${legacyPath}`);
  session.reporter.outcome(
    writeRejectPushHook(project, legacyPath, { dryRun: session.dryRun, runner: session.runner })
  );
}

export function runDoctorFlow(reporter: Reporter): void {
  const findings: Finding[] = ["glab", "git", "sshfs", "fusermount"].map((tool): Finding =>
    commandExists(tool)
      ? { severity: "ok", subject: tool, message: "found" }
      : { severity: "warning", subject: tool, message: "missing" }
  );
  reporter.outcome({ findings, changes: [] });
}

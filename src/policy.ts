import { PolicyConfigError, RemoteNotFoundError, UserNotFoundError } from "./errors.js";
import { ACCESS, type Attributes, type GitlabClient, type Integration, type ProtectedBranch } from "./gitlab/client.js";
import type { ProjectNode } from "./hierarchy.js";
import { emptyOutcome, mergeOutcomes, type Change, type ChangeAction, type Finding, type Outcome } from "./log.js";

export const MERGE_SETTINGS = {
  merge_method: "merge",
  only_allow_merge_if_all_discussions_are_resolved: true,
  only_allow_merge_if_pipeline_succeeds: true,
  remove_source_branch_after_merge: true
} as const satisfies Record<string, unknown>;

export const APPROVAL_SETTINGS = {
  merge_requests_author_approval: false,
  merge_requests_disable_committers_approval: true,
  require_password_to_approve: false,
  reset_approvals_on_push: true
} as const satisfies Record<string, unknown>;

export const DEFAULT_APPROVAL_RULE = "Default";

export const SLACK_INTEGRATION = "slack";

export const SLACK_EVENTS = {
  branches_to_be_notified: "all",
  notify_only_broken_pipelines: false,
  push_events: false,
  issues_events: false,
  confidential_issues_events: false,
  merge_requests_events: true,
  note_events: false,
  confidential_note_events: false,
  tag_push_events: false,
  pipeline_events: false,
  wiki_page_events: false,
  deployment_events: false,
  job_events: true,
  commit_events: false
} as const;

export type PolicyContext = {
  client: GitlabClient;
  dryRun: boolean;
  primaryBranch: string;
  users: string[];
  slackWebhook?: string;
};

export type Mismatch = {
  key: string;
  expected: unknown;
  actual: unknown;
};

function show(value: unknown): string {
  return value === undefined ? "undefined" : JSON.stringify(value);
}

function finding(project: ProjectNode, severity: Finding["severity"], message: string): Finding {
  return { severity, message, subject: project.pathWithNamespace };
}

function change(ctx: PolicyContext, project: ProjectNode, action: ChangeAction, description: string): Change {
  return { action, subject: project.pathWithNamespace, description, dryRun: ctx.dryRun };
}

export function diffAttributes(
  expected: Readonly<Record<string, unknown>>,
  actual: Attributes,
  resource: string
): Mismatch[] {
  const mismatches: Mismatch[] = [];
  for (const [key, value] of Object.entries(expected)) {
    if (!Object.hasOwn(actual, key)) {
      throw new PolicyConfigError(`Expected attribute '${key}' does not exist on ${resource}`);
    }
    if (actual[key] !== value) {
      mismatches.push({ key, expected: value, actual: actual[key] });
    }
  }
  return mismatches;
}

function mismatchFindings(project: ProjectNode, mismatches: Mismatch[], label: string): Finding[] {
  if (mismatches.length === 0) {
    return [finding(project, "ok", `${label} ok`)];
  }
  return mismatches.map((m) =>
    finding(project, "error", `expecting '${m.key}' as ${show(m.expected)}, got ${show(m.actual)}`)
  );
}

function toPatch(mismatches: Mismatch[]): Record<string, unknown> {
  return Object.fromEntries(mismatches.map((m) => [m.key, m.expected]));
}

function hasErrors(findings: Finding[]): boolean {
  return findings.some((f) => f.severity === "error");
}

function evaluateProtection(ctx: PolicyContext, project: ProjectNode, rule: ProtectedBranch): Finding[] {
  const findings: Finding[] = [];
  for (const access of rule.merge_access_levels) {
    if (access.access_level !== ACCESS.developer) {
      findings.push(
        finding(
          project,
          "error",
          `${ctx.primaryBranch} merge access set to '${access.access_level_description}', expecting 'Developers + Maintainers'`
        )
      );
    }
  }
  for (const access of rule.push_access_levels) {
    if (access.access_level !== ACCESS.none) {
      findings.push(
        finding(
          project,
          "error",
          `${ctx.primaryBranch} push access set to '${access.access_level_description}', expecting 'No one'`
        )
      );
    }
  }
  if (findings.length === 0) {
    findings.push(finding(project, "ok", `${ctx.primaryBranch} branch protection ok`));
  }
  return findings;
}

function primaryRule(ctx: PolicyContext, project: ProjectNode): ProtectedBranch | undefined {
  return ctx.client.listProtectedBranches(project.id).find((branch) => branch.name === ctx.primaryBranch);
}

export function checkMasterProtected(ctx: PolicyContext, project: ProjectNode): Finding[] {
  const rule = primaryRule(ctx, project);
  if (!rule) {
    return [finding(project, "ok", `no ${ctx.primaryBranch} protection rule to evaluate`)];
  }
  return evaluateProtection(ctx, project, rule);
}

export function setMasterProtected(ctx: PolicyContext, project: ProjectNode): Outcome {
  const outcome = emptyOutcome();
  const rule = primaryRule(ctx, project);
  if (rule) {
    // A failing rule is replaced below; only a passing one is reported.
    const evaluation = evaluateProtection(ctx, project, rule);
    if (!hasErrors(evaluation)) {
      outcome.findings.push(...evaluation);
      return outcome;
    }
    outcome.changes.push(change(ctx, project, "remove", `${ctx.primaryBranch} branch protection`));
    if (!ctx.dryRun) {
      ctx.client.unprotectBranch(project.id, ctx.primaryBranch);
    }
  }

  outcome.changes.push(
    change(
      ctx,
      project,
      "create",
      `${ctx.primaryBranch} branch protection to push: 'No one', merge: 'Developers + Maintainers'`
    )
  );
  if (!ctx.dryRun) {
    ctx.client.protectBranch(project.id, {
      name: ctx.primaryBranch,
      push_access_level: ACCESS.none,
      merge_access_level: ACCESS.developer
    });
  }
  return outcome;
}

export function checkMergeRequestApprovals(ctx: PolicyContext, project: ProjectNode): Finding[] {
  const findings = [
    ...mismatchFindings(project, diffAttributes(MERGE_SETTINGS, project.attributes, "project"), "merge settings"),
    ...mismatchFindings(
      project,
      diffAttributes(APPROVAL_SETTINGS, ctx.client.getApprovalSettings(project.id), "approval settings"),
      "approval settings"
    )
  ];

  const rules = ctx.client.listApprovalRules(project.id);
  if (rules.length === 0) {
    findings.push(finding(project, "error", "no approval rules"));
  }
  for (const rule of rules) {
    if (rule.approvals_required === 0) {
      findings.push(finding(project, "error", `approval rule '${rule.name}' requires zero approvals`));
    } else {
      findings.push(finding(project, "ok", `approval rule '${rule.name}' ok`));
    }
  }
  return findings;
}

export function resolveUserIds(client: GitlabClient, users: string[]): number[] {
  return users.map((term) => {
    const match = client
      .searchUsers(term)
      .find((user) => user.username === term || user.email === term || user.public_email === term);
    if (!match) {
      throw new UserNotFoundError(`Cannot find user '${term}'`);
    }
    return match.id;
  });
}

export function setMergeRequestApprovals(ctx: PolicyContext, project: ProjectNode): Outcome {
  const outcome = emptyOutcome();

  const projectPatch = toPatch(diffAttributes(MERGE_SETTINGS, project.attributes, "project"));
  if (Object.keys(projectPatch).length > 0) {
    outcome.changes.push(change(ctx, project, "update", `merge attributes ${JSON.stringify(projectPatch)}`));
    if (!ctx.dryRun) {
      ctx.client.updateProject(project.id, projectPatch);
    }
  }

  const approvalPatch = toPatch(
    diffAttributes(APPROVAL_SETTINGS, ctx.client.getApprovalSettings(project.id), "approval settings")
  );
  if (Object.keys(approvalPatch).length > 0) {
    outcome.changes.push(change(ctx, project, "update", `approval settings ${JSON.stringify(approvalPatch)}`));
    if (!ctx.dryRun) {
      ctx.client.updateApprovalSettings(project.id, approvalPatch);
    }
  }

  const rule = ctx.client.listApprovalRules(project.id).find((r) => r.name === DEFAULT_APPROVAL_RULE);
  if (rule && rule.approvals_required > 0) {
    return outcome;
  }

  if (rule) {
    outcome.changes.push(
      change(ctx, project, "update", `'${DEFAULT_APPROVAL_RULE}' approval rule requires 1 approval`)
    );
    if (!ctx.dryRun) {
      ctx.client.updateApprovalRule(project.id, rule.id, { approvals_required: 1 });
    }
    return outcome;
  }

  const userIds = resolveUserIds(ctx.client, ctx.users);
  outcome.changes.push(
    change(ctx, project, "create", `'${DEFAULT_APPROVAL_RULE}' approval rule for ${ctx.users.length} user(s)`)
  );
  if (!ctx.dryRun) {
    ctx.client.createApprovalRule(project.id, {
      name: DEFAULT_APPROVAL_RULE,
      approvals_required: 1,
      rule_type: "regular",
      user_ids: userIds
    });
  }
  return outcome;
}

function findIntegration(ctx: PolicyContext, project: ProjectNode): Integration | undefined {
  try {
    return ctx.client.getIntegration(project.id, SLACK_INTEGRATION);
  } catch (error) {
    if (error instanceof RemoteNotFoundError) {
      return undefined;
    }
    throw error;
  }
}

function configuredWebhook(integration: Integration): unknown {
  return integration.properties["webhook"];
}

export function checkSlackNotifications(ctx: PolicyContext, project: ProjectNode): Finding[] {
  if (!ctx.slackWebhook) {
    return [finding(project, "ok", "no Slack webhook configured")];
  }

  const integration = findIntegration(ctx, project);
  if (!integration || !integration.active) {
    return [finding(project, "error", "Slack integration not found")];
  }

  const actual = configuredWebhook(integration);
  if (actual === ctx.slackWebhook) {
    return [finding(project, "ok", "Slack notification matches config")];
  }
  return [
    finding(
      project,
      "warning",
      `Slack notification mismatch. Expected ${show(ctx.slackWebhook)}, got ${show(actual)}`
    )
  ];
}

export function setSlackNotifications(ctx: PolicyContext, project: ProjectNode): Outcome {
  const outcome = emptyOutcome();
  if (!ctx.slackWebhook) {
    return outcome;
  }

  const integration = findIntegration(ctx, project);
  if (integration?.active && configuredWebhook(integration) === ctx.slackWebhook) {
    return outcome;
  }

  outcome.changes.push(
    change(ctx, project, integration?.active ? "update" : "create", "Slack integration for merge requests")
  );
  if (!ctx.dryRun) {
    ctx.client.updateIntegration(project.id, SLACK_INTEGRATION, { webhook: ctx.slackWebhook, ...SLACK_EVENTS });
  }
  return outcome;
}

export function checkProject(ctx: PolicyContext, project: ProjectNode): Finding[] {
  return [
    ...checkMasterProtected(ctx, project),
    ...checkMergeRequestApprovals(ctx, project),
    ...checkSlackNotifications(ctx, project)
  ];
}

export function applyProject(ctx: PolicyContext, project: ProjectNode): Outcome {
  return mergeOutcomes(
    setMasterProtected(ctx, project),
    setMergeRequestApprovals(ctx, project),
    setSlackNotifications(ctx, project)
  );
}

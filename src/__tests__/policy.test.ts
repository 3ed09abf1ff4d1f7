import { beforeEach, describe, expect, it } from "vitest";
import { PolicyConfigError, RemoteOperationError, UserNotFoundError } from "../errors.js";
import { ACCESS, type Integration } from "../gitlab/client.js";
import { HierarchyWalker, type ProjectNode } from "../hierarchy.js";
import {
  APPROVAL_SETTINGS,
  MERGE_SETTINGS,
  SLACK_EVENTS,
  applyProject,
  checkMasterProtected,
  checkMergeRequestApprovals,
  checkProject,
  checkSlackNotifications,
  diffAttributes,
  resolveUserIds,
  setMasterProtected,
  setMergeRequestApprovals,
  setSlackNotifications,
  type PolicyContext
} from "../policy.js";
import { FakeGitlab, sampleTree } from "./fake-gitlab.js";

const WEBHOOK = "https://hooks.slack.test/services/test-hook";

let gitlab: FakeGitlab;
let project: ProjectNode;

function context(overrides: Partial<PolicyContext> = {}): PolicyContext {
  return {
    client: gitlab,
    dryRun: false,
    primaryBranch: "master",
    users: [],
    ...overrides
  };
}

function loadProject(attributes: Record<string, unknown> = {}): ProjectNode {
  const tree = sampleTree();
  gitlab = tree.gitlab;
  gitlab.updateProject(tree.widget.id, attributes);
  gitlab.calls.length = 0;
  const node = new HierarchyWalker(gitlab).parsePath("team-a/widget").project;
  if (!node) {
    throw new Error("widget not found");
  }
  return node;
}

function protect(merge: number, push: number, description = "Maintainers"): void {
  gitlab.protectedBranches.set(project.id, [
    {
      name: "master",
      merge_access_levels: [{ access_level: merge, access_level_description: description }],
      push_access_levels: [{ access_level: push, access_level_description: description }]
    }
  ]);
}

function errors(findings: Array<{ severity: string; message: string }>): string[] {
  return findings.filter((f) => f.severity === "error").map((f) => f.message);
}

beforeEach(() => {
  project = loadProject();
});

describe("diffAttributes", () => {
  it("reports nothing when every attribute matches", () => {
    expect(diffAttributes(MERGE_SETTINGS, { ...MERGE_SETTINGS, extra: 1 }, "project")).toEqual([]);
  });

  it("reports exactly the flipped attribute", () => {
    for (const key of Object.keys(MERGE_SETTINGS)) {
      const actual: Record<string, unknown> = { ...MERGE_SETTINGS, [key]: "flipped" };
      expect(diffAttributes(MERGE_SETTINGS, actual, "project").map((m) => m.key)).toEqual([key]);
    }
  });

  it("treats a missing attribute as a configuration error", () => {
    expect(() => diffAttributes({ no_such_setting: true }, MERGE_SETTINGS, "project")).toThrow(PolicyConfigError);
  });
});

describe("branch protection", () => {
  it("passes when the primary branch has no rule", () => {
    expect(errors(checkMasterProtected(context(), project))).toEqual([]);
  });

  it("passes a developer-merge, no-push rule", () => {
    protect(ACCESS.developer, ACCESS.none);
    const findings = checkMasterProtected(context(), project);
    expect(findings).toEqual([
      { severity: "ok", message: "master branch protection ok", subject: "Framestore/team-a/widget" }
    ]);
  });

  it("reports wrong merge and push levels", () => {
    protect(ACCESS.maintainer, ACCESS.maintainer);
    expect(errors(checkMasterProtected(context(), project))).toEqual([
      "master merge access set to 'Maintainers', expecting 'Developers + Maintainers'",
      "master push access set to 'Maintainers', expecting 'No one'"
    ]);
  });

  it("ignores rules for other branches", () => {
    gitlab.protectedBranches.set(project.id, [
      {
        name: "release",
        merge_access_levels: [{ access_level: ACCESS.maintainer, access_level_description: "Maintainers" }],
        push_access_levels: []
      }
    ]);
    expect(errors(checkMasterProtected(context(), project))).toEqual([]);
  });

  it("creates the rule when none exists", () => {
    const outcome = setMasterProtected(context(), project);

    expect(outcome.changes.map((c) => c.action)).toEqual(["create"]);
    expect(gitlab.calls).toEqual([
      {
        method: "protectBranch",
        args: [project.id, { name: "master", push_access_level: 0, merge_access_level: 30 }]
      }
    ]);
  });

  it("replaces a failing rule", () => {
    protect(ACCESS.maintainer, ACCESS.developer);

    const outcome = setMasterProtected(context(), project);

    expect(outcome.findings).toEqual([]);
    expect(outcome.changes.map((c) => c.action)).toEqual(["remove", "create"]);
    expect(gitlab.calls.map((c) => c.method)).toEqual(["unprotectBranch", "protectBranch"]);
    expect(errors(checkMasterProtected(context(), project))).toEqual([]);
  });

  it("leaves a passing rule alone", () => {
    protect(ACCESS.developer, ACCESS.none);

    const outcome = setMasterProtected(context(), project);

    expect(outcome.changes).toEqual([]);
    expect(gitlab.calls).toEqual([]);
  });

  it("reports but does not mutate in dry-run", () => {
    protect(ACCESS.maintainer, ACCESS.developer);

    const outcome = setMasterProtected(context({ dryRun: true }), project);

    expect(outcome.changes.map((c) => [c.action, c.dryRun])).toEqual([
      ["remove", true],
      ["create", true]
    ]);
    expect(gitlab.calls).toEqual([]);
  });

  it("uses the configured primary branch", () => {
    setMasterProtected(context({ primaryBranch: "main" }), project);
    expect(gitlab.calls[0]?.args[1]).toMatchObject({ name: "main" });
  });
});

describe("merge request approvals", () => {
  beforeEach(() => {
    gitlab.approvalRules.set(project.id, [{ id: 500, name: "Default", approvals_required: 1 }]);
  });

  it("reports no mismatches for a compliant project", () => {
    expect(errors(checkMergeRequestApprovals(context(), project))).toEqual([]);
  });

  it("reports one mismatch per flipped project attribute", () => {
    project = loadProject({ merge_method: "ff" });
    gitlab.approvalRules.set(project.id, [{ id: 500, name: "Default", approvals_required: 1 }]);

    expect(errors(checkMergeRequestApprovals(context(), project))).toEqual([
      `expecting 'merge_method' as "merge", got "ff"`
    ]);
  });

  it("reports a flipped approval setting", () => {
    gitlab.approvalSettings.set(project.id, { ...APPROVAL_SETTINGS, reset_approvals_on_push: false });

    expect(errors(checkMergeRequestApprovals(context(), project))).toEqual([
      "expecting 'reset_approvals_on_push' as true, got false"
    ]);
  });

  it("reports missing rules and zero-approval rules", () => {
    gitlab.approvalRules.set(project.id, []);
    expect(errors(checkMergeRequestApprovals(context(), project))).toEqual(["no approval rules"]);

    gitlab.approvalRules.set(project.id, [{ id: 500, name: "Default", approvals_required: 0 }]);
    expect(errors(checkMergeRequestApprovals(context(), project))).toEqual([
      "approval rule 'Default' requires zero approvals"
    ]);
  });

  it("fails loudly when the approvals resource lacks an expected attribute", () => {
    gitlab.approvalSettings.set(project.id, { reset_approvals_on_push: true });
    expect(() => checkMergeRequestApprovals(context(), project)).toThrow(PolicyConfigError);
  });

  it("makes no remote call when nothing differs", () => {
    const outcome = setMergeRequestApprovals(context(), project);

    expect(outcome.changes).toEqual([]);
    expect(gitlab.calls).toEqual([]);
  });

  it("patches only the differing attributes in one call per resource", () => {
    project = loadProject({ merge_method: "rebase_merge", remove_source_branch_after_merge: false });
    gitlab.approvalRules.set(project.id, [{ id: 500, name: "Default", approvals_required: 2 }]);
    gitlab.approvalSettings.set(project.id, { ...APPROVAL_SETTINGS, merge_requests_author_approval: true });

    setMergeRequestApprovals(context(), project);

    expect(gitlab.calls).toEqual([
      {
        method: "updateProject",
        args: [project.id, { merge_method: "merge", remove_source_branch_after_merge: true }]
      },
      {
        method: "updateApprovalSettings",
        args: [project.id, { merge_requests_author_approval: false }]
      }
    ]);
  });

  it("raises a zero-approval Default rule to one", () => {
    gitlab.approvalRules.set(project.id, [{ id: 500, name: "Default", approvals_required: 0 }]);

    setMergeRequestApprovals(context(), project);

    expect(gitlab.calls).toEqual([{ method: "updateApprovalRule", args: [project.id, 500, { approvals_required: 1 }] }]);
  });

  it("leaves a Default rule with required approvals untouched", () => {
    gitlab.approvalRules.set(project.id, [{ id: 500, name: "Default", approvals_required: 3 }]);

    setMergeRequestApprovals(context(), project);

    expect(gitlab.calls).toEqual([]);
  });

  it("creates the Default rule for the configured users", () => {
    gitlab.approvalRules.set(project.id, [{ id: 501, name: "Security", approvals_required: 1 }]);
    const alice = gitlab.addUser("alice");
    const bob = gitlab.addUser("bobby", "Bob", "bob@studio.test");
    gitlab.addUser("alice2");

    const outcome = setMergeRequestApprovals(context({ users: ["alice", "bob@studio.test"] }), project);

    expect(outcome.changes).toEqual([
      {
        action: "create",
        subject: "Framestore/team-a/widget",
        description: "'Default' approval rule for 2 user(s)",
        dryRun: false
      }
    ]);
    expect(gitlab.calls).toEqual([
      {
        method: "createApprovalRule",
        args: [project.id, { name: "Default", approvals_required: 1, rule_type: "regular", user_ids: [alice.id, bob.id] }]
      }
    ]);
  });

  it("fails when a configured user cannot be found", () => {
    gitlab.approvalRules.set(project.id, []);
    expect(() => setMergeRequestApprovals(context({ users: ["ghost"] }), project)).toThrow(UserNotFoundError);
  });

  it("reports every change but mutates nothing in dry-run", () => {
    project = loadProject({ merge_method: "ff" });
    gitlab.addUser("alice");

    const outcome = setMergeRequestApprovals(context({ dryRun: true, users: ["alice"] }), project);

    expect(outcome.changes.map((c) => [c.action, c.description, c.dryRun])).toEqual([
      ["update", `merge attributes {"merge_method":"merge"}`, true],
      ["create", "'Default' approval rule for 1 user(s)", true]
    ]);
    expect(gitlab.calls).toEqual([]);
  });
});

describe("resolveUserIds", () => {
  it("requires an exact, case-sensitive match", () => {
    gitlab.addUser("Alice");
    expect(() => resolveUserIds(gitlab, ["alice"])).toThrow(UserNotFoundError);
  });
});

describe("slack notifications", () => {
  function integration(value: Integration): void {
    gitlab.integrations.set(`${project.id}/slack`, value);
  }

  it("passes trivially and does nothing without a configured webhook", () => {
    expect(checkSlackNotifications(context(), project)).toEqual([
      { severity: "ok", message: "no Slack webhook configured", subject: "Framestore/team-a/widget" }
    ]);
    expect(setSlackNotifications(context(), project)).toEqual({ findings: [], changes: [] });
    expect(gitlab.reads.filter((c) => c.method === "getIntegration")).toEqual([]);
  });

  it("reports a missing integration as an error", () => {
    expect(checkSlackNotifications(context({ slackWebhook: WEBHOOK }), project)).toEqual([
      { severity: "error", message: "Slack integration not found", subject: "Framestore/team-a/widget" }
    ]);
  });

  it("reports an inactive integration as an error", () => {
    integration({ active: false, properties: { webhook: WEBHOOK } });
    expect(errors(checkSlackNotifications(context({ slackWebhook: WEBHOOK }), project))).toEqual([
      "Slack integration not found"
    ]);
  });

  it("passes a matching webhook", () => {
    integration({ active: true, properties: { webhook: WEBHOOK } });
    expect(checkSlackNotifications(context({ slackWebhook: WEBHOOK }), project)[0]?.severity).toBe("ok");
  });

  it("warns on a mismatching webhook with both values", () => {
    integration({ active: true, properties: { webhook: "https://hooks.slack.test/old" } });
    expect(checkSlackNotifications(context({ slackWebhook: WEBHOOK }), project)).toEqual([
      {
        severity: "warning",
        message: `Slack notification mismatch. Expected "${WEBHOOK}", got "https://hooks.slack.test/old"`,
        subject: "Framestore/team-a/widget"
      }
    ]);
  });

  it("creates the integration with merge request and job events only", () => {
    const outcome = setSlackNotifications(context({ slackWebhook: WEBHOOK }), project);

    expect(outcome.changes.map((c) => c.action)).toEqual(["create"]);
    expect(gitlab.calls).toEqual([
      { method: "updateIntegration", args: [project.id, "slack", { webhook: WEBHOOK, ...SLACK_EVENTS }] }
    ]);
    const enabled = Object.entries(SLACK_EVENTS)
      .filter(([key, value]) => key.endsWith("_events") && value === true)
      .map(([key]) => key);
    expect(enabled).toEqual(["merge_requests_events", "job_events"]);
  });

  it("updates a mismatching integration", () => {
    integration({ active: true, properties: { webhook: "https://hooks.slack.test/old" } });
    const outcome = setSlackNotifications(context({ slackWebhook: WEBHOOK }), project);
    expect(outcome.changes.map((c) => c.action)).toEqual(["update"]);
  });

  it("leaves a matching integration alone", () => {
    integration({ active: true, properties: { webhook: WEBHOOK } });
    setSlackNotifications(context({ slackWebhook: WEBHOOK }), project);
    expect(gitlab.calls).toEqual([]);
  });

  it("propagates remote errors other than not-found", () => {
    gitlab.getIntegration = () => {
      throw new RemoteOperationError("projects/3/integrations/slack", "500 Internal Server Error");
    };
    expect(() => checkSlackNotifications(context({ slackWebhook: WEBHOOK }), project)).toThrow(
      "500 Internal Server Error"
    );
  });
});

describe("whole project", () => {
  it("converges a drifted project so the check passes", () => {
    project = loadProject({ merge_method: "ff", only_allow_merge_if_pipeline_succeeds: false });
    protect(ACCESS.maintainer, ACCESS.maintainer);
    gitlab.addUser("alice");
    const ctx = context({ users: ["alice"], slackWebhook: WEBHOOK });

    expect(errors(checkProject(ctx, project))).toHaveLength(6);

    applyProject(ctx, project);
    const refreshed = new HierarchyWalker(gitlab).parsePath("team-a/widget").project;
    if (!refreshed) {
      throw new Error("widget not found");
    }

    expect(errors(checkProject(ctx, refreshed))).toEqual([]);
  });
});

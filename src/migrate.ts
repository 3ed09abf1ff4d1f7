import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { errorMessage } from "./errors.js";
import type { ProjectNode } from "./hierarchy.js";
import { emptyOutcome, type Outcome } from "./log.js";
import { runCommand, type CommandRunner } from "./runner.js";

const THIS_FILE = fileURLToPath(import.meta.url);
export const TEMPLATE_DIR = path.resolve(path.dirname(THIS_FILE), "..", "templates");

const PUSH_URL_PLACEHOLDER = "__PUSH_URL__";

export type HookKind = "mirror" | "reject";

const HOOKS: Record<HookKind, { file: string; template: string }> = {
  mirror: { file: "post-update", template: "post-update.sh" },
  reject: { file: "pre-receive", template: "pre-receive.sh" }
};

export type MigrateOptions = {
  dryRun: boolean;
  runner?: CommandRunner;
  templateDir?: string;
};

export function hookFileName(kind: HookKind): string {
  return HOOKS[kind].file;
}

export function renderHook(kind: HookKind, pushUrl: string, templateDir = TEMPLATE_DIR): string {
  const template = fs.readFileSync(path.join(templateDir, HOOKS[kind].template), "utf8");
  return template.replaceAll(PUSH_URL_PLACEHOLDER, pushUrl);
}

// host:path is served over sshfs; anything else is already on local disk.
export function isRemoteLegacyPath(legacyPath: string): boolean {
  return legacyPath.includes(":");
}

function releaseMount(mountPoint: string, runner: CommandRunner): void {
  runner(["fusermount", "-u", mountPoint]);
  fs.rmdirSync(mountPoint);
}

// The body's error wins; a failed release rides along as its cause.
function releaseAfterFailure(mountPoint: string, runner: CommandRunner, failure: unknown): unknown {
  try {
    releaseMount(mountPoint, runner);
    return failure;
  } catch (releaseError) {
    if (failure instanceof Error && failure.cause === undefined) {
      failure.cause = releaseError;
      return failure;
    }
    return new AggregateError([failure, releaseError], errorMessage(failure));
  }
}

export function withLegacyMount<T>(legacyPath: string, runner: CommandRunner, fn: (repoRoot: string) => T): T {
  if (!isRemoteLegacyPath(legacyPath)) {
    return fn(legacyPath);
  }

  const mountPoint = fs.mkdtempSync(path.join(os.tmpdir(), "glgov-mount-"));
  try {
    runner(["sshfs", legacyPath, mountPoint]);
  } catch (error) {
    fs.rmdirSync(mountPoint);
    throw error;
  }

  let result: T;
  try {
    result = fn(mountPoint);
  } catch (error) {
    throw releaseAfterFailure(mountPoint, runner, error);
  }
  // A mount point that did not unmount is left in place.
  releaseMount(mountPoint, runner);
  return result;
}

export function installHook(
  kind: HookKind,
  pushUrl: string,
  repoRoot: string,
  opts: MigrateOptions & { subject?: string }
): Outcome {
  const outcome = emptyOutcome();
  const file = hookFileName(kind);
  const hookPath = path.join(repoRoot, "hooks", file);
  const subject = opts.subject ?? repoRoot;

  if (fs.existsSync(hookPath)) {
    outcome.findings.push({
      severity: "warning",
      subject,
      message: `${file} hook already exists for ${pushUrl}. Will not overwrite`
    });
    return outcome;
  }

  const content = renderHook(kind, pushUrl, opts.templateDir);
  outcome.changes.push({ action: "write", subject, description: `${file} hook for ${pushUrl}`, dryRun: opts.dryRun });
  if (!opts.dryRun) {
    fs.writeFileSync(hookPath, content, { flag: "wx", mode: 0o755 });
    fs.chmodSync(hookPath, 0o755);
  }
  return outcome;
}

export function writeMirrorHook(project: ProjectNode, legacyPath: string, opts: MigrateOptions): Outcome {
  const runner = opts.runner ?? runCommand;
  return withLegacyMount(legacyPath, runner, (repoRoot) => {
    const outcome = installHook("mirror", project.sshUrl, repoRoot, { ...opts, subject: legacyPath });
    outcome.changes.push({
      action: "push",
      subject: legacyPath,
      description: `mirror to ${project.webUrl}`,
      dryRun: opts.dryRun
    });
    if (!opts.dryRun) {
      runner(["git", "push", "-f", "--mirror", project.sshUrl], { cwd: repoRoot });
    }
    return outcome;
  });
}

export function writeRejectPushHook(project: ProjectNode, legacyPath: string, opts: MigrateOptions): Outcome {
  const runner = opts.runner ?? runCommand;
  return withLegacyMount(legacyPath, runner, (repoRoot) =>
    installHook("reject", project.sshUrl, repoRoot, { ...opts, subject: legacyPath })
  );
}

#!/usr/bin/env node

import { Command } from "commander";
import {
  createSession,
  runApplyFlow,
  runBlockFlow,
  runCheckFlow,
  runCreateFlow,
  runDoctorFlow,
  runGroupsFlow,
  runMembershipFlow,
  runMirrorFlow,
  runProjectsFlow,
  type Session
} from "./app.js";
import { Reporter, type LogMode } from "./log.js";
import { parseDepth, parseLegacyPath } from "./utils/flags.js";

type GlobalOptions = {
  plain: boolean;
  dryRun: boolean;
  config?: string;
  hostname?: string;
};

const program = new Command();

program
  .name("glgov")
  .description("GitLab namespace governance CLI")
  .version("0.1.0")
  .option("--plain", "disable colored output", false)
  .option("-n, --dry-run", "report intended changes without applying them", false)
  .option("-c, --config <file>", "YAML config (users, slack webhook, root group)")
  .option("--hostname <host>", "GitLab hostname passed to glab");

function logMode(): LogMode {
  return program.opts<GlobalOptions>().plain ? "plain" : "color";
}

function session(): Session {
  const opts = program.opts<GlobalOptions>();
  return createSession({
    configFile: opts.config,
    hostname: opts.hostname,
    dryRun: opts.dryRun,
    mode: logMode()
  });
}

program
  .command("check")
  .description("Report policy drift for every project under a group, or one project")
  .argument("<path>", "group or group/project path (root group is implied)")
  .action((path: string) => {
    runCheckFlow(session(), path);
  });

program
  .command("apply")
  .description("Converge branch protection, approvals and Slack integration")
  .argument("<path>", "group or group/project path (root group is implied)")
  .action((path: string) => {
    runApplyFlow(session(), path);
  });

program
  .command("projects")
  .description("List project details under a group")
  .argument("<path>", "group or group/project path")
  .action((path: string) => {
    runProjectsFlow(session(), path);
  });

program
  .command("groups")
  .description("List groups recursively")
  .argument("[path]", "group path")
  .option("-d, --depth <n>", "levels of subgroups to descend", parseDepth)
  .action((path: string | undefined, opts: { depth?: number }) => {
    runGroupsFlow(session(), path, opts.depth);
  });

program
  .command("membership")
  .description("Show the users groups a user belongs to")
  .argument("<username>", "GitLab username")
  .action((username: string) => {
    runMembershipFlow(session(), username);
  });

program
  .command("create")
  .description("Create a project (lowercase and dashes only)")
  .argument("<path>", "group/project path")
  .action((path: string) => {
    runCreateFlow(session(), path);
  });

program
  .command("mirror")
  .description("Install a post-update mirror hook in a legacy repo and push a full mirror")
  .argument("<project>", "group/project path of the new project")
  .argument("<legacy-path>", "legacy repo path, local or host:/path", parseLegacyPath)
  .action((project: string, legacyPath: string) => {
    runMirrorFlow(session(), project, legacyPath);
  });

program
  .command("block")
  .description("Install a pre-receive hook rejecting pushes to a legacy repo")
  .argument("<project>", "group/project path of the new project")
  .argument("<legacy-path>", "legacy repo path, local or host:/path", parseLegacyPath)
  .action((project: string, legacyPath: string) => {
    runBlockFlow(session(), project, legacyPath);
  });

program
  .command("doctor")
  .description("Quick environment checks for glab/git/sshfs")
  .action(() => {
    runDoctorFlow(new Reporter(logMode()));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exit(1);
});

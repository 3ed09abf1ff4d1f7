import fs from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { DEFAULT_ROOT_GROUP } from "./paths.js";

const configSchema = z
  .object({
    root_group: z.string().min(1).default(DEFAULT_ROOT_GROUP),
    hostname: z.string().min(1).optional(),
    primary_branch: z.string().min(1).default("master"),
    users: z.array(z.string().min(1)).default([]),
    slack: z
      .object({
        webhook: z.string().url().optional()
      })
      .nullable()
      .optional()
  })
  .strict();

export type GovernanceConfig = {
  rootGroup: string;
  hostname?: string;
  primaryBranch: string;
  users: string[];
  slackWebhook?: string;
};

export function parseConfig(raw: string, source: string): GovernanceConfig {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const result = configSchema.safeParse(doc ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join(".")}'` : "";
    throw new ConfigError(`Invalid config in ${source}${where}: ${issue?.message ?? "validation failed"}`, {
      cause: result.error
    });
  }

  const parsed = result.data;
  const config: GovernanceConfig = {
    rootGroup: parsed.root_group,
    primaryBranch: parsed.primary_branch,
    users: parsed.users
  };
  if (parsed.hostname) {
    config.hostname = parsed.hostname;
  }
  if (parsed.slack?.webhook) {
    config.slackWebhook = parsed.slack.webhook;
  }
  return config;
}

export function loadConfig(filePath?: string): GovernanceConfig {
  if (!filePath) {
    return parseConfig("", "defaults");
  }
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return parseConfig(raw, filePath);
}

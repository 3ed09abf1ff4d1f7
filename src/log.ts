import chalk from "chalk";

export type LogMode = "color" | "plain";

export type Severity = "ok" | "warning" | "error";

export type Finding = {
  severity: Severity;
  message: string;
  subject: string;
};

export type ChangeAction = "create" | "update" | "remove" | "write" | "push";

export type Change = {
  action: ChangeAction;
  subject: string;
  description: string;
  dryRun: boolean;
};

export type Outcome = {
  findings: Finding[];
  changes: Change[];
};

export const emptyOutcome = (): Outcome => ({ findings: [], changes: [] });

export function mergeOutcomes(...outcomes: Outcome[]): Outcome {
  return {
    findings: outcomes.flatMap((o) => o.findings),
    changes: outcomes.flatMap((o) => o.changes)
  };
}

function isSeparator(line: string): boolean {
  return /^\s*=+>/.test(line) || /^\s*-{3,}\s*$/.test(line);
}

export function styleLine(input: string, mode: LogMode): string {
  if (mode === "plain") {
    return input;
  }

  const line = input.trimEnd();

  if (!line) {
    return input;
  }

  if (isSeparator(line)) {
    return chalk.cyanBright(line);
  }

  if (/^Summary:/i.test(line)) {
    return chalk.bold.magenta(line);
  }

  if (/^\[error\]/i.test(line) || /^error:/i.test(line)) {
    return chalk.bold.red(line);
  }

  if (/^\[warn\]/i.test(line) || /^warn:/i.test(line)) {
    return chalk.yellowBright(line);
  }

  if (/^\[skip\]/i.test(line)) {
    return chalk.hex("#FFB020")(line);
  }

  if (/^\[dry-run\]/i.test(line)) {
    return chalk.cyan(line);
  }

  if (/^==>\s+/i.test(line)) {
    return chalk.bold.cyanBright(line);
  }

  if (/^\[ok\]/i.test(line) || /^Done\.?$/i.test(line)) {
    return chalk.green(line);
  }

  if (/^(created|updated|removed|written|pushed):/i.test(line)) {
    return chalk.greenBright(line);
  }

  return line;
}

const SEVERITY_TAG: Record<Severity, string> = {
  ok: "[ok]",
  warning: "[warn]",
  error: "[error]"
};

export function formatFinding(finding: Finding): string {
  return `${SEVERITY_TAG[finding.severity]} ${finding.subject}: ${finding.message}`;
}

const DONE: Record<ChangeAction, string> = {
  create: "created",
  update: "updated",
  remove: "removed",
  write: "written",
  push: "pushed"
};

export function formatChange(change: Change): string {
  return change.dryRun
    ? `[dry-run] ${change.action}: ${change.subject}: ${change.description}`
    : `${DONE[change.action]}: ${change.subject}: ${change.description}`;
}

export type Tally = {
  ok: number;
  warning: number;
  error: number;
  changes: number;
};

export class Reporter {
  readonly tally: Tally = { ok: 0, warning: 0, error: 0, changes: 0 };

  constructor(
    readonly mode: LogMode,
    private readonly write: (line: string) => void = (line) => console.log(line),
    private readonly writeError: (line: string) => void = (line) => console.error(line)
  ) {}

  line(msg: string): void {
    this.write(styleLine(msg, this.mode));
  }

  error(msg: string): void {
    this.writeError(styleLine(`[error] ${msg}`, this.mode));
  }

  outcome(outcome: Outcome): void {
    for (const finding of outcome.findings) {
      this.finding(finding);
    }
    for (const change of outcome.changes) {
      this.tally.changes += 1;
      this.line(formatChange(change));
    }
  }

  finding(finding: Finding): void {
    this.tally[finding.severity] += 1;
    this.line(formatFinding(finding));
  }
}

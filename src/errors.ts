export class GovernanceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidPathError extends GovernanceError {}

export class InvalidProjectNameError extends GovernanceError {}

export class GroupNotFoundError extends GovernanceError {}

export class ProjectNotFoundError extends GovernanceError {}

export class UserNotFoundError extends GovernanceError {}

// An expectation names an attribute the remote resource does not carry.
export class PolicyConfigError extends GovernanceError {}

export class UnknownAccessLevelError extends GovernanceError {}

export class ConfigError extends GovernanceError {}

export class CommandError extends GovernanceError {
  readonly command: string[];
  readonly status: number;
  readonly stderr: string;

  constructor(command: string[], status: number, stderr: string) {
    super(stderr.trim() || `${command[0] ?? "command"} exited with status ${status}`);
    this.command = command;
    this.status = status;
    this.stderr = stderr;
  }
}

export class RemoteOperationError extends GovernanceError {
  readonly endpoint: string;

  constructor(endpoint: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.endpoint = endpoint;
  }
}

export class RemoteNotFoundError extends RemoteOperationError {}

export function errorMessage(error: unknown): string {
  return (error instanceof Error ? error.message : String(error)).trim();
}

import { InvalidPathError, InvalidProjectNameError } from "./errors.js";

export const DEFAULT_ROOT_GROUP = "Framestore";

export type NamespacePath = readonly string[];

export type ResolvedPath = {
  groupPath?: string;
  name: string;
};

const PROJECT_PATH = /^(?:([\w/]+)\/)?([\w-]+)(?:\.git)?$/;
const NAMESPACE_SEGMENT = /^[\w.-]+$/;

export function resolvePath(raw: string): ResolvedPath {
  const match = PROJECT_PATH.exec(raw);
  if (!match || !match[2]) {
    throw new InvalidPathError(`Invalid project path '${raw}' (expected [GROUP/...]NAME[.git])`);
  }
  return match[1] ? { groupPath: match[1], name: match[2] } : { name: match[2] };
}

export function splitNamespace(raw: string): NamespacePath {
  const trimmed = raw.replace(/\.git$/, "");
  const segments = trimmed.split("/");
  for (const segment of segments) {
    if (!NAMESPACE_SEGMENT.test(segment)) {
      throw new InvalidPathError(`Invalid namespace path '${raw}'`);
    }
  }
  return Object.freeze(segments);
}

export function rootedSegments(groupPath?: string, root = DEFAULT_ROOT_GROUP): NamespacePath {
  const segments = groupPath ? [...splitNamespace(groupPath)] : [root];
  if (segments[0]?.toLowerCase() !== root.toLowerCase()) {
    segments.unshift(root);
  }
  return Object.freeze(segments);
}

export function rootedPath(groupPath?: string, root = DEFAULT_ROOT_GROUP): string {
  return rootedSegments(groupPath, root).join("/");
}

export function parentPath(path: NamespacePath): { parent: string; leaf: string } {
  const leaf = path[path.length - 1];
  if (path.length < 2 || !leaf) {
    throw new InvalidPathError(`Path '${path.join("/")}' has no parent group`);
  }
  return { parent: path.slice(0, -1).join("/"), leaf };
}

export function validateProjectName(name: string): void {
  if (!/^[a-z-]+$/.test(name)) {
    throw new InvalidProjectNameError(`${name} needs to be lowercase and dashes only`);
  }
}

import { UnknownAccessLevelError } from "./errors.js";
import { ACCESS, type GitlabClient } from "./gitlab/client.js";
import { byPath, type GroupNode, type HierarchyWalker } from "./hierarchy.js";

export const USERS_GROUP = "users";

const ACCESS_LABELS: ReadonlyMap<number, string> = new Map(
  Object.entries(ACCESS).map(([label, level]) => [level, label])
);

export function accessLabel(level: number): string {
  const label = ACCESS_LABELS.get(level);
  if (label === undefined) {
    throw new UnknownAccessLevelError(`Unknown access level ${level}`);
  }
  return label;
}

type MemberEntry = { username: string; accessLevel: number };

// Point-in-time snapshot of the users subtree; built on first lookup and
// kept for the life of the instance.
export class MembershipIndex {
  private cache?: Map<GroupNode, MemberEntry[]>;

  constructor(
    private readonly client: GitlabClient,
    private readonly walker: HierarchyWalker
  ) {}

  private build(): Map<GroupNode, MemberEntry[]> {
    const cache = new Map<GroupNode, MemberEntry[]>();
    for (const group of this.walker.walkGroups(byPath(USERS_GROUP))) {
      cache.set(
        group,
        this.client.listGroupMembers(group.id).map((m) => ({ username: m.username, accessLevel: m.access_level }))
      );
    }
    return cache;
  }

  *membershipOf(username: string): Generator<string> {
    this.cache ??= this.build();
    for (const [group, members] of this.cache) {
      const entry = members.find((m) => m.username === username);
      if (entry && entry.accessLevel !== ACCESS.none) {
        yield `${group.name} (${accessLabel(entry.accessLevel)})`;
      }
    }
  }
}

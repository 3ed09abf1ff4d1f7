import { GroupNotFoundError, ProjectNotFoundError, RemoteNotFoundError } from "./errors.js";
import type { Attributes, GitlabClient, RemoteGroup, RemoteProject } from "./gitlab/client.js";
import { DEFAULT_ROOT_GROUP, parentPath, rootedPath, rootedSegments } from "./paths.js";

export type GroupNode = {
  readonly kind: "group";
  readonly id: number;
  readonly name: string;
  readonly fullPath: string;
  readonly parentId: number | null;
  subgroupIds?: number[];
  projectEntries?: Array<{ id: number; path: string }>;
};

export type ProjectNode = {
  readonly kind: "project";
  readonly id: number;
  readonly name: string;
  readonly path: string;
  readonly pathWithNamespace: string;
  readonly description: string;
  readonly creatorId: number;
  readonly lastActivityAt: string;
  readonly webUrl: string;
  readonly sshUrl: string;
  readonly defaultBranch: string | null;
  readonly group: GroupNode;
  readonly attributes: Attributes;
};

export type GroupRef =
  | { kind: "path"; path: string }
  | { kind: "id"; id: number }
  | { kind: "node"; node: GroupNode };

export const byPath = (path: string): GroupRef => ({ kind: "path", path });
export const byId = (id: number): GroupRef => ({ kind: "id", id });
export const byNode = (node: GroupNode): GroupRef => ({ kind: "node", node });

export type ParsedPath = {
  group: GroupNode;
  project?: ProjectNode;
};

// Walks assume the remote hierarchy is a finite tree; cycles are not detected.
export class HierarchyWalker {
  readonly root: string;
  private readonly byGroupId = new Map<number, GroupNode>();
  private readonly byGroupPath = new Map<string, GroupNode>();

  constructor(
    private readonly client: GitlabClient,
    opts: { root?: string } = {}
  ) {
    this.root = opts.root ?? DEFAULT_ROOT_GROUP;
  }

  rooted(path?: string): string {
    return rootedPath(path, this.root);
  }

  resolveGroup(ref: GroupRef): GroupNode {
    switch (ref.kind) {
      case "node":
        return ref.node;
      case "id": {
        const cached = this.byGroupId.get(ref.id);
        return cached ?? this.fetchGroup(ref.id, `#${ref.id}`);
      }
      case "path": {
        const path = this.rooted(ref.path);
        const cached = this.byGroupPath.get(path.toLowerCase());
        return cached ?? this.fetchGroup(path, ref.path);
      }
    }
  }

  private fetchGroup(key: number | string, label: string): GroupNode {
    let remote: RemoteGroup;
    try {
      remote = this.client.getGroup(key);
    } catch (error) {
      if (error instanceof RemoteNotFoundError) {
        throw new GroupNotFoundError(`Cannot find group '${label}'`, { cause: error });
      }
      throw error;
    }
    const node: GroupNode = {
      kind: "group",
      id: remote.id,
      name: remote.name,
      fullPath: remote.full_path,
      parentId: remote.parent_id
    };
    this.byGroupId.set(node.id, node);
    this.byGroupPath.set(node.fullPath.toLowerCase(), node);
    return node;
  }

  subgroupsOf(group: GroupNode): GroupNode[] {
    if (!group.subgroupIds) {
      const subgroups = this.client.listSubgroups(group.id);
      group.subgroupIds = subgroups.map((sub) => sub.id);
      for (const sub of subgroups) {
        if (!this.byGroupId.has(sub.id)) {
          const node: GroupNode = {
            kind: "group",
            id: sub.id,
            name: sub.name,
            fullPath: sub.full_path,
            parentId: sub.parent_id
          };
          this.byGroupId.set(node.id, node);
          this.byGroupPath.set(node.fullPath.toLowerCase(), node);
        }
      }
    }
    return group.subgroupIds.map((id) => this.resolveGroup(byId(id)));
  }

  private projectEntriesOf(group: GroupNode): Array<{ id: number; path: string }> {
    if (!group.projectEntries) {
      group.projectEntries = this.client.listGroupProjects(group.id).map((p) => ({ id: p.id, path: p.path }));
    }
    return group.projectEntries;
  }

  private toProjectNode(remote: RemoteProject, group: GroupNode): ProjectNode {
    return {
      kind: "project",
      id: remote.id,
      name: remote.name,
      path: remote.path,
      pathWithNamespace: remote.path_with_namespace,
      description: remote.description ?? "",
      creatorId: remote.creator_id,
      lastActivityAt: remote.last_activity_at,
      webUrl: remote.web_url,
      sshUrl: remote.ssh_url_to_repo,
      defaultBranch: remote.default_branch,
      group,
      attributes: remote.attributes
    };
  }

  resolveProject(name: string, group: GroupNode): ProjectNode {
    const wanted = name.toLowerCase();
    for (const entry of this.projectEntriesOf(group)) {
      if (entry.path.toLowerCase() === wanted) {
        return this.toProjectNode(this.client.getProject(entry.id), group);
      }
    }
    throw new ProjectNotFoundError(`Cannot find project '${name}' in ${group.fullPath}`);
  }

  parsePath(name: string): ParsedPath {
    try {
      return { group: this.resolveGroup(byPath(name)) };
    } catch (error) {
      if (!(error instanceof GroupNotFoundError)) {
        throw error;
      }
      const { parent, leaf } = parentPath(rootedSegments(name, this.root));
      const group = this.resolveGroup(byPath(parent));
      return { group, project: this.resolveProject(leaf, group) };
    }
  }

  *walkGroups(ref: GroupRef, maxDepth?: number): Generator<GroupNode> {
    if (maxDepth === 0) {
      return;
    }
    yield* this.descend(this.resolveGroup(ref), maxDepth);
  }

  private *descend(group: GroupNode, levels: number | undefined): Generator<GroupNode> {
    yield group;
    if (levels !== undefined && levels <= 0) {
      return;
    }
    for (const sub of this.subgroupsOf(group)) {
      yield* this.descend(sub, levels === undefined ? undefined : levels - 1);
    }
  }

  *walkProjects(name: string, opts: { includeGroups?: boolean } = {}): Generator<GroupNode | ProjectNode> {
    const { group, project } = this.parsePath(name);
    if (project) {
      yield project;
      return;
    }
    yield* this.walkProjectsOf(group, opts.includeGroups ?? false);
  }

  private *walkProjectsOf(group: GroupNode, includeGroups: boolean): Generator<GroupNode | ProjectNode> {
    if (includeGroups) {
      yield group;
    }
    for (const entry of this.projectEntriesOf(group)) {
      yield this.toProjectNode(this.client.getProject(entry.id), group);
    }
    for (const sub of this.subgroupsOf(group)) {
      yield* this.walkProjectsOf(sub, includeGroups);
    }
  }
}

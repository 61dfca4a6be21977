import fs from "fs";
import path from "path";
import { z } from "zod";
import { CoreError } from "./errors";

type Node = { name: string; createdAt: string };
type RepositoryNode = Node;
type WorkspaceNode = Node & { repositories: Map<string, RepositoryNode> };
type NamespaceNode = Node & { workspaces: Map<string, WorkspaceNode> };

const NodeJson = z.object({ name: z.string().min(1), createdAt: z.string() });
const SnapshotJson = z.object({
  namespaces: z.array(
    NodeJson.extend({
      workspaces: z.array(NodeJson.extend({ repositories: z.array(NodeJson) })),
    }),
  ),
});
type Snapshot = z.infer<typeof SnapshotJson>;

export type HierarchyOptions = {
  /** JSON file the tree is loaded from and written back to after every change. */
  file?: string;
};

function node(name: string): Node {
  return { name, createdAt: new Date().toISOString() };
}

function child<T>(children: Map<string, T>, name: string, what: string): T {
  const found = children.get(name);
  if (!found) throw new CoreError("NotFound", `${what} '${name}' does not exist`);
  return found;
}

function addChild<T>(children: Map<string, T>, name: string, value: T, what: string): void {
  if (children.has(name)) throw new CoreError("AlreadyExists", `${what} '${name}' already exists`);
  children.set(name, value);
}

function renameChild<T extends Node>(children: Map<string, T>, from: string, to: string, what: string): void {
  const found = child(children, from, what);
  if (from === to) return;
  if (children.has(to)) throw new CoreError("AlreadyExists", `${what} '${to}' already exists`);
  children.delete(from);
  children.set(to, { ...found, name: to });
}

/**
 * The namespace → workspace → repository ownership tree. Deleting a node
 * deletes everything below it.
 */
export class Hierarchy {
  private namespaces = new Map<string, NamespaceNode>();
  private readonly file?: string;

  constructor(opts: HierarchyOptions = {}) {
    this.file = opts.file;
    if (this.file && fs.existsSync(this.file)) {
      this.restore(this.readSnapshot(this.file));
      console.log(`Loaded ${this.namespaces.size} namespace(s) from ${this.file}`);
    }
  }

  listNamespaces(): string[] {
    return Array.from(this.namespaces.keys());
  }

  createNamespace(namespace: string): void {
    this.mutate(() => addChild(this.namespaces, namespace, { ...node(namespace), workspaces: new Map() }, "Namespace"));
  }

  renameNamespace(from: string, to: string): void {
    this.mutate(() => renameChild(this.namespaces, from, to, "Namespace"));
  }

  deleteNamespace(namespace: string): void {
    this.mutate(() => {
      child(this.namespaces, namespace, "Namespace");
      this.namespaces.delete(namespace);
    });
  }

  listWorkspaces(namespace: string): string[] {
    return Array.from(this.namespace(namespace).workspaces.keys());
  }

  createWorkspace(namespace: string, workspace: string): void {
    this.mutate(() =>
      addChild(this.namespace(namespace).workspaces, workspace, { ...node(workspace), repositories: new Map() }, "Workspace"),
    );
  }

  renameWorkspace(namespace: string, from: string, to: string): void {
    this.mutate(() => renameChild(this.namespace(namespace).workspaces, from, to, "Workspace"));
  }

  deleteWorkspace(namespace: string, workspace: string): void {
    this.mutate(() => {
      const workspaces = this.namespace(namespace).workspaces;
      child(workspaces, workspace, "Workspace");
      workspaces.delete(workspace);
    });
  }

  listRepositories(namespace: string, workspace: string): string[] {
    return Array.from(this.workspace(namespace, workspace).repositories.keys());
  }

  createRepository(namespace: string, workspace: string, repository: string): void {
    this.mutate(() => addChild(this.workspace(namespace, workspace).repositories, repository, node(repository), "Repository"));
  }

  renameRepository(namespace: string, workspace: string, from: string, to: string): void {
    this.mutate(() => renameChild(this.workspace(namespace, workspace).repositories, from, to, "Repository"));
  }

  deleteRepository(namespace: string, workspace: string, repository: string): void {
    this.mutate(() => {
      const repositories = this.workspace(namespace, workspace).repositories;
      child(repositories, repository, "Repository");
      repositories.delete(repository);
    });
  }

  /** Throws NotFound naming the first missing level. */
  assertRepository(namespace: string, workspace: string, repository: string): void {
    child(this.workspace(namespace, workspace).repositories, repository, "Repository");
  }

  /** Creates whichever levels of the path are missing. */
  ensure(namespace: string, workspace: string, repository: string): void {
    this.mutate(() => {
      if (!this.namespaces.has(namespace)) {
        this.namespaces.set(namespace, { ...node(namespace), workspaces: new Map() });
      }
      const workspaces = this.namespace(namespace).workspaces;
      if (!workspaces.has(workspace)) workspaces.set(workspace, { ...node(workspace), repositories: new Map() });
      const repositories = this.workspace(namespace, workspace).repositories;
      if (!repositories.has(repository)) repositories.set(repository, node(repository));
    });
  }

  toJSON(): Snapshot {
    return {
      namespaces: Array.from(this.namespaces.values(), (ns) => ({
        name: ns.name,
        createdAt: ns.createdAt,
        workspaces: Array.from(ns.workspaces.values(), (ws) => ({
          name: ws.name,
          createdAt: ws.createdAt,
          repositories: Array.from(ws.repositories.values(), (repo) => ({ ...repo })),
        })),
      })),
    };
  }

  private namespace(name: string): NamespaceNode {
    return child(this.namespaces, name, "Namespace");
  }

  private workspace(namespace: string, name: string): WorkspaceNode {
    return child(this.namespace(namespace).workspaces, name, "Workspace");
  }

  // Applies a change and writes the snapshot; if either fails the tree is restored.
  private mutate(change: () => void): void {
    const before = this.toJSON();
    try {
      change();
      if (this.file) this.writeSnapshot(this.file);
    } catch (err) {
      this.restore(before);
      throw err;
    }
  }

  private restore(snapshot: Snapshot): void {
    this.namespaces = new Map(
      snapshot.namespaces.map((ns) => [
        ns.name,
        {
          name: ns.name,
          createdAt: ns.createdAt,
          workspaces: new Map(
            ns.workspaces.map((ws) => [
              ws.name,
              {
                name: ws.name,
                createdAt: ws.createdAt,
                repositories: new Map(ws.repositories.map((repo) => [repo.name, { ...repo }])),
              },
            ]),
          ),
        },
      ]),
    );
  }

  private readSnapshot(file: string): Snapshot {
    const parsed = SnapshotJson.safeParse(JSON.parse(fs.readFileSync(file, "utf8")));
    if (!parsed.success) {
      throw new Error(`Hierarchy file ${file} is malformed: ${parsed.error.issues[0].message}`);
    }
    return parsed.data;
  }

  private writeSnapshot(file: string): void {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify(this.toJSON(), null, 2));
  }
}

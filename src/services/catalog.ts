import type { DataRecord, ModelKey, SchemaInput, SearchHit } from "../types";
import { Hierarchy } from "./hierarchy";
import type { ModelEntry } from "./modelRegistry";
import { ModelRegistry } from "./modelRegistry";
import { createQuery, createRecord } from "./record";

/**
 * Keeps the naming hierarchy and the model registry in step: models live in
 * an existing repository, move when a level above them is renamed and are
 * discarded with it.
 */
export class Catalog {
  constructor(
    readonly hierarchy: Hierarchy,
    readonly registry: ModelRegistry,
  ) {}

  renameNamespace(from: string, to: string): void {
    this.hierarchy.renameNamespace(from, to);
    this.registry.rekey({ namespace: from }, { namespace: to });
  }

  deleteNamespace(namespace: string): void {
    this.hierarchy.deleteNamespace(namespace);
    this.registry.deleteWhere({ namespace });
  }

  renameWorkspace(namespace: string, from: string, to: string): void {
    this.hierarchy.renameWorkspace(namespace, from, to);
    this.registry.rekey({ namespace, workspace: from }, { namespace, workspace: to });
  }

  deleteWorkspace(namespace: string, workspace: string): void {
    this.hierarchy.deleteWorkspace(namespace, workspace);
    this.registry.deleteWhere({ namespace, workspace });
  }

  renameRepository(namespace: string, workspace: string, from: string, to: string): void {
    this.hierarchy.renameRepository(namespace, workspace, from, to);
    this.registry.rekey({ namespace, workspace, repository: from }, { namespace, workspace, repository: to });
  }

  deleteRepository(namespace: string, workspace: string, repository: string): void {
    this.hierarchy.deleteRepository(namespace, workspace, repository);
    this.registry.deleteWhere({ namespace, workspace, repository });
  }

  defineModel(key: ModelKey, schema: SchemaInput, baseShape: string): ModelEntry {
    this.hierarchy.assertRepository(key.namespace, key.workspace, key.repository);
    return this.registry.resolve(key, schema, baseShape);
  }

  getModel(key: ModelKey): ModelEntry {
    this.hierarchy.assertRepository(key.namespace, key.workspace, key.repository);
    return this.registry.resolve(key);
  }

  listModels(namespace: string, workspace: string, repository: string): ModelEntry[] {
    this.hierarchy.assertRepository(namespace, workspace, repository);
    return this.registry.list({ namespace, workspace, repository });
  }

  deleteModel(key: ModelKey): boolean {
    this.hierarchy.assertRepository(key.namespace, key.workspace, key.repository);
    return this.registry.delete(key);
  }

  /** Validates every input first, so a bad record rejects the whole batch. */
  async index(key: ModelKey, inputs: Record<string, unknown>[]): Promise<DataRecord[]> {
    const { descriptor, index } = this.getModel(key);
    const records = inputs.map((input) => createRecord(descriptor, input));
    await index.insertMany(records);
    return records;
  }

  async search(key: ModelKey, query: Record<string, unknown>, field: string | undefined, limit: number): Promise<SearchHit[]> {
    const { descriptor, index } = this.getModel(key);
    return index.find(createQuery(descriptor, query), field ?? index.vectorField, limit);
  }

  async getRecord(key: ModelKey, id: string): Promise<DataRecord | undefined> {
    return this.getModel(key).index.get(id);
  }
}

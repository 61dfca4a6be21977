import type { ModelKey, SchemaInput, TypeDescriptor } from "../types";
import { CoreError } from "./errors";
import { TypeMaterializer, typeMaterializer } from "./typeMaterializer";
import { VectorIndex } from "./vectorIndex";

export type ModelEntry = {
  key: ModelKey;
  descriptor: TypeDescriptor;
  index: VectorIndex;
  createdAt: string;
};

/** A namespace, workspace or repository: the leading parts of a model key. */
export type KeyPrefix = {
  namespace: string;
  workspace?: string;
  repository?: string;
};

export function formatModelKey(key: ModelKey): string {
  return `${key.namespace}/${key.workspace}/${key.repository}/${key.model}`;
}

function matches(key: ModelKey, prefix: KeyPrefix): boolean {
  return (
    key.namespace === prefix.namespace &&
    (prefix.workspace === undefined || key.workspace === prefix.workspace) &&
    (prefix.repository === undefined || key.repository === prefix.repository)
  );
}

/**
 * Binds model keys to a descriptor and its index. Entries are created on the
 * first resolution that carries a schema and live until deleted.
 *
 * `resolve` never awaits, so two requests resolving an unseen key cannot both
 * create an index: the first one stores it and the second one gets it back.
 */
export class ModelRegistry {
  private entries = new Map<string, ModelEntry>();

  constructor(private readonly materializer: TypeMaterializer = typeMaterializer) {}

  resolve(key: ModelKey, schema?: SchemaInput, baseShape?: string): ModelEntry {
    const id = formatModelKey(key);
    const existing = this.entries.get(id);

    if (schema === undefined || baseShape === undefined) {
      if (schema !== undefined || baseShape !== undefined) {
        throw new CoreError("InvalidSchema", "A schema and a base shape must be supplied together");
      }
      if (!existing) throw new CoreError("ModelNotFound", `Model '${id}' is not defined`);
      return existing;
    }

    const descriptor = this.materializer.materialize(schema, baseShape);
    if (existing) {
      if (existing.descriptor.fingerprint !== descriptor.fingerprint) {
        throw new CoreError(
          "SchemaConflict",
          `Model '${id}' is already defined with a different schema; delete it or use another model name`,
        );
      }
      return existing;
    }

    const entry: ModelEntry = {
      key: { ...key },
      descriptor,
      index: new VectorIndex(descriptor),
      createdAt: new Date().toISOString(),
    };
    this.entries.set(id, entry);
    return entry;
  }

  get(key: ModelKey): ModelEntry | undefined {
    return this.entries.get(formatModelKey(key));
  }

  list(prefix?: KeyPrefix): ModelEntry[] {
    const all = Array.from(this.entries.values());
    return prefix ? all.filter((e) => matches(e.key, prefix)) : all;
  }

  delete(key: ModelKey): boolean {
    return this.entries.delete(formatModelKey(key));
  }

  /** Drops every model under the prefix; returns how many were dropped. */
  deleteWhere(prefix: KeyPrefix): number {
    let dropped = 0;
    for (const [id, entry] of this.entries) {
      if (!matches(entry.key, prefix)) continue;
      this.entries.delete(id);
      dropped++;
    }
    return dropped;
  }

  /**
   * Moves every model under `from` to the same place under `to`. Both prefixes
   * must name the same level of the hierarchy. Indexes move with their models.
   */
  rekey(from: KeyPrefix, to: KeyPrefix): number {
    const moved = this.list(from);
    for (const entry of moved) {
      this.entries.delete(formatModelKey(entry.key));
    }
    for (const entry of moved) {
      const key: ModelKey = {
        namespace: to.namespace,
        workspace: from.workspace !== undefined && to.workspace !== undefined ? to.workspace : entry.key.workspace,
        repository:
          from.repository !== undefined && to.repository !== undefined ? to.repository : entry.key.repository,
        model: entry.key.model,
      };
      this.entries.set(formatModelKey(key), { ...entry, key });
    }
    return moved.length;
  }

  get size(): number {
    return this.entries.size;
  }
}

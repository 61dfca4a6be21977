import type { DataRecord, SearchHit, TypeDescriptor } from "../types";
import { euclideanDistance } from "../utils/vector";
import { RWLock } from "../utils/rwlock";
import { CoreError } from "./errors";
import { vectorOf } from "./record";

type Candidate = { record: DataRecord; distance: number; seq: number };

function declaredDimensions(descriptor: TypeDescriptor): Map<string, number> {
  const dims = new Map<string, number>();
  for (const field of descriptor.fields) {
    if (field.type === "vector" && field.dimension !== undefined) dims.set(field.name, field.dimension);
  }
  return dims;
}

/**
 * Exact nearest-neighbour index over the records of one model.
 *
 * Records are kept in insertion order. `find` compares the query against every
 * stored vector (Euclidean distance) and never prunes. Inserts hold the write
 * lock, reads share the read lock, so a search sees an insert entirely or not at all.
 */
export class VectorIndex {
  private readonly lock = new RWLock();
  private records: DataRecord[] = [];
  private dims: Map<string, number>;

  constructor(readonly descriptor: TypeDescriptor) {
    this.dims = declaredDimensions(descriptor);
  }

  /** Field searched by default; undefined for models without vector fields. */
  get vectorField(): string | undefined {
    return this.descriptor.primaryVectorField;
  }

  dimensionOf(field: string): number | undefined {
    return this.dims.get(field);
  }

  async insert(record: DataRecord): Promise<void> {
    await this.insertMany([record]);
  }

  /** All-or-nothing: one invalid record leaves the index unchanged. */
  async insertMany(records: readonly DataRecord[]): Promise<void> {
    await this.lock.withWrite(() => {
      const established = this.checkInsertable(records);
      for (const [field, dim] of established) this.dims.set(field, dim);
      this.records = this.records.concat(records);
    });
  }

  async find(query: DataRecord, field: string | undefined = this.vectorField, limit = 10): Promise<SearchHit[]> {
    if (field === undefined) {
      throw new CoreError("FieldNotFound", `${this.descriptor.title} has no vector field to search`);
    }
    const target = this.descriptor.fields.find((f) => f.name === field);
    if (!target || target.type !== "vector") {
      throw new CoreError("FieldNotFound", `${this.descriptor.title} has no vector field '${field}'`);
    }
    if (!Number.isInteger(limit) || limit < 1) {
      throw new CoreError("InvalidQuery", `limit must be a positive integer, got ${limit}`);
    }
    if (query.descriptor.fingerprint !== this.descriptor.fingerprint) {
      throw new CoreError(
        "TypeMismatch",
        `Query is a '${query.descriptor.title}', index holds '${this.descriptor.title}'`,
      );
    }
    const q = vectorOf(query, field);
    if (!q) throw new CoreError("EmptyVectorField", `Query has no value in vector field '${field}'`);

    return this.lock.withRead(() => {
      const dim = this.dims.get(field);
      if (dim !== undefined && q.length !== dim) {
        throw new CoreError("DimensionMismatch", `Query '${field}' has ${q.length} dimensions, index expects ${dim}`);
      }
      if (!q.every(Number.isFinite)) return [];

      const candidates: Candidate[] = [];
      this.records.forEach((record, seq) => {
        const v = vectorOf(record, field);
        if (!v || v.length !== q.length || !v.every(Number.isFinite)) return;
        const distance = euclideanDistance(q, v);
        if (!Number.isNaN(distance)) candidates.push({ record, distance, seq });
      });
      candidates.sort((a, b) => (a.distance < b.distance ? -1 : a.distance > b.distance ? 1 : a.seq - b.seq));
      return candidates.slice(0, limit).map(({ record, distance }) => ({ record, distance }));
    });
  }

  async get(id: string): Promise<DataRecord | undefined> {
    return this.lock.withRead(() => this.records.find((r) => r.id === id));
  }

  async count(): Promise<number> {
    return this.lock.withRead(() => this.records.length);
  }

  async clear(): Promise<void> {
    await this.lock.withWrite(() => {
      this.records = [];
      this.dims = declaredDimensions(this.descriptor);
    });
  }

  // Returns the dimensions the batch would establish; throws before anything is stored.
  private checkInsertable(records: readonly DataRecord[]): Map<string, number> {
    const established = new Map(this.dims);
    for (const record of records) {
      if (record.descriptor.fingerprint !== this.descriptor.fingerprint) {
        throw new CoreError(
          "TypeMismatch",
          `Record ${record.id} is a '${record.descriptor.title}', index holds '${this.descriptor.title}'`,
        );
      }
      const primary = this.vectorField;
      if (primary !== undefined && !vectorOf(record, primary)) {
        throw new CoreError("TypeMismatch", `Record ${record.id} has no value in vector field '${primary}'`);
      }
      for (const field of this.descriptor.vectorFields) {
        const v = vectorOf(record, field);
        if (!v) continue;
        const dim = established.get(field);
        if (dim === undefined) {
          established.set(field, v.length);
        } else if (v.length !== dim) {
          throw new CoreError(
            "DimensionMismatch",
            `Record ${record.id} '${field}' has ${v.length} dimensions, index expects ${dim}`,
          );
        }
      }
    }
    return established;
  }
}

import { describe, it, expect, beforeEach } from "vitest";
import { CoreError } from "../src/services/errors";
import { createQuery, createRecord } from "../src/services/record";
import { TypeMaterializer } from "../src/services/typeMaterializer";
import { VectorIndex } from "../src/services/vectorIndex";
import type { DataRecord, TypeDescriptor } from "../src/types";

const materializer = new TypeMaterializer();

const pointType = materializer.materialize(
  {
    title: "Point",
    properties: {
      label: { type: "string" },
      embedding: { type: "array", items: { type: "number" } },
      alt: { type: "array", items: { type: "number" } },
    },
  },
  "generic_document",
);

function point(label: string, embedding: number[], extra: Record<string, unknown> = {}): DataRecord {
  return createRecord(pointType, { id: label, label, embedding, ...extra });
}

function query(embedding: number[], descriptor: TypeDescriptor = pointType): DataRecord {
  return createQuery(descriptor, { embedding });
}

async function kindOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (err) {
    return err instanceof CoreError ? err.kind : "other";
  }
  return undefined;
}

function labels(hits: { record: DataRecord }[]): unknown[] {
  return hits.map((h) => h.record.values.label);
}

describe("VectorIndex", () => {
  let index: VectorIndex;

  beforeEach(() => {
    index = new VectorIndex(pointType);
  });

  it("returns the nearest records in ascending distance", async () => {
    await index.insert(point("a", [0, 0]));
    await index.insert(point("b", [1, 0]));
    await index.insert(point("c", [5, 5]));

    const hits = await index.find(query([0, 0]), "embedding", 2);
    expect(labels(hits)).toEqual(["a", "b"]);
    expect(hits.map((h) => h.distance)).toEqual([0, 1]);
  });

  it("returns an empty result for an empty index", async () => {
    expect(await index.find(query([0, 0]), "embedding", 5)).toEqual([]);
  });

  it("returns everything, sorted, when the limit exceeds the size", async () => {
    await index.insertMany([point("far", [3, 4]), point("near", [0, 1]), point("mid", [0, 2])]);
    const hits = await index.find(query([0, 0]), "embedding", 10);
    expect(labels(hits)).toEqual(["near", "mid", "far"]);
    expect(hits.map((h) => h.distance)).toEqual([1, 2, 5]);
  });

  it("breaks ties by insertion order", async () => {
    await index.insertMany([point("first", [1, 0]), point("second", [0, 1]), point("third", [-1, 0])]);
    const hits = await index.find(query([0, 0]), "embedding", 3);
    expect(labels(hits)).toEqual(["first", "second", "third"]);
  });

  it("keeps duplicate ids as separate entries", async () => {
    await index.insert(createRecord(pointType, { id: "dup", label: "one", embedding: [0, 0] }));
    await index.insert(createRecord(pointType, { id: "dup", label: "two", embedding: [0, 0] }));
    expect(await index.count()).toBe(2);
    expect(labels(await index.find(query([0, 0]), "embedding", 5))).toEqual(["one", "two"]);
    expect((await index.get("dup"))?.values.label).toBe("one");
  });

  it("fixes the dimension on first insert and rejects a different one", async () => {
    await index.insert(point("a", [1, 2, 3]));
    expect(index.dimensionOf("embedding")).toBe(3);
    expect(await kindOf(index.insert(point("b", [1, 2, 3, 4])))).toBe("DimensionMismatch");
    expect(await index.count()).toBe(1);
  });

  it("rejects a query of the wrong dimension", async () => {
    await index.insert(point("a", [1, 2]));
    expect(await kindOf(index.find(query([1, 2, 3]), "embedding", 1))).toBe("DimensionMismatch");
  });

  it("honours a dimension declared by the schema before the first insert", async () => {
    const fixed = materializer.materialize(
      { properties: { embedding: { type: "array", items: { type: "number" }, minItems: 3, maxItems: 3 } } },
      "text_document",
    );
    const fixedIndex = new VectorIndex(fixed);
    expect(fixedIndex.dimensionOf("embedding")).toBe(3);
    expect(await kindOf(fixedIndex.insert(createRecord(fixed, { embedding: [1, 2] })))).toBe("DimensionMismatch");
    expect(await fixedIndex.count()).toBe(0);
  });

  it("leaves the index unchanged when any record of a batch fails", async () => {
    await index.insert(point("a", [0, 0]));
    const batch = [point("b", [1, 1]), point("c", [1, 1, 1])];
    expect(await kindOf(index.insertMany(batch))).toBe("DimensionMismatch");
    expect(await index.count()).toBe(1);
  });

  it("does not establish a dimension from a failed insert", async () => {
    const other = materializer.materialize({ properties: {} }, "text_document");
    expect(await kindOf(index.insert(createRecord(other, { embedding: [1, 2, 3] })))).toBe("TypeMismatch");
    expect(index.dimensionOf("embedding")).toBeUndefined();
  });

  it("requires a value in the indexed vector field", async () => {
    expect(await kindOf(index.insert(createRecord(pointType, { label: "bare" })))).toBe("TypeMismatch");
    expect(await index.count()).toBe(0);
  });

  it("skips records with a NaN or infinite component", async () => {
    await index.insertMany([point("nan", [NaN, 0]), point("ok", [2, 0]), point("inf", [Infinity, 0])]);
    const hits = await index.find(query([0, 0]), "embedding", 3);
    expect(labels(hits)).toEqual(["ok"]);
  });

  it("ranks records with very large finite components instead of dropping them", async () => {
    await index.insertMany([point("big", [1e200, 0]), point("small", [1, 0])]);
    const hits = await index.find(query([0, 0]), "embedding", 5);
    expect(labels(hits)).toEqual(["small", "big"]);
    expect(hits.map((h) => h.distance)).toEqual([1, 1e200]);
  });

  it("matches nothing for a query with a non-finite component", async () => {
    await index.insert(point("ok", [2, 0]));
    expect(await index.find(query([NaN, 0]), "embedding", 3)).toEqual([]);
  });

  it("searches a secondary vector field, ignoring records without it", async () => {
    await index.insertMany([
      point("a", [0, 0], { alt: [9, 9, 9] }),
      point("b", [0, 0]),
      point("c", [0, 0], { alt: [1, 1, 1] }),
    ]);
    const hits = await index.find(createQuery(pointType, { alt: [0, 0, 0] }), "alt", 5);
    expect(labels(hits)).toEqual(["c", "a"]);
  });

  it("validates the search arguments", async () => {
    await index.insert(point("a", [0, 0]));
    expect(await kindOf(index.find(query([0, 0]), "label", 1))).toBe("FieldNotFound");
    expect(await kindOf(index.find(query([0, 0]), "missing", 1))).toBe("FieldNotFound");
    expect(await kindOf(index.find(query([0, 0]), "embedding", 0))).toBe("InvalidQuery");
    expect(await kindOf(index.find(query([0, 0]), "embedding", 1.5))).toBe("InvalidQuery");
    expect(await kindOf(index.find(createQuery(pointType, { label: "x" }), "embedding", 1))).toBe("EmptyVectorField");
  });

  it("rejects a query built for another model", async () => {
    const other = materializer.materialize({ title: "Other", properties: { x: { type: "string" } } }, "generic_document");
    await index.insert(point("a", [0, 0]));
    expect(await kindOf(index.find(createQuery(other, { x: "a" }), "embedding", 1))).toBe("TypeMismatch");
  });

  it("searches the primary vector field by default", async () => {
    await index.insert(point("a", [0, 0]));
    expect(index.vectorField).toBe("embedding");
    expect(labels(await index.find(query([1, 1])))).toEqual(["a"]);
  });

  it("stores records of models without vector fields but cannot search them", async () => {
    const plain = materializer.materialize({ properties: { note: { type: "string" } } }, "generic_document");
    const plainIndex = new VectorIndex(plain);
    await plainIndex.insert(createRecord(plain, { id: "p", note: "hi" }));
    expect((await plainIndex.get("p"))?.values.note).toBe("hi");
    expect(await kindOf(plainIndex.find(createQuery(plain, {})))).toBe("FieldNotFound");
  });

  it("makes an insert fully visible to a search issued right after it", async () => {
    const [, hits] = await Promise.all([index.insert(point("a", [0, 0])), index.find(query([0, 0]), "embedding", 5)]);
    expect(labels(hits)).toEqual(["a"]);
  });

  it("keeps every concurrent insert", async () => {
    await Promise.all(Array.from({ length: 20 }, (_, i) => index.insert(point(`p${i}`, [i, 0]))));
    expect(await index.count()).toBe(20);
    expect(labels(await index.find(query([0, 0]), "embedding", 3))).toEqual(["p0", "p1", "p2"]);
  });

  it("empties on clear and accepts a new dimension afterwards", async () => {
    await index.insert(point("a", [0, 0]));
    await index.clear();
    expect(await index.count()).toBe(0);
    await index.insert(point("b", [0, 0, 0]));
    expect(index.dimensionOf("embedding")).toBe(3);
  });
});

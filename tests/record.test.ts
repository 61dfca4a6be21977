import { describe, it, expect } from "vitest";
import { CoreError } from "../src/services/errors";
import { createQuery, createRecord, serializeRecord, vectorOf } from "../src/services/record";
import { TypeMaterializer } from "../src/services/typeMaterializer";

const descriptor = new TypeMaterializer().materialize(
  {
    title: "Note",
    properties: {
      body: { type: "string" },
      score: { type: "number" },
      pages: { type: "integer" },
      tags: { type: "array", items: { type: "string" } },
    },
    required: ["body"],
  },
  "text_document",
);

function mismatch(input: Record<string, unknown>): string {
  try {
    createRecord(descriptor, input);
  } catch (err) {
    if (err instanceof CoreError && err.kind === "TypeMismatch") return err.message;
    throw err;
  }
  throw new Error("expected a TypeMismatch");
}

describe("createRecord", () => {
  it("keeps a supplied id and the declared values", () => {
    const r = createRecord(descriptor, { id: "n1", body: "hello", embedding: [1, 2], tags: ["a"] });
    expect(r.id).toBe("n1");
    expect(r.descriptor).toBe(descriptor);
    expect(r.values).toEqual({ id: "n1", body: "hello", embedding: [1, 2], tags: ["a"] });
  });

  it("generates an id when none is given", () => {
    const r = createRecord(descriptor, { body: "hello" });
    expect(r.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(r.values.id).toBe(r.id);
  });

  it("drops nulls of optional fields", () => {
    const r = createRecord(descriptor, { body: "hello", score: null, url: null });
    expect(r.values).toEqual({ id: r.id, body: "hello" });
  });

  it("copies vectors so later changes to the input do not leak in", () => {
    const embedding = [1, 2, 3];
    const r = createRecord(descriptor, { body: "x", embedding });
    embedding[0] = 99;
    expect(vectorOf(r, "embedding")).toEqual([1, 2, 3]);
  });

  it("freezes stored vectors", () => {
    const r = createRecord(descriptor, { body: "x", embedding: [1, 2] });
    expect(Object.isFrozen(vectorOf(r, "embedding"))).toBe(true);
  });

  it("accepts non-finite vector components", () => {
    const r = createRecord(descriptor, { body: "x", embedding: [NaN, Infinity] });
    expect(vectorOf(r, "embedding")).toEqual([NaN, Infinity]);
  });

  it("rejects unknown fields", () => {
    expect(mismatch({ body: "x", colour: "red" })).toContain("colour");
  });

  it("rejects a missing required field", () => {
    expect(mismatch({ text: "x" })).toBe("Note: field 'body': Required");
  });

  it("rejects values of the wrong type", () => {
    expect(mismatch({ body: 3 })).toBe("Note: field 'body': Expected string, received number");
    expect(mismatch({ body: "x", pages: 1.5 })).toBe("Note: field 'pages': Expected integer, received float");
    expect(mismatch({ body: "x", url: "not a url" })).toBe("Note: field 'url': Invalid url");
    expect(mismatch({ body: "x", embedding: [] })).toContain("field 'embedding'");
    expect(mismatch({ body: "x", embedding: ["1"] })).toContain("field 'embedding.0'");
  });
});

describe("createQuery", () => {
  it("does not require fields the query does not search by", () => {
    const q = createQuery(descriptor, { embedding: [0, 1] });
    expect(vectorOf(q, "embedding")).toEqual([0, 1]);
    expect(vectorOf(q, "body")).toBeUndefined();
  });

  it("still rejects undeclared fields", () => {
    expect(() => createQuery(descriptor, { vector: [0, 1] })).toThrow(CoreError);
  });
});

describe("serializeRecord", () => {
  it("flattens the record into a field mapping", () => {
    const r = createRecord(descriptor, { id: "n2", body: "b", score: 0.5 });
    expect(serializeRecord(r)).toEqual({ id: "n2", body: "b", score: 0.5 });
  });
});

import { createHash } from "crypto";
import { z } from "zod";
import type { BaseShapeName, FieldDescriptor, FieldType, SchemaInput, TypeDescriptor } from "../types";
import { BASE_SHAPES, isBaseShapeName, listBaseShapes } from "./baseShapes";
import { CoreError } from "./errors";

const TypeName = z.union([z.string(), z.array(z.string())]);

const ObjectSchema = z
  .object({
    type: z.literal("object").optional(),
    title: z.string().optional(),
    properties: z.record(z.string(), z.record(z.string(), z.unknown())),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

const PropertySchema = z
  .object({
    type: TypeName.optional(),
    anyOf: z.array(z.record(z.string(), z.unknown())).min(1).optional(),
    title: z.string().optional(),
    format: z.string().optional(),
    contentEncoding: z.string().optional(),
    items: z.object({ type: TypeName.optional() }).passthrough().optional(),
    minItems: z.number().int().nonnegative().optional(),
    maxItems: z.number().int().nonnegative().optional(),
  })
  .passthrough();

type Classified = {
  type: FieldType;
  nullable: boolean;
  dimension?: number;
  title?: string;
};

function invalid(message: string): CoreError {
  return new CoreError("InvalidSchema", message);
}

// Splits `["number", "null"]` into the single non-null type and a nullable flag.
function singleType(name: string, type: z.infer<typeof TypeName> | undefined): { type: string; nullable: boolean } {
  if (type === undefined) throw invalid(`Field '${name}' has no type`);
  if (typeof type === "string") return { type, nullable: false };
  const nonNull = type.filter((t) => t !== "null");
  if (nonNull.length !== 1) throw invalid(`Field '${name}' must have exactly one non-null type`);
  return { type: nonNull[0], nullable: nonNull.length < type.length };
}

function classify(name: string, raw: Record<string, unknown>): Classified {
  const parsed = PropertySchema.safeParse(raw);
  if (!parsed.success) {
    throw invalid(`Field '${name}': ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  const prop = parsed.data;

  if (prop.anyOf) {
    const members = prop.anyOf.filter((m) => m.type !== "null");
    if (members.length !== 1) throw invalid(`Field '${name}' must have exactly one non-null variant`);
    const inner = classify(name, members[0]);
    return {
      ...inner,
      nullable: inner.nullable || members.length < prop.anyOf.length,
      title: prop.title ?? inner.title,
    };
  }

  const { type, nullable } = singleType(name, prop.type);
  const base = { nullable, title: prop.title };
  switch (type) {
    case "string":
      if (prop.format === "uri") return { ...base, type: "url" };
      if (prop.contentEncoding === "base64" || prop.format === "binary") return { ...base, type: "bytes" };
      return { ...base, type: "string" };
    case "integer":
      return { ...base, type: "integer" };
    case "number":
      return { ...base, type: "number" };
    case "boolean":
      return { ...base, type: "boolean" };
    case "object":
      return { ...base, type: "json" };
    case "array": {
      if (!prop.items) throw invalid(`Array field '${name}' must declare items`);
      const item = singleType(`${name}[]`, prop.items.type).type;
      if (item === "number") {
        if (prop.minItems !== undefined && prop.maxItems !== undefined && prop.minItems > prop.maxItems) {
          throw invalid(`Vector field '${name}' has minItems greater than maxItems`);
        }
        const fixed = prop.minItems !== undefined && prop.minItems === prop.maxItems && prop.minItems > 0;
        return fixed ? { ...base, type: "vector", dimension: prop.minItems } : { ...base, type: "vector" };
      }
      if (item === "string" || item === "integer" || item === "boolean") return { ...base, type: "list" };
      throw invalid(`Array field '${name}' has unsupported item type '${item}'`);
    }
    default:
      throw invalid(`Field '${name}' has unsupported type '${type}'`);
  }
}

function decodeSchema(schema: SchemaInput): z.infer<typeof ObjectSchema> {
  let value: unknown = schema;
  if (typeof schema === "string") {
    try {
      value = JSON.parse(schema);
    } catch (err) {
      throw invalid(`Schema is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  const parsed = ObjectSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw invalid(`Schema ${issue.path.join(".") || "root"}: ${issue.message}`);
  }
  return parsed.data;
}

export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

export function fingerprintOf(schema: unknown, baseShape: BaseShapeName): string {
  return createHash("sha256").update(baseShape).update("\n").update(canonicalJson(schema)).digest("hex");
}

function buildFields(schema: z.infer<typeof ObjectSchema>, baseShape: BaseShapeName): FieldDescriptor[] {
  const required = new Set(schema.required ?? []);
  // A required base field does not have to be redeclared.
  const fields: FieldDescriptor[] = BASE_SHAPES[baseShape].fields.map((f) => ({
    ...f,
    optional: f.optional && !required.has(f.name),
  }));
  for (const name of required) {
    if (!(name in schema.properties) && !fields.some((f) => f.name === name)) {
      throw invalid(`Required field '${name}' is not declared in properties`);
    }
  }

  for (const [name, raw] of Object.entries(schema.properties)) {
    const c = classify(name, raw);
    const field: FieldDescriptor = {
      name,
      type: c.type,
      optional: !required.has(name) || c.nullable,
      ...(c.dimension !== undefined ? { dimension: c.dimension } : {}),
      ...(c.title !== undefined ? { title: c.title } : {}),
    };
    const at = fields.findIndex((f) => f.name === name);
    if (at === -1) {
      fields.push(field);
      continue;
    }
    if (fields[at].type !== field.type) {
      throw invalid(`Field '${name}' must be '${fields[at].type}' for base shape '${baseShape}', got '${field.type}'`);
    }
    fields[at] = { ...field, title: field.title ?? fields[at].title };
  }
  return fields;
}

/**
 * Compiles a JSON schema plus a base shape into a frozen TypeDescriptor.
 * Equivalent submissions (same JSON content, same shape) share one instance.
 */
export class TypeMaterializer {
  private cache = new Map<string, TypeDescriptor>();

  materialize(schema: SchemaInput, baseShape: string): TypeDescriptor {
    if (!isBaseShapeName(baseShape)) {
      throw new CoreError(
        "UnknownBaseShape",
        `Unknown base shape '${baseShape}', expected one of: ${listBaseShapes().join(", ")}`,
      );
    }
    const decoded = decodeSchema(schema);
    const fingerprint = fingerprintOf(decoded, baseShape);
    const hit = this.cache.get(fingerprint);
    if (hit) return hit;

    const fields = buildFields(decoded, baseShape);
    const vectorFields = fields.filter((f) => f.type === "vector").map((f) => f.name);
    const shape = BASE_SHAPES[baseShape];
    const primaryVectorField =
      shape.embeddingField !== undefined && vectorFields.includes(shape.embeddingField)
        ? shape.embeddingField
        : vectorFields[0];

    const descriptor: TypeDescriptor = Object.freeze({
      fingerprint,
      title: decoded.title ?? "DataModel",
      baseShape,
      fields: Object.freeze(fields.map((f) => Object.freeze(f))),
      vectorFields: Object.freeze(vectorFields),
      primaryVectorField,
      primaryTextField: shape.textField,
    });
    this.cache.set(fingerprint, descriptor);
    return descriptor;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}

export const typeMaterializer = new TypeMaterializer();

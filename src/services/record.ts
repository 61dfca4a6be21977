import { randomUUID } from "crypto";
import { z } from "zod";
import type { DataRecord, FieldDescriptor, FieldValue, RecordValues, TypeDescriptor, Vector } from "../types";
import { CoreError } from "./errors";

// Vector components may be NaN or infinite; such records are skipped at search time.
const component = z.union([z.number(), z.nan()]);

function fieldValidator(field: FieldDescriptor): z.ZodTypeAny {
  switch (field.type) {
    case "string":
      return z.string();
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "url":
      return z.string().url();
    case "bytes":
      return z.string().base64();
    case "vector":
      // length is checked against the index dimension, which starts at the declared one
      return z.array(component).min(1);
    case "list":
      return z.array(z.union([z.string(), z.number(), z.boolean()]));
    case "json":
      return z.record(z.string(), z.unknown());
  }
}

type RecordValidator = z.ZodType<Record<string, unknown>>;

const validators = new WeakMap<TypeDescriptor, RecordValidator>();
const queryValidators = new WeakMap<TypeDescriptor, RecordValidator>();

function validatorFor(descriptor: TypeDescriptor, partial: boolean): RecordValidator {
  const cache = partial ? queryValidators : validators;
  const cached = cache.get(descriptor);
  if (cached) return cached;
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of descriptor.fields) {
    const v = fieldValidator(field);
    shape[field.name] = partial || field.optional ? v.nullish() : v;
  }
  const validator: RecordValidator = z.object(shape).strict();
  cache.set(descriptor, validator);
  return validator;
}

function isFieldValue(value: unknown): value is FieldValue {
  return value !== null && value !== undefined;
}

/**
 * Validates `input` against the descriptor and returns an immutable record.
 * Null values of optional fields are dropped; a missing id is generated.
 */
export function createRecord(descriptor: TypeDescriptor, input: Record<string, unknown>): DataRecord {
  return build(descriptor, input, false);
}

/** Like createRecord, but every field is optional: a query only carries what it searches by. */
export function createQuery(descriptor: TypeDescriptor, input: Record<string, unknown>): DataRecord {
  return build(descriptor, input, true);
}

function build(descriptor: TypeDescriptor, input: Record<string, unknown>, partial: boolean): DataRecord {
  const parsed = validatorFor(descriptor, partial).safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `field '${issue.path.join(".")}'` : "record";
    throw new CoreError("TypeMismatch", `${descriptor.title}: ${where}: ${issue.message}`);
  }

  const values: RecordValues = {};
  for (const [name, value] of Object.entries(parsed.data)) {
    if (!isFieldValue(value)) continue;
    values[name] = Array.isArray(value) ? Object.freeze(value.slice()) : value;
  }
  const id = typeof values.id === "string" ? values.id : randomUUID();
  if (descriptor.fields.some((f) => f.name === "id")) values.id = id;

  return Object.freeze({ id, descriptor, values: Object.freeze(values) });
}

export function isVector(value: unknown): value is Vector {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

export function vectorOf(record: DataRecord, field: string): Vector | undefined {
  const value: unknown = record.values[field];
  return isVector(value) ? value : undefined;
}

export function serializeRecord(record: DataRecord): Record<string, unknown> {
  return { ...record.values, id: record.id };
}

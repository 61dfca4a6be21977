export type FieldType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "url"
  | "bytes"
  | "vector"
  | "list"
  | "json";

export type BaseShapeName = "generic_document" | "text_document";

export type FieldDescriptor = {
  name: string;
  type: FieldType;
  optional: boolean;
  dimension?: number; // only for vector fields with minItems === maxItems
  title?: string;
};

export type TypeDescriptor = {
  fingerprint: string;
  title: string;
  baseShape: BaseShapeName;
  fields: readonly FieldDescriptor[];
  vectorFields: readonly string[];
  primaryVectorField?: string;
  primaryTextField?: string;
};

export type Vector = readonly number[];

export type FieldValue = string | number | boolean | Vector | readonly unknown[] | Record<string, unknown>;

export type RecordValues = Record<string, FieldValue>;

export type DataRecord = {
  id: string;
  descriptor: TypeDescriptor;
  values: Readonly<RecordValues>;
};

export type SearchHit = {
  record: DataRecord;
  distance: number;
};

export type ModelKey = {
  namespace: string;
  workspace: string;
  repository: string;
  model: string;
};

export type SchemaInput = string | Record<string, unknown>;

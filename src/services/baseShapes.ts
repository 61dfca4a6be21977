import type { BaseShapeName, FieldDescriptor } from "../types";

export type BaseShape = {
  name: BaseShapeName;
  description: string;
  fields: readonly FieldDescriptor[];
  textField?: string;
  embeddingField?: string;
};

const ID_FIELD: FieldDescriptor = { name: "id", type: "string", optional: true, title: "Id" };

export const BASE_SHAPES: Readonly<Record<BaseShapeName, BaseShape>> = {
  generic_document: {
    name: "generic_document",
    description: "Any record with an identifier",
    fields: [ID_FIELD],
  },
  text_document: {
    name: "text_document",
    description: "A text passage with an optional source url, raw bytes and embedding",
    fields: [
      ID_FIELD,
      { name: "text", type: "string", optional: true, title: "Text" },
      { name: "url", type: "url", optional: true, title: "Url" },
      { name: "embedding", type: "vector", optional: true, title: "Embedding" },
      { name: "bytes_", type: "bytes", optional: true, title: "Bytes" },
    ],
    textField: "text",
    embeddingField: "embedding",
  },
};

export function isBaseShapeName(name: string): name is BaseShapeName {
  return Object.prototype.hasOwnProperty.call(BASE_SHAPES, name);
}

export function listBaseShapes(): BaseShapeName[] {
  return Object.keys(BASE_SHAPES).filter(isBaseShapeName);
}

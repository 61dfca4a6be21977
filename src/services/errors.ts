export type ErrorKind =
  | "InvalidSchema"
  | "UnknownBaseShape"
  | "SchemaConflict"
  | "ModelNotFound"
  | "TypeMismatch"
  | "DimensionMismatch"
  | "EmptyVectorField"
  | "FieldNotFound"
  | "InvalidQuery"
  | "NotFound"
  | "AlreadyExists";

/**
 * Every failure raised by the registry, the indexes and the hierarchy.
 * Failures are deterministic consequences of the input, so none is retried.
 */
export class CoreError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "CoreError";
  }
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidSchema: 400,
  UnknownBaseShape: 400,
  EmptyVectorField: 400,
  FieldNotFound: 400,
  InvalidQuery: 400,
  ModelNotFound: 404,
  NotFound: 404,
  SchemaConflict: 409,
  AlreadyExists: 409,
  TypeMismatch: 422,
  DimensionMismatch: 422,
};

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export type TrackingErrorCode = "INVALID_FIELD" | "MISSING_CHANGE_STATE" | "NOT_A_RECORD";

export class TrackingError extends Error {
  readonly code: TrackingErrorCode;

  constructor(code: TrackingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TrackingError";
    this.code = code;
  }
}

/**
 * Thrown when an operation names a field the record type does not declare.
 */
export class InvalidFieldError extends TrackingError {
  readonly model: string;
  readonly field: string;

  constructor(model: string, field: string) {
    super("INVALID_FIELD", `Field "${field}" is not declared on ${model}`);
    this.name = "InvalidFieldError";
    this.model = model;
    this.field = field;
  }
}

/**
 * A value carries the tracking symbol but no usable change state.
 * Means a record was built around the record model instead of through it.
 */
export class ChangeStateError extends TrackingError {
  constructor(message: string) {
    super("MISSING_CHANGE_STATE", message);
    this.name = "ChangeStateError";
  }
}

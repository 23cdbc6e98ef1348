import { ChangeState } from "./change-state.js";
import { ChangeStateError, TrackingError } from "./errors.js";
import { RECORD_INTERNALS, type RecordInternals, type TrackedRecord } from "./types.js";

// Type guard
export function isTrackedRecord<T = unknown>(value: unknown): value is TrackedRecord<T> {
  return value !== null && typeof value === "object" && RECORD_INTERNALS in value;
}

/**
 * Read the internals of a tracked record. A value that carries the symbol
 * without a change state is a broken record and fails hard.
 */
export function readInternals(record: TrackedRecord<unknown>): RecordInternals {
  const internals: unknown = record[RECORD_INTERNALS];
  if (
    internals === null ||
    typeof internals !== "object" ||
    !("state" in internals) ||
    !(internals.state instanceof ChangeState) ||
    !("values" in internals) ||
    !("type" in internals)
  ) {
    throw new ChangeStateError("Record carries tracking metadata without a change state");
  }
  return record[RECORD_INTERNALS];
}

export function internalsOf(value: unknown): RecordInternals {
  if (!isTrackedRecord(value)) {
    throw new TrackingError("NOT_A_RECORD", "Target is not a tracked record");
  }
  return readInternals(value);
}

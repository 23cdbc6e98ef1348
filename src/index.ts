// Types
export type {
  ChangeEvent,
  CopyOptions,
  ExportOptions,
  FieldName,
  JsonExportOptions,
  ModelOptions,
  RecordInternals,
  RecordType,
  RecordTypeInfo,
  SetChangedOptions,
  TrackedRecord,
} from "./types.js";
export { RECORD_INTERNALS } from "./types.js";

// Record types
export { defineModel } from "./model.js";
export { isTrackedRecord } from "./internals.js";
// Change tracking
export { ChangeState } from "./change-state.js";
export { ChangeTracker, getChangeTracker, setField } from "./tracker.js";
export { isValueComparable } from "./values.js";
// Errors
export { ChangeStateError, InvalidFieldError, TrackingError, type TrackingErrorCode } from "./errors.js";
// Watch functionality
export { type WatchAsyncIteratorOptions, type Watcher, type WatchHandle, watch } from "./watch.js";

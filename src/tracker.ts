import { changedFieldsRecursive, changedFieldsWithNested, hasChangedRecursive } from "./aggregate.js";
import { InvalidFieldError } from "./errors.js";
import { exportJson, exportRecord } from "./export.js";
import { internalsOf, isTrackedRecord, readInternals } from "./internals.js";
import { originalFieldValue, restoreRecord } from "./restore.js";
import type {
  CopyOptions,
  ExportOptions,
  FieldName,
  JsonExportOptions,
  RecordInternals,
  SetChangedOptions,
  TrackedRecord,
} from "./types.js";
import { isPlainObject, isUnchangedAssignment, mapContainer, safeDeepClone } from "./values.js";
import { notifyWatchers } from "./watch.js";

function assertField(internals: RecordInternals, field: string): void {
  if (!internals.type.hasField(field)) {
    throw new InvalidFieldError(internals.type.name, field);
  }
}

/**
 * The single write path for record fields. Records the change before the
 * value reaches the store.
 */
export function assignField(internals: RecordInternals, field: string, value: unknown): void {
  assertField(internals, field);
  const { type, values, state } = internals;

  const next = type.options.validateAssignment ? type.parseField(field, value) : value;
  const current = values[field];

  if (!isUnchangedAssignment(current, next)) {
    state.recordAssignment(field, current);
    values[field] = next;
    notifyWatchers(state, { kind: "field", field });
    return;
  }

  values[field] = next;
}

export function setField<T, K extends FieldName<T>>(record: TrackedRecord<T>, field: K, value: T[K]): void {
  assignField(internalsOf(record), field, value);
}

function copyValue(value: unknown): unknown {
  if (isTrackedRecord(value)) return copyRecord(readInternals(value), true);
  if (Array.isArray(value) || value instanceof Map || isPlainObject(value)) {
    return mapContainer(value, copyValue);
  }
  return safeDeepClone(value);
}

export function copyRecord(internals: RecordInternals, deep: boolean): TrackedRecord<unknown> {
  const values: Record<string, unknown> = {};
  for (const field of internals.type.fields) {
    const value = internals.values[field];
    values[field] = deep ? copyValue(value) : value;
  }
  return internals.type.construct(values);
}

/**
 * Change tracking operations of one record.
 */
export class ChangeTracker<T> {
  constructor(private readonly internals: RecordInternals) {}

  /** True when this record or any record nested in it has changed */
  hasChanged(): boolean {
    return hasChangedRecursive(this.internals);
  }

  /** True when a field of this record changed directly or a marker is set */
  hasSelfChanged(): boolean {
    return this.internals.state.hasChanged();
  }

  changedFields(): ReadonlySet<string> {
    return new Set(this.internals.state.selfChanged);
  }

  /** Own changes plus fields whose nested records changed, without dotted paths */
  changedFieldsWithNested(): ReadonlySet<string> {
    return changedFieldsWithNested(this.internals);
  }

  changedFieldsRecursive(): ReadonlySet<string> {
    return changedFieldsRecursive(this.internals);
  }

  get original(): Partial<T> {
    const result: Record<string, unknown> = {};
    for (const [field, value] of this.internals.state.original) {
      result[field] = value;
    }
    return result as Partial<T>;
  }

  setField<K extends FieldName<T>>(field: K, value: T[K]): void {
    assignField(this.internals, field, value);
  }

  /**
   * Report fields as changed, e.g. after mutating a list in place.
   * Pass `original` to record the value from before that mutation.
   */
  setChanged(fields: FieldName<T> | readonly FieldName<T>[], options: SetChangedOptions = {}): void {
    const names = new Array<string>().concat(fields);
    // Validate everything before touching the state
    for (const name of names) {
      assertField(this.internals, name);
    }

    const original = "original" in options ? { value: options.original } : undefined;
    const { state } = this.internals;
    for (const name of names) {
      state.recordExplicit(name, original);
      notifyWatchers(state, { kind: "field", field: name });
    }
  }

  resetChanged(): void {
    const { state } = this.internals;
    state.reset();
    notifyWatchers(state, { kind: "reset" });
  }

  markChanged(marker: string): void {
    const { state } = this.internals;
    if (state.mark(marker)) {
      notifyWatchers(state, { kind: "marker", marker, marked: true });
    }
  }

  unmarkChanged(marker: string): void {
    const { state } = this.internals;
    if (state.unmark(marker)) {
      notifyWatchers(state, { kind: "marker", marker, marked: false });
    }
  }

  hasChangedMarker(marker: string): boolean {
    return this.internals.state.markers.has(marker);
  }

  changedMarkers(): ReadonlySet<string> {
    return new Set(this.internals.state.markers);
  }

  getOriginalFieldValue(field: FieldName<T>): unknown {
    assertField(this.internals, field);
    return originalFieldValue(this.internals, field);
  }

  restoreOriginal(): TrackedRecord<T> {
    return this.rebuilt(restoreRecord(this.internals));
  }

  copy(options: CopyOptions = {}): TrackedRecord<T> {
    return this.rebuilt(copyRecord(this.internals, options.deep ?? false));
  }

  toPlain(options: ExportOptions<T> = {}): Record<string, unknown> {
    return exportRecord(this.internals, options);
  }

  toJSON(options: JsonExportOptions<T> = {}): string {
    return exportJson(this.internals, options);
  }

  // construct() always returns a record of this tracker's type
  private rebuilt(record: TrackedRecord<unknown>): TrackedRecord<T> {
    return record as TrackedRecord<T>;
  }
}

// Helper to get the tracker of a record
export function getChangeTracker<T>(record: TrackedRecord<T>): ChangeTracker<T> {
  return new ChangeTracker<T>(internalsOf(record));
}

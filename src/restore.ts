import { containsRecords } from "./aggregate.js";
import { isTrackedRecord, readInternals } from "./internals.js";
import type { RecordInternals, TrackedRecord } from "./types.js";
import { mapContainer } from "./values.js";

type InProgress = Set<RecordInternals>;

function restoreValue(value: unknown, inProgress: InProgress): unknown {
  if (isTrackedRecord(value)) {
    const internals = readInternals(value);
    // Cycle: the record is still being rebuilt higher up, keep the live one
    if (inProgress.has(internals)) return value;
    return restoreRecord(internals, inProgress);
  }
  if (!containsRecords(value)) return value;
  return mapContainer(value, (element) => restoreValue(element, inProgress));
}

export function originalFieldValue(
  internals: RecordInternals,
  field: string,
  inProgress: InProgress = new Set(),
): unknown {
  const { original } = internals.state;
  if (original.has(field)) return original.get(field);
  return restoreValue(internals.values[field], inProgress);
}

/**
 * Build a new record of the same type holding the values from before every
 * tracked change. Nested records are restored too, whether or not the field
 * holding them was reassigned.
 */
export function restoreRecord(
  internals: RecordInternals,
  inProgress: InProgress = new Set(),
): TrackedRecord<unknown> {
  inProgress.add(internals);
  try {
    const values: Record<string, unknown> = {};
    for (const field of internals.type.fields) {
      values[field] = originalFieldValue(internals, field, inProgress);
    }
    return internals.type.construct(values);
  } finally {
    inProgress.delete(internals);
  }
}

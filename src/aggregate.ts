import { isTrackedRecord, readInternals } from "./internals.js";
import type { RecordInternals } from "./types.js";
import { containerElements } from "./values.js";

/**
 * Records reachable through one field value: the value itself when it is a
 * record, otherwise the records held directly by an array, Map or plain
 * object. Anything else is opaque.
 */
export function nestedRecords(value: unknown): RecordInternals[] {
  if (isTrackedRecord(value)) return [readInternals(value)];

  const nested: RecordInternals[] = [];
  for (const element of containerElements(value)) {
    if (isTrackedRecord(element)) nested.push(readInternals(element));
  }
  return nested;
}

export function containsRecords(value: unknown): boolean {
  if (isTrackedRecord(value)) return true;
  return containerElements(value).some((element) => isTrackedRecord(element));
}

// `path` holds the records currently being visited, so reference cycles end
export function hasChangedRecursive(
  internals: RecordInternals,
  path = new Set<RecordInternals>(),
): boolean {
  if (internals.state.hasChanged()) return true;

  path.add(internals);
  try {
    for (const field of internals.type.fields) {
      for (const nested of nestedRecords(internals.values[field])) {
        if (path.has(nested)) continue;
        if (hasChangedRecursive(nested, path)) return true;
      }
    }
    return false;
  } finally {
    path.delete(internals);
  }
}

/**
 * Changed field paths: own changes as bare names, nested changes as
 * `field.nestedPath`. Elements of a collection share the field prefix.
 * A field changed directly is not descended into.
 */
export function changedFieldsRecursive(
  internals: RecordInternals,
  path = new Set<RecordInternals>(),
): Set<string> {
  const { selfChanged } = internals.state;
  const changed = new Set(selfChanged);

  path.add(internals);
  try {
    for (const field of internals.type.fields) {
      if (selfChanged.has(field)) continue;

      for (const nested of nestedRecords(internals.values[field])) {
        if (path.has(nested)) continue;
        if (!hasChangedRecursive(nested, path)) continue;

        changed.add(field);
        for (const nestedPath of changedFieldsRecursive(nested, path)) {
          changed.add(`${field}.${nestedPath}`);
        }
      }
    }
  } finally {
    path.delete(internals);
  }

  return changed;
}

/**
 * Own changes plus the fields holding a changed nested record, as bare
 * field names.
 */
export function changedFieldsWithNested(internals: RecordInternals): Set<string> {
  const { selfChanged } = internals.state;
  const changed = new Set(selfChanged);
  const path = new Set([internals]);

  for (const field of internals.type.fields) {
    if (selfChanged.has(field)) continue;

    const nested = nestedRecords(internals.values[field]);
    if (nested.some((record) => !path.has(record) && hasChangedRecursive(record, path))) {
      changed.add(field);
    }
  }

  return changed;
}

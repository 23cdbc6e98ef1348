import { changedFieldsWithNested } from "./aggregate.js";
import { isTrackedRecord, readInternals } from "./internals.js";
import type { RecordInternals } from "./types.js";
import { isPlainObject } from "./values.js";

export interface DumpOptions {
  include?: Iterable<string>;
  exclude?: Iterable<string>;
}

function dumpValue(value: unknown): unknown {
  if (isTrackedRecord(value)) return dumpRecord(readInternals(value));
  if (Array.isArray(value)) {
    return value.map(dumpValue);
  }
  if (value instanceof Set) {
    return [...value].map(dumpValue);
  }
  if (value instanceof Map) {
    const result: Record<string, unknown> = {};
    for (const [key, element] of value) {
      result[String(key)] = dumpValue(element);
    }
    return result;
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value)) {
      result[key] = dumpValue(value[key]);
    }
    return result;
  }
  return value;
}

/**
 * Structured export of a record: declared fields in declaration order,
 * `undefined` values left out.
 */
export function dumpRecord(internals: RecordInternals, options: DumpOptions = {}): Record<string, unknown> {
  const include = options.include === undefined ? undefined : new Set(options.include);
  const exclude = new Set(options.exclude);
  const result: Record<string, unknown> = {};

  for (const field of internals.type.fields) {
    if (include && !include.has(field)) continue;
    if (exclude.has(field)) continue;

    const value = internals.values[field];
    if (value === undefined) continue;

    result[field] = dumpValue(value);
  }

  return result;
}

export interface FilteredExportOptions {
  include?: Iterable<string>;
  exclude?: Iterable<string>;
  excludeUnchanged?: boolean;
}

export function exportRecord(
  internals: RecordInternals,
  options: FilteredExportOptions = {},
): Record<string, unknown> {
  const { excludeUnchanged = false, exclude } = options;
  if (!excludeUnchanged) {
    return dumpRecord(internals, { include: options.include, exclude });
  }

  // Only top-level fields are filtered; an included nested record is exported in full
  const changed = changedFieldsWithNested(internals);
  const include =
    options.include === undefined
      ? changed
      : [...options.include].filter((field) => changed.has(field));

  return dumpRecord(internals, { include, exclude });
}

export function exportJson(
  internals: RecordInternals,
  options: FilteredExportOptions & { space?: string | number } = {},
): string {
  return JSON.stringify(exportRecord(internals, options), null, options.space);
}

import type { z } from "zod";
import type { ChangeState } from "./change-state.js";

// Symbol for accessing record internals (exported for use across files)
export const RECORD_INTERNALS = Symbol("record_internals");

export type FieldName<T> = Extract<keyof T, string>;

export interface ModelOptions {
  /** Used in error messages. Default: "Record" */
  name?: string;
  /** Parse every assigned value with the field's schema. Default: false */
  validateAssignment?: boolean;
}

/**
 * Schema metadata shared by every record of one type.
 */
export interface RecordTypeInfo {
  readonly name: string;
  readonly fields: readonly string[];
  readonly options: Readonly<Required<ModelOptions>>;
  construct(values: Record<string, unknown>): TrackedRecord<unknown>;
  hasField(name: string): boolean;
  parseField(name: string, value: unknown): unknown;
}

export interface RecordType<T, I = T> extends RecordTypeInfo {
  readonly fields: readonly FieldName<T>[];
  /** Accepts a record of this type as is, or raw input that gets parsed and constructed */
  readonly schema: z.ZodType<TrackedRecord<T>, z.ZodTypeDef, I | TrackedRecord<T>>;
  create(input: I): TrackedRecord<T>;
  construct(values: Record<string, unknown>): TrackedRecord<T>;
  hasField(name: string): name is FieldName<T>;
  is(value: unknown): value is TrackedRecord<T>;
}

export interface RecordInternals {
  readonly type: RecordTypeInfo;
  readonly values: Record<string, unknown>;
  readonly state: ChangeState;
}

export type TrackedRecord<T> = T & {
  readonly [RECORD_INTERNALS]: RecordInternals;
};

export type ChangeEvent =
  | { kind: "field"; field: string }
  | { kind: "marker"; marker: string; marked: boolean }
  | { kind: "reset" };

export interface SetChangedOptions {
  /** Stored for every named field that has no tracked original yet */
  original?: unknown;
}

export interface ExportOptions<T> {
  include?: Iterable<FieldName<T>>;
  exclude?: Iterable<FieldName<T>>;
  /** Only export fields in the recursive changed-field set. Default: false */
  excludeUnchanged?: boolean;
}

export interface JsonExportOptions<T> extends ExportOptions<T> {
  space?: string | number;
}

export interface CopyOptions {
  /** Copy nested records and clone other values instead of sharing them */
  deep?: boolean;
}

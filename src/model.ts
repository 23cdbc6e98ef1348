import { z } from "zod";
import { ChangeState } from "./change-state.js";
import { InvalidFieldError } from "./errors.js";
import { isTrackedRecord, readInternals } from "./internals.js";
import { createRecordProxy } from "./proxy.js";
import {
  type FieldName,
  type ModelOptions,
  RECORD_INTERNALS,
  type RecordInternals,
  type RecordType,
  type TrackedRecord,
} from "./types.js";
import { isPlainObject } from "./values.js";

function toValues(data: unknown): Record<string, unknown> {
  if (!isPlainObject(data)) {
    throw new TypeError("Record schema must produce a plain object");
  }
  return data;
}

/**
 * Define a record type with change tracking from a zod object schema.
 *
 * Field order follows the schema. Records nest through `Type.schema`:
 *
 * ```ts
 * const Address = defineModel(z.object({ city: z.string() }), { name: "Address" });
 * const User = defineModel(z.object({
 *   name: z.string(),
 *   address: Address.schema,
 *   previous: z.array(Address.schema).default([]),
 * }));
 *
 * const user = User.create({ name: "Alice", address: { city: "Berlin" } });
 * user.address.city = "Hamburg";
 * getChangeTracker(user).changedFieldsRecursive(); // {"address", "address.city"}
 * ```
 */
export function defineModel<S extends z.AnyZodObject>(
  schema: S,
  options: ModelOptions = {},
): RecordType<z.output<S>, z.input<S>> {
  type T = z.output<S>;
  type I = z.input<S>;

  const shape: z.ZodRawShape = schema.shape;
  const resolved: Required<ModelOptions> = {
    name: options.name ?? "Record",
    validateAssignment: options.validateAssignment ?? false,
  };

  const isField = (name: string): name is FieldName<T> => Object.hasOwn(shape, name);
  const fields = Object.keys(shape).filter(isField);

  const type: RecordType<T, I> = {
    name: resolved.name,
    fields,
    options: resolved,

    schema: z.union([
      // An existing record is copied so that its change state stays its own
      z
        .custom<TrackedRecord<T>>((value) => type.is(value), {
          message: `Expected a ${resolved.name} record`,
        })
        .transform((record) => type.construct({ ...readInternals(record).values })),
      schema.transform((data) => type.construct(toValues(data))),
    ]),

    create(input: I): TrackedRecord<T> {
      return type.construct(toValues(schema.parse(input)));
    },

    // No validation; the change state starts out empty
    construct(values: Record<string, unknown>): TrackedRecord<T> {
      const store: Record<string, unknown> = {};
      for (const field of fields) {
        if (values[field] !== undefined) {
          store[field] = values[field];
        }
      }

      const internals: RecordInternals = { type, values: store, state: new ChangeState() };

      // Attach internals directly to the store (not via proxy)
      Object.defineProperty(store, RECORD_INTERNALS, {
        value: internals,
        enumerable: false,
        writable: false,
        configurable: false,
      });

      return createRecordProxy<T>(internals);
    },

    hasField: isField,

    parseField(name: string, value: unknown): unknown {
      const fieldSchema = shape[name];
      if (!fieldSchema) {
        throw new InvalidFieldError(resolved.name, name);
      }
      return fieldSchema.parse(value);
    },

    is(value: unknown): value is TrackedRecord<T> {
      return isTrackedRecord(value) && readInternals(value).type === type;
    },
  };

  return type;
}

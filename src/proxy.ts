import { InvalidFieldError } from "./errors.js";
import { assignField } from "./tracker.js";
import type { RecordInternals, TrackedRecord } from "./types.js";

// Node.js inspection symbol
const NODE_INSPECT = Symbol.for("nodejs.util.inspect.custom");

/**
 * Wrap a record's value store so that property writes go through the
 * tracked write path. Reads and introspection pass straight to the store.
 */
export function createRecordProxy<T>(internals: RecordInternals): TrackedRecord<T> {
  const proxy: object = new Proxy(internals.values, {
    get(obj, prop) {
      // Show the plain field values when inspected
      if (prop === NODE_INSPECT) {
        return () => ({ ...obj });
      }
      return Reflect.get(obj, prop, obj);
    },

    set(obj, prop, value) {
      // Symbol keys are not fields and are never tracked
      if (typeof prop === "symbol") {
        return Reflect.set(obj, prop, value, obj);
      }
      assignField(internals, prop, value);
      return true;
    },

    deleteProperty(obj, prop) {
      if (typeof prop === "symbol") {
        return Reflect.deleteProperty(obj, prop);
      }
      // Fields stay declared; deleting one clears its value
      assignField(internals, prop, undefined);
      return true;
    },

    defineProperty(obj, prop, descriptor) {
      if (typeof prop === "symbol") {
        return Reflect.defineProperty(obj, prop, descriptor);
      }
      // Fields only ever hold plain values
      if (!("value" in descriptor)) {
        throw new InvalidFieldError(internals.type.name, prop);
      }
      assignField(internals, prop, descriptor.value);
      return true;
    },

    // Transparency traps - make proxy behave like native object
    has(obj, prop) {
      return Reflect.has(obj, prop);
    },

    ownKeys(obj) {
      return Reflect.ownKeys(obj);
    },

    getOwnPropertyDescriptor(obj, prop) {
      return Reflect.getOwnPropertyDescriptor(obj, prop);
    },

    getPrototypeOf(obj) {
      return Reflect.getPrototypeOf(obj);
    },
  });

  return proxy as TrackedRecord<T>;
}

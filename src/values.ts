/**
 * Kinds that are immutable and compared by value. For anything else an
 * equal-looking assignment still counts as a change, since the value may
 * have been mutated in place.
 */
export function isValueComparable(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  switch (typeof value) {
    case "boolean":
    case "number":
    case "bigint":
    case "string":
      return true;
    default:
      return false;
  }
}

export function isUnchangedAssignment(current: unknown, next: unknown): boolean {
  return isValueComparable(next) && current === next;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Rebuild an array, Map or plain object around mapped elements.
 * Returns `value` untouched for anything else.
 */
export function mapContainer(value: unknown, fn: (element: unknown) => unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((element) => fn(element));
  }
  if (value instanceof Map) {
    const result = new Map<unknown, unknown>();
    for (const [key, element] of value) {
      result.set(key, fn(element));
    }
    return result;
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value)) {
      result[key] = fn(value[key]);
    }
    return result;
  }
  return value;
}

export function containerElements(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (value instanceof Map) return [...value.values()];
  if (isPlainObject(value)) return Object.values(value);
  return [];
}

// Deep clone that falls back to a manual walk when structuredClone refuses (e.g. functions)
export function safeDeepClone<T>(value: T): T {
  try {
    return structuredClone(value);
  } catch {
    return manualDeepClone(value);
  }
}

function manualDeepClone<T>(value: T, visited = new WeakMap<object, unknown>()): T {
  if (value === null || typeof value !== "object") {
    return value;
  }

  // Handle circular refs
  const seen = visited.get(value);
  if (seen !== undefined) {
    return seen as T;
  }

  if (Array.isArray(value)) {
    const clone: unknown[] = [];
    visited.set(value, clone);
    for (let i = 0; i < value.length; i++) {
      clone[i] = manualDeepClone(value[i], visited);
    }
    return clone as T;
  }

  if (!isPlainObject(value)) {
    // Class instances keep their identity
    return value;
  }

  const clone: Record<string, unknown> = {};
  visited.set(value, clone);
  for (const key of Object.keys(value)) {
    clone[key] = manualDeepClone(value[key], visited);
  }
  return clone as T;
}

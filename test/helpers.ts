import assert from "node:assert";

/**
 * Assert exact field paths (order-independent comparison)
 */
export function assertExactFields(actual: Iterable<string>, expected: string[], message?: string) {
  const sortedActual = [...actual].sort();
  const sortedExpected = [...expected].sort();
  assert.deepStrictEqual(
    sortedActual,
    sortedExpected,
    message ?? `Expected fields ${JSON.stringify(sortedExpected)}, got ${JSON.stringify(sortedActual)}`
  );
}

/**
 * Runtime assertions.
 *
 * - `invariant(condition, message)`: throws when an internal assumption fails
 * - `unreachable(value)`: exhaustiveness marker for discriminated unions
 * - `assertCount(value, name)`: argument check for element counts
 */

/**
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Takes a `never` so that adding a variant
 * to a union turns every unhandled switch into a type error.
 */
export function unreachable(value: never): never {
  throw new Error(`Unreachable code reached with ${String(value)}`);
}

/**
 * Check that `value` is a non-negative safe integer.
 *
 * @throws RangeError otherwise
 */
export function assertCount(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

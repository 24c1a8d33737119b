/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` — assertion for programmer errors
 * - `unreachable(value?)` — marks impossible code paths
 *
 * @example
 * ```typescript
 * function circle(unit: AngularUnit): number {
 *   switch (unit) {
 *     case "degrees": return 360;
 *     case "gradians": return 400;
 *     case "radians": return NaN;
 *     default: return unreachable(unit); // Type error if AngularUnit grows
 *   }
 * }
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param _value - A value of type `never` (for type-level exhaustiveness)
 * @throws Error always
 */
export function unreachable(_value?: never): never {
  throw new Error("Unreachable code reached");
}

/**
 * Shared literal types for the transcend packages.
 *
 * Each union is derived from a `const` tuple so the same list drives both
 * the type and the runtime guard used when reading configuration.
 */

// ============================================================================
// Angular Units
// ============================================================================

/** Units an angle may be expressed in. Storage is always the raw value. */
export const ANGULAR_UNITS = ["radians", "degrees", "gradians"] as const;

/** Union type of all supported angular units. */
export type AngularUnit = (typeof ANGULAR_UNITS)[number];

export function isAngularUnit(value: unknown): value is AngularUnit {
  return typeof value === "string" && (ANGULAR_UNITS as readonly string[]).includes(value);
}

// ============================================================================
// Rounding Modes
// ============================================================================

/**
 * Rounding modes understood by decimal engines.
 *
 * - `up` / `down` round away from / toward zero
 * - `ceil` / `floor` round toward +∞ / -∞
 * - `half-*` round to nearest, breaking ties in the named direction
 */
export const ROUNDING_MODES = [
  "up",
  "down",
  "ceil",
  "floor",
  "half-up",
  "half-down",
  "half-even",
  "half-ceil",
  "half-floor",
] as const;

export type RoundingMode = (typeof ROUNDING_MODES)[number];

export function isRoundingMode(value: unknown): value is RoundingMode {
  return typeof value === "string" && (ROUNDING_MODES as readonly string[]).includes(value);
}

// ============================================================================
// Series Exhaustion Policy
// ============================================================================

/**
 * What a convergence loop yields when it hits its iteration cap.
 *
 * - `nan` — the result is NaN and a warning is logged
 * - `partial` — the last partial sum is returned
 * - `throw` — a `ConvergenceError` is thrown
 */
export const EXHAUSTED_POLICIES = ["nan", "partial", "throw"] as const;

export type ExhaustedPolicy = (typeof EXHAUSTED_POLICIES)[number];

export function isExhaustedPolicy(value: unknown): value is ExhaustedPolicy {
  return typeof value === "string" && (EXHAUSTED_POLICIES as readonly string[]).includes(value);
}

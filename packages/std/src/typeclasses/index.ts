/**
 * Standard Typeclasses
 *
 * Dictionary-passing typeclasses for numeric code:
 * - Haskell (Num, Fractional, Floating, Read, Show)
 * - Scala 3 (Ordering, Numeric)
 *
 * An instance is a plain object literal; generic functions take the
 * instance they need as a trailing parameter.
 *
 * `Real` is the capability contract an arbitrary-precision real type
 * offers to the transcendental layer.
 */

import type { RoundingMode } from "@transcend/core";

// ============================================================================
// Eq — Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true` (except NaN-like values)
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

// ============================================================================
// Ord — Haskell Ord, Scala Ordering
// Types with a total (or, for NaN, partial) ordering.
// ============================================================================

export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - ordering comparison.
 *
 * Laws:
 * - Totality: `compare(x, y) !== EQ_ORD || equals(x, y)` for non-NaN values
 * - Antisymmetry: `compare(x, y) === -compare(y, x)`
 * - Transitivity: `lessThan(x, y) && lessThan(y, z) => lessThan(x, z)`
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

// ============================================================================
// Numeric — Haskell Num, Scala Numeric, Kotlin: Number
// Types supporting basic arithmetic.
// ============================================================================

/**
 * Numeric typeclass - types supporting basic arithmetic operations.
 *
 * This is the Ring abstraction: add, sub, mul with identity elements.
 */
export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  div(a: A, b: A): A;
  pow(a: A, b: A): A;
  negate(a: A): A;
  abs(a: A): A;
  signum(a: A): A;
  fromNumber(n: number): A;
  toNumber(a: A): number;
  zero(): A;
  one(): A;
}

export const numericNumber: Numeric<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  pow: (a, b) => a ** b,
  negate: (a) => -a,
  abs: (a) => Math.abs(a),
  signum: (a) => Math.sign(a),
  fromNumber: (n) => n,
  toNumber: (a) => a,
  zero: () => 0,
  one: () => 1,
};

// ============================================================================
// Fractional — Haskell Fractional
// Types supporting real division.
// ============================================================================

/**
 * Fractional typeclass - types supporting real division.
 *
 * This is the Field abstraction (for fractional/floating types).
 */
export interface Fractional<A> {
  div(a: A, b: A): A;
  recip(a: A): A;
  fromRational(num: number, den: number): A;
}

export const fractionalNumber: Fractional<number> = {
  div: (a, b) => a / b,
  recip: (a) => 1 / a,
  fromRational: (num, den) => num / den,
};

// ============================================================================
// Floating — Haskell Floating
// Types supporting transcendental functions.
// ============================================================================

export interface Floating<A> {
  pi(): A;
  exp(a: A): A;
  log(a: A): A;
  sqrt(a: A): A;
  pow(a: A, b: A): A;
  sin(a: A): A;
  cos(a: A): A;
  tan(a: A): A;
  asin(a: A): A;
  acos(a: A): A;
  atan(a: A): A;
  atan2(a: A, b: A): A;
  sinh(a: A): A;
  cosh(a: A): A;
  tanh(a: A): A;
}

// ============================================================================
// Parseable — Haskell Read, Rust FromStr
// Types that can be parsed from a string.
// ============================================================================

export type ParseResult<A> = { ok: true; value: A; rest: string } | { ok: false; error: string };

export interface Parseable<A> {
  parse(s: string): ParseResult<A>;
}

// ============================================================================
// Printable — Rust Display, Haskell Show
// Human-readable string representation.
// ============================================================================

export interface Printable<A> {
  display(a: A): string;
}

// ============================================================================
// Real — arbitrary-precision real numbers
// ============================================================================

/**
 * Real typeclass - the primitive operations every transcendental and
 * special function is derived from.
 *
 * An instance fixes a precision: every operation rounds its result to
 * `digits` significant digits using `rounding`. Instances are immutable;
 * `withDigits` returns a sibling instance over the same value type, so a
 * computation that needs guard digits asks for one and rounds its final
 * result back through the caller's `from`.
 *
 * Comparisons involving NaN return `false` (and `compare` returns `EQ_ORD`),
 * mirroring IEEE semantics. `isNegative` is true for negative zero.
 */
export interface Real<A>
  extends Numeric<A>, Fractional<A>, Ord<A>, Parseable<A>, Printable<A> {
  /** Significant decimal digits kept by every operation */
  readonly digits: number;
  readonly rounding: RoundingMode;
  withDigits(digits: number): Real<A>;

  sqrt(a: A): A;
  exp(a: A): A;
  ln(a: A): A;
  log10(a: A): A;
  hypot(a: A, b: A): A;
  /** Truncated remainder: the result takes the sign of `a` */
  mod(a: A, b: A): A;
  trunc(a: A): A;

  isZero(a: A): boolean;
  isNegative(a: A): boolean;
  isInteger(a: A): boolean;
  isNaN(a: A): boolean;
  isInfinite(a: A): boolean;
  isFinite(a: A): boolean;
  /** NaN or infinite */
  isSpecial(a: A): boolean;

  fromInt(n: number | bigint): A;
  /** Radix-10 numeral; text that is not one yields NaN */
  fromString(s: string): A;
  /** Round a value produced at another precision to this one */
  from(a: A): A;
  nan(): A;
  infinity(sign?: 1 | -1): A;

  /** One unit in the last place of `a` at this precision */
  ulp(a: A): A;
  /** Decimal exponent of the most significant digit (0 for zero) */
  exponent(a: A): number;
}

export * from "./numeric-ops.js";

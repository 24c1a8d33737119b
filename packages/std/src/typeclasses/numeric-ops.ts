/**
 * Generic Numeric Operations
 *
 * Derived operations that work for ANY type with a Numeric or Fractional
 * instance. All functions use dictionary-passing style.
 *
 * @example
 * ```typescript
 * import { sum, product, pow, numericNumber } from "@transcend/std";
 *
 * sum([1, 2, 3, 4, 5], numericNumber); // 15
 * product([1, 2, 3, 4], numericNumber); // 24
 * pow(2, 10, numericNumber); // 1024
 * ```
 */

import type { Numeric, Fractional } from "./index.js";

// ============================================================================
// Aggregation Operations
// ============================================================================

/**
 * Sum all elements in an iterable.
 *
 * @returns The sum of all elements, or zero() if empty
 */
export function sum<A>(xs: Iterable<A>, N: Numeric<A>): A {
  let acc = N.zero();
  for (const x of xs) {
    acc = N.add(acc, x);
  }
  return acc;
}

/**
 * Multiply all elements in an iterable.
 *
 * @returns The product of all elements, or one() if empty
 */
export function product<A>(xs: Iterable<A>, N: Numeric<A>): A {
  let acc = N.one();
  for (const x of xs) {
    acc = N.mul(acc, x);
  }
  return acc;
}

// ============================================================================
// Exponentiation
// ============================================================================

/**
 * Raise base to a non-negative integer power using repeated squaring.
 * O(log n) multiplications.
 *
 * @throws RangeError if exp is negative or not an integer
 */
export function pow<A>(base: A, exp: number, N: Numeric<A>): A {
  if (exp < 0 || !Number.isInteger(exp)) {
    throw new RangeError("pow: exponent must be a non-negative integer");
  }
  if (exp === 0) return N.one();
  if (exp === 1) return base;

  let result = N.one();
  let b = base;
  let e = exp;

  while (e > 0) {
    if (e % 2 === 1) {
      result = N.mul(result, b);
    }
    e = Math.floor(e / 2);
    if (e > 0) b = N.mul(b, b);
  }

  return result;
}

/**
 * Raise base to an integer power (can be negative for Fractional types).
 */
export function powFrac<A>(base: A, exp: number, N: Numeric<A>, F: Fractional<A>): A {
  if (exp >= 0) {
    return pow(base, exp, N);
  }
  return F.recip(pow(base, -exp, N));
}

/**
 * Angle reduction and unit conversion.
 *
 * Degree and gradian angles are reduced exactly (decimal `mod` is exact),
 * so multiples of a right angle are recognised before any series runs.
 */

import type { AngularUnit } from "@transcend/core";
import type { Real } from "@transcend/std";

/** Index of a right-angle multiple: 0°, 90°, 180°, 270°. */
export type Quadrant = 0 | 1 | 2 | 3;

/** Exact function values at the four right-angle multiples. */
export type QuadrantTable = readonly [number, number, number, number];

export const SIN_QUADRANTS: QuadrantTable = [0, 1, 0, -1];
export const COS_QUADRANTS: QuadrantTable = [1, 0, -1, 0];
export const TAN_QUADRANTS: QuadrantTable = [0, NaN, 0, NaN];

export interface ReducedAngle<A> {
  /** Radians in (−π, π]; NaN for a non-finite angle */
  readonly radians: A;
  /** Set when the angle is an exact multiple of a right angle */
  readonly quadrant?: Quadrant;
}

const CIRCLE = { degrees: 360, gradians: 400 } as const;

/**
 * Reduce `x` (in `unit`) to radians in (−π, π].
 *
 * The remainder keeps the sign of `x`; a full circle is added or taken
 * away only to bring it within half a turn, so tiny angles stay tiny.
 *
 * @param pi - π at the precision of the instance it is given
 */
export function reduceAngle<A>(
  W: Real<A>,
  x: A,
  unit: AngularUnit,
  pi: (R: Real<A>) => A
): ReducedAngle<A> {
  if (W.isSpecial(x)) return { radians: W.nan() };

  if (unit === "radians") {
    // x mod 2π cancels exponent(x) leading digits; π carries that many more.
    const e = W.exponent(x);
    const X = e > 0 ? W.withDigits(W.digits + e) : W;
    const halfTurn = pi(X);
    const twoPi = X.add(halfTurn, halfTurn);
    let fm = X.mod(x, twoPi);
    if (X.isZero(fm)) return { radians: W.zero(), quadrant: 0 };
    if (X.greaterThan(fm, halfTurn)) fm = X.sub(fm, twoPi);
    else if (X.lessThanOrEqual(fm, X.negate(halfTurn))) fm = X.add(fm, twoPi);
    return { radians: W.from(fm) };
  }

  const size = CIRCLE[unit];
  const circle = W.fromInt(size);
  const half = W.fromInt(size / 2);

  // Exact: |fm| < circle, and a shift by one circle stays within it.
  let fm = W.mod(x, circle);
  if (W.greaterThan(fm, half)) fm = W.sub(fm, circle);
  else if (W.lessThanOrEqual(fm, W.negate(half))) fm = W.add(fm, circle);

  const radians = W.div(W.mul(fm, pi(W)), half);
  if (!W.isZero(W.mod(fm, W.fromInt(size / 4)))) return { radians };

  const quadrant: Quadrant = W.isZero(fm)
    ? 0
    : W.equals(fm, half)
      ? 2
      : W.isNegative(fm)
        ? 3
        : 1;
  return { radians, quadrant };
}

/** Express an angle given in radians in `unit`. */
export function fromRadians<A>(
  W: Real<A>,
  radians: A,
  unit: AngularUnit,
  pi: (R: Real<A>) => A
): A {
  if (unit === "radians") return radians;
  return W.div(W.mul(radians, W.fromInt(CIRCLE[unit])), W.mul(W.fromInt(2), pi(W)));
}

export function quadrantValue<A>(R: Real<A>, table: QuadrantTable, quadrant: Quadrant): A {
  const value = table[quadrant];
  return Number.isNaN(value) ? R.nan() : R.fromInt(value);
}

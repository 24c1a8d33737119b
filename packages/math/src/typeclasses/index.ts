/**
 * @transcend/math typeclasses
 *
 * Transcendental and special functions layered over a `Real`.
 */

import type { AngularUnit, ExhaustedPolicy } from "@transcend/core";
import type { Real } from "@transcend/std";

/** Sine and cosine of one angle, from a single series pass. */
export interface SinCos<A> {
  readonly sin: A;
  readonly cos: A;
}

/**
 * Transcendental typeclass - a `Real` extended with every function the
 * library derives from its primitives.
 *
 * Angle-taking functions read their argument in `unit` (default: the
 * instance's `unit`); inverse functions answer in it. Results are rounded
 * to `digits`; intermediate work runs at higher precision.
 *
 * Laws:
 * - `sin(x)² + cos(x)² ≈ 1`
 * - `asin(sin(x)) ≈ x` for `x` within a quarter turn of zero
 * - `gamma(n + 1) = n · gamma(n)`
 *
 * @typeclass
 */
export interface Transcendental<A> extends Real<A> {
  readonly unit: AngularUnit;
  readonly limit: number;
  readonly exhausted: ExhaustedPolicy;
  withDigits(digits: number): Transcendental<A>;

  /** π at this precision */
  pi(): A;

  sin(x: A, unit?: AngularUnit): A;
  cos(x: A, unit?: AngularUnit): A;
  tan(x: A, unit?: AngularUnit): A;
  sinCos(x: A, unit?: AngularUnit): SinCos<A>;
  asin(x: A, unit?: AngularUnit): A;
  acos(x: A, unit?: AngularUnit): A;
  atan(x: A, unit?: AngularUnit): A;
  atan2(y: A, x: A, unit?: AngularUnit): A;

  sinh(x: A): A;
  cosh(x: A): A;
  tanh(x: A): A;
  asinh(x: A): A;
  acosh(x: A): A;
  atanh(x: A): A;

  /** e^x − 1 without cancellation near zero */
  expm1(x: A): A;
  /** ln(1 + x) without cancellation near zero */
  ln1p(x: A): A;
  /** Logarithm of `x` to `base` */
  log(x: A, base: A): A;

  gamma(t: A): A;
  factorial(n: A): A;
  permutation(x: A, y: A): A;
  combination(x: A, y: A): A;
}

export interface TranscendentalOptions {
  /** Default angular unit (default: `angles.unit` from config) */
  unit?: AngularUnit;
  /** Iteration cap for convergence loops (default: `series.limit` from config) */
  limit?: number;
  /** Result of a non-converged loop (default: `series.exhausted` from config) */
  exhausted?: ExhaustedPolicy;
}

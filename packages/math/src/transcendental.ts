/**
 * Transcendental Instances
 *
 * `transcendental(R)` extends any `Real` with the trigonometric,
 * hyperbolic and gamma families. The unit, iteration cap and exhaustion
 * policy are read from config once and captured; the returned instance
 * never consults shared state again.
 *
 * @example
 * ```typescript
 * const T = transcendental(realDecimal({ digits: 40 }), { unit: "radians" });
 * T.display(T.sin(T.div(T.pi(), T.fromInt(6))));   // "0.5"
 *
 * const T50 = T.withDigits(50);                     // same options, more digits
 * ```
 */

import { config, invariant } from "@transcend/core";
import type { Real } from "@transcend/std";
import type { Decimal } from "decimal.js";
import { createContext, type MathContext } from "./context.js";
import { combination, factorial, gamma, permutation } from "./special/gamma.js";
import {
  acosh,
  asinh,
  atanh,
  cosh,
  expm1,
  ln1p,
  log,
  sinh,
  tanh,
} from "./trig/hyperbolic.js";
import { acos, asin, atan, atan2, sinCos, tan } from "./trig/trigonometric.js";
import type { Transcendental, TranscendentalOptions } from "./typeclasses/index.js";
import { realDecimal, type DecimalOptions } from "./types/decimal.js";

export function transcendental<A>(
  R: Real<A>,
  options: TranscendentalOptions = {}
): Transcendental<A> {
  const defaults = config.resolved();
  const unit = options.unit ?? defaults.angles.unit;
  const limit = options.limit ?? defaults.series.limit;
  const exhausted = options.exhausted ?? defaults.series.exhausted;
  invariant(Number.isInteger(limit) && limit > 0, `limit must be a positive integer, got ${limit}`);

  return build(R, createContext<A>(unit, limit, exhausted));
}

/**
 * Transcendental instance over decimal.js values.
 */
export function decimalMath(
  options: DecimalOptions & TranscendentalOptions = {}
): Transcendental<Decimal> {
  const { digits, rounding, ...rest } = options;
  return transcendental(realDecimal({ digits, rounding }), rest);
}

function build<A>(R: Real<A>, ctx: MathContext<A>): Transcendental<A> {
  return {
    ...R,
    unit: ctx.unit,
    limit: ctx.limit,
    exhausted: ctx.exhausted,
    withDigits: (digits) => build(R.withDigits(digits), ctx),

    pi: () => ctx.pi(R),

    sin: (x, unit) => sinCos(ctx, R, x, unit).sin,
    cos: (x, unit) => sinCos(ctx, R, x, unit).cos,
    tan: (x, unit) => tan(ctx, R, x, unit),
    sinCos: (x, unit) => sinCos(ctx, R, x, unit),
    asin: (x, unit) => asin(ctx, R, x, unit),
    acos: (x, unit) => acos(ctx, R, x, unit),
    atan: (x, unit) => atan(ctx, R, x, unit),
    atan2: (y, x, unit) => atan2(ctx, R, y, x, unit),

    sinh: (x) => sinh(R, x),
    cosh: (x) => cosh(R, x),
    tanh: (x) => tanh(R, x),
    asinh: (x) => asinh(R, x),
    acosh: (x) => acosh(R, x),
    atanh: (x) => atanh(R, x),

    expm1: (x) => expm1(R, x),
    ln1p: (x) => ln1p(R, x),
    log: (x, base) => log(R, x, base),

    gamma: (t) => gamma(ctx, R, t),
    factorial: (n) => factorial(ctx, R, n),
    permutation: (x, y) => permutation(ctx, R, x, y),
    combination: (x, y) => combination(ctx, R, x, y),
  };
}

/**
 * Trigonometric and inverse trigonometric functions.
 *
 * Every function works at guard precision and rounds its answer to the
 * `Real` it was given.
 */

import type { AngularUnit } from "@transcend/core";
import type { Real } from "@transcend/std";
import { guardDigits, type MathContext } from "../context.js";
import type { SinCos } from "../typeclasses/index.js";
import {
  COS_QUADRANTS,
  SIN_QUADRANTS,
  TAN_QUADRANTS,
  fromRadians,
  quadrantValue,
  reduceAngle,
} from "./angle.js";
import { atanKernel, taylorSinCos } from "./series.js";

function working<A>(R: Real<A>): Real<A> {
  return R.withDigits(guardDigits(R.digits));
}

export function sinCos<A>(
  ctx: MathContext<A>,
  R: Real<A>,
  x: A,
  unit: AngularUnit = ctx.unit
): SinCos<A> {
  const W = working(R);
  const { radians, quadrant } = reduceAngle(W, x, unit, ctx.pi);
  if (quadrant !== undefined) {
    return {
      sin: quadrantValue(R, SIN_QUADRANTS, quadrant),
      cos: quadrantValue(R, COS_QUADRANTS, quadrant),
    };
  }
  if (W.isNaN(radians)) return { sin: R.nan(), cos: R.nan() };

  const result = taylorSinCos(W, radians, ctx.limit);
  return {
    sin: ctx.settle(R, "sin", result.sin),
    cos: ctx.settle(R, "cos", result.cos),
  };
}

export function tan<A>(ctx: MathContext<A>, R: Real<A>, x: A, unit: AngularUnit = ctx.unit): A {
  const W = working(R);
  const { radians, quadrant } = reduceAngle(W, x, unit, ctx.pi);
  if (quadrant !== undefined) return quadrantValue(R, TAN_QUADRANTS, quadrant);
  if (W.isNaN(radians)) return R.nan();

  const result = taylorSinCos(W, radians, ctx.limit);
  const s = ctx.settle(W, "tan", result.sin);
  const c = ctx.settle(W, "tan", result.cos);
  return R.from(W.div(s, c));
}

// ============================================================================
// Inverse functions (radians at working precision)
// ============================================================================

function halfPi<A>(ctx: MathContext<A>, W: Real<A>): A {
  return W.div(ctx.pi(W), W.fromInt(2));
}

/** Principal arctangent in (−π/2, π/2). */
function atanRadians<A>(ctx: MathContext<A>, W: Real<A>, x: A): A {
  if (W.isNaN(x)) return W.nan();
  if (W.isInfinite(x)) {
    const h = halfPi(ctx, W);
    return W.isNegative(x) ? W.negate(h) : h;
  }
  if (W.isZero(x)) return x;

  let a = W.abs(x);
  const invert = W.greaterThan(a, W.one());
  if (invert) a = W.div(W.one(), a);

  let res = ctx.settle(W, "atan", atanKernel(W, a, ctx.limit));
  if (invert) res = W.sub(halfPi(ctx, W), res);
  return W.isNegative(x) ? W.negate(res) : res;
}

function atan2Radians<A>(ctx: MathContext<A>, W: Real<A>, y: A, x: A): A {
  if (W.isNaN(x) || W.isNaN(y)) return W.nan();
  const yneg = W.isNegative(y);
  const xneg = W.isNegative(x);
  const signed = (v: A): A => (yneg ? W.negate(v) : v);
  const pi = ctx.pi(W);

  if (W.isZero(y)) {
    // ±0 keeps the sign of y; a negative x (including −0) turns it into ±π.
    return xneg ? signed(pi) : y;
  }
  if (W.isZero(x)) return signed(halfPi(ctx, W));
  if (W.isInfinite(x)) {
    if (W.isInfinite(y)) {
      return signed(W.mul(pi, W.fromString(xneg ? "0.75" : "0.25")));
    }
    return xneg ? signed(pi) : signed(W.zero());
  }
  if (W.isInfinite(y)) return signed(halfPi(ctx, W));

  const r = atanRadians(ctx, W, W.div(y, x));
  const at = xneg ? W.add(r, signed(pi)) : r;
  return W.isZero(at) && yneg ? W.negate(at) : at;
}

// ============================================================================
// Public inverse functions
// ============================================================================

export function atan<A>(ctx: MathContext<A>, R: Real<A>, x: A, unit: AngularUnit = ctx.unit): A {
  const W = working(R);
  return R.from(fromRadians(W, atanRadians(ctx, W, x), unit, ctx.pi));
}

export function atan2<A>(
  ctx: MathContext<A>,
  R: Real<A>,
  y: A,
  x: A,
  unit: AngularUnit = ctx.unit
): A {
  const W = working(R);
  return R.from(fromRadians(W, atan2Radians(ctx, W, y, x), unit, ctx.pi));
}

/** `asin(x) = 2·atan(x / (1 + √(1 − x²)))`; NaN outside [−1, 1]. */
export function asin<A>(ctx: MathContext<A>, R: Real<A>, x: A, unit: AngularUnit = ctx.unit): A {
  if (R.isNaN(x) || R.greaterThan(R.abs(x), R.one())) return R.nan();
  const W = working(R);
  const one = W.one();

  const z = W.div(x, W.add(one, W.sqrt(W.sub(one, W.mul(x, x)))));
  const half = atanRadians(ctx, W, z);
  return R.from(fromRadians(W, W.add(half, half), unit, ctx.pi));
}

/** `acos(x) = 2·atan((1 − x) / √(1 − x²))`; NaN outside [−1, 1]. */
export function acos<A>(ctx: MathContext<A>, R: Real<A>, x: A, unit: AngularUnit = ctx.unit): A {
  if (R.isNaN(x) || R.greaterThan(R.abs(x), R.one())) return R.nan();
  if (R.equals(x, R.one())) return R.zero();
  const W = working(R);
  const one = W.one();

  const z = W.div(W.sub(one, x), W.sqrt(W.sub(one, W.mul(x, x))));
  const half = atanRadians(ctx, W, z);
  return R.from(fromRadians(W, W.add(half, half), unit, ctx.pi));
}

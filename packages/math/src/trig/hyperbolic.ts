/**
 * Hyperbolic and inverse hyperbolic functions, built on `exp`, `ln`
 * and `sqrt` alone.
 */

import type { Real } from "@transcend/std";
import { guardDigits } from "../context.js";

function working<A>(R: Real<A>): Real<A> {
  return R.withDigits(guardDigits(R.digits));
}

/** e^x − 1 at the precision of `W` (Kahan's correction). */
function expm1At<A>(W: Real<A>, x: A): A {
  if (W.isInfinite(x)) return W.isNegative(x) ? W.negate(W.one()) : x;
  const u = W.exp(x);
  if (W.isInfinite(u)) return u;
  const v = W.sub(u, W.one());
  if (W.isZero(v)) return x;
  if (W.equals(v, W.negate(W.one()))) return v;
  return W.div(W.mul(v, x), W.ln(u));
}

/** ln(1 + x) at the precision of `W`. */
function ln1pAt<A>(W: Real<A>, x: A): A {
  if (W.isInfinite(x)) return W.isNegative(x) ? W.nan() : x;
  const u = W.add(W.one(), x);
  const v = W.sub(u, W.one());
  if (W.isZero(v)) return x;
  return W.div(W.mul(W.ln(u), x), v);
}

export function expm1<A>(R: Real<A>, x: A): A {
  return R.from(expm1At(working(R), x));
}

export function ln1p<A>(R: Real<A>, x: A): A {
  return R.from(ln1pAt(working(R), x));
}

export function sinh<A>(R: Real<A>, x: A): A {
  if (R.isSpecial(x)) return x;
  const W = working(R);

  if (W.lessThan(W.abs(x), W.fromString("0.5"))) {
    // (e^x − 1)(e^x + 1) / 2e^x, with u = e^x − 1
    const u = expm1At(W, x);
    return R.from(W.div(W.mul(u, W.add(u, W.fromInt(2))), W.mul(W.fromInt(2), W.add(u, W.one()))));
  }
  const e = W.exp(x);
  return R.from(W.div(W.sub(e, W.recip(e)), W.fromInt(2)));
}

export function cosh<A>(R: Real<A>, x: A): A {
  if (R.isNaN(x)) return x;
  if (R.isInfinite(x)) return R.infinity();
  const W = working(R);
  const e = W.exp(x);
  return R.from(W.div(W.add(e, W.recip(e)), W.fromInt(2)));
}

/**
 * Magnitude past which tanh rounds to ±1 at `digits`:
 * 1 − tanh(x) ≈ 2e^(−2x) is below half an ulp once x > digits·ln(10)/2.
 */
function tanhSaturation(digits: number): number {
  return Math.max(100, (digits * Math.LN10) / 2 + 2);
}

export function tanh<A>(R: Real<A>, x: A): A {
  if (R.isNaN(x)) return x;
  if (R.greaterThan(R.abs(x), R.fromNumber(tanhSaturation(R.digits)))) {
    return R.isNegative(x) ? R.negate(R.one()) : R.one();
  }
  const W = working(R);
  const u = expm1At(W, W.add(x, x));
  return R.from(W.div(u, W.add(u, W.fromInt(2))));
}

/** `asinh(x) = ln1p(x·(x / (√(x² + 1) + 1) + 1))`, evaluated on |x|. */
export function asinh<A>(R: Real<A>, x: A): A {
  if (R.isSpecial(x)) return x;
  const W = working(R);
  const one = W.one();
  const a = W.abs(x);

  const inner = W.add(W.div(a, W.add(W.sqrt(W.add(W.mul(a, a), one)), one)), one);
  const res = ln1pAt(W, W.mul(a, inner));
  return R.from(W.isNegative(x) ? W.negate(res) : res);
}

/** `acosh(x) = ln(x + √(x² − 1))`; NaN below 1. */
export function acosh<A>(R: Real<A>, x: A): A {
  if (R.isNaN(x) || R.lessThan(x, R.one())) return R.nan();
  const W = working(R);
  return R.from(W.ln(W.add(x, W.sqrt(W.sub(W.mul(x, x), W.one())))));
}

/** `atanh(x) = ln1p(2x / (1 − x)) / 2`; ±Infinity at ±1, NaN beyond. */
export function atanh<A>(R: Real<A>, x: A): A {
  if (R.isNaN(x)) return x;
  const a = R.abs(x);
  if (R.equals(a, R.one())) return R.infinity(R.isNegative(x) ? -1 : 1);
  if (R.greaterThan(a, R.one())) return R.nan();

  const W = working(R);
  const res = ln1pAt(W, W.div(W.add(x, x), W.sub(W.one(), x)));
  return R.from(W.div(res, W.fromInt(2)));
}

/** Logarithm of `x` to `base`. */
export function log<A>(R: Real<A>, x: A, base: A): A {
  const W = working(R);
  return R.from(W.div(W.ln(x), W.ln(base)));
}

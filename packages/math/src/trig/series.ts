/**
 * Convergence-driven series.
 *
 * Each loop stops when adding the next term leaves the partial sum
 * unchanged at the working precision, or when `limit` iterations have
 * run. Callers decide what a non-converged result means.
 *
 * Arguments are first shrunk in proportion to the working precision, so
 * the default cap is enough at any number of digits.
 */

import type { Real } from "@transcend/std";
import type { SeriesResult } from "../context.js";

export interface SinCosSeries<A> {
  readonly sin: SeriesResult<A>;
  readonly cos: SeriesResult<A>;
}

/** Iterations a reduced argument needs, at most, to converge. */
const TERM_BUDGET = 250;

/**
 * Number of times to halve an angle in (−π, π] so the Taylor series
 * converges within `TERM_BUDGET` iterations. After n iterations the term is
 * x^2n / (2n)!, below 10^−digits once
 * log10(1/x) ≥ digits/2n − log10(2n/e).
 */
export function sinCosHalvings(digits: number): number {
  const steps = 2 * TERM_BUDGET;
  const excess = digits / steps - Math.log10(steps / Math.E) + Math.log10(Math.PI);
  return excess > 0 ? Math.ceil(excess / Math.log10(2)) : 0;
}

/**
 * Decimal exponent `k` such that reducing the arctangent argument to at
 * most 10^−k lets its series converge within `TERM_BUDGET` iterations.
 */
export function atanReduction(digits: number): number {
  return Math.max(1, Math.ceil(digits / (2 * TERM_BUDGET)));
}

/**
 * Sine and cosine of `x` (radians in (−π, π]).
 *
 * At high precision `x` is halved `sinCosHalvings(digits)` times and the
 * results doubled back with sin 2θ = 2·sin θ·cos θ, cos 2θ = 1 − 2·sin²θ.
 */
export function taylorSinCos<A>(W: Real<A>, x: A, limit: number): SinCosSeries<A> {
  const halvings = sinCosHalvings(W.digits);
  if (halvings === 0) return sinCosSeries(W, x, limit);

  const scale = W.pow(W.fromInt(2), W.fromInt(halvings));
  const reduced = sinCosSeries(W, W.div(x, scale), limit);
  const converged = reduced.sin.converged && reduced.cos.converged;
  const iterations = Math.max(reduced.sin.iterations, reduced.cos.iterations);

  const one = W.one();
  let s = reduced.sin.value;
  let c = reduced.cos.value;
  for (let k = 0; k < halvings; k++) {
    const twice = W.add(s, s);
    [s, c] = [W.mul(twice, c), W.sub(one, W.mul(twice, s))];
  }

  return {
    sin: { value: s, converged, iterations },
    cos: { value: c, converged, iterations },
  };
}

/**
 * Taylor series for sine and cosine.
 *
 * One running term `t = x^2k / n!` feeds both sums: dividing by the next
 * even integer gives the cosine term, by the following odd integer the
 * sine term (less a factor of `x`). Each sum stops on its own.
 */
function sinCosSeries<A>(W: Real<A>, x: A, limit: number): SinCosSeries<A> {
  const x2 = W.mul(x, x);
  let t = W.one();
  let s = W.one();
  let c = W.one();
  let sinDone = false;
  let cosDone = false;
  let sinIterations = 0;
  let cosIterations = 0;
  let negative = true;

  for (let i = 1, j = 1; i <= limit && !(sinDone && cosDone); i++, j += 2) {
    t = W.div(W.mul(t, x2), W.fromInt(j + 1));
    if (!cosDone) {
      const next = negative ? W.sub(c, t) : W.add(c, t);
      cosIterations = i;
      if (W.equals(next, c)) cosDone = true;
      else c = next;
    }

    t = W.div(t, W.fromInt(j + 2));
    if (!sinDone) {
      const next = negative ? W.sub(s, t) : W.add(s, t);
      sinIterations = i;
      if (W.equals(next, s)) sinDone = true;
      else s = next;
    }

    negative = !negative;
  }

  return {
    sin: { value: W.mul(s, x), converged: sinDone, iterations: sinIterations },
    cos: { value: c, converged: cosDone, iterations: cosIterations },
  };
}

/**
 * Arctangent of `a` for 0 ≤ a ≤ 1, in radians. Needs no π.
 *
 * The argument is halved with `a / (1 + √(1 + a²))` until it is at most
 * 10^−k, k = `atanReduction(digits)`; the series `a·(1 − a²/3 + a⁴/5 − …)`
 * is summed and the result doubled once per halving.
 */
export function atanKernel<A>(W: Real<A>, a: A, limit: number): SeriesResult<A> {
  const one = W.one();
  const threshold = W.fromString(`1e-${atanReduction(W.digits)}`);

  let doubles = 0;
  while (W.greaterThan(a, threshold)) {
    a = W.div(a, W.add(one, W.sqrt(W.add(one, W.mul(a, a)))));
    doubles++;
  }

  const a2 = W.mul(a, a);
  let power = a2;
  let res = W.sub(one, W.div(a2, W.fromInt(3)));
  let positive = true;
  let converged = false;
  let iterations = 0;

  for (let j = 5; iterations < limit; j += 2) {
    iterations++;
    power = W.mul(power, a2);
    const term = W.div(power, W.fromInt(j));
    const next = positive ? W.add(res, term) : W.sub(res, term);
    if (W.equals(next, res)) {
      converged = true;
      break;
    }
    res = next;
    positive = !positive;
  }

  let value = W.mul(res, a);
  for (; doubles > 0; doubles--) {
    value = W.add(value, value);
  }
  return { value, converged, iterations };
}

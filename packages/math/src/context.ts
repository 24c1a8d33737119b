/**
 * Computation Context
 *
 * The immutable settings a family of transcendental functions shares:
 * default unit, iteration cap, exhaustion policy, and a π cache. Built
 * once per `transcendental()` call; nothing here is process-global.
 */

import {
  ConvergenceError,
  createLogger,
  unreachable,
  type AngularUnit,
  type ExhaustedPolicy,
} from "@transcend/core";
import type { Real } from "@transcend/std";
import { machinPi } from "./trig/constants.js";

const log = createLogger("series");

/** Outcome of a convergence loop. */
export interface SeriesResult<A> {
  readonly value: A;
  readonly converged: boolean;
  readonly iterations: number;
}

export interface MathContext<A> {
  readonly unit: AngularUnit;
  readonly limit: number;
  readonly exhausted: ExhaustedPolicy;
  /** π rounded to the precision of `R` */
  pi(R: Real<A>): A;
  /**
   * Round a loop's value to `R`, or apply the exhaustion policy when the
   * loop hit its cap.
   */
  settle(R: Real<A>, operation: string, result: SeriesResult<A>): A;
}

/**
 * Working precision for a computation whose result is wanted at `digits`.
 */
export function guardDigits(digits: number): number {
  return Math.max(Math.ceil(digits * 1.5), digits + 10);
}

export function createContext<A>(
  unit: AngularUnit,
  limit: number,
  exhausted: ExhaustedPolicy
): MathContext<A> {
  const piCache = new Map<string, A>();

  const settle = (R: Real<A>, operation: string, result: SeriesResult<A>): A => {
    if (result.converged) return R.from(result.value);

    switch (exhausted) {
      case "partial":
        log.debug(`${operation}: returning partial sum after ${result.iterations} iterations`);
        return R.from(result.value);
      case "nan":
        log.warn(`${operation}: no convergence after ${result.iterations} iterations`);
        return R.nan();
      case "throw":
        throw new ConvergenceError(operation, result.iterations);
      default:
        return unreachable(exhausted);
    }
  };

  const pi = (R: Real<A>): A => {
    const key = `${R.digits}:${R.rounding}`;
    let value = piCache.get(key);
    if (value === undefined) {
      value = settle(R, "pi", machinPi(R.withDigits(guardDigits(R.digits)), limit));
      piCache.set(key, value);
    }
    return value;
  };

  return { unit, limit, exhausted, pi, settle };
}

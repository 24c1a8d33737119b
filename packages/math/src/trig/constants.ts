import type { Real } from "@transcend/std";
import type { SeriesResult } from "../context.js";
import { atanKernel } from "./series.js";

/**
 * π by Machin's formula, `16·atan(1/5) − 4·atan(1/239)`, at the precision
 * of `W`.
 */
export function machinPi<A>(W: Real<A>, limit: number): SeriesResult<A> {
  const fifth = atanKernel(W, W.div(W.one(), W.fromInt(5)), limit);
  const small = atanKernel(W, W.div(W.one(), W.fromInt(239)), limit);

  return {
    value: W.sub(W.mul(W.fromInt(16), fifth.value), W.mul(W.fromInt(4), small.value)),
    converged: fifth.converged && small.converged,
    iterations: fifth.iterations + small.iterations,
  };
}

/**
 * @transcend/math — Transcendental and Special Functions
 *
 * This package provides:
 * - **Decimal reals**: `realDecimal`, a `Real` instance over decimal.js
 * - **Transcendental**: sin, cos, tan and inverses, hyperbolic functions
 *   and inverses, expm1/ln1p, π, gamma and combinatorics for any `Real`
 * - **Complex**: `complexOps`, complex algebra over any `Transcendental`
 *
 * Precision is carried by the instance, never by global state: ask an
 * instance for another with `withDigits`.
 *
 * @example
 * ```typescript
 * import { decimalMath, complexOps } from "@transcend/math";
 *
 * const T = decimalMath({ digits: 34 });
 * T.display(T.pi());                         // "3.141592653589793238462643383279503"
 * T.display(T.sin(T.fromInt(90)));           // "1" (degrees by default)
 *
 * const C = complexOps(T);
 * C.display(C.sqrt(C.fromString("-4")));     // "2i"
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Typeclasses
// ============================================================================

export {
  type Transcendental,
  type TranscendentalOptions,
  type SinCos,
} from "./typeclasses/index.js";

// ============================================================================
// Instances
// ============================================================================

export { transcendental, decimalMath } from "./transcendental.js";
export { realDecimal, type DecimalOptions } from "./types/decimal.js";

// ============================================================================
// Complex Numbers
// ============================================================================

export { complexOps, type Complex, type ComplexOps } from "./types/complex.js";

// ============================================================================
// Building blocks
// ============================================================================

export { guardDigits, createContext, type MathContext, type SeriesResult } from "./context.js";
export {
  reduceAngle,
  fromRadians,
  type Quadrant,
  type ReducedAngle,
} from "./trig/angle.js";
export {
  taylorSinCos,
  atanKernel,
  sinCosHalvings,
  atanReduction,
  type SinCosSeries,
} from "./trig/series.js";
export { machinPi } from "./trig/constants.js";
export { spougeTerms } from "./special/gamma.js";

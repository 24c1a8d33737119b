/**
 * Arbitrary-Precision Decimal Reals
 *
 * `Real` instance backed by decimal.js. Each precision gets its own
 * `Decimal.clone`, so values never depend on a shared global context:
 * the instance's constructor rounds every result to `digits` significant
 * digits.
 *
 * @example
 * ```typescript
 * const R = realDecimal({ digits: 50 });
 * R.display(R.sqrt(R.fromInt(2)));
 * // "1.4142135623730950488016887242096980785696718753769"
 * ```
 */

import { Decimal } from "decimal.js";
import { config, invariant, type RoundingMode } from "@transcend/core";
import { EQ_ORD, GT, LT, type Real } from "@transcend/std";

export interface DecimalOptions {
  /** Significant digits (default: `precision.digits` from config) */
  digits?: number;
  /** Rounding mode (default: `precision.rounding` from config) */
  rounding?: RoundingMode;
}

const ROUNDING: Record<RoundingMode, Decimal.Rounding> = {
  up: 0,
  down: 1,
  ceil: 2,
  floor: 3,
  "half-up": 4,
  "half-down": 5,
  "half-even": 6,
  "half-ceil": 7,
  "half-floor": 8,
};

/** Truncated remainder: `mod` takes the sign of the dividend. */
const MODULO_TRUNCATED: Decimal.Modulo = 1;

/** Finite radix-10 numerals plus the special values decimal.js prints. */
const NUMERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$|^[+-]?Infinity$|^NaN$/i;

const instances = new Map<string, Real<Decimal>>();

/**
 * Get the `Real<Decimal>` instance for a precision and rounding mode.
 * Instances are memoised, so repeated `withDigits` calls are cheap.
 */
export function realDecimal(options: DecimalOptions = {}): Real<Decimal> {
  const defaults = config.resolved().precision;
  const digits = options.digits ?? defaults.digits;
  const rounding = options.rounding ?? defaults.rounding;
  invariant(
    Number.isInteger(digits) && digits > 0 && digits <= 1e9,
    `digits must be an integer in [1, 1e9], got ${digits}`
  );

  const key = `${digits}:${rounding}`;
  let instance = instances.get(key);
  if (!instance) {
    instance = makeRealDecimal(digits, rounding);
    instances.set(key, instance);
  }
  return instance;
}

function makeRealDecimal(digits: number, rounding: RoundingMode): Real<Decimal> {
  const rm = ROUNDING[rounding];
  const D = Decimal.clone({
    precision: digits,
    rounding: rm,
    modulo: MODULO_TRUNCATED,
    toExpNeg: -7,
    toExpPos: 21,
  });

  // The constructor copies without rounding.
  const round = (x: Decimal.Value): Decimal => new D(x).toSD(digits, rm);

  // decimal.js spells its special values one way only.
  const numeral = (text: string): Decimal =>
    round(text.replace(/infinity$/i, "Infinity").replace(/^nan$/i, "NaN"));

  const fromString = (s: string): Decimal => {
    const trimmed = s.trim();
    return NUMERAL.test(trimmed) ? numeral(trimmed) : new D(NaN);
  };

  const R: Real<Decimal> = {
    digits,
    rounding,
    withDigits: (n) => (n === digits ? R : realDecimal({ digits: n, rounding })),

    add: (a, b) => new D(a).plus(b),
    sub: (a, b) => new D(a).minus(b),
    mul: (a, b) => new D(a).times(b),
    div: (a, b) => new D(a).div(b),
    pow: (a, b) => new D(a).pow(b),
    negate: (a) => new D(a).neg(),
    abs: (a) => new D(a).abs(),
    signum: (a) => new D(D.sign(a)),
    recip: (a) => new D(1).div(a),
    fromRational: (num, den) => new D(num).div(den),

    sqrt: (a) => new D(a).sqrt(),
    exp: (a) => new D(a).exp(),
    ln: (a) => new D(a).ln(),
    log10: (a) => new D(a).log(10),
    hypot: (a, b) => D.hypot(a, b),
    mod: (a, b) => new D(a).mod(b),
    trunc: (a) => new D(a).trunc(),

    equals: (a, b) => a.eq(b),
    notEquals: (a, b) => !a.isNaN() && !b.isNaN() && !a.eq(b),
    compare: (a, b) => {
      const c = a.cmp(b);
      return c < 0 ? LT : c > 0 ? GT : EQ_ORD;
    },
    lessThan: (a, b) => a.lt(b),
    lessThanOrEqual: (a, b) => a.lte(b),
    greaterThan: (a, b) => a.gt(b),
    greaterThanOrEqual: (a, b) => a.gte(b),

    isZero: (a) => a.isZero(),
    isNegative: (a) => a.isNeg(),
    isInteger: (a) => a.isInt(),
    isNaN: (a) => a.isNaN(),
    isInfinite: (a) => !a.isFinite() && !a.isNaN(),
    isFinite: (a) => a.isFinite(),
    isSpecial: (a) => !a.isFinite(),

    fromNumber: (n) => round(n),
    toNumber: (a) => a.toNumber(),
    fromInt: (n) => {
      invariant(typeof n === "bigint" || Number.isInteger(n), `fromInt: ${n} is not an integer`);
      return round(n.toString());
    },
    fromString,
    from: (a) => round(a),
    zero: () => new D(0),
    one: () => new D(1),
    nan: () => new D(NaN),
    infinity: (sign = 1) => new D(sign * Infinity),

    ulp: (a) => (a.isFinite() ? new D(`1e${R.exponent(a) - digits + 1}`) : new D(NaN)),
    exponent: (a) => (a.isFinite() && !a.isZero() ? a.e : 0),

    parse: (s) => {
      const trimmed = s.trim();
      if (!NUMERAL.test(trimmed)) {
        return { ok: false, error: `Cannot parse '${trimmed}' as decimal` };
      }
      return { ok: true, value: numeral(trimmed), rest: "" };
    },
    display: (a) => a.toString(),
  };

  return R;
}

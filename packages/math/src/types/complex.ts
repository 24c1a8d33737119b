/**
 * Complex Numbers
 *
 * Complex arithmetic over any `Transcendental` real type. Exponential,
 * logarithmic, trigonometric and hyperbolic functions are derived from the
 * real type's primitives through Euler's identity; angles are radians
 * throughout, whatever the real instance's default unit.
 *
 * @example
 * ```typescript
 * const C = complexOps(decimalMath({ digits: 30 }));
 * const z = C.fromString("3+4i");
 * C.display(C.conj(z));   // "3-4i"
 * C.display(C.ipow(C.complex(C.T.fromInt(1), C.T.fromInt(2)), 5)); // "41-38i"
 * ```
 */

import { ParseError } from "@transcend/core";
import {
  powFrac,
  type Floating,
  type Fractional,
  type Numeric,
  type ParseResult,
} from "@transcend/std";
import type { Transcendental } from "../typeclasses/index.js";

/**
 * Complex number with real and imaginary parts.
 */
export interface Complex<A> {
  readonly re: A;
  readonly im: A;
}

export interface ComplexOps<A> {
  /** The real type the components live in */
  readonly T: Transcendental<A>;

  complex(re: A, im?: A): Complex<A>;
  fromReal(re: A): Complex<A>;
  /** `r·(cos θ + i·sin θ)`, θ in radians */
  fromPolar(r: A, theta: A): Complex<A>;
  readonly I: Complex<A>;
  readonly ONE: Complex<A>;
  readonly ZERO: Complex<A>;

  real(z: Complex<A>): A;
  imag(z: Complex<A>): A;
  /** |z| = hypot(re, im) */
  abs(z: Complex<A>): A;
  /** Principal argument in (−π, π] */
  arg(z: Complex<A>): A;
  /** re² + im² */
  norm(z: Complex<A>): A;
  conj(z: Complex<A>): Complex<A>;
  /** Projection onto the Riemann sphere */
  proj(z: Complex<A>): Complex<A>;
  /** i·z */
  mulI(z: Complex<A>): Complex<A>;

  add(a: Complex<A>, b: Complex<A>): Complex<A>;
  sub(a: Complex<A>, b: Complex<A>): Complex<A>;
  mul(a: Complex<A>, b: Complex<A>): Complex<A>;
  div(a: Complex<A>, b: Complex<A>): Complex<A>;
  negate(z: Complex<A>): Complex<A>;
  scale(z: Complex<A>, k: A): Complex<A>;
  addReal(z: Complex<A>, x: A): Complex<A>;
  subReal(z: Complex<A>, x: A): Complex<A>;
  mulReal(z: Complex<A>, x: A): Complex<A>;
  divReal(z: Complex<A>, x: A): Complex<A>;

  exp(z: Complex<A>): Complex<A>;
  ln(z: Complex<A>): Complex<A>;
  log10(z: Complex<A>): Complex<A>;
  sqrt(z: Complex<A>): Complex<A>;
  cbrt(z: Complex<A>): Complex<A>;
  pow(base: Complex<A>, power: Complex<A>): Complex<A>;
  powReal(base: Complex<A>, power: A): Complex<A>;
  /** Integer power by repeated squaring */
  ipow(base: Complex<A>, n: number): Complex<A>;
  /** The `n` roots of `z`, principal root first */
  nthRoots(z: Complex<A>, n: number): Complex<A>[];
  rootsOfUnity(n: number): Complex<A>[];

  sin(z: Complex<A>): Complex<A>;
  cos(z: Complex<A>): Complex<A>;
  tan(z: Complex<A>): Complex<A>;
  asin(z: Complex<A>): Complex<A>;
  acos(z: Complex<A>): Complex<A>;
  atan(z: Complex<A>): Complex<A>;
  atan2(z: Complex<A>, w: Complex<A>): Complex<A>;
  sinh(z: Complex<A>): Complex<A>;
  cosh(z: Complex<A>): Complex<A>;
  tanh(z: Complex<A>): Complex<A>;
  asinh(z: Complex<A>): Complex<A>;
  acosh(z: Complex<A>): Complex<A>;
  atanh(z: Complex<A>): Complex<A>;

  equals(a: Complex<A>, b: Complex<A>): boolean;
  /** Equal, or magnitudes within two units in the last place */
  approxEquals(a: Complex<A>, b: Complex<A>): boolean;
  notApproxEquals(a: Complex<A>, b: Complex<A>): boolean;
  isReal(z: Complex<A>): boolean;

  parse(s: string): ParseResult<Complex<A>>;
  /** @throws ParseError */
  fromString(s: string): Complex<A>;
  display(z: Complex<A>): string;

  readonly numeric: Numeric<Complex<A>>;
  readonly fractional: Fractional<Complex<A>>;
  readonly floating: Floating<Complex<A>>;
}

/**
 * Build the complex operations over `T`.
 */
export function complexOps<A>(T: Transcendental<A>): ComplexOps<A> {
  const zero = T.zero();
  const one = T.one();
  const two = T.fromInt(2);

  const complex = (re: A, im: A = zero): Complex<A> => ({ re, im });
  const ZERO = complex(zero, zero);
  const ONE = complex(one, zero);
  const I = complex(zero, one);

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  const abs = (z: Complex<A>): A => T.hypot(z.re, z.im);
  const arg = (z: Complex<A>): A => T.atan2(z.im, z.re, "radians");
  const norm = (z: Complex<A>): A => T.add(T.mul(z.re, z.re), T.mul(z.im, z.im));
  const conj = (z: Complex<A>): Complex<A> => complex(z.re, T.negate(z.im));
  const mulI = (z: Complex<A>): Complex<A> => complex(T.negate(z.im), z.re);
  const isZero = (z: Complex<A>): boolean => T.isZero(z.re) && T.isZero(z.im);

  const proj = (z: Complex<A>): Complex<A> => {
    if (!T.isInfinite(z.re) && !T.isInfinite(z.im)) return z;
    return complex(T.infinity(), T.isNegative(z.im) ? T.negate(zero) : zero);
  };

  const fromPolar = (r: A, theta: A): Complex<A> => {
    const { sin, cos } = T.sinCos(theta, "radians");
    return complex(T.mul(r, cos), T.mul(r, sin));
  };

  // --------------------------------------------------------------------------
  // Arithmetic
  // --------------------------------------------------------------------------

  const add = (a: Complex<A>, b: Complex<A>): Complex<A> =>
    complex(T.add(a.re, b.re), T.add(a.im, b.im));

  const sub = (a: Complex<A>, b: Complex<A>): Complex<A> =>
    complex(T.sub(a.re, b.re), T.sub(a.im, b.im));

  const mul = (a: Complex<A>, b: Complex<A>): Complex<A> =>
    complex(
      T.sub(T.mul(a.re, b.re), T.mul(a.im, b.im)),
      T.add(T.mul(a.re, b.im), T.mul(a.im, b.re))
    );

  /** Smith's algorithm: scale by the larger component of the divisor. */
  const div = (a: Complex<A>, b: Complex<A>): Complex<A> => {
    if (T.greaterThanOrEqual(T.abs(b.re), T.abs(b.im))) {
      const r = T.div(b.im, b.re);
      const d = T.add(b.re, T.mul(b.im, r));
      return complex(
        T.div(T.add(a.re, T.mul(a.im, r)), d),
        T.div(T.sub(a.im, T.mul(a.re, r)), d)
      );
    }
    const r = T.div(b.re, b.im);
    const d = T.add(T.mul(b.re, r), b.im);
    return complex(
      T.div(T.add(T.mul(a.re, r), a.im), d),
      T.div(T.sub(T.mul(a.im, r), a.re), d)
    );
  };

  const negate = (z: Complex<A>): Complex<A> => complex(T.negate(z.re), T.negate(z.im));
  const scale = (z: Complex<A>, k: A): Complex<A> => complex(T.mul(z.re, k), T.mul(z.im, k));
  const divReal = (z: Complex<A>, x: A): Complex<A> => complex(T.div(z.re, x), T.div(z.im, x));
  const recip = (z: Complex<A>): Complex<A> => div(ONE, z);

  const numeric: Numeric<Complex<A>> = {
    add,
    sub,
    mul,
    div,
    pow: (a, b) => pow(a, b),
    negate,
    abs: (z) => complex(abs(z)),
    signum: (z) => (isZero(z) ? ZERO : divReal(z, abs(z))),
    fromNumber: (n) => complex(T.fromNumber(n)),
    toNumber: (z) => (T.isZero(z.im) ? T.toNumber(z.re) : NaN),
    zero: () => ZERO,
    one: () => ONE,
  };

  const fractional: Fractional<Complex<A>> = {
    div,
    recip,
    fromRational: (num, den) => complex(T.fromRational(num, den)),
  };

  // --------------------------------------------------------------------------
  // Exponential form
  // --------------------------------------------------------------------------

  const exp = (z: Complex<A>): Complex<A> => {
    const r = T.exp(z.re);
    if (T.isZero(z.im)) return complex(r, z.im);
    const { sin, cos } = T.sinCos(z.im, "radians");
    return complex(T.mul(r, cos), T.mul(r, sin));
  };

  const ln = (z: Complex<A>): Complex<A> => complex(T.ln(abs(z)), arg(z));

  const sqrt = (z: Complex<A>): Complex<A> => {
    const d = abs(z);
    const re = T.sqrt(T.div(T.add(z.re, d), two));
    const im = T.sqrt(T.div(T.sub(d, z.re), two));
    return complex(re, T.isNegative(z.im) ? T.negate(im) : im);
  };

  const ipow = (base: Complex<A>, n: number): Complex<A> => powFrac(base, n, numeric, fractional);

  const pow = (base: Complex<A>, power: Complex<A>): Complex<A> => {
    if (isZero(power)) return ONE;

    if (T.isZero(power.im) && T.isInteger(power.re)) {
      const n = T.toNumber(power.re);
      if (Number.isSafeInteger(n)) {
        return T.isZero(base.im) ? complex(T.pow(base.re, power.re)) : ipow(base, n);
      }
    }

    if (isZero(base)) {
      return T.greaterThan(power.re, zero) ? ZERO : complex(T.nan(), T.nan());
    }
    return exp(mul(ln(base), power));
  };

  const nthRoots = (z: Complex<A>, n: number): Complex<A>[] => {
    const r = T.pow(abs(z), T.recip(T.fromInt(n)));
    const theta = arg(z);
    const turn = T.add(T.pi(), T.pi());
    const roots: Complex<A>[] = [];
    for (let k = 0; k < n; k++) {
      roots.push(fromPolar(r, T.div(T.add(theta, T.mul(turn, T.fromInt(k))), T.fromInt(n))));
    }
    return roots;
  };

  // --------------------------------------------------------------------------
  // Trigonometric and hyperbolic (Euler's identity)
  // --------------------------------------------------------------------------

  const half = (z: Complex<A>): Complex<A> => divReal(z, two);

  const sin = (z: Complex<A>): Complex<A> => {
    const ezi = exp(mulI(z));
    const e_zi = exp(negate(mulI(z)));
    return negate(mulI(half(sub(ezi, e_zi))));
  };

  const cos = (z: Complex<A>): Complex<A> => {
    const ezi = exp(mulI(z));
    const e_zi = exp(negate(mulI(z)));
    return half(add(ezi, e_zi));
  };

  const tan = (z: Complex<A>): Complex<A> => {
    const ezi = exp(mulI(z));
    const e_zi = exp(negate(mulI(z)));
    return div(sub(ezi, e_zi), mulI(add(ezi, e_zi)));
  };

  /** √(1 − z²) */
  const cosine = (z: Complex<A>): Complex<A> => sqrt(sub(ONE, mul(z, z)));

  const asin = (z: Complex<A>): Complex<A> => negate(mulI(ln(add(mulI(z), cosine(z)))));
  const acos = (z: Complex<A>): Complex<A> => negate(mulI(ln(add(z, mulI(cosine(z))))));
  const atan = (z: Complex<A>): Complex<A> =>
    half(mulI(sub(ln(sub(ONE, mulI(z))), ln(add(ONE, mulI(z))))));

  const sinh = (z: Complex<A>): Complex<A> => half(sub(exp(z), exp(negate(z))));
  const cosh = (z: Complex<A>): Complex<A> => half(add(exp(z), exp(negate(z))));
  const tanh = (z: Complex<A>): Complex<A> => {
    const ez = exp(z);
    const e_z = exp(negate(z));
    return div(sub(ez, e_z), add(ez, e_z));
  };

  const asinh = (z: Complex<A>): Complex<A> => ln(add(z, sqrt(add(mul(z, z), ONE))));
  const acosh = (z: Complex<A>): Complex<A> => ln(add(z, sqrt(sub(mul(z, z), ONE))));
  const atanh = (z: Complex<A>): Complex<A> => half(ln(div(add(ONE, z), sub(ONE, z))));

  const floating: Floating<Complex<A>> = {
    pi: () => complex(T.pi()),
    exp,
    log: ln,
    sqrt,
    pow,
    sin,
    cos,
    tan,
    asin,
    acos,
    atan,
    atan2: (z, w) => atan(div(z, w)),
    sinh,
    cosh,
    tanh,
  };

  // --------------------------------------------------------------------------
  // Comparison
  // --------------------------------------------------------------------------

  const equals = (a: Complex<A>, b: Complex<A>): boolean =>
    T.equals(a.re, b.re) && T.equals(a.im, b.im);

  const tolerance = T.mul(two, T.ulp(one));

  const approxEquals = (a: Complex<A>, b: Complex<A>): boolean => {
    if (equals(a, b)) return true;
    const ma = abs(a);
    const mb = abs(b);
    if (T.equals(ma, mb)) return true;
    return T.lessThanOrEqual(T.abs(T.div(T.sub(mb, ma), mb)), tolerance);
  };

  // --------------------------------------------------------------------------
  // Text
  // --------------------------------------------------------------------------

  const parse = (s: string): ParseResult<Complex<A>> => {
    let text = s.replace(/\s+/g, "").toLowerCase();
    if (text === "") return { ok: false, error: "empty input" };

    let realText = "";
    if (text[0] === "+" || text[0] === "-") {
      realText = text[0];
      text = text.slice(1);
    }

    // A sign right after an exponent marker belongs to the real numeral.
    let split = text.search(/[+-]/);
    if (split > 0 && text[split - 1] === "e") {
      const next = text.slice(split + 1).search(/[+-]/);
      split = next < 0 ? -1 : split + 1 + next;
    }

    let imagText = "";
    if (split >= 0) {
      realText += text.slice(0, split);
      imagText = text.slice(split);
    } else if (text.endsWith("i")) {
      imagText = realText + text;
      realText = "";
    } else {
      realText += text;
    }

    let re = zero;
    if (realText !== "") {
      const parsed = T.parse(realText);
      if (!parsed.ok) return { ok: false, error: `invalid real part '${realText}'` };
      re = parsed.value;
    }

    let im = zero;
    if (imagText !== "") {
      if (!imagText.endsWith("i")) {
        return { ok: false, error: "imaginary part must end with 'i'" };
      }
      let coefficient = imagText.slice(0, -1);
      if (coefficient === "" || coefficient === "+" || coefficient === "-") coefficient += "1";
      const parsed = T.parse(coefficient);
      if (!parsed.ok) return { ok: false, error: `invalid imaginary part '${imagText}'` };
      im = parsed.value;
    }

    return { ok: true, value: complex(re, im), rest: "" };
  };

  const display = (z: Complex<A>): string => {
    const isOne = T.equals(T.abs(z.im), one);
    const plus = T.isNegative(z.im) ? (isOne ? "-" : "") : "+";
    const imag = T.isZero(z.im) ? "" : isOne ? `${plus}i` : `${plus}${T.display(z.im)}i`;
    if (T.isZero(z.re) && imag !== "") {
      return imag.startsWith("+") ? imag.slice(1) : imag;
    }
    return `${T.display(z.re)}${imag}`;
  };

  return {
    T,
    complex,
    fromReal: (re) => complex(re),
    fromPolar,
    I,
    ONE,
    ZERO,

    real: (z) => z.re,
    imag: (z) => z.im,
    abs,
    arg,
    norm,
    conj,
    proj,
    mulI,

    add,
    sub,
    mul,
    div,
    negate,
    scale,
    addReal: (z, x) => complex(T.add(z.re, x), z.im),
    subReal: (z, x) => complex(T.sub(z.re, x), z.im),
    mulReal: scale,
    divReal,

    exp,
    ln,
    log10: (z) => divReal(ln(z), T.ln(T.fromInt(10))),
    sqrt,
    cbrt: (z) => pow(z, complex(T.div(one, T.fromInt(3)))),
    pow,
    powReal: (base, power) => pow(base, complex(power)),
    ipow,
    nthRoots,
    rootsOfUnity: (n) => nthRoots(ONE, n),

    sin,
    cos,
    tan,
    asin,
    acos,
    atan,
    atan2: floating.atan2,
    sinh,
    cosh,
    tanh,
    asinh,
    acosh,
    atanh,

    equals,
    approxEquals,
    notApproxEquals: (a, b) => !approxEquals(a, b),
    isReal: (z) => T.isZero(z.im),

    parse,
    fromString: (s) => {
      const result = parse(s);
      if (!result.ok) throw new ParseError(s, result.error);
      return result.value;
    },
    display,

    numeric,
    fractional,
    floating,
  };
}

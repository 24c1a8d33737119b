import { describe, it, expect } from "vitest";
import type { Decimal } from "decimal.js";
import { decimalMath, spougeTerms } from "../src/index.js";

describe("gamma", () => {
  const T = decimalMath({ digits: 20, unit: "radians" });
  const d = (s: string): Decimal => T.fromString(s);
  const within = (a: Decimal, b: Decimal, tolerance: string): boolean =>
    T.lessThanOrEqual(T.abs(T.sub(a, b)), d(tolerance));

  it("is a factorial at positive integers", () => {
    expect(T.display(T.gamma(T.fromInt(1)))).toBe("1");
    expect(T.display(T.gamma(T.fromInt(5)))).toBe("24");
    expect(T.display(T.gamma(T.fromInt(11)))).toBe("3628800");
  });

  it("matches known values at half integers", () => {
    const g = T.gamma(d("0.5"));
    expect(within(T.mul(g, g), T.pi(), "1e-17")).toBe(true);
    expect(T.toNumber(T.gamma(d("2.5")))).toBeCloseTo(1.329340388179137, 13);
    expect(T.toNumber(T.gamma(d("-0.5")))).toBeCloseTo(-3.544907701811032, 12);
  });

  it("satisfies Γ(t + 1) = t·Γ(t)", () => {
    const t = d("2.7");
    const lhs = T.gamma(T.add(t, T.one()));
    const rhs = T.mul(t, T.gamma(t));
    expect(within(lhs, rhs, "1e-17")).toBe(true);
  });

  it("has poles at zero and the negative integers", () => {
    expect(T.isNaN(T.gamma(T.zero()))).toBe(true);
    expect(T.isNaN(T.gamma(T.fromInt(-3)))).toBe(true);
  });

  it("returns Infinity for huge arguments and propagates NaN", () => {
    expect(T.display(T.gamma(d("1e9")))).toBe("Infinity");
    expect(T.isNaN(T.gamma(T.nan()))).toBe(true);
  });

  it("switches from the factorial product to Spouge for large integers", () => {
    const n = T.fromInt(1000);
    const ratio = T.div(T.gamma(T.add(n, T.one())), T.mul(n, T.gamma(n)));
    expect(within(ratio, T.one(), "1e-17")).toBe(true);
  });

  it("evaluates large integer arguments directly", () => {
    const n = 50_000_000;
    const stirling =
      ((n - 0.5) * Math.log(n) - n + 0.5 * Math.log(2 * Math.PI) + 1 / (12 * n)) / Math.LN10;
    const g = T.gamma(T.fromInt(n));
    expect(T.isFinite(g)).toBe(true);
    expect(T.toNumber(T.log10(g))).toBeCloseTo(stirling, 0);
  });

  it("chooses the Spouge parameter from the precision", () => {
    expect(spougeTerms(20)).toBe(32);
    expect(spougeTerms(34)).toBe(54);
  });
});

describe("combinatorics", () => {
  const T = decimalMath({ digits: 20 });

  it("computes factorials", () => {
    expect(T.display(T.factorial(T.zero()))).toBe("1");
    expect(T.display(T.factorial(T.fromInt(10)))).toBe("3628800");
  });

  it("counts permutations and combinations", () => {
    expect(T.display(T.permutation(T.fromInt(5), T.fromInt(2)))).toBe("20");
    expect(T.display(T.combination(T.fromInt(5), T.fromInt(2)))).toBe("10");
    expect(T.display(T.combination(T.fromInt(10), T.fromInt(3)))).toBe("120");
  });
});

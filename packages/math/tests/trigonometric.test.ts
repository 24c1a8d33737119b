import { describe, it, expect } from "vitest";
import type { Decimal } from "decimal.js";
import { decimalMath, realDecimal, type Transcendental } from "../src/index.js";

function within(T: Transcendental<Decimal>, a: Decimal, b: Decimal, tolerance: string): boolean {
  return T.lessThanOrEqual(T.abs(T.sub(a, b)), T.fromString(tolerance));
}

describe("pi", () => {
  it("matches the known expansion", () => {
    const T = decimalMath({ digits: 34, unit: "radians" });
    expect(T.display(T.pi())).toBe("3.141592653589793238462643383279503");
    expect(T.display(T.withDigits(20).pi())).toBe("3.1415926535897932385");
  });
});

describe("sin / cos / tan", () => {
  describe("in degrees", () => {
    const T = decimalMath({ digits: 20, unit: "degrees" });
    const deg = (n: number) => T.fromInt(n);

    it("returns exact values at right angles", () => {
      expect(T.display(T.sin(deg(90)))).toBe("1");
      expect(T.display(T.cos(deg(0)))).toBe("1");
      expect(T.display(T.cos(deg(180)))).toBe("-1");
      expect(T.display(T.sin(deg(270)))).toBe("-1");
      expect(T.display(T.sin(deg(-90)))).toBe("-1");
      expect(T.display(T.cos(deg(450)))).toBe("0");
      expect(T.display(T.sin(deg(720)))).toBe("0");
    });

    it("leaves tan undefined at odd right angles", () => {
      expect(T.isNaN(T.tan(deg(90)))).toBe(true);
      expect(T.isNaN(T.tan(deg(-270)))).toBe(true);
      expect(T.display(T.tan(deg(180)))).toBe("0");
    });

    it("evaluates the series elsewhere", () => {
      expect(T.display(T.sin(deg(30)))).toBe("0.5");
      expect(T.display(T.sin(deg(-30)))).toBe("-0.5");
      expect(T.display(T.cos(deg(60)))).toBe("0.5");
      expect(T.display(T.tan(deg(45)))).toBe("1");
    });

    it("returns both values from sinCos", () => {
      const { sin, cos } = T.sinCos(deg(150));
      expect(T.display(sin)).toBe("0.5");
      expect(within(T, cos, T.negate(T.sqrt(T.fromString("0.75"))), "1e-19")).toBe(true);
    });

    it("keeps tiny negative angles tiny", () => {
      const x = T.fromString("-1e-28");
      expect(T.display(T.sin(x))).toBe("-1.7453292519943295769e-30");
      expect(T.display(T.cos(x))).toBe("1");
      expect(T.display(T.tan(x))).toBe("-1.7453292519943295769e-30");
    });

    it("folds negative angles through a half turn", () => {
      expect(T.display(T.cos(deg(-180)))).toBe("-1");
      expect(T.isNaN(T.tan(deg(-90)))).toBe(true);
      expect(T.display(T.sin(deg(-330)))).toBe("0.5");
    });
  });

  describe("in gradians", () => {
    const T = decimalMath({ digits: 20, unit: "gradians" });

    it("uses a 400-unit circle", () => {
      expect(T.display(T.sin(T.fromInt(100)))).toBe("1");
      expect(T.display(T.cos(T.fromInt(200)))).toBe("-1");
      expect(T.display(T.sin(T.fromInt(50)))).toBe(T.display(T.sin(T.fromInt(45), "degrees")));
    });

    it("keeps tiny negative angles tiny", () => {
      expect(T.display(T.sin(T.fromString("-1e-28")))).toBe("-1.5707963267948966192e-30");
    });
  });

  describe("in radians", () => {
    const T = decimalMath({ digits: 20, unit: "radians" });

    it("gives sin(π/2) = 1", () => {
      expect(T.display(T.sin(T.div(T.pi(), T.fromInt(2))))).toBe("1");
      expect(T.display(T.cos(T.zero()))).toBe("1");
    });

    it("keeps sin² + cos² = 1", () => {
      const { sin, cos } = T.sinCos(T.fromString("1.234"));
      const sum = T.add(T.mul(sin, sin), T.mul(cos, cos));
      expect(within(T, sum, T.one(), "1e-18")).toBe(true);
    });

    it("reduces large arguments", () => {
      expect(T.toNumber(T.sin(T.fromString("1e22")))).toBeCloseTo(-0.8522008497671888, 12);
    });

    it("propagates NaN for special arguments", () => {
      expect(T.isNaN(T.sin(T.infinity()))).toBe(true);
      expect(T.isNaN(T.cos(T.nan()))).toBe(true);
    });

    it("accepts a per-call unit", () => {
      expect(T.display(T.sin(T.fromInt(90), "degrees"))).toBe("1");
    });

    it("keeps tiny negative angles tiny", () => {
      const x = T.fromString("-1e-40");
      expect(T.display(T.sin(x))).toBe("-1e-40");
      expect(T.display(T.cos(x))).toBe("1");
      expect(T.display(T.tan(x))).toBe("-1e-40");
    });
  });
});

describe("inverse functions", () => {
  describe("in radians", () => {
    const T = decimalMath({ digits: 20, unit: "radians" });

    it("atan2 handles the special cases", () => {
      const zero = T.zero();
      const one = T.one();

      expect(T.display(T.atan2(one, one))).toBe("0.78539816339744830962");
      expect(T.display(T.atan2(zero, T.negate(one)))).toBe("3.1415926535897932385");
      expect(T.display(T.atan2(T.negate(one), zero))).toBe("-1.5707963267948966192");
      expect(T.display(T.atan2(T.negate(T.infinity()), T.infinity()))).toBe(
        "-0.78539816339744830962"
      );
      expect(T.display(T.atan2(T.infinity(), T.negate(T.infinity())))).toBe(
        "2.3561944901923449288"
      );
      expect(T.display(T.atan2(one, T.negate(T.infinity())))).toBe("3.1415926535897932385");
      expect(T.isNaN(T.atan2(T.nan(), one))).toBe(true);
    });

    it("atan2 preserves the sign of a zero y", () => {
      const zero = T.zero();
      const negZero = T.negate(zero);

      const positive = T.atan2(zero, zero);
      expect(T.isZero(positive) && !T.isNegative(positive)).toBe(true);

      const negative = T.atan2(negZero, zero);
      expect(T.isZero(negative) && T.isNegative(negative)).toBe(true);

      expect(T.display(T.atan2(negZero, T.negate(T.one())))).toBe("-3.1415926535897932385");
    });

    it("atan saturates at infinity", () => {
      expect(T.display(T.atan(T.infinity()))).toBe("1.5707963267948966192");
      expect(T.display(T.atan(T.negate(T.infinity())))).toBe("-1.5707963267948966192");
    });

    it("asin inverts sin on [−π/2, π/2]", () => {
      for (const x of ["-1.2", "-0.3", "0.5", "1.5"]) {
        const v = T.fromString(x);
        expect(within(T, T.asin(T.sin(v)), v, "1e-18")).toBe(true);
      }
    });

    it("returns NaN outside [−1, 1]", () => {
      expect(T.isNaN(T.asin(T.fromInt(2)))).toBe(true);
      expect(T.isNaN(T.acos(T.fromString("-1.5")))).toBe(true);
    });
  });

  describe("in degrees", () => {
    const T = decimalMath({ digits: 20, unit: "degrees" });

    it("answers in the caller's unit", () => {
      expect(T.display(T.atan(T.one()))).toBe("45");
      expect(T.display(T.asin(T.one()))).toBe("90");
      expect(T.display(T.asin(T.fromString("0.5")))).toBe("30");
      expect(T.display(T.acos(T.fromString("0.5")))).toBe("60");
      expect(T.display(T.acos(T.fromInt(-1)))).toBe("180");
      expect(T.display(T.acos(T.one()))).toBe("0");
    });
  });
});

describe("high precision", () => {
  const T = decimalMath({ digits: 1500, unit: "degrees" });
  const short = realDecimal({ digits: 34 });

  it("computes π within the default iteration cap", () => {
    const pi = T.pi();
    expect(T.isNaN(pi)).toBe(false);
    expect(short.display(short.from(pi))).toBe("3.141592653589793238462643383279503");
  });

  it("evaluates degree functions", () => {
    expect(T.display(T.sin(T.fromInt(30)))).toBe("0.5");
    expect(T.display(T.cos(T.fromInt(120)))).toBe("-0.5");
  });

  it("evaluates inverse functions", () => {
    expect(T.display(T.atan(T.one()))).toBe("45");
  });
});

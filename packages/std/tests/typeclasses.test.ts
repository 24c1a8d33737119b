import { describe, it, expect } from "vitest";
import { numericNumber, fractionalNumber, sum, product, pow, powFrac } from "@transcend/std";

describe("number instances", () => {
  it("numericNumber follows machine arithmetic", () => {
    expect(numericNumber.signum(-3)).toBe(-1);
    expect(numericNumber.abs(-2.5)).toBe(2.5);
    expect(numericNumber.pow(2, 3)).toBe(8);
  });

  it("fractionalNumber divides", () => {
    expect(fractionalNumber.recip(4)).toBe(0.25);
    expect(fractionalNumber.fromRational(3, 4)).toBe(0.75);
  });
});

describe("numeric operations", () => {
  it("sum and product fold with the identities", () => {
    expect(sum([1, 2, 3, 4, 5], numericNumber)).toBe(15);
    expect(product([1, 2, 3, 4], numericNumber)).toBe(24);
    expect(sum([], numericNumber)).toBe(0);
    expect(product([], numericNumber)).toBe(1);
  });

  it("pow uses repeated squaring", () => {
    expect(pow(2, 10, numericNumber)).toBe(1024);
    expect(pow(3, 0, numericNumber)).toBe(1);
    expect(pow(7, 1, numericNumber)).toBe(7);
    expect(() => pow(2, -1, numericNumber)).toThrow(RangeError);
    expect(() => pow(2, 1.5, numericNumber)).toThrow(RangeError);
  });

  it("powFrac inverts negative exponents", () => {
    expect(powFrac(2, -2, numericNumber, fractionalNumber)).toBe(0.25);
    expect(powFrac(2, 3, numericNumber, fractionalNumber)).toBe(8);
  });
});

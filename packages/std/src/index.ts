/**
 * @transcend/std — Standard Typeclasses
 *
 * Dictionary-passing typeclasses:
 * - Eq, Ord, Numeric, Fractional, Floating
 * - Parseable, Printable
 * - Real, the contract an arbitrary-precision real type implements
 *
 * plus generic operations over them (`sum`, `product`, `pow`, `powFrac`).
 *
 * @example
 * ```ts
 * import { sum, pow, numericNumber } from "@transcend/std";
 *
 * sum([1, 2, 3], numericNumber); // 6
 * pow(3, 4, numericNumber);      // 81
 * ```
 */

export * from "./typeclasses/index.js";

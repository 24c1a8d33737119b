/**
 * Error Types
 *
 * Numeric domain errors never throw: they surface as NaN or ±Infinity.
 * The classes below cover the remaining failure channels.
 */

/**
 * Thrown when a convergence loop exhausts its iteration cap and the
 * active policy is `"throw"`.
 */
export class ConvergenceError extends Error {
  constructor(
    readonly operation: string,
    readonly iterations: number,
  ) {
    super(`${operation}: series did not converge within ${iterations} iterations`);
    this.name = "ConvergenceError";
  }
}

/** Thrown by the throwing variants of string parsers. */
export class ParseError extends Error {
  constructor(
    readonly input: string,
    readonly reason: string,
  ) {
    super(`Cannot parse '${input}': ${reason}`);
    this.name = "ParseError";
  }
}

/** Thrown when a configuration file exists but cannot be loaded. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly filepath?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

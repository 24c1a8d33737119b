/**
 * @transcend/core — configuration, logging, errors and runtime safety
 * shared by the transcend packages.
 *
 * @packageDocumentation
 */

export {
  config,
  defineConfig,
  DEFAULTS,
  type TranscendConfig,
  type ResolvedConfig,
  type PrecisionConfig,
  type AnglesConfig,
  type SeriesConfig,
} from "./config.js";

export { createLogger, type Logger } from "./logger.js";

export { ConvergenceError, ParseError, ConfigError } from "./errors.js";

export { invariant, unreachable } from "./safety.js";

export {
  ANGULAR_UNITS,
  ROUNDING_MODES,
  EXHAUSTED_POLICIES,
  isAngularUnit,
  isRoundingMode,
  isExhaustedPolicy,
  type AngularUnit,
  type RoundingMode,
  type ExhaustedPolicy,
} from "./types.js";

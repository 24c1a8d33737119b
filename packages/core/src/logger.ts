/**
 * Scoped console logger.
 *
 * Every line carries a `[transcend:<scope>]` prefix. `debug` lines are
 * emitted only while `config.resolved().debug` is set.
 */

import { config } from "./config.js";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[transcend:${scope}]`;

  return {
    debug: (message, ...details) => {
      if (config.resolved().debug) {
        console.debug(prefix, message, ...details);
      }
    },
    info: (message, ...details) => console.info(prefix, message, ...details),
    warn: (message, ...details) => console.warn(prefix, message, ...details),
    error: (message, ...details) => console.error(prefix, message, ...details),
  };
}

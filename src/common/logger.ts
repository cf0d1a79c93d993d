// Logging
// Shared consola instance for library diagnostics.

import { consola } from "consola";

/**
 * Library logger. Diagnostics are emitted at debug level, so they stay silent
 * unless the caller raises `logger.level`.
 */
export const logger = consola.withTag("dynexpr");

/**
 * Child logger for one subsystem.
 */
export function scopedLogger(scope: string) {
  return logger.withTag(scope);
}

/**
 * Logging Utilities
 *
 * When SHUFFLE_QUIET=1:
 * - nLog() is MUTED
 *
 * When SHUFFLE_DEBUG=1:
 * - dLog() outputs, otherwise it is muted
 *
 * Failures go through eLog() and are never muted.
 */

import { getEnvBoolean } from "./utils/env";

/**
 * Normal log
 *
 * Progress and result lines of the CLI commands.
 */
export function nLog(...args: unknown[]) {
  if (!getEnvBoolean("SHUFFLE_QUIET")) {
    console.log(...args);
  }
}

/**
 * Debug log
 *
 * Derived keys, row pairs and other detail useful when a restore
 * does not come out right.
 */
export function dLog(...args: unknown[]) {
  if (getEnvBoolean("SHUFFLE_DEBUG")) {
    console.log(...args);
  }
}

export function eLog(...args: unknown[]) {
  console.error(...args);
}

/**
 * @orcbatch/config - Logger from configuration
 *
 * @packageDocumentation
 */

import {
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  formatLogEntry,
  type Logger,
} from '@orcbatch/core';
import type { ObservabilityConfig } from './types.js';

/**
 * Logger for the observability section: a no-op logger when disabled,
 * otherwise a console logger in the configured format. `write` replaces
 * the console as the destination of formatted lines.
 */
export function createLoggerFromConfig(
  observability: ObservabilityConfig,
  write?: (line: string) => void
): Logger {
  if (!observability.enabled) {
    return createNoopLogger();
  }
  if (write === undefined) {
    return createConsoleLogger({ format: observability.logFormat, minLevel: observability.logLevel });
  }
  return createLogger({
    minLevel: observability.logLevel,
    output: (entry) => write(formatLogEntry(entry, observability.logFormat)),
  });
}

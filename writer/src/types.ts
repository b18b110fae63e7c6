/**
 * @orcbatch/writer - Type definitions
 */

import type { ChildGrowth, Logger } from '@orcbatch/core';
import { createLoggerFromConfig, DEFAULT_CONFIG, type OrcBatchConfig } from '@orcbatch/config';

// =============================================================================
// Options
// =============================================================================

/**
 * Options for opening a row writer. Explicit fields win over `config`,
 * which wins over the defaults.
 */
export interface RowWriterOptions {
  /** Resolved configuration; defaults to DEFAULT_CONFIG */
  config?: OrcBatchConfig;
  /** Destination for session logs; derived from `config.observability` when absent */
  logger?: Logger;
  /** Replace an existing file at the destination path */
  overwrite?: boolean;
  /** How child vectors of lists and maps grow */
  childGrowth?: ChildGrowth;
}

export interface ResolvedRowWriterOptions {
  logger: Logger;
  overwrite: boolean;
  childGrowth: ChildGrowth;
}

export function resolveRowWriterOptions(options: RowWriterOptions = {}): ResolvedRowWriterOptions {
  const config = options.config ?? DEFAULT_CONFIG;
  return {
    logger: options.logger ?? createLoggerFromConfig(config.observability),
    overwrite: options.overwrite ?? config.writer.overwrite,
    childGrowth: options.childGrowth ?? config.writer.childGrowth,
  };
}

// =============================================================================
// Session State
// =============================================================================

/**
 * Lifecycle of the buffered batch:
 * `empty` -> `filling` -> `full` -> (flush) -> `empty` ... -> `flushed`.
 * `flushed` is terminal and reached only through close().
 */
export type RowWriterState = 'empty' | 'filling' | 'full' | 'flushed';

export interface RowWriterStats {
  state: RowWriterState;
  /** Rows accepted so far, flushed or buffered */
  rowsWritten: number;
  /** Rows waiting in the current batch */
  bufferedRows: number;
  batchesFlushed: number;
  /** An engine call failed; the session accepts no more rows */
  failed: boolean;
}

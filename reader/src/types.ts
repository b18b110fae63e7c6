/**
 * @orcbatch/reader - Type definitions
 */

import type { Logger } from '@orcbatch/core';
import { createLoggerFromConfig, DEFAULT_CONFIG, type OrcBatchConfig } from '@orcbatch/config';

// ============================================================================
// Options
// ============================================================================

export interface RowReaderOptions {
  /** Resolved configuration; defaults to DEFAULT_CONFIG */
  config?: OrcBatchConfig;
  /** Destination for session logs; derived from `config.observability` when absent */
  logger?: Logger;
}

export function resolveReaderLogger(options: RowReaderOptions = {}): Logger {
  return options.logger ?? createLoggerFromConfig((options.config ?? DEFAULT_CONFIG).observability);
}

// ============================================================================
// Session State
// ============================================================================

/**
 * `empty` until the first batch arrives, then `loaded` while rows remain in
 * it, `exhausted` once they are consumed and `reloading` while the engine
 * refills it. `done` after the last row or close().
 */
export type RowReaderState = 'empty' | 'loaded' | 'exhausted' | 'reloading' | 'done';

export interface RowReaderStats {
  state: RowReaderState;
  rowsRead: number;
  batchesLoaded: number;
  /** Rows in the file; undefined until the engine reader is open */
  rowCount?: number;
}

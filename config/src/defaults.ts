/**
 * @orcbatch/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import { DEFAULT_BATCH_SIZE } from '@orcbatch/core';
import type { OrcBatchConfig } from './types.js';

const DEFAULT_ENGINE_CONFIG = {
  maxBatchRows: DEFAULT_BATCH_SIZE,
} as const;

const DEFAULT_WRITER_CONFIG = {
  overwrite: true,
  childGrowth: 'proactive' as const,
} as const;

/**
 * Logging stays off unless asked for.
 */
const DEFAULT_OBSERVABILITY_CONFIG = {
  enabled: false,
  logLevel: 'info' as const,
  logFormat: 'json' as const,
} as const;

export const DEFAULT_CONFIG: OrcBatchConfig = Object.freeze({
  engine: Object.freeze({ ...DEFAULT_ENGINE_CONFIG }),
  writer: Object.freeze({ ...DEFAULT_WRITER_CONFIG }),
  observability: Object.freeze({ ...DEFAULT_OBSERVABILITY_CONFIG }),
});

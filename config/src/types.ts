/**
 * @orcbatch/config - Type Definitions
 *
 * Naming: row counts end in `Rows`; every section is a flat object of
 * scalars so environment variables map one to one.
 *
 * @packageDocumentation
 * @module @orcbatch/config
 */

import type { ChildGrowth, LogLevel } from '@orcbatch/core';

// =============================================================================
// Utility Types
// =============================================================================

export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Sections
// =============================================================================

export interface EngineConfig {
  /** Rows per batch the engine allocates (default 1024) */
  maxBatchRows: number;
}

export interface WriterConfig {
  /** Replace an existing file when opening a writer (default true) */
  overwrite: boolean;
  /** How list and map child vectors grow (default 'proactive') */
  childGrowth: ChildGrowth;
}

export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  /** Emit session logs at all (default false) */
  enabled: boolean;
  /** Minimum level emitted when enabled (default 'info') */
  logLevel: LogLevel;
  logFormat: LogFormat;
}

/**
 * @example
 * ```typescript
 * const config: OrcBatchConfig = {
 *   engine: { maxBatchRows: 4096 },
 *   writer: { overwrite: false, childGrowth: 'exact' },
 *   observability: { enabled: true, logLevel: 'debug', logFormat: 'pretty' },
 * };
 * ```
 */
export interface OrcBatchConfig {
  engine: EngineConfig;
  writer: WriterConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationError {
  /** Path to the invalid field, e.g. 'engine.maxBatchRows' */
  path: string;
  message: string;
  value: unknown;
  suggestion?: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
  value: unknown;
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'ORCBATCH') */
  prefix?: string;
  /** Environment to read (default: process.env) */
  env?: Record<string, string | undefined>;
}

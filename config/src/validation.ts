/**
 * @orcbatch/config - Configuration Validation
 *
 * @packageDocumentation
 */

import { isLogLevel } from '@orcbatch/core';
import type { OrcBatchConfig, ValidationError, ValidationResult, ValidationWarning } from './types.js';

/** Above this a single batch holds more rows than most engines stripe at once */
const LARGE_BATCH_ROWS = 65_536;

/**
 * Validate a complete configuration.
 *
 * @example
 * ```typescript
 * const result = validateConfig(getConfigFromEnv());
 * if (!result.valid) {
 *   throw new Error(result.errors.map((e) => `${e.path}: ${e.message}`).join('; '));
 * }
 * ```
 */
export function validateConfig(config: OrcBatchConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateEngineConfig(config.engine, errors, warnings);
  validateWriterConfig(config.writer, errors);
  validateObservabilityConfig(config.observability, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateEngineConfig(
  engine: OrcBatchConfig['engine'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!Number.isInteger(engine.maxBatchRows) || engine.maxBatchRows <= 0) {
    errors.push({
      path: 'engine.maxBatchRows',
      message: 'Max batch rows must be a positive integer',
      value: engine.maxBatchRows,
      suggestion: 'Use 1024 unless the engine documents another stripe size',
    });
  } else if (engine.maxBatchRows > LARGE_BATCH_ROWS) {
    warnings.push({
      path: 'engine.maxBatchRows',
      message: `Batches over ${LARGE_BATCH_ROWS} rows keep every row and its children in memory`,
      value: engine.maxBatchRows,
      recommendation: 'Consider values between 1024 and 16384',
    });
  }
}

function validateWriterConfig(writer: OrcBatchConfig['writer'], errors: ValidationError[]): void {
  if (writer.childGrowth !== 'proactive' && writer.childGrowth !== 'exact') {
    errors.push({
      path: 'writer.childGrowth',
      message: "Child growth must be 'proactive' or 'exact'",
      value: writer.childGrowth,
    });
  }
}

function validateObservabilityConfig(
  observability: OrcBatchConfig['observability'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: 'Log level must be one of debug, info, warn, error',
      value: observability.logLevel,
    });
  }

  if (observability.logFormat !== 'json' && observability.logFormat !== 'pretty') {
    errors.push({
      path: 'observability.logFormat',
      message: "Log format must be 'json' or 'pretty'",
      value: observability.logFormat,
    });
  }

  if (!observability.enabled && observability.logLevel === 'debug') {
    warnings.push({
      path: 'observability.logLevel',
      message: 'Log level has no effect while observability is disabled',
      value: observability.logLevel,
      recommendation: 'Set observability.enabled to true to see debug logs',
    });
  }
}

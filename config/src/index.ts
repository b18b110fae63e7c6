/**
 * @orcbatch/config - Configuration for writers, readers and engines
 *
 * @example
 * ```typescript
 * import { createConfig, getConfigFromEnv, validateConfig, createLoggerFromConfig } from '@orcbatch/config';
 *
 * const config = getConfigFromEnv();
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * const logger = createLoggerFromConfig(config.observability);
 * ```
 *
 * @packageDocumentation
 * @module @orcbatch/config
 */

export type {
  DeepPartial,
  EngineConfig,
  EnvConfigOptions,
  LogFormat,
  ObservabilityConfig,
  OrcBatchConfig,
  ValidationError,
  ValidationResult,
  ValidationWarning,
  WriterConfig,
} from './types.js';

export { DEFAULT_CONFIG } from './defaults.js';
export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';
export { validateConfig } from './validation.js';
export { createLoggerFromConfig } from './logger.js';

/**
 * @orcbatch/config - Configuration Factory Functions
 *
 * @packageDocumentation
 */

import { isLogLevel, type ChildGrowth } from '@orcbatch/core';
import { DEFAULT_CONFIG } from './defaults.js';
import type { DeepPartial, EnvConfigOptions, LogFormat, OrcBatchConfig } from './types.js';

type PartialConfig = DeepPartial<OrcBatchConfig>;

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj);
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return obj;
}

/**
 * Fill every field of `base` that `overrides` leaves undefined.
 */
function mergeOver(base: OrcBatchConfig, overrides: PartialConfig | null | undefined): OrcBatchConfig {
  const engine = overrides?.engine;
  const writer = overrides?.writer;
  const observability = overrides?.observability;
  return {
    engine: {
      maxBatchRows: engine?.maxBatchRows ?? base.engine.maxBatchRows,
    },
    writer: {
      overwrite: writer?.overwrite ?? base.writer.overwrite,
      childGrowth: writer?.childGrowth ?? base.writer.childGrowth,
    },
    observability: {
      enabled: observability?.enabled ?? base.observability.enabled,
      logLevel: observability?.logLevel ?? base.observability.logLevel,
      logFormat: observability?.logFormat ?? base.observability.logFormat,
    },
  };
}

/**
 * Create a complete, frozen OrcBatchConfig.
 *
 * @example
 * ```typescript
 * const config = createConfig({ engine: { maxBatchRows: 4096 } });
 * const exact = createConfig({ writer: { childGrowth: 'exact' } }, config);
 * ```
 */
export function createConfig(overrides?: PartialConfig, base: OrcBatchConfig = DEFAULT_CONFIG): OrcBatchConfig {
  return deepFreeze(mergeOver(base, overrides));
}

function pickDefined<T extends object>(entries: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(entries) as (keyof T)[]) {
    if (entries[key] !== undefined) {
      result[key] = entries[key];
    }
  }
  return result;
}

/**
 * Merge partial configurations; later ones win field by field.
 */
export function mergeConfigs(...configs: Array<PartialConfig | null | undefined>): PartialConfig {
  let result: PartialConfig = {};

  for (const config of configs) {
    if (!config) continue;
    result = {
      ...result,
      ...(config.engine && { engine: { ...result.engine, ...pickDefined(config.engine) } }),
      ...(config.writer && { writer: { ...result.writer, ...pickDefined(config.writer) } }),
      ...(config.observability && {
        observability: { ...result.observability, ...pickDefined(config.observability) },
      }),
    };
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseChildGrowth(value: string | undefined): ChildGrowth | undefined {
  return value === 'proactive' || value === 'exact' ? value : undefined;
}

function parseLogFormat(value: string | undefined): LogFormat | undefined {
  return value === 'json' || value === 'pretty' ? value : undefined;
}

function getEnvVar(env: Record<string, string | undefined>, prefix: string, ...parts: string[]): string | undefined {
  return env[[prefix, ...parts].join('_').toUpperCase()];
}

/**
 * Configuration from `<PREFIX>_<SECTION>_<FIELD>` variables over the defaults:
 *
 * - ORCBATCH_ENGINE_MAX_BATCH_ROWS=4096
 * - ORCBATCH_WRITER_OVERWRITE=false
 * - ORCBATCH_WRITER_CHILD_GROWTH=exact
 * - ORCBATCH_OBSERVABILITY_ENABLED=true
 * - ORCBATCH_OBSERVABILITY_LOG_LEVEL=debug
 * - ORCBATCH_OBSERVABILITY_LOG_FORMAT=pretty
 *
 * Unparseable numbers and unknown enum values are ignored.
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): OrcBatchConfig {
  const prefix = options.prefix ?? 'ORCBATCH';
  const env = options.env ?? process.env;
  const logLevel = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL');

  const overrides: PartialConfig = {
    engine: {
      maxBatchRows: parseNumber(getEnvVar(env, prefix, 'ENGINE', 'MAX', 'BATCH', 'ROWS')),
    },
    writer: {
      overwrite: parseBoolean(getEnvVar(env, prefix, 'WRITER', 'OVERWRITE')),
      childGrowth: parseChildGrowth(getEnvVar(env, prefix, 'WRITER', 'CHILD', 'GROWTH')),
    },
    observability: {
      enabled: parseBoolean(getEnvVar(env, prefix, 'OBSERVABILITY', 'ENABLED')),
      logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : undefined,
      logFormat: parseLogFormat(getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT')),
    },
  };

  return createConfig(overrides);
}

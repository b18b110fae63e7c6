/**
 * @orcbatch/test-utils
 *
 * Shared fixtures, fast-check arbitraries and a fault-injecting engine
 * wrapper for testing the orcbatch packages.
 */

export {
  FaultInjectingEngine,
  EngineFaultError,
  SeededRandom,
  type EngineOperation,
  type FaultInjectingEngineOptions,
} from './fault-engine.js';

export {
  quoteSchema,
  quoteRows,
  QUOTE_DAYS,
  counterSchema,
  counterRow,
  idSchema,
  idRows,
  tagSchema,
  tagRows,
} from './fixtures.js';

export {
  fieldNameArb,
  scalarSchemaArb,
  mapKeySchemaArb,
  structSchemaArb,
  schemaArb,
  rowSchemaArb,
  valueArb,
  nonNullValueArb,
  rowArb,
  schemaWithRowsArb,
} from './arbitraries.js';

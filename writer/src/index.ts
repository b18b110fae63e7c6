/**
 * @orcbatch/writer - Row-at-a-time writing into columnar batches
 *
 * @example
 * ```typescript
 * import { openRowWriter } from '@orcbatch/writer';
 *
 * const writer = openRowWriter(engine, 'quotes.orc', schema, { config });
 * for (const row of rows) {
 *   writer.writeRow(row);
 * }
 * writer.close();
 * ```
 *
 * @packageDocumentation
 */

export { RowWriter, openRowWriter } from './row-writer.js';
export {
  resolveRowWriterOptions,
  type ResolvedRowWriterOptions,
  type RowWriterOptions,
  type RowWriterState,
  type RowWriterStats,
} from './types.js';

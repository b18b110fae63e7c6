/**
 * @orcbatch/reader - Row-at-a-time reading from columnar batches
 *
 * @packageDocumentation
 */

export { RowReader, openRowReader } from './row-reader.js';
export {
  resolveReaderLogger,
  type RowReaderOptions,
  type RowReaderState,
  type RowReaderStats,
} from './types.js';

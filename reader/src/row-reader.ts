/**
 * RowReader
 *
 * Pulls batches from the engine and hands out one decoded row at a time.
 * The engine reader is opened on first use.
 */

import {
  MarshalError,
  decodeRow,
  schemaToString,
  withContext,
  wrapEngineError,
  type ColumnarEngine,
  type EngineReader,
  type Logger,
  type RowBatch,
  type TypeSchema,
  type Value,
} from '@orcbatch/core';
import { resolveReaderLogger, type RowReaderOptions, type RowReaderState, type RowReaderStats } from './types.js';

interface OpenSession {
  readonly handle: EngineReader;
  readonly batch: RowBatch;
}

export class RowReader implements Iterable<Value[]> {
  readonly path: string;

  private readonly engine: ColumnarEngine;
  private readonly logger: Logger;

  private session?: OpenSession;
  private state: RowReaderState = 'empty';
  private closed = false;
  /** Next row within the current batch */
  private batchRow = 0;
  private rowsRead = 0;
  private batchesLoaded = 0;

  constructor(engine: ColumnarEngine, path: string, options: RowReaderOptions = {}) {
    this.engine = engine;
    this.path = path;
    this.logger = withContext(resolveReaderLogger(options), { path, session: 'reader' });
  }

  getSchema(): TypeSchema {
    return this.open().handle.schema;
  }

  getNumberOfRows(): number {
    return this.open().handle.rowCount;
  }

  /**
   * Next row of the file, one Value per top-level field; `[]` after the last row.
   *
   * @throws MarshalError
   */
  readRow(): Value[] {
    const { handle, batch } = this.open();

    if (this.rowsRead >= handle.rowCount) {
      this.finish(handle);
      return [];
    }

    if (this.state === 'empty' || this.batchRow >= batch.size) {
      this.load(handle, batch);
    }

    const decoded = decodeRow(batch, handle.schema, this.batchRow, this.rowsRead);
    if (decoded.isErr()) {
      throw decoded.error;
    }

    this.batchRow++;
    this.rowsRead++;
    this.state = this.batchRow >= batch.size ? 'exhausted' : 'loaded';
    return decoded.value;
  }

  /**
   * Remaining rows in file order.
   */
  *rows(): Generator<Value[], void, undefined> {
    while (!this.atEnd()) {
      yield this.readRow();
    }
    this.finish(this.open().handle);
  }

  [Symbol.iterator](): Iterator<Value[]> {
    return this.rows();
  }

  /**
   * Release the engine reader. Safe to call more than once.
   *
   * @throws MarshalError when the engine fails to close
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.state = 'done';

    const session = this.session;
    this.session = undefined;
    if (session) {
      try {
        this.engine.closeReader(session.handle);
      } catch (error) {
        const wrapped = wrapEngineError(error, 'closeReader', this.path);
        this.logger.error('Engine call failed', wrapped, { operation: 'closeReader', errorCode: wrapped.code });
        throw wrapped;
      }
    }
    this.logger.info('Reader closed', { rowsRead: this.rowsRead, batchesLoaded: this.batchesLoaded });
  }

  getStats(): RowReaderStats {
    return {
      state: this.state,
      rowsRead: this.rowsRead,
      batchesLoaded: this.batchesLoaded,
      rowCount: this.session?.handle.rowCount,
    };
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private atEnd(): boolean {
    return this.rowsRead >= this.getNumberOfRows();
  }

  private open(): OpenSession {
    if (this.closed) {
      throw MarshalError.sessionClosed(this.path);
    }
    if (this.session) {
      return this.session;
    }

    const handle = this.call('openReader', () => this.engine.openReader(this.path));
    let batch: RowBatch;
    try {
      batch = this.engine.allocateBatch(handle.schema);
    } catch (error) {
      const wrapped = this.failed(wrapEngineError(error, 'allocateBatch', this.path));
      this.call('closeReader', () => this.engine.closeReader(handle));
      throw wrapped;
    }

    this.session = { handle, batch };
    this.logger.debug('Reader opened', {
      schema: schemaToString(handle.schema),
      rowCount: handle.rowCount,
    });
    return this.session;
  }

  /** Fetch batches until one has rows; running dry before rowCount is an engine fault */
  private load(handle: EngineReader, batch: RowBatch): void {
    if (this.state !== 'empty') {
      this.state = 'reloading';
    }
    do {
      const loaded = this.call('nextBatch', () => this.engine.nextBatch(handle, batch));
      if (!loaded) {
        throw this.failed(
          MarshalError.engineIO(
            `Engine ran out of batches after ${this.rowsRead} of ${handle.rowCount} rows`,
            'nextBatch',
            undefined,
            this.path
          )
        );
      }
    } while (batch.size === 0);

    this.batchRow = 0;
    this.batchesLoaded++;
    this.state = 'loaded';
    this.logger.debug('Batch loaded', {
      batch: this.batchesLoaded,
      batchRows: batch.size,
      rowsRead: this.rowsRead,
    });
  }

  private finish(handle: EngineReader): void {
    if (this.state === 'done') {
      return;
    }
    this.state = 'done';
    this.logger.info('End of file', { rowsRead: this.rowsRead, rowCount: handle.rowCount });
  }

  private call<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw this.failed(wrapEngineError(error, operation, this.path));
    }
  }

  private failed(error: MarshalError): MarshalError {
    const operation = error.details?.operation;
    this.logger.error('Engine call failed', error, {
      operation: typeof operation === 'string' ? operation : undefined,
      errorCode: error.code,
      rowsRead: this.rowsRead,
    });
    return error;
  }
}

/**
 * Open a row reader on the committed file at `path`.
 *
 * @example
 * ```typescript
 * const reader = openRowReader(engine, 'quotes.orc');
 * for (const row of reader) {
 *   console.log(row.map(toPlain));
 * }
 * reader.close();
 * ```
 */
export function openRowReader(engine: ColumnarEngine, path: string, options: RowReaderOptions = {}): RowReader {
  return new RowReader(engine, path, options);
}

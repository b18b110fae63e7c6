/**
 * RowWriter
 *
 * Accepts rows one at a time, encodes them into a batch allocated by the
 * engine and hands the batch over whenever it fills up. The engine writer
 * is opened on the first row (or on close, for an empty file) and released
 * exactly once.
 */

import {
  Kind,
  MarshalError,
  MarshalErrorCode,
  encodeRow,
  schemaToString,
  withContext,
  wrapEngineError,
  type ColumnarEngine,
  type EngineWriter,
  type Logger,
  type RowBatch,
  type TypeSchema,
  type Value,
} from '@orcbatch/core';
import {
  resolveRowWriterOptions,
  type ResolvedRowWriterOptions,
  type RowWriterOptions,
  type RowWriterState,
  type RowWriterStats,
} from './types.js';

interface OpenSession {
  readonly handle: EngineWriter;
  readonly batch: RowBatch;
}

export class RowWriter {
  readonly path: string;
  readonly schema: TypeSchema;

  private readonly engine: ColumnarEngine;
  private readonly options: ResolvedRowWriterOptions;
  private readonly logger: Logger;

  private session?: OpenSession;
  private state: RowWriterState = 'empty';
  private failure?: MarshalError;
  private closed = false;
  private rowsWritten = 0;
  private batchesFlushed = 0;

  constructor(engine: ColumnarEngine, path: string, schema: TypeSchema, options: RowWriterOptions = {}) {
    if (schema.kind !== Kind.Struct) {
      throw MarshalError.schemaMismatch(`Rows need a struct schema, got ${schemaToString(schema)}`, {
        path,
        expected: 'struct',
        actual: schema.category,
      });
    }
    this.engine = engine;
    this.path = path;
    this.schema = schema;
    this.options = resolveRowWriterOptions(options);
    this.logger = withContext(this.options.logger, { path, session: 'writer' });
  }

  /**
   * Encode one row into the current batch, flushing it when full.
   * Rows that fail to encode leave the batch untouched and the session usable.
   *
   * @throws MarshalError
   */
  writeRow(values: readonly Value[]): void {
    this.assertWritable();
    if (values.length !== this.schema.children.length) {
      throw MarshalError.schemaMismatch(
        `Row ${this.rowsWritten} has ${values.length} values, ${schemaToString(this.schema)} declares ${this.schema.children.length}`,
        {
          path: this.path,
          row: this.rowsWritten,
          expected: String(this.schema.children.length),
          actual: String(values.length),
        }
      );
    }

    const { batch } = this.open();
    const result = encodeRow(values, this.schema, batch, batch.size, {
      rowNumber: this.rowsWritten,
      batchCapacity: batch.maxSize,
      growth: this.options.childGrowth,
      resize: (vector, required) => {
        try {
          this.engine.resizeChildVector(vector, required);
        } catch (error) {
          throw wrapEngineError(error, 'resizeChildVector', this.path);
        }
      },
    });
    if (result.isErr()) {
      if (result.error.code === MarshalErrorCode.ENGINE_IO_ERROR) {
        this.fail(result.error);
      }
      throw result.error;
    }

    batch.size++;
    this.rowsWritten++;
    this.state = batch.size === batch.maxSize ? 'full' : 'filling';
    if (this.state === 'full') {
      this.flushBatch(batch);
    }
  }

  /**
   * Hand the buffered rows to the engine, even if the batch is not full.
   *
   * @throws MarshalError
   */
  flush(): void {
    this.assertWritable();
    if (this.session && this.session.batch.size > 0) {
      this.flushBatch(this.session.batch);
    }
  }

  /**
   * Flush what is buffered and commit the file. Safe to call more than once.
   * A failed session is released without flushing.
   *
   * @throws MarshalError
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    // The first failure wins; a later closeWriter failure is only logged.
    let pending: unknown;
    try {
      if (!this.failure) {
        const { batch } = this.open();
        if (batch.size > 0) {
          this.flushBatch(batch);
        }
      }
    } catch (error) {
      pending = error;
    }
    this.state = 'flushed';
    try {
      this.release();
    } catch (error) {
      pending ??= error;
    }
    if (pending !== undefined) {
      throw pending;
    }

    this.logger.info('Writer closed', {
      rowsWritten: this.rowsWritten,
      batchesFlushed: this.batchesFlushed,
      failed: this.failure !== undefined,
    });
  }

  getStats(): RowWriterStats {
    return {
      state: this.state,
      rowsWritten: this.rowsWritten,
      bufferedRows: this.session?.batch.size ?? 0,
      batchesFlushed: this.batchesFlushed,
      failed: this.failure !== undefined,
    };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private assertWritable(): void {
    if (this.closed) {
      throw MarshalError.sessionClosed(this.path);
    }
    if (this.failure) {
      throw MarshalError.sessionFailed(this.path, this.failure);
    }
  }

  private open(): OpenSession {
    if (this.session) {
      return this.session;
    }

    let handle: EngineWriter;
    try {
      handle = this.engine.openWriter(this.path, this.schema, { overwrite: this.options.overwrite });
    } catch (error) {
      throw this.fail(wrapEngineError(error, 'openWriter', this.path));
    }

    let batch: RowBatch;
    try {
      batch = this.engine.allocateBatch(this.schema);
    } catch (error) {
      const failure = this.fail(wrapEngineError(error, 'allocateBatch', this.path));
      this.closeHandle(handle);
      throw failure;
    }

    this.session = { handle, batch };
    this.logger.debug('Writer opened', {
      schema: schemaToString(this.schema),
      maxBatchRows: batch.maxSize,
      overwrite: this.options.overwrite,
    });
    return this.session;
  }

  private flushBatch(batch: RowBatch): void {
    const handle = this.session?.handle;
    if (!handle) {
      return;
    }
    const rows = batch.size;
    try {
      this.engine.writeBatch(handle, batch);
    } catch (error) {
      throw this.fail(wrapEngineError(error, 'writeBatch', this.path));
    }

    this.batchesFlushed++;
    batch.reset();
    this.state = 'empty';
    this.logger.debug('Batch flushed', {
      batch: this.batchesFlushed,
      batchRows: rows,
      rowsWritten: this.rowsWritten,
    });
  }

  private fail(error: MarshalError): MarshalError {
    this.failure ??= error;
    const operation = error.details?.operation;
    this.logger.error('Engine call failed', error, {
      operation: typeof operation === 'string' ? operation : undefined,
      errorCode: error.code,
      rowsWritten: this.rowsWritten,
    });
    return error;
  }

  private release(): void {
    const session = this.session;
    if (!session) {
      return;
    }
    this.session = undefined;
    this.closeHandle(session.handle);
  }

  private closeHandle(handle: EngineWriter): void {
    try {
      this.engine.closeWriter(handle);
    } catch (error) {
      throw this.fail(wrapEngineError(error, 'closeWriter', this.path));
    }
  }
}

/**
 * Open a row writer on `path`. The engine file is created lazily.
 *
 * @example
 * ```typescript
 * const writer = openRowWriter(engine, 'quotes.orc', parseSchema('struct<symbol:string,close:double>'));
 * writer.writeRow([Values.string('AAPL'), Values.double(189.5)]);
 * writer.close();
 * ```
 */
export function openRowWriter(
  engine: ColumnarEngine,
  path: string,
  schema: TypeSchema,
  options: RowWriterOptions = {}
): RowWriter {
  return new RowWriter(engine, path, schema, options);
}

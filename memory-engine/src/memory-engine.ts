/**
 * In-process columnar engine
 *
 * Keeps committed files as lists of row batches. A file becomes visible to
 * readers when its writer is closed; until then it lives in a pending slot
 * owned by that writer.
 *
 * @example
 * ```typescript
 * const engine = new MemoryEngine({ maxBatchSize: 2 });
 * const writer = openRowWriter(engine, 'quotes.orc', schema);
 * writer.writeRow(row);
 * writer.close();
 * engine.stat('quotes.orc'); // { rowCount: 1, batchCount: 1, schema }
 * ```
 */

import {
  DEFAULT_BATCH_SIZE,
  Kind,
  MarshalError,
  createRowBatch,
  schemaToString,
  type ColumnVector,
  type ColumnarEngine,
  type EngineReader,
  type EngineWriter,
  type OpenWriterOptions,
  type RowBatch,
  type TypeSchema,
} from '@orcbatch/core';
import type { OrcBatchConfig } from '@orcbatch/config';

export interface MemoryEngineOptions {
  /** Rows per allocated batch (default 1024) */
  maxBatchSize?: number;
}

export interface StoredFileInfo {
  schema: TypeSchema;
  rowCount: number;
  batchCount: number;
}

interface StoredFile {
  readonly schema: TypeSchema;
  readonly batches: RowBatch[];
  rowCount: number;
}

interface ReaderState {
  readonly file: StoredFile;
  next: number;
}

export class MemoryEngine implements ColumnarEngine {
  readonly maxBatchSize: number;
  private readonly files = new Map<string, StoredFile>();
  private readonly writers = new Map<EngineWriter, StoredFile>();
  private readonly readers = new Map<EngineReader, ReaderState>();

  constructor(options: MemoryEngineOptions = {}) {
    const maxBatchSize = options.maxBatchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
      throw new RangeError(`maxBatchSize must be a positive integer, got ${maxBatchSize}`);
    }
    this.maxBatchSize = maxBatchSize;
  }

  static fromConfig(config: OrcBatchConfig): MemoryEngine {
    return new MemoryEngine({ maxBatchSize: config.engine.maxBatchRows });
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  openReader(path: string): EngineReader {
    const file = this.files.get(path);
    if (!file) {
      throw MarshalError.engineIO(`No file at ${path}`, 'openReader', undefined, path);
    }
    const reader: EngineReader = Object.freeze({ path, schema: file.schema, rowCount: file.rowCount });
    this.readers.set(reader, { file, next: 0 });
    return reader;
  }

  nextBatch(reader: EngineReader, batch: RowBatch): boolean {
    const state = this.readerState(reader, 'nextBatch');
    const stored = state.file.batches[state.next];
    if (!stored) {
      return false;
    }
    batch.load(stored);
    state.next++;
    return true;
  }

  closeReader(reader: EngineReader): void {
    this.readerState(reader, 'closeReader');
    this.readers.delete(reader);
  }

  // ===========================================================================
  // Writing
  // ===========================================================================

  openWriter(path: string, schema: TypeSchema, options: OpenWriterOptions = {}): EngineWriter {
    if (schema.kind !== Kind.Struct) {
      throw MarshalError.engineIO(
        `Files need a struct root schema, got ${schemaToString(schema)}`,
        'openWriter',
        undefined,
        path
      );
    }
    if (this.files.has(path) && !options.overwrite) {
      throw MarshalError.engineIO(`File ${path} already exists`, 'openWriter', undefined, path);
    }
    for (const open of this.writers.keys()) {
      if (open.path === path) {
        throw MarshalError.engineIO(`File ${path} is already open for writing`, 'openWriter', undefined, path);
      }
    }
    const writer: EngineWriter = Object.freeze({ path, schema });
    this.writers.set(writer, { schema, batches: [], rowCount: 0 });
    return writer;
  }

  allocateBatch(schema: TypeSchema): RowBatch {
    return createRowBatch(schema, this.maxBatchSize);
  }

  writeBatch(writer: EngineWriter, batch: RowBatch): void {
    const pending = this.writers.get(writer);
    if (!pending) {
      throw MarshalError.engineIO(`Writer for ${writer.path} is not open`, 'writeBatch', undefined, writer.path);
    }
    if (batch.cols.length !== pending.schema.children.length) {
      throw MarshalError.engineIO(
        `Batch has ${batch.cols.length} columns, ${schemaToString(pending.schema)} needs ${pending.schema.children.length}`,
        'writeBatch',
        undefined,
        writer.path
      );
    }
    if (batch.size === 0) {
      return;
    }
    pending.batches.push(batch.clone());
    pending.rowCount += batch.size;
  }

  closeWriter(writer: EngineWriter): void {
    const pending = this.writers.get(writer);
    if (!pending) {
      throw MarshalError.engineIO(`Writer for ${writer.path} is not open`, 'closeWriter', undefined, writer.path);
    }
    this.writers.delete(writer);
    this.files.set(writer.path, pending);
  }

  resizeChildVector(vector: ColumnVector, requiredCapacity: number): void {
    vector.ensureSize(requiredCapacity, true);
  }

  // ===========================================================================
  // Housekeeping
  // ===========================================================================

  /** Committed paths, sorted */
  listFiles(): string[] {
    return [...this.files.keys()].sort();
  }

  /** Returns false when no committed file exists at `path` */
  deleteFile(path: string): boolean {
    return this.files.delete(path);
  }

  stat(path: string): StoredFileInfo | undefined {
    const file = this.files.get(path);
    return file && { schema: file.schema, rowCount: file.rowCount, batchCount: file.batches.length };
  }

  get openReaders(): number {
    return this.readers.size;
  }

  get openWriters(): number {
    return this.writers.size;
  }

  private readerState(reader: EngineReader, operation: string): ReaderState {
    const state = this.readers.get(reader);
    if (!state) {
      throw MarshalError.engineIO(`Reader for ${reader.path} is not open`, operation, undefined, reader.path);
    }
    return state;
  }
}

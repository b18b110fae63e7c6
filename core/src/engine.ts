/**
 * Columnar engine contract
 *
 * The engine owns files: it hands out batches, fills them on read and takes
 * them on write. Row writers and readers talk to it only through this
 * interface, so any engine (native bindings, an in-memory store, a fault
 * injecting wrapper in tests) can sit underneath.
 *
 * All calls are synchronous. Failures may be thrown as anything; callers
 * convert them with `wrapEngineError`.
 */

import type { TypeSchema } from './types.js';
import type { ColumnVector, RowBatch } from './vectors.js';

/** Open read handle on a committed file */
export interface EngineReader {
  readonly path: string;
  /** Root struct schema of the file */
  readonly schema: TypeSchema;
  /** Total rows in the file */
  readonly rowCount: number;
}

/** Open write handle; the file becomes visible once closed */
export interface EngineWriter {
  readonly path: string;
  readonly schema: TypeSchema;
}

export interface OpenWriterOptions {
  /** Replace an existing file at `path` */
  overwrite?: boolean;
}

export interface ColumnarEngine {
  openReader(path: string): EngineReader;
  openWriter(path: string, schema: TypeSchema, options?: OpenWriterOptions): EngineWriter;
  /** Allocate an empty batch sized by the engine */
  allocateBatch(schema: TypeSchema): RowBatch;
  /** Fill `batch` with the next stored batch; false once the file is exhausted */
  nextBatch(reader: EngineReader, batch: RowBatch): boolean;
  /** Append the first `batch.size` rows */
  writeBatch(writer: EngineWriter, batch: RowBatch): void;
  closeReader(reader: EngineReader): void;
  closeWriter(writer: EngineWriter): void;
  /** Grow a child vector of a container to at least `requiredCapacity` rows */
  resizeChildVector(vector: ColumnVector, requiredCapacity: number): void;
}

/**
 * @orcbatch/writer - RowWriter Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  MarshalError,
  MarshalErrorCode,
  Types,
  Values,
  createTestLogger,
  type ColumnVector,
  type TestLogger,
} from '@orcbatch/core';
import { createConfig } from '@orcbatch/config';
import { MemoryEngine } from '@orcbatch/memory-engine';
import { FaultInjectingEngine, idRows, idSchema, tagSchema } from '@orcbatch/test-utils';
import { RowWriter, openRowWriter, resolveRowWriterOptions } from '../index.js';

function thrown(fn: () => unknown): MarshalError {
  try {
    fn();
  } catch (error) {
    if (error instanceof MarshalError) return error;
    throw error;
  }
  throw new Error('expected a MarshalError');
}

/** Records the capacities child vectors are grown to */
class RecordingEngine extends MemoryEngine {
  readonly resizes: number[] = [];

  override resizeChildVector(vector: ColumnVector, requiredCapacity: number): void {
    this.resizes.push(requiredCapacity);
    super.resizeChildVector(vector, requiredCapacity);
  }
}

const threeTags = [
  Values.int(1),
  Values.list([Values.string('a'), Values.string('b'), Values.string('c')]),
];

describe('RowWriter', () => {
  let engine: MemoryEngine;

  beforeEach(() => {
    engine = new MemoryEngine({ maxBatchSize: 2 });
  });

  // ===========================================================================
  // Batching
  // ===========================================================================

  describe('batching', () => {
    it('should flush exactly once when the batch fills', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      for (const row of idRows(3)) writer.writeRow(row);

      expect(writer.getStats()).toEqual({
        state: 'filling',
        rowsWritten: 3,
        bufferedRows: 1,
        batchesFlushed: 1,
        failed: false,
      });
    });

    it('should flush the remainder and commit on close', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      for (const row of idRows(3)) writer.writeRow(row);
      writer.close();

      expect(engine.stat('ids.orc')).toEqual({ schema: idSchema, rowCount: 3, batchCount: 2 });
      expect(writer.getStats()).toMatchObject({ state: 'flushed', batchesFlushed: 2, bufferedRows: 0 });
      expect(engine.openWriters).toBe(0);
    });

    it('should move empty -> filling -> empty as batches fill and flush', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      const states = [writer.getStats().state];
      for (const row of idRows(2)) {
        writer.writeRow(row);
        states.push(writer.getStats().state);
      }
      expect(states).toEqual(['empty', 'filling', 'empty']);
    });

    it('should commit an empty file when closed unused', () => {
      openRowWriter(engine, 'empty.orc', idSchema).close();
      expect(engine.stat('empty.orc')).toEqual({ schema: idSchema, rowCount: 0, batchCount: 0 });
    });

    it('should flush a partial batch on demand', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      writer.writeRow([Values.long(1n)]);
      writer.flush();
      writer.flush();

      expect(writer.getStats()).toMatchObject({ bufferedRows: 0, batchesFlushed: 1 });
    });
  });

  // ===========================================================================
  // Rejected rows
  // ===========================================================================

  describe('rejected rows', () => {
    it('should reject non-struct schemas', () => {
      const error = thrown(() => new RowWriter(engine, 'x.orc', Types.int()));
      expect(error.code).toBe(MarshalErrorCode.SCHEMA_MISMATCH);
      expect(error.message).toBe('Rows need a struct schema, got int');
    });

    it('should reject rows of the wrong length', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      const error = thrown(() => writer.writeRow([Values.long(1n), Values.long(2n)]));
      expect(error.code).toBe(MarshalErrorCode.SCHEMA_MISMATCH);
      expect(error.message).toBe('Row 0 has 2 values, struct<id:bigint> declares 1');
    });

    it('should stay usable after a row fails to encode', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      const error = thrown(() => writer.writeRow([Values.string('one')]));
      expect(error.message).toBe('bigint expected for field id in row 0, got string');

      writer.writeRow([Values.long(1n)]);
      writer.close();
      expect(engine.stat('ids.orc')?.rowCount).toBe(1);
    });

    it('should report the file row number in errors', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      for (const row of idRows(3)) writer.writeRow(row);
      expect(thrown(() => writer.writeRow([Values.double(1)])).row).toBe(3);
    });
  });

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  describe('lifecycle', () => {
    it('should refuse rows after close', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      writer.close();

      const error = thrown(() => writer.writeRow([Values.long(1n)]));
      expect(error.code).toBe(MarshalErrorCode.SESSION_CLOSED);
      expect(error.message).toBe('Session for ids.orc is closed');
      expect(thrown(() => writer.flush()).code).toBe(MarshalErrorCode.SESSION_CLOSED);
    });

    it('should ignore a second close', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema);
      writer.close();
      expect(() => writer.close()).not.toThrow();
      expect(writer.isClosed).toBe(true);
    });

    it('should not replace an existing file unless overwrite is set', () => {
      openRowWriter(engine, 'ids.orc', idSchema).close();
      const writer = openRowWriter(engine, 'ids.orc', idSchema, { overwrite: false });

      const error = thrown(() => writer.writeRow([Values.long(1n)]));
      expect(error.code).toBe(MarshalErrorCode.ENGINE_IO_ERROR);
      expect(error.message).toBe('File ids.orc already exists');
    });
  });

  // ===========================================================================
  // Engine failures
  // ===========================================================================

  describe('engine failures', () => {
    it('should surface a failed writeBatch and refuse further rows', () => {
      const faulty = new FaultInjectingEngine(engine, { failOnCall: { writeBatch: 1 } });
      const writer = openRowWriter(faulty, 'ids.orc', idSchema);
      writer.writeRow([Values.long(0n)]);

      const error = thrown(() => writer.writeRow([Values.long(1n)]));
      expect(error.code).toBe(MarshalErrorCode.ENGINE_IO_ERROR);
      expect(error.message).toBe('Engine writeBatch failed: Injected writeBatch failure on call 1');
      expect(error.details?.operation).toBe('writeBatch');

      const next = thrown(() => writer.writeRow([Values.long(2n)]));
      expect(next.code).toBe(MarshalErrorCode.SESSION_FAILED);
      expect(next.cause).toBe(error);
      expect(writer.getStats().failed).toBe(true);
    });

    it('should release the engine writer without flushing after a failure', () => {
      const faulty = new FaultInjectingEngine(engine, { failOnCall: { writeBatch: 1 } });
      const writer = openRowWriter(faulty, 'ids.orc', idSchema);
      for (const row of idRows(1)) writer.writeRow(row);
      thrown(() => writer.writeRow([Values.long(1n)]));

      writer.close();
      expect(faulty.callCount('writeBatch')).toBe(1);
      expect(faulty.callCount('closeWriter')).toBe(1);
      expect(engine.openWriters).toBe(0);
    });

    it('should fail the session when openWriter fails', () => {
      const faulty = new FaultInjectingEngine(engine, { failOnCall: { openWriter: 1 } });
      const writer = openRowWriter(faulty, 'ids.orc', idSchema);

      expect(thrown(() => writer.writeRow([Values.long(1n)])).message).toBe(
        'Engine openWriter failed: Injected openWriter failure on call 1'
      );
      expect(thrown(() => writer.writeRow([Values.long(1n)])).code).toBe(MarshalErrorCode.SESSION_FAILED);
      expect(() => writer.close()).not.toThrow();
    });

    it('should close the engine writer when allocateBatch fails', () => {
      const faulty = new FaultInjectingEngine(engine, { failOnCall: { allocateBatch: 1 } });
      const writer = openRowWriter(faulty, 'ids.orc', idSchema);

      expect(thrown(() => writer.writeRow([Values.long(1n)])).details?.operation).toBe('allocateBatch');
      expect(engine.openWriters).toBe(0);
    });

    it('should fail the session when a child vector cannot grow', () => {
      const faulty = new FaultInjectingEngine(engine, { failOnCall: { resizeChildVector: 1 } });
      const writer = openRowWriter(faulty, 'tags.orc', tagSchema);

      const error = thrown(() => writer.writeRow(threeTags));
      expect(error.message).toBe('Engine resizeChildVector failed: Injected resizeChildVector failure on call 1');
      expect(writer.getStats().failed).toBe(true);
    });

    it('should throw from close when closeWriter fails', () => {
      const faulty = new FaultInjectingEngine(engine, { failOnCall: { closeWriter: 1 } });
      const writer = openRowWriter(faulty, 'ids.orc', idSchema);
      writer.writeRow([Values.long(1n)]);

      expect(thrown(() => writer.close()).details?.operation).toBe('closeWriter');
      expect(faulty.callCount('writeBatch')).toBe(1);
      expect(() => writer.close()).not.toThrow();
    });

    it('should throw the flush failure from close when closeWriter fails too', () => {
      const logger = createTestLogger();
      const faulty = new FaultInjectingEngine(engine, { failOnCall: { writeBatch: 1, closeWriter: 1 } });
      const writer = openRowWriter(faulty, 'ids.orc', idSchema, { logger });
      writer.writeRow([Values.long(1n)]);

      const error = thrown(() => writer.close());
      expect(error.message).toBe('Engine writeBatch failed: Injected writeBatch failure on call 1');
      expect(faulty.callCount('closeWriter')).toBe(1);
      expect(writer.getStats()).toMatchObject({ state: 'flushed', failed: true });
      expect(logger.getLogsByLevel('error').map((entry) => entry.context?.operation)).toEqual([
        'writeBatch',
        'closeWriter',
      ]);
    });
  });

  // ===========================================================================
  // Options
  // ===========================================================================

  describe('options', () => {
    it('should resolve explicit options over config over defaults', () => {
      const config = createConfig({ writer: { overwrite: false, childGrowth: 'exact' } });

      expect(resolveRowWriterOptions()).toMatchObject({ overwrite: true, childGrowth: 'proactive' });
      expect(resolveRowWriterOptions({ config })).toMatchObject({ overwrite: false, childGrowth: 'exact' });
      expect(resolveRowWriterOptions({ config, overwrite: true })).toMatchObject({
        overwrite: true,
        childGrowth: 'exact',
      });
    });

    it('should size child vectors for a whole batch under proactive growth', () => {
      const recording = new RecordingEngine({ maxBatchSize: 2 });
      openRowWriter(recording, 'tags.orc', tagSchema).writeRow(threeTags);
      expect(recording.resizes).toEqual([6]);
    });

    it('should grow child vectors by doubling under exact growth', () => {
      const recording = new RecordingEngine({ maxBatchSize: 2 });
      openRowWriter(recording, 'tags.orc', tagSchema, { childGrowth: 'exact' }).writeRow(threeTags);
      expect(recording.resizes).toEqual([4]);
    });
  });

  // ===========================================================================
  // Logging
  // ===========================================================================

  describe('logging', () => {
    let logger: TestLogger;

    beforeEach(() => {
      logger = createTestLogger();
    });

    it('should log open, flush and close with session context', () => {
      const writer = openRowWriter(engine, 'ids.orc', idSchema, { logger });
      for (const row of idRows(2)) writer.writeRow(row);
      writer.close();

      expect(logger.getLogs().map((entry) => entry.message)).toEqual(['Writer opened', 'Batch flushed', 'Writer closed']);
      expect(logger.getLogsByLevel('debug')[0]?.context).toEqual({
        path: 'ids.orc',
        session: 'writer',
        schema: 'struct<id:bigint>',
        maxBatchRows: 2,
        overwrite: true,
      });
      expect(logger.getLogsByLevel('info')[0]?.context).toEqual({
        path: 'ids.orc',
        session: 'writer',
        rowsWritten: 2,
        batchesFlushed: 1,
        failed: false,
      });
    });

    it('should log engine failures at error level', () => {
      const faulty = new FaultInjectingEngine(engine, { failOnCall: { writeBatch: 1 } });
      const writer = openRowWriter(faulty, 'ids.orc', idSchema, { logger });
      for (const row of idRows(1)) writer.writeRow(row);
      thrown(() => writer.writeRow([Values.long(1n)]));

      const [entry] = logger.getLogsByLevel('error');
      expect(entry?.message).toBe('Engine call failed');
      expect(entry?.context).toEqual({
        path: 'ids.orc',
        session: 'writer',
        operation: 'writeBatch',
        errorCode: 'ENGINE_IO_ERROR',
        rowsWritten: 2,
      });
    });
  });
});

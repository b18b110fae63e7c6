/**
 * Fault injection for columnar engines
 *
 * Wraps any ColumnarEngine and fails chosen operations, either on a fixed
 * call number or with a seeded probability, so failure paths of row
 * writers and readers are reproducible.
 */

import type {
  ColumnVector,
  ColumnarEngine,
  EngineReader,
  EngineWriter,
  OpenWriterOptions,
  RowBatch,
  TypeSchema,
} from '@orcbatch/core';

export type EngineOperation =
  | 'openReader'
  | 'openWriter'
  | 'allocateBatch'
  | 'nextBatch'
  | 'writeBatch'
  | 'closeReader'
  | 'closeWriter'
  | 'resizeChildVector';

export interface FaultInjectingEngineOptions {
  /** Fail the nth call (1-based) of each listed operation */
  failOnCall?: Partial<Record<EngineOperation, number>>;
  /** Fail any affected call with this probability (0-1) */
  failureProbability?: number;
  /** Operations the probability applies to (default: all) */
  affectedOperations?: readonly EngineOperation[];
  seed?: number;
}

// =============================================================================
// Seeded Random Number Generator
// =============================================================================

/**
 * mulberry32; same seed, same sequence
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed;
  }

  /** In [0, 1) */
  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }
}

/**
 * Thrown in place of the wrapped engine's result.
 */
export class EngineFaultError extends Error {
  readonly operation: EngineOperation;
  readonly call: number;

  constructor(operation: EngineOperation, call: number) {
    super(`Injected ${operation} failure on call ${call}`);
    this.name = 'EngineFaultError';
    this.operation = operation;
    this.call = call;
  }
}

// =============================================================================
// FaultInjectingEngine
// =============================================================================

export class FaultInjectingEngine implements ColumnarEngine {
  private readonly engine: ColumnarEngine;
  private readonly random: SeededRandom;
  private readonly failOnCall: Partial<Record<EngineOperation, number>>;
  private readonly affected: ReadonlySet<EngineOperation> | undefined;
  private failureProbability: number;
  private readonly calls = new Map<EngineOperation, number>();

  constructor(engine: ColumnarEngine, options: FaultInjectingEngineOptions = {}) {
    this.engine = engine;
    this.random = new SeededRandom(options.seed);
    this.failOnCall = { ...options.failOnCall };
    this.failureProbability = options.failureProbability ?? 0;
    this.affected = options.affectedOperations && new Set(options.affectedOperations);
  }

  openReader(path: string): EngineReader {
    this.before('openReader');
    return this.engine.openReader(path);
  }

  openWriter(path: string, schema: TypeSchema, options?: OpenWriterOptions): EngineWriter {
    this.before('openWriter');
    return this.engine.openWriter(path, schema, options);
  }

  allocateBatch(schema: TypeSchema): RowBatch {
    this.before('allocateBatch');
    return this.engine.allocateBatch(schema);
  }

  nextBatch(reader: EngineReader, batch: RowBatch): boolean {
    this.before('nextBatch');
    return this.engine.nextBatch(reader, batch);
  }

  writeBatch(writer: EngineWriter, batch: RowBatch): void {
    this.before('writeBatch');
    this.engine.writeBatch(writer, batch);
  }

  closeReader(reader: EngineReader): void {
    this.before('closeReader');
    this.engine.closeReader(reader);
  }

  closeWriter(writer: EngineWriter): void {
    this.before('closeWriter');
    this.engine.closeWriter(writer);
  }

  resizeChildVector(vector: ColumnVector, requiredCapacity: number): void {
    this.before('resizeChildVector');
    this.engine.resizeChildVector(vector, requiredCapacity);
  }

  /** Calls made so far, including failed ones */
  callCount(operation: EngineOperation): number {
    return this.calls.get(operation) ?? 0;
  }

  /** Fail call number `call` (1-based, counting calls already made) of `operation` */
  failOn(operation: EngineOperation, call: number): void {
    this.failOnCall[operation] = call;
  }

  setFailureProbability(probability: number): void {
    this.failureProbability = probability;
  }

  private before(operation: EngineOperation): void {
    const call = this.callCount(operation) + 1;
    this.calls.set(operation, call);
    if (this.failOnCall[operation] === call) {
      throw new EngineFaultError(operation, call);
    }
    if (this.failureProbability > 0 && (this.affected?.has(operation) ?? true) && this.random.chance(this.failureProbability)) {
      throw new EngineFaultError(operation, call);
    }
  }
}

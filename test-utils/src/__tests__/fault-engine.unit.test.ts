/**
 * @orcbatch/test-utils - FaultInjectingEngine Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { MemoryEngine } from '@orcbatch/memory-engine';
import { EngineFaultError, FaultInjectingEngine, SeededRandom, idSchema } from '../index.js';

function failures(engine: FaultInjectingEngine, calls: number): number {
  let failed = 0;
  for (let i = 0; i < calls; i++) {
    try {
      engine.allocateBatch(idSchema);
    } catch (error) {
      if (!(error instanceof EngineFaultError)) throw error;
      failed++;
    }
  }
  return failed;
}

describe('SeededRandom', () => {
  it('should repeat its sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const first = Array.from({ length: 5 }, () => a.next());
    expect(Array.from({ length: 5 }, () => b.next())).toEqual(first);
  });

  it('should stay within [0, 1)', () => {
    const random = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('FaultInjectingEngine', () => {
  it('should delegate calls and count them', () => {
    const engine = new FaultInjectingEngine(new MemoryEngine({ maxBatchSize: 3 }));
    expect(engine.allocateBatch(idSchema).maxSize).toBe(3);
    expect(engine.callCount('allocateBatch')).toBe(1);
    expect(engine.callCount('writeBatch')).toBe(0);
  });

  it('should fail only the chosen call', () => {
    const engine = new FaultInjectingEngine(new MemoryEngine(), { failOnCall: { openWriter: 2 } });
    engine.openWriter('a.orc', idSchema);

    expect(() => engine.openWriter('b.orc', idSchema)).toThrow(
      new EngineFaultError('openWriter', 2)
    );
    expect(() => engine.openWriter('c.orc', idSchema)).not.toThrow();
    expect(engine.callCount('openWriter')).toBe(3);
  });

  it('should arm failures after construction', () => {
    const engine = new FaultInjectingEngine(new MemoryEngine());
    engine.allocateBatch(idSchema);
    engine.failOn('allocateBatch', 2);

    const error = (() => {
      try {
        engine.allocateBatch(idSchema);
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();
    expect(error).toBeInstanceOf(EngineFaultError);
    expect(error instanceof EngineFaultError && [error.operation, error.call]).toEqual(['allocateBatch', 2]);
  });

  it('should fail every affected call at probability 1 and none at 0', () => {
    const engine = new FaultInjectingEngine(new MemoryEngine(), { failureProbability: 1, seed: 1 });
    expect(failures(engine, 5)).toBe(5);

    engine.setFailureProbability(0);
    expect(failures(engine, 5)).toBe(0);
  });

  it('should limit probabilistic failures to the listed operations', () => {
    const engine = new FaultInjectingEngine(new MemoryEngine(), {
      failureProbability: 1,
      affectedOperations: ['writeBatch'],
      seed: 1,
    });
    expect(failures(engine, 3)).toBe(0);
  });

  it('should inject the same failures for the same seed', () => {
    const run = (): number =>
      failures(new FaultInjectingEngine(new MemoryEngine(), { failureProbability: 0.5, seed: 99 }), 50);
    expect(run()).toBe(run());
  });
});

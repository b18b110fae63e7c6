/**
 * @orcbatch/core - Property-based round trips
 *
 * Any row that encodes decodes back to an equal row, and a row that fails
 * to encode leaves the batch as it was.
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { rowArb, schemaWithRowsArb } from '@orcbatch/test-utils';
import { encodeRow } from '../encoder.js';
import { decodeRow } from '../decoder.js';
import { Values, valuesEqual, type Value } from '../value.js';
import { createRowBatch } from '../vectors.js';
import { Types } from '../types.js';

function rowsEqual(a: readonly Value[], b: readonly Value[]): boolean {
  return valuesEqual(Values.list(a), Values.list(b));
}

describe('encode then decode', () => {
  it('returns float values unchanged', () => {
    const schema = Types.struct({ f: Types.float() });
    const batch = createRowBatch(schema, 1);
    const row = [Values.float(0.1)];
    encodeRow(row, schema, batch, 0).unwrap();
    batch.size = 1;

    const [decoded] = decodeRow(batch, schema, 0).unwrap();
    expect(decoded).toEqual({ kind: 'float', value: Math.fround(0.1) });
    expect(rowsEqual(decodeRow(batch, schema, 0).unwrap(), row)).toBe(true);
  });

  it('returns equal rows for any schema', () => {
    fc.assert(
      fc.property(schemaWithRowsArb({ maxRows: 6 }), ({ schema, rows }) => {
        const batch = createRowBatch(schema, rows.length);
        for (const row of rows) {
          expect(encodeRow(row, schema, batch, batch.size).isOk()).toBe(true);
          batch.size++;
        }
        rows.forEach((row, i) => {
          expect(rowsEqual(decodeRow(batch, schema, i).unwrap(), row)).toBe(true);
        });
      }),
      { numRuns: 200 }
    );
  });

  it('returns null wherever null was written', () => {
    fc.assert(
      fc.property(schemaWithRowsArb({ minRows: 1, maxRows: 1 }), fc.nat(), ({ schema, rows }, pick) => {
        const row = [...(rows[0] ?? [])];
        const index = pick % row.length;
        row[index] = Values.null();

        const batch = createRowBatch(schema, 1);
        encodeRow(row, schema, batch, 0).unwrap();
        batch.size = 1;
        expect(decodeRow(batch, schema, 0).unwrap()[index]).toEqual(Values.null());
      }),
      { numRuns: 100 }
    );
  });

  it('leaves the batch untouched when a row is rejected', () => {
    fc.assert(
      fc.property(
        schemaWithRowsArb({ minRows: 1, maxRows: 4 }).chain(({ schema, rows }) =>
          rowArb(schema).map((extra) => ({ schema, rows, extra }))
        ),
        ({ schema, rows, extra }) => {
          const batch = createRowBatch(schema, rows.length + 1);
          for (const row of rows) {
            encodeRow(row, schema, batch, batch.size).unwrap();
            batch.size++;
          }
          const before = batch.clone();

          const rejected = [...extra.slice(0, -1), Values.date(0)];
          expect(encodeRow(rejected, schema, batch, batch.size).isErr()).toBe(true);
          expect(batch.clone()).toEqual(before);
        }
      ),
      { numRuns: 100 }
    );
  });
});

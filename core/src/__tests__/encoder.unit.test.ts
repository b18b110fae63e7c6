/**
 * @orcbatch/core - Encoder tests
 *
 * Check pass failures must leave the batch untouched; the write pass fills
 * offsets, lengths and child vectors.
 */

import { describe, it, expect } from 'vitest';
import { encodeCell, encodeRow } from '../encoder.js';
import { Values, type Value } from '../value.js';
import { Types, type TypeSchema } from '../types.js';
import { MarshalErrorCode, type MarshalError } from '../errors.js';
import {
  BytesColumnVector,
  DecimalColumnVector,
  DoubleColumnVector,
  ListColumnVector,
  LongColumnVector,
  MapColumnVector,
  StructColumnVector,
  TimestampColumnVector,
  UnionColumnVector,
  createRowBatch,
  createVector,
  type ColumnVector,
  type RowBatch,
} from '../vectors.js';

const utf8 = new TextDecoder();

function encodeError(row: readonly Value[], schema: TypeSchema, batch: RowBatch = createRowBatch(schema, 4)): MarshalError {
  const result = encodeRow(row, schema, batch, 0);
  if (result.isOk()) throw new Error('expected encodeRow to fail');
  return result.error;
}

function cellError(value: Value, schema: TypeSchema, field = 'value'): MarshalError {
  const result = encodeCell(value, schema, createVector(schema, 4), 0, { fieldName: field });
  if (result.isOk()) throw new Error('expected encodeCell to fail');
  return result.error;
}

function column<T extends ColumnVector>(batch: RowBatch, index: number, type: new (...args: never[]) => T): T {
  const vector = batch.cols[index];
  if (!(vector instanceof type)) throw new Error(`column ${index} is not a ${type.name}`);
  return vector;
}

/** Nothing written: no nulls flagged and no child slots used */
function expectPristine(vector: ColumnVector): void {
  expect(vector.noNulls).toBe(true);
  expect(Array.from(vector.isNull).every((flag) => flag === 0)).toBe(true);
  if (vector instanceof ListColumnVector || vector instanceof MapColumnVector) {
    expect(vector.childCount).toBe(0);
  }
}

// =============================================================================
// Scalars
// =============================================================================

describe('encodeRow scalars', () => {
  const schema = Types.struct({
    symbol: Types.string(),
    close: Types.double(),
    date: Types.timestamp(),
    flag: Types.boolean(),
    price: Types.decimal(10, 2),
  });

  it('writes each column at the row index', () => {
    const batch = createRowBatch(schema, 4);
    const result = encodeRow(
      [
        Values.string('AAPL'),
        Values.double(179.66),
        Values.timestamp(Date.UTC(2024, 2, 1), 5),
        Values.boolean(true),
        Values.decimal('12.5'),
      ],
      schema,
      batch,
      1
    );

    expect(result.isOk()).toBe(true);
    expect(utf8.decode(column(batch, 0, BytesColumnVector).getBytes(1))).toBe('AAPL');
    expect(column(batch, 1, DoubleColumnVector).vector[1]).toBe(179.66);
    expect(column(batch, 2, TimestampColumnVector).time[1]).toBe(Date.UTC(2024, 2, 1));
    expect(column(batch, 2, TimestampColumnVector).nanos[1]).toBe(5);
    expect(column(batch, 3, LongColumnVector).vector[1]).toBe(1n);
    expect(column(batch, 4, DecimalColumnVector).vector[1]).toEqual({ unscaled: 125n, scale: 1 });
    expect(batch.size).toBe(0);
  });

  it('marks nulls without writing storage', () => {
    const batch = createRowBatch(schema, 4);
    encodeRow([Values.null(), Values.double(1), Values.null(), Values.null(), Values.null()], schema, batch, 0);

    const symbols = column(batch, 0, BytesColumnVector);
    expect(symbols.isNull[0]).toBe(1);
    expect(symbols.noNulls).toBe(false);
    expect(symbols.vector[0]).toBeUndefined();
    expect(column(batch, 1, DoubleColumnVector).noNulls).toBe(true);
  });

  it('rejects a value of the wrong tag', () => {
    const error = cellError(Values.string('x'), Types.double(), 'close');
    expect(error.code).toBe(MarshalErrorCode.TYPE_MISMATCH);
    expect(error.message).toBe('double expected for field close in row 0, got string');
  });

  it('rejects int values outside 32 bits', () => {
    const error = cellError(Values.int(2 ** 31), Types.int(), 'n');
    expect(error.message).toBe('int (32-bit int) expected for field n in row 0, got int 2147483648');
  });

  it('rejects float values that are not 32-bit', () => {
    const error = cellError({ kind: 'float', value: 0.1 }, Types.float(), 'f');
    expect(error.code).toBe(MarshalErrorCode.TYPE_MISMATCH);
    expect(error.message).toBe('float (32-bit float) expected for field f in row 0, got float 0.1');
    expect(encodeCell(Values.float(0.1), Types.float(), createVector(Types.float(), 1), 0).isOk()).toBe(true);
  });

  it('rejects timestamps with nanos outside a second', () => {
    const error = cellError({ kind: 'timestamp', millis: 1000, nanos: 3_000_000_000 }, Types.timestamp(), 'ts');
    expect(error.code).toBe(MarshalErrorCode.TYPE_MISMATCH);
    expect(error.message).toBe(
      'timestamp (nanos in 0..999999999) expected for field ts in row 0, got millis 1000, nanos 3000000000'
    );
    expect(cellError({ kind: 'timestamp', millis: 1000, nanos: -1 }, Types.timestamp(), 'ts').message).toBe(
      'timestamp (nanos in 0..999999999) expected for field ts in row 0, got millis 1000, nanos -1'
    );
  });

  it('rejects timestamps with fractional or NaN millis', () => {
    expect(cellError({ kind: 'timestamp', millis: 1.5, nanos: 0 }, Types.timestamp(), 'ts').message).toBe(
      'timestamp (integer millis) expected for field ts in row 0, got millis 1.5, nanos 0'
    );
    expect(cellError({ kind: 'timestamp', millis: NaN, nanos: 0 }, Types.timestamp(), 'ts').message).toBe(
      'timestamp (integer millis) expected for field ts in row 0, got millis NaN, nanos 0'
    );
  });

  it('rejects timestamps whose millis and nanos disagree', () => {
    expect(cellError({ kind: 'timestamp', millis: 1000, nanos: 5_000_000 }, Types.timestamp(), 'ts').message).toBe(
      'timestamp (millis and nanos agreeing on the millisecond) expected for field ts in row 0, got millis 1000, nanos 5000000'
    );
  });

  it('accepts timestamps before the epoch', () => {
    const vector = createVector(Types.timestamp(), 1);
    expect(encodeCell(Values.timestamp(-1), Types.timestamp(), vector, 0).isOk()).toBe(true);
    expect(vector instanceof TimestampColumnVector && [vector.time[0], vector.nanos[0]]).toEqual([-1, 999_000_000]);
  });

  it('leaves the batch untouched when a timestamp is rejected', () => {
    const stamped = Types.struct({ s: Types.string(), ts: Types.timestamp() });
    const batch = createRowBatch(stamped, 2);
    encodeError([Values.string('x'), { kind: 'timestamp', millis: 0, nanos: 2 ** 31 }], stamped, batch);
    batch.cols.forEach(expectPristine);
  });

  it('truncates long values to 64 bits', () => {
    const vector = createVector(Types.bigint(), 1);
    encodeCell(Values.long(2n ** 64n + 3n), Types.bigint(), vector, 0);
    expect(vector instanceof LongColumnVector && vector.vector[0]).toBe(3n);
  });

  it('tracks decimal precision and scale of the last value', () => {
    const vector = createVector(Types.decimal(10, 2), 2);
    encodeCell(Values.decimal('123.456'), Types.decimal(10, 2), vector, 0);
    encodeCell(Values.decimal('0.5'), Types.decimal(10, 2), vector, 1);

    expect(vector instanceof DecimalColumnVector && [vector.precision, vector.scale]).toEqual([1, 1]);
    expect(vector instanceof DecimalColumnVector && vector.vector[0]).toEqual({ unscaled: 123456n, scale: 3 });
  });

  it('rejects decimals over 38 digits', () => {
    const error = cellError(Values.decimal(10n ** 38n), Types.decimal(), 'amount');
    expect(error.message).toBe(
      'decimal of at most 38 digits expected for field amount in row 0, got decimal of 39 digits'
    );
  });

  it('reports the caller row number', () => {
    const named = Types.struct({ s: Types.string() });
    const result = encodeRow([Values.int(1)], named, createRowBatch(named, 2), 0, { rowNumber: 41 });
    expect(result.isErr() && result.error.row).toBe(41);
  });

  it('throws RangeError for a row index outside the batch', () => {
    const ids = Types.struct({ n: Types.int() });
    expect(() => encodeRow([Values.int(1)], ids, createRowBatch(ids, 2), 2)).toThrow('Row index 2 is outside 0..1');
  });
});

// =============================================================================
// Arity
// =============================================================================

describe('arity', () => {
  const schema = Types.struct({
    a: Types.string(),
    pos: Types.struct({ x: Types.double(), y: Types.double() }),
    c: Types.int(),
  });

  it('rejects a row of the wrong length without touching the batch', () => {
    const batch = createRowBatch(schema, 4);
    const error = encodeError([Values.string('x')], schema, batch);

    expect(error.code).toBe(MarshalErrorCode.ARITY_MISMATCH);
    expect(error.message).toBe('Struct field row in row 0 has 1 values, schema declares 3 fields');
    batch.cols.forEach(expectPristine);
  });

  it('rejects a nested struct of the wrong length before writing earlier columns', () => {
    const batch = createRowBatch(schema, 4);
    const error = encodeError([Values.string('x'), Values.struct([Values.double(1)]), Values.int(1)], schema, batch);

    expect(error.code).toBe(MarshalErrorCode.ARITY_MISMATCH);
    expect(error.field).toBe('pos');
    expect(column(batch, 0, BytesColumnVector).vector[0]).toBeUndefined();
    batch.cols.forEach(expectPristine);
  });

  it('rejects non-struct root schemas', () => {
    const result = encodeRow([], Types.int(), createRowBatch(Types.struct({}), 1), 0);
    expect(result.isErr() && result.error.code).toBe(MarshalErrorCode.SCHEMA_MISMATCH);
  });
});

// =============================================================================
// Lists
// =============================================================================

describe('lists', () => {
  const schema = Types.struct({ id: Types.int(), tags: Types.list(Types.string()) });

  it('appends elements at childCount and records offset and length', () => {
    const batch = createRowBatch(schema, 4);
    encodeRow([Values.int(1), Values.list([Values.string('a'), Values.string('b')])], schema, batch, 0);
    encodeRow([Values.int(2), Values.list([Values.string('c')])], schema, batch, 1);

    const tags = column(batch, 1, ListColumnVector);
    expect(Array.from(tags.offsets.slice(0, 2))).toEqual([0, 2]);
    expect(Array.from(tags.lengths.slice(0, 2))).toEqual([2, 1]);
    expect(tags.childCount).toBe(3);
    const child = tags.child;
    expect(child instanceof BytesColumnVector && utf8.decode(child.getBytes(2))).toBe('c');
  });

  it('allows null elements', () => {
    const batch = createRowBatch(schema, 2);
    encodeRow([Values.int(1), Values.list([Values.null(), Values.string('x')])], schema, batch, 0);

    const tags = column(batch, 1, ListColumnVector);
    expect(tags.child.isNull[0]).toBe(1);
    expect(tags.child.isNull[1]).toBe(0);
  });

  it('rejects heterogeneous elements before any mutation', () => {
    const batch = createRowBatch(schema, 2);
    const error = encodeError([Values.int(1), Values.list([Values.string('a'), Values.int(1)])], schema, batch);

    expect(error.code).toBe(MarshalErrorCode.TYPE_MISMATCH);
    expect(error.message).toBe('list of Bytes elements expected for field tags in row 0, got Int64 element');
    batch.cols.forEach(expectPristine);
    expect(column(batch, 0, LongColumnVector).vector[0]).toBe(0n);
  });

  it('grows the child for a whole batch of similar rows when proactive', () => {
    const batch = createRowBatch(schema, 4);
    const tags = Values.list(Array.from({ length: 6 }, (_, i) => Values.string(`t${i}`)));
    encodeRow([Values.int(1), tags], schema, batch, 0);

    expect(column(batch, 1, ListColumnVector).child.capacity).toBe(24);
  });

  it('grows the child by doubling when exact', () => {
    const batch = createRowBatch(schema, 4);
    const tags = Values.list(Array.from({ length: 6 }, (_, i) => Values.string(`t${i}`)));
    encodeRow([Values.int(1), tags], schema, batch, 0, { growth: 'exact' });

    expect(column(batch, 1, ListColumnVector).child.capacity).toBe(8);
  });

  it('routes growth through the resize hook', () => {
    const batch = createRowBatch(schema, 2);
    const calls: number[] = [];
    encodeRow([Values.int(1), Values.list([Values.string('a'), Values.string('b'), Values.string('c')])], schema, batch, 0, {
      resize: (vector, required) => {
        calls.push(required);
        vector.ensureSize(required, true);
      },
    });

    expect(calls).toEqual([6]);
  });
});

// =============================================================================
// Maps
// =============================================================================

describe('maps', () => {
  const schema = Types.struct({ counts: Types.map(Types.string(), Types.bigint()) });

  it('flattens keys and values into parallel ranges', () => {
    const batch = createRowBatch(schema, 2);
    const row = [
      Values.map([
        [Values.string('a'), Values.long(1n)],
        [Values.string('b'), Values.long(2n)],
      ]),
    ];
    expect(encodeRow(row, schema, batch, 0).isOk()).toBe(true);

    const counts = column(batch, 0, MapColumnVector);
    expect(counts.offsets[0]).toBe(0);
    expect(counts.lengths[0]).toBe(2);
    expect(counts.keys instanceof BytesColumnVector && utf8.decode(counts.keys.getBytes(1))).toBe('b');
    expect(counts.values instanceof LongColumnVector && counts.values.vector[1]).toBe(2n);
  });

  it('allows null values', () => {
    const batch = createRowBatch(schema, 2);
    const result = encodeRow([Values.map([[Values.string('a'), Values.null()]])], schema, batch, 0);
    expect(result.isOk()).toBe(true);
    expect(column(batch, 0, MapColumnVector).values.isNull[0]).toBe(1);
  });

  it('rejects null keys', () => {
    const error = encodeError([Values.map([[Values.null(), Values.long(1n)]])], schema);
    expect(error.code).toBe(MarshalErrorCode.MAP_KEY_TYPE_MISMATCH);
    expect(error.message).toBe('Map keys for field counts in row 0 must all be string, got null');
  });

  it('rejects mixed value kinds', () => {
    const error = encodeError(
      [
        Values.map([
          [Values.string('a'), Values.long(1n)],
          [Values.string('b'), Values.double(2)],
        ]),
      ],
      schema
    );
    expect(error.code).toBe(MarshalErrorCode.MAP_VALUE_TYPE_MISMATCH);
    expect(error.message).toBe('Map values for field counts in row 0 must all be bigint, got double');
  });

  it('rejects keys the key schema does not take', () => {
    const error = encodeError([Values.map([[Values.int(1), Values.long(1n)]])], schema);
    expect(error.code).toBe(MarshalErrorCode.MAP_KEY_TYPE_MISMATCH);
  });

  it('rejects duplicate keys', () => {
    const batch = createRowBatch(schema, 2);
    const error = encodeError(
      [
        Values.map([
          [Values.string('a'), Values.long(1n)],
          [Values.string('a'), Values.long(2n)],
        ]),
      ],
      schema,
      batch
    );
    expect(error.code).toBe(MarshalErrorCode.DUPLICATE_MAP_KEY);
    expect(error.message).toBe('Duplicate map key "a" for field counts in row 0');
    batch.cols.forEach(expectPristine);
  });

  it('rejects schemas outside the map invariant', () => {
    const nested = Types.struct({ m: Types.map(Types.string(), Types.list(Types.int())) });
    const error = encodeError([Values.map([])], nested);
    expect(error.code).toBe(MarshalErrorCode.UNSUPPORTED_TYPE);
    expect(error.message).toBe(
      'map<string,array<int>> is not supported: map keys must be string, integer or floating point and values scalar (field m)'
    );
  });
});

// =============================================================================
// Unions
// =============================================================================

describe('unions', () => {
  const either = Types.union(Types.int(), Types.string());
  const schema = Types.struct({ either });

  it('picks the first variant of the same category', () => {
    const batch = createRowBatch(schema, 2);
    encodeRow([Values.union(Types.string(), Values.string('x'))], schema, batch, 0);
    encodeRow([Values.union(Types.int(), Values.int(7))], schema, batch, 1);

    const union = column(batch, 0, UnionColumnVector);
    expect(Array.from(union.tags.slice(0, 2))).toEqual([1, 0]);
    const strings = union.fields[1];
    expect(strings instanceof BytesColumnVector && utf8.decode(strings.getBytes(0))).toBe('x');
    const ints = union.fields[0];
    expect(ints instanceof LongColumnVector && ints.vector[1]).toBe(7n);
  });

  it('rejects variants the union does not declare', () => {
    const error = encodeError([Values.union(Types.double(), Values.double(1))], schema);
    expect(error.code).toBe(MarshalErrorCode.UNION_VARIANT_NOT_FOUND);
    expect(error.message).toBe('Union field either in row 0 has no variant of type double');
  });

  it('allows a null payload', () => {
    const batch = createRowBatch(schema, 1);
    encodeRow([Values.union(Types.string(), Values.null())], schema, batch, 0);

    const union = column(batch, 0, UnionColumnVector);
    expect(union.isNull[0]).toBe(0);
    expect(union.fields[1]?.isNull[0]).toBe(1);
  });
});

// =============================================================================
// Dates
// =============================================================================

describe('dates', () => {
  it('rejects a date schema at any depth', () => {
    const schema = Types.struct({ events: Types.list(Types.struct({ day: Types.date() })) });
    const error = encodeError([Values.list([])], schema);

    expect(error.code).toBe(MarshalErrorCode.UNSUPPORTED_TYPE);
    expect(error.message).toBe('date is not supported, use timestamp (field events[].day)');
  });

  it('rejects a date schema inside map and union', () => {
    expect(cellError(Values.null(), Types.map(Types.string(), Types.date()), 'm').field).toBe('m.value');
    expect(cellError(Values.null(), Types.union(Types.int(), Types.date()), 'u').field).toBe('u<1>');
  });

  it('rejects date values under timestamp schemas', () => {
    const schema = Types.struct({
      ts: Types.timestamp(),
      when: Types.list(Types.timestamp()),
      at: Types.map(Types.string(), Types.timestamp()),
    });
    const day = Values.date(Date.UTC(2024, 0, 1));

    expect(encodeError([day, Values.null(), Values.null()], schema).field).toBe('ts');
    expect(encodeError([Values.null(), Values.list([day]), Values.null()], schema).field).toBe('when[0]');
    expect(encodeError([Values.null(), Values.null(), Values.map([[Values.string('k'), day]])], schema).field).toBe(
      'at[0].value'
    );
  });

  it('leaves the batch untouched', () => {
    const schema = Types.struct({ id: Types.int(), ts: Types.timestamp() });
    const batch = createRowBatch(schema, 2);
    encodeError([Values.int(1), Values.date(0)], schema, batch);
    batch.cols.forEach(expectPristine);
  });
});

// =============================================================================
// Struct columns
// =============================================================================

describe('structs', () => {
  it('writes fields at the struct row and nulls whole structs', () => {
    const schema = Types.struct({ pos: Types.struct({ x: Types.double(), y: Types.double() }) });
    const batch = createRowBatch(schema, 2);
    encodeRow([Values.struct([Values.double(1), Values.double(2)])], schema, batch, 0);
    encodeRow([Values.null()], schema, batch, 1);

    const pos = column(batch, 0, StructColumnVector);
    const y = pos.fields[1];
    expect(y instanceof DoubleColumnVector && y.vector[0]).toBe(2);
    expect(pos.isNull[1]).toBe(1);
  });
});

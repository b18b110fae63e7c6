/**
 * Decoder: column vectors back into Values
 *
 * The schema decides the Value tag. An Int64 vector read under `tinyint`
 * gives `int` values narrowed to 8 bits; the same storage under `bigint`
 * gives `long`. Nulls are checked before descending into containers.
 */

import { MarshalError, isMarshalError } from './errors.js';
import { type Result, tryCatch } from './result.js';
import { schemaToString } from './schema.js';
import { Kind, type TypeSchema, checkMapTypes } from './types.js';
import { type Value, Values, mapKeyIdentity } from './value.js';
import { type ColumnVector, type RowBatch, expectVector } from './vectors.js';

const utf8 = new TextDecoder();

function childSchema(schema: TypeSchema, index: number, path: string): TypeSchema {
  const child = schema.children[index];
  if (child === undefined) {
    throw MarshalError.schemaMismatch(`${schema.category} schema of ${path} has no child ${index}`, { field: path });
  }
  return child;
}

function decodeInt64(raw: bigint, schema: TypeSchema): Value {
  switch (schema.category) {
    case 'boolean':
      return Values.boolean(raw !== 0n);
    case 'tinyint':
      return Values.int(Number(BigInt.asIntN(8, raw)));
    case 'smallint':
      return Values.int(Number(BigInt.asIntN(16, raw)));
    case 'int':
      return Values.int(Number(BigInt.asIntN(32, raw)));
    default:
      return Values.long(raw);
  }
}

function decode(vector: ColumnVector, schema: TypeSchema, rowIndex: number, path: string, row: number): Value {
  expectVector(vector, schema.kind, path, row);
  const r = vector.isRepeating ? 0 : rowIndex;
  if (!vector.noNulls && vector.isNull[r] === 1) {
    return Values.null();
  }

  switch (schema.kind) {
    case Kind.Int64: {
      const longs = expectVector(vector, Kind.Int64, path, row);
      return decodeInt64(longs.vector[r] ?? 0n, schema);
    }

    case Kind.Float64: {
      const raw = expectVector(vector, Kind.Float64, path, row).vector[r] ?? 0;
      return schema.category === 'float' ? Values.float(raw) : Values.double(raw);
    }

    case Kind.Bytes: {
      const bytes = expectVector(vector, Kind.Bytes, path, row).getBytes(r);
      return schema.category === 'binary' ? Values.bytes(bytes.slice()) : Values.string(utf8.decode(bytes));
    }

    case Kind.Decimal: {
      const decimals = expectVector(vector, Kind.Decimal, path, row);
      const entry = decimals.vector[r];
      return entry === undefined
        ? Values.decimal(0n, decimals.scale)
        : Values.decimal(entry.unscaled, entry.scale);
    }

    case Kind.Timestamp: {
      const timestamps = expectVector(vector, Kind.Timestamp, path, row);
      const millis = timestamps.time[r] ?? 0;
      if (schema.category === 'date') {
        return Values.date(millis);
      }
      return { kind: 'timestamp', millis, nanos: timestamps.nanos[r] ?? 0 };
    }

    case Kind.List: {
      const list = expectVector(vector, Kind.List, path, row);
      const elementSchema = childSchema(schema, 0, path);
      const offset = list.offsets[r] ?? 0;
      const length = list.lengths[r] ?? 0;
      const elements: Value[] = [];
      for (let i = 0; i < length; i++) {
        elements.push(decode(list.child, elementSchema, offset + i, `${path}[${i}]`, row));
      }
      return Values.list(elements);
    }

    case Kind.Struct: {
      const struct = expectVector(vector, Kind.Struct, path, row);
      const fields = schema.children.map((fieldSchema, i) => {
        const fieldPath = `${path}.${schema.fieldNames[i] ?? i}`;
        const fieldVector = struct.fields[i];
        if (fieldVector === undefined) {
          throw MarshalError.schemaMismatch(`Struct ${path} has no vector for field ${i}`, { field: fieldPath, row });
        }
        return decode(fieldVector, fieldSchema, r, fieldPath, row);
      });
      return Values.struct(fields);
    }

    case Kind.Map: {
      if (!checkMapTypes(schema).valid) {
        throw MarshalError.unsupportedType(
          `${schemaToString(schema)} is not supported: map keys must be string, integer or floating point and values scalar`,
          path,
          row
        );
      }
      const map = expectVector(vector, Kind.Map, path, row);
      const keySchema = childSchema(schema, 0, path);
      const valueSchema = childSchema(schema, 1, path);
      const offset = map.offsets[r] ?? 0;
      const length = map.lengths[r] ?? 0;
      // identity -> position in entries; a later duplicate replaces the value in place
      const positions = new Map<string, number>();
      const entries: [Value, Value][] = [];
      for (let i = 0; i < length; i++) {
        const key = decode(map.keys, keySchema, offset + i, `${path}[${i}].key`, row);
        const value = decode(map.values, valueSchema, offset + i, `${path}[${i}].value`, row);
        const identity = mapKeyIdentity(key);
        const existing = positions.get(identity);
        if (existing === undefined) {
          positions.set(identity, entries.length);
          entries.push([key, value]);
        } else {
          entries[existing] = [key, value];
        }
      }
      return Values.map(entries);
    }

    case Kind.Union: {
      const union = expectVector(vector, Kind.Union, path, row);
      const tag = union.tags[r] ?? -1;
      const limit = Math.min(schema.children.length, union.fields.length);
      const variant = schema.children[tag];
      const variantVector = union.fields[tag];
      if (tag < 0 || tag >= limit || variant === undefined || variantVector === undefined) {
        throw MarshalError.corruptUnionTag(path, row, tag, limit);
      }
      return Values.union(variant, decode(variantVector, variant, r, `${path}<${tag}>`, row));
    }
  }
}

function assertRowIndex(rowIndex: number, limit: number): void {
  if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= limit) {
    throw new RangeError(`Row index ${rowIndex} is outside 0..${limit - 1}`);
  }
}

/**
 * Decode the cell at `rowIndex`.
 *
 * @throws RangeError when `rowIndex` is outside the vector
 */
export function decodeCell(
  vector: ColumnVector,
  schema: TypeSchema,
  rowIndex: number,
  fieldName = 'value'
): Result<Value, MarshalError> {
  assertRowIndex(rowIndex, vector.capacity);
  return tryCatch(() => decode(vector, schema, rowIndex, fieldName, rowIndex), isMarshalError);
}

/**
 * Decode row `rowIndex` of `batch` into one Value per top-level field.
 *
 * @param rowNumber - row reported in errors (default: rowIndex)
 * @throws RangeError when `rowIndex` is not below `batch.size`
 */
export function decodeRow(
  batch: RowBatch,
  rootSchema: TypeSchema,
  rowIndex: number,
  rowNumber = rowIndex
): Result<Value[], MarshalError> {
  assertRowIndex(rowIndex, batch.size);
  return tryCatch(() => {
    if (rootSchema.kind !== Kind.Struct || batch.cols.length !== rootSchema.children.length) {
      throw MarshalError.schemaMismatch(
        `Batch with ${batch.cols.length} columns does not match ${schemaToString(rootSchema)}`,
        { row: rowNumber, expected: schemaToString(rootSchema), actual: `${batch.cols.length} columns` }
      );
    }
    return rootSchema.children.map((schema, i) => {
      const name = rootSchema.fieldNames[i] ?? String(i);
      const vector = batch.cols[i];
      if (vector === undefined) {
        throw MarshalError.schemaMismatch(`Batch has no column ${i}`, { field: name, row: rowNumber });
      }
      return decode(vector, schema, rowIndex, name, rowNumber);
    });
  }, isMarshalError);
}

/**
 * Encoder: Values into column vectors
 *
 * Encoding runs in two passes. The check pass walks the value tree together
 * with the schema and the target vectors and throws on the first problem;
 * only then does the write pass touch the vectors. A failed encode therefore
 * leaves the batch exactly as it was.
 *
 * @example
 * ```typescript
 * const batch = createRowBatch(schema);
 * const result = encodeRow([Values.string('AAPL'), Values.double(189.5)], schema, batch, batch.size);
 * if (result.isOk()) batch.size++;
 * ```
 */

import { MAX_DECIMAL_PRECISION, decimalPrecision } from './decimal.js';
import { MarshalError, isMarshalError } from './errors.js';
import { type Result, tryCatch } from './result.js';
import { schemaToString } from './schema.js';
import { Kind, type TypeSchema, checkMapTypes } from './types.js';
import { type Value, mapKeyIdentity, valueKind } from './value.js';
import { type ColumnVector, type RowBatch, expectVector } from './vectors.js';

// =============================================================================
// Options
// =============================================================================

/**
 * `proactive` sizes a child vector for a whole batch of rows like the
 * current one; `exact` grows only to what the current row needs, doubling.
 */
export type ChildGrowth = 'proactive' | 'exact';

export interface EncodeOptions {
  /** Root of field paths in error messages (default: the column name, or `value`) */
  fieldName?: string;
  /** Row number reported in errors (default: rowIndex) */
  rowNumber?: number;
  /** Rows per batch, used by proactive child growth (default: vector capacity) */
  batchCapacity?: number;
  growth?: ChildGrowth;
  /** Called to grow a child vector; defaults to `vector.ensureSize(required, true)` */
  resize?: (vector: ColumnVector, required: number) => void;
}

interface EncodeContext {
  readonly row: number;
  readonly batchCapacity: number;
  readonly growth: ChildGrowth;
  readonly resize: (vector: ColumnVector, required: number) => void;
}

const defaultResize = (vector: ColumnVector, required: number): void => {
  vector.ensureSize(required, true);
};

const utf8 = new TextEncoder();

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

// =============================================================================
// Shared helpers
// =============================================================================

function childSchema(schema: TypeSchema, index: number, path: string): TypeSchema {
  const child = schema.children[index];
  if (child === undefined) {
    throw MarshalError.schemaMismatch(`${schema.category} schema of ${path} has no child ${index}`, { field: path });
  }
  return child;
}

function childVector(vectors: readonly ColumnVector[], index: number, path: string, row: number): ColumnVector {
  const vector = vectors[index];
  if (vector === undefined) {
    throw MarshalError.schemaMismatch(`Field ${path} has no vector for child ${index}`, { field: path, row });
  }
  return vector;
}

const containsDateCache = new WeakMap<TypeSchema, boolean>();

function containsDate(schema: TypeSchema): boolean {
  let cached = containsDateCache.get(schema);
  if (cached === undefined) {
    cached = schema.category === 'date' || schema.children.some(containsDate);
    containsDateCache.set(schema, cached);
  }
  return cached;
}

function findDatePath(schema: TypeSchema, path: string): string | undefined {
  if (schema.category === 'date') return path;
  for (let i = 0; i < schema.children.length; i++) {
    const child = schema.children[i];
    if (child === undefined || !containsDate(child)) continue;
    return findDatePath(child, `${path}${childSuffix(schema, i)}`);
  }
  return undefined;
}

function childSuffix(schema: TypeSchema, index: number): string {
  switch (schema.kind) {
    case Kind.Struct:
      return `.${schema.fieldNames[index] ?? index}`;
    case Kind.List:
      return '[]';
    case Kind.Map:
      return index === 0 ? '.key' : '.value';
    default:
      return `<${index}>`;
  }
}

/**
 * Reject schemas that declare a date anywhere.
 */
function rejectDateSchema(schema: TypeSchema, path: string, row: number): void {
  if (!containsDate(schema)) return;
  throw MarshalError.dateNotSupported(findDatePath(schema, path) ?? path, row);
}

function intInRange(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

/**
 * Precision a decimal needs: its digits, but never less than its scale.
 */
function requiredPrecision(unscaled: bigint, scale: number): number {
  return Math.max(decimalPrecision(unscaled), scale);
}

/**
 * Whether a non-null scalar value can be stored under a scalar schema Kind.
 */
function acceptsScalar(kind: Kind, value: Value): boolean {
  switch (kind) {
    case Kind.Int64:
      return value.kind === 'boolean' || value.kind === 'long' || (value.kind === 'int' && intInRange(value.value));
    case Kind.Float64:
      return value.kind === 'double' || value.kind === 'float';
    case Kind.Bytes:
      return value.kind === 'string' || value.kind === 'bytes';
    case Kind.Decimal:
      return value.kind === 'decimal';
    case Kind.Timestamp:
      return value.kind === 'timestamp';
    default:
      return false;
  }
}

/** Why a millis/nanos pair cannot be stored, or undefined when it can */
function timestampProblem(millis: number, nanos: number): string | undefined {
  if (!Number.isSafeInteger(millis)) {
    return 'integer millis';
  }
  if (!Number.isInteger(nanos) || nanos < 0 || nanos > 999_999_999) {
    return 'nanos in 0..999999999';
  }
  if (millis - Math.floor(millis / 1000) * 1000 !== Math.floor(nanos / 1_000_000)) {
    return 'millis and nanos agreeing on the millisecond';
  }
  return undefined;
}

function displayKey(key: Value): string {
  switch (key.kind) {
    case 'string':
      return JSON.stringify(key.value);
    case 'boolean':
    case 'int':
    case 'long':
    case 'float':
    case 'double':
      return String(key.value);
    default:
      return key.kind;
  }
}

// =============================================================================
// Check pass
// =============================================================================

function check(value: Value, schema: TypeSchema, vector: ColumnVector, path: string, row: number): void {
  if (value.kind === 'date') {
    throw MarshalError.dateNotSupported(path, row);
  }
  expectVector(vector, schema.kind, path, row);
  if (value.kind === 'null') return;

  switch (schema.kind) {
    case Kind.Int64:
      if (value.kind === 'int' && !intInRange(value.value)) {
        throw MarshalError.typeMismatch(path, row, `${schema.category} (32-bit int)`, `int ${value.value}`);
      }
      if (!acceptsScalar(schema.kind, value)) {
        throw MarshalError.typeMismatch(path, row, schema.category, value.kind);
      }
      return;

    case Kind.Float64:
      if (value.kind === 'float' && !Object.is(Math.fround(value.value), value.value)) {
        throw MarshalError.typeMismatch(path, row, `${schema.category} (32-bit float)`, `float ${value.value}`);
      }
      if (!acceptsScalar(schema.kind, value)) {
        throw MarshalError.typeMismatch(path, row, schema.category, value.kind);
      }
      return;

    case Kind.Timestamp: {
      if (value.kind !== 'timestamp') {
        throw MarshalError.typeMismatch(path, row, schema.category, value.kind);
      }
      const problem = timestampProblem(value.millis, value.nanos);
      if (problem) {
        throw MarshalError.typeMismatch(path, row, `${schema.category} (${problem})`, `millis ${value.millis}, nanos ${value.nanos}`);
      }
      return;
    }

    case Kind.Bytes:
      if (!acceptsScalar(schema.kind, value)) {
        throw MarshalError.typeMismatch(path, row, schema.category, value.kind);
      }
      return;

    case Kind.Decimal: {
      if (value.kind !== 'decimal') {
        throw MarshalError.typeMismatch(path, row, schema.category, value.kind);
      }
      if (!Number.isInteger(value.scale) || value.scale < 0) {
        throw MarshalError.typeMismatch(path, row, 'decimal scale >= 0', `scale ${value.scale}`);
      }
      const precision = requiredPrecision(value.unscaled, value.scale);
      if (precision > MAX_DECIMAL_PRECISION) {
        throw MarshalError.typeMismatch(
          path,
          row,
          `decimal of at most ${MAX_DECIMAL_PRECISION} digits`,
          `decimal of ${precision} digits`
        );
      }
      return;
    }

    case Kind.List: {
      if (value.kind !== 'list') {
        throw MarshalError.typeMismatch(path, row, schemaToString(schema), value.kind);
      }
      const list = expectVector(vector, Kind.List, path, row);
      const elementSchema = childSchema(schema, 0, path);
      let elementKind: Kind | undefined;
      for (const element of value.elements) {
        const kind = valueKind(element);
        if (kind === undefined) continue;
        if (elementKind === undefined) {
          elementKind = kind;
        } else if (kind !== elementKind) {
          throw MarshalError.typeMismatch(path, row, `list of ${elementKind} elements`, `${kind} element`);
        }
      }
      value.elements.forEach((element, i) => check(element, elementSchema, list.child, `${path}[${i}]`, row));
      return;
    }

    case Kind.Struct: {
      if (value.kind !== 'struct') {
        throw MarshalError.typeMismatch(path, row, schemaToString(schema), value.kind);
      }
      if (value.fields.length !== schema.children.length) {
        throw MarshalError.arityMismatch(path, row, schema.children.length, value.fields.length);
      }
      const struct = expectVector(vector, Kind.Struct, path, row);
      value.fields.forEach((field, i) => {
        const fieldPath = `${path}.${schema.fieldNames[i] ?? i}`;
        check(field, childSchema(schema, i, path), childVector(struct.fields, i, fieldPath, row), fieldPath, row);
      });
      return;
    }

    case Kind.Map:
      checkMap(value, schema, vector, path, row);
      return;

    case Kind.Union: {
      if (value.kind !== 'union') {
        throw MarshalError.typeMismatch(path, row, schemaToString(schema), value.kind);
      }
      const union = expectVector(vector, Kind.Union, path, row);
      const category = value.variant.category;
      const tag = schema.children.findIndex((variant) => variant.category === category);
      if (tag < 0) {
        throw MarshalError.unionVariantNotFound(path, row, value.variant.category, schemaToString(schema));
      }
      const variantPath = `${path}<${tag}>`;
      check(value.value, childSchema(schema, tag, path), childVector(union.fields, tag, variantPath, row), variantPath, row);
      return;
    }
  }
}

function assertMapSchema(schema: TypeSchema, path: string, row: number): void {
  const mapCheck = checkMapTypes(schema);
  if (!mapCheck.valid) {
    throw MarshalError.unsupportedType(
      `${schemaToString(schema)} is not supported: map keys must be string, integer or floating point and values scalar`,
      path,
      row
    );
  }
}

function checkMap(value: Value, schema: TypeSchema, vector: ColumnVector, path: string, row: number): void {
  assertMapSchema(schema, path, row);
  if (value.kind !== 'map') {
    throw MarshalError.typeMismatch(path, row, schemaToString(schema), value.kind);
  }
  const map = expectVector(vector, Kind.Map, path, row);
  const keySchema = childSchema(schema, 0, path);
  const valueSchema = childSchema(schema, 1, path);

  let keyKind: Kind | undefined;
  let valueKindSeen: Kind | undefined;
  const seen = new Set<string>();

  value.entries.forEach(([key, entryValue], i) => {
    const keyPath = `${path}[${i}].key`;
    const valuePath = `${path}[${i}].value`;
    if (key.kind === 'date') throw MarshalError.dateNotSupported(keyPath, row);
    if (entryValue.kind === 'date') throw MarshalError.dateNotSupported(valuePath, row);

    const kind = valueKind(key);
    if (kind === undefined) {
      throw MarshalError.mapKeyTypeMismatch(path, row, keySchema.category, 'null');
    }
    keyKind ??= kind;
    if (kind !== keyKind || !acceptsScalar(keySchema.kind, key)) {
      throw MarshalError.mapKeyTypeMismatch(path, row, keySchema.category, key.kind);
    }
    const text = mapKeyIdentity(key);
    if (seen.has(text)) {
      throw MarshalError.duplicateMapKey(path, row, displayKey(key));
    }
    seen.add(text);

    const entryKind = valueKind(entryValue);
    if (entryKind !== undefined) {
      valueKindSeen ??= entryKind;
      if (entryKind !== valueKindSeen || !acceptsScalar(valueSchema.kind, entryValue)) {
        throw MarshalError.mapValueTypeMismatch(path, row, valueSchema.category, entryValue.kind);
      }
    }

    check(key, keySchema, map.keys, keyPath, row);
    check(entryValue, valueSchema, map.values, valuePath, row);
  });
}

// =============================================================================
// Write pass
// =============================================================================

function growChild(child: ColumnVector, required: number, count: number, ctx: EncodeContext): void {
  if (child.capacity >= required) return;
  const target =
    ctx.growth === 'proactive'
      ? Math.max(ctx.batchCapacity * count, required)
      : Math.max(required, child.capacity * 2);
  ctx.resize(child, target);
}

function write(value: Value, schema: TypeSchema, vector: ColumnVector, rowIndex: number, path: string, ctx: EncodeContext): void {
  if (value.kind === 'null') {
    vector.setNull(rowIndex);
    return;
  }
  vector.isNull[rowIndex] = 0;

  switch (schema.kind) {
    case Kind.Int64: {
      const longs = expectVector(vector, Kind.Int64, path, ctx.row);
      if (value.kind === 'boolean') {
        longs.vector[rowIndex] = value.value ? 1n : 0n;
      } else if (value.kind === 'int') {
        longs.vector[rowIndex] = BigInt(value.value);
      } else if (value.kind === 'long') {
        longs.vector[rowIndex] = BigInt.asIntN(64, value.value);
      }
      return;
    }

    case Kind.Float64: {
      const doubles = expectVector(vector, Kind.Float64, path, ctx.row);
      if (value.kind === 'double' || value.kind === 'float') {
        doubles.vector[rowIndex] = value.value;
      }
      return;
    }

    case Kind.Bytes: {
      const bytes = expectVector(vector, Kind.Bytes, path, ctx.row);
      if (value.kind === 'string' || value.kind === 'bytes') {
        const buffer = value.kind === 'string' ? utf8.encode(value.value) : value.value.slice();
        bytes.setRef(rowIndex, buffer, 0, buffer.length);
      }
      return;
    }

    case Kind.Decimal: {
      const decimals = expectVector(vector, Kind.Decimal, path, ctx.row);
      if (value.kind === 'decimal') {
        decimals.vector[rowIndex] = { unscaled: value.unscaled, scale: value.scale };
        decimals.precision = requiredPrecision(value.unscaled, value.scale);
        decimals.scale = value.scale;
      }
      return;
    }

    case Kind.Timestamp: {
      const timestamps = expectVector(vector, Kind.Timestamp, path, ctx.row);
      if (value.kind === 'timestamp') {
        timestamps.time[rowIndex] = value.millis;
        timestamps.nanos[rowIndex] = value.nanos;
      }
      return;
    }

    case Kind.List: {
      const list = expectVector(vector, Kind.List, path, ctx.row);
      if (value.kind !== 'list') return;
      const count = value.elements.length;
      const offset = list.childCount;
      growChild(list.child, offset + count, count, ctx);
      list.offsets[rowIndex] = offset;
      list.lengths[rowIndex] = count;
      list.childCount += count;
      const elementSchema = childSchema(schema, 0, path);
      value.elements.forEach((element, i) => {
        write(element, elementSchema, list.child, offset + i, `${path}[${i}]`, ctx);
      });
      return;
    }

    case Kind.Struct: {
      const struct = expectVector(vector, Kind.Struct, path, ctx.row);
      if (value.kind !== 'struct') return;
      value.fields.forEach((field, i) => {
        const fieldPath = `${path}.${schema.fieldNames[i] ?? i}`;
        write(field, childSchema(schema, i, path), childVector(struct.fields, i, fieldPath, ctx.row), rowIndex, fieldPath, ctx);
      });
      return;
    }

    case Kind.Map: {
      const map = expectVector(vector, Kind.Map, path, ctx.row);
      if (value.kind !== 'map') return;
      const count = value.entries.length;
      const offset = map.childCount;
      growChild(map.keys, offset + count, count, ctx);
      growChild(map.values, offset + count, count, ctx);
      map.offsets[rowIndex] = offset;
      map.lengths[rowIndex] = count;
      map.childCount += count;
      const keySchema = childSchema(schema, 0, path);
      const valueSchema = childSchema(schema, 1, path);
      value.entries.forEach(([key, entryValue], i) => {
        write(key, keySchema, map.keys, offset + i, `${path}[${i}].key`, ctx);
        write(entryValue, valueSchema, map.values, offset + i, `${path}[${i}].value`, ctx);
      });
      return;
    }

    case Kind.Union: {
      const union = expectVector(vector, Kind.Union, path, ctx.row);
      if (value.kind !== 'union') return;
      const category = value.variant.category;
      const tag = schema.children.findIndex((variant) => variant.category === category);
      const variantPath = `${path}<${tag}>`;
      union.tags[rowIndex] = tag;
      write(value.value, childSchema(schema, tag, path), childVector(union.fields, tag, variantPath, ctx.row), rowIndex, variantPath, ctx);
      return;
    }
  }
}

// =============================================================================
// Public API
// =============================================================================

function assertRowIndex(rowIndex: number, capacity: number): void {
  if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= capacity) {
    throw new RangeError(`Row index ${rowIndex} is outside 0..${capacity - 1}`);
  }
}

function contextFor(rowIndex: number, capacity: number, options: EncodeOptions): EncodeContext {
  return {
    row: options.rowNumber ?? rowIndex,
    batchCapacity: options.batchCapacity ?? capacity,
    growth: options.growth ?? 'proactive',
    resize: options.resize ?? defaultResize,
  };
}

/**
 * Encode one value into `vector` at `rowIndex`.
 *
 * @throws RangeError when `rowIndex` is outside the vector
 */
export function encodeCell(
  value: Value,
  schema: TypeSchema,
  vector: ColumnVector,
  rowIndex: number,
  options: EncodeOptions = {}
): Result<void, MarshalError> {
  assertRowIndex(rowIndex, vector.capacity);
  const ctx = contextFor(rowIndex, vector.capacity, options);
  const path = options.fieldName ?? 'value';

  return tryCatch(() => {
    rejectDateSchema(schema, path, ctx.row);
    check(value, schema, vector, path, ctx.row);
    write(value, schema, vector, rowIndex, path, ctx);
  }, isMarshalError);
}

/**
 * Encode a row of top-level field values into `batch` at `rowIndex`.
 * Every column is checked before any column is written. Does not touch
 * `batch.size`.
 *
 * @throws RangeError when `rowIndex` is outside the batch
 */
export function encodeRow(
  row: readonly Value[],
  rootSchema: TypeSchema,
  batch: RowBatch,
  rowIndex: number,
  options: EncodeOptions = {}
): Result<void, MarshalError> {
  assertRowIndex(rowIndex, batch.maxSize);
  const ctx = contextFor(rowIndex, batch.maxSize, options);
  const root = options.fieldName;

  return tryCatch(() => {
    if (rootSchema.kind !== Kind.Struct) {
      throw MarshalError.schemaMismatch(`Rows need a struct schema, got ${rootSchema.category}`, {
        expected: 'struct',
        actual: rootSchema.category,
      });
    }
    if (row.length !== rootSchema.children.length) {
      throw MarshalError.arityMismatch(root ?? 'row', ctx.row, rootSchema.children.length, row.length);
    }
    if (batch.cols.length !== rootSchema.children.length) {
      throw MarshalError.schemaMismatch(
        `Batch has ${batch.cols.length} columns, schema declares ${rootSchema.children.length}`,
        { row: ctx.row, expected: String(rootSchema.children.length), actual: String(batch.cols.length) }
      );
    }

    const columns = rootSchema.children.map((schema, i) => {
      const name = rootSchema.fieldNames[i] ?? String(i);
      return {
        schema,
        path: root === undefined ? name : `${root}.${name}`,
        vector: childVector(batch.cols, i, name, ctx.row),
        value: row[i] ?? { kind: 'null' as const },
      };
    });

    for (const column of columns) {
      rejectDateSchema(column.schema, column.path, ctx.row);
      check(column.value, column.schema, column.vector, column.path, ctx.row);
    }
    for (const column of columns) {
      write(column.value, column.schema, column.vector, rowIndex, column.path, ctx);
    }
  }, isMarshalError);
}

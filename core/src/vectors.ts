/**
 * Column vectors and row batches
 *
 * A {@link RowBatch} holds up to `maxSize` rows of a struct schema, one
 * {@link ColumnVector} per top-level field. Containers own child vectors:
 * a list row `r` spans `child[offsets[r] .. offsets[r] + lengths[r])`, a map
 * row spans the same range in both `keys` and `values`.
 *
 * Every vector tracks nulls in `isNull` (1 = null). `noNulls` is a hint that
 * no cell is null. When `isRepeating` is set, row 0 stands for every row.
 */

import { MarshalError } from './errors.js';
import { Kind, type TypeSchema } from './types.js';

export const DEFAULT_BATCH_SIZE = 1024;

// =============================================================================
// Array growth
// =============================================================================

function growNumeric<T extends Uint8Array | Int32Array | Float64Array>(
  array: T,
  size: number,
  preserve: boolean,
  create: (size: number) => T
): T {
  const next = create(size);
  if (preserve) {
    next.set(array);
  }
  return next;
}

function growBigInt64(array: BigInt64Array, size: number, preserve: boolean): BigInt64Array {
  const next = new BigInt64Array(size);
  if (preserve) {
    next.set(array);
  }
  return next;
}

function growSlots<T>(array: (T | undefined)[], size: number, preserve: boolean): (T | undefined)[] {
  const next = new Array<T | undefined>(size).fill(undefined);
  if (preserve) {
    for (let i = 0; i < array.length; i++) next[i] = array[i];
  }
  return next;
}

// =============================================================================
// Base
// =============================================================================

abstract class VectorBase {
  isNull: Uint8Array;
  noNulls = true;
  isRepeating = false;
  private size: number;

  protected constructor(size: number) {
    this.size = size;
    this.isNull = new Uint8Array(size);
  }

  get capacity(): number {
    return this.size;
  }

  /**
   * Grow to hold at least `size` rows. Shrinking is a no-op. With
   * `preserve`, existing rows are kept; otherwise contents are undefined.
   */
  ensureSize(size: number, preserve: boolean): void {
    if (size <= this.size) return;
    this.isNull = growNumeric(this.isNull, size, preserve, (n) => new Uint8Array(n));
    this.growStorage(size, preserve);
    this.size = size;
  }

  setNull(row: number): void {
    this.isNull[row] = 1;
    this.noNulls = false;
  }

  /** Clear null flags and child counts; storage is left as is. */
  reset(): void {
    this.isNull.fill(0);
    this.noNulls = true;
    this.isRepeating = false;
  }

  protected copyStateFrom(other: VectorBase): void {
    this.size = other.size;
    this.isNull = other.isNull.slice();
    this.noNulls = other.noNulls;
    this.isRepeating = other.isRepeating;
  }

  protected abstract growStorage(size: number, preserve: boolean): void;
}

// =============================================================================
// Scalar vectors
// =============================================================================

export class LongColumnVector extends VectorBase {
  readonly kind = Kind.Int64;
  vector: BigInt64Array;

  constructor(size: number = DEFAULT_BATCH_SIZE) {
    super(size);
    this.vector = new BigInt64Array(size);
  }

  protected growStorage(size: number, preserve: boolean): void {
    this.vector = growBigInt64(this.vector, size, preserve);
  }

  clone(): LongColumnVector {
    const copy = new LongColumnVector(0);
    copy.copyStateFrom(this);
    copy.vector = this.vector.slice();
    return copy;
  }
}

export class DoubleColumnVector extends VectorBase {
  readonly kind = Kind.Float64;
  vector: Float64Array;

  constructor(size: number = DEFAULT_BATCH_SIZE) {
    super(size);
    this.vector = new Float64Array(size);
  }

  protected growStorage(size: number, preserve: boolean): void {
    this.vector = growNumeric(this.vector, size, preserve, (n) => new Float64Array(n));
  }

  clone(): DoubleColumnVector {
    const copy = new DoubleColumnVector(0);
    copy.copyStateFrom(this);
    copy.vector = this.vector.slice();
    return copy;
  }
}

/**
 * Row `r` is `vector[r].subarray(start[r], start[r] + length[r])`. Buffers
 * may be shared between rows.
 */
export class BytesColumnVector extends VectorBase {
  readonly kind = Kind.Bytes;
  vector: (Uint8Array | undefined)[];
  start: Int32Array;
  length: Int32Array;

  constructor(size: number = DEFAULT_BATCH_SIZE) {
    super(size);
    this.vector = growSlots<Uint8Array>([], size, false);
    this.start = new Int32Array(size);
    this.length = new Int32Array(size);
  }

  setRef(row: number, buffer: Uint8Array, start: number, length: number): void {
    this.vector[row] = buffer;
    this.start[row] = start;
    this.length[row] = length;
  }

  /** View of row `row`; empty when nothing was stored. */
  getBytes(row: number): Uint8Array {
    const buffer = this.vector[row];
    if (buffer === undefined) return new Uint8Array(0);
    const start = this.start[row] ?? 0;
    return buffer.subarray(start, start + (this.length[row] ?? 0));
  }

  protected growStorage(size: number, preserve: boolean): void {
    this.vector = growSlots(this.vector, size, preserve);
    this.start = growNumeric(this.start, size, preserve, (n) => new Int32Array(n));
    this.length = growNumeric(this.length, size, preserve, (n) => new Int32Array(n));
  }

  override reset(): void {
    super.reset();
    this.vector.fill(undefined);
  }

  clone(): BytesColumnVector {
    const copy = new BytesColumnVector(0);
    copy.copyStateFrom(this);
    copy.vector = this.vector.map((buffer, row) => (buffer === undefined ? undefined : this.getBytes(row).slice()));
    copy.start = new Int32Array(this.start.length);
    copy.length = this.length.slice();
    return copy;
  }
}

export interface DecimalEntry {
  readonly unscaled: bigint;
  readonly scale: number;
}

/**
 * Each row keeps its own unscaled value and scale. The column-level
 * `precision` and `scale` follow the last value written.
 */
export class DecimalColumnVector extends VectorBase {
  readonly kind = Kind.Decimal;
  vector: (DecimalEntry | undefined)[];
  precision: number;
  scale: number;

  constructor(size: number = DEFAULT_BATCH_SIZE, precision = 38, scale = 10) {
    super(size);
    this.vector = growSlots<DecimalEntry>([], size, false);
    this.precision = precision;
    this.scale = scale;
  }

  protected growStorage(size: number, preserve: boolean): void {
    this.vector = growSlots(this.vector, size, preserve);
  }

  override reset(): void {
    super.reset();
    this.vector.fill(undefined);
  }

  clone(): DecimalColumnVector {
    const copy = new DecimalColumnVector(0, this.precision, this.scale);
    copy.copyStateFrom(this);
    copy.vector = [...this.vector];
    return copy;
  }
}

export class TimestampColumnVector extends VectorBase {
  readonly kind = Kind.Timestamp;
  /** Epoch milliseconds */
  time: Float64Array;
  /** Nanosecond of the second */
  nanos: Int32Array;

  constructor(size: number = DEFAULT_BATCH_SIZE) {
    super(size);
    this.time = new Float64Array(size);
    this.nanos = new Int32Array(size);
  }

  protected growStorage(size: number, preserve: boolean): void {
    this.time = growNumeric(this.time, size, preserve, (n) => new Float64Array(n));
    this.nanos = growNumeric(this.nanos, size, preserve, (n) => new Int32Array(n));
  }

  clone(): TimestampColumnVector {
    const copy = new TimestampColumnVector(0);
    copy.copyStateFrom(this);
    copy.time = this.time.slice();
    copy.nanos = this.nanos.slice();
    return copy;
  }
}

// =============================================================================
// Container vectors
// =============================================================================

abstract class MultiValuedVector extends VectorBase {
  offsets: Int32Array;
  lengths: Int32Array;
  /** Child slots in use; the next row starts here */
  childCount = 0;

  protected constructor(size: number) {
    super(size);
    this.offsets = new Int32Array(size);
    this.lengths = new Int32Array(size);
  }

  protected growStorage(size: number, preserve: boolean): void {
    this.offsets = growNumeric(this.offsets, size, preserve, (n) => new Int32Array(n));
    this.lengths = growNumeric(this.lengths, size, preserve, (n) => new Int32Array(n));
  }

  override reset(): void {
    super.reset();
    this.childCount = 0;
  }

  protected copyRangesFrom(other: MultiValuedVector): void {
    this.copyStateFrom(other);
    this.offsets = other.offsets.slice();
    this.lengths = other.lengths.slice();
    this.childCount = other.childCount;
  }
}

export class ListColumnVector extends MultiValuedVector {
  readonly kind = Kind.List;

  constructor(
    size: number,
    public child: ColumnVector
  ) {
    super(size);
  }

  override reset(): void {
    super.reset();
    this.child.reset();
  }

  clone(): ListColumnVector {
    const copy = new ListColumnVector(0, this.child.clone());
    copy.copyRangesFrom(this);
    return copy;
  }
}

export class MapColumnVector extends MultiValuedVector {
  readonly kind = Kind.Map;

  constructor(
    size: number,
    public keys: ColumnVector,
    public values: ColumnVector
  ) {
    super(size);
  }

  override reset(): void {
    super.reset();
    this.keys.reset();
    this.values.reset();
  }

  clone(): MapColumnVector {
    const copy = new MapColumnVector(0, this.keys.clone(), this.values.clone());
    copy.copyRangesFrom(this);
    return copy;
  }
}

/**
 * Struct fields live at the same row index as the struct itself.
 */
export class StructColumnVector extends VectorBase {
  readonly kind = Kind.Struct;

  constructor(
    size: number,
    public fields: ColumnVector[]
  ) {
    super(size);
  }

  protected growStorage(size: number, preserve: boolean): void {
    for (const field of this.fields) field.ensureSize(size, preserve);
  }

  override reset(): void {
    super.reset();
    for (const field of this.fields) field.reset();
  }

  clone(): StructColumnVector {
    const copy = new StructColumnVector(0, this.fields.map((field) => field.clone()));
    copy.copyStateFrom(this);
    return copy;
  }
}

/**
 * `tags[r]` selects the variant; the payload lives in `fields[tag]` at row `r`.
 */
export class UnionColumnVector extends VectorBase {
  readonly kind = Kind.Union;
  tags: Int32Array;

  constructor(
    size: number,
    public fields: ColumnVector[]
  ) {
    super(size);
    this.tags = new Int32Array(size);
  }

  protected growStorage(size: number, preserve: boolean): void {
    this.tags = growNumeric(this.tags, size, preserve, (n) => new Int32Array(n));
    for (const field of this.fields) field.ensureSize(size, preserve);
  }

  override reset(): void {
    super.reset();
    for (const field of this.fields) field.reset();
  }

  clone(): UnionColumnVector {
    const copy = new UnionColumnVector(0, this.fields.map((field) => field.clone()));
    copy.copyStateFrom(this);
    copy.tags = this.tags.slice();
    return copy;
  }
}

export type ColumnVector =
  | LongColumnVector
  | DoubleColumnVector
  | BytesColumnVector
  | DecimalColumnVector
  | TimestampColumnVector
  | ListColumnVector
  | MapColumnVector
  | StructColumnVector
  | UnionColumnVector;

type VectorOf<K extends Kind> = Extract<ColumnVector, { kind: K }>;

export function isVectorOf<K extends Kind>(vector: ColumnVector, kind: K): vector is VectorOf<K> {
  return vector.kind === kind;
}

/**
 * Narrow `vector` to the class that stores `kind`.
 *
 * @throws MarshalError SCHEMA_MISMATCH
 */
export function expectVector<K extends Kind>(vector: ColumnVector, kind: K, path: string, row: number): VectorOf<K> {
  if (!isVectorOf(vector, kind)) {
    throw MarshalError.schemaMismatch(`Field ${path} expects a ${kind} vector, got ${vector.kind}`, {
      field: path,
      row,
      expected: kind,
      actual: vector.kind,
    });
  }
  return vector;
}

// =============================================================================
// Factories
// =============================================================================

function childOf(schema: TypeSchema, index: number): TypeSchema {
  const child = schema.children[index];
  if (child === undefined) {
    throw MarshalError.schemaMismatch(`${schema.category} schema is missing child ${index}`);
  }
  return child;
}

/**
 * Allocate a vector tree for `schema` with `size` rows at every level.
 */
export function createVector(schema: TypeSchema, size: number = DEFAULT_BATCH_SIZE): ColumnVector {
  switch (schema.kind) {
    case Kind.Int64:
      return new LongColumnVector(size);
    case Kind.Float64:
      return new DoubleColumnVector(size);
    case Kind.Bytes:
      return new BytesColumnVector(size);
    case Kind.Decimal:
      return new DecimalColumnVector(size, schema.precision, schema.scale);
    case Kind.Timestamp:
      return new TimestampColumnVector(size);
    case Kind.List:
      return new ListColumnVector(size, createVector(childOf(schema, 0), size));
    case Kind.Map:
      return new MapColumnVector(size, createVector(childOf(schema, 0), size), createVector(childOf(schema, 1), size));
    case Kind.Struct:
      return new StructColumnVector(size, schema.children.map((child) => createVector(child, size)));
    case Kind.Union:
      return new UnionColumnVector(size, schema.children.map((child) => createVector(child, size)));
  }
}

export class RowBatch {
  /** Rows in use */
  size = 0;

  constructor(
    public cols: ColumnVector[],
    public maxSize: number
  ) {}

  get numCols(): number {
    return this.cols.length;
  }

  reset(): void {
    this.size = 0;
    for (const col of this.cols) col.reset();
  }

  /** Replace contents with a deep copy of `other`. */
  load(other: RowBatch): void {
    this.cols = other.cols.map((col) => col.clone());
    this.size = other.size;
    this.maxSize = other.maxSize;
  }

  clone(): RowBatch {
    const copy = new RowBatch([], this.maxSize);
    copy.load(this);
    return copy;
  }
}

/**
 * Allocate a batch for a struct root schema, one column per field.
 *
 * @throws MarshalError SCHEMA_MISMATCH when `schema` is not a struct
 */
export function createRowBatch(schema: TypeSchema, maxSize: number = DEFAULT_BATCH_SIZE): RowBatch {
  if (schema.kind !== Kind.Struct) {
    throw MarshalError.schemaMismatch(`Row batches need a struct schema, got ${schema.category}`, {
      expected: 'struct',
      actual: schema.category,
    });
  }
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new RangeError(`maxSize must be a positive integer, got ${maxSize}`);
  }
  return new RowBatch(
    schema.children.map((child) => createVector(child, maxSize)),
    maxSize
  );
}

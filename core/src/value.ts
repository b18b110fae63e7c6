/**
 * Row values
 *
 * A {@link Value} is a dynamically-typed cell. The `kind` tag says what the
 * caller holds; the schema the value is written against decides whether that
 * is acceptable (see the encoder).
 */

import { parseDecimal } from './decimal.js';
import { schemasEqual } from './schema.js';
import { Kind, type TypeSchema } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface NullValue {
  readonly kind: 'null';
}
export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}
/** 32-bit signed integer */
export interface IntValue {
  readonly kind: 'int';
  readonly value: number;
}
export interface LongValue {
  readonly kind: 'long';
  readonly value: bigint;
}
export interface FloatValue {
  readonly kind: 'float';
  /** Always representable as a 32-bit float */
  readonly value: number;
}
export interface DoubleValue {
  readonly kind: 'double';
  readonly value: number;
}
export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}
export interface BytesValue {
  readonly kind: 'bytes';
  readonly value: Uint8Array;
}
export interface DecimalValue {
  readonly kind: 'decimal';
  readonly unscaled: bigint;
  readonly scale: number;
}
export interface TimestampValue {
  readonly kind: 'timestamp';
  /** Epoch milliseconds */
  readonly millis: number;
  /** Nanosecond of the second, 0..999_999_999 */
  readonly nanos: number;
}
export interface DateValue {
  readonly kind: 'date';
  /** Epoch milliseconds at UTC midnight */
  readonly millis: number;
}
export interface ListValue {
  readonly kind: 'list';
  readonly elements: readonly Value[];
}
/** Fields in schema order */
export interface StructValue {
  readonly kind: 'struct';
  readonly fields: readonly Value[];
}
export interface MapValue {
  readonly kind: 'map';
  readonly entries: readonly (readonly [Value, Value])[];
}
export interface UnionValue {
  readonly kind: 'union';
  /** The variant schema the payload belongs to */
  readonly variant: TypeSchema;
  readonly value: Value;
}

export type Value =
  | NullValue
  | BooleanValue
  | IntValue
  | LongValue
  | FloatValue
  | DoubleValue
  | StringValue
  | BytesValue
  | DecimalValue
  | TimestampValue
  | DateValue
  | ListValue
  | StructValue
  | MapValue
  | UnionValue;

export type ValueTag = Value['kind'];

// =============================================================================
// Constructors
// =============================================================================

const MILLIS_PER_DAY = 86_400_000;
const NANOS_PER_MILLI = 1_000_000;

const NULL: NullValue = Object.freeze({ kind: 'null' });

function toMillis(input: Date | number): number {
  return Math.floor(typeof input === 'number' ? input : input.getTime());
}

export const Values = {
  null: (): NullValue => NULL,
  boolean: (value: boolean): BooleanValue => ({ kind: 'boolean', value }),
  int: (value: number): IntValue => ({ kind: 'int', value }),
  long: (value: bigint | number): LongValue => ({ kind: 'long', value: BigInt(value) }),
  /** Rounded to the nearest 32-bit float */
  float: (value: number): FloatValue => ({ kind: 'float', value: Math.fround(value) }),
  double: (value: number): DoubleValue => ({ kind: 'double', value }),
  string: (value: string): StringValue => ({ kind: 'string', value }),
  bytes: (value: Uint8Array): BytesValue => ({ kind: 'bytes', value }),

  /**
   * `Values.decimal('12.50')` or `Values.decimal(1250n, 2)`.
   */
  decimal(input: string | bigint, scale = 0): DecimalValue {
    if (typeof input === 'string') {
      return { kind: 'decimal', ...parseDecimal(input) };
    }
    return { kind: 'decimal', unscaled: input, scale };
  },

  /**
   * When `nanos` is given it replaces the sub-second part of `input`, so
   * `millis` and `nanos` always agree on the milliseconds.
   */
  timestamp(input: Date | number, nanos?: number): TimestampValue {
    const millis = toMillis(input);
    const seconds = Math.floor(millis / 1000);
    if (nanos === undefined) {
      return { kind: 'timestamp', millis, nanos: (millis - seconds * 1000) * NANOS_PER_MILLI };
    }
    if (!Number.isInteger(nanos) || nanos < 0 || nanos > 999_999_999) {
      throw new RangeError(`nanos must be in 0..999999999, got ${nanos}`);
    }
    return {
      kind: 'timestamp',
      millis: seconds * 1000 + Math.floor(nanos / NANOS_PER_MILLI),
      nanos,
    };
  },

  /** Truncated to UTC midnight */
  date: (input: Date | number): DateValue => ({
    kind: 'date',
    millis: Math.floor(toMillis(input) / MILLIS_PER_DAY) * MILLIS_PER_DAY,
  }),

  list: (elements: readonly Value[]): ListValue => ({ kind: 'list', elements }),
  struct: (fields: readonly Value[]): StructValue => ({ kind: 'struct', fields }),
  map: (entries: readonly (readonly [Value, Value])[]): MapValue => ({ kind: 'map', entries }),
  union: (variant: TypeSchema, value: Value): UnionValue => ({ kind: 'union', variant, value }),
} as const;

// =============================================================================
// Inspection
// =============================================================================

const TAG_KIND: Readonly<Record<Exclude<ValueTag, 'null'>, Kind>> = {
  boolean: Kind.Int64,
  int: Kind.Int64,
  long: Kind.Int64,
  float: Kind.Float64,
  double: Kind.Float64,
  string: Kind.Bytes,
  bytes: Kind.Bytes,
  decimal: Kind.Decimal,
  timestamp: Kind.Timestamp,
  date: Kind.Timestamp,
  list: Kind.List,
  struct: Kind.Struct,
  map: Kind.Map,
  union: Kind.Union,
};

/**
 * Column-vector Kind a value is stored in; `undefined` for null.
 */
export function valueKind(value: Value): Kind | undefined {
  return value.kind === 'null' ? undefined : TAG_KIND[value.kind];
}

export function isNullValue(value: Value): value is NullValue {
  return value.kind === 'null';
}

const utf8 = new TextEncoder();

/**
 * Identity of a scalar map key as stored: `int 1` and `long 1n` collide,
 * as do a string and its UTF-8 bytes.
 */
export function mapKeyIdentity(key: Value): string {
  switch (key.kind) {
    case 'boolean':
      return key.value ? 'i:1' : 'i:0';
    case 'int':
    case 'long':
      return `i:${BigInt.asIntN(64, BigInt(key.value))}`;
    case 'float':
    case 'double':
      return `f:${Object.is(key.value, -0) ? '-0' : String(key.value)}`;
    case 'string':
      return `b:${utf8.encode(key.value).join(',')}`;
    case 'bytes':
      return `b:${key.value.join(',')}`;
    default:
      return `?:${key.kind}`;
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function listEqual(a: readonly Value[], b: readonly Value[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined || !valuesEqual(left, right)) return false;
  }
  return true;
}

function mapEqual(a: MapValue, b: MapValue): boolean {
  if (a.entries.length !== b.entries.length) return false;
  return a.entries.every(([key, value]) => {
    const match = b.entries.find(([otherKey]) => valuesEqual(key, otherKey));
    return match !== undefined && valuesEqual(value, match[1]);
  });
}

/**
 * Structural equality. Map entries compare regardless of order; floating
 * point uses `Object.is`, so NaN equals NaN.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case 'null':
      return b.kind === 'null';
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'int':
      return b.kind === 'int' && a.value === b.value;
    case 'long':
      return b.kind === 'long' && a.value === b.value;
    case 'float':
      return b.kind === 'float' && Object.is(a.value, b.value);
    case 'double':
      return b.kind === 'double' && Object.is(a.value, b.value);
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'bytes':
      return b.kind === 'bytes' && bytesEqual(a.value, b.value);
    case 'decimal':
      return b.kind === 'decimal' && a.unscaled === b.unscaled && a.scale === b.scale;
    case 'timestamp':
      return b.kind === 'timestamp' && a.millis === b.millis && a.nanos === b.nanos;
    case 'date':
      return b.kind === 'date' && a.millis === b.millis;
    case 'list':
      return b.kind === 'list' && listEqual(a.elements, b.elements);
    case 'struct':
      return b.kind === 'struct' && listEqual(a.fields, b.fields);
    case 'map':
      return b.kind === 'map' && mapEqual(a, b);
    case 'union':
      return b.kind === 'union' && schemasEqual(a.variant, b.variant) && valuesEqual(a.value, b.value);
  }
}

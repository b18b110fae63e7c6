/**
 * Type schemas
 *
 * A {@link TypeSchema} is an immutable tree describing a column. Each node
 * carries a logical {@link Category} (what the user declared) and the
 * {@link Kind} of column vector that stores it. Several categories share a
 * Kind: `boolean`, `tinyint` ... `bigint` are all stored in an Int64 vector
 * and told apart again on the read side.
 *
 * @example
 * ```typescript
 * const quote = Types.struct({
 *   symbol: Types.string(),
 *   close: Types.double(),
 *   date: Types.timestamp(),
 * });
 * ```
 */

import { MAX_DECIMAL_PRECISION } from './decimal.js';

// =============================================================================
// Kinds and Categories
// =============================================================================

/**
 * Column-vector shape.
 */
export enum Kind {
  Int64 = 'Int64',
  Float64 = 'Float64',
  Bytes = 'Bytes',
  Decimal = 'Decimal',
  Timestamp = 'Timestamp',
  List = 'List',
  Struct = 'Struct',
  Map = 'Map',
  Union = 'Union',
}

export type Category =
  | 'boolean'
  | 'tinyint'
  | 'smallint'
  | 'int'
  | 'bigint'
  | 'float'
  | 'double'
  | 'string'
  | 'varchar'
  | 'char'
  | 'binary'
  | 'decimal'
  | 'timestamp'
  | 'date'
  | 'array'
  | 'struct'
  | 'map'
  | 'uniontype';

/**
 * Vector Kind for every category.
 */
export const CATEGORY_KIND: Readonly<Record<Category, Kind>> = Object.freeze({
  boolean: Kind.Int64,
  tinyint: Kind.Int64,
  smallint: Kind.Int64,
  int: Kind.Int64,
  bigint: Kind.Int64,
  float: Kind.Float64,
  double: Kind.Float64,
  string: Kind.Bytes,
  varchar: Kind.Bytes,
  char: Kind.Bytes,
  binary: Kind.Bytes,
  decimal: Kind.Decimal,
  timestamp: Kind.Timestamp,
  date: Kind.Timestamp,
  array: Kind.List,
  struct: Kind.Struct,
  map: Kind.Map,
  uniontype: Kind.Union,
});

export function isCategory(value: string): value is Category {
  return Object.prototype.hasOwnProperty.call(CATEGORY_KIND, value);
}

// =============================================================================
// TypeSchema
// =============================================================================

export interface TypeSchema {
  readonly category: Category;
  readonly kind: Kind;
  /**
   * array: [element]; map: [key, value]; struct: one per field;
   * uniontype: one per variant; empty for scalars
   */
  readonly children: readonly TypeSchema[];
  /** Struct field names, parallel to `children` (empty otherwise) */
  readonly fieldNames: readonly string[];
  /** varchar/char length */
  readonly maxLength?: number;
  /** decimal only */
  readonly precision?: number;
  readonly scale?: number;
}

export const DEFAULT_DECIMAL_PRECISION = 38;
export const DEFAULT_DECIMAL_SCALE = 10;

interface SchemaInit {
  children?: readonly TypeSchema[];
  fieldNames?: readonly string[];
  maxLength?: number;
  precision?: number;
  scale?: number;
}

function node(category: Category, init: SchemaInit = {}): TypeSchema {
  const schema: TypeSchema = {
    category,
    kind: CATEGORY_KIND[category],
    children: Object.freeze([...(init.children ?? [])]),
    fieldNames: Object.freeze([...(init.fieldNames ?? [])]),
    ...(init.maxLength !== undefined && { maxLength: init.maxLength }),
    ...(init.precision !== undefined && { precision: init.precision }),
    ...(init.scale !== undefined && { scale: init.scale }),
  };
  return Object.freeze(schema);
}

function assertLength(category: 'varchar' | 'char', length: number): void {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`${category} length must be a positive integer, got ${length}`);
  }
}

/**
 * Build a schema node from its parts; used by the parsers and by
 * {@link Types}. Invalid shapes throw a RangeError.
 */
export function createSchema(category: Category, init: SchemaInit = {}): TypeSchema {
  const childCount = init.children?.length ?? 0;
  switch (category) {
    case 'varchar':
    case 'char':
      assertLength(category, init.maxLength ?? 0);
      break;
    case 'decimal': {
      const precision = init.precision ?? DEFAULT_DECIMAL_PRECISION;
      const scale = init.scale ?? DEFAULT_DECIMAL_SCALE;
      if (!Number.isInteger(precision) || precision < 1 || precision > MAX_DECIMAL_PRECISION) {
        throw new RangeError(`decimal precision must be in 1..${MAX_DECIMAL_PRECISION}, got ${precision}`);
      }
      if (!Number.isInteger(scale) || scale < 0 || scale > precision) {
        throw new RangeError(`decimal scale must be in 0..${precision}, got ${scale}`);
      }
      return node(category, { precision, scale });
    }
    case 'array':
      if (childCount !== 1) {
        throw new RangeError(`array takes exactly 1 child, got ${childCount}`);
      }
      break;
    case 'map':
      if (childCount !== 2) {
        throw new RangeError(`map takes exactly 2 children, got ${childCount}`);
      }
      break;
    case 'struct': {
      const names = init.fieldNames ?? [];
      if (names.length !== childCount) {
        throw new RangeError(`struct has ${names.length} field names for ${childCount} children`);
      }
      if (new Set(names).size !== names.length) {
        throw new RangeError(`struct field names must be unique: ${names.join(',')}`);
      }
      break;
    }
    case 'uniontype':
      if (childCount === 0) {
        throw new RangeError('uniontype takes at least 1 variant');
      }
      break;
    default:
      if (childCount !== 0) {
        throw new RangeError(`${category} takes no children, got ${childCount}`);
      }
  }
  return node(category, init);
}

/**
 * Schema builders.
 */
export const Types = {
  boolean: (): TypeSchema => createSchema('boolean'),
  tinyint: (): TypeSchema => createSchema('tinyint'),
  smallint: (): TypeSchema => createSchema('smallint'),
  int: (): TypeSchema => createSchema('int'),
  bigint: (): TypeSchema => createSchema('bigint'),
  float: (): TypeSchema => createSchema('float'),
  double: (): TypeSchema => createSchema('double'),
  string: (): TypeSchema => createSchema('string'),
  varchar: (maxLength: number): TypeSchema => createSchema('varchar', { maxLength }),
  char: (maxLength: number): TypeSchema => createSchema('char', { maxLength }),
  binary: (): TypeSchema => createSchema('binary'),
  decimal: (precision = DEFAULT_DECIMAL_PRECISION, scale = DEFAULT_DECIMAL_SCALE): TypeSchema =>
    createSchema('decimal', { precision, scale }),
  timestamp: (): TypeSchema => createSchema('timestamp'),
  /** Readable, but the encoder rejects it; use {@link Types.timestamp} for writes. */
  date: (): TypeSchema => createSchema('date'),
  list: (element: TypeSchema): TypeSchema => createSchema('array', { children: [element] }),
  struct: (fields: Readonly<Record<string, TypeSchema>>): TypeSchema =>
    createSchema('struct', {
      fieldNames: Object.keys(fields),
      children: Object.values(fields),
    }),
  /** Struct from ordered [name, schema] pairs. */
  structOf: (fields: readonly (readonly [string, TypeSchema])[]): TypeSchema =>
    createSchema('struct', {
      fieldNames: fields.map(([name]) => name),
      children: fields.map(([, schema]) => schema),
    }),
  map: (key: TypeSchema, value: TypeSchema): TypeSchema => createSchema('map', { children: [key, value] }),
  union: (...variants: TypeSchema[]): TypeSchema => createSchema('uniontype', { children: variants }),
} as const;

// =============================================================================
// Map invariant
// =============================================================================

export const MAP_KEY_KINDS: ReadonlySet<Kind> = new Set([Kind.Bytes, Kind.Int64, Kind.Float64]);

export const MAP_VALUE_KINDS: ReadonlySet<Kind> = new Set([
  Kind.Int64,
  Kind.Float64,
  Kind.Bytes,
  Kind.Decimal,
  Kind.Timestamp,
]);

export interface MapTypeCheck {
  valid: boolean;
  /** Set when the key Kind is not allowed */
  keyKind?: Kind;
  /** Set when the value Kind is not allowed */
  valueKind?: Kind;
}

/**
 * Whether a map schema keeps to the supported key/value Kinds.
 * Scalar keys (Bytes, Int64, Float64) and scalar values only.
 */
export function checkMapTypes(schema: TypeSchema): MapTypeCheck {
  const [key, value] = schema.children;
  if (schema.kind !== Kind.Map || key === undefined || value === undefined) {
    return { valid: false };
  }
  const keyOk = MAP_KEY_KINDS.has(key.kind);
  const valueOk = MAP_VALUE_KINDS.has(value.kind);
  return {
    valid: keyOk && valueOk,
    ...(!keyOk && { keyKind: key.kind }),
    ...(!valueOk && { valueKind: value.kind }),
  };
}

export function isScalarKind(kind: Kind): boolean {
  return MAP_VALUE_KINDS.has(kind);
}

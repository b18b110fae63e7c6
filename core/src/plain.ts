/**
 * Conversion between Values and plain JavaScript data
 *
 * | Value       | plain                                        |
 * |-------------|----------------------------------------------|
 * | null        | `null`                                       |
 * | boolean     | `boolean`                                    |
 * | int, float, double | `number`                              |
 * | long        | `bigint`                                     |
 * | string      | `string`                                     |
 * | bytes       | `Uint8Array`                                 |
 * | decimal     | `string`, e.g. `'12.50'`                     |
 * | timestamp, date | `Date` (sub-millisecond nanos are dropped) |
 * | list, struct | array                                       |
 * | map         | `Map`                                        |
 * | union       | `{ variant, value }`                         |
 *
 * `fromPlain` needs a schema to pick tags; it also takes objects keyed by
 * field name for structs and by key for string-keyed maps.
 */

import { formatDecimal } from './decimal.js';
import { MarshalError, isMarshalError } from './errors.js';
import { type Result, err, isErr, ok, tryCatch } from './result.js';
import { schemaToString } from './schema.js';
import { Kind, type TypeSchema } from './types.js';
import { type Value, Values } from './value.js';

export interface PlainUnion {
  variant: TypeSchema;
  value: PlainValue;
}

export type PlainValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Date
  | PlainValue[]
  | Map<PlainValue, PlainValue>
  | PlainUnion;

// =============================================================================
// Value -> plain
// =============================================================================

export function toPlain(value: Value): PlainValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'int':
    case 'long':
    case 'float':
    case 'double':
    case 'string':
    case 'bytes':
      return value.value;
    case 'decimal':
      return formatDecimal(value.unscaled, value.scale);
    case 'timestamp':
    case 'date':
      return new Date(value.millis);
    case 'list':
      return value.elements.map(toPlain);
    case 'struct':
      return value.fields.map(toPlain);
    case 'map':
      return new Map(value.entries.map(([k, v]) => [toPlain(k), toPlain(v)]));
    case 'union':
      return { variant: value.variant, value: toPlain(value.value) };
  }
}

// =============================================================================
// plain -> Value
// =============================================================================

export interface FromPlainOptions {
  /** Root of field paths in error messages (default: `value`) */
  fieldName?: string;
  /** Row number reported in errors (default: 0) */
  rowNumber?: number;
}

const INT_BITS: Partial<Record<TypeSchema['category'], number>> = {
  tinyint: 8,
  smallint: 16,
  int: 32,
};

const utf8 = new TextEncoder();

function describe(input: unknown): string {
  if (input === null) return 'null';
  if (Array.isArray(input)) return 'array';
  if (input instanceof Date) return 'Date';
  if (input instanceof Map) return 'Map';
  if (input instanceof Uint8Array) return 'Uint8Array';
  return typeof input;
}

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input) && Object.getPrototypeOf(input) === Object.prototype;
}

function isPlainUnion(input: unknown): input is { variant: unknown; value: unknown } {
  return isRecord(input) && 'variant' in input && 'value' in input && Object.keys(input).length === 2;
}

class PlainConverter {
  constructor(private readonly row: number) {}

  convert(input: unknown, schema: TypeSchema, path: string): Value {
    if (input === null || input === undefined) {
      return Values.null();
    }
    switch (schema.kind) {
      case Kind.Int64:
        return this.int64(input, schema, path);
      case Kind.Float64:
        if (typeof input !== 'number') throw this.mismatch(path, schema, input);
        return schema.category === 'float' ? Values.float(input) : Values.double(input);
      case Kind.Bytes:
        if (schema.category === 'binary') {
          if (input instanceof Uint8Array) return Values.bytes(input);
          if (typeof input === 'string') return Values.bytes(utf8.encode(input));
        } else if (typeof input === 'string') {
          return Values.string(input);
        }
        throw this.mismatch(path, schema, input);
      case Kind.Decimal:
        return this.decimal(input, schema, path);
      case Kind.Timestamp: {
        if (!(input instanceof Date) && typeof input !== 'number') throw this.mismatch(path, schema, input);
        return schema.category === 'date' ? Values.date(input) : Values.timestamp(input);
      }
      case Kind.List: {
        if (!Array.isArray(input)) throw this.mismatch(path, schema, input);
        const elementSchema = this.child(schema, 0, path);
        return Values.list(input.map((element: unknown, i) => this.convert(element, elementSchema, `${path}[${i}]`)));
      }
      case Kind.Struct:
        return this.struct(input, schema, path);
      case Kind.Map:
        return this.map(input, schema, path);
      case Kind.Union:
        return this.union(input, schema, path);
    }
  }

  private int64(input: unknown, schema: TypeSchema, path: string): Value {
    if (schema.category === 'boolean') {
      if (typeof input !== 'boolean') throw this.mismatch(path, schema, input);
      return Values.boolean(input);
    }
    if (typeof input !== 'number' && typeof input !== 'bigint') {
      throw this.mismatch(path, schema, input);
    }
    if (typeof input === 'number' && !Number.isInteger(input)) {
      throw MarshalError.typeMismatch(path, this.row, schema.category, `number ${input}`);
    }
    const big = BigInt(input);
    const bits = INT_BITS[schema.category];
    if (bits === undefined) {
      if (BigInt.asIntN(64, big) !== big) {
        throw MarshalError.typeMismatch(path, this.row, 'bigint within 64 bits', `${input}`);
      }
      return Values.long(big);
    }
    if (BigInt.asIntN(bits, big) !== big) {
      throw MarshalError.typeMismatch(path, this.row, `${schema.category} within ${bits} bits`, `${input}`);
    }
    return Values.int(Number(big));
  }

  private decimal(input: unknown, schema: TypeSchema, path: string): Value {
    if (typeof input === 'bigint') {
      return Values.decimal(input, 0);
    }
    if (typeof input !== 'string' && typeof input !== 'number') {
      throw this.mismatch(path, schema, input);
    }
    try {
      return Values.decimal(String(input));
    } catch (error) {
      if (error instanceof RangeError) {
        throw MarshalError.typeMismatch(path, this.row, schemaToString(schema), `${describe(input)} ${String(input)}`);
      }
      throw error;
    }
  }

  private struct(input: unknown, schema: TypeSchema, path: string): Value {
    const fieldPath = (i: number): string => `${path}.${schema.fieldNames[i] ?? i}`;
    if (Array.isArray(input)) {
      if (input.length !== schema.children.length) {
        throw MarshalError.arityMismatch(path, this.row, schema.children.length, input.length);
      }
      return Values.struct(schema.children.map((child, i) => this.convert(input[i], child, fieldPath(i))));
    }
    if (!isRecord(input)) throw this.mismatch(path, schema, input);
    const unknown = Object.keys(input).filter((key) => !schema.fieldNames.includes(key));
    if (unknown.length > 0) {
      throw MarshalError.typeMismatch(path, this.row, schemaToString(schema), `object with field ${unknown.join(',')}`);
    }
    return Values.struct(
      schema.children.map((child, i) => this.convert(input[schema.fieldNames[i] ?? ''], child, fieldPath(i)))
    );
  }

  private map(input: unknown, schema: TypeSchema, path: string): Value {
    const keySchema = this.child(schema, 0, path);
    const valueSchema = this.child(schema, 1, path);
    let pairs: [unknown, unknown][];
    if (input instanceof Map) {
      pairs = [...input.entries()];
    } else if (isRecord(input)) {
      pairs = Object.entries(input);
    } else {
      throw this.mismatch(path, schema, input);
    }
    return Values.map(
      pairs.map(([key, value], i) => [
        this.convert(key, keySchema, `${path}[${i}].key`),
        this.convert(value, valueSchema, `${path}[${i}].value`),
      ])
    );
  }

  private union(input: unknown, schema: TypeSchema, path: string): Value {
    if (isPlainUnion(input)) {
      const { variant } = input;
      const index =
        typeof variant === 'number' ? variant : schema.children.findIndex((child) => child === variant);
      const variantSchema = schema.children[index];
      if (variantSchema === undefined) {
        throw MarshalError.unionVariantNotFound(path, this.row, describe(variant), schemaToString(schema));
      }
      return Values.union(variantSchema, this.convert(input.value, variantSchema, `${path}<${index}>`));
    }
    // first variant that takes the value
    for (const [i, variantSchema] of schema.children.entries()) {
      try {
        return Values.union(variantSchema, this.convert(input, variantSchema, `${path}<${i}>`));
      } catch (error) {
        if (!isMarshalError(error)) throw error;
      }
    }
    throw MarshalError.unionVariantNotFound(path, this.row, describe(input), schemaToString(schema));
  }

  private child(schema: TypeSchema, index: number, path: string): TypeSchema {
    const child = schema.children[index];
    if (child === undefined) {
      throw MarshalError.schemaMismatch(`${schema.category} schema of ${path} has no child ${index}`, { field: path });
    }
    return child;
  }

  private mismatch(path: string, schema: TypeSchema, input: unknown): MarshalError {
    return MarshalError.typeMismatch(path, this.row, schemaToString(schema), describe(input));
  }
}

/**
 * Build a Value from plain data, guided by `schema`.
 */
export function fromPlain(input: unknown, schema: TypeSchema, options: FromPlainOptions = {}): Result<Value, MarshalError> {
  const converter = new PlainConverter(options.rowNumber ?? 0);
  return tryCatch(() => converter.convert(input, schema, options.fieldName ?? 'value'), isMarshalError);
}

/**
 * Build a row of Values from plain data, one entry per top-level field.
 * Accepts an array in field order or an object keyed by field name.
 */
export function rowFromPlain(
  input: readonly unknown[] | Readonly<Record<string, unknown>>,
  rootSchema: TypeSchema,
  rowNumber = 0
): Result<Value[], MarshalError> {
  const result = fromPlain(input, rootSchema, { fieldName: 'row', rowNumber });
  if (isErr(result)) {
    return err(result.error);
  }
  return ok(result.value.kind === 'struct' ? [...result.value.fields] : []);
}

/**
 * fast-check arbitraries for schemas and the values that round-trip under them
 *
 * Generated values are canonical for their schema: the tag the decoder
 * produces (`int` under tinyint, `long` under bigint, 32-bit floats under
 * float), so a write followed by a read gives back an equal value.
 * Dates are never generated; the writer rejects them.
 */

import * as fc from 'fast-check';
import { Types, Values, mapKeyIdentity, type TypeSchema, type Value } from '@orcbatch/core';

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export const fieldNameArb: fc.Arbitrary<string> = fc.stringMatching(/^[a-z][a-z0-9_]{0,7}$/);

// =============================================================================
// Schemas
// =============================================================================

export const scalarSchemaArb: fc.Arbitrary<TypeSchema> = fc.oneof(
  fc.constantFrom(
    Types.boolean(),
    Types.tinyint(),
    Types.smallint(),
    Types.int(),
    Types.bigint(),
    Types.float(),
    Types.double(),
    Types.string(),
    Types.binary(),
    Types.timestamp()
  ),
  fc.integer({ min: 1, max: 64 }).map((n) => Types.varchar(n)),
  fc.integer({ min: 1, max: 64 }).map((n) => Types.char(n)),
  fc
    .tuple(fc.integer({ min: 1, max: 38 }), fc.integer({ min: 0, max: 10 }))
    .filter(([precision, scale]) => scale <= precision)
    .map(([precision, scale]) => Types.decimal(precision, scale))
);

export const mapKeySchemaArb: fc.Arbitrary<TypeSchema> = fc.constantFrom(
  Types.string(),
  Types.int(),
  Types.bigint(),
  Types.double()
);

export function structSchemaArb(
  field: fc.Arbitrary<TypeSchema>,
  constraints: { minFields?: number; maxFields?: number } = {}
): fc.Arbitrary<TypeSchema> {
  return fc
    .uniqueArray(fc.tuple(fieldNameArb, field), {
      minLength: constraints.minFields ?? 1,
      maxLength: constraints.maxFields ?? 4,
      selector: ([name]) => name,
    })
    .map((fields) => Types.structOf(fields));
}

/**
 * Any writable schema nested up to `depth` containers deep.
 * Union variants have distinct categories, since values pick their variant by category.
 */
export function schemaArb(depth = 2): fc.Arbitrary<TypeSchema> {
  if (depth <= 0) {
    return scalarSchemaArb;
  }
  const child = schemaArb(depth - 1);
  return fc.oneof(
    { arbitrary: scalarSchemaArb, weight: 3 },
    { arbitrary: child.map((element) => Types.list(element)), weight: 1 },
    { arbitrary: structSchemaArb(child, { maxFields: 3 }), weight: 1 },
    {
      arbitrary: fc.tuple(mapKeySchemaArb, scalarSchemaArb).map(([key, value]) => Types.map(key, value)),
      weight: 1,
    },
    {
      arbitrary: fc
        .uniqueArray(child, { minLength: 1, maxLength: 3, selector: (variant) => variant.category })
        .map((variants) => Types.union(...variants)),
      weight: 1,
    },
  );
}

/** Root struct whose fields nest up to three containers deep */
export const rowSchemaArb: fc.Arbitrary<TypeSchema> = structSchemaArb(schemaArb(2));

// =============================================================================
// Values
// =============================================================================

/** A value for `schema`, null one time in five */
export function valueArb(schema: TypeSchema): fc.Arbitrary<Value> {
  return fc.oneof(
    { arbitrary: fc.constant(Values.null()), weight: 1 },
    { arbitrary: nonNullValueArb(schema), weight: 4 }
  );
}

export function nonNullValueArb(schema: TypeSchema): fc.Arbitrary<Value> {
  switch (schema.category) {
    case 'boolean':
      return fc.boolean().map((v) => Values.boolean(v));
    case 'tinyint':
      return fc.integer({ min: -128, max: 127 }).map((v) => Values.int(v));
    case 'smallint':
      return fc.integer({ min: -32768, max: 32767 }).map((v) => Values.int(v));
    case 'int':
      return fc.integer().map((v) => Values.int(v));
    case 'bigint':
      return fc.bigInt({ min: INT64_MIN, max: INT64_MAX }).map((v) => Values.long(v));
    case 'float':
      return fc.double({ noNaN: true }).map((v) => Values.float(v));
    case 'double':
      return fc.double({ noNaN: true }).map((v) => Values.double(v));
    case 'string':
    case 'varchar':
    case 'char':
      return fc.string({ maxLength: 16 }).map((v) => Values.string(v));
    case 'binary':
      return fc.uint8Array({ maxLength: 16 }).map((v) => Values.bytes(v));
    case 'decimal':
      return fc
        .tuple(fc.bigInt({ min: -(10n ** 18n), max: 10n ** 18n }), fc.integer({ min: 0, max: 10 }))
        .map(([unscaled, scale]) => Values.decimal(unscaled, scale));
    case 'timestamp':
      return fc
        .tuple(fc.integer({ min: -2_000_000_000_000, max: 4_000_000_000_000 }), fc.integer({ min: 0, max: 999_999_999 }))
        .map(([millis, nanos]) => Values.timestamp(millis, nanos));
    case 'date':
      return fc.integer({ min: 0, max: 4_000_000_000_000 }).map((millis) => Values.date(millis));
    case 'array': {
      const [element] = schema.children;
      return element === undefined
        ? fc.constant(Values.list([]))
        : fc.array(valueArb(element), { maxLength: 4 }).map((elements) => Values.list(elements));
    }
    case 'struct':
      return fc.tuple(...schema.children.map(valueArb)).map((fields) => Values.struct(fields));
    case 'map': {
      const [key, value] = schema.children;
      if (key === undefined || value === undefined) {
        return fc.constant(Values.map([]));
      }
      return fc
        .uniqueArray(fc.tuple(nonNullValueArb(key), valueArb(value)), {
          maxLength: 4,
          selector: ([k]) => mapKeyIdentity(k),
        })
        .map((entries) => Values.map(entries));
    }
    case 'uniontype':
      return fc.oneof(...schema.children.map((variant) => valueArb(variant).map((v) => Values.union(variant, v))));
  }
}

/** One value per field of a root struct schema */
export function rowArb(schema: TypeSchema): fc.Arbitrary<Value[]> {
  return fc.tuple(...schema.children.map(valueArb));
}

/** A schema together with `minRows..maxRows` rows for it */
export function schemaWithRowsArb(
  constraints: { minRows?: number; maxRows?: number } = {}
): fc.Arbitrary<{ schema: TypeSchema; rows: Value[][] }> {
  return rowSchemaArb.chain((schema) =>
    fc
      .array(rowArb(schema), { minLength: constraints.minRows ?? 1, maxLength: constraints.maxRows ?? 8 })
      .map((rows) => ({ schema, rows }))
  );
}

/**
 * Shared schemas and rows for tests
 */

import { Types, Values, type TypeSchema, type Value } from '@orcbatch/core';

// =============================================================================
// Daily quotes
// =============================================================================

export const quoteSchema: TypeSchema = Types.structOf([
  ['symbol', Types.string()],
  ['close', Types.double()],
  ['date', Types.timestamp()],
]);

/** 2024-03-01, 2024-03-04, 2024-03-05 at UTC midnight */
export const QUOTE_DAYS = [Date.UTC(2024, 2, 1), Date.UTC(2024, 2, 4), Date.UTC(2024, 2, 5)] as const;

export function quoteRows(): Value[][] {
  return [
    [Values.string('AAPL'), Values.double(179.66), Values.timestamp(QUOTE_DAYS[0])],
    [Values.string('MSFT'), Values.double(415.5), Values.timestamp(QUOTE_DAYS[1])],
    [Values.string('GOOG'), Values.double(134.2), Values.timestamp(QUOTE_DAYS[2])],
  ];
}

// =============================================================================
// Counters
// =============================================================================

export const counterSchema: TypeSchema = Types.structOf([['counts', Types.map(Types.string(), Types.bigint())]]);

export function counterRow(): Value[] {
  return [
    Values.map([
      [Values.string('a'), Values.long(1n)],
      [Values.string('b'), Values.long(2n)],
    ]),
  ];
}

// =============================================================================
// Generated rows
// =============================================================================

/** One `bigint` column `id`; row i holds i */
export const idSchema: TypeSchema = Types.structOf([['id', Types.bigint()]]);

export function idRows(count: number): Value[][] {
  return Array.from({ length: count }, (_, i) => [Values.long(i)]);
}

/** `tags` list column; row i holds i strings `t0..t{i-1}` */
export const tagSchema: TypeSchema = Types.structOf([
  ['id', Types.int()],
  ['tags', Types.list(Types.string())],
]);

export function tagRows(count: number): Value[][] {
  return Array.from({ length: count }, (_, i) => [
    Values.int(i),
    Values.list(Array.from({ length: i }, (_, j) => Values.string(`t${j}`))),
  ]);
}

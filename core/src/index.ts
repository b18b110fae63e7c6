// @orcbatch/core
// Row <-> column-batch marshalling over a pluggable columnar engine

// =============================================================================
// Schemas
// =============================================================================
export {
  Kind,
  Types,
  CATEGORY_KIND,
  DEFAULT_DECIMAL_PRECISION,
  DEFAULT_DECIMAL_SCALE,
  MAP_KEY_KINDS,
  MAP_VALUE_KINDS,
  checkMapTypes,
  createSchema,
  isCategory,
  isScalarKind,
  type Category,
  type MapTypeCheck,
  type TypeSchema,
} from './types.js';

export {
  SchemaJsonSchema,
  parseSchema,
  schemaFromJson,
  schemaToJson,
  schemaToString,
  schemasEqual,
  type SchemaJson,
} from './schema.js';

// =============================================================================
// Values
// =============================================================================
export {
  Values,
  isNullValue,
  mapKeyIdentity,
  valueKind,
  valuesEqual,
  type BooleanValue,
  type BytesValue,
  type DateValue,
  type DecimalValue,
  type DoubleValue,
  type FloatValue,
  type IntValue,
  type ListValue,
  type LongValue,
  type MapValue,
  type NullValue,
  type StringValue,
  type StructValue,
  type TimestampValue,
  type UnionValue,
  type Value,
  type ValueTag,
} from './value.js';

export {
  MAX_DECIMAL_PRECISION,
  decimalPrecision,
  formatDecimal,
  parseDecimal,
  type DecimalParts,
} from './decimal.js';

export {
  fromPlain,
  rowFromPlain,
  toPlain,
  type FromPlainOptions,
  type PlainUnion,
  type PlainValue,
} from './plain.js';

// =============================================================================
// Vectors and Batches
// =============================================================================
export {
  DEFAULT_BATCH_SIZE,
  BytesColumnVector,
  DecimalColumnVector,
  DoubleColumnVector,
  ListColumnVector,
  LongColumnVector,
  MapColumnVector,
  RowBatch,
  StructColumnVector,
  TimestampColumnVector,
  UnionColumnVector,
  createRowBatch,
  createVector,
  expectVector,
  isVectorOf,
  type ColumnVector,
  type DecimalEntry,
} from './vectors.js';

// =============================================================================
// Encoder / Decoder
// =============================================================================
export { encodeCell, encodeRow, type ChildGrowth, type EncodeOptions } from './encoder.js';
export { decodeCell, decodeRow } from './decoder.js';

// =============================================================================
// Engine Contract
// =============================================================================
export type {
  ColumnarEngine,
  EngineReader,
  EngineWriter,
  OpenWriterOptions,
} from './engine.js';

// =============================================================================
// Errors and Results
// =============================================================================
export {
  MarshalError,
  MarshalErrorCode,
  hasErrorCode,
  isMarshalError,
  isMarshalErrorCode,
  wrapEngineError,
  type MarshalErrorDetails,
} from './errors.js';

export {
  all,
  err,
  isErr,
  isOk,
  ok,
  tryCatch,
  type Err,
  type Ok,
  type Result,
} from './result.js';

// =============================================================================
// Logging
// =============================================================================
export {
  LogLevels,
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogContextValue,
  isLogLevel,
  withContext,
  type ConsoleLoggerConfig,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerConfig,
  type TestLogger,
} from './logging.js';

/**
 * Error taxonomy for row/batch marshalling
 *
 * Every failure surfaced by the encoder, decoder, writer, reader or an engine
 * is a {@link MarshalError}. Callers branch on `code` rather than on classes:
 *
 * - Value/schema conformance: TYPE_MISMATCH, ARITY_MISMATCH, UNSUPPORTED_TYPE,
 *   MAP_KEY_TYPE_MISMATCH, MAP_VALUE_TYPE_MISMATCH, DUPLICATE_MAP_KEY,
 *   UNION_VARIANT_NOT_FOUND, SCHEMA_MISMATCH
 * - Stored data: CORRUPT_UNION_TAG
 * - Engine I/O: ENGINE_IO_ERROR (the engine's own error is kept as `cause`)
 * - Schema descriptions: SCHEMA_PARSE_ERROR
 * - Session lifecycle: SESSION_CLOSED, SESSION_FAILED
 *
 * @example
 * ```typescript
 * import { MarshalError, MarshalErrorCode } from '@orcbatch/core';
 *
 * try {
 *   writer.writeRow(row);
 * } catch (error) {
 *   if (error instanceof MarshalError && error.code === MarshalErrorCode.TYPE_MISMATCH) {
 *     logger.warn(error.message, { field: error.field ?? null });
 *   }
 * }
 * ```
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum MarshalErrorCode {
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  ARITY_MISMATCH = 'ARITY_MISMATCH',
  UNSUPPORTED_TYPE = 'UNSUPPORTED_TYPE',
  MAP_KEY_TYPE_MISMATCH = 'MAP_KEY_TYPE_MISMATCH',
  MAP_VALUE_TYPE_MISMATCH = 'MAP_VALUE_TYPE_MISMATCH',
  DUPLICATE_MAP_KEY = 'DUPLICATE_MAP_KEY',
  UNION_VARIANT_NOT_FOUND = 'UNION_VARIANT_NOT_FOUND',
  CORRUPT_UNION_TAG = 'CORRUPT_UNION_TAG',
  ENGINE_IO_ERROR = 'ENGINE_IO_ERROR',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  SCHEMA_PARSE_ERROR = 'SCHEMA_PARSE_ERROR',
  SESSION_CLOSED = 'SESSION_CLOSED',
  SESSION_FAILED = 'SESSION_FAILED',
}

/**
 * Type guard to check if a string is a valid MarshalErrorCode.
 */
export function isMarshalErrorCode(code: string): code is MarshalErrorCode {
  return (Object.values(MarshalErrorCode) as string[]).includes(code);
}

/**
 * Structured details attached to a MarshalError.
 */
export interface MarshalErrorDetails {
  /** Dotted path of the offending field, e.g. `quote.prices[2]` */
  field?: string;
  /** Row number the failure belongs to */
  row?: number;
  /** What the schema asked for */
  expected?: string;
  /** What was found instead */
  actual?: string;
  /** Engine operation that failed (for ENGINE_IO_ERROR) */
  operation?: string;
  /** File path of the session */
  path?: string;
  [key: string]: string | number | boolean | undefined;
}

// =============================================================================
// MarshalError
// =============================================================================

/**
 * The single error type surfaced by this library.
 */
export class MarshalError extends Error {
  public readonly code: MarshalErrorCode;
  public readonly details?: MarshalErrorDetails;
  public readonly suggestion?: string;
  /** Milliseconds since epoch at construction */
  public readonly timestamp: number;
  public override readonly cause?: unknown;

  constructor(
    message: string,
    code: MarshalErrorCode,
    details?: MarshalErrorDetails,
    suggestion?: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'MarshalError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();
    if (cause !== undefined) {
      this.cause = cause;
    }
    Error.captureStackTrace(this, MarshalError);
  }

  /** Field path from `details`, if any */
  get field(): string | undefined {
    return this.details?.field;
  }

  /** Row number from `details`, if any */
  get row(): number | undefined {
    return this.details?.row;
  }

  /**
   * Structured form for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .filter(([, v]) => v !== undefined)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }

  // ---------------------------------------------------------------------------
  // Factories
  // ---------------------------------------------------------------------------

  static typeMismatch(field: string, row: number, expected: string, actual: string): MarshalError {
    return new MarshalError(
      `${expected} expected for field ${field} in row ${row}, got ${actual}`,
      MarshalErrorCode.TYPE_MISMATCH,
      { field, row, expected, actual }
    );
  }

  static arityMismatch(field: string, row: number, expected: number, actual: number): MarshalError {
    return new MarshalError(
      `Struct field ${field} in row ${row} has ${actual} values, schema declares ${expected} fields`,
      MarshalErrorCode.ARITY_MISMATCH,
      { field, row, expected: String(expected), actual: String(actual) }
    );
  }

  static unsupportedType(message: string, field: string, row?: number, suggestion?: string): MarshalError {
    return new MarshalError(
      `${message} (field ${field})`,
      MarshalErrorCode.UNSUPPORTED_TYPE,
      { field, row },
      suggestion
    );
  }

  /** The engine stores date columns truncated to 32 bits, so they are write-protected */
  static dateNotSupported(field: string, row: number): MarshalError {
    return MarshalError.unsupportedType(
      'date is not supported, use timestamp',
      field,
      row,
      `Declare field ${field} as timestamp and write a timestamp value`
    );
  }

  static mapKeyTypeMismatch(field: string, row: number, expected: string, actual: string): MarshalError {
    return new MarshalError(
      `Map keys for field ${field} in row ${row} must all be ${expected}, got ${actual}`,
      MarshalErrorCode.MAP_KEY_TYPE_MISMATCH,
      { field, row, expected, actual }
    );
  }

  static mapValueTypeMismatch(field: string, row: number, expected: string, actual: string): MarshalError {
    return new MarshalError(
      `Map values for field ${field} in row ${row} must all be ${expected}, got ${actual}`,
      MarshalErrorCode.MAP_VALUE_TYPE_MISMATCH,
      { field, row, expected, actual }
    );
  }

  static duplicateMapKey(field: string, row: number, key: string): MarshalError {
    return new MarshalError(
      `Duplicate map key ${key} for field ${field} in row ${row}`,
      MarshalErrorCode.DUPLICATE_MAP_KEY,
      { field, row, actual: key }
    );
  }

  static unionVariantNotFound(field: string, row: number, variant: string, declared: string): MarshalError {
    return new MarshalError(
      `Union field ${field} in row ${row} has no variant of type ${variant}`,
      MarshalErrorCode.UNION_VARIANT_NOT_FOUND,
      { field, row, expected: declared, actual: variant }
    );
  }

  static corruptUnionTag(field: string, row: number, tag: number, limit: number): MarshalError {
    return new MarshalError(
      `Union tag ${tag} for field ${field} in row ${row} is out of range (0..${limit - 1})`,
      MarshalErrorCode.CORRUPT_UNION_TAG,
      { field, row, actual: String(tag), expected: `< ${limit}` }
    );
  }

  static schemaMismatch(message: string, details?: MarshalErrorDetails): MarshalError {
    return new MarshalError(message, MarshalErrorCode.SCHEMA_MISMATCH, details);
  }

  static schemaParse(message: string, details?: MarshalErrorDetails): MarshalError {
    return new MarshalError(message, MarshalErrorCode.SCHEMA_PARSE_ERROR, details);
  }

  static engineIO(message: string, operation: string, cause?: unknown, path?: string): MarshalError {
    return new MarshalError(
      message,
      MarshalErrorCode.ENGINE_IO_ERROR,
      { operation, ...(path !== undefined && { path }) },
      undefined,
      cause
    );
  }

  static sessionClosed(path: string): MarshalError {
    return new MarshalError(
      `Session for ${path} is closed`,
      MarshalErrorCode.SESSION_CLOSED,
      { path },
      'Open a new session; closed sessions cannot be reused'
    );
  }

  static sessionFailed(path: string, cause?: unknown): MarshalError {
    return new MarshalError(
      `Session for ${path} failed earlier and can no longer write`,
      MarshalErrorCode.SESSION_FAILED,
      { path },
      'Close the session and discard the output file',
      cause
    );
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isMarshalError(error: unknown): error is MarshalError {
  return error instanceof MarshalError;
}

export function hasErrorCode(error: unknown, code: MarshalErrorCode): boolean {
  return error instanceof MarshalError && error.code === code;
}

/**
 * Convert whatever an engine threw into an ENGINE_IO_ERROR.
 * MarshalErrors pass through unchanged.
 */
export function wrapEngineError(error: unknown, operation: string, path?: string): MarshalError {
  if (error instanceof MarshalError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return MarshalError.engineIO(`Engine ${operation} failed: ${message}`, operation, error, path);
}

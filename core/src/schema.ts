/**
 * Schema descriptions: type strings, JSON and structural equality
 *
 * The type string grammar is the one columnar files use in their footers:
 *
 * ```
 * type     := scalar | 'decimal' [ '(' int ',' int ')' ] | ('varchar' | 'char') '(' int ')'
 *           | 'array' '<' type '>' | 'map' '<' type ',' type '>'
 *           | 'struct' '<' [ field (',' field)* ] '>' | 'uniontype' '<' type (',' type)* '>'
 * field    := name ':' type
 * name     := [A-Za-z0-9_]+ | '`' ( [^`] | '``' )* '`'
 * ```
 *
 * Whitespace between tokens is ignored.
 */

import { z } from 'zod';
import { MAX_DECIMAL_PRECISION } from './decimal.js';
import { MarshalError } from './errors.js';
import { type Category, type TypeSchema, createSchema, isCategory } from './types.js';

// =============================================================================
// Type strings
// =============================================================================

const PLAIN_NAME = /^[A-Za-z0-9_]+$/;

function quoteFieldName(name: string): string {
  return PLAIN_NAME.test(name) ? name : `\`${name.replace(/`/g, '``')}\``;
}

/**
 * Render a schema as a type string, e.g. `struct<symbol:string,close:double>`.
 */
export function schemaToString(schema: TypeSchema): string {
  switch (schema.category) {
    case 'decimal':
      return `decimal(${schema.precision},${schema.scale})`;
    case 'varchar':
    case 'char':
      return `${schema.category}(${schema.maxLength})`;
    case 'array':
    case 'map':
    case 'uniontype':
      return `${schema.category}<${schema.children.map(schemaToString).join(',')}>`;
    case 'struct': {
      const fields = schema.children.map(
        (child, i) => `${quoteFieldName(schema.fieldNames[i] ?? '')}:${schemaToString(child)}`
      );
      return `struct<${fields.join(',')}>`;
    }
    default:
      return schema.category;
  }
}

class SchemaParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): TypeSchema {
    const schema = this.parseType();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw this.fail(`Unexpected trailing input '${this.text.slice(this.pos)}'`);
    }
    return schema;
  }

  private parseType(): TypeSchema {
    this.skipWhitespace();
    const start = this.pos;
    const word = this.readWord().toLowerCase();
    if (word === '') {
      throw this.fail('Expected a type name');
    }
    if (!isCategory(word)) {
      this.pos = start;
      throw this.fail(`Unknown type '${word}'`);
    }
    return this.build(word, start);
  }

  private build(category: Category, start: number): TypeSchema {
    try {
      switch (category) {
        case 'decimal': {
          if (!this.peek('(')) {
            return createSchema('decimal');
          }
          this.expect('(');
          const precision = this.readInt();
          this.expect(',');
          const scale = this.readInt();
          this.expect(')');
          return createSchema('decimal', { precision, scale });
        }
        case 'varchar':
        case 'char': {
          this.expect('(');
          const maxLength = this.readInt();
          this.expect(')');
          return createSchema(category, { maxLength });
        }
        case 'array': {
          this.expect('<');
          const element = this.parseType();
          this.expect('>');
          return createSchema('array', { children: [element] });
        }
        case 'map': {
          this.expect('<');
          const key = this.parseType();
          this.expect(',');
          const value = this.parseType();
          this.expect('>');
          return createSchema('map', { children: [key, value] });
        }
        case 'uniontype': {
          this.expect('<');
          const variants = [this.parseType()];
          while (this.peek(',')) {
            this.expect(',');
            variants.push(this.parseType());
          }
          this.expect('>');
          return createSchema('uniontype', { children: variants });
        }
        case 'struct': {
          this.expect('<');
          const fieldNames: string[] = [];
          const children: TypeSchema[] = [];
          if (!this.peek('>')) {
            do {
              if (fieldNames.length > 0) this.expect(',');
              fieldNames.push(this.readFieldName());
              this.expect(':');
              children.push(this.parseType());
            } while (this.peek(','));
          }
          this.expect('>');
          return createSchema('struct', { fieldNames, children });
        }
        default:
          return createSchema(category);
      }
    } catch (error) {
      if (error instanceof RangeError) {
        throw MarshalError.schemaParse(`Invalid ${category} at offset ${start}: ${error.message}`, {
          offset: start,
        });
      }
      throw error;
    }
  }

  private readFieldName(): string {
    this.skipWhitespace();
    if (this.text[this.pos] !== '`') {
      const name = this.readWord();
      if (name === '') {
        throw this.fail('Expected a field name');
      }
      return name;
    }
    const open = this.pos;
    this.pos++;
    let name = '';
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '`') {
        if (this.text[this.pos + 1] === '`') {
          name += '`';
          this.pos += 2;
          continue;
        }
        this.pos++;
        return name;
      }
      name += ch;
      this.pos++;
    }
    this.pos = open;
    throw this.fail('Unterminated quoted field name');
  }

  private readWord(): string {
    const start = this.pos;
    while (this.pos < this.text.length && /[A-Za-z0-9_]/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
    return this.text.slice(start, this.pos);
  }

  private readInt(): number {
    this.skipWhitespace();
    const start = this.pos;
    while (this.pos < this.text.length && /[0-9]/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
    if (start === this.pos) {
      throw this.fail('Expected an integer');
    }
    return Number(this.text.slice(start, this.pos));
  }

  private peek(token: string): boolean {
    this.skipWhitespace();
    return this.text.startsWith(token, this.pos);
  }

  private expect(token: string): void {
    if (!this.peek(token)) {
      const found = this.pos < this.text.length ? `'${this.text.charAt(this.pos)}'` : 'end of input';
      throw this.fail(`Expected '${token}' but found ${found}`);
    }
    this.pos += token.length;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }

  private fail(message: string): MarshalError {
    return MarshalError.schemaParse(`${message} at offset ${this.pos}`, { offset: this.pos });
  }
}

/**
 * Parse a type string.
 *
 * @throws MarshalError SCHEMA_PARSE_ERROR with `details.offset` on malformed input
 */
export function parseSchema(text: string): TypeSchema {
  return new SchemaParser(text).parse();
}

// =============================================================================
// JSON form
// =============================================================================

const SCALAR_CATEGORIES = [
  'boolean',
  'tinyint',
  'smallint',
  'int',
  'bigint',
  'float',
  'double',
  'string',
  'binary',
  'timestamp',
  'date',
] as const;

export type SchemaJson =
  | { category: (typeof SCALAR_CATEGORIES)[number] }
  | { category: 'varchar' | 'char'; maxLength: number }
  | { category: 'decimal'; precision: number; scale: number }
  | { category: 'array'; element: SchemaJson }
  | { category: 'map'; key: SchemaJson; value: SchemaJson }
  | { category: 'struct'; fields: { name: string; type: SchemaJson }[] }
  | { category: 'uniontype'; variants: SchemaJson[] };

export const SchemaJsonSchema: z.ZodType<SchemaJson> = z.lazy(() =>
  z.discriminatedUnion('category', [
    z.object({ category: z.enum(SCALAR_CATEGORIES) }),
    z.object({
      category: z.enum(['varchar', 'char']),
      maxLength: z.number().int().positive(),
    }),
    z.object({
      category: z.literal('decimal'),
      precision: z.number().int().min(1).max(MAX_DECIMAL_PRECISION),
      scale: z.number().int().min(0),
    }),
    z.object({ category: z.literal('array'), element: SchemaJsonSchema }),
    z.object({ category: z.literal('map'), key: SchemaJsonSchema, value: SchemaJsonSchema }),
    z.object({
      category: z.literal('struct'),
      fields: z.array(z.object({ name: z.string(), type: SchemaJsonSchema })),
    }),
    z.object({ category: z.literal('uniontype'), variants: z.array(SchemaJsonSchema).min(1) }),
  ])
);

export function schemaToJson(schema: TypeSchema): SchemaJson {
  switch (schema.category) {
    case 'varchar':
    case 'char':
      return { category: schema.category, maxLength: schema.maxLength ?? 0 };
    case 'decimal':
      return { category: 'decimal', precision: schema.precision ?? 0, scale: schema.scale ?? 0 };
    case 'array':
      return { category: 'array', element: schemaToJson(childAt(schema, 0)) };
    case 'map':
      return { category: 'map', key: schemaToJson(childAt(schema, 0)), value: schemaToJson(childAt(schema, 1)) };
    case 'struct':
      return {
        category: 'struct',
        fields: schema.children.map((child, i) => ({
          name: schema.fieldNames[i] ?? '',
          type: schemaToJson(child),
        })),
      };
    case 'uniontype':
      return { category: 'uniontype', variants: schema.children.map(schemaToJson) };
    default:
      return { category: schema.category };
  }
}

function childAt(schema: TypeSchema, index: number): TypeSchema {
  const child = schema.children[index];
  if (child === undefined) {
    throw MarshalError.schemaMismatch(`${schema.category} schema has no child ${index}`);
  }
  return child;
}

function fromValidJson(json: SchemaJson): TypeSchema {
  switch (json.category) {
    case 'varchar':
    case 'char':
      return createSchema(json.category, { maxLength: json.maxLength });
    case 'decimal':
      return createSchema('decimal', { precision: json.precision, scale: json.scale });
    case 'array':
      return createSchema('array', { children: [fromValidJson(json.element)] });
    case 'map':
      return createSchema('map', { children: [fromValidJson(json.key), fromValidJson(json.value)] });
    case 'struct':
      return createSchema('struct', {
        fieldNames: json.fields.map((f) => f.name),
        children: json.fields.map((f) => fromValidJson(f.type)),
      });
    case 'uniontype':
      return createSchema('uniontype', { children: json.variants.map(fromValidJson) });
    default:
      return createSchema(json.category);
  }
}

/**
 * Build a schema from its JSON form.
 *
 * @throws MarshalError SCHEMA_PARSE_ERROR naming the offending paths
 */
export function schemaFromJson(json: unknown): TypeSchema {
  const parsed = SchemaJsonSchema.safeParse(json);
  if (!parsed.success) {
    const paths = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw MarshalError.schemaParse(`Invalid schema JSON at ${[...new Set(paths)].join(', ')}`, {
      issues: parsed.error.issues.length,
    });
  }
  try {
    return fromValidJson(parsed.data);
  } catch (error) {
    if (error instanceof RangeError) {
      throw MarshalError.schemaParse(`Invalid schema JSON: ${error.message}`);
    }
    throw error;
  }
}

// =============================================================================
// Equality
// =============================================================================

export function schemasEqual(a: TypeSchema, b: TypeSchema): boolean {
  if (a === b) return true;
  if (
    a.category !== b.category ||
    a.maxLength !== b.maxLength ||
    a.precision !== b.precision ||
    a.scale !== b.scale ||
    a.children.length !== b.children.length ||
    a.fieldNames.length !== b.fieldNames.length
  ) {
    return false;
  }
  for (let i = 0; i < a.fieldNames.length; i++) {
    if (a.fieldNames[i] !== b.fieldNames[i]) return false;
  }
  for (let i = 0; i < a.children.length; i++) {
    const left = a.children[i];
    const right = b.children[i];
    if (left === undefined || right === undefined || !schemasEqual(left, right)) return false;
  }
  return true;
}

import { z, ZodError, ZodTypeAny } from 'zod';
import { ErrorCode } from '../types/error.types';
import { Result, fail, succeed } from '../types/result.types';
import { logger } from '../config/logger';

/**
 * Shared pieces of the one-record-per-line text format
 */

export const FIELD_DELIMITER = ',';
export const LIST_DELIMITER = ';';
export const PAIR_DELIMITER = ':';

// Turns a whole collection into file text
export type RecordEncoder<T> = (records: readonly T[]) => string;

export type RecordDecoder<T> = (line: string) => Result<T>;

export interface SkippedRecord {
  lineNumber: number;
  line: string;
  reason: string;
}

export interface DecodedCollection<T> {
  records: T[];
  skipped: SkippedRecord[];
}

// Free text that would split a record or a line
const RECORD_BREAKING = /[,\r\n]/;

export function breaksRecord(text: string): boolean {
  return RECORD_BREAKING.test(text);
}

// Beyond 2^53 ids stop being distinct, so such values are rejected
const integer = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform((value) => Number(value))
  .pipe(z.number().refine(Number.isSafeInteger, 'must be a safe integer'));

export const idField = integer.pipe(z.number().positive('must be positive'));
export const countField = integer.pipe(z.number().nonnegative('must not be negative'));
export const codeField = integer;
export const textField = z.string();
export const optionalTextField = z.string().default('');

/**
 * Split a line into at most `maxFields` fields; the last field keeps any
 * remaining delimiters.
 */
export function splitFields(line: string, maxFields: number): string[] {
  const parts = line.split(FIELD_DELIMITER);
  if (parts.length <= maxFields) return parts;
  return [...parts.slice(0, maxFields - 1), parts.slice(maxFields - 1).join(FIELD_DELIMITER)];
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
    .join('; ');
}

/**
 * Map a line onto named fields and validate them against a schema.
 *
 * Missing trailing fields arrive as undefined, so a schema field with a
 * default is optional and one without is required.
 */
export function parseFields<S extends ZodTypeAny>(
  schema: S,
  names: readonly string[],
  line: string
): Result<z.output<S>> {
  const values = splitFields(line, names.length);
  const raw: Record<string, string | undefined> = {};
  names.forEach((name, index) => {
    raw[name] = values[index];
  });

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return fail(ErrorCode.MALFORMED_RECORD, describeIssues(parsed.error));
  }
  return succeed(parsed.data);
}

/**
 * Decode `3;7;12`. Unparsable entries are logged and skipped, duplicates
 * collapse.
 */
export function decodeIdList(text: string, context: string): number[] {
  const ids = new Set<number>();
  for (const entry of text.split(LIST_DELIMITER)) {
    if (entry.trim() === '') continue;
    const parsed = idField.safeParse(entry);
    if (parsed.success) {
      ids.add(parsed.data);
    } else {
      logger.warn('Skipping malformed id entry', { context, entry });
    }
  }
  return [...ids];
}

export function encodeIdList(ids: Iterable<number>): string {
  return [...ids].join(LIST_DELIMITER);
}

/**
 * Decode `2:5;9:1` into an item id -> quantity map. Malformed pairs and
 * non-positive quantities are logged and skipped; a repeated id keeps the
 * last value.
 */
export function decodeQuantityMap(text: string, context: string): Map<number, number> {
  const quantities = new Map<number, number>();
  for (const entry of text.split(LIST_DELIMITER)) {
    if (entry.trim() === '') continue;

    const separator = entry.indexOf(PAIR_DELIMITER);
    if (separator < 0) {
      logger.warn('Skipping malformed allocation entry', { context, entry });
      continue;
    }

    const key = idField.safeParse(entry.slice(0, separator));
    const value = integer.safeParse(entry.slice(separator + 1));
    if (!key.success || !value.success) {
      logger.warn('Skipping malformed allocation entry', { context, entry });
      continue;
    }
    if (value.data <= 0) {
      logger.warn('Skipping non-positive allocation entry', { context, entry });
      continue;
    }
    quantities.set(key.data, value.data);
  }
  return quantities;
}

export function encodeQuantityMap(quantities: ReadonlyMap<number, number>): string {
  return [...quantities]
    .filter(([, quantity]) => quantity > 0)
    .map(([itemId, quantity]) => `${itemId}${PAIR_DELIMITER}${quantity}`)
    .join(LIST_DELIMITER);
}

export function encodeFields(fields: ReadonlyArray<string | number>): string {
  return fields.join(FIELD_DELIMITER);
}

/**
 * Build a collection encoder from a single-record encoder
 */
export function lineEncoder<T>(encodeRecord: (record: T) => string): RecordEncoder<T> {
  return (records) => records.map((record) => `${encodeRecord(record)}\n`).join('');
}

/**
 * Decode every non-blank line, skipping the ones that fail
 */
export function decodeLines<T>(
  text: string,
  decodeRecord: RecordDecoder<T>,
  collection: string
): DecodedCollection<T> {
  const result: DecodedCollection<T> = { records: [], skipped: [] };

  text.split('\n').forEach((rawLine, index) => {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.trim() === '') return;

    const decoded = decodeRecord(line);
    if (decoded.ok) {
      result.records.push(decoded.value);
      return;
    }

    const skipped = { lineNumber: index + 1, line, reason: decoded.message };
    logger.warn('Skipping malformed record', { collection, ...skipped });
    result.skipped.push(skipped);
  });

  return result;
}

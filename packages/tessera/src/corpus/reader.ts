import * as fs from 'node:fs';
import * as path from 'node:path';
import { createHash } from 'node:crypto';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { CorpusRecord } from '../types.js';
import { CorpusFormatError, errorMessage } from '../errors.js';

const cell = z.union([z.string(), z.number()]).transform(v => String(v).trim());

const rowSchema = z.object({
  token: cell.optional(),
  word: cell.optional(),
  folio: cell.pipe(z.string().min(1, 'folio is empty')),
  line: cell.optional(),
  line_number: cell.optional(),
  section: cell.pipe(z.string().min(1, 'section is empty')),
  regime: cell.optional(),
}).transform((row, ctx): CorpusRecord => {
  const token = row.token ?? row.word;
  const line = row.line ?? row.line_number;
  if (token === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing token (or word) column' });
    return z.NEVER;
  }
  if (line === undefined || line === '') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing line (or line_number) value' });
    return z.NEVER;
  }
  return {
    token,
    folio: row.folio,
    line,
    section: row.section,
    regime: row.regime || 'UNKNOWN',
  };
});

export interface Corpus {
  records: CorpusRecord[];
  version: string;
  path: string;
}

export interface ReadOptions {
  format: 'auto' | 'csv' | 'json';
  delimiter: string;
}

/**
 * Read the flat token table. The version is a content hash, so an
 * unchanged file always yields the same version.
 */
export function readCorpus(filePath: string, options: ReadOptions): Corpus {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (err) {
    throw new CorpusFormatError(`Cannot read corpus ${filePath}: ${errorMessage(err)}`);
  }
  const text = bytes.toString('utf-8');
  const format = options.format === 'auto'
    ? (path.extname(filePath).toLowerCase() === '.json' ? 'json' : 'csv')
    : options.format;

  const rows = format === 'json' ? parseJsonRows(text) : parseCsvRows(text, options.delimiter);
  return {
    records: validateRows(rows),
    version: corpusVersion(bytes),
    path: filePath,
  };
}

export function corpusVersion(bytes: Buffer | string): string {
  return createHash('sha256').update(bytes).digest('hex').slice(0, 16);
}

export function parseCsvRows(text: string, delimiter = ','): unknown[] {
  try {
    const rows: unknown = parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      delimiter,
    });
    if (!Array.isArray(rows)) throw new CorpusFormatError('CSV did not produce rows');
    return rows;
  } catch (err) {
    if (err instanceof CorpusFormatError) throw err;
    throw new CorpusFormatError(`Malformed CSV: ${errorMessage(err)}`);
  }
}

export function parseJsonRows(text: string): unknown[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new CorpusFormatError(`Malformed JSON: ${errorMessage(err)}`);
  }
  if (!Array.isArray(data)) {
    throw new CorpusFormatError('JSON corpus must be an array of token records');
  }
  return data;
}

/** Validate every row; the first invalid row aborts with its 1-based number. */
export function validateRows(rows: readonly unknown[]): CorpusRecord[] {
  if (rows.length === 0) throw new CorpusFormatError('Corpus has no rows');
  return rows.map((row, i) => {
    const result = rowSchema.safeParse(row);
    if (!result.success) {
      throw new CorpusFormatError(
        result.error.issues.map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message).join('; '),
        i + 1,
      );
    }
    return result.data;
  });
}

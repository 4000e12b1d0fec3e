/**
 * CSV Utilities for bank statement uploads
 *
 * Streams an uploaded statement through csv-parser and turns each row into
 * an import item. Rows are validated with the same schema as JSON imports.
 *
 * Columns (header names are case-insensitive):
 * - posted_at (required): YYYY-MM-DD, ISO-8601 or MM/DD/YYYY
 * - amount (required): "1234.56", "$1,234.56"
 * - currency, external_id, description (optional)
 */

import { Readable } from 'stream';
import csvParser from 'csv-parser';
import { importTransactionItemSchema, type ImportTransactionItem } from '../schemas';

// ============================================
// Types
// ============================================

/**
 * Raw CSV row from a bank statement, keyed by lower-cased header
 */
export interface BankStatementCsvRow {
  posted_at?: string;
  amount?: string;
  currency?: string;
  external_id?: string;
  description?: string;
}

export interface RowError {
  rowNumber: number;
  error: string;
}

/**
 * Result of parsing a single row
 */
export type RowParseResult =
  | { success: true; data: ImportTransactionItem; rowNumber: number }
  | { success: false; error: string; rowNumber: number };

export interface ParsedStatement {
  items: ImportTransactionItem[];
  errors: RowError[];
  total: number;
}

export interface CsvParseOptions {
  /** Currency for rows without a currency column value */
  defaultCurrency?: string;
}

/**
 * Required columns in the CSV file
 */
const REQUIRED_COLUMNS = ['posted_at', 'amount'] as const;

// ============================================
// Validation Functions
// ============================================

/**
 * Validates that all required columns are present in the CSV headers
 */
export function validateCsvHeaders(headers: string[]): { valid: boolean; missing: string[] } {
  const normalizedHeaders = headers.map((h) => h.toLowerCase().trim());
  const missing = REQUIRED_COLUMNS.filter((col) => !normalizedHeaders.includes(col));

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Normalizes a statement date to an ISO-8601 string.
 * US-style MM/DD/YYYY is read as a UTC calendar date.
 *
 * @returns null when the value is empty or unreadable
 */
export function parsePostedAt(value: string | undefined): string | null {
  if (!value || value.trim() === '') {
    return null;
  }

  const trimmed = value.trim();

  const usMatch = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (usMatch) {
    const [, month, day, year] = usMatch;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    return Number.isNaN(date.getTime()) ? null : date.toISOString();
  }

  const date = new Date(trimmed);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Strips currency symbols, thousands separators and whitespace.
 * The decimal digits are kept as written so precision checks still apply.
 *
 * @example
 * cleanAmount('$1,234.50') // "1234.50"
 */
export function cleanAmount(value: string | undefined): string {
  return (value ?? '').replace(/[$€£,\s]/g, '');
}

/**
 * Parses and validates a single CSV row
 */
export function parseRow(
  row: BankStatementCsvRow,
  rowNumber: number,
  { defaultCurrency }: CsvParseOptions = {}
): RowParseResult {
  const postedAt = parsePostedAt(row.posted_at);
  if (!postedAt) {
    return { success: false, error: `Invalid posted_at: "${row.posted_at ?? ''}"`, rowNumber };
  }

  const parsed = importTransactionItemSchema.safeParse({
    posted_at: postedAt,
    amount: cleanAmount(row.amount),
    currency: row.currency?.trim() || defaultCurrency,
    external_id: row.external_id,
    description: row.description,
  });

  if (!parsed.success) {
    const error = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    return { success: false, error, rowNumber };
  }

  return { success: true, data: parsed.data, rowNumber };
}

// ============================================
// Streaming CSV Parser
// ============================================

/**
 * Parses a whole statement held in memory.
 *
 * Rejects when a required column is missing; row-level problems are
 * collected in `errors` with 1-based data row numbers.
 */
export function parseBankStatement(
  content: Buffer | string,
  options: CsvParseOptions = {}
): Promise<ParsedStatement> {
  return new Promise((resolve, reject) => {
    const items: ImportTransactionItem[] = [];
    const errors: RowError[] = [];
    let rowNumber = 0;
    let headerError: Error | null = null;

    const stream = Readable.from([content]).pipe(
      csvParser({
        mapHeaders: ({ header }) => header.toLowerCase().trim(),
      })
    );

    stream.on('headers', (headers: string[]) => {
      const validation = validateCsvHeaders(headers);
      if (!validation.valid) {
        headerError = new Error(`Missing required columns: ${validation.missing.join(', ')}`);
        stream.destroy();
        reject(headerError);
      }
    });

    stream.on('data', (row: BankStatementCsvRow) => {
      if (headerError) return;

      rowNumber++;
      const result = parseRow(row, rowNumber, options);

      if (result.success) {
        items.push(result.data);
      } else {
        errors.push({ rowNumber: result.rowNumber, error: result.error });
      }
    });

    stream.on('error', (error: Error) => {
      reject(error);
    });

    stream.on('end', () => {
      resolve({ items, errors, total: rowNumber });
    });
  });
}

export default {
  parseBankStatement,
  parseRow,
  parsePostedAt,
  cleanAmount,
  validateCsvHeaders,
};

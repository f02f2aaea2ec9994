import Encoding from 'encoding-japanese';
import { isValidDateString } from '../domain/computations';
import { dataParsingError, fileAccessError, invalidFileFormat } from '../domain/errors';
import type { BudgetEntry, BudgetRow } from '../domain/types';

export const MAX_IMPORT_BYTES = 10 * 1024 * 1024;
export const MAX_IMPORT_ROWS = 10000;

export interface ImportResult<T> {
  data: T[];
  categories: string[];
  /** Imported categories that are not budgeted yet */
  newCategories: string[];
  /** Imported categories that already exist */
  existingCategories: string[];
  totalAmount: number;
  warnings: string[];
}

type CsvRecord = Record<string, string>;

/**
 * Decode file bytes to string, trying UTF-8 first, then Shift_JIS/CP932
 */
export function decodeFileContent(buffer: ArrayBuffer | Uint8Array): string {
  const uint8Array = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);

  if (uint8Array.byteLength > MAX_IMPORT_BYTES) {
    throw fileAccessError('File size exceeds maximum allowed limit');
  }

  try {
    const decoder = new TextDecoder('utf-8', { fatal: true });
    return decoder.decode(uint8Array);
  } catch {
    // Not UTF-8; spreadsheet exports on Japanese Windows are Shift_JIS
  }

  const detected = Encoding.detect(uint8Array);
  const unicodeArray = Encoding.convert(uint8Array, {
    to: 'UNICODE',
    from: detected === 'UTF8' ? 'UTF8' : 'SJIS',
  });
  return Encoding.codeToString(unicodeArray);
}

/**
 * Parse CSV text into rows (handles quoted fields)
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  for (const line of lines) {
    if (line.trim() === '') continue;

    const row: string[] = [];
    let current = '';
    let inQuotes = false;

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (char === '"') {
        if (inQuotes && line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = !inQuotes;
        }
      } else if (char === ',' && !inQuotes) {
        row.push(current.trim());
        current = '';
      } else {
        current += char;
      }
    }
    row.push(current.trim());
    rows.push(row);
  }

  return rows;
}

/**
 * Split text into a lowercase header and keyed records.
 * Short rows are padded with empty fields, long rows truncated.
 */
function toRecords(text: string, required: string[]): CsvRecord[] {
  const rows = parseCsvRows(text);
  if (rows.length === 0) {
    throw invalidFileFormat('File is empty or contains no data');
  }
  if (rows.length > MAX_IMPORT_ROWS) {
    throw dataParsingError(`File contains too many rows (max: ${MAX_IMPORT_ROWS})`);
  }

  const header = rows[0].map((col) => col.toLowerCase());
  if (new Set(header).size !== header.length) {
    throw invalidFileFormat('Duplicate column headers found');
  }
  const missing = required.filter((name) => !header.includes(name));
  if (missing.length > 0) {
    throw invalidFileFormat(`Missing required fields: ${missing.join(', ')}`);
  }

  return rows.slice(1).map((row) =>
    Object.fromEntries(header.map((name, idx) => [name, row[idx] ?? ''])),
  );
}

function parseAmount(raw: string): number {
  const amount = raw === '' ? NaN : Number(raw);
  if (!Number.isFinite(amount) || amount < 0) {
    throw new Error(`Invalid amount: ${raw || 'empty'}`);
  }
  return amount;
}

function parseCategory(raw: string): string {
  const category = raw.trim();
  if (!category) throw new Error('Category field is empty');
  return category;
}

function parsePurchaseRecord(record: CsvRecord): BudgetEntry {
  const date = record.date;
  if (!date) {
    throw new Error('Invalid date format: Date field is empty');
  }
  if (!isValidDateString(date)) {
    throw new Error(`Invalid date format: Expected format: yyyy-MM-dd, got: ${date}`);
  }
  return {
    date,
    amount: parseAmount(record.amount),
    category: parseCategory(record.category),
    note: record.note ?? '',
  };
}

function parseBudgetRecord(record: CsvRecord): BudgetRow {
  const year = Number(record.year);
  if (!record.year || !Number.isInteger(year) || year < 1900 || year > 9999) {
    throw new Error(`Invalid year: ${record.year || 'empty'}`);
  }
  const month = Number(record.month);
  if (!record.month || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new Error(`Invalid month: ${record.month || 'empty'}`);
  }
  return {
    year,
    month,
    category: parseCategory(record.category),
    amount: parseAmount(record.amount),
    isHistorical: (record.ishistorical ?? '').toLowerCase() === 'true',
  };
}

function collect<T extends { category: string; amount: number }>(
  records: CsvRecord[],
  parseRow: (record: CsvRecord) => T,
  existingCategories: Iterable<string>,
  kind: string,
): ImportResult<T> {
  const data: T[] = [];
  const warnings: string[] = [];

  records.forEach((record, index) => {
    try {
      data.push(parseRow(record));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      // +2: one for the header row, one for 1-based numbering
      warnings.push(`Row ${index + 2}: ${message}`);
    }
  });

  if (data.length === 0) {
    throw dataParsingError(`No valid ${kind} data found`);
  }

  const existing = new Set(existingCategories);
  const categories = Array.from(new Set(data.map((row) => row.category))).sort();

  return {
    data,
    categories,
    newCategories: categories.filter((c) => !existing.has(c)),
    existingCategories: categories.filter((c) => existing.has(c)),
    totalAmount: data.reduce((sum, row) => sum + row.amount, 0),
    warnings,
  };
}

/**
 * Parse a purchase CSV (Date,Amount,Category[,Note])
 */
export function parsePurchasesCsv(text: string, existingCategories: Iterable<string> = []): ImportResult<BudgetEntry> {
  const records = toRecords(text, ['date', 'amount', 'category']);
  return collect(records, parsePurchaseRecord, existingCategories, 'purchase');
}

/**
 * Parse a budget CSV (Year,Month,Category,Amount[,IsHistorical])
 */
export function parseBudgetsCsv(text: string, existingCategories: Iterable<string> = []): ImportResult<BudgetRow> {
  const records = toRecords(text, ['year', 'month', 'category', 'amount']);
  return collect(records, parseBudgetRecord, existingCategories, 'budget');
}

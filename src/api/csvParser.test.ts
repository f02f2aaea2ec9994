import { describe, expect, it } from 'vitest';
import { CsvError } from '../domain/errors';
import {
  MAX_IMPORT_BYTES,
  MAX_IMPORT_ROWS,
  decodeFileContent,
  parseBudgetsCsv,
  parseCsvRows,
  parsePurchasesCsv,
} from './csvParser';

describe('parseCsvRows', () => {
  it('handles quoted fields, escaped quotes and blank lines', () => {
    const text = 'a,"b,c",d\r\n\n"say ""hi""", x ';
    expect(parseCsvRows(text)).toEqual([
      ['a', 'b,c', 'd'],
      ['say "hi"', 'x'],
    ]);
  });

  it('drops a leading byte order mark', () => {
    expect(parseCsvRows('\uFEFFDate,Amount')).toEqual([['Date', 'Amount']]);
  });
});

describe('parsePurchasesCsv', () => {
  it('keeps valid rows and turns bad ones into numbered warnings', () => {
    const text = [
      'Date,Amount,Category,Note',
      '2024-06-01,12.50,Food,Lunch',
      '2024-06-02,abc,Food,',
      '2024-13-01,5,Fuel,',
      '2024-06-03,40,Fuel,',
      '2024-06-04,-3,Fuel,',
      '2024-06-05,7,,',
    ].join('\n');

    const result = parsePurchasesCsv(text, ['Food', 'Rent']);

    expect(result.data).toEqual([
      { date: '2024-06-01', amount: 12.5, category: 'Food', note: 'Lunch' },
      { date: '2024-06-03', amount: 40, category: 'Fuel', note: '' },
    ]);
    expect(result.warnings).toEqual([
      'Row 3: Invalid amount: abc',
      'Row 4: Invalid date format: Expected format: yyyy-MM-dd, got: 2024-13-01',
      'Row 6: Invalid amount: -3',
      'Row 7: Category field is empty',
    ]);
    expect(result.categories).toEqual(['Food', 'Fuel']);
    expect(result.newCategories).toEqual(['Fuel']);
    expect(result.existingCategories).toEqual(['Food']);
    expect(result.totalAmount).toBe(52.5);
  });

  it('matches headers case-insensitively and treats Note as optional', () => {
    const result = parsePurchasesCsv('DATE,AMOUNT,CATEGORY\n2024-01-31,9.99,Books');
    expect(result.data).toEqual([{ date: '2024-01-31', amount: 9.99, category: 'Books', note: '' }]);
  });

  it('rejects an empty file', () => {
    expect(() => parsePurchasesCsv('')).toThrow('Invalid CSV format: File is empty or contains no data');
  });

  it('names the missing columns', () => {
    expect(() => parsePurchasesCsv('Date,Note\n2024-01-01,x')).toThrow(
      'Invalid CSV format: Missing required fields: amount, category',
    );
  });

  it('rejects duplicate headers', () => {
    expect(() => parsePurchasesCsv('Date,date,Amount,Category')).toThrow(
      'Invalid CSV format: Duplicate column headers found',
    );
  });

  it('fails when no row survives', () => {
    let caught: unknown;
    try {
      parsePurchasesCsv('Date,Amount,Category\nnot-a-date,1,Food');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CsvError);
    expect(caught).toMatchObject({
      code: 'dataParsingError',
      kind: 'dataParsing',
      message: 'Failed to parse CSV: No valid purchase data found',
    });
  });

  it('refuses files with too many rows', () => {
    const lines = ['Date,Amount,Category'];
    for (let i = 0; i < MAX_IMPORT_ROWS; i++) lines.push('2024-01-01,1,Food');
    expect(() => parsePurchasesCsv(lines.join('\n'))).toThrow(
      `Failed to parse CSV: File contains too many rows (max: ${MAX_IMPORT_ROWS})`,
    );
  });
});

describe('parseBudgetsCsv', () => {
  it('parses budget rows and validates year and month', () => {
    const text = [
      'Year,Month,Category,Amount,IsHistorical',
      '2024,1,Rent,1000,TRUE',
      '2024,13,Rent,5,false',
      '1800,1,Rent,5,false',
      '2024,2,Rent,1000,',
    ].join('\n');

    const result = parseBudgetsCsv(text, ['Rent']);

    expect(result.data).toEqual([
      { year: 2024, month: 1, category: 'Rent', amount: 1000, isHistorical: true },
      { year: 2024, month: 2, category: 'Rent', amount: 1000, isHistorical: false },
    ]);
    expect(result.warnings).toEqual(['Row 3: Invalid month: 13', 'Row 4: Invalid year: 1800']);
    expect(result.newCategories).toEqual([]);
    expect(result.totalAmount).toBe(2000);
  });

  it('needs the budget columns', () => {
    expect(() => parseBudgetsCsv('Date,Amount,Category\n2024-01-01,1,Food')).toThrow(
      'Invalid CSV format: Missing required fields: year, month',
    );
  });
});

describe('decodeFileContent', () => {
  it('decodes UTF-8 bytes', () => {
    const bytes = new TextEncoder().encode('Date,Amount,Category\n2024-01-01,5,Café');
    expect(decodeFileContent(bytes)).toBe('Date,Amount,Category\n2024-01-01,5,Café');
  });

  it('falls back to Shift_JIS when the bytes are not UTF-8', () => {
    // 0xB1 is half-width katakana "ｱ" in Shift_JIS and a stray continuation byte in UTF-8
    expect(decodeFileContent(new Uint8Array([0x41, 0x2c, 0xb1]))).toBe('A,ｱ');
  });

  it('rejects oversized files', () => {
    expect(() => decodeFileContent(new Uint8Array(MAX_IMPORT_BYTES + 1))).toThrow(
      'Failed to read file: File size exceeds maximum allowed limit',
    );
  });
});

/**
 * Error taxonomy shared by the store, the session and the CSV layer.
 */

export type AppErrorKind =
  | 'validation'
  | 'dataLoad'
  | 'dataWrite'
  | 'fileAccess'
  | 'dataParsing'
  | 'generic';

export class AppError extends Error {
  readonly kind: AppErrorKind;

  constructor(kind: AppErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    this.kind = kind;
  }
}

/** Classification of CSV import/export failures */
export type CsvErrorCode = 'invalidFileFormat' | 'dataParsingError' | 'fileAccessError';

export class CsvError extends AppError {
  readonly code: CsvErrorCode;

  constructor(code: CsvErrorCode, message: string) {
    super(code === 'fileAccessError' ? 'fileAccess' : 'dataParsing', message);
    this.name = 'CsvError';
    this.code = code;
  }
}

export const validationError = (message: string): AppError =>
  new AppError('validation', message);

export const dataLoadError = (cause: unknown, subject = 'budgets'): AppError =>
  new AppError('dataLoad', `Failed to load ${subject}: ${messageOf(cause)}`, cause);

export const dataWriteError = (cause: unknown, subject = 'budgets'): AppError =>
  new AppError('dataWrite', `Failed to save ${subject}: ${messageOf(cause)}`, cause);

export const invalidFileFormat = (details: string): CsvError =>
  new CsvError('invalidFileFormat', `Invalid CSV format: ${details}`);

export const dataParsingError = (details: string): CsvError =>
  new CsvError('dataParsingError', `Failed to parse CSV: ${details}`);

export const fileAccessError = (details: string): CsvError =>
  new CsvError('fileAccessError', `Failed to read file: ${details}`);

export function messageOf(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

/** Wrap anything thrown into an AppError, keeping AppErrors as they are */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  return new AppError('generic', messageOf(error), error);
}

export type LeadErrorCode =
  | 'UNSUPPORTED_FILE_TYPE'
  | 'READ_ERROR'
  | 'PARSE_ERROR'
  | 'NO_IDENTITY_COLUMNS'
  | 'INCOMPATIBLE_KEYS'
  | 'MISSING_COLUMN';

export class LeadError extends Error {
  code: LeadErrorCode;
  file?: string;
  context?: Record<string, unknown>;

  constructor(code: LeadErrorCode, message: string, file?: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'LeadError';
    this.code = code;
    this.file = file;
    this.context = context;
  }
}

export function isLeadError(err: unknown): err is LeadError {
  return err instanceof LeadError;
}

export function inFile(file?: string): string {
  return file ? ` in ${file}` : '';
}

export type WidthErrorCode =
  | 'INVALID_RANGE'
  | 'INVALID_CODEPOINT'
  | 'INVALID_WIDTH'
  | 'INVALID_PAD_CHAR'
  | 'UNKNOWN_VERSION'
  | 'INVALID_TABLE_DATA'
  | 'INVALID_CONFIG';

/**
 * Raised for contract violations. Recoverable conditions are reported as warnings instead.
 */
export class WidthError extends Error {
  readonly code: WidthErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: WidthErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'WidthError';
    this.code = code;
    if (details) this.details = details;
  }
}

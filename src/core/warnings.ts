import type { WarningCode, WarningHandler, WidthWarning } from '../types.js';
import { warn } from '../utils/terminal.js';

export function defaultWarningHandler(warning: WidthWarning): void {
  warn(`${warning.message} [${warning.code}]`);
}

export function emitWarning(
  handler: WarningHandler | undefined,
  code: WarningCode,
  message: string,
  details?: Record<string, unknown>,
): void {
  const warning: WidthWarning = { code, message, ...(details ? { details } : {}) };
  (handler ?? defaultWarningHandler)(warning);
}

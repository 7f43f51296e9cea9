import { applyEdits, modify, parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { WidthError } from '../core/errors.js';

function lineAndColumn(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, offset);
  const line = before.split('\n').length;
  return { line, column: offset - before.lastIndexOf('\n') };
}

/**
 * Parse JSONC (comments and trailing commas allowed). The first syntax error is reported
 * as `source:line:column` in an `INVALID_CONFIG` error.
 */
export function parseJsonc(text: string, source: string): unknown {
  const errors: ParseError[] = [];
  const value: unknown = parse(text, errors, { allowTrailingComma: true });

  const [first] = errors;
  if (first) {
    const { line, column } = lineAndColumn(text, first.offset);
    throw new WidthError(
      'INVALID_CONFIG',
      `Cannot parse ${source}:${line}:${column}: ${printParseErrorCode(first.error)}`,
      { source, line, column },
    );
  }
  return value;
}

/**
 * Set one top-level property in JSONC text, leaving comments and the other properties as written.
 */
export function withProperty(text: string, key: string, value: unknown): string {
  const edits = modify(text, [key], value, {
    formattingOptions: { insertSpaces: true, tabSize: 2, eol: '\n' },
  });
  const next = applyEdits(text, edits);
  return next.endsWith('\n') ? next : `${next}\n`;
}

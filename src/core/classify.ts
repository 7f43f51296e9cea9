import { MAX_CODEPOINT, OVERRIDE_WIDE } from '../consts/index.js';
import { TableKind } from '../consts/enums.js';
import type { CharWidth, RangeTableStore } from '../types.js';
import { WidthError } from './errors.js';
import { bisearch } from './range-search.js';

/**
 * Column width from the Unicode tables alone.
 * Returns -1 for C0/C1 control characters, which have no printable width.
 */
export function wcwidth(codepoint: number, version: string, store: RangeTableStore): -1 | 0 | 1 | 2 {
  if (store.alwaysZeroWidth.has(codepoint)) {
    return 0;
  }

  if (codepoint < 32 || (codepoint >= 0x7f && codepoint < 0xa0)) {
    return -1;
  }

  if (bisearch(codepoint, store.lookup(TableKind.ZeroWidth, version))) {
    return 0;
  }

  return bisearch(codepoint, store.lookup(TableKind.Wide, version)) ? 2 : 1;
}

/**
 * Display width of one codepoint under an already resolved version.
 * The override set wins over the tables; non-printing results are clamped to 0.
 */
export function charWidth(codepoint: number, version: string, store: RangeTableStore): CharWidth {
  if (OVERRIDE_WIDE.has(codepoint)) {
    return 2;
  }

  const width = wcwidth(codepoint, version, store);
  return width === -1 ? 0 : width;
}

export function assertCodepoint(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > MAX_CODEPOINT) {
    throw new WidthError('INVALID_CODEPOINT', `Invalid codepoint: ${value}`, { value });
  }
  return value;
}

/**
 * Accept either a codepoint or a string whose first character is measured.
 */
export function toCodepoint(value: number | string): number {
  if (typeof value === 'number') {
    return assertCodepoint(value);
  }
  const codepoint = value.codePointAt(0);
  if (codepoint === undefined) {
    throw new WidthError('INVALID_CODEPOINT', 'Cannot measure an empty character.');
  }
  return codepoint;
}

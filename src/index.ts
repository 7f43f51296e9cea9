import { stringWidth } from './core/aggregate.js';
import { charWidth, toCodepoint } from './core/classify.js';
import { createWidthContext } from './core/context.js';
import type { CharWidth, WidthInput, WidthOptions } from './types.js';

export { stringWidth, textCodepoints, toWidthSource } from './core/aggregate.js';
export { CellWidth } from './core/cell-width.js';
export { assertCodepoint, charWidth, wcwidth } from './core/classify.js';
export { createWidthContext, type WidthContext } from './core/context.js';
export { WidthError, type WidthErrorCode } from './core/errors.js';
export { fit, fitInContext, type FitLayout } from './core/fit.js';
export { bisearch } from './core/range-search.js';
export { createTableStore, loadDefaultTableStore } from './core/tables.js';
export { decodeAll, decodeOne } from './core/utf8.js';
export { listUnicodeVersions, resolveUnicodeVersion, type ResolveVersionOptions } from './core/version.js';
export { compareVersionTuples, parseVersionTuple } from './core/version-tuple.js';
export { defaultWarningHandler } from './core/warnings.js';
export { ByteEncoding, SourceKind, TableKind } from './consts/enums.js';
export { OVERRIDE_WIDE } from './consts/index.js';
export type * from './types.js';

/**
 * Display width of `text[start, end)`. See {@link stringWidth} for byte input.
 */
export function widthOfString(input: WidthInput, start?: number, end?: number, options: WidthOptions = {}): number {
  return stringWidth(input, { ...options, start, end });
}

/**
 * Display width of a single codepoint, or of the first character of a string.
 */
export function widthOfChar(value: number | string, options: WidthOptions = {}): CharWidth {
  const ctx = createWidthContext(options);
  return charWidth(toCodepoint(value), ctx.version, ctx.store);
}

import type { AlignSide, FitOptions } from '../types.js';
import { charWidth } from './classify.js';
import { createWidthContext, type WidthContext } from './context.js';
import { WidthError } from './errors.js';

export interface FitLayout {
  cutAlign?: AlignSide;
  padAlign?: AlignSide;
  padChar?: string;
}

function measureChars(chars: string[], ctx: WidthContext): number[] {
  return chars.map((char) => charWidth(char.codePointAt(0) ?? 0, ctx.version, ctx.store));
}

function padUnitWidth(padChar: string, ctx: WidthContext): number {
  const width = measureChars(Array.from(padChar), ctx).reduce((sum, value) => sum + value, 0);
  if (width === 0) {
    throw new WidthError('INVALID_PAD_CHAR', `Pad character ${JSON.stringify(padChar)} has no display width.`, {
      padChar,
    });
  }
  return width;
}

/**
 * Cut or pad `text` to `width` columns in one pass over its characters.
 *
 * Cutting keeps the longest prefix (`cutAlign: 'right'`) or suffix (`cutAlign: 'left'`) that
 * fits. When that lands short of `width`, or the text was narrower to begin with, copies of
 * `padChar` are added on `padAlign`. The result is exact whenever `padChar` is one column wide.
 */
export function fitInContext(text: string, width: number, layout: FitLayout, ctx: WidthContext): string {
  if (!Number.isInteger(width) || width < 0) {
    throw new WidthError('INVALID_WIDTH', `Target width must be a non-negative integer, got ${width}.`, { width });
  }
  const { cutAlign = 'left', padAlign = 'right', padChar = ' ' } = layout;

  const chars = Array.from(text);
  const widths = measureChars(chars, ctx);
  const total = widths.reduce((sum, value) => sum + value, 0);

  let result = text;
  let used = total;
  if (total > width) {
    used = 0;
    if (cutAlign === 'right') {
      let kept = 0;
      while (kept < chars.length && used + widths[kept] <= width) {
        used += widths[kept];
        kept += 1;
      }
      result = chars.slice(0, kept).join('');
    } else {
      let first = chars.length;
      while (first > 0 && used + widths[first - 1] <= width) {
        used += widths[first - 1];
        first -= 1;
      }
      result = chars.slice(first).join('');
    }
  }

  const deficit = width - used;
  if (deficit <= 0) {
    return result;
  }

  const padding = padChar.repeat(Math.ceil(deficit / padUnitWidth(padChar, ctx)));
  return padAlign === 'left' ? `${padding}${result}` : `${result}${padding}`;
}

export function fit(text: string, width: number, options: FitOptions = {}): string {
  return fitInContext(text, width, options, createWidthContext(options));
}

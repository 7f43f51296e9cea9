import { ByteEncoding, SourceKind } from '../consts/enums.js';
import type { RangeOptions, WidthInput, WidthSource } from '../types.js';
import { charWidth } from './classify.js';
import { createWidthContext, type WidthContext } from './context.js';
import { WidthError } from './errors.js';
import { decodeAll } from './utf8.js';
import { emitWarning } from './warnings.js';

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function toWidthSource(input: WidthInput): WidthSource {
  if (typeof input === 'string') {
    return { kind: SourceKind.NativeText, text: input };
  }
  if (input instanceof Uint8Array) {
    return { kind: SourceKind.Utf8Bytes, bytes: input };
  }
  if (input.encoding === ByteEncoding.Utf8) {
    return { kind: SourceKind.Utf8Bytes, bytes: input.bytes };
  }
  return { kind: SourceKind.FixedWidthBytes, bytes: input.bytes };
}

export function sourceLength(source: WidthSource): number {
  return source.kind === SourceKind.NativeText ? source.text.length : source.bytes.length;
}

function checkRange(start: number, end: number, length: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > length || start > end) {
    throw new WidthError('INVALID_RANGE', `Invalid range [${start}, ${end}) for input of length ${length}.`, {
      start,
      end,
      length,
    });
  }
}

/**
 * Codepoints of `text[start, end)`. A surrogate pair split by `end` yields its high half alone.
 */
export function* textCodepoints(text: string, start: number, end: number): Generator<number> {
  let index = start;
  while (index < end) {
    let codepoint = text.codePointAt(index) ?? 0;
    let size = codepoint > 0xffff ? 2 : 1;
    if (index + size > end) {
      codepoint = text.charCodeAt(index);
      size = 1;
    }
    yield codepoint;
    index += size;
  }
}

function sumWidths(codepoints: Iterable<number>, ctx: WidthContext): number {
  let width = 0;
  for (const codepoint of codepoints) {
    width += charWidth(codepoint, ctx.version, ctx.store);
  }
  return width;
}

function utf8Width(bytes: Uint8Array, start: number, end: number, ctx: WidthContext): number {
  const slice = bytes.subarray(start, end);
  let decoded: string;
  try {
    decoded = strictUtf8.decode(slice);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    emitWarning(
      ctx.onWarning,
      'MALFORMED_UTF8',
      `Width of bytes [${start}, ${end}) may be inaccurate, the input is not valid UTF-8: ${reason}`,
      { start, end },
    );
    let width = 0;
    for (const { codepoint } of decodeAll(slice)) {
      width += charWidth(codepoint, ctx.version, ctx.store);
    }
    return width;
  }
  return sumWidths(textCodepoints(decoded, 0, decoded.length), ctx);
}

/**
 * Sum of codepoint widths over `[start, end)` of the input, resolved against one context.
 */
export function measureSource(source: WidthSource, start: number, end: number, ctx: WidthContext): number {
  checkRange(start, end, sourceLength(source));
  if (start === end) {
    return 0;
  }

  switch (source.kind) {
    case SourceKind.NativeText:
      return sumWidths(textCodepoints(source.text, start, end), ctx);
    case SourceKind.Utf8Bytes:
      return utf8Width(source.bytes, start, end, ctx);
    case SourceKind.FixedWidthBytes:
      // Legacy single- and double-byte encodings are not decoded: one column per byte.
      return end - start;
    default: {
      const unreachable: never = source;
      return unreachable;
    }
  }
}

/**
 * Display width of text or encoded bytes.
 *
 * `start` and `end` index UTF-16 code units for strings and bytes for buffers. Malformed
 * UTF-8 is measured byte by byte after a `MALFORMED_UTF8` warning.
 */
export function stringWidth(input: WidthInput, options: RangeOptions = {}): number {
  const source = toWidthSource(input);
  const start = options.start ?? 0;
  const end = options.end ?? sourceLength(source);
  return measureSource(source, start, end, createWidthContext(options));
}

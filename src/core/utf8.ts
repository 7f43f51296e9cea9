import { PLACEHOLDER_CODEPOINT } from '../consts/index.js';
import type { DecodedCodepoint } from '../types.js';
import { WidthError } from './errors.js';

const MIN_CODEPOINT_BY_LENGTH = [0, 0, 0x80, 0x800, 0x10000];

function isContinuation(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

function sequenceLength(lead: number): number {
  if ((lead & 0x80) === 0) return 1;
  if ((lead & 0xe0) === 0xc0) return 2;
  if ((lead & 0xf0) === 0xe0) return 3;
  if ((lead & 0xf8) === 0xf0) return 4;
  return 0;
}

/**
 * Decode the UTF-8 sequence starting at `position`.
 *
 * Any malformed sequence (bad lead byte, truncated input, bad continuation byte or an
 * overlong encoding) yields `?` and consumes exactly one byte, so repeated calls always
 * reach the end of the buffer.
 */
export function decodeOne(bytes: Uint8Array, position: number): DecodedCodepoint {
  if (!Number.isInteger(position) || position < 0 || position >= bytes.length) {
    throw new WidthError('INVALID_RANGE', `Decode position ${position} is outside the buffer.`, {
      position,
      length: bytes.length,
    });
  }

  const lead = bytes[position];
  const length = sequenceLength(lead);
  if (length === 1) {
    return { codepoint: lead, next: position + 1 };
  }

  const error: DecodedCodepoint = { codepoint: PLACEHOLDER_CODEPOINT, next: position + 1 };
  if (length === 0 || bytes.length - position < length) {
    return error;
  }

  // Payload bits of the lead byte: 5, 4 or 3 for 2, 3 or 4 byte sequences.
  let codepoint = lead & (0x7f >> length);
  for (let offset = 1; offset < length; offset += 1) {
    const byte = bytes[position + offset];
    if (!isContinuation(byte)) {
      return error;
    }
    codepoint = (codepoint << 6) | (byte & 0x3f);
  }

  if (codepoint < MIN_CODEPOINT_BY_LENGTH[length]) {
    return error;
  }
  return { codepoint, next: position + length };
}

export function* decodeAll(bytes: Uint8Array): Generator<DecodedCodepoint> {
  let position = 0;
  while (position < bytes.length) {
    const decoded = decodeOne(bytes, position);
    yield decoded;
    position = decoded.next;
  }
}

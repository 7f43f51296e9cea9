import { describe, expect, it } from 'vitest';
import { WidthError } from '../../src/core/errors.js';
import { decodeAll, decodeOne } from '../../src/core/utf8.js';

const bytes = (...values: number[]) => Uint8Array.from(values);
const QUESTION_MARK = 0x3f;

describe('decodeOne', () => {
  it('decodes one to four byte sequences', () => {
    expect(decodeOne(bytes(0x41), 0)).toEqual({ codepoint: 0x41, next: 1 });
    expect(decodeOne(bytes(0xc3, 0xa9), 0)).toEqual({ codepoint: 0xe9, next: 2 });
    expect(decodeOne(bytes(0xe6, 0xb0, 0xb8), 0)).toEqual({ codepoint: 0x6c38, next: 3 });
    expect(decodeOne(bytes(0xf0, 0x9f, 0x98, 0x80), 0)).toEqual({ codepoint: 0x1f600, next: 4 });
  });

  it('decodes from the middle of a buffer', () => {
    const buffer = bytes(0x41, 0xe6, 0xb0, 0xb8, 0x42);
    expect(decodeOne(buffer, 1)).toEqual({ codepoint: 0x6c38, next: 4 });
    expect(decodeOne(buffer, 4)).toEqual({ codepoint: 0x42, next: 5 });
  });

  it('rejects the overlong encoding of NUL and advances one byte', () => {
    expect(decodeOne(bytes(0xc0, 0x80), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
  });

  it('rejects overlong three and four byte sequences', () => {
    expect(decodeOne(bytes(0xe0, 0x81, 0x81), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
    expect(decodeOne(bytes(0xf0, 0x80, 0x81, 0x81), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
  });

  it('rejects truncated sequences', () => {
    expect(decodeOne(bytes(0xc3), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
    expect(decodeOne(bytes(0xe6, 0xb0), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
    expect(decodeOne(bytes(0xf0, 0x9f, 0x98), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
  });

  it('rejects bad continuation bytes', () => {
    expect(decodeOne(bytes(0xc3, 0x41), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
    expect(decodeOne(bytes(0xe6, 0xb0, 0xc0), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
  });

  it('rejects stray continuation bytes and invalid lead bytes', () => {
    expect(decodeOne(bytes(0x80), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
    expect(decodeOne(bytes(0xbf, 0x80), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
    expect(decodeOne(bytes(0xf8, 0x88, 0x80, 0x80, 0x80), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
    expect(decodeOne(bytes(0xff), 0)).toEqual({ codepoint: QUESTION_MARK, next: 1 });
  });

  it('throws for positions outside the buffer', () => {
    expect(() => decodeOne(bytes(0x41), 1)).toThrow(WidthError);
    expect(() => decodeOne(bytes(0x41), -1)).toThrow('Decode position -1 is outside the buffer.');
  });
});

describe('decodeAll', () => {
  it('decodes mixed valid and invalid input to the end', () => {
    const buffer = bytes(0x41, 0xc0, 0x80, 0xe6, 0xb0, 0xb8, 0xe6);
    expect([...decodeAll(buffer)]).toEqual([
      { codepoint: 0x41, next: 1 },
      { codepoint: QUESTION_MARK, next: 2 },
      { codepoint: QUESTION_MARK, next: 3 },
      { codepoint: 0x6c38, next: 6 },
      { codepoint: QUESTION_MARK, next: 7 },
    ]);
  });

  it('always reaches the end of corrupted buffers', () => {
    let seed = 12345;
    const nextByte = () => {
      seed = (seed * 48271) % 2147483647;
      return seed % 256;
    };

    for (let round = 0; round < 200; round += 1) {
      const buffer = Uint8Array.from({ length: 1 + (round % 23) }, nextByte);
      let position = 0;
      let steps = 0;
      for (const decoded of decodeAll(buffer)) {
        expect(decoded.next).toBeGreaterThan(position);
        position = decoded.next;
        steps += 1;
      }
      expect(position).toBe(buffer.length);
      expect(steps).toBeLessThanOrEqual(buffer.length);
    }
  });

  it('yields nothing for an empty buffer', () => {
    expect([...decodeAll(new Uint8Array(0))]).toEqual([]);
  });
});

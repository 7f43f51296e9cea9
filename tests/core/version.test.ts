import { describe, expect, it } from 'vitest';
import { WidthError } from '../../src/core/errors.js';
import { listUnicodeVersions, resolveUnicodeVersion } from '../../src/core/version.js';
import { compareVersionTuples, parseVersionTuple } from '../../src/core/version-tuple.js';
import { collectWarnings, createSyntheticStore } from '../helpers/synthetic-store.js';

describe('parseVersionTuple', () => {
  it('parses dotted integers', () => {
    expect(parseVersionTuple('9.0')).toEqual([9, 0]);
    expect(parseVersionTuple('12.1.0')).toEqual([12, 1, 0]);
    expect(parseVersionTuple(' 9 . 1 ')).toEqual([9, 1]);
  });

  it('rejects anything else', () => {
    expect(parseVersionTuple('')).toBeUndefined();
    expect(parseVersionTuple('9.x')).toBeUndefined();
    expect(parseVersionTuple('9..0')).toBeUndefined();
    expect(parseVersionTuple('latest')).toBeUndefined();
  });
});

describe('compareVersionTuples', () => {
  it('orders lexicographically with prefixes first', () => {
    expect(compareVersionTuples([9, 0], [10])).toBeLessThan(0);
    expect(compareVersionTuples([12, 1], [12, 0, 5])).toBeGreaterThan(0);
    expect(compareVersionTuples([4, 1], [4, 1, 0])).toBeLessThan(0);
    expect(compareVersionTuples([6, 0, 0], [6, 0, 0])).toBe(0);
  });
});

describe('resolveUnicodeVersion', () => {
  const resolve = (requested: string, env: NodeJS.ProcessEnv = {}) => {
    const { warnings, onWarning } = collectWarnings();
    const version = resolveUnicodeVersion(requested, { env, onWarning });
    return { version, codes: warnings.map((warning) => warning.code) };
  };

  it('returns the newest table for latest', () => {
    expect(resolve('latest')).toEqual({ version: '17.0.0', codes: [] });
  });

  it('returns exact matches unchanged', () => {
    expect(resolve('4.1.0')).toEqual({ version: '4.1.0', codes: [] });
    expect(resolve('12.1.0')).toEqual({ version: '12.1.0', codes: [] });
  });

  it('matches a request that prefixes the next tabulated version', () => {
    expect(resolve('9')).toEqual({ version: '9.0.0', codes: [] });
    expect(resolve('9.0')).toEqual({ version: '9.0.0', codes: [] });
    expect(resolve('12.1')).toEqual({ version: '12.1.0', codes: [] });
    expect(resolve('16')).toEqual({ version: '16.0.0', codes: [] });
  });

  it('falls back to the closest tabulated version below an untabulated request', () => {
    expect(resolve('9.5')).toEqual({ version: '9.0.0', codes: [] });
    expect(resolve('5.1.5')).toEqual({ version: '5.1.0', codes: [] });
    expect(resolve('6.3.1')).toEqual({ version: '6.3.0', codes: [] });
    expect(resolve('12.0.7')).toEqual({ version: '12.0.0', codes: [] });
  });

  it('returns latest for versions beyond the tables', () => {
    expect(resolve('99')).toEqual({ version: '17.0.0', codes: [] });
    expect(resolve('17.0.1')).toEqual({ version: '17.0.0', codes: [] });
  });

  it('warns and returns the earliest version for requests at or below it', () => {
    expect(resolve('3.2')).toEqual({ version: '4.1.0', codes: ['UNICODE_VERSION_TOO_LOW'] });
    expect(resolve('4.1')).toEqual({ version: '4.1.0', codes: ['UNICODE_VERSION_TOO_LOW'] });
    expect(resolve('-1')).toEqual({ version: '4.1.0', codes: ['UNICODE_VERSION_TOO_LOW'] });
  });

  it('warns and returns latest for malformed requests', () => {
    expect(resolve('garbage')).toEqual({ version: '17.0.0', codes: ['INVALID_UNICODE_VERSION'] });
    expect(resolve('')).toEqual({ version: '17.0.0', codes: ['INVALID_UNICODE_VERSION'] });
    expect(resolve('9.0-beta')).toEqual({ version: '17.0.0', codes: ['INVALID_UNICODE_VERSION'] });
  });

  it('reads UNICODE_VERSION from the given env for auto', () => {
    expect(resolve('auto', { UNICODE_VERSION: '9.0.0' })).toEqual({ version: '9.0.0', codes: [] });
    expect(resolve('auto', { UNICODE_VERSION: '10' })).toEqual({ version: '10.0.0', codes: [] });
    expect(resolve('auto', { UNICODE_VERSION: 'latest' })).toEqual({ version: '17.0.0', codes: [] });
    expect(resolve('auto', {})).toEqual({ version: '17.0.0', codes: [] });
  });

  it('treats auto inside the environment as latest', () => {
    expect(resolve('auto', { UNICODE_VERSION: 'auto' })).toEqual({ version: '17.0.0', codes: [] });
  });

  it('passes malformed environment values through the same fallback', () => {
    expect(resolve('auto', { UNICODE_VERSION: 'nine' })).toEqual({
      version: '17.0.0',
      codes: ['INVALID_UNICODE_VERSION'],
    });
  });

  it('describes the fallback in the warning', () => {
    const { warnings, onWarning } = collectWarnings();
    resolveUnicodeVersion('nine', { env: {}, onWarning });
    expect(warnings).toEqual([
      {
        code: 'INVALID_UNICODE_VERSION',
        message:
          'Unicode version "nine" is invalid, expected integer[.integer]*. Using latest supported version 17.0.0.',
        details: { requested: 'nine', resolved: '17.0.0' },
      },
    ]);
  });

  it('always returns a tabulated version', () => {
    const versions = listUnicodeVersions();
    const requests = ['', ' ', '.', 'auto', 'latest', '0', '4', '7.1', '11.0.0.1', '1e3', 'v9', '10.x', '100.0'];
    for (const request of requests) {
      expect(versions).toContain(resolveUnicodeVersion(request, { env: {}, onWarning: () => undefined }));
    }
  });

  it('resolves against an injected version list', () => {
    const store = createSyntheticStore();
    const options = { versions: store.versions, env: {}, onWarning: () => undefined };
    expect(resolveUnicodeVersion('latest', options)).toBe('12.1.0');
    expect(resolveUnicodeVersion('10', options)).toBe('9.0.0');
    expect(resolveUnicodeVersion('12', options)).toBe('12.1.0');
    expect(resolveUnicodeVersion('4', options)).toBe('5.0.0');
  });

  it('rejects a malformed version list whatever the request', () => {
    for (const request of ['latest', 'auto', '9.0.0', 'bogus']) {
      expect(() => resolveUnicodeVersion(request, { versions: [], env: {} })).toThrow('No Unicode versions are tabulated.');
      expect(() => resolveUnicodeVersion(request, { versions: ['9.0.0', 'next'], env: {} })).toThrow(WidthError);
    }
  });
});

describe('listUnicodeVersions', () => {
  it('returns a copy of the tabulated versions', () => {
    const versions = listUnicodeVersions();
    versions.push('99.0.0');
    expect(listUnicodeVersions()).not.toContain('99.0.0');
    expect(listUnicodeVersions(createSyntheticStore())).toEqual(['5.0.0', '9.0.0', '12.1.0']);
  });
});

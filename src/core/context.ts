import { LATEST_VERSION } from '../consts/index.js';
import type { RangeTableStore, WarningHandler, WidthOptions } from '../types.js';
import { loadDefaultTableStore } from './tables.js';
import { resolveUnicodeVersion } from './version.js';

/**
 * Everything one width computation needs, with the Unicode version resolved.
 */
export interface WidthContext {
  readonly version: string;
  readonly store: RangeTableStore;
  readonly onWarning?: WarningHandler;
}

export function createWidthContext(options: WidthOptions = {}): WidthContext {
  const store = options.store ?? loadDefaultTableStore();
  const version = resolveUnicodeVersion(options.unicodeVersion ?? LATEST_VERSION, {
    versions: store.versions,
    env: options.env,
    onWarning: options.onWarning,
  });
  return { version, store, ...(options.onWarning ? { onWarning: options.onWarning } : {}) };
}

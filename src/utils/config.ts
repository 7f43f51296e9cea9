import type { AlignSide, CellwidthConfig } from '../types.js';

export type ConfigKey = keyof CellwidthConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = ['unicodeVersion', 'style', 'cutAlign', 'padAlign', 'padChar'];

export function isConfigKey(value: string): value is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(value);
}

function readKey(raw: unknown, key: ConfigKey): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return undefined;
  }
  return Reflect.get(raw, key);
}

function toAlign(value: unknown, fallback: AlignSide): AlignSide {
  return value === 'left' || value === 'right' ? value : fallback;
}

/**
 * Keep the valid keys of a parsed config file; anything missing or malformed takes the fallback.
 */
export function sanitizeConfig(raw: unknown, fallback: CellwidthConfig): CellwidthConfig {
  const unicodeVersion = readKey(raw, 'unicodeVersion');
  const style = readKey(raw, 'style');
  const padChar = readKey(raw, 'padChar');

  return {
    unicodeVersion:
      typeof unicodeVersion === 'string' && unicodeVersion.trim().length > 0
        ? unicodeVersion.trim()
        : fallback.unicodeVersion,
    style: style === 'on' || style === 'off' ? style : fallback.style,
    cutAlign: toAlign(readKey(raw, 'cutAlign'), fallback.cutAlign),
    padAlign: toAlign(readKey(raw, 'padAlign'), fallback.padAlign),
    padChar: typeof padChar === 'string' && padChar.length > 0 ? padChar : fallback.padChar,
  };
}

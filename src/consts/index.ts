import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'cellwidth';
export const APP_DESCRIPTION = 'Measure, cut and pad text by terminal column width';

export const CELLWIDTH_ROOT = path.join(os.homedir(), '.cellwidth');
export const CONFIG_FILE = path.join(CELLWIDTH_ROOT, 'config.jsonc');

export const TABLES_FILE_NAME = 'unicode-width-tables.json';
export const CONFIG_TEMPLATE_FILE_NAME = 'config.default.jsonc';

export const LATEST_VERSION = 'latest';
export const AUTO_VERSION = 'auto';

export const MAX_CODEPOINT = 0x10ffff;

/** Substituted for each byte that does not start a valid UTF-8 sequence. */
export const PLACEHOLDER_CODEPOINT = 0x3f;

export namespace Env {
  export const UnicodeVersion = 'UNICODE_VERSION';
  export const ConfigPath = 'CELLWIDTH_CONFIG';
  export const Style = 'CELLWIDTH_STYLE';
  export const NoColor = 'NO_COLOR';
}

/**
 * Punctuation and arrows always drawn two columns wide, whatever the tables say.
 * Local display policy for CJK-oriented terminal fonts.
 */
export const OVERRIDE_WIDE: ReadonlySet<number> = new Set([
  0x2018, // ‘
  0x2019, // ’
  0x201c, // “
  0x201d, // ”
  0x2026, // …
  0x00b7, // ·
  0x2014, // em dash
  0x300a, // 《
  0x300b, // 》
  0x2191, // ↑
  0x2193, // ↓
  0x2190, // ←
  0x2192, // →
]);

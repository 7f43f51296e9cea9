import { DEFAULT_CONFIG_JSONC_RAW } from '../default-files/index.js';
import type { CellwidthConfig } from '../types.js';
import { sanitizeConfig } from '../utils/config.js';
import { parseJsonc } from '../utils/jsonc.js';
import { AUTO_VERSION } from './index.js';

export namespace Defaults {
  export const UnicodeVersion = AUTO_VERSION;

  export const PadChar = ' ';

  const parsedConfig = parseJsonc(DEFAULT_CONFIG_JSONC_RAW, 'public/config.default.jsonc');

  export const Config: CellwidthConfig = sanitizeConfig(parsedConfig, {
    unicodeVersion: UnicodeVersion,
    style: 'on',
    cutAlign: 'left',
    padAlign: 'right',
    padChar: PadChar,
  });
}

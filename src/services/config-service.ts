import fs from 'node:fs/promises';
import path from 'node:path';
import { Defaults } from '../consts/defaults.js';
import { CONFIG_FILE, Env } from '../consts/index.js';
import { WidthError } from '../core/errors.js';
import { DEFAULT_CONFIG_JSONC_RAW } from '../default-files/index.js';
import type { CellwidthConfig } from '../types.js';
import { isConfigKey, sanitizeConfig, type ConfigKey } from '../utils/config.js';
import { parseJsonc, withProperty } from '../utils/jsonc.js';

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[Env.ConfigPath];
  return fromEnv && fromEnv.trim() ? fromEnv.trim() : CONFIG_FILE;
}

function hasErrorCode(value: unknown, code: string): boolean {
  return value instanceof Error && 'code' in value && value.code === code;
}

export class ConfigService {
  constructor(readonly configPath: string) {}

  /** File text, or undefined while no config file exists. */
  private async readText(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.configPath, 'utf8');
    } catch (e) {
      if (hasErrorCode(e, 'ENOENT')) {
        return undefined;
      }
      throw e;
    }
  }

  async getConfig(): Promise<CellwidthConfig> {
    const text = await this.readText();
    // A blank file counts as an empty config.
    const raw = text?.trim() ? parseJsonc(text, this.configPath) : undefined;
    return sanitizeConfig(raw, Defaults.Config);
  }

  /**
   * Write the commented template. Returns false, leaving the file alone, when it already exists.
   */
  async init(): Promise<boolean> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    try {
      await fs.writeFile(this.configPath, DEFAULT_CONFIG_JSONC_RAW, { encoding: 'utf8', flag: 'wx' });
      return true;
    } catch (e) {
      if (hasErrorCode(e, 'EEXIST')) {
        return false;
      }
      throw e;
    }
  }

  async set(key: string, value: string): Promise<CellwidthConfig> {
    if (!isConfigKey(key)) {
      throw new WidthError('INVALID_CONFIG', `Unknown config key: ${key}`, { key });
    }

    const current = await this.getConfig();
    const candidate = key === 'unicodeVersion' ? value.trim() : value;
    const next = sanitizeConfig({ ...current, [key]: candidate }, current);
    if (next[key] !== candidate) {
      throw new WidthError('INVALID_CONFIG', `Invalid value for ${key}: ${JSON.stringify(value)}`, { key, value });
    }

    const text = await this.readText();
    const base = text?.trim() ? text : DEFAULT_CONFIG_JSONC_RAW;
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, withProperty(base, key, next[key]), 'utf8');
    return next;
  }

  describe(key: ConfigKey): string {
    switch (key) {
      case 'unicodeVersion':
        return 'Unicode version of the width tables, "latest" or "auto"';
      case 'style':
        return 'Styled output: on or off';
      case 'cutAlign':
        return 'Side fit cuts from: left or right';
      case 'padAlign':
        return 'Side fit pads on: left or right';
      case 'padChar':
        return 'Pad unit used by fit';
    }
  }
}

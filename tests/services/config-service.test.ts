import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { CONFIG_FILE } from '../../src/consts/index.js';
import { WidthError } from '../../src/core/errors.js';
import { ConfigService, resolveConfigPath } from '../../src/services/config-service.js';

const tempDirs: string[] = [];

async function makeConfigPath(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cellwidth-config-'));
  tempDirs.push(dir);
  return path.join(dir, 'config.jsonc');
}

afterEach(async () => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
});

describe('config path resolution', () => {
  it('prefers CELLWIDTH_CONFIG', () => {
    expect(resolveConfigPath({ CELLWIDTH_CONFIG: ' /tmp/custom.jsonc ' })).toBe('/tmp/custom.jsonc');
  });

  it('falls back to the home config file', () => {
    expect(resolveConfigPath({})).toBe(CONFIG_FILE);
    expect(resolveConfigPath({ CELLWIDTH_CONFIG: '   ' })).toBe(CONFIG_FILE);
  });
});

describe('ConfigService', () => {
  it('returns defaults when the file is missing', async () => {
    const service = new ConfigService(await makeConfigPath());
    expect(await service.getConfig()).toEqual({
      unicodeVersion: 'auto',
      style: 'on',
      cutAlign: 'left',
      padAlign: 'right',
      padChar: ' ',
    });
  });

  it('initializes the commented template once', async () => {
    const configPath = await makeConfigPath();
    const service = new ConfigService(configPath);

    expect(await service.init()).toBe(true);
    expect(await service.init()).toBe(false);

    const content = await fs.readFile(configPath, 'utf8');
    expect(content).toContain('// Styled terminal output');
  });

  it('updates one key and keeps comments', async () => {
    const configPath = await makeConfigPath();
    const service = new ConfigService(configPath);
    await service.init();

    const next = await service.set('unicodeVersion', ' 12.1.0 ');
    expect(next.unicodeVersion).toBe('12.1.0');
    expect(next.padAlign).toBe('right');

    const content = await fs.readFile(configPath, 'utf8');
    expect(content).toContain('"unicodeVersion": "12.1.0"');
    expect(content).toContain('// Side `fit` pads on');
    expect((await service.getConfig()).unicodeVersion).toBe('12.1.0');
  });

  it('creates the file from the template when setting without init', async () => {
    const configPath = await makeConfigPath();
    const service = new ConfigService(configPath);

    await service.set('cutAlign', 'right');
    expect((await service.getConfig()).cutAlign).toBe('right');
  });

  it('rejects unknown keys and invalid values', async () => {
    const service = new ConfigService(await makeConfigPath());

    await expect(service.set('language', 'en')).rejects.toThrow('Unknown config key: language');
    await expect(service.set('padAlign', 'center')).rejects.toThrow(WidthError);
    await expect(service.set('padChar', '')).rejects.toThrow('Invalid value for padChar: ""');
  });

  it('surfaces a malformed file as INVALID_CONFIG with its position', async () => {
    const configPath = await makeConfigPath();
    await fs.writeFile(configPath, '{\n  "style": \n}', 'utf8');

    await expect(new ConfigService(configPath).getConfig()).rejects.toMatchObject({
      code: 'INVALID_CONFIG',
      message: `Cannot parse ${configPath}:3:1: ValueExpected`,
    });
  });

  it('treats a blank file as defaults and rewrites it from the template on set', async () => {
    const configPath = await makeConfigPath();
    await fs.writeFile(configPath, '  \n', 'utf8');
    const service = new ConfigService(configPath);

    expect((await service.getConfig()).padChar).toBe(' ');
    expect(await service.init()).toBe(false);

    await service.set('padChar', '.');
    const content = await fs.readFile(configPath, 'utf8');
    expect(content).toContain('"padChar": "."');
    expect(content).toContain('// Styled terminal output');
  });

  it('does not overwrite an edited file on init', async () => {
    const configPath = await makeConfigPath();
    await fs.writeFile(configPath, '{ "style": "off" }\n', 'utf8');
    const service = new ConfigService(configPath);

    expect(await service.init()).toBe(false);
    expect(await fs.readFile(configPath, 'utf8')).toBe('{ "style": "off" }\n');
    expect((await service.getConfig()).style).toBe('off');
  });
});

import fs from 'node:fs';
import type { CellwidthConfig } from '../types.js';
import { ConfigService, resolveConfigPath } from './config-service.js';

export interface CommandContext {
  readonly configService: ConfigService;
  readonly config: CellwidthConfig;
  readonly env: NodeJS.ProcessEnv;
  readonly stdin: NodeJS.ReadableStream;
  readonly version: string;
}

export function readPackageVersion(): string {
  const raw: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
  const version = typeof raw === 'object' && raw !== null ? Reflect.get(raw, 'version') : undefined;
  return typeof version === 'string' ? version : '0.0.0';
}

export async function createCommandContext(
  env: NodeJS.ProcessEnv = process.env,
  stdin: NodeJS.ReadableStream = process.stdin,
): Promise<CommandContext> {
  const configService = new ConfigService(resolveConfigPath(env));
  const config = await configService.getConfig();

  return {
    configService,
    config,
    env,
    stdin,
    version: readPackageVersion(),
  };
}

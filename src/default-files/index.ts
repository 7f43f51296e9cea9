import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { CONFIG_TEMPLATE_FILE_NAME } from '../consts/index.js';

// Same depth from src/default-files and dist/default-files.
const PUBLIC_DIR = new URL('../../public/', import.meta.url);

export function resolvePublicFile(fileName: string): string {
  return fileURLToPath(new URL(fileName, PUBLIC_DIR));
}

export function readPublicFile(fileName: string): string {
  return fs.readFileSync(resolvePublicFile(fileName), 'utf8');
}

export const DEFAULT_CONFIG_JSONC_RAW = readPublicFile(CONFIG_TEMPLATE_FILE_NAME);

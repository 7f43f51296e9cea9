import { MAX_CODEPOINT, TABLES_FILE_NAME } from '../consts/index.js';
import { TableKind } from '../consts/enums.js';
import { readPublicFile } from '../default-files/index.js';
import type { CodepointRange, RangeTable, RangeTableStore } from '../types.js';
import { WidthError } from './errors.js';
import { parseVersionTuple, compareVersionTuples } from './version-tuple.js';

function invalid(message: string, details?: Record<string, unknown>): WidthError {
  return new WidthError('INVALID_TABLE_DATA', message, details);
}

function isCodepoint(value: unknown): value is number {
  return Number.isInteger(value) && Number(value) >= 0 && Number(value) <= MAX_CODEPOINT;
}

function toRange(value: unknown, where: string): CodepointRange {
  if (!Array.isArray(value) || value.length !== 2) {
    throw invalid(`Range in ${where} must be a [start, end] pair.`, { value });
  }
  const [start, end]: unknown[] = value;
  if (!isCodepoint(start) || !isCodepoint(end) || start > end) {
    throw invalid(`Range in ${where} has invalid bounds.`, { value });
  }
  return [start, end];
}

function toRangeTable(value: unknown, where: string): RangeTable {
  if (!Array.isArray(value) || value.length === 0) {
    throw invalid(`Table ${where} must be a non-empty array of ranges.`);
  }

  const table = value.map((item) => toRange(item, where));
  for (let index = 1; index < table.length; index += 1) {
    if (table[index][0] <= table[index - 1][1]) {
      throw invalid(`Table ${where} is not sorted or has overlapping ranges.`, {
        previous: table[index - 1],
        current: table[index],
      });
    }
  }
  return Object.freeze(table);
}

function toVersionList(value: unknown): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw invalid('Version list must be a non-empty array.');
  }

  let previous: number[] | undefined;
  return value.map((item) => {
    const tuple = typeof item === 'string' ? parseVersionTuple(item) : undefined;
    if (typeof item !== 'string' || !tuple) {
      throw invalid(`Version ${String(item)} is not a dotted integer version.`);
    }
    if (previous && compareVersionTuples(previous, tuple) >= 0) {
      throw invalid(`Version list must be ascending, found ${item} out of order.`);
    }
    previous = tuple;
    return item;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObject(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw invalid(`${where} must be an object.`);
  }
  return value;
}

class StaticRangeTableStore implements RangeTableStore {
  readonly versions: readonly string[];
  readonly alwaysZeroWidth: ReadonlySet<number>;
  private readonly tables: ReadonlyMap<TableKind, ReadonlyMap<string, RangeTable>>;

  constructor(
    versions: string[],
    alwaysZeroWidth: number[],
    tables: Map<TableKind, Map<string, RangeTable>>,
  ) {
    this.versions = Object.freeze(versions);
    this.alwaysZeroWidth = new Set(alwaysZeroWidth);
    this.tables = tables;
  }

  lookup(kind: TableKind, version: string): RangeTable {
    const table = this.tables.get(kind)?.get(version);
    if (!table) {
      throw new WidthError('UNKNOWN_VERSION', `No ${kind} table for Unicode version ${version}.`, { kind, version });
    }
    return table;
  }
}

/**
 * Validate raw table data (the `RangeTableData` shape, typically parsed JSON)
 * and wrap it in an immutable store.
 */
export function createTableStore(data: unknown): RangeTableStore {
  const root = readObject(data, 'Table data');
  const versions = toVersionList(root.versions);

  const rawZeroWidth = root.alwaysZeroWidth ?? [];
  if (!Array.isArray(rawZeroWidth) || !rawZeroWidth.every(isCodepoint)) {
    throw invalid('alwaysZeroWidth must be an array of codepoints.');
  }
  const alwaysZeroWidth = rawZeroWidth.filter(isCodepoint);

  const tables = new Map<TableKind, Map<string, RangeTable>>();
  for (const kind of [TableKind.Wide, TableKind.ZeroWidth]) {
    const byVersion = readObject(root[kind], `Table ${kind}`);
    const entries = new Map<string, RangeTable>();
    for (const version of versions) {
      entries.set(version, toRangeTable(byVersion[version], `${kind}@${version}`));
    }
    tables.set(kind, entries);
  }

  return new StaticRangeTableStore(versions, alwaysZeroWidth, tables);
}

let defaultStore: RangeTableStore | undefined;

/**
 * Store backed by the bundled Unicode width tables, parsed on first use.
 */
export function loadDefaultTableStore(): RangeTableStore {
  if (!defaultStore) {
    const raw: unknown = JSON.parse(readPublicFile(TABLES_FILE_NAME));
    defaultStore = createTableStore(raw);
  }
  return defaultStore;
}

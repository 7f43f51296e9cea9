import { AUTO_VERSION, Env, LATEST_VERSION } from '../consts/index.js';
import type { RangeTableStore, WarningHandler } from '../types.js';
import { WidthError } from './errors.js';
import { loadDefaultTableStore } from './tables.js';
import { compareVersionTuples, isVersionPrefix, parseVersionTuple } from './version-tuple.js';
import { emitWarning } from './warnings.js';

export interface ResolveVersionOptions {
  /** Tabulated versions, ascending. Defaults to the bundled tables. */
  versions?: readonly string[];
  env?: NodeJS.ProcessEnv;
  onWarning?: WarningHandler;
}

function tabulatedTuples(versions: readonly string[]): number[][] {
  if (versions.length === 0) {
    throw new WidthError('INVALID_TABLE_DATA', 'No Unicode versions are tabulated.');
  }
  return versions.map((version) => {
    const tuple = parseVersionTuple(version);
    if (!tuple) {
      throw new WidthError('INVALID_TABLE_DATA', `Tabulated version ${version} is not a dotted integer version.`, {
        version,
      });
    }
    return tuple;
  });
}

/**
 * Map a requested Unicode version onto one of the tabulated versions.
 *
 * `"auto"` reads `UNICODE_VERSION` from `env`, `"latest"` picks the newest table, and any
 * other value selects the closest tabulated version at or below it. A version that prefixes
 * the next tabulated one (`"9"` for `"9.0.0"`) selects that one. Malformed or too-low
 * requests fall back with a warning instead of failing: no `requested` value throws.
 *
 * The `versions` list is checked before anything else. An empty list, or one with an entry
 * that is not a dotted integer version, throws `INVALID_TABLE_DATA` whatever was requested.
 */
export function resolveUnicodeVersion(requested: string, options: ResolveVersionOptions = {}): string {
  const versions = options.versions ?? loadDefaultTableStore().versions;
  const tuples = tabulatedTuples(versions);
  const latest = versions[versions.length - 1];
  const earliest = versions[0];

  let given = requested;
  if (given === AUTO_VERSION) {
    const fromEnv = (options.env ?? process.env)[Env.UnicodeVersion];
    given = fromEnv === undefined || fromEnv === AUTO_VERSION ? LATEST_VERSION : fromEnv;
  }

  if (given === LATEST_VERSION) {
    return latest;
  }
  if (versions.includes(given)) {
    return given;
  }

  const requestedTuple = parseVersionTuple(given);
  if (!requestedTuple) {
    emitWarning(
      options.onWarning,
      'INVALID_UNICODE_VERSION',
      `Unicode version ${JSON.stringify(given)} is invalid, expected integer[.integer]*. Using latest supported version ${latest}.`,
      { requested: given, resolved: latest },
    );
    return latest;
  }

  if (compareVersionTuples(requestedTuple, tuples[0]) <= 0) {
    emitWarning(
      options.onWarning,
      'UNICODE_VERSION_TOO_LOW',
      `Unicode version ${JSON.stringify(given)} is lower than any available version. Using earliest supported version ${earliest}.`,
      { requested: given, resolved: earliest },
    );
    return earliest;
  }

  for (let index = 0; index < versions.length - 1; index += 1) {
    const nextTuple = tuples[index + 1];
    if (isVersionPrefix(requestedTuple, nextTuple)) {
      return versions[index + 1];
    }
    if (compareVersionTuples(nextTuple, requestedTuple) > 0) {
      return versions[index];
    }
  }
  return latest;
}

export function listUnicodeVersions(store: RangeTableStore = loadDefaultTableStore()): string[] {
  return [...store.versions];
}

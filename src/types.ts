import type { ByteEncoding, SourceKind, TableKind } from './consts/enums.js';

/**
 * Inclusive codepoint interval sharing one width class.
 */
export type CodepointRange = readonly [start: number, end: number];

/**
 * Ranges sorted ascending by start, mutually non-overlapping.
 */
export type RangeTable = readonly CodepointRange[];

export interface RangeTableData {
  versions: string[];
  alwaysZeroWidth: number[];
  wide: Record<string, CodepointRange[]>;
  zeroWidth: Record<string, CodepointRange[]>;
}

export interface RangeTableStore {
  /** Supported Unicode versions, ascending. The last one is "latest". */
  readonly versions: readonly string[];
  readonly alwaysZeroWidth: ReadonlySet<number>;
  lookup(kind: TableKind, version: string): RangeTable;
}

export interface DecodedCodepoint {
  codepoint: number;
  /** Position of the first byte after the consumed sequence. */
  next: number;
}

export type CharWidth = 0 | 1 | 2;

export type WarningCode = 'INVALID_UNICODE_VERSION' | 'UNICODE_VERSION_TOO_LOW' | 'MALFORMED_UTF8';

export interface WidthWarning {
  code: WarningCode;
  message: string;
  details?: Record<string, unknown>;
}

export type WarningHandler = (warning: WidthWarning) => void;

export interface WidthOptions {
  /** Unicode version, `"latest"` (default) or `"auto"`. */
  unicodeVersion?: string;
  /** Environment consulted when the version is `"auto"`. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  onWarning?: WarningHandler;
  store?: RangeTableStore;
}

export interface RangeOptions extends WidthOptions {
  start?: number;
  end?: number;
}

export type AlignSide = 'left' | 'right';

export interface FitOptions extends WidthOptions {
  cutAlign?: AlignSide;
  padAlign?: AlignSide;
  padChar?: string;
}

export interface EncodedBytes {
  encoding: ByteEncoding;
  bytes: Uint8Array;
}

/**
 * Accepted by the aggregator. A bare `Uint8Array` is UTF-8.
 */
export type WidthInput = string | Uint8Array | EncodedBytes;

export type WidthSource =
  | { kind: SourceKind.NativeText; text: string }
  | { kind: SourceKind.Utf8Bytes; bytes: Uint8Array }
  | { kind: SourceKind.FixedWidthBytes; bytes: Uint8Array };

export type StyleSetting = 'on' | 'off';

export interface CellwidthConfig {
  unicodeVersion: string;
  style: StyleSetting;
  cutAlign: AlignSide;
  padAlign: AlignSide;
  padChar: string;
}

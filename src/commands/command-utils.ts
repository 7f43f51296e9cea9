import type { Command } from 'commander';
import { CellWidth } from '../core/cell-width.js';
import type { CommandContext } from '../services/context.js';
import type { AlignSide } from '../types.js';
import { error } from '../utils/terminal.js';

export type GlobalOptions = {
  unicodeVersion?: string;
};

export function requestedVersion(program: Command, ctx: CommandContext): string {
  return program.opts<GlobalOptions>().unicodeVersion ?? ctx.config.unicodeVersion;
}

/**
 * Calculator for one command run: the `--unicode-version` flag beats the config file.
 */
export function createCalculator(program: Command, ctx: CommandContext): CellWidth {
  return new CellWidth({ unicodeVersion: requestedVersion(program, ctx), env: ctx.env });
}

export function parseAlign(value: string | undefined, fallback: AlignSide, flag: string): AlignSide {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'left' || normalized === 'right') {
    return normalized;
  }
  throw new Error(`Invalid ${flag} value: ${value}. Use left or right.`);
}

export function parseNonNegativeInt(value: string, label: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  return Number(value.trim());
}

export async function runAction(action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (e) {
    error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  }
}

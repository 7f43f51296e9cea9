import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import { Env } from '../consts/index.js';
import type { StyleSetting } from '../types.js';

type Paint = (text: string) => string;

interface Channel {
  label: string;
  badge: Paint;
  text: Paint;
  stderr: boolean;
}

// Measured values are the only thing on stdout; every diagnostic goes to stderr.
const channels = {
  success: { label: 'OK', badge: (s) => chalk.black.bgGreen(s), text: (s) => chalk.green(s), stderr: false },
  info: { label: 'INFO', badge: (s) => chalk.black.bgCyan(s), text: (s) => chalk.cyan(s), stderr: false },
  warn: { label: 'WARN', badge: (s) => chalk.black.bgYellow(s), text: (s) => chalk.yellow(s), stderr: true },
  error: { label: 'ERROR', badge: (s) => chalk.white.bgRed(s), text: (s) => chalk.red(s), stderr: true },
} satisfies Record<string, Channel>;

type ChannelName = keyof typeof channels;

function report(name: ChannelName, message: string): void {
  const channel: Channel = channels[name];
  const line = `${channel.badge(` ${channel.label} `)} ${channel.text(message)}`;
  if (channel.stderr) {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const success = (message: string): void => report('success', message);
export const info = (message: string): void => report('info', message);
export const warn = (message: string): void => report('warn', message);
export const error = (message: string): void => report('error', message);

const detectedColorLevel = chalk.level;

/**
 * Colour setting for this run. `CELLWIDTH_STYLE=on|off` beats everything; otherwise a
 * non-empty `NO_COLOR` turns colour off; otherwise the config file decides.
 */
export function resolveColorSetting(configured: StyleSetting, env: NodeJS.ProcessEnv = process.env): StyleSetting {
  const forced = env[Env.Style]?.trim().toLowerCase();
  if (forced === 'on' || forced === 'off') {
    return forced;
  }
  if (env[Env.NoColor]) {
    return 'off';
  }
  return configured;
}

/**
 * Apply a colour setting to the badges. `on` restores what chalk detected for the stream,
 * so piping still yields plain text.
 */
export function useColor(configured: StyleSetting, env: NodeJS.ProcessEnv = process.env): StyleSetting {
  const setting = resolveColorSetting(configured, env);
  chalk.level = setting === 'off' ? 0 : detectedColorLevel;
  return setting;
}

export function visibleText(value: string): string {
  return stripAnsi(value);
}

export function formatCodepoint(codepoint: number): string {
  return `U+${codepoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

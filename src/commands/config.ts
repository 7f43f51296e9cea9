import type { Command } from 'commander';
import { stringWidth } from '../core/aggregate.js';
import { fit } from '../core/fit.js';
import type { CommandContext } from '../services/context.js';
import { CONFIG_KEYS } from '../utils/config.js';
import { info, success } from '../utils/terminal.js';
import { runAction } from './command-utils.js';

/**
 * Left-aligned columns separated by two spaces, padded by display width.
 */
export function renderColumns(rows: string[][]): string[] {
  const columnCount = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const widths = new Array<number>(columnCount).fill(0);
  for (const row of rows) {
    row.forEach((cell, column) => {
      widths[column] = Math.max(widths[column], stringWidth(cell));
    });
  }

  return rows.map((row) =>
    row
      .map((cell, column) => (column === row.length - 1 ? cell : fit(cell, widths[column])))
      .join('  '),
  );
}

export function registerConfigCommands(program: Command, ctx: CommandContext): void {
  const config = program.command('config').alias('cfg').description('Manage config values');

  config
    .command('list')
    .description('Show current config')
    .option('-c, --comment', 'Show key comments')
    .action((options: { comment?: boolean }) =>
      runAction(async () => {
        const current = await ctx.configService.getConfig();
        if (options.comment) {
          const rows = CONFIG_KEYS.map((key) => [key, JSON.stringify(current[key]), ctx.configService.describe(key)]);
          renderColumns([['Key', 'Value', 'Comment'], ...rows]).forEach((line) => console.log(line));
        } else {
          console.log(JSON.stringify(current, null, 2));
        }
      }),
    );

  config
    .command('path')
    .description('Print the config file location')
    .action(() =>
      runAction(() => {
        console.log(ctx.configService.configPath);
      }),
    );

  config
    .command('init')
    .description('Write the default config file if it does not exist')
    .action(() =>
      runAction(async () => {
        const created = await ctx.configService.init();
        if (created) {
          success(`Created ${ctx.configService.configPath}.`);
        } else {
          info(`${ctx.configService.configPath} already exists.`);
        }
      }),
    );

  config
    .command('set')
    .description(`Set one config value: ${CONFIG_KEYS.join(' | ')}`)
    .argument('<key>', 'Config key')
    .argument('<value>', 'New value')
    .action((key: string, value: string) =>
      runAction(async () => {
        await ctx.configService.set(key, value);
        success(`Set ${key} to ${JSON.stringify(value)}.`);
      }),
    );
}

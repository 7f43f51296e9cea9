import { Command } from 'commander';
import { APP_DESCRIPTION, APP_NAME } from '../consts/index.js';
import type { CommandContext } from '../services/context.js';
import { registerCharsCommand } from './chars.js';
import { registerConfigCommands } from './config.js';
import { registerFitCommand } from './fit.js';
import { registerVersionsCommand } from './versions.js';
import { registerWidthCommand } from './width.js';

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description(APP_DESCRIPTION)
    .version(ctx.version)
    .option('-u, --unicode-version <version>', 'Unicode version of the width tables, "latest" or "auto"');

  registerWidthCommand(program, ctx);
  registerCharsCommand(program, ctx);
  registerFitCommand(program, ctx);
  registerVersionsCommand(program, ctx);
  registerConfigCommands(program, ctx);

  return program;
}

import type { Command } from 'commander';
import type { CommandContext } from '../services/context.js';
import { createCalculator, parseAlign, parseNonNegativeInt, runAction } from './command-utils.js';

interface FitCommandOptions {
  cut?: string;
  pad?: string;
  padChar?: string;
}

export function registerFitCommand(program: Command, ctx: CommandContext): void {
  program
    .command('fit')
    .alias('f')
    .description('Cut or pad text to an exact display width')
    .argument('<text>', 'Text to fit')
    .argument('<width>', 'Target width in columns')
    .option('--cut <side>', 'Side to remove characters from: left or right')
    .option('--pad <side>', 'Side to pad on: left or right')
    .option('--pad-char <char>', 'Pad unit')
    .action((text: string, rawWidth: string, options: FitCommandOptions) =>
      runAction(() => {
        const width = parseNonNegativeInt(rawWidth, 'width');
        const calculator = createCalculator(program, ctx);
        const result = calculator.fit(text, width, {
          cutAlign: parseAlign(options.cut, ctx.config.cutAlign, '--cut'),
          padAlign: parseAlign(options.pad, ctx.config.padAlign, '--pad'),
          padChar: options.padChar ?? ctx.config.padChar,
        });
        console.log(result);
      }),
    );
}

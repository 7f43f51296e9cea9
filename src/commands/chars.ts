import type { Command } from 'commander';
import { wcwidth } from '../core/classify.js';
import type { CommandContext } from '../services/context.js';
import { formatCodepoint } from '../utils/terminal.js';
import { createCalculator, runAction } from './command-utils.js';

export function registerCharsCommand(program: Command, ctx: CommandContext): void {
  program
    .command('chars')
    .alias('c')
    .description('Print the width of every character: codepoint, character, width')
    .argument('<text>', 'Text to inspect')
    .action((text: string) =>
      runAction(() => {
        const calculator = createCalculator(program, ctx);
        for (const char of text) {
          const codepoint = char.codePointAt(0) ?? 0;
          // Control characters would move the cursor, so only their codepoint is shown.
          const printable = wcwidth(codepoint, calculator.version, calculator.store) < 0 ? '' : char;
          console.log(`${formatCodepoint(codepoint)}\t${printable}\t${calculator.charWidth(codepoint)}`);
        }
      }),
    );
}

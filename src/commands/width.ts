import type { Command } from 'commander';
import type { CommandContext } from '../services/context.js';
import { visibleText } from '../utils/terminal.js';
import { createCalculator, parseNonNegativeInt, runAction } from './command-utils.js';

interface WidthCommandOptions {
  stdin?: boolean;
  start?: string;
  end?: string;
  stripAnsi?: boolean;
}

export async function readAllBytes(stream: NodeJS.ReadableStream): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks);
}

export function registerWidthCommand(program: Command, ctx: CommandContext): void {
  program
    .command('width')
    .alias('w')
    .description('Print the display width of text')
    .argument('[text...]', 'Text to measure, joined with single spaces')
    .option('--stdin', 'Measure raw UTF-8 bytes read from stdin')
    .option('--start <index>', 'First code unit (or byte with --stdin) to measure')
    .option('--end <index>', 'End of the measured range, exclusive')
    .option('--strip-ansi', 'Ignore ANSI escape sequences in the text')
    .action((words: string[], options: WidthCommandOptions) =>
      runAction(async () => {
        const start = options.start !== undefined ? parseNonNegativeInt(options.start, 'start') : undefined;
        const end = options.end !== undefined ? parseNonNegativeInt(options.end, 'end') : undefined;
        const calculator = createCalculator(program, ctx);

        if (options.stdin) {
          if (words.length > 0) {
            throw new Error('Pass text either as arguments or with --stdin, not both.');
          }
          if (options.stripAnsi) {
            throw new Error('--strip-ansi works on text arguments only.');
          }
          const bytes = await readAllBytes(ctx.stdin);
          console.log(String(calculator.stringWidth(bytes, start, end)));
          return;
        }

        const joined = words.join(' ');
        const text = options.stripAnsi ? visibleText(joined) : joined;
        console.log(String(calculator.stringWidth(text, start, end)));
      }),
    );
}

#!/usr/bin/env node
import { createProgram } from './commands/index.js';
import { createCommandContext } from './services/context.js';
import { error, useColor } from './utils/terminal.js';

async function main(): Promise<void> {
  const ctx = await createCommandContext();
  useColor(ctx.config.style, ctx.env);

  const program = createProgram(ctx);
  await program.parseAsync(process.argv);

  if (process.argv.length <= 2) {
    program.outputHelp();
  }
}

main().catch((e: unknown) => {
  error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});

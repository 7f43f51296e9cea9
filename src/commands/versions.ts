import type { Command } from 'commander';
import { loadDefaultTableStore } from '../core/tables.js';
import { listUnicodeVersions, resolveUnicodeVersion } from '../core/version.js';
import type { CommandContext } from '../services/context.js';
import { requestedVersion, runAction } from './command-utils.js';

export function registerVersionsCommand(program: Command, ctx: CommandContext): void {
  program
    .command('versions')
    .alias('v')
    .description('List the tabulated Unicode versions, marking the one in use')
    .option('-r, --resolve <version>', 'Print the tabulated version a request resolves to')
    .action((options: { resolve?: string }) =>
      runAction(() => {
        const store = loadDefaultTableStore();
        if (options.resolve !== undefined) {
          console.log(resolveUnicodeVersion(options.resolve, { versions: store.versions, env: ctx.env }));
          return;
        }

        const active = resolveUnicodeVersion(requestedVersion(program, ctx), {
          versions: store.versions,
          env: ctx.env,
        });
        for (const version of listUnicodeVersions(store)) {
          console.log(`${version === active ? '*' : ' '} ${version}`);
        }
      }),
    );
}

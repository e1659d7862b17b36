import { Command } from 'commander';

import type { CliOptions } from '#core/config';

export interface ProgramHooks {
  version: string;
  run: (pathArg: string, options: CliOptions) => Promise<void>;
}

export function createProgram({ version, run }: ProgramHooks): Command {
  return new Command('dusk')
    .description('Browse disk usage of a directory tree in the terminal')
    .version(version)
    .argument('[path]', 'directory to scan', '.')
    .option('-x, --one-file-system', 'stay on the filesystem of the scanned directory')
    .option('-L, --follow-links', 'follow symbolic links')
    .option(
      '--propagate-refresh',
      'after a refresh, apply the size change to the parent directories too'
    )
    .action(async (pathArg: string, options: CliOptions) => {
      await run(pathArg, options);
    });
}

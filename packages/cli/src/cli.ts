import yargs from 'yargs';
import { errorMessage } from '@pinebridge/shared';
import { withGlobalOptions } from './options.ts';
import { initCommand } from './commands/init.ts';
import { serveCommand } from './commands/serve.ts';
import { probeCommand } from './commands/probe.ts';
import { readCommand, writeCommand } from './commands/memory.ts';
import { infoCommand } from './commands/info.ts';
import { stateCommand } from './commands/state.ts';

export function buildCli(args: string[]) {
  return withGlobalOptions(yargs(args))
    .scriptName('pinebridge')
    .usage('$0 <command> [options]')
    .command(initCommand)
    .command(serveCommand)
    .command(probeCommand)
    .command(readCommand)
    .command(writeCommand)
    .command(infoCommand)
    .command(stateCommand)
    .demandCommand(1, 'You need at least one command')
    .strict()
    .fail(false)
    .help();
}

/** Runs one command line. Failures are printed and leave exit code 1. */
export async function runCli(args: string[]): Promise<void> {
  try {
    await buildCli(args).parseAsync();
  } catch (err) {
    console.error(errorMessage(err));
    process.exitCode = 1;
  }
}

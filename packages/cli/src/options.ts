import type { Argv } from 'yargs';
import { LOG_LEVELS, LOG_LEVEL_ENV } from '@pinebridge/shared';

export function withGlobalOptions(argv: Argv) {
  return argv
    .option('project', {
      alias: 'p',
      describe: 'Directory holding pinebridge.json',
      type: 'string',
      default: process.cwd(),
    })
    .option('target', {
      alias: 't',
      describe: 'Emulator to talk to (pcsx2, rpcs3); probes the known ones when omitted',
      type: 'string',
    })
    .option('slot', {
      alias: 's',
      describe: 'PINE slot, overriding the target default',
      type: 'number',
    })
    .option('log-level', {
      describe: `Log level (also ${LOG_LEVEL_ENV})`,
      type: 'string',
      choices: LOG_LEVELS,
    })
    .option('json', {
      describe: 'Output as JSON',
      type: 'boolean',
      default: false,
    });
}

export type GlobalArgs = ReturnType<typeof withGlobalOptions> extends Argv<infer T> ? T : never;

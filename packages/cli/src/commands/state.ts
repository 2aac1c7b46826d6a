import type { CommandModule } from 'yargs';
import { buildRequest } from '@pinebridge/core';
import type { GlobalArgs } from '../options.ts';
import { createContext, resolveClient } from '../resolve-session.ts';
import { reportAnswer } from '../report.ts';

type StateArgs = GlobalArgs & { action: string; 'save-slot': string };

export const stateCommand: CommandModule<GlobalArgs, StateArgs> = {
  command: 'state <action> <save-slot>',
  describe: 'Save or load an emulator save-state slot',
  builder: (yargs) =>
    yargs
      .positional('action', {
        describe: 'save or load',
        type: 'string',
        choices: ['save', 'load'] as const,
        demandOption: true,
      })
      .positional('save-slot', {
        describe: 'Save-state slot (0-255)',
        type: 'string',
        demandOption: true,
      }),
  handler: async (argv) => {
    const ctx = createContext(argv);
    const request = buildRequest(`${argv.action}State`, { slot: argv['save-slot'] });
    const { client } = await resolveClient(argv, ctx);
    reportAnswer(await client.execute(request), argv.json);
  },
};

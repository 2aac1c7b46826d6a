import type { CommandModule } from 'yargs';
import { buildRequest } from '@pinebridge/core';
import type { GlobalArgs } from '../options.ts';
import { createContext, resolveClient } from '../resolve-session.ts';
import { reportAnswer } from '../report.ts';

const WIDTHS = [8, 16, 32, 64] as const;

type ReadArgs = GlobalArgs & { width: number; address: string };
type WriteArgs = ReadArgs & { data: string };

export const readCommand: CommandModule<GlobalArgs, ReadArgs> = {
  command: 'read <width> <address>',
  describe: 'Read one value from emulator memory',
  builder: (yargs) =>
    yargs
      .positional('width', {
        describe: 'Value width in bits',
        type: 'number',
        choices: WIDTHS,
        demandOption: true,
      })
      .positional('address', {
        describe: 'Address (decimal or 0x hex)',
        type: 'string',
        demandOption: true,
      }),
  handler: async (argv) => {
    const ctx = createContext(argv);
    const request = buildRequest(`read${argv.width}`, { address: argv.address });
    const { client } = await resolveClient(argv, ctx);
    reportAnswer(await client.execute(request), argv.json);
  },
};

export const writeCommand: CommandModule<GlobalArgs, WriteArgs> = {
  command: 'write <width> <address> <data>',
  describe: 'Write one value to emulator memory',
  builder: (yargs) =>
    yargs
      .positional('width', {
        describe: 'Value width in bits',
        type: 'number',
        choices: WIDTHS,
        demandOption: true,
      })
      .positional('address', {
        describe: 'Address (decimal or 0x hex)',
        type: 'string',
        demandOption: true,
      })
      .positional('data', {
        describe: 'Value to write (decimal or 0x hex)',
        type: 'string',
        demandOption: true,
      }),
  handler: async (argv) => {
    const ctx = createContext(argv);
    const request = buildRequest(`write${argv.width}`, { address: argv.address, data: argv.data });
    const { client } = await resolveClient(argv, ctx);
    reportAnswer(await client.execute(request), argv.json);
  },
};

import type { CommandModule } from 'yargs';
import { buildRequest } from '@pinebridge/core';
import type { GlobalArgs } from '../options.ts';
import { createContext, resolveClient } from '../resolve-session.ts';
import { reportAnswer } from '../report.ts';

const FIELDS = ['version', 'title', 'id', 'uuid', 'game-version', 'status'] as const;

type InfoArgs = GlobalArgs & { field: string };

export const infoCommand: CommandModule<GlobalArgs, InfoArgs> = {
  command: 'info <field>',
  describe: 'Ask the emulator about itself or the running game',
  builder: (yargs) =>
    yargs.positional('field', {
      describe: 'What to ask for',
      type: 'string',
      choices: FIELDS,
      demandOption: true,
    }),
  handler: async (argv) => {
    const ctx = createContext(argv);
    const request = buildRequest(argv.field, {});
    const { client } = await resolveClient(argv, ctx);
    reportAnswer(await client.execute(request), argv.json);
  },
};

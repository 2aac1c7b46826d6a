import type { CommandModule } from 'yargs';
import { PineConnection, TARGET_NAMES, describeTransport, resolveTransport } from '@pinebridge/core';
import { errorMessage, type Logger } from '@pinebridge/shared';
import type { GlobalArgs } from '../options.ts';
import { createContext, formatJson } from '../resolve-session.ts';

export interface ProbeResult {
  target: string;
  address?: string;
  reachable: boolean;
  error?: string;
}

export async function probeTarget(
  target: string,
  slot: number,
  timeoutMs: number | undefined,
  logger: Logger,
): Promise<ProbeResult> {
  let connection: PineConnection;
  try {
    connection = new PineConnection(resolveTransport(target, slot), { timeoutMs, logger });
  } catch (err) {
    return { target, reachable: false, error: errorMessage(err) };
  }
  const address = describeTransport(connection.transport);
  try {
    await connection.probe();
    return { target, address, reachable: true };
  } catch (err) {
    return { target, address, reachable: false, error: errorMessage(err) };
  }
}

export const probeCommand: CommandModule<GlobalArgs, GlobalArgs> = {
  command: 'probe',
  describe: 'Check which emulators answer on their PINE socket',
  handler: async (argv) => {
    const { config, logger } = createContext(argv);
    const targets = argv.target !== undefined ? [argv.target] : config.session?.targets ?? TARGET_NAMES;

    const results: ProbeResult[] = [];
    for (const target of targets) {
      results.push(await probeTarget(target, argv.slot ?? 0, config.session?.timeoutMs, logger));
    }

    if (argv.json) {
      console.log(formatJson(results));
    } else {
      for (const r of results) {
        const where = r.address ? ` ${r.address}` : '';
        console.log(r.reachable ? `${r.target}: up${where}` : `${r.target}: down${where} (${r.error ?? 'unknown error'})`);
      }
    }
    if (!results.some((r) => r.reachable)) process.exitCode = 1;
  },
};

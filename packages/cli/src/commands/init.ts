import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { CommandModule } from 'yargs';
import {
  CONFIG_FILENAME,
  DEFAULT_EXCHANGE_TIMEOUT_MS,
  DEFAULT_PROBE_INTERVAL_MS,
  TARGET_NAMES,
  writeProjectConfig,
  type ProjectConfig,
} from '@pinebridge/core';
import { DEFAULT_HOST, DEFAULT_PORT } from '@pinebridge/server';
import type { GlobalArgs } from '../options.ts';

type InitArgs = GlobalArgs & { force: boolean };

export function defaultConfig(targets: readonly string[] = TARGET_NAMES): ProjectConfig {
  return {
    server: { port: DEFAULT_PORT, host: DEFAULT_HOST },
    session: {
      targets: [...targets],
      probeIntervalMs: DEFAULT_PROBE_INTERVAL_MS,
      timeoutMs: DEFAULT_EXCHANGE_TIMEOUT_MS,
    },
    log: { level: 'info' },
  };
}

export const initCommand: CommandModule<GlobalArgs, InitArgs> = {
  command: 'init',
  describe: `Create a ${CONFIG_FILENAME} with the defaults`,
  builder: (yargs) =>
    yargs.option('force', {
      alias: 'f',
      describe: 'Overwrite existing config',
      type: 'boolean',
      default: false,
    }),
  handler: (argv) => {
    const projectDir = argv.project;
    const configPath = join(projectDir, CONFIG_FILENAME);

    if (existsSync(configPath) && !argv.force) {
      console.error(`${CONFIG_FILENAME} already exists. Use --force to overwrite.`);
      process.exitCode = 1;
      return;
    }

    writeProjectConfig(projectDir, defaultConfig(argv.target !== undefined ? [argv.target] : TARGET_NAMES));
    console.log(`Created ${configPath}`);
  },
};

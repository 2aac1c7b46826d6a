import {
  PineClient,
  PineConnection,
  SessionManager,
  loadProjectConfig,
  resolveTransport,
  type ProjectConfig,
} from '@pinebridge/core';
import {
  ConnectionError,
  LOG_LEVEL_ENV,
  ParameterError,
  createLogger,
  type Logger,
} from '@pinebridge/shared';
import type { GlobalArgs } from './options.ts';

export interface CliContext {
  projectDir: string;
  config: ProjectConfig;
  logger: Logger;
}

/**
 * Loads the project config and builds the logger. The level comes from
 * `--log-level`, then the environment, then the config, then `fallbackLevel`.
 */
export function createContext(argv: GlobalArgs, fallbackLevel = 'warn'): CliContext {
  const projectDir = argv.project;
  const bootLogger = createLogger({ level: argv['log-level'] ?? process.env[LOG_LEVEL_ENV], destination: 2 });
  const config = loadProjectConfig(projectDir, bootLogger);
  const logger = createLogger({
    level: argv['log-level'] ?? process.env[LOG_LEVEL_ENV] ?? config.log?.level ?? fallbackLevel,
    pretty: process.stderr.isTTY === true,
    destination: 2,
  });
  return { projectDir, config, logger };
}

export interface ResolvedClient {
  client: PineClient;
  target: string;
}

/**
 * With `--target`, talks to that emulator directly (on `--slot` when given).
 * Otherwise probes the configured targets on their default slots and uses
 * the first that answers.
 */
export async function resolveClient(argv: GlobalArgs, ctx: CliContext): Promise<ResolvedClient> {
  const { config, logger } = ctx;
  const timeoutMs = config.session?.timeoutMs;

  if (argv.target !== undefined) {
    const connection = new PineConnection(resolveTransport(argv.target, argv.slot ?? 0), { timeoutMs, logger });
    return { client: new PineClient(connection, logger), target: argv.target };
  }
  if (argv.slot !== undefined) {
    throw new ParameterError('--slot needs --target');
  }

  const session = new SessionManager({ targets: config.session?.targets, timeoutMs, logger });
  const connection = await session.connectOnce();
  if (!connection) {
    throw new ConnectionError('no known emulator is answering on its default slot');
  }
  return { client: new PineClient(connection, logger), target: connection.target };
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

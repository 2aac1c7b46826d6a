import type { CommandModule } from 'yargs';
import { SessionManager } from '@pinebridge/core';
import { createApp, startServer } from '@pinebridge/server';
import { ParameterError, errorMessage } from '@pinebridge/shared';
import type { GlobalArgs } from '../options.ts';
import { createContext } from '../resolve-session.ts';

type ServeArgs = GlobalArgs & { port: number | undefined; host: string | undefined };

export const serveCommand: CommandModule<GlobalArgs, ServeArgs> = {
  command: 'serve',
  describe: 'Keep a PINE session open and expose it over HTTP',
  builder: (yargs) =>
    yargs
      .option('port', {
        describe: 'Port to listen on (default: 6669)',
        type: 'number',
      })
      .option('host', {
        describe: 'Interface to bind (default: localhost)',
        type: 'string',
      }),
  handler: async (argv) => {
    if (argv.slot !== undefined) {
      throw new ParameterError('serve probes default slots only; --slot is not supported');
    }
    const { config, logger } = createContext(argv, 'info');

    const session = new SessionManager({
      targets: argv.target !== undefined ? [argv.target] : config.session?.targets,
      probeIntervalMs: config.session?.probeIntervalMs,
      timeoutMs: config.session?.timeoutMs,
      logger,
    });

    // Supervisor starts only once the port is bound.
    const server = await startServer(createApp({ session, logger }), {
      port: argv.port ?? config.server?.port,
      host: argv.host ?? config.server?.host,
      logger,
    });
    session.start();

    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info({ signal }, 'shutting down');
      server.close();
      session.stop().then(
        () => logger.info('session stopped'),
        (err: unknown) => logger.error({ err: errorMessage(err) }, 'failed to stop session'),
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  },
};

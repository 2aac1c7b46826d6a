import { Hono } from 'hono';
import { cors } from 'hono/cors';
import {
  FrameError,
  NotConnectedError,
  PinebridgeError,
  isTransportError,
  type Logger,
} from '@pinebridge/shared';
import type { PineSender, SessionState } from '@pinebridge/core';
import { pineRoutes } from './routes/pine.ts';
import { sessionRoutes } from './routes/session.ts';

export const DEFAULT_PORT = 6669;
export const DEFAULT_HOST = 'localhost';

/** What the API needs from a session: a way to send frames and its current state. */
export interface PineSession extends PineSender {
  readonly state: SessionState;
}

export interface AppOptions {
  session: PineSession;
  logger?: Logger;
}

export type AppContext = {
  Variables: {
    session: PineSession;
    logger: Logger | undefined;
  };
};

type ErrorStatus = 400 | 500 | 502 | 503;

function errorStatus(err: Error): ErrorStatus {
  if (err instanceof NotConnectedError) return 503;
  if (err instanceof FrameError || isTransportError(err)) return 502;
  if (err instanceof PinebridgeError) {
    switch (err.code) {
      case 'UNKNOWN_OPERATION':
      case 'INVALID_PARAMETER':
        return 400;
      default:
        return 500;
    }
  }
  return 500;
}

export function createApp(options: AppOptions) {
  const { session, logger } = options;
  const app = new Hono<AppContext>();

  app.use('*', cors());

  app.use('*', async (c, next) => {
    c.set('session', session);
    c.set('logger', logger);
    await next();
  });

  app.onError((err, c) => {
    const status = errorStatus(err);
    if (status >= 500) {
      logger?.error({ err, path: c.req.path }, 'request failed');
    } else {
      logger?.debug({ err: err.message, path: c.req.path }, 'rejected request');
    }
    return c.json({ errMessage: err.message }, status);
  });

  app.route('/', sessionRoutes);
  app.route('/', pineRoutes);

  return app;
}

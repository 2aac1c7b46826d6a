import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const LOG_LEVEL_ENV = 'PINEBRIDGE_LOG_LEVEL';

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  name?: string;
  /** File descriptor written to; 2 keeps stdout free for command output. */
  destination?: 1 | 2;
}

export function parseLogLevel(value: string | undefined): LevelWithSilent | undefined {
  if (!value) return undefined;
  const lower = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = parseLogLevel(options.level) ?? 'info';
  const name = options.name ?? 'pinebridge';
  const destination = options.destination ?? 1;
  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', destination },
      },
    });
  }
  return pino({ name, level }, pino.destination(destination));
}

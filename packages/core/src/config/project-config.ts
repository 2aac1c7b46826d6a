import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError, errorMessage, parseLogLevel, type Logger } from '@pinebridge/shared';

export interface ProjectConfig {
  server?: { port?: number; host?: string };
  session?: { targets?: string[]; probeIntervalMs?: number; timeoutMs?: number };
  log?: { level?: string };
}

export const CONFIG_FILENAME = 'pinebridge.json';

export function loadProjectConfig(projectDir: string, logger?: Logger): ProjectConfig {
  const filePath = join(projectDir, CONFIG_FILENAME);
  if (!existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`failed to parse ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  return validateConfig(raw, filePath, logger);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function warnUnknownKeys(
  obj: Record<string, unknown>,
  known: readonly string[],
  where: string,
  filePath: string,
  logger?: Logger,
): void {
  for (const key of Object.keys(obj)) {
    if (!known.includes(key)) {
      logger?.warn({ file: filePath, key: where ? `${where}.${key}` : key }, 'unknown config key');
    }
  }
}

export function validateConfig(raw: unknown, filePath: string, logger?: Logger): ProjectConfig {
  if (!isObject(raw)) {
    throw new ConfigError(`${filePath}: config must be a JSON object`);
  }

  const config: ProjectConfig = {};
  warnUnknownKeys(raw, ['server', 'session', 'log'], '', filePath, logger);

  // server
  if (raw['server'] !== undefined) {
    const server = raw['server'];
    if (!isObject(server)) throw new ConfigError(`${filePath}: "server" must be an object`);
    warnUnknownKeys(server, ['port', 'host'], 'server', filePath, logger);
    config.server = {};
    if (server['port'] !== undefined) {
      const port = server['port'];
      if (!isPositiveInteger(port) || port > 65535) {
        throw new ConfigError(`${filePath}: "server.port" must be an integer between 1 and 65535`);
      }
      config.server.port = port;
    }
    if (server['host'] !== undefined) {
      const host = server['host'];
      if (typeof host !== 'string' || host.trim().length === 0) {
        throw new ConfigError(`${filePath}: "server.host" must be a non-empty string`);
      }
      config.server.host = host;
    }
  }

  // session
  if (raw['session'] !== undefined) {
    const session = raw['session'];
    if (!isObject(session)) throw new ConfigError(`${filePath}: "session" must be an object`);
    warnUnknownKeys(session, ['targets', 'probeIntervalMs', 'timeoutMs'], 'session', filePath, logger);
    config.session = {};
    if (session['targets'] !== undefined) {
      const targets = session['targets'];
      if (!Array.isArray(targets) || targets.length === 0) {
        throw new ConfigError(`${filePath}: "session.targets" must be a non-empty array of target names`);
      }
      const names: string[] = [];
      for (const name of targets) {
        if (typeof name !== 'string' || name.length === 0) {
          throw new ConfigError(`${filePath}: "session.targets" entries must be non-empty strings`);
        }
        names.push(name);
      }
      config.session.targets = names;
    }
    if (session['probeIntervalMs'] !== undefined) {
      const interval = session['probeIntervalMs'];
      if (!isPositiveInteger(interval)) {
        throw new ConfigError(`${filePath}: "session.probeIntervalMs" must be a positive integer`);
      }
      config.session.probeIntervalMs = interval;
    }
    if (session['timeoutMs'] !== undefined) {
      const timeout = session['timeoutMs'];
      if (!isPositiveInteger(timeout)) {
        throw new ConfigError(`${filePath}: "session.timeoutMs" must be a positive integer`);
      }
      config.session.timeoutMs = timeout;
    }
  }

  // log
  if (raw['log'] !== undefined) {
    const log = raw['log'];
    if (!isObject(log)) throw new ConfigError(`${filePath}: "log" must be an object`);
    warnUnknownKeys(log, ['level'], 'log', filePath, logger);
    config.log = {};
    if (log['level'] !== undefined) {
      const level = log['level'];
      if (typeof level !== 'string' || parseLogLevel(level) === undefined) {
        throw new ConfigError(`${filePath}: "log.level" must be one of trace, debug, info, warn, error, fatal, silent`);
      }
      config.log.level = level;
    }
  }

  return config;
}

export function writeProjectConfig(projectDir: string, config: ProjectConfig): void {
  const filePath = join(projectDir, CONFIG_FILENAME);
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n');
}

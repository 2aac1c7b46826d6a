import { posix } from 'node:path';
import {
  ConfigError,
  InvalidTargetError,
  UnknownTargetError,
  UnsupportedPlatformError,
} from '@pinebridge/shared';
import { TARGET_NAMES, findTarget } from '../targets.ts';

export const LOOPBACK_HOST = '127.0.0.1';
export const FALLBACK_SOCKET_DIR = '/tmp';
const MAX_SLOT = 0xffff;

const SOCKET_PLATFORMS: ReadonlySet<string> = new Set(['linux', 'darwin', 'freebsd', 'openbsd', 'netbsd']);

/** Runtime directory variable consulted per platform. */
const RUNTIME_DIR_ENV: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'XDG_RUNTIME_DIR',
  darwin: 'TMPDIR',
};

export type TransportDescriptor =
  | {
      kind: 'socket';
      target: string;
      slot: number;
      path: string;
      /** Same path without the `.<slot>` suffix. */
      fallbackPath: string;
    }
  | {
      kind: 'tcp';
      target: string;
      slot: number;
      host: string;
      port: number;
    };

export interface ResolveOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
}

export function resolveTransport(
  target: string,
  slotOverride = 0,
  options: ResolveOptions = {},
): TransportDescriptor {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;

  if (target === '') throw new InvalidTargetError();
  const slot = resolveSlot(target, slotOverride);

  if (platform === 'win32') {
    return { kind: 'tcp', target, slot, host: LOOPBACK_HOST, port: slot };
  }
  if (!SOCKET_PLATFORMS.has(platform)) {
    throw new UnsupportedPlatformError(platform);
  }

  // The slot is always appended even though emulators on their default slot
  // may leave it off; the connection falls back to the slot-less name.
  const path = posix.join(socketDirectory(platform, env), `${target}.sock.${slot}`);
  return { kind: 'socket', target, slot, path, fallbackPath: stripSlotSuffix(path) };
}

function resolveSlot(target: string, slotOverride: number): number {
  if (slotOverride === 0) {
    const known = findTarget(target);
    if (!known) throw new UnknownTargetError(target, TARGET_NAMES);
    return known.defaultSlot;
  }
  if (!Number.isInteger(slotOverride) || slotOverride < 0 || slotOverride > MAX_SLOT) {
    throw new ConfigError(`slot must be an integer between 1 and ${MAX_SLOT}, got ${slotOverride}`);
  }
  return slotOverride;
}

function socketDirectory(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): string {
  const variable = RUNTIME_DIR_ENV[platform];
  const dir = variable ? env[variable] : undefined;
  return dir ? dir : FALLBACK_SOCKET_DIR;
}

export function stripSlotSuffix(path: string): string {
  const dot = path.lastIndexOf('.');
  return dot === -1 ? path : path.slice(0, dot);
}

export function describeTransport(transport: TransportDescriptor): string {
  return transport.kind === 'tcp' ? `${transport.host}:${transport.port}` : transport.path;
}

import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import {
  ExclusiveQueue,
  NotConnectedError,
  errorMessage,
  isTransportError,
  type Logger,
} from '@pinebridge/shared';
import { TARGET_NAMES } from '../targets.ts';
import { PineConnection, type PineSender } from '../transport/connection.ts';
import { describeTransport, resolveTransport, type ResolveOptions } from '../transport/resolver.ts';

export const DEFAULT_PROBE_INTERVAL_MS = 5_000;

export type SessionState =
  | { status: 'disconnected' }
  | { status: 'probing'; target: string }
  | { status: 'connected'; target: string };

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SessionManagerOptions {
  /** Targets probed on their default slot, in order. */
  targets?: readonly string[];
  probeIntervalMs?: number;
  timeoutMs?: number;
  resolve?: ResolveOptions;
  logger?: Logger;
  sleep?: Sleep;
}

async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

/**
 * Keeps at most one validated PINE connection. The supervisor started by
 * `start()` probes the known targets until one answers, then waits until
 * the connection is dropped and probes again.
 *
 * Emits `state` with the new {@link SessionState} on every transition.
 */
export class SessionManager extends EventEmitter implements PineSender {
  private readonly targets: readonly string[];
  private readonly probeIntervalMs: number;
  private readonly timeoutMs?: number;
  private readonly resolveOptions: ResolveOptions;
  private readonly logger?: Logger;
  private readonly sleep: Sleep;
  // One lock for every connection this session ever creates.
  private readonly queue = new ExclusiveQueue();

  private connection: PineConnection | null = null;
  private currentState: SessionState = { status: 'disconnected' };
  private supervisor: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  private wakeSupervisor: (() => void) | null = null;

  constructor(options: SessionManagerOptions = {}) {
    super();
    this.targets = options.targets ?? TARGET_NAMES;
    this.probeIntervalMs = options.probeIntervalMs ?? DEFAULT_PROBE_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs;
    this.resolveOptions = options.resolve ?? {};
    this.logger = options.logger;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get activeConnection(): PineConnection | null {
    return this.connection;
  }

  get running(): boolean {
    return this.supervisor !== null;
  }

  /** One pass over the targets. Commits to the first one whose probe succeeds. */
  async connectOnce(): Promise<PineConnection | null> {
    for (const target of this.targets) {
      let connection: PineConnection;
      try {
        connection = new PineConnection(resolveTransport(target, 0, this.resolveOptions), {
          timeoutMs: this.timeoutMs,
          queue: this.queue,
          logger: this.logger,
        });
      } catch (err) {
        this.logger?.warn({ target, err: errorMessage(err) }, 'cannot resolve PINE transport, skipping target');
        continue;
      }

      this.setState({ status: 'probing', target });
      try {
        await connection.probe();
      } catch (err) {
        this.logger?.info({ target, err: errorMessage(err) }, 'probe failed, continuing to next target');
        continue;
      }

      this.connection = connection;
      this.logger?.info({ target, address: describeTransport(connection.transport) }, 'probe succeeded');
      this.setState({ status: 'connected', target });
      return connection;
    }

    this.setState({ status: 'disconnected' });
    return null;
  }

  start(): void {
    if (this.supervisor) return;
    const controller = new AbortController();
    this.abortController = controller;
    this.supervisor = this.supervise(controller.signal);
  }

  async stop(): Promise<void> {
    this.abortController?.abort();
    await this.supervisor;
    this.supervisor = null;
    this.abortController = null;
  }

  /** Demotes the active connection; a running supervisor starts probing again. */
  drop(reason?: unknown): void {
    const connection = this.connection;
    if (!connection) return;
    this.logger?.warn(
      { target: connection.target, reason: reason === undefined ? undefined : errorMessage(reason) },
      'dropping PINE connection',
    );
    this.connection = null;
    this.setState({ status: 'disconnected' });
    this.wakeSupervisor?.();
  }

  async send(request: Buffer): Promise<Buffer> {
    const connection = this.connection;
    if (!connection) throw new NotConnectedError();
    try {
      return await connection.send(request);
    } catch (err) {
      if (isTransportError(err) && this.connection === connection) {
        this.drop(err);
      }
      throw err;
    }
  }

  private async supervise(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (this.connection) {
        await this.waitForDrop(signal);
        continue;
      }

      this.logger?.info({ targets: this.targets }, 'trying to connect to known emulators on default slots');
      const connection = await this.connectOnce();
      if (connection || signal.aborted) continue;

      this.logger?.info(
        { retryInMs: this.probeIntervalMs },
        'could not connect to any target, sleeping before the next attempt',
      );
      await this.sleep(this.probeIntervalMs, signal);
    }
  }

  private waitForDrop(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const wake = (): void => {
        signal.removeEventListener('abort', wake);
        this.wakeSupervisor = null;
        resolve();
      };
      this.wakeSupervisor = wake;
      signal.addEventListener('abort', wake, { once: true });
    });
  }

  private setState(next: SessionState): void {
    const prev = this.currentState;
    this.currentState = next;
    if (prev.status === next.status && targetOf(prev) === targetOf(next)) return;
    this.logger?.debug({ from: prev, to: next }, 'session state changed');
    this.emit('state', next);
  }
}

function targetOf(state: SessionState): string | undefined {
  return state.status === 'disconnected' ? undefined : state.target;
}

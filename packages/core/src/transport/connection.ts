import { createConnection, type NetConnectOpts, type Socket } from 'node:net';
import {
  ConnectionError,
  ExclusiveQueue,
  TimeoutError,
  errorMessage,
  hexDump,
  type Logger,
} from '@pinebridge/shared';
import { describeTransport, type TransportDescriptor } from './resolver.ts';

export const DEFAULT_EXCHANGE_TIMEOUT_MS = 15_000;

/** Anything that can carry one request frame to an emulator and return its answer frame. */
export interface PineSender {
  send(request: Buffer): Promise<Buffer>;
}

export interface PineConnectionOptions {
  /** Deadline for the write and read phases of one exchange. */
  timeoutMs?: number;
  /** Lock shared by every connection that must not overlap with this one. */
  queue?: ExclusiveQueue;
  logger?: Logger;
}

/**
 * Describes how to reach one emulator. No socket is held between calls:
 * every `send` dials, writes, half-closes, reads to end-of-stream and closes.
 */
export class PineConnection implements PineSender {
  readonly transport: TransportDescriptor;
  private readonly timeoutMs: number;
  private readonly queue: ExclusiveQueue;
  private readonly logger?: Logger;

  constructor(transport: TransportDescriptor, options: PineConnectionOptions = {}) {
    this.transport = transport;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EXCHANGE_TIMEOUT_MS;
    this.queue = options.queue ?? new ExclusiveQueue();
    this.logger = options.logger;
  }

  get target(): string {
    return this.transport.target;
  }

  /** Opens and closes a connection without exchanging anything. */
  async probe(): Promise<void> {
    const socket = await this.dial();
    await closeSocket(socket);
  }

  async send(request: Buffer): Promise<Buffer> {
    return this.queue.run(async () => {
      this.logFrame('PINE request', request);
      const socket = await this.dial();
      const answer = await this.exchange(socket, request);
      this.logFrame('PINE answer', answer);
      return answer;
    });
  }

  private logFrame(message: string, frame: Buffer): void {
    if (!this.logger?.isLevelEnabled('debug')) return;
    this.logger.debug({ target: this.target, bytes: frame.length, frame: `\n${hexDump(frame)}` }, message);
  }

  private async dial(): Promise<Socket> {
    const t = this.transport;
    if (t.kind === 'tcp') {
      try {
        return await connectSocket({ host: t.host, port: t.port });
      } catch (err) {
        throw new ConnectionError(
          `could not connect to PINE for ${t.target} at ${describeTransport(t)}: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    }

    try {
      return await connectSocket({ path: t.path });
    } catch (primaryErr) {
      this.logger?.debug(
        { target: t.target, path: t.path, err: errorMessage(primaryErr) },
        'PINE socket unavailable, trying slot-less path',
      );
    }
    try {
      return await connectSocket({ path: t.fallbackPath });
    } catch (err) {
      throw new ConnectionError(
        `could not connect to PINE for ${t.target} at "${t.path}" or "${t.fallbackPath}": ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  /** Settles only after the socket has closed. */
  private exchange(socket: Socket, request: Buffer): Promise<Buffer> {
    const target = this.target;
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let ended = false;
      let failure: Error | null = null;

      const fail = (err: Error): void => {
        failure ??= err;
        socket.destroy();
      };

      const timer = setTimeout(
        () => fail(new TimeoutError(`PINE exchange with ${target} timed out after ${this.timeoutMs} ms`)),
        this.timeoutMs,
      );

      socket.on('data', (chunk: Buffer) => chunks.push(chunk));
      socket.on('end', () => {
        ended = true;
        socket.destroy();
      });
      socket.on('error', (err) => {
        fail(new ConnectionError(`PINE socket error for ${target}: ${err.message}`, { cause: err }));
      });
      socket.on('close', () => {
        clearTimeout(timer);
        if (failure) {
          reject(failure);
        } else if (!ended) {
          reject(new ConnectionError(`PINE connection to ${target} closed before the answer was complete`));
        } else {
          resolve(Buffer.concat(chunks));
        }
      });

      // Write everything, then half-close so the emulator sees end-of-request.
      socket.end(request);
    });
  }
}

function connectSocket(options: NetConnectOpts): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = createConnection(options);
    const onError = (err: Error): void => {
      socket.destroy();
      reject(err);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

function closeSocket(socket: Socket): Promise<void> {
  return new Promise((resolve) => {
    socket.once('close', () => resolve());
    socket.destroy();
  });
}

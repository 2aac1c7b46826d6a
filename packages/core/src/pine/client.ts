import { ParameterError, ProtocolError, type Logger } from '@pinebridge/shared';
import type { PineSender } from '../transport/connection.ts';
import { decodeAnswer, encodeRequest } from './codec.ts';
import {
  EMULATOR_STATUS,
  type AnswerOf,
  type BitWidth,
  type EmulatorStatus,
  type PineRequest,
  type ReadKind,
  type WriteKind,
} from './types.ts';

export class PineClient {
  private readonly sender: PineSender;
  private readonly logger?: Logger;

  constructor(sender: PineSender, logger?: Logger) {
    this.sender = sender;
    this.logger = logger;
  }

  async execute<R extends PineRequest>(request: R): Promise<AnswerOf<R['kind']>> {
    const frame = encodeRequest(request);
    const answerFrame = await this.sender.send(frame);
    try {
      const answer = decodeAnswer<R['kind']>(request.kind, answerFrame);
      this.logger?.debug({ kind: request.kind, resultCode: answer.resultCode }, 'PINE exchange complete');
      return answer;
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.logger?.error({ kind: request.kind, err }, 'could not decode PINE answer');
      }
      throw err;
    }
  }

  /** Reads one value of `width` bits; 64-bit values come back as bigint. */
  async read(width: BitWidth, address: number): Promise<AnswerOf<ReadKind>> {
    switch (width) {
      case 8:
        return this.read8(address);
      case 16:
        return this.read16(address);
      case 32:
        return this.read32(address);
      case 64:
        return this.read64(address);
    }
  }

  async write(width: BitWidth, address: number, data: number | bigint): Promise<AnswerOf<WriteKind>> {
    switch (width) {
      case 8:
        return this.write8(address, Number(data));
      case 16:
        return this.write16(address, Number(data));
      case 32:
        return this.write32(address, Number(data));
      case 64:
        if (typeof data === 'number' && !Number.isSafeInteger(data)) {
          throw new ParameterError(`data ${data} does not fit in 64 bits for write64 request`);
        }
        return this.write64(address, BigInt(data));
    }
  }

  read8(address: number) {
    return this.execute({ kind: 'read8', address });
  }

  read16(address: number) {
    return this.execute({ kind: 'read16', address });
  }

  read32(address: number) {
    return this.execute({ kind: 'read32', address });
  }

  read64(address: number) {
    return this.execute({ kind: 'read64', address });
  }

  write8(address: number, data: number) {
    return this.execute({ kind: 'write8', address, data });
  }

  write16(address: number, data: number) {
    return this.execute({ kind: 'write16', address, data });
  }

  write32(address: number, data: number) {
    return this.execute({ kind: 'write32', address, data });
  }

  write64(address: number, data: bigint) {
    return this.execute({ kind: 'write64', address, data });
  }

  version() {
    return this.execute({ kind: 'version' });
  }

  title() {
    return this.execute({ kind: 'title' });
  }

  id() {
    return this.execute({ kind: 'id' });
  }

  uuid() {
    return this.execute({ kind: 'uuid' });
  }

  gameVersion() {
    return this.execute({ kind: 'gameVersion' });
  }

  status() {
    return this.execute({ kind: 'status' });
  }

  saveState(slot: number) {
    return this.execute({ kind: 'saveState', slot });
  }

  loadState(slot: number) {
    return this.execute({ kind: 'loadState', slot });
  }
}

export function describeStatus(status: number | undefined): EmulatorStatus | 'unknown' {
  if (status === 0 || status === 1 || status === 2) return EMULATOR_STATUS[status];
  return 'unknown';
}

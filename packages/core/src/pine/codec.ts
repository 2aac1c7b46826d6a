import { FrameError, ParameterError } from '@pinebridge/shared';
import {
  HEADER_LENGTH,
  MIN_FRAME_LENGTH,
  OPERATIONS,
  describeAnswerLengths,
  type OperationLayout,
  type RequestField,
  type RequestFieldName,
} from './catalog.ts';
import {
  OPERATION_KINDS,
  type AnswerOf,
  type OperationKind,
  type PineAnswer,
  type PineRequest,
  type StringKind,
} from './types.ts';

const MAX_U64 = (1n << 64n) - 1n;
const STRING_LENGTH_BYTES = 4;

// Requests

export function encodeRequest(request: PineRequest): Buffer {
  const op = OPERATIONS[request.kind];
  const frame = Buffer.alloc(op.requestLength);
  frame.writeUInt32LE(op.requestLength, 0);
  frame.writeUInt8(op.opcode, HEADER_LENGTH);

  let offset = MIN_FRAME_LENGTH;
  for (const field of op.requestFields) {
    writeField(frame, offset, field, fieldValue(request, field.name), request.kind);
    offset += field.width / 8;
  }
  return frame;
}

function fieldValue(request: PineRequest, name: RequestFieldName): number | bigint {
  if (name === 'address' && 'address' in request) return request.address;
  if (name === 'data' && 'data' in request) return request.data;
  if (name === 'slot' && 'slot' in request) return request.slot;
  throw new ParameterError(`${request.kind} request has no ${name}`);
}

function writeField(
  frame: Buffer,
  offset: number,
  field: RequestField,
  value: number | bigint,
  kind: OperationKind,
): void {
  const outOfRange = () =>
    new ParameterError(`${field.name} ${value} does not fit in ${field.width} bits for ${kind} request`);

  if (field.width === 64) {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) throw outOfRange();
    const big = BigInt(value);
    if (big < 0n || big > MAX_U64) throw outOfRange();
    frame.writeBigUInt64LE(big, offset);
    return;
  }

  const max = 2 ** field.width - 1;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
    throw outOfRange();
  }
  frame.writeUIntLE(value, offset, field.width / 8);
}

/** Parses a request frame the way an emulator would. */
export function decodeRequest(bytes: Buffer): PineRequest {
  if (bytes.length < MIN_FRAME_LENGTH) {
    throw new FrameError('short request frame', bytes, `length >= ${MIN_FRAME_LENGTH}`);
  }
  const opcode = bytes.readUInt8(HEADER_LENGTH);
  const kind = OPERATION_KINDS[opcode];
  if (kind === undefined) {
    throw new FrameError(`unknown opcode ${opcode}`, bytes, `opcode 0-${OPERATION_KINDS.length - 1}`);
  }
  const op = OPERATIONS[kind];
  if (bytes.readUInt32LE(0) !== op.requestLength || bytes.length !== op.requestLength) {
    throw new FrameError(`bad ${kind} request length`, bytes, `length ${op.requestLength}`);
  }

  const address = MIN_FRAME_LENGTH;
  const data = MIN_FRAME_LENGTH + 4;
  switch (kind) {
    case 'read8':
    case 'read16':
    case 'read32':
    case 'read64':
      return { kind, address: bytes.readUInt32LE(address) };
    case 'write8':
      return { kind, address: bytes.readUInt32LE(address), data: bytes.readUInt8(data) };
    case 'write16':
      return { kind, address: bytes.readUInt32LE(address), data: bytes.readUInt16LE(data) };
    case 'write32':
      return { kind, address: bytes.readUInt32LE(address), data: bytes.readUInt32LE(data) };
    case 'write64':
      return { kind, address: bytes.readUInt32LE(address), data: bytes.readBigUInt64LE(data) };
    case 'saveState':
    case 'loadState':
      return { kind, slot: bytes.readUInt8(MIN_FRAME_LENGTH) };
    default:
      return { kind };
  }
}

// Answers

type Decoder<K extends OperationKind> = (frame: Buffer, resultCode: number) => AnswerOf<K>;

const hasValue = (frame: Buffer): boolean => frame.length > MIN_FRAME_LENGTH;

const DECODERS: { [K in OperationKind]: Decoder<K> } = {
  read8: (frame, resultCode) =>
    hasValue(frame)
      ? { kind: 'read8', resultCode, memoryValue: frame.readUInt8(MIN_FRAME_LENGTH) }
      : { kind: 'read8', resultCode },
  read16: (frame, resultCode) =>
    hasValue(frame)
      ? { kind: 'read16', resultCode, memoryValue: frame.readUInt16LE(MIN_FRAME_LENGTH) }
      : { kind: 'read16', resultCode },
  read32: (frame, resultCode) =>
    hasValue(frame)
      ? { kind: 'read32', resultCode, memoryValue: frame.readUInt32LE(MIN_FRAME_LENGTH) }
      : { kind: 'read32', resultCode },
  read64: (frame, resultCode) =>
    hasValue(frame)
      ? { kind: 'read64', resultCode, memoryValue: frame.readBigUInt64LE(MIN_FRAME_LENGTH) }
      : { kind: 'read64', resultCode },
  write8: (_frame, resultCode) => ({ kind: 'write8', resultCode }),
  write16: (_frame, resultCode) => ({ kind: 'write16', resultCode }),
  write32: (_frame, resultCode) => ({ kind: 'write32', resultCode }),
  write64: (_frame, resultCode) => ({ kind: 'write64', resultCode }),
  version: (frame, resultCode) => ({ kind: 'version', resultCode, version: readString(frame, 'version') }),
  saveState: (_frame, resultCode) => ({ kind: 'saveState', resultCode }),
  loadState: (_frame, resultCode) => ({ kind: 'loadState', resultCode }),
  title: (frame, resultCode) => ({ kind: 'title', resultCode, title: readString(frame, 'title') }),
  id: (frame, resultCode) => ({ kind: 'id', resultCode, id: readString(frame, 'id') }),
  uuid: (frame, resultCode) => ({ kind: 'uuid', resultCode, uuid: readString(frame, 'uuid') }),
  gameVersion: (frame, resultCode) => ({
    kind: 'gameVersion',
    resultCode,
    gameVersion: readString(frame, 'gameVersion'),
  }),
  status: (frame, resultCode) =>
    hasValue(frame)
      ? { kind: 'status', resultCode, status: frame.readUInt32LE(MIN_FRAME_LENGTH) }
      : { kind: 'status', resultCode },
};

export function decodeAnswer<K extends OperationKind>(kind: K, bytes: Buffer): AnswerOf<K> {
  const frame = checkAnswerFrame(OPERATIONS[kind], bytes);
  const decode: Decoder<K> = DECODERS[kind];
  return decode(frame, frame.readUInt8(HEADER_LENGTH));
}

function checkAnswerFrame(op: OperationLayout, bytes: Buffer): Buffer {
  const expected = describeAnswerLengths(op.answerLengths);
  if (bytes.length < HEADER_LENGTH) {
    throw new FrameError(`short ${op.kind} answer frame`, bytes, expected);
  }

  const declared = bytes.readUInt32LE(0);
  const accepted = 'min' in op.answerLengths
    ? declared >= op.answerLengths.min
    : op.answerLengths.exact.includes(declared);
  if (!accepted) {
    throw new FrameError(`unexpected ${op.kind} answer length ${declared}`, bytes, expected);
  }
  if (bytes.length !== declared) {
    throw new FrameError(`${op.kind} answer declares ${declared} bytes`, bytes, expected);
  }
  return bytes;
}

function readString(frame: Buffer, kind: StringKind): string {
  const start = MIN_FRAME_LENGTH + STRING_LENGTH_BYTES;
  const length = frame.readUInt32LE(MIN_FRAME_LENGTH);
  if (start + length > frame.length) {
    throw new FrameError(
      `${kind} string length ${length} overruns the frame`,
      frame,
      `string length <= ${frame.length - start}`,
    );
  }
  const text = frame.toString('utf8', start, start + length);
  return text.endsWith('\0') ? text.slice(0, -1) : text;
}

/**
 * Builds the frame an emulator would send for `answer`. Strings are sent
 * NUL-terminated.
 */
export function encodeAnswer(answer: PineAnswer): Buffer {
  const payload = answerPayload(answer);
  const frame = Buffer.alloc(MIN_FRAME_LENGTH + payload.length);
  frame.writeUInt32LE(frame.length, 0);
  frame.writeUInt8(answer.resultCode, HEADER_LENGTH);
  payload.copy(frame, MIN_FRAME_LENGTH);
  return frame;
}

const INTEGER_BYTES = { read8: 1, read16: 2, read32: 4 } as const;

function answerPayload(answer: PineAnswer): Buffer {
  switch (answer.kind) {
    case 'read8':
    case 'read16':
    case 'read32': {
      if (answer.memoryValue === undefined) return Buffer.alloc(0);
      const size = INTEGER_BYTES[answer.kind];
      const buf = Buffer.alloc(size);
      buf.writeUIntLE(answer.memoryValue, 0, size);
      return buf;
    }
    case 'read64': {
      if (answer.memoryValue === undefined) return Buffer.alloc(0);
      const buf = Buffer.alloc(8);
      buf.writeBigUInt64LE(answer.memoryValue);
      return buf;
    }
    case 'status': {
      if (answer.status === undefined) return Buffer.alloc(0);
      const buf = Buffer.alloc(4);
      buf.writeUInt32LE(answer.status);
      return buf;
    }
    case 'version':
      return stringPayload(answer.version);
    case 'title':
      return stringPayload(answer.title);
    case 'id':
      return stringPayload(answer.id);
    case 'uuid':
      return stringPayload(answer.uuid);
    case 'gameVersion':
      return stringPayload(answer.gameVersion);
    default:
      return Buffer.alloc(0);
  }
}

function stringPayload(text: string): Buffer {
  const bytes = Buffer.from(`${text}\0`, 'utf8');
  const length = Buffer.alloc(STRING_LENGTH_BYTES);
  length.writeUInt32LE(bytes.length);
  return Buffer.concat([length, bytes]);
}

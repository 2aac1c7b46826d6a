import { UnknownOperationError } from '@pinebridge/shared';
import { OPERATION_KINDS, type BitWidth, type OperationKind } from './types.ts';

export const HEADER_LENGTH = 4;
/** Length prefix plus the opcode (requests) or result code (answers). */
export const MIN_FRAME_LENGTH = HEADER_LENGTH + 1;
/** Minimum string answer: prefix, result code, string length, one byte. */
export const MIN_STRING_ANSWER_LENGTH = MIN_FRAME_LENGTH + 4 + 1;

export type RequestFieldName = 'address' | 'data' | 'slot';

export interface RequestField {
  name: RequestFieldName;
  width: BitWidth;
}

export type AnswerShape =
  | { type: 'empty' }
  | { type: 'integer'; width: BitWidth }
  | { type: 'string' }
  | { type: 'status' };

export type AnswerLengths =
  | { exact: readonly number[] }
  | { min: number };

export interface OperationLayout {
  kind: OperationKind;
  opcode: number;
  requestFields: readonly RequestField[];
  requestLength: number;
  answer: AnswerShape;
  answerLengths: AnswerLengths;
}

const ADDRESS: RequestField = { name: 'address', width: 32 };

function answerLengthsFor(answer: AnswerShape): AnswerLengths {
  switch (answer.type) {
    case 'empty':
      return { exact: [MIN_FRAME_LENGTH] };
    case 'integer':
      return { exact: [MIN_FRAME_LENGTH, MIN_FRAME_LENGTH + answer.width / 8] };
    case 'status':
      return { exact: [MIN_FRAME_LENGTH, MIN_FRAME_LENGTH + 4] };
    case 'string':
      return { min: MIN_STRING_ANSWER_LENGTH };
  }
}

function layout(
  kind: OperationKind,
  requestFields: readonly RequestField[],
  answer: AnswerShape,
): OperationLayout {
  const requestLength = requestFields.reduce((sum, f) => sum + f.width / 8, MIN_FRAME_LENGTH);
  return {
    kind,
    opcode: OPERATION_KINDS.indexOf(kind),
    requestFields,
    requestLength,
    answer,
    answerLengths: answerLengthsFor(answer),
  };
}

const read = (width: BitWidth): [readonly RequestField[], AnswerShape] =>
  [[ADDRESS], { type: 'integer', width }];
const write = (width: BitWidth): [readonly RequestField[], AnswerShape] =>
  [[ADDRESS, { name: 'data', width }], { type: 'empty' }];
const slot = (): [readonly RequestField[], AnswerShape] =>
  [[{ name: 'slot', width: 8 }], { type: 'empty' }];
const text = (): [readonly RequestField[], AnswerShape] => [[], { type: 'string' }];

// Opcodes follow the order of OPERATION_KINDS (0-15, as in the PINE draft).
export const OPERATIONS: { readonly [K in OperationKind]: OperationLayout } = {
  read8: layout('read8', ...read(8)),
  read16: layout('read16', ...read(16)),
  read32: layout('read32', ...read(32)),
  read64: layout('read64', ...read(64)),
  write8: layout('write8', ...write(8)),
  write16: layout('write16', ...write(16)),
  write32: layout('write32', ...write(32)),
  write64: layout('write64', ...write(64)),
  version: layout('version', ...text()),
  saveState: layout('saveState', ...slot()),
  loadState: layout('loadState', ...slot()),
  title: layout('title', ...text()),
  id: layout('id', ...text()),
  uuid: layout('uuid', ...text()),
  gameVersion: layout('gameVersion', ...text()),
  status: layout('status', [], { type: 'status' }),
};

function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_\s]/g, '');
}

const BY_NAME = new Map<string, OperationKind>(
  OPERATION_KINDS.map((kind) => [normalizeName(kind), kind]),
);

export function parseOperationKind(name: string): OperationKind {
  const kind = BY_NAME.get(normalizeName(name));
  if (!kind) {
    throw new UnknownOperationError(name, OPERATION_KINDS.map(normalizeName));
  }
  return kind;
}

export function lookupOperation(name: string): OperationLayout {
  return OPERATIONS[parseOperationKind(name)];
}

export function describeAnswerLengths(lengths: AnswerLengths): string {
  if ('min' in lengths) return `length >= ${lengths.min}`;
  return `length ${lengths.exact.join(' or ')}`;
}

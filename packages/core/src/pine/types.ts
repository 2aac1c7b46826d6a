export const OPERATION_KINDS = [
  'read8',
  'read16',
  'read32',
  'read64',
  'write8',
  'write16',
  'write32',
  'write64',
  'version',
  'saveState',
  'loadState',
  'title',
  'id',
  'uuid',
  'gameVersion',
  'status',
] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export type BitWidth = 8 | 16 | 32 | 64;

export type ReadKind = 'read8' | 'read16' | 'read32' | 'read64';
export type WriteKind = 'write8' | 'write16' | 'write32' | 'write64';
export type StringKind = 'version' | 'title' | 'id' | 'uuid' | 'gameVersion';

export const RESULT_OK = 0;
export const RESULT_FAIL = 0xff;

// Requests

export type PineRequest =
  | { kind: 'read8'; address: number }
  | { kind: 'read16'; address: number }
  | { kind: 'read32'; address: number }
  | { kind: 'read64'; address: number }
  | { kind: 'write8'; address: number; data: number }
  | { kind: 'write16'; address: number; data: number }
  | { kind: 'write32'; address: number; data: number }
  | { kind: 'write64'; address: number; data: bigint }
  | { kind: 'version' }
  | { kind: 'saveState'; slot: number }
  | { kind: 'loadState'; slot: number }
  | { kind: 'title' }
  | { kind: 'id' }
  | { kind: 'uuid' }
  | { kind: 'gameVersion' }
  | { kind: 'status' };

// Answers

export type PineAnswer =
  | { kind: 'read8'; resultCode: number; memoryValue?: number }
  | { kind: 'read16'; resultCode: number; memoryValue?: number }
  | { kind: 'read32'; resultCode: number; memoryValue?: number }
  | { kind: 'read64'; resultCode: number; memoryValue?: bigint }
  | { kind: 'write8'; resultCode: number }
  | { kind: 'write16'; resultCode: number }
  | { kind: 'write32'; resultCode: number }
  | { kind: 'write64'; resultCode: number }
  | { kind: 'version'; resultCode: number; version: string }
  | { kind: 'saveState'; resultCode: number }
  | { kind: 'loadState'; resultCode: number }
  | { kind: 'title'; resultCode: number; title: string }
  | { kind: 'id'; resultCode: number; id: string }
  | { kind: 'uuid'; resultCode: number; uuid: string }
  | { kind: 'gameVersion'; resultCode: number; gameVersion: string }
  | { kind: 'status'; resultCode: number; status?: number };

export type AnswerOf<K extends OperationKind> = Extract<PineAnswer, { kind: K }>;

/** Emulator run state reported by the status operation. */
export const EMULATOR_STATUS = {
  0: 'running',
  1: 'paused',
  2: 'shutdown',
} as const satisfies Record<number, string>;

export type EmulatorStatus = (typeof EMULATOR_STATUS)[keyof typeof EMULATOR_STATUS];

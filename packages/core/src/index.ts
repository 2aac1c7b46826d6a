// Types
export type {
  OperationKind,
  BitWidth,
  ReadKind,
  WriteKind,
  StringKind,
  PineRequest,
  PineAnswer,
  AnswerOf,
  EmulatorStatus,
} from './pine/types.ts';
export { OPERATION_KINDS, RESULT_OK, RESULT_FAIL, EMULATOR_STATUS } from './pine/types.ts';

// Opcode catalog
export type {
  OperationLayout,
  RequestField,
  RequestFieldName,
  AnswerShape,
  AnswerLengths,
} from './pine/catalog.ts';
export {
  OPERATIONS,
  HEADER_LENGTH,
  MIN_FRAME_LENGTH,
  MIN_STRING_ANSWER_LENGTH,
  lookupOperation,
  parseOperationKind,
  describeAnswerLengths,
} from './pine/catalog.ts';

// Frame codec
export { encodeRequest, decodeRequest, decodeAnswer, encodeAnswer } from './pine/codec.ts';

// Request parameters
export type { RequestParams } from './pine/params.ts';
export { buildRequest, parseInteger, displayName } from './pine/params.ts';

// Client
export { PineClient, describeStatus } from './pine/client.ts';

// Targets and transport
export type { Target } from './targets.ts';
export { TARGETS, TARGET_NAMES, findTarget } from './targets.ts';
export type { TransportDescriptor, ResolveOptions } from './transport/resolver.ts';
export {
  resolveTransport,
  stripSlotSuffix,
  describeTransport,
  LOOPBACK_HOST,
  FALLBACK_SOCKET_DIR,
} from './transport/resolver.ts';
export type { PineSender, PineConnectionOptions } from './transport/connection.ts';
export { PineConnection, DEFAULT_EXCHANGE_TIMEOUT_MS } from './transport/connection.ts';

// Session
export type { SessionState, SessionManagerOptions, Sleep } from './session/session-manager.ts';
export { SessionManager, DEFAULT_PROBE_INTERVAL_MS } from './session/session-manager.ts';

// Config
export type { ProjectConfig } from './config/index.ts';
export {
  CONFIG_FILENAME,
  loadProjectConfig,
  validateConfig,
  writeProjectConfig,
} from './config/index.ts';

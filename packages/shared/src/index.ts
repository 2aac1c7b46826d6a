export {
  PinebridgeError,
  ConfigError,
  InvalidTargetError,
  UnknownTargetError,
  UnsupportedPlatformError,
  UnknownOperationError,
  ParameterError,
  ConnectionError,
  TimeoutError,
  NotConnectedError,
  ProtocolError,
  FrameError,
  isTransportError,
  errorMessage,
} from './errors.ts';
export type { ErrorCode } from './errors.ts';

export { toHex, hexDump } from './hex.ts';
export { ExclusiveQueue } from './exclusive-queue.ts';
export { createLogger, parseLogLevel, LOG_LEVELS, LOG_LEVEL_ENV } from './logger.ts';
export type { Logger, LoggerOptions } from './logger.ts';

import { toHex } from './hex.ts';

export type ErrorCode =
  | 'CONFIG'
  | 'INVALID_TARGET'
  | 'UNKNOWN_TARGET'
  | 'UNSUPPORTED_PLATFORM'
  | 'UNKNOWN_OPERATION'
  | 'INVALID_PARAMETER'
  | 'CONNECTION'
  | 'TIMEOUT'
  | 'NOT_CONNECTED'
  | 'PROTOCOL'
  | 'MALFORMED_FRAME';

export class PinebridgeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Configuration

export class ConfigError extends PinebridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG', message, options);
  }
}

export class InvalidTargetError extends PinebridgeError {
  constructor(message = 'empty string provided for target name') {
    super('INVALID_TARGET', message);
  }
}

export class UnknownTargetError extends PinebridgeError {
  readonly target: string;
  readonly knownTargets: readonly string[];

  constructor(target: string, knownTargets: readonly string[]) {
    super(
      'UNKNOWN_TARGET',
      `unknown target "${target}"; supported targets are ${knownTargets.join(', ')}`,
    );
    this.target = target;
    this.knownTargets = knownTargets;
  }
}

export class UnsupportedPlatformError extends PinebridgeError {
  constructor(platform: string) {
    super('UNSUPPORTED_PLATFORM', `no PINE transport known for platform "${platform}"`);
  }
}

export class UnknownOperationError extends PinebridgeError {
  readonly operation: string;

  constructor(operation: string, knownOperations: readonly string[]) {
    super(
      'UNKNOWN_OPERATION',
      `unknown operation "${operation}"; supported operations are ${knownOperations.join(', ')}`,
    );
    this.operation = operation;
  }
}

export class ParameterError extends PinebridgeError {
  constructor(message: string) {
    super('INVALID_PARAMETER', message);
  }
}

// Transport

export class ConnectionError extends PinebridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONNECTION', message, options);
  }
}

export class TimeoutError extends PinebridgeError {
  constructor(message: string) {
    super('TIMEOUT', message);
  }
}

export class NotConnectedError extends PinebridgeError {
  constructor(message = 'no active PINE connection') {
    super('NOT_CONNECTED', message);
  }
}

// Protocol

export class ProtocolError extends PinebridgeError {
  constructor(message: string, code: ErrorCode = 'PROTOCOL') {
    super(code, message);
  }
}

/** An answer frame whose length or layout does not match its operation. */
export class FrameError extends ProtocolError {
  readonly bytes: Buffer;
  readonly expected: string;

  constructor(message: string, bytes: Buffer, expected: string) {
    super(`${message} (expected ${expected}, got ${bytes.length} bytes: ${toHex(bytes) || '<empty>'})`, 'MALFORMED_FRAME');
    this.bytes = Buffer.from(bytes);
    this.expected = expected;
  }
}

export function isTransportError(err: unknown): boolean {
  return err instanceof ConnectionError || err instanceof TimeoutError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

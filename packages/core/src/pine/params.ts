import { ParameterError } from '@pinebridge/shared';
import { parseOperationKind } from './catalog.ts';
import type { BitWidth, OperationKind, PineRequest } from './types.ts';

/** Parameter map with keys already lowercased (`address`, `data`, `slot`). */
export type RequestParams = Readonly<Record<string, string | undefined>>;

const DECIMAL = /^\d+$/;
const HEX = /^0x[0-9a-f]+$/i;

/** Parses a decimal or `0x`-prefixed hex integer that must fit in `width` bits. */
export function parseInteger(input: string, width: BitWidth, label = 'value', context?: string): bigint {
  const suffix = context ? ` for ${context}` : '';
  const text = input.trim();
  if (!DECIMAL.test(text) && !HEX.test(text)) {
    throw new ParameterError(`unable to parse ${label} "${input}"${suffix}`);
  }
  const value = BigInt(text);
  if (value > (1n << BigInt(width)) - 1n) {
    throw new ParameterError(`${label} ${text} does not fit in ${width} bits${suffix}`);
  }
  return value;
}

export function buildRequest(operation: string, params: RequestParams): PineRequest {
  const kind = parseOperationKind(operation);

  const integer = (name: string, width: BitWidth): bigint => {
    const raw = params[name];
    if (raw === undefined || raw.trim() === '') {
      throw new ParameterError(`no ${name} provided for ${displayName(kind)} request`);
    }
    return parseInteger(raw, width, name, `${displayName(kind)} request`);
  };
  const address = (): number => Number(integer('address', 32));

  switch (kind) {
    case 'read8':
    case 'read16':
    case 'read32':
    case 'read64':
      return { kind, address: address() };
    case 'write8':
      return { kind, address: address(), data: Number(integer('data', 8)) };
    case 'write16':
      return { kind, address: address(), data: Number(integer('data', 16)) };
    case 'write32':
      return { kind, address: address(), data: Number(integer('data', 32)) };
    case 'write64':
      return { kind, address: address(), data: integer('data', 64) };
    case 'saveState':
    case 'loadState':
      return { kind, slot: Number(integer('slot', 8)) };
    default:
      return { kind };
  }
}

/** Lowercase wire-facing name, e.g. `gameversion`. */
export function displayName(kind: OperationKind): string {
  return kind.toLowerCase();
}

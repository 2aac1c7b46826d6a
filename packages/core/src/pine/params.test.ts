import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ParameterError, UnknownOperationError } from '@pinebridge/shared';
import { buildRequest, parseInteger } from './params.ts';

describe('parseInteger', () => {
  it('accepts decimal and 0x-prefixed hex', () => {
    assert.equal(parseInteger('69', 8), 69n);
    assert.equal(parseInteger('0x35459C', 32), 0x35459cn);
    assert.equal(parseInteger(' 0XFF ', 8), 255n);
    assert.equal(parseInteger('0xffffffffffffffff', 64), 0xffffffffffffffffn);
  });

  it('rejects negative, fractional and malformed input', () => {
    for (const input of ['-1', '1.5', '', 'zz', '0x', '12abc']) {
      assert.throws(() => parseInteger(input, 32), ParameterError, input);
    }
  });

  it('rejects values wider than the field', () => {
    assert.throws(() => parseInteger('256', 8, 'data'), { message: 'data 256 does not fit in 8 bits' });
    assert.throws(() => parseInteger('0x100000000', 32), ParameterError);
  });
});

describe('buildRequest', () => {
  it('builds reads from an address', () => {
    assert.deepEqual(buildRequest('read32', { address: '0x35459C' }), { kind: 'read32', address: 0x35459c });
    assert.deepEqual(buildRequest('read8', { address: '100' }), { kind: 'read8', address: 100 });
  });

  it('builds writes of every width', () => {
    assert.deepEqual(buildRequest('write8', { address: '0x10', data: '0x45' }), {
      kind: 'write8',
      address: 0x10,
      data: 0x45,
    });
    assert.deepEqual(buildRequest('write32', { address: '0x10', data: '4294967295' }), {
      kind: 'write32',
      address: 0x10,
      data: 0xffffffff,
    });
    assert.deepEqual(buildRequest('write64', { address: '0x10', data: '0x6962657469637845' }), {
      kind: 'write64',
      address: 0x10,
      data: 0x6962657469637845n,
    });
  });

  it('builds save and load state from a slot', () => {
    assert.deepEqual(buildRequest('savestate', { slot: '1' }), { kind: 'saveState', slot: 1 });
    assert.deepEqual(buildRequest('loadstate', { slot: '0x0a' }), { kind: 'loadState', slot: 10 });
  });

  it('ignores parameters the operation does not use', () => {
    assert.deepEqual(buildRequest('gameversion', { address: '1' }), { kind: 'gameVersion' });
    assert.deepEqual(buildRequest('status', {}), { kind: 'status' });
  });

  it('reports missing and malformed parameters', () => {
    assert.throws(() => buildRequest('read32', {}), { message: 'no address provided for read32 request' });
    assert.throws(() => buildRequest('write16', { address: '1' }), {
      message: 'no data provided for write16 request',
    });
    assert.throws(() => buildRequest('savestate', { slot: ' ' }), {
      message: 'no slot provided for savestate request',
    });
    assert.throws(() => buildRequest('read8', { address: 'zz' }), {
      message: 'unable to parse address "zz" for read8 request',
    });
    assert.throws(() => buildRequest('write8', { address: '1', data: '256' }), {
      message: 'data 256 does not fit in 8 bits for write8 request',
    });
  });

  it('rejects unknown operations', () => {
    assert.throws(() => buildRequest('batch', {}), UnknownOperationError);
  });
});

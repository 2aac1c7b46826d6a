import { describe, it, before, after, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import { ConnectionError, TimeoutError } from '@pinebridge/shared';
import { encodeAnswer, encodeRequest } from '../pine/codec.ts';
import { FakeEmulator } from '../testing/fake-emulator.ts';
import { PineConnection } from './connection.ts';
import { resolveTransport } from './resolver.ts';

const VERSION_ANSWER = encodeAnswer({ kind: 'version', resultCode: 0, version: '1.2' });

describe('PineConnection', () => {
  let dir: string;
  let emulators: FakeEmulator[] = [];

  const transportIn = (target = 'pcsx2', slot = 0) =>
    resolveTransport(target, slot, { platform: 'linux', env: { XDG_RUNTIME_DIR: dir } });

  async function startEmulator(...args: ConstructorParameters<typeof FakeEmulator>): Promise<FakeEmulator> {
    const emulator = new FakeEmulator(...args);
    await emulator.listen();
    emulators.push(emulator);
    return emulator;
  }

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'pine-conn-'));
  });

  afterEach(async () => {
    await Promise.all(emulators.map((e) => e.close()));
    emulators = [];
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the request, half-closes and returns the whole answer', async () => {
    const emulator = await startEmulator(join(dir, 'pcsx2.sock.28011'), () => VERSION_ANSWER);
    const request = encodeRequest({ kind: 'version' });

    const answer = await new PineConnection(transportIn()).send(request);

    assert.deepEqual(answer, VERSION_ANSWER);
    assert.equal(emulator.connections.length, 1);
    assert.deepEqual(emulator.connections[0]?.request, request);
  });

  it('falls back to the slot-less socket when the primary one is missing', async () => {
    const emulator = await startEmulator(join(dir, 'pcsx2.sock'), () => VERSION_ANSWER);
    const connection = new PineConnection(transportIn());

    await connection.probe();
    const answer = await connection.send(encodeRequest({ kind: 'version' }));

    assert.deepEqual(answer, VERSION_ANSWER);
    assert.equal(emulator.connections.length, 2);
  });

  it('prefers the slot-specific socket when both exist', async () => {
    const primary = await startEmulator(join(dir, 'rpcs3.sock.28012'), () => VERSION_ANSWER);
    const fallback = await startEmulator(join(dir, 'rpcs3.sock'), () => VERSION_ANSWER);

    await new PineConnection(transportIn('rpcs3')).send(encodeRequest({ kind: 'version' }));

    assert.equal(primary.connections.length, 1);
    assert.equal(fallback.connections.length, 0);
  });

  it('reports both candidate paths when nothing is listening', async () => {
    const connection = new PineConnection(transportIn('pcsx2', 29000));
    await assert.rejects(
      connection.send(encodeRequest({ kind: 'status' })),
      (err: unknown) =>
        err instanceof ConnectionError &&
        err.message.startsWith(
          `could not connect to PINE for pcsx2 at "${join(dir, 'pcsx2.sock.29000')}" or "${join(dir, 'pcsx2.sock')}"`,
        ),
    );
    await assert.rejects(connection.probe(), ConnectionError);
  });

  it('never overlaps two exchanges on the same connection', async () => {
    const emulator = await startEmulator(join(dir, 'pcsx2.sock.28011'), async (_request, id) => {
      if (id === 1) await delay(50);
      return encodeAnswer({ kind: 'status', resultCode: 0, status: id });
    });
    const connection = new PineConnection(transportIn());
    const first = encodeRequest({ kind: 'status' });
    const second = encodeRequest({ kind: 'read32', address: 0x35459c });

    const answers = await Promise.all([connection.send(first), connection.send(second)]);

    assert.deepEqual(emulator.events, ['open:1', 'answer:1', 'open:2', 'answer:2']);
    assert.deepEqual(emulator.connections[0]?.request, first);
    assert.deepEqual(emulator.connections[1]?.request, second);
    assert.equal(answers[0].readUInt32LE(5), 1);
    assert.equal(answers[1].readUInt32LE(5), 2);
  });

  it('fails with a timeout when the emulator never answers', async () => {
    await startEmulator(join(dir, 'pcsx2.sock.28011'), () => null);
    const connection = new PineConnection(transportIn(), { timeoutMs: 100 });

    await assert.rejects(connection.send(encodeRequest({ kind: 'title' })), (err: unknown) =>
      err instanceof TimeoutError && err.message === 'PINE exchange with pcsx2 timed out after 100 ms',
    );
  });

  it('releases the lock after a failed exchange', async () => {
    let answered = 0;
    await startEmulator(join(dir, 'pcsx2.sock.28011'), () => (answered++ === 0 ? null : VERSION_ANSWER));
    const connection = new PineConnection(transportIn(), { timeoutMs: 100 });

    const results = await Promise.allSettled([
      connection.send(encodeRequest({ kind: 'version' })),
      connection.send(encodeRequest({ kind: 'version' })),
    ]);

    assert.equal(results[0].status, 'rejected');
    assert.deepEqual(results[1].status === 'fulfilled' && results[1].value, VERSION_ANSWER);
  });

  it('talks to a loopback TCP port on Windows-style transports', async () => {
    const emulator = await startEmulator({ port: 0 }, () => VERSION_ANSWER);
    const transport = resolveTransport('pcsx2', emulator.port, { platform: 'win32' });

    const answer = await new PineConnection(transport).send(encodeRequest({ kind: 'version' }));

    assert.deepEqual(answer, VERSION_ANSWER);
  });
});

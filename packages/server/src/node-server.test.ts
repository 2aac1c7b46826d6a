import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SessionManager } from '@pinebridge/core';
import { FakeEmulator, createEmulatorState, emulatorHandler } from '@pinebridge/core/testing';
import { createApp } from './app.ts';
import { addressPort, startServer } from './node-server.ts';

describe('startServer', () => {
  let dir: string;
  let emulator: FakeEmulator;
  let session: SessionManager;
  let server: Server;
  let base: string;

  before(async () => {
    dir = mkdtempSync(join(tmpdir(), 'pine-http-'));
    emulator = new FakeEmulator(join(dir, 'rpcs3.sock.28012'), emulatorHandler(createEmulatorState({ title: 'Demo' })));
    await emulator.listen();
    session = new SessionManager({ resolve: { platform: 'linux', env: { XDG_RUNTIME_DIR: dir } } });
    await session.connectOnce();
    server = await startServer(createApp({ session }), { port: 0, host: '127.0.0.1' });
    base = `http://127.0.0.1:${addressPort(server) ?? 0}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await emulator.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('serves the session state over HTTP', async () => {
    const res = await fetch(`${base}/session`);

    assert.deepEqual(await res.json(), { status: 'connected', target: 'rpcs3' });
  });

  it('forwards requests to the connected emulator', async () => {
    const res = await fetch(`${base}/?pineRequestType=title`);

    assert.equal(res.status, 200);
    assert.deepEqual(await res.json(), { resultCode: 0, title: 'Demo' });
  });

  it('reads form bodies posted over HTTP', async () => {
    const res = await fetch(base, {
      method: 'POST',
      body: new URLSearchParams({ 'pine-request-type': 'write8', 'pine-address': '4', 'pine-data': '9' }),
    });
    assert.equal(res.status, 200);

    const read = await fetch(`${base}/?pineRequestType=read8&pineAddress=4`);
    assert.deepEqual(await read.json(), { resultCode: 0, memoryValue: 9 });
  });
});

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { createServer } from 'node:net';
import { setTimeout as delay } from 'node:timers/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CONFIG_FILENAME } from '@pinebridge/core';
import { FakeEmulator, createEmulatorState, emulatorHandler, type EmulatorState } from '@pinebridge/core/testing';
import { runCli } from './cli.ts';
import { defaultConfig } from './commands/init.ts';

describe('pinebridge cli', () => {
  let dir: string;
  let state: EmulatorState;
  let emulator: FakeEmulator;
  let runtimeDir: string | undefined;
  let out: string[];
  let err: string[];

  const run = (...args: string[]) => runCli([...args, '--project', dir, '--log-level', 'silent']);

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'pine-cli-'));
    runtimeDir = process.env['XDG_RUNTIME_DIR'];
    process.env['XDG_RUNTIME_DIR'] = dir;
    state = createEmulatorState({
      memory: new Map([
        [0x100, 0xef],
        [0x101, 0xbe],
        [0x102, 0xad],
        [0x103, 0xde],
      ]),
    });
    emulator = new FakeEmulator(join(dir, 'pcsx2.sock.28011'), emulatorHandler(state));
    await emulator.listen();
    out = [];
    err = [];
    mock.method(console, 'log', (line: string) => out.push(line));
    mock.method(console, 'error', (line: string) => err.push(line));
  });

  afterEach(async () => {
    mock.restoreAll();
    process.exitCode = undefined;
    if (runtimeDir === undefined) delete process.env['XDG_RUNTIME_DIR'];
    else process.env['XDG_RUNTIME_DIR'] = runtimeDir;
    await emulator.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads memory from the first emulator that answers', async () => {
    await run('read', '32', '0x100');

    assert.deepEqual(out, ['0xdeadbeef (3735928559)']);
    assert.equal(process.exitCode, undefined);
  });

  it('writes memory on an explicit target', async () => {
    await run('write', '8', '4', '0x7f', '--target', 'pcsx2');

    assert.deepEqual(out, ['ok']);
    assert.equal(state.memory.get(4), 0x7f);
  });

  it('prints answers as JSON', async () => {
    await run('info', 'title', '--json');

    assert.deepEqual(out, ['{\n  "resultCode": 0,\n  "title": "Test Game"\n}']);
  });

  it('fails when the emulator reports an error', async () => {
    await run('state', 'load', '3');

    assert.deepEqual(out, []);
    assert.deepEqual(err, ['loadState failed with result code 255']);
    assert.equal(process.exitCode, 1);
  });

  it('saves a state slot', async () => {
    await run('state', 'save', '3');

    assert.deepEqual(out, ['ok']);
    assert.deepEqual([...state.savedSlots], [3]);
  });

  it('rejects a bad address before connecting', async () => {
    await run('read', '8', 'nowhere');

    assert.deepEqual(err, ['unable to parse address "nowhere" for read8 request']);
    assert.equal(process.exitCode, 1);
    assert.equal(emulator.connections.length, 0);
  });

  it('reports which targets answer', async () => {
    await run('probe');

    assert.equal(out.length, 2);
    assert.equal(out[0], `pcsx2: up ${join(dir, 'pcsx2.sock.28011')}`);
    assert.match(out[1] ?? '', /^rpcs3: down /);
    assert.equal(process.exitCode, undefined);
  });

  it('writes a default config and refuses to overwrite it', async () => {
    await run('init');

    const written: unknown = JSON.parse(readFileSync(join(dir, CONFIG_FILENAME), 'utf-8'));
    assert.deepEqual(written, defaultConfig());

    await run('init');
    assert.equal(process.exitCode, 1);
    assert.deepEqual(err, [`${CONFIG_FILENAME} already exists. Use --force to overwrite.`]);
  });

  it('uses the targets from the project config', async () => {
    await run('init', '--target', 'rpcs3');
    out.length = 0;

    await run('info', 'version');

    assert.deepEqual(err, ['no known emulator is answering on its default slot']);
    assert.equal(process.exitCode, 1);
  });

  it('gives up without probing when the HTTP port is taken', async () => {
    const blocker = createServer();
    await new Promise<void>((resolve) => blocker.listen(0, '127.0.0.1', () => resolve()));
    const info = blocker.address();
    const port = typeof info === 'object' && info !== null ? info.port : 0;

    try {
      await run('serve', '--host', '127.0.0.1', '--port', String(port));
      await delay(50);

      assert.equal(process.exitCode, 1);
      assert.match(err[0] ?? '', /EADDRINUSE/);
      assert.equal(emulator.connections.length, 0);
    } finally {
      await new Promise<void>((resolve) => blocker.close(() => resolve()));
    }
  });
});

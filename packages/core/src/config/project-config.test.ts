import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { pino } from 'pino';
import { ConfigError } from '@pinebridge/shared';
import { CONFIG_FILENAME, loadProjectConfig, validateConfig, writeProjectConfig } from './project-config.ts';

describe('project config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pine-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns an empty config when the file is missing', () => {
    assert.deepEqual(loadProjectConfig(dir), {});
  });

  it('loads every section', () => {
    writeFileSync(
      join(dir, CONFIG_FILENAME),
      JSON.stringify({
        server: { port: 7000, host: '0.0.0.0' },
        session: { targets: ['rpcs3'], probeIntervalMs: 1000, timeoutMs: 2000 },
        log: { level: 'debug' },
      }),
    );

    assert.deepEqual(loadProjectConfig(dir), {
      server: { port: 7000, host: '0.0.0.0' },
      session: { targets: ['rpcs3'], probeIntervalMs: 1000, timeoutMs: 2000 },
      log: { level: 'debug' },
    });
  });

  it('reports malformed JSON', () => {
    writeFileSync(join(dir, CONFIG_FILENAME), '{ "server": ');

    assert.throws(() => loadProjectConfig(dir), ConfigError);
  });

  it('round-trips through writeProjectConfig', () => {
    writeProjectConfig(dir, { session: { targets: ['pcsx2', 'rpcs3'] } });

    assert.equal(
      readFileSync(join(dir, CONFIG_FILENAME), 'utf-8'),
      '{\n  "session": {\n    "targets": [\n      "pcsx2",\n      "rpcs3"\n    ]\n  }\n}\n',
    );
    assert.deepEqual(loadProjectConfig(dir), { session: { targets: ['pcsx2', 'rpcs3'] } });
  });

  describe('validateConfig', () => {
    const file = 'pinebridge.json';

    it('rejects a non-object document', () => {
      assert.throws(() => validateConfig([], file), {
        name: 'ConfigError',
        message: 'pinebridge.json: config must be a JSON object',
      });
    });

    it('rejects a port out of range', () => {
      assert.throws(() => validateConfig({ server: { port: 70000 } }, file), {
        message: 'pinebridge.json: "server.port" must be an integer between 1 and 65535',
      });
    });

    it('rejects an empty target list', () => {
      assert.throws(() => validateConfig({ session: { targets: [] } }, file), ConfigError);
    });

    it('rejects a non-positive interval', () => {
      assert.throws(() => validateConfig({ session: { probeIntervalMs: 0 } }, file), {
        message: 'pinebridge.json: "session.probeIntervalMs" must be a positive integer',
      });
    });

    it('rejects an unknown log level', () => {
      assert.throws(() => validateConfig({ log: { level: 'loud' } }, file), ConfigError);
    });

    it('warns about unknown keys', () => {
      const lines: string[] = [];
      const logger = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });

      validateConfig({ server: { port: 1, extra: true }, plugins: [] }, file, logger);

      const keys = lines.map((line) => {
        const entry: unknown = JSON.parse(line);
        return typeof entry === 'object' && entry !== null && 'key' in entry ? entry.key : undefined;
      });
      assert.deepEqual(keys, ['plugins', 'server.extra']);
    });
  });
});

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadEnvFiles } from '../src/env.js';
import { createLogger } from '../src/logger.js';

const KEYS = ['AIRWAVES_TEST_BASE', 'AIRWAVES_TEST_LOCAL', 'AIRWAVES_TEST_PROCESS'];

describe('loadEnvFiles', () => {
  let dir: string | null = null;

  afterEach(() => {
    for (const key of KEYS) delete process.env[key];
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('loads .env and lets .env.local override it', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'airwaves-env-'));
    fs.writeFileSync(path.join(dir, '.env'), 'AIRWAVES_TEST_BASE=base\nAIRWAVES_TEST_LOCAL=base\nAIRWAVES_TEST_PROCESS=file\n');
    fs.writeFileSync(path.join(dir, '.env.local'), 'AIRWAVES_TEST_LOCAL=local\n');
    process.env.AIRWAVES_TEST_PROCESS = 'process';

    expect(loadEnvFiles(dir)).toEqual([path.join(dir, '.env'), path.join(dir, '.env.local')]);
    expect(process.env.AIRWAVES_TEST_BASE).toBe('base');
    expect(process.env.AIRWAVES_TEST_LOCAL).toBe('local');
    expect(process.env.AIRWAVES_TEST_PROCESS).toBe('process');
  });

  it('does nothing without env files', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'airwaves-env-'));
    expect(loadEnvFiles(dir)).toEqual([]);
  });
});

describe('createLogger', () => {
  const options = { debug: false, dir: null, file: 'airwaves.log', maxSizeMb: 1, backupCount: 15 };

  it('logs at info unless DEBUG is set', () => {
    const out: string[] = [];
    const stream = { write: (msg: string) => void out.push(msg) };
    const log = createLogger(options, stream);
    log.debug('hidden');
    log.info('shown');

    expect(log.level).toBe('info');
    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0])).toMatchObject({ level: 30, msg: 'shown', service: 'airwaves' });
    expect(createLogger({ ...options, debug: true }, stream).level).toBe('debug');
  });
});

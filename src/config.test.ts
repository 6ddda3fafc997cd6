import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { applyConfig, DEBUG_ENV_VAR, isTruthyFlag, loadConfig } from './config.js';
import { isDebugEnabled, setDebug } from './utils/logger.js';

function spyOnStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('isTruthyFlag', () => {
  it('recognises on values', () => {
    for (const value of ['1', 'true', 'TRUE', 'yes', 'on', ' true ']) {
      expect(isTruthyFlag(value)).toBe(true);
    }
  });

  it('recognises off values', () => {
    for (const value of ['0', 'false', 'no', 'off', '']) {
      expect(isTruthyFlag(value)).toBe(false);
    }
  });

  it('returns undefined for missing or unknown values', () => {
    expect(isTruthyFlag(undefined)).toBeUndefined();
    expect(isTruthyFlag('maybe')).toBeUndefined();
  });
});

/**
 * Uses a real temp directory rather than mocking fs.
 */
describe('loadConfig', () => {
  let dir: string;
  let configPath: string;
  let stderr: ReturnType<typeof spyOnStderr>;

  const written = () => stderr.mock.calls.map(([chunk]) => String(chunk));

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cursor-rings-'));
    configPath = path.join(dir, 'config.json');
    stderr = spyOnStderr();
  });

  afterEach(() => {
    stderr.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when there is no config file', () => {
    expect(loadConfig({ configPath, env: {} })).toEqual({ debug: false });
    expect(written()).toEqual([]);
  });

  it('reads debug from the config file', () => {
    fs.writeFileSync(configPath, JSON.stringify({ debug: true }));
    expect(loadConfig({ configPath, env: {} })).toEqual({ debug: true });
  });

  it('ignores fields of the wrong type', () => {
    fs.writeFileSync(configPath, JSON.stringify({ debug: 'yes' }));
    expect(loadConfig({ configPath, env: {} })).toEqual({ debug: false });
  });

  it('lets the environment override the file', () => {
    fs.writeFileSync(configPath, JSON.stringify({ debug: true }));
    expect(loadConfig({ configPath, env: { [DEBUG_ENV_VAR]: '0' } })).toEqual({ debug: false });
    expect(loadConfig({ configPath, env: { [DEBUG_ENV_VAR]: 'true' } })).toEqual({ debug: true });
  });

  it('warns about an unrecognised environment value', () => {
    expect(loadConfig({ configPath, env: { [DEBUG_ENV_VAR]: 'maybe' } })).toEqual({
      debug: false,
    });
    expect(written()).toEqual([
      `[cursor-rings warn] Ignoring ${DEBUG_ENV_VAR}=maybe: expected 1/0 or true/false\n`,
    ]);
  });

  it('warns about malformed JSON and falls back to defaults', () => {
    fs.writeFileSync(configPath, '{ not json');
    expect(loadConfig({ configPath, env: {} })).toEqual({ debug: false });
    expect(written()).toHaveLength(1);
    expect(written()[0]).toMatch(/^\[cursor-rings warn\] Ignoring malformed config /);
  });

  it('warns when the file is not a JSON object', () => {
    fs.writeFileSync(configPath, '[true]');
    expect(loadConfig({ configPath, env: {} })).toEqual({ debug: false });
    expect(written()).toEqual([
      `[cursor-rings warn] Ignoring ${configPath}: expected a JSON object\n`,
    ]);
  });
});

describe('applyConfig', () => {
  afterEach(() => {
    setDebug(false);
  });

  it('switches debug logging', () => {
    applyConfig({ debug: true });
    expect(isDebugEnabled()).toBe(true);
    applyConfig({ debug: false });
    expect(isDebugEnabled()).toBe(false);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { debug, error, formatError, isDebugEnabled, setDebug, warn } from './logger.js';
import { FocusRing } from '../state/FocusRing.js';

function spyOnStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('logger', () => {
  let stderr: ReturnType<typeof spyOnStderr>;

  const written = () => stderr.mock.calls.map(([chunk]) => String(chunk));

  beforeEach(() => {
    stderr = spyOnStderr();
  });

  afterEach(() => {
    setDebug(false);
    stderr.mockRestore();
  });

  it('suppresses debug output by default', () => {
    expect(isDebugEnabled()).toBe(false);
    debug('hidden');
    expect(written()).toEqual([]);
  });

  it('writes timestamped debug lines once enabled', () => {
    setDebug(true);
    debug('shown');
    expect(written()).toHaveLength(1);
    expect(written()[0]).toMatch(/^\[cursor-rings \d{4}-\d{2}-\d{2}T[^\]]+\] shown\n$/);
  });

  it('always writes warnings and errors', () => {
    warn('careful');
    error('failed', new Error('boom'));
    error('plain');
    expect(written()).toEqual([
      '[cursor-rings warn] careful\n',
      '[cursor-rings error] failed: boom\n',
      '[cursor-rings error] plain\n',
    ]);
  });

  it('formats non-Error values', () => {
    expect(formatError('text')).toBe('text');
    expect(formatError(42)).toBe('42');
    expect(formatError(undefined)).toBe('');
  });

  it('traces no-op ring operations in debug mode', () => {
    setDebug(true);
    FocusRing.empty<string>().focusOn(2);
    FocusRing.fromArray(['a']).focusOnNextMatching((x) => x === 'z');
    expect(written()).toHaveLength(2);
    expect(written()[0]).toContain('] focusOn ignored: empty ring\n');
    expect(written()[1]).toContain('] focusOnNextMatching: no match\n');
  });
});

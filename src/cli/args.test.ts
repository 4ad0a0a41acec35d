import { describe, it, expect } from 'vitest';
import { extractFlag, extractPositionalArgs, hasFlag, parseMethodFlag, parseNumberFlag, parseOsFlag } from './args.js';

describe('argument helpers', () => {
  const args = ['list', 'all', 'files', '--os=linux', '--pretty', '--limit=3'];

  it('extracts flag values and presence', () => {
    expect(extractFlag(args, 'os')).toBe('linux');
    expect(extractFlag(args, 'method')).toBeUndefined();
    expect(hasFlag(args, 'pretty')).toBe(true);
    expect(hasFlag(args, 'execute')).toBe(false);
  });

  it('joins positional words', () => {
    expect(extractPositionalArgs(args)).toBe('list all files');
  });

  it('validates typed flags', () => {
    expect(parseOsFlag(args)).toEqual({ ok: true, value: 'linux' });
    expect(parseOsFlag(['--os=mac'])).toEqual({
      ok: false,
      error: 'Invalid --os value "mac" (expected windows or linux)',
    });
    expect(parseMethodFlag(['--method=fuzzy'])).toEqual({ ok: true, value: 'fuzzy' });
    expect(parseMethodFlag([])).toEqual({ ok: true, value: undefined });
    expect(parseNumberFlag(args, 'limit')).toEqual({ ok: true, value: 3 });
  });

  it('rejects numbers with trailing text', () => {
    expect(parseNumberFlag(['--limit=10abc'], 'limit')).toEqual({
      ok: false,
      error: 'Invalid --limit value "10abc" (expected a number)',
    });
    expect(parseNumberFlag(['--threshold='], 'threshold').ok).toBe(false);
    expect(parseNumberFlag(['--threshold=62.5'], 'threshold')).toEqual({ ok: true, value: 62.5 });
  });
});

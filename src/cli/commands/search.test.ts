import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { searchCommand } from './search.js';
import { createResolverContext } from '../../context.js';
import type { ResolverContext } from '../../context.js';
import { BayesCommandClassifier } from '../../classifier/index.js';

async function captureOutput(fn: () => Promise<number>): Promise<{ exitCode: number; output: string }> {
  const lines: string[] = [];
  const spy = vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  });
  try {
    const exitCode = await fn();
    return { exitCode, output: lines.join('\n') };
  } finally {
    spy.mockRestore();
  }
}

let windows: ResolverContext;

beforeAll(async () => {
  windows = await createResolverContext({
    configPath: join(tmpdir(), 'nlcmd-missing-config.json'),
    overrides: { classifier: 'none', osFamily: 'windows' },
  });
});

beforeEach(() => {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('searchCommand', () => {
  it('lists diagnoses for a problem description', async () => {
    const { exitCode, output } = await captureOutput(() => searchCommand(['internet not wrking'], windows));
    const result = JSON.parse(output);

    expect(exitCode).toBe(0);
    expect(result.osFamily).toBe('windows');
    expect(result.matches).toEqual([]);
    expect(result.diagnoses[0].problem).toBe('internet not working');
    expect(result.diagnoses[0].relevance).toBe(3);
  });

  it('applies --threshold and --limit to similarity results', async () => {
    const { output } = await captureOutput(() =>
      searchCommand(['internet not wrking', '--threshold=50', '--limit=1'], windows),
    );
    const result = JSON.parse(output);

    expect(result.matches).toHaveLength(1);
    expect(result.matches[0].key).toBe('check internet connection');
  });

  it('returns 1 when nothing is found', async () => {
    const { exitCode, output } = await captureOutput(() => searchCommand(['zzqx vbnm'], windows));
    expect(exitCode).toBe(1);
    expect(JSON.parse(output)).toMatchObject({ matches: [], diagnoses: [] });
  });

  it('builds only the approximate matcher when no context is given', async () => {
    const train = vi.spyOn(BayesCommandClassifier, 'fromEntries');
    const args = ['lst all fils', '--os=linux', `--config=${join(tmpdir(), 'nlcmd-missing-config.json')}`, '--limit=1'];

    const { exitCode, output } = await captureOutput(() => searchCommand(args));

    expect(exitCode).toBe(0);
    expect(JSON.parse(output).matches[0]).toMatchObject({ key: 'list all files', score: 92.31 });
    expect(train).not.toHaveBeenCalled();
  });

  it('rejects a non-numeric threshold', async () => {
    const { exitCode, output } = await captureOutput(() => searchCommand(['files', '--threshold=high'], windows));
    expect(exitCode).toBe(1);
    expect(JSON.parse(output).error).toBe('Invalid --threshold value "high" (expected a number)');
  });
});

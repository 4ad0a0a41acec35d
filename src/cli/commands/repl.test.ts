import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { replCommand, replLine } from './repl.js';
import { createResolverContext } from '../../context.js';
import type { ResolverContext } from '../../context.js';
import { NO_RESOLUTION_HINT } from '../../resolver/errors.js';

let windows: ResolverContext;

beforeAll(async () => {
  windows = await createResolverContext({
    configPath: join(tmpdir(), 'nlcmd-missing-config.json'),
    overrides: { classifier: 'none', osFamily: 'windows' },
  });
});

beforeEach(() => {
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('replLine', () => {
  it('renders a resolved command with its confidence', async () => {
    const text = await replLine(windows, 'kill process chrome');
    expect(text).toContain('taskkill /IM chrome.exe /F');
    expect(text).toContain('95.0%');
  });

  it('renders every step of a compound request', async () => {
    const text = await replLine(
      windows,
      'create a folder named proj and then create a file named notes.txt inside the folder',
    );
    expect(text).toContain('Multi-command request (2 steps)');
    expect(text).toContain('mkdir proj && echo. > proj\\notes.txt');
  });

  it('shows the rephrase hint when nothing resolves', async () => {
    const text = await replLine(windows, 'zzqx vbnm');
    expect(text).toContain(NO_RESOLUTION_HINT);
  });
});

describe('replCommand', () => {
  const args = ['--os=linux', `--config=${join(tmpdir(), 'nlcmd-missing-config.json')}`];

  it('skips empty lines and leaves on quit', async () => {
    const lines: Array<string | null> = ['', '   ', 'quit'];
    const read = vi.fn(async () => lines.shift() ?? null);

    expect(await replCommand(args, read)).toBe(0);
    expect(read).toHaveBeenCalledTimes(3);
  });

  it('leaves when the prompt is cancelled', async () => {
    const read = vi.fn(async (): Promise<string | null> => null);

    expect(await replCommand(args, read)).toBe(0);
    expect(read).toHaveBeenCalledTimes(1);
  });
});

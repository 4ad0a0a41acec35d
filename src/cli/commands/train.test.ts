import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { trainCommand } from './train.js';
import { loadModel } from '../../classifier/index.js';

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

const DATASET = {
  windows: [
    { query: 'list all files', intent: 'list_files', command: 'dir' },
    { query: 'show ip address', intent: 'show_ip', command: 'ipconfig' },
  ],
  linux: [
    { query: 'list all files', intent: 'list_files', command: 'ls -la' },
    { query: 'show ip address', intent: 'show_ip', command: 'ip addr' },
  ],
};

describe('trainCommand', () => {
  let tmpDir: string;
  let common: string[];

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'nlcmd-train-'));
    common = [`--config=${join(tmpDir, 'missing.json')}`];
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('trains on the dataset and saves a loadable model', async () => {
    const datasetPath = join(tmpDir, 'commands.json');
    const out = join(tmpDir, 'models', 'model.json');
    await writeFile(datasetPath, JSON.stringify(DATASET));

    const { exitCode, output } = await captureOutput(() =>
      trainCommand([...common, `--dataset=${datasetPath}`, `--out=${out}`]),
    );

    expect(exitCode).toBe(0);
    expect(JSON.parse(output)).toEqual({ saved: out, documents: 4, labels: 2 });

    const model = loadModel(out);
    expect(model?.labelToCommand('show_ip', 'linux')).toBe('ip addr');
  });

  it('returns 1 when the dataset cannot be loaded', async () => {
    const datasetPath = join(tmpDir, 'absent.json');
    const { exitCode, output } = await captureOutput(() =>
      trainCommand([...common, `--dataset=${datasetPath}`, `--out=${join(tmpDir, 'model.json')}`]),
    );

    expect(exitCode).toBe(1);
    expect(JSON.parse(output).error).toBe('Dataset unavailable or empty, nothing to train on');
  });
});

/**
 * Tests for the approximate matcher: index build, similarity search,
 * problem diagnosis and smartSearch arbitration.
 */

import { describe, it, expect } from 'vitest';
import { ApproximateMatcher, diagnosisConfidence } from './approximate-matcher.js';
import { diagnose } from './problem-diagnosis.js';
import type { DatasetEntry, DiagnosisCatalog } from '../dataset/types.js';

// ============================================================================
// Fixtures
// ============================================================================

const ENTRIES: DatasetEntry[] = [
  { query: 'List all files', intent: 'list_files', command: 'dir', os: 'windows' },
  { query: 'show system information', intent: 'system_info', command: 'systeminfo', os: 'windows' },
  { query: 'kill chrome', intent: 'kill_chrome', command: 'taskkill /IM chrome.exe /F', os: 'windows' },
  { query: 'list all files', intent: 'list_files', command: 'ls -la', os: 'linux' },
  { query: 'list all files', intent: 'list_everything', command: 'ls -A', os: 'linux' },
  { query: 'show system information', intent: 'system_info', command: 'uname -a', os: 'linux' },
  { query: 'check disk space', intent: 'disk_space', command: 'df -h', os: 'linux' },
];

const CATALOG: DiagnosisCatalog = {
  categories: [
    {
      category: 'network',
      keywords: ['network', 'internet', 'connection', 'not working'],
      windows: [
        { problem: 'internet not working', solution: 'ipconfig /release && ipconfig /renew', explanation: 'Reset network connection' },
        { problem: 'wifi not connecting', solution: 'netsh wlan show networks', explanation: 'Show WiFi networks' },
      ],
      linux: [
        { problem: 'internet not working', solution: 'sudo systemctl restart NetworkManager', explanation: 'Restart network service' },
      ],
    },
    {
      category: 'performance',
      keywords: ['slow', 'cpu', 'memory'],
      windows: [
        { problem: 'computer slow', solution: 'tasklist /V', explanation: 'Check processes' },
      ],
      linux: [
        { problem: 'system slow', solution: 'top -bn1 | head -20', explanation: 'Show resource usage' },
      ],
    },
  ],
};

// ============================================================================
// Index
// ============================================================================

describe('ApproximateMatcher index', () => {
  const matcher = new ApproximateMatcher(ENTRIES, CATALOG);

  it('case-folds keys and deduplicates them', () => {
    expect(matcher.size).toBe(4);
  });

  it('keeps the first record as the primary command', () => {
    expect(matcher.lookup('LIST ALL FILES')?.command).toBe('dir');
  });

  it('keeps the first record per OS family', () => {
    expect(matcher.lookup('list all files', 'linux')?.command).toBe('ls -la');
    expect(matcher.lookup('check disk space', 'windows')).toBeNull();
  });
});

// ============================================================================
// Similarity Search
// ============================================================================

describe('ApproximateMatcher.search', () => {
  const matcher = new ApproximateMatcher(ENTRIES, CATALOG);

  it('finds the intended query despite typos', () => {
    const results = matcher.search('lst all fils', 70, 5, 'linux');
    expect(results[0].key).toBe('list all files');
    expect(results[0].score).toBe(92.31);
    expect(results[0].info.command).toBe('ls -la');
  });

  it('skips keys without a command for the requested family', () => {
    const results = matcher.search('kill chrome', 0, 10, 'linux');
    expect(results.map((r) => r.key)).not.toContain('kill chrome');
  });

  it('sorts by score descending and truncates to the limit', () => {
    const results = matcher.search('show system', 0, 2);
    expect(results).toHaveLength(2);
    expect(results[0].score).toBeGreaterThanOrEqual(results[1].score);
  });

  it('never returns more results for a higher threshold', () => {
    const counts = [0, 30, 60, 90, 100].map((t) => matcher.search('show systm info', t, 10).length);
    for (let i = 1; i < counts.length; i++) {
      expect(counts[i]).toBeLessThanOrEqual(counts[i - 1]);
    }
  });

  it('returns nothing for blank input', () => {
    expect(matcher.search('   ', 0, 5)).toEqual([]);
  });
});

// ============================================================================
// Problem Diagnosis
// ============================================================================

describe('diagnose', () => {
  it('adds keyword hits and shared problem words', () => {
    const solutions = diagnose('internet not wrking', 'windows', CATALOG);
    expect(solutions.map((s) => [s.problem, s.relevance])).toEqual([
      ['internet not working', 3],
      ['wifi not connecting', 2],
    ]);
  });

  it('skips entries that share no word with the query', () => {
    const solutions = diagnose('internet outage', 'windows', CATALOG);
    expect(solutions).toHaveLength(1);
    expect(solutions[0].relevance).toBe(2);
  });

  it('uses the entries of the requested family', () => {
    const solutions = diagnose('my system is slow', 'linux', CATALOG);
    expect(solutions[0].command).toBe('top -bn1 | head -20');
    expect(solutions[0].category).toBe('performance');
  });

  it('returns nothing when no category keyword occurs', () => {
    expect(diagnose('rename my files', 'windows', CATALOG)).toEqual([]);
  });
});

describe('diagnosisConfidence', () => {
  it('grows by 5 per relevance point and caps at 90', () => {
    expect(diagnosisConfidence(2)).toBe(85);
    expect(diagnosisConfidence(3)).toBe(90);
    expect(diagnosisConfidence(7)).toBe(90);
  });
});

// ============================================================================
// smartSearch
// ============================================================================

describe('ApproximateMatcher.smartSearch', () => {
  it('prefers a relevant diagnosis over weaker similarity', () => {
    const matcher = new ApproximateMatcher(ENTRIES, CATALOG);
    const result = matcher.smartSearch('internet not wrking', 'windows');
    expect(result.best).toMatchObject({
      source: 'problem_diagnosis',
      command: 'ipconfig /release && ipconfig /renew',
      category: 'network',
    });
    expect(result.confidence).toBe(90);
  });

  it('takes a strong similarity match when no diagnosis applies', () => {
    const matcher = new ApproximateMatcher(ENTRIES, CATALOG);
    const result = matcher.smartSearch('lst all fils', 'windows');
    expect(result.best).toMatchObject({
      source: 'fuzzy_match',
      command: 'dir',
      matchedQuery: 'list all files',
    });
    expect(result.confidence).toBe(92.31);
  });

  it('lets an exact similarity hit beat a capped diagnosis', () => {
    const entries: DatasetEntry[] = [
      { query: 'internet not working', intent: 'ping', command: 'ping 8.8.8.8', os: 'windows' },
    ];
    const matcher = new ApproximateMatcher(entries, CATALOG);
    const result = matcher.smartSearch('internet not working', 'windows');
    expect(result.best?.source).toBe('fuzzy_match');
    expect(result.best?.command).toBe('ping 8.8.8.8');
    expect(result.confidence).toBe(100);
  });

  it('falls back to a weak similarity match', () => {
    const matcher = new ApproximateMatcher(ENTRIES, CATALOG, { strongSimilarity: 99 });
    const result = matcher.smartSearch('lst all fils', 'windows');
    expect(result.best?.source).toBe('fuzzy_match');
    expect(result.confidence).toBe(92.31);
  });

  it('falls back to a low-relevance diagnosis before weak similarity', () => {
    const matcher = new ApproximateMatcher(ENTRIES, CATALOG, { diagnosisMinRelevance: 5 });
    const result = matcher.smartSearch('internet not wrking', 'windows');
    expect(result.best?.source).toBe('problem_diagnosis');
    expect(result.confidence).toBe(90);
  });

  it('reports no best match when nothing is close', () => {
    const matcher = new ApproximateMatcher(ENTRIES, CATALOG);
    const result = matcher.smartSearch('zzzz qqqq', 'windows');
    expect(result.best).toBeNull();
    expect(result.confidence).toBe(0);
  });

  it('works without a diagnosis catalog', () => {
    const matcher = new ApproximateMatcher(ENTRIES);
    expect(matcher.diagnose('internet not wrking', 'windows')).toEqual([]);
  });
});

import { describe, it, expect } from 'vitest';
import { TableRuleMatcher, isNoOpPlaceholder, noOpPlaceholder } from './rule-matcher.js';
import type { RuleTable } from '../dataset/types.js';

const TABLE: RuleTable = {
  windows: [
    { keywords: ['list', 'files'], command: 'dir' },
    { keywords: ['system', 'info'], command: 'systeminfo' },
  ],
  linux: [
    { keywords: ['list', 'files'], command: 'ls -la' },
    { keywords: ['files'], command: 'ls' },
    { keywords: ['system', 'info'], command: 'uname -a' },
  ],
};

describe('TableRuleMatcher', () => {
  const rules = new TableRuleMatcher(TABLE);

  it('matches when every keyword occurs as a word', () => {
    expect(rules.match('Please LIST my files!', 'linux')).toBe('ls -la');
    expect(rules.match('show system info', 'windows')).toBe('systeminfo');
  });

  it('takes the first matching rule', () => {
    expect(rules.match('files list', 'linux')).toBe('ls -la');
    expect(rules.match('show files', 'linux')).toBe('ls');
  });

  it('does not match keywords inside longer words', () => {
    expect(rules.match('listing profiles', 'linux')).toBe(noOpPlaceholder('listing profiles'));
  });

  it('returns a recognizable placeholder on a miss', () => {
    const command = rules.match('make coffee', 'windows');
    expect(command).toBe('echo "Command not recognized: make coffee"');
    expect(isNoOpPlaceholder(command)).toBe(true);
  });
});

describe('isNoOpPlaceholder', () => {
  it('recognizes placeholder variants', () => {
    expect(isNoOpPlaceholder("echo 'Unknown command'")).toBe(true);
    expect(isNoOpPlaceholder('echo command not recognized')).toBe(true);
  });

  it('rejects real commands', () => {
    expect(isNoOpPlaceholder('echo hello > notes.txt')).toBe(false);
    expect(isNoOpPlaceholder('ls -la')).toBe(false);
  });
});

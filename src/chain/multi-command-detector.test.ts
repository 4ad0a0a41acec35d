import { describe, it, expect } from 'vitest';
import { detectMultiCommand, splitCommands } from './multi-command-detector.js';

describe('detectMultiCommand', () => {
  it('needs two action verbs and a conjunction', () => {
    expect(detectMultiCommand('list files and then show info')).toEqual({
      isMultiCommand: true,
      actionCount: 2,
      actions: ['list', 'show'],
      markers: ['and then', 'then', 'and'],
    });
  });

  it('rejects a single action', () => {
    expect(detectMultiCommand('list all files')).toEqual({
      isMultiCommand: false,
      actionCount: 1,
      actions: ['list'],
      markers: [],
    });
  });

  it('rejects a marker with only one action', () => {
    expect(detectMultiCommand('make coffee then drink it').isMultiCommand).toBe(false);
  });

  it('rejects two actions without a marker', () => {
    const detection = detectMultiCommand('show the list');
    expect(detection.actionCount).toBe(2);
    expect(detection.isMultiCommand).toBe(false);
  });

  it('counts repeated verbs', () => {
    expect(detectMultiCommand('create a, create b').actions).toEqual(['create', 'create']);
  });

  it('matches markers on word boundaries only', () => {
    expect(detectMultiCommand('create android folder').markers).toEqual([]);
  });
});

describe('splitCommands', () => {
  it('splits on the first separator that applies', () => {
    expect(splitCommands('list files and then show info')).toEqual(['list files', 'show info']);
  });

  it('prefers commas over conjunctions', () => {
    expect(splitCommands('create a, delete b and list c')).toEqual(['create a', 'delete b and list c']);
  });

  it('prefers "then" over "and" when there is no "and then"', () => {
    expect(splitCommands('copy a and b then list')).toEqual(['copy a and b', 'list']);
  });

  it('drops empty segments', () => {
    expect(splitCommands('list files;; show info;')).toEqual(['list files', 'show info']);
  });

  it('keeps an unsplittable query whole', () => {
    expect(splitCommands('  list all files ')).toEqual(['list all files']);
  });
});

/**
 * Tests for the query normalizer.
 */

import { describe, it, expect } from 'vitest';
import { normalize, normalizeText, extractKeywords, extractLiteralParameters } from './query-normalizer.js';

describe('normalizeText', () => {
  it('lowercases, strips punctuation and collapses whitespace', () => {
    expect(normalizeText('  Show   Hidden, Files!! ')).toBe('show hidden files');
  });

  it('keeps hyphens and underscores', () => {
    expect(normalizeText('open my-app and old_file')).toBe('open my-app and old_file');
  });

  it('is idempotent', () => {
    const once = normalizeText('Create a folder named "Proj" (now)!');
    expect(normalizeText(once)).toBe(once);
  });
});

describe('extractKeywords', () => {
  it('drops stop-words and keeps input order', () => {
    expect(extractKeywords('show the hidden files in the directory')).toEqual([
      'show',
      'hidden',
      'files',
      'directory',
    ]);
  });
});

describe('normalize', () => {
  it('partitions keywords into actions, targets and modifiers', () => {
    const result = normalize('Kill chrome process!');
    expect(result.normalized).toBe('kill chrome process');
    expect(result.actions).toEqual(['kill']);
    expect(result.targets).toEqual(['process']);
    expect(result.modifiers).toEqual(['chrome']);
    expect(result.isValid).toBe(true);
  });

  it('marks empty input invalid', () => {
    const result = normalize('   ');
    expect(result.isValid).toBe(false);
    expect(result.keywords).toEqual([]);
    expect(result.parameters).toEqual({});
  });

  it('marks all-stop-word input invalid', () => {
    const result = normalize('and the it is');
    expect(result.isValid).toBe(false);
    expect(result.normalized).toBe('and the it is');
  });

  it('returns an already-normalized query unchanged', () => {
    const first = normalize('List ALL files, please.');
    const second = normalize(first.normalized);
    expect(second.normalized).toBe(first.normalized);
    expect(second.keywords).toEqual(first.keywords);
  });

  it('keeps the original text untouched', () => {
    const result = normalize('Ping 10.0.0.1!');
    expect(result.original).toBe('Ping 10.0.0.1!');
  });
});

describe('extractLiteralParameters', () => {
  it('extracts a filename from the original text', () => {
    expect(extractLiteralParameters('find file named test.txt').filename).toBe('test.txt');
  });

  it('extracts url, ip and port', () => {
    const params = extractLiteralParameters('fetch https://example.com/index.html from 192.168.1.20 on port 8080');
    expect(params.url).toBe('https://example.com/index.html');
    expect(params.ip).toBe('192.168.1.20');
    expect(params.port).toBe('8080');
  });

  it('takes the first number', () => {
    expect(extractLiteralParameters('show top 10 of 25 processes').number).toBe('10');
  });

  it('extracts unquoted linux and windows paths', () => {
    expect(extractLiteralParameters('list files in /var/log').path).toBe('/var/log');
    expect(extractLiteralParameters('list files in C:\\Users\\dev').path).toBe('C:\\Users\\dev');
  });

  it('extracts an extension and quoted content', () => {
    expect(extractLiteralParameters('find all .py files').extension).toBe('py');
    expect(extractLiteralParameters("make notes.txt with content 'hello there'").content).toBe('hello there');
  });

  it('omits parameters that are absent', () => {
    expect(extractLiteralParameters('list all files')).toEqual({});
  });
});

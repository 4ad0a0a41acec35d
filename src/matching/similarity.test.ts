import { describe, it, expect } from 'vitest';
import { similarity, ratio, partialRatio, tokenSortRatio, tokenSetRatio } from './similarity.js';

describe('ratio', () => {
  it('is 100 for identical strings', () => {
    expect(ratio('list files', 'list files')).toBe(100);
  });

  it('prices a substitution as a deletion plus an insertion', () => {
    expect(ratio('abc', 'abd')).toBeCloseTo(66.67, 2);
  });
});

describe('partialRatio', () => {
  it('finds the shorter string inside the longer one', () => {
    expect(partialRatio('chrome', 'kill chrome browser now')).toBe(100);
  });
});

describe('tokenSortRatio', () => {
  it('ignores token order', () => {
    expect(tokenSortRatio('files list', 'list files')).toBe(100);
  });
});

describe('tokenSetRatio', () => {
  it('is 100 when one token set contains the other', () => {
    expect(tokenSetRatio('files list', 'list all files')).toBe(100);
  });
});

describe('similarity', () => {
  it('scores identical strings 100', () => {
    expect(similarity('list all files', 'list all files')).toBe(100);
  });

  it('scores empty input 0', () => {
    expect(similarity('', 'list all files')).toBe(0);
  });

  it('tolerates deleted letters', () => {
    expect(similarity('lst all fils', 'list all files')).toBe(92.31);
  });

  it('tolerates transposed letters', () => {
    expect(similarity('sohw files', 'show files')).toBe(90);
  });

  it('discounts partial matches of much shorter input', () => {
    expect(similarity('chrome', 'kill chrome browser now')).toBe(90);
  });

  it('stays within 0-100', () => {
    const score = similarity('shutdown the computer', 'show disk usage');
    expect(score).toBeGreaterThanOrEqual(0);
    expect(score).toBeLessThanOrEqual(100);
  });
});

/**
 * Tests for citation marker helpers
 */

import { describe, it, expect } from 'vitest';
import { countSpokenWords, extractCitationIds, stripCitations } from '../lib/script/citations';

describe('citation markers', () => {
  it('should strip markers and the whitespace before them', () => {
    expect(stripCitations('Rates rose [src: 2] again.')).toBe('Rates rose again.');
    expect(stripCitations('Both [src: 0][src:1] matter')).toBe('Both matter');
    expect(stripCitations('[src: 3]')).toBe('');
  });

  it('should leave unmarked text alone apart from whitespace', () => {
    expect(stripCitations('  Plain   text  ')).toBe('Plain text');
  });

  it('should extract ids once each, in order of appearance', () => {
    expect(extractCitationIds('a [src: 1] b [src:0] c [ src: 9 ] d [src: 1]')).toEqual([1, 0]);
    expect(extractCitationIds('no markers')).toEqual([]);
  });

  it('should not count markers as spoken words', () => {
    expect(countSpokenWords('Rates rose [src: 2] again.')).toBe(3);
    expect(countSpokenWords('[src: 0]')).toBe(0);
  });
});

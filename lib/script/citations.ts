/**
 * Helpers for inline `[src: N]` citation markers
 */

import { countWords } from '../utils';

const CITATION_PATTERN = /\s*\[src:\s*(\d+)\s*\]/g;

export const CITATION_PREFIX = '[src:';

/**
 * Remove citation markers (and the whitespace before them) from spoken text
 */
export function stripCitations(text: string): string {
  return text.replace(CITATION_PATTERN, '').replace(/\s+/g, ' ').trim();
}

export function extractCitationIds(text: string): number[] {
  const ids: number[] = [];
  for (const match of text.matchAll(CITATION_PATTERN)) {
    const id = parseInt(match[1], 10);
    if (!ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

export function countSpokenWords(text: string): number {
  return countWords(stripCitations(text));
}

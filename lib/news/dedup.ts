/**
 * Article deduplication - exact URL match plus near-duplicate titles
 */

import { Article } from '../types';

export const TITLE_SIMILARITY_THRESHOLD = 0.8;

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ');
}

/**
 * Jaccard similarity over the word sets of two normalized titles.
 * An empty word set never matches anything.
 */
export function titleSimilarity(normalizedA: string, normalizedB: string): number {
  const wordsA = new Set(normalizedA.split(' ').filter(Boolean));
  const wordsB = new Set(normalizedB.split(' ').filter(Boolean));

  if (wordsA.size === 0 || wordsB.size === 0) {
    return 0;
  }

  let intersection = 0;
  wordsA.forEach(word => {
    if (wordsB.has(word)) intersection++;
  });
  const union = wordsA.size + wordsB.size - intersection;

  return intersection / union;
}

export function deduplicateArticles(articles: readonly Article[]): Article[] {
  const seenUrls = new Set<string>();
  const seenTitles: string[] = [];
  const unique: Article[] = [];

  for (const article of articles) {
    const { title, url } = article;
    if (!title || !url) {
      continue;
    }

    if (seenUrls.has(url)) {
      continue;
    }

    const normalized = normalizeTitle(title);
    const isNearDuplicate = seenTitles.some(
      seen => titleSimilarity(normalized, seen) >= TITLE_SIMILARITY_THRESHOLD
    );
    if (isNearDuplicate) {
      continue;
    }

    seenUrls.add(url);
    seenTitles.push(normalized);
    unique.push(article);
  }

  return unique;
}

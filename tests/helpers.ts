/**
 * Shared fixtures for agent and pipeline tests
 */

import { Article, DialogueLine, HostPair, Story } from '../lib/types';

export const hosts: HostPair = [
  { name: 'Maya', personality: 'Curious.', style: 'Quick.', voice: 'nova' },
  { name: 'Theo', personality: 'Skeptical.', style: 'Measured.', voice: 'onyx' },
];

export function makeStories(count: number): Story[] {
  return Array.from({ length: count }, (_, id) => ({
    id,
    title: `Story ${id}`,
    url: `https://example.com/${id}`,
    source: 'Example Wire',
    summary: `Summary ${id}.`,
  }));
}

/**
 * Distinct, dated articles that survive deduplication
 */
export function makeArticles(count: number): Article[] {
  const topics = ['rivers', 'mountains', 'satellites', 'orchards', 'glaciers', 'libraries', 'harbors'];
  return Array.from({ length: count }, (_, idx) => ({
    title: `Report on ${topics[idx % topics.length]} number ${idx}`,
    url: `https://example.com/articles/${idx}`,
    sourceName: 'Example Wire',
    description: `A description about ${topics[idx % topics.length]} that is long enough to use.`,
    publishedAt: `2026-10-${String(10 + idx).padStart(2, '0')}T08:00:00Z`,
  }));
}

/**
 * A Dialogue Model reply for `storyCount` stories: `lineCount` lines of
 * `words` spoken words, each citing one story, alternating hosts.
 */
export function buildReply(storyCount: number, lineCount = 50, words = 14): string {
  const dialogue: DialogueLine[] = Array.from({ length: lineCount }, (_, idx) => {
    const storyId = idx % storyCount;
    return {
      speaker: hosts[idx % 2].name,
      text: `${Array.from({ length: words }, () => 'word').join(' ')} [src: ${storyId}]`,
      segment: `story_${storyId}`,
      sources: [storyId],
    };
  });

  return JSON.stringify({
    rundown: [
      { segment: 'cold_open', duration_estimate: 45 },
      ...Array.from({ length: storyCount }, (_, id) => ({ segment: `story_${id}`, duration_estimate: 90 })),
      { segment: 'kicker', duration_estimate: 30 },
    ],
    dialogue,
    disclaimer: 'Generated for testing.',
  });
}

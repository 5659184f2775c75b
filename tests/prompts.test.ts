/**
 * Tests for prompt composition
 */

import { describe, it, expect } from 'vitest';
import { buildSystemPrompt, buildUserPrompt, composePrompt, segmentNames } from '../lib/script/prompts';
import { HostPair, Story } from '../lib/types';

const hosts: HostPair = [
  { name: 'Maya', personality: 'Curious and upbeat.', style: 'Short punchy questions.', voice: 'nova' },
  { name: 'Theo', personality: 'Dry and skeptical.', style: 'Long explanations.', voice: 'onyx' },
];

const stories: Story[] = [
  {
    id: 0,
    title: 'Chipmaker ships new processor',
    url: 'https://example.com/chips',
    source: 'Example Wire',
    summary: 'A new processor shipped.',
    publishedAt: '2026-10-18T09:00:00Z',
  },
  {
    id: 1,
    title: 'City council approves budget',
    url: 'https://example.com/budget',
    source: 'Metro Ledger',
    summary: 'The budget passed.',
  },
];

describe('segmentNames', () => {
  it('should bracket one segment per story with cold_open and kicker', () => {
    expect(segmentNames(3)).toEqual(['cold_open', 'story_0', 'story_1', 'story_2', 'kicker']);
    expect(segmentNames(0)).toEqual(['cold_open', 'kicker']);
  });
});

describe('buildSystemPrompt', () => {
  const base = {
    hosts,
    targetDurationMin: 5,
    targetWordCount: 650,
    storyCount: 3,
    profanityFilter: false,
  };

  it('should describe both hosts', () => {
    const prompt = buildSystemPrompt(base);
    expect(prompt).toContain('**Maya**: Curious and upbeat.\n   Speaking style: Short punchy questions.');
    expect(prompt).toContain('**Theo**: Dry and skeptical.\n   Speaking style: Long explanations.');
    expect(prompt).toContain('"speaker" must be exactly "Maya" or "Theo".');
  });

  it('should state the word target as a floor', () => {
    const prompt = buildSystemPrompt(base);
    expect(prompt).toContain('at least 650 spoken words');
    expect(prompt).toContain('650 words is a FLOOR, not a ceiling.');
  });

  it('should list the segment names in order', () => {
    expect(buildSystemPrompt(base)).toContain(
      'Use exactly these segment names, in this order: cold_open, story_0, story_1, story_2, kicker.'
    );
  });

  it('should require the citation marker format', () => {
    expect(buildSystemPrompt(base)).toContain('[src: <story id>]');
  });

  it('should only add the language section when the filter is on', () => {
    expect(buildSystemPrompt(base)).not.toContain('## LANGUAGE');
    expect(buildSystemPrompt({ ...base, profanityFilter: true })).toContain(
      '## LANGUAGE\nKeep it clean: no profanity or crude language.'
    );
  });

  it('should drop the word floor when the target is not positive', () => {
    const prompt = buildSystemPrompt({ ...base, targetWordCount: 0 });
    expect(prompt).toContain('No minimum word count is enforced');
    expect(prompt).not.toContain('FLOOR');
  });

  it('should be deterministic', () => {
    expect(buildSystemPrompt(base)).toBe(buildSystemPrompt(base));
  });
});

describe('buildUserPrompt', () => {
  it('should render every story in list order', () => {
    const prompt = buildUserPrompt(stories);

    expect(prompt).toContain(
      '## STORY 0\n**Title**: Chipmaker ships new processor\n**Source**: Example Wire\n**Summary**: A new processor shipped.\n**URL**: https://example.com/chips\n**Published**: 2026-10-18T09:00:00Z'
    );
    expect(prompt).toContain(
      '## STORY 1\n**Title**: City council approves budget\n**Source**: Metro Ledger\n**Summary**: The budget passed.\n**URL**: https://example.com/budget\n\n'
    );
    expect(prompt.indexOf('## STORY 0')).toBeLessThan(prompt.indexOf('## STORY 1'));
  });

  it('should omit the published line for undated stories', () => {
    expect(buildUserPrompt([stories[1]])).not.toContain('**Published**');
  });
});

describe('composePrompt', () => {
  it('should derive the story count from the story list', () => {
    const prompt = composePrompt({
      hosts,
      stories,
      targetDurationMin: 5,
      targetWordCount: 650,
      profanityFilter: false,
    });

    expect(prompt.system).toBe(buildSystemPrompt({
      hosts,
      targetDurationMin: 5,
      targetWordCount: 650,
      storyCount: 2,
      profanityFilter: false,
    }));
    expect(prompt.user).toBe(buildUserPrompt(stories));
  });
});

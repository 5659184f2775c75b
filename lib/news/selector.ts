/**
 * Story selection - ranks deduplicated articles by recency and maps them to
 * citation-ready Story records
 */

import { ValidationError } from '../errors';
import { Article, Story, ValidationWarning } from '../types';

const MIN_SUMMARY_SOURCE_LENGTH = 20;
const RECOMMENDED_MIN_STORIES = 3;

const REQUIRED_STORY_FIELDS = ['id', 'title', 'url', 'source', 'summary'] as const;

/**
 * Construct an immutable Story. Throws ValidationError if any required text
 * field is empty.
 */
export function createStory(fields: Story): Story {
  for (const field of ['title', 'url', 'source', 'summary'] as const) {
    if (!fields[field].trim()) {
      throw new ValidationError(`Story ${fields.id} has empty field: ${field}`);
    }
  }
  if (!Number.isInteger(fields.id)) {
    throw new ValidationError(`Story id must be an integer, got ${fields.id}`);
  }

  return Object.freeze({ ...fields });
}

export function summarizeArticle(article: Article): string {
  const description = article.description?.trim() ?? '';
  const content = article.content ?? '';

  let summary: string;
  if (description.length > MIN_SUMMARY_SOURCE_LENGTH) {
    summary = description;
  } else if (content.trim().length > MIN_SUMMARY_SOURCE_LENGTH) {
    summary = content.replace(/\[\+\d+\s+chars?\]/g, '').trim();
  } else {
    summary = article.title?.trim() ?? '';
  }

  summary = summary.split(/(?<=[.!?])\s+/).slice(0, 2).join(' ');

  if (summary && !/[.!?]$/.test(summary)) {
    summary += '.';
  }

  return summary;
}

function byPublishedDesc(a: Article, b: Article): number {
  const left = a.publishedAt || '';
  const right = b.publishedAt || '';
  if (left === right) return 0;
  if (!left) return 1;
  if (!right) return -1;
  return left < right ? 1 : -1;
}

/**
 * Newest first, missing timestamps last, truncated to `count`, ids assigned
 * in output order.
 */
export function selectStories(articles: readonly Article[], count: number): Story[] {
  return [...articles]
    .sort(byPublishedDesc)
    .slice(0, Math.max(0, count))
    .map((article, idx) =>
      createStory({
        id: idx,
        title: article.title || 'Untitled',
        url: article.url || '',
        source: article.sourceName || 'Unknown Source',
        summary: summarizeArticle(article),
        ...(article.publishedAt ? { publishedAt: article.publishedAt } : {}),
      })
    );
}

/**
 * Fatal on an empty list or a story with a missing or empty required field;
 * returns a warning when fewer than three stories were found.
 */
export function validateStories(stories: ReadonlyArray<Partial<Story>>): ValidationWarning[] {
  if (stories.length === 0) {
    throw new ValidationError('No news stories provided');
  }

  for (const story of stories) {
    const label = story.id ?? '?';
    for (const field of REQUIRED_STORY_FIELDS) {
      const value = story[field];
      if (value === undefined || value === null) {
        throw new ValidationError(`Story ${label} missing required field: ${field}`);
      }
      if (field !== 'id' && (typeof value !== 'string' || !value.trim())) {
        throw new ValidationError(`Story ${label} has empty field: ${field}`);
      }
    }
  }

  if (stories.length < RECOMMENDED_MIN_STORIES) {
    return [{
      code: 'few_stories',
      message: `Only ${stories.length} stories (recommended: ${RECOMMENDED_MIN_STORIES}-6)`,
    }];
  }
  return [];
}

/**
 * Ingestion Agent - Fetches, deduplicates and selects the episode's stories
 */

import { BaseAgent } from './base';
import { Story, ValidationWarning } from '../types';
import { NewsApiTool, NewsSource } from '../tools/news-api';
import { deduplicateArticles } from '../news/dedup';
import { selectStories, validateStories } from '../news/selector';
import { Logger } from '../utils';

export interface IngestionInput {
  topics: string[];
  region: string;
  hours_back: number;
  max_stories: number;
}

export interface IngestionOutput {
  stories: Story[];
  warnings: ValidationWarning[];
  detailed_report: {
    articles_fetched: number;
    articles_after_dedup: number;
    articles_dropped: number;
    stories_selected: number;
  };
}

export class IngestionAgent extends BaseAgent<IngestionInput, IngestionOutput> {
  private newsSource: NewsSource;

  constructor(newsSource: NewsSource = new NewsApiTool()) {
    super({
      name: 'IngestionAgent',
    });

    this.newsSource = newsSource;
  }

  protected async process(input: IngestionInput): Promise<IngestionOutput> {
    const { topics, region, hours_back, max_stories } = input;

    Logger.info('Fetching news', { topics, region, hours_back });
    const articles = await this.newsSource.fetchArticles({
      topics,
      region,
      hoursBack: hours_back,
    });

    const unique = deduplicateArticles(articles);
    Logger.info('After deduplication', {
      before: articles.length,
      after: unique.length,
    });

    const stories = selectStories(unique, max_stories);
    const warnings = validateStories(stories);
    warnings.forEach(warning => Logger.warn(warning.message, { code: warning.code }));

    Logger.info(`Selected ${stories.length} stories for podcast`, {
      titles: stories.map(story => story.title),
    });

    return {
      stories,
      warnings,
      detailed_report: {
        articles_fetched: articles.length,
        articles_after_dedup: unique.length,
        articles_dropped: articles.length - unique.length,
        stories_selected: stories.length,
      },
    };
  }
}

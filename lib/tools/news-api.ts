/**
 * News API Tool - Fetches recent articles from NewsAPI.org
 */

import { z } from 'zod';
import { Config } from '../config';
import { NewsSourceError, errorMessage } from '../errors';
import { Article } from '../types';
import { Clock, Logger } from '../utils';
import { HttpError, HttpTool } from './http';

export interface NewsQuery {
  topics: string[];
  region: string;
  hoursBack: number;
}

export interface NewsSource {
  fetchArticles(query: NewsQuery): Promise<Article[]>;
}

const RawArticleSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  source: z.object({ name: z.string().nullish() }).nullish(),
  description: z.string().nullish(),
  content: z.string().nullish(),
  publishedAt: z.string().nullish(),
});

const NewsApiResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  articles: z.array(RawArticleSchema).optional(),
});

type RawArticle = z.infer<typeof RawArticleSchema>;

const PAGE_SIZE = 20;

function toArticle(raw: RawArticle): Article {
  return {
    ...(raw.title ? { title: raw.title } : {}),
    ...(raw.url ? { url: raw.url } : {}),
    ...(raw.source?.name ? { sourceName: raw.source.name } : {}),
    ...(raw.description ? { description: raw.description } : {}),
    ...(raw.content ? { content: raw.content } : {}),
    ...(raw.publishedAt ? { publishedAt: raw.publishedAt } : {}),
  };
}

/**
 * NewsAPI wants `from` without the trailing millisecond/zone suffix
 */
function formatFromDate(date: Date): string {
  return date.toISOString().slice(0, 19);
}

export class NewsApiTool implements NewsSource {
  constructor(
    private apiKey: string = Config.NEWSAPI_KEY,
    private baseUrl: string = Config.NEWSAPI_BASE_URL,
    private maxRetries: number = 3
  ) {}

  async fetchArticles(query: NewsQuery): Promise<Article[]> {
    const { topics, region, hoursBack } = query;
    const from = formatFromDate(Clock.addHours(Clock.nowUtc(), -hoursBack));

    const articles: Article[] = [];
    for (const topic of topics) {
      const found = await this.fetchByTopic(topic, from);
      Logger.info(`Fetched topic "${topic}"`, { articles: found.length });
      articles.push(...found);
    }

    if (articles.length === 0) {
      Logger.warn('No articles found for provided topics, trying top headlines', { region });
      articles.push(...(await this.fetchTopHeadlines(region)));
    }

    if (articles.length === 0) {
      throw new NewsSourceError('No news articles found. Check your API key or try different topics.');
    }

    return articles;
  }

  /**
   * A failing topic contributes nothing rather than failing the run
   */
  private async fetchByTopic(topic: string, from: string): Promise<Article[]> {
    const params = new URLSearchParams({
      q: topic,
      from,
      language: 'en',
      sortBy: 'publishedAt',
      pageSize: String(PAGE_SIZE),
    });

    try {
      const body = await this.request(`${this.baseUrl}/everything?${params}`);
      if (body.status !== 'ok') {
        Logger.warn(`NewsAPI returned status '${body.status}' for topic`, { topic, message: body.message });
        return [];
      }
      return (body.articles ?? []).map(toArticle);
    } catch (error) {
      Logger.warn('Failed to fetch articles for topic', { topic, error: errorMessage(error) });
      return [];
    }
  }

  private async fetchTopHeadlines(region: string): Promise<Article[]> {
    const params = new URLSearchParams({ country: region, pageSize: String(PAGE_SIZE) });

    let body: z.infer<typeof NewsApiResponseSchema>;
    try {
      body = await this.request(`${this.baseUrl}/top-headlines?${params}`);
    } catch (error) {
      throw new NewsSourceError(`Failed to connect to NewsAPI: ${errorMessage(error)}`, { cause: error });
    }

    if (body.status !== 'ok') {
      throw new NewsSourceError(`NewsAPI error: ${body.message ?? 'Unknown error'}`);
    }
    return (body.articles ?? []).map(toArticle);
  }

  private async request(url: string): Promise<z.infer<typeof NewsApiResponseSchema>> {
    let text: string;
    try {
      const response = await HttpTool.fetch(url, {
        headers: { 'X-Api-Key': this.apiKey },
        maxRetries: this.maxRetries,
      });
      text = response.text;
    } catch (error) {
      // NewsAPI explains 401/426/429 in a JSON body
      if (error instanceof HttpError) {
        const parsed = NewsApiResponseSchema.safeParse(safeJson(error.body));
        if (parsed.success) return parsed.data;
      }
      throw error;
    }

    const parsed = NewsApiResponseSchema.safeParse(safeJson(text));
    if (!parsed.success) {
      throw new Error(`Unexpected NewsAPI response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return parsed.data;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

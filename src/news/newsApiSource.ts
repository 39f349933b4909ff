import fetch from 'node-fetch';
import { z } from 'zod';
import { AppConfig } from '../config';
import { NewsArticle, NewsSource, NewsSourceKind } from '../types';

const NEWS_TIMEOUT_MS = 10_000;
export const DESCRIPTION_LIMIT = 200;

const articleSchema = z.object({
  title: z.string().nullish(),
  url: z.string().nullish(),
  publishedAt: z.string().nullish(),
  source: z.object({ name: z.string().nullish() }).nullish(),
  description: z.string().nullish(),
});

const everythingResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  articles: z.array(articleSchema).optional(),
});

export function buildKeywordQuery(city: string): string {
  return `properti ${city} OR real estate ${city} OR perumahan ${city}`;
}

export class NewsApiSource implements NewsSource {
  public readonly kind: NewsSourceKind = 'newsApi';

  constructor(
    private readonly config: AppConfig,
    private readonly limit = 5,
  ) {}

  async fetchArticles(city: string): Promise<NewsArticle[]> {
    const apiKey = this.config.newsApiKey;
    if (!apiKey) return [];

    const params = new URLSearchParams({
      q: buildKeywordQuery(city),
      language: 'id',
      sortBy: 'publishedAt',
      pageSize: String(this.limit),
      apiKey,
    });

    try {
      const res = await fetch(`${this.config.newsApiUrl}?${params.toString()}`, {
        timeout: NEWS_TIMEOUT_MS,
      });
      const parsed = everythingResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(`NewsAPI returned an unexpected payload (${res.status}).`);
      }

      const data = parsed.data;
      if (data.status === 'error') {
        console.error(`❌ NewsAPI Error: ${data.message ?? 'unknown error'}`);
        return [];
      }
      if (!res.ok) {
        throw new Error(`NewsAPI error: ${res.status}`);
      }

      return (data.articles ?? []).map((a) => ({
        title: a.title ?? '',
        url: a.url ?? '',
        published: a.publishedAt ?? '',
        source: a.source?.name ?? '',
        description: (a.description ?? '').slice(0, DESCRIPTION_LIMIT),
      }));
    } catch (err) {
      console.warn('⚠️ NewsAPI error:', err instanceof Error ? err.message : err);
      return [];
    }
  }
}

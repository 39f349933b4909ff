import { AppConfig } from '../config';
import { NewsArticle, NewsSource, NewsSourceKind } from '../types';
import { NewsApiSource } from './newsApiSource';
import { RssFeedSource, RssFeedOptions } from './rssFeedSource';

export type NewsSourcesRegistry = {
  rss: NewsSource;
  newsApi?: NewsSource;
};

export function createNewsSources(
  config: AppConfig,
  rssOptions?: RssFeedOptions,
): NewsSourcesRegistry {
  return {
    rss: new RssFeedSource(config, rssOptions),
    newsApi: config.newsApiKey ? new NewsApiSource(config) : undefined,
  };
}

export type MarketNews = {
  articles: NewsArticle[];
  usedSource: NewsSourceKind;
};

/**
 * Keyword search first when it is configured; the feeds only when the
 * search produced nothing. Results are never merged.
 */
export async function gatherMarketNews(
  sources: NewsSourcesRegistry,
  city: string,
): Promise<MarketNews> {
  if (sources.newsApi) {
    console.log('📡 Mengakses NewsAPI...');
    const articles = await sources.newsApi.fetchArticles(city);
    if (articles.length) {
      return { articles, usedSource: sources.newsApi.kind };
    }
  }

  console.log('📡 Menggunakan RSS feeds...');
  const articles = await sources.rss.fetchArticles(city);
  return { articles, usedSource: sources.rss.kind };
}

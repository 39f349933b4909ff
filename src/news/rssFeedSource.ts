import fetch from 'node-fetch';
import Parser from 'rss-parser';
import { setTimeout as sleep } from 'node:timers/promises';
import { AppConfig } from '../config';
import { NewsArticle, NewsSource, NewsSourceKind } from '../types';
import { DESCRIPTION_LIMIT } from './newsApiSource';

const FEED_TIMEOUT_MS = 10_000;

export type RssFeedOptions = {
  limitPerFeed?: number;
  // Pause between two feed requests.
  delayMs?: number;
};

function feedHost(feedUrl: string): string {
  try {
    return new URL(feedUrl).hostname;
  } catch {
    return feedUrl;
  }
}

/**
 * Reads the configured syndication feeds one after another. The city is
 * ignored: the feeds are fixed property-news channels.
 */
export class RssFeedSource implements NewsSource {
  public readonly kind: NewsSourceKind = 'rss';

  private readonly parser = new Parser<object, object>();
  private readonly limitPerFeed: number;
  private readonly delayMs: number;

  constructor(
    private readonly config: AppConfig,
    options: RssFeedOptions = {},
  ) {
    this.limitPerFeed = options.limitPerFeed ?? 3;
    this.delayMs = options.delayMs ?? 500;
  }

  async fetchArticles(_city?: string): Promise<NewsArticle[]> {
    const articles: NewsArticle[] = [];

    for (const [idx, feedUrl] of this.config.rssFeeds.entries()) {
      if (idx > 0 && this.delayMs > 0) {
        await sleep(this.delayMs);
      }

      try {
        console.log(`📡 Mengambil feed: ${feedHost(feedUrl)}`);
        articles.push(...(await this.fetchFeed(feedUrl)));
      } catch (err) {
        console.warn(
          `⚠️ RSS error for ${feedUrl}:`,
          err instanceof Error ? err.message : err,
        );
      }
    }

    return articles;
  }

  private async fetchFeed(feedUrl: string): Promise<NewsArticle[]> {
    const res = await fetch(feedUrl, {
      headers: { 'User-Agent': this.config.userAgent },
      timeout: FEED_TIMEOUT_MS,
    });
    if (!res.ok) {
      throw new Error(`Feed request failed ${res.status}`);
    }

    const feed = await this.parser.parseString(await res.text());
    const source = feed.title || 'RSS Feed';

    return feed.items.slice(0, this.limitPerFeed).map((item) => ({
      title: item.title ?? '',
      url: item.link ?? '',
      published: item.pubDate ?? item.isoDate ?? '',
      source,
      description: (item.contentSnippet ?? item.content ?? '').slice(
        0,
        DESCRIPTION_LIMIT,
      ),
    }));
  }
}

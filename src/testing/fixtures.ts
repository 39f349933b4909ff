import { Response } from 'node-fetch';
import { AppConfig, loadConfig } from '../config';
import { Prompter } from '../cli/prompts';

export const TEST_GEMINI_KEY = 'AIzaSy-test-placeholder-key-for-unit-tests';
export const TEST_FEED_URL = 'https://feeds.example.test/properti/rss';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({ GEMINI_KEY: TEST_GEMINI_KEY }, '/tmp'),
    rssFeeds: [TEST_FEED_URL],
    ...overrides,
  };
}

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

export function geminiBody(text: string) {
  return { candidates: [{ content: { parts: [{ text }] } }] };
}

export function rssDocument(
  channelTitle: string,
  items: Array<{ title: string; link: string; pubDate: string; description: string }>,
): string {
  const itemXml = items
    .map(
      (i) =>
        `<item><title>${i.title}</title><link>${i.link}</link>` +
        `<pubDate>${i.pubDate}</pubDate><description>${i.description}</description></item>`,
    )
    .join('');
  return (
    '<?xml version="1.0" encoding="UTF-8"?>' +
    `<rss version="2.0"><channel><title>${channelTitle}</title>` +
    `<link>https://feeds.example.test</link><description>Berita</description>` +
    `${itemXml}</channel></rss>`
  );
}

/** Answers questions from a fixed list; unanswered questions get ''. */
export class ScriptedPrompter implements Prompter {
  public readonly questions: string[] = [];
  public closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? '';
  }

  close(): void {
    this.closed = true;
  }
}

import { z } from 'zod';

export const APP_VERSION = '1.0.0';

const DEFAULT_RSS_FEEDS = [
  'https://www.kompas.com/properti/rss',
  'https://finance.detik.com/properti/rss',
  'https://www.kontan.co.id/rss/properti',
  'https://ekonomi.bisnis.com/rss',
] as const;

export type AppConfig = {
  readonly geminiKey?: string;
  readonly newsApiKey?: string;
  readonly model: string;
  readonly geminiUrl: string;
  readonly nominatimUrl: string;
  readonly newsApiUrl: string;
  readonly userAgent: string;
  // West, North, East, South
  readonly boundingBox: string;
  readonly rssFeeds: readonly string[];
  readonly outputDir: string;
};

const optionalKey = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  GEMINI_KEY: optionalKey,
  GEMINI_API_KEY: optionalKey,
  NEWSAPI_KEY: optionalKey,
  NEWS_API_KEY: optionalKey,
  REPORT_DIR: optionalKey,
});

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    geminiKey: parsed.GEMINI_KEY ?? parsed.GEMINI_API_KEY,
    newsApiKey: parsed.NEWSAPI_KEY ?? parsed.NEWS_API_KEY,
    model: 'gemini-2.0-flash',
    geminiUrl: 'https://generativelanguage.googleapis.com/v1beta/models',
    nominatimUrl: 'https://nominatim.openstreetmap.org/search',
    newsApiUrl: 'https://newsapi.org/v2/everything',
    userAgent: 'jabodetabek-property-intel/1.0 (property-analysis-cli)',
    boundingBox: '106.5,-6.0,107.2,-7.1',
    rssFeeds: DEFAULT_RSS_FEEDS,
    outputDir: parsed.REPORT_DIR ?? cwd,
  };
}

export type KeyStatus = 'valid' | 'invalid' | 'missing';

export type KeyValidation = {
  gemini: KeyStatus;
  newsApi: KeyStatus;
};

/**
 * Format-only checks. The Gemini key is required; a NewsAPI key with an
 * unexpected length is reported but still used.
 */
export function validateApiKeys(config: AppConfig): KeyValidation {
  let gemini: KeyStatus = 'missing';
  if (config.geminiKey) {
    gemini =
      config.geminiKey.length > 30 && config.geminiKey.startsWith('AIzaSy')
        ? 'valid'
        : 'invalid';
  }

  let newsApi: KeyStatus = 'missing';
  if (config.newsApiKey) {
    newsApi = config.newsApiKey.length === 32 ? 'valid' : 'invalid';
  }

  return { gemini, newsApi };
}

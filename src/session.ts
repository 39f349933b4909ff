import dayjs from 'dayjs';
import { APP_VERSION, AppConfig, validateApiKeys } from './config';
import {
  fallbackGeoResult,
  geocodeAddress,
} from './geocoding/nominatimClient';
import { composeAnalysisPrompt } from './analysis/promptComposer';
import { resolveCityContext, resolveNewsCity } from './analysis/cityContext';
import { extractJsonObject } from './analysis/jsonExtractor';
import { normalizeAnalysis } from './analysis/analysisResult';
import { generateText } from './gemini/geminiClient';
import {
  NewsSourcesRegistry,
  createNewsSources,
  gatherMarketNews,
} from './news/newsService';
import { InterruptedError, Prompter, collectPropertyInput } from './cli/prompts';
import { printAnalysis, printWelcome } from './report/consoleReport';
import { writeJsonReport, writeRawResponse } from './report/reportWriter';
import {
  GeoContext,
  JsonObject,
  NewsArticle,
  PropertyInput,
  Report,
} from './types';

// Registers an interrupt listener and returns its removal.
export type InterruptSubscriber = (listener: () => void) => () => void;

export const processInterrupts: InterruptSubscriber = (listener) => {
  process.once('SIGINT', listener);
  return () => {
    process.off('SIGINT', listener);
  };
};

export type SessionOptions = {
  prompter: Prompter;
  newsSources?: NewsSourcesRegistry;
  now?: () => Date;
  onInterrupt?: InterruptSubscriber;
};

export type AnalysisOutcome =
  | { status: 'parsed'; analysis: JsonObject; rawText: string }
  | { status: 'unparsed'; rawText: string }
  | { status: 'failed'; message: string };

export type SessionResult = {
  exitCode: number;
  // Report or raw-response file written during the run.
  outputFile?: string;
  // Set when Ctrl+C ended the run; a request may still be pending.
  interrupted?: boolean;
};

function section(title: string, width: number): void {
  console.log(`\n${title}`);
  console.log('-'.repeat(width));
}

export class PropertyAnalysisSession {
  public readonly sessionId: number;

  private readonly prompter: Prompter;
  private readonly newsSources: NewsSourcesRegistry;
  private readonly now: () => Date;
  private readonly onInterrupt: InterruptSubscriber;

  constructor(
    private readonly config: AppConfig,
    options: SessionOptions,
  ) {
    this.prompter = options.prompter;
    this.newsSources = options.newsSources ?? createNewsSources(config);
    this.now = options.now ?? (() => new Date());
    this.onInterrupt = options.onInterrupt ?? processInterrupts;
    this.sessionId = Math.floor(this.now().getTime() / 1000);
  }

  async run(): Promise<SessionResult> {
    printWelcome();
    let stopListening = () => {};

    try {
      if (!this.checkApiKeys()) {
        return { exitCode: 1 };
      }

      const property = await collectPropertyInput(this.prompter, this.now);
      if (!property) {
        console.error('❌ Alamat tidak boleh kosong');
        return { exitCode: 1 };
      }

      // Readline owns Ctrl+C while it is open; the network stages need the
      // process signal back.
      this.prompter.close();
      const interrupted = new Promise<never>((_, reject) => {
        stopListening = this.onInterrupt(() => reject(new InterruptedError()));
      });
      const guard = <T>(stage: Promise<T>): Promise<T> =>
        Promise.race([stage, interrupted]);

      const geo = await guard(this.locate(property.address));
      const news = await guard(this.gatherNews(geo));
      const outcome = await guard(this.analyze(property, geo, news));
      const outputFile = await guard(this.persist(property, geo, news, outcome));

      return { exitCode: 0, outputFile };
    } catch (err) {
      if (err instanceof InterruptedError) {
        console.log('\n\n⏹️  Analisis dihentikan oleh pengguna');
        return { exitCode: 0, interrupted: true };
      }
      console.error('\n❌ Unexpected error:', err);
      return { exitCode: 0 };
    } finally {
      stopListening();
      this.prompter.close();
      console.log('\n🏢 Terima kasih telah menggunakan Jabodetabek Property Intel!');
    }
  }

  private checkApiKeys(): boolean {
    section('🔑 VALIDASI API KEY', 40);
    const keys = validateApiKeys(this.config);

    if (keys.gemini === 'valid') console.log('✅ Gemini API: format valid');
    else if (keys.gemini === 'invalid') console.error('❌ Gemini API: format tidak valid');
    else console.error('❌ Gemini API: belum diatur');

    if (keys.newsApi === 'valid') console.log('✅ NewsAPI: format valid');
    else if (keys.newsApi === 'invalid') console.warn('⚠️  NewsAPI: format tidak valid');
    else console.warn('⚠️  NewsAPI: belum diatur (memakai RSS)');

    if (keys.gemini !== 'valid') {
      console.error('\n❌ Konfigurasi API diperlukan:');
      console.error("   export GEMINI_KEY='your-gemini-api-key'");
      console.error("   export NEWSAPI_KEY='your-newsapi-key'  # opsional");
      return false;
    }
    console.log('✅ Sistem siap untuk analisis');
    return true;
  }

  async locate(address: string): Promise<GeoContext> {
    section('🗺️  GEOCODING', 25);
    console.log(`📍 Mencari lokasi: ${address}`);

    const match = await geocodeAddress(this.config, address);
    const geo = match ?? fallbackGeoResult(address);
    if (match) {
      console.log(`✅ Lokasi ditemukan: ${match.displayName}`);
      console.log(
        `📌 Koordinat: ${match.latitude.toFixed(4)}, ${match.longitude.toFixed(4)}`,
      );
    } else {
      console.warn('⚠️ Lokasi tidak ditemukan di Jabodetabek, menggunakan estimasi');
    }

    const locationName = geo.displayName || address;
    return {
      ...geo,
      cityContext: resolveCityContext(locationName),
      city: resolveNewsCity(geo.displayName),
    };
  }

  async gatherNews(geo: GeoContext): Promise<NewsArticle[]> {
    section('📰 MARKET INTELLIGENCE', 35);
    console.log(`🔍 Target pencarian: ${geo.city}`);

    const { articles } = await gatherMarketNews(this.newsSources, geo.city);
    console.log(`✅ Berhasil mengumpulkan ${articles.length} berita properti`);
    return articles;
  }

  async analyze(
    property: PropertyInput,
    geo: GeoContext,
    news: NewsArticle[],
  ): Promise<AnalysisOutcome> {
    section('🤖 AI ANALYSIS', 32);
    console.log('⚙️  Memproses data dengan Gemini AI...');

    const prompt = composeAnalysisPrompt(property, geo, news);
    const generated = await generateText(this.config, prompt);
    if (!generated.ok) {
      console.error('❌ Gagal mendapatkan respons dari AI');
      return { status: 'failed', message: generated.message };
    }

    const analysis = extractJsonObject(generated.text);
    if (!analysis) {
      console.warn('⚠️ Gagal memparse hasil AI, menyimpan raw response');
      return { status: 'unparsed', rawText: generated.text };
    }

    console.log('✅ Analisis AI berhasil diproses');
    return { status: 'parsed', analysis, rawText: generated.text };
  }

  private async persist(
    property: PropertyInput,
    geo: GeoContext,
    news: NewsArticle[],
    outcome: AnalysisOutcome,
  ): Promise<string | undefined> {
    const at = this.now();

    if (outcome.status === 'failed') {
      console.error('❌ Analisis gagal - periksa konfigurasi API Anda');
      return undefined;
    }

    if (outcome.status === 'unparsed') {
      const file = await writeRawResponse(this.config.outputDir, outcome.rawText, at);
      console.log(`💾 Raw response tersimpan: ${file}`);
      return file;
    }

    printAnalysis(normalizeAnalysis(outcome.analysis));

    const report: Report = {
      appVersion: APP_VERSION,
      sessionId: this.sessionId,
      analysisTimestamp: dayjs(at).format(),
      propertyInput: property,
      geolocation: geo,
      newsIntelligence: { totalArticles: news.length, articles: news },
      aiAnalysis: outcome.analysis,
      rawAiResponse: outcome.rawText,
      systemInfo: { model: this.config.model, userAgent: this.config.userAgent },
    };

    try {
      const file = await writeJsonReport(this.config.outputDir, report, at);
      console.log(`\n💾 LAPORAN TERSIMPAN: ${file}`);
      return file;
    } catch (err) {
      console.error('⚠️ Gagal menyimpan laporan:', err);
      return undefined;
    }
  }
}

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import fetch, { Response } from 'node-fetch';
import dayjs from 'dayjs';
import { InterruptSubscriber, PropertyAnalysisSession } from './session';
import { InterruptedError } from './cli/prompts';
import { createNewsSources } from './news/newsService';
import { AppConfig } from './config';
import { Report } from './types';
import {
  ScriptedPrompter,
  TEST_FEED_URL,
  geminiBody,
  jsonResponse,
  rssDocument,
  testConfig,
  textResponse,
} from './testing/fixtures';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);
const now = () => new Date(2026, 0, 5, 9, 3, 7);

type Routes = {
  geocode?: () => Promise<Response>;
  gemini?: () => Promise<Response>;
};

const BSD_CANDIDATE = {
  display_name: 'BSD City, Tangerang Selatan, Banten, Indonesia',
  lat: '-6.3024',
  lon: '106.6522',
  address: { city: 'Tangerang Selatan' },
  osm_id: 111,
};

const FEED_XML = rssDocument('Kanal Properti', [
  {
    title: 'Stasiun baru dibuka',
    link: 'https://feeds.example.test/stasiun',
    pubDate: 'Sun, 04 Jan 2026 08:00:00 GMT',
    description: 'Akses transportasi membaik',
  },
]);

function route(routes: Routes): void {
  fetchMock.mockImplementation(async (input) => {
    const url = String(input);
    if (url.startsWith('https://nominatim.openstreetmap.org/')) {
      return routes.geocode ? routes.geocode() : jsonResponse([BSD_CANDIDATE]);
    }
    if (url.startsWith('https://generativelanguage.googleapis.com/')) {
      return routes.gemini
        ? routes.gemini()
        : jsonResponse(geminiBody('{"trust_score": 80}'));
    }
    if (url === TEST_FEED_URL) {
      return textResponse(FEED_XML);
    }
    throw new Error(`Unexpected request: ${url}`);
  });
}

function requestedUrls(): string[] {
  return fetchMock.mock.calls.map(([input]) => String(input));
}

function sentPrompt(): string {
  const call = fetchMock.mock.calls.find(([input]) =>
    String(input).includes('generativelanguage'),
  );
  const body = JSON.parse(String(call?.[1]?.body));
  return body.contents[0].parts[0].text;
}

class FailingPrompter extends ScriptedPrompter {
  constructor(private readonly error: Error) {
    super([]);
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    throw this.error;
  }
}

/** Interrupt source the test fires by hand. */
function manualInterrupts() {
  let listener: (() => void) | undefined;
  let removed = false;
  const subscribe: InterruptSubscriber = (fn) => {
    listener = fn;
    return () => {
      removed = true;
    };
  };
  return {
    subscribe,
    fire: () => listener?.(),
    isRemoved: () => removed,
  };
}

let dir: string;
let config: AppConfig;

function session(answers: string[], overrides: Partial<AppConfig> = {}) {
  const cfg = { ...config, ...overrides };
  return new PropertyAnalysisSession(cfg, {
    prompter: new ScriptedPrompter(answers),
    newsSources: createNewsSources(cfg, { delayMs: 0 }),
    now,
  });
}

async function readReport(file: string | undefined): Promise<Report> {
  expect(file).toBeDefined();
  return JSON.parse(await fs.readFile(String(file), 'utf-8'));
}

beforeEach(async () => {
  fetchMock.mockReset();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'session-'));
  config = testConfig({ outputDir: dir });
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe('PropertyAnalysisSession', () => {
  it('uses the Tangerang Selatan context for a BSD address', async () => {
    route({});

    const result = await session(['BSD City, Tangerang Selatan']).run();

    expect(result.exitCode).toBe(0);
    expect(result.outputFile).toBe(path.join(dir, 'property_analysis_20260105_090307.json'));

    const report = await readReport(result.outputFile);
    expect(report.geolocation.cityContext).toBe(
      'Tangerang Selatan - Area berkembang dengan infrastruktur modern',
    );
    expect(report.geolocation.city).toBe('Tangerang Selatan');
    expect(report.geolocation.confidence).toBe(1);
    expect(report.propertyInput.floodRisk).toBe('sedang');
    expect(report.newsIntelligence.articles[0].title).toBe('Stasiun baru dibuka');
    expect(report.aiAnalysis).toEqual({ trust_score: 80 });
    expect(report.sessionId).toBe(Math.floor(now().getTime() / 1000));
    expect(report.analysisTimestamp).toBe(dayjs(now()).format());
    expect(report.analysisTimestamp).toBe(report.propertyInput.timestamp);
    expect(sentPrompt()).toContain(
      'Konteks Wilayah: Tangerang Selatan - Area berkembang dengan infrastruktur modern',
    );
  });

  it('repairs the trailing comma in the model answer', async () => {
    const raw =
      'Here is the result:\n{"trust_score": 72, "risk_analysis": {"flood": 10,}}\nThanks.';
    route({ gemini: async () => jsonResponse(geminiBody(raw)) });

    const result = await session(['Kemang, Jakarta Selatan']).run();

    const report = await readReport(result.outputFile);
    expect(report.aiAnalysis).toEqual({ trust_score: 72, risk_analysis: { flood: 10 } });
    expect(report.rawAiResponse).toBe(raw);
  });

  it('finishes without a report when the model call fails', async () => {
    route({
      gemini: async () => {
        throw new Error('socket hang up');
      },
    });

    const result = await session(['Kemang, Jakarta Selatan']).run();

    expect(result).toEqual({ exitCode: 0, outputFile: undefined });
    expect(await fs.readdir(dir)).toEqual([]);
    expect(console.error).toHaveBeenCalledWith('❌ Gagal mendapatkan respons dari AI');
  });

  it('keeps the raw text when no object can be recovered', async () => {
    const raw = 'Maaf, saya tidak dapat memberikan analisis.';
    route({ gemini: async () => jsonResponse(geminiBody(raw)) });

    const result = await session(['Depok']).run();

    expect(result.exitCode).toBe(0);
    expect(result.outputFile).toBe(
      path.join(dir, `property_raw_${Math.floor(now().getTime() / 1000)}.txt`),
    );
    expect(await fs.readFile(String(result.outputFile), 'utf-8')).toBe(raw);
  });

  it('falls back to the fixed centroid when geocoding finds nothing', async () => {
    route({ geocode: async () => jsonResponse([]) });

    const result = await session(['Cibubur']).run();

    const report = await readReport(result.outputFile);
    expect(report.geolocation).toMatchObject({
      displayName: 'Area Cibubur (estimasi)',
      latitude: -6.2,
      longitude: 106.8,
      source: 'fallback',
      confidence: 0,
      cityContext: 'Area Jabodetabek - Kawasan metropolitan Jakarta',
      city: 'Jakarta',
    });
  });

  it('never calls the search API without a key', async () => {
    route({});

    await session(['Bekasi']).run();

    expect(requestedUrls().some((url) => url.includes('newsapi.org'))).toBe(false);
    expect(requestedUrls()).toContain(TEST_FEED_URL);
  });

  it('aborts before any request when the Gemini key is missing', async () => {
    const result = await session(['Bekasi'], { geminiKey: undefined }).run();

    expect(result.exitCode).toBe(1);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('aborts on a blank address', async () => {
    const prompter = new ScriptedPrompter(['']);
    const result = await new PropertyAnalysisSession(config, { prompter, now }).run();

    expect(result.exitCode).toBe(1);
    expect(prompter.closed).toBe(true);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('closes the prompter before the first request', async () => {
    const prompter = new ScriptedPrompter(['Bekasi']);
    const closedAtRequest: boolean[] = [];
    route({
      geocode: async () => {
        closedAtRequest.push(prompter.closed);
        return jsonResponse([BSD_CANDIDATE]);
      },
    });

    await new PropertyAnalysisSession(config, {
      prompter,
      newsSources: createNewsSources(config, { delayMs: 0 }),
      now,
    }).run();

    expect(closedAtRequest).toEqual([true]);
  });

  it('stops at Ctrl+C during the model call', async () => {
    const interrupts = manualInterrupts();
    route({
      gemini: () => {
        interrupts.fire();
        return new Promise<Response>(() => {});
      },
    });

    const result = await new PropertyAnalysisSession(config, {
      prompter: new ScriptedPrompter(['Depok']),
      newsSources: createNewsSources(config, { delayMs: 0 }),
      now,
      onInterrupt: interrupts.subscribe,
    }).run();

    expect(result).toEqual({ exitCode: 0, interrupted: true });
    expect(console.log).toHaveBeenCalledWith('\n\n⏹️  Analisis dihentikan oleh pengguna');
    expect(interrupts.isRemoved()).toBe(true);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('stops at Ctrl+C during input', async () => {
    const prompter = new FailingPrompter(new InterruptedError());

    const result = await new PropertyAnalysisSession(config, { prompter, now }).run();

    expect(result).toEqual({ exitCode: 0, interrupted: true });
    expect(prompter.closed).toBe(true);
    expect(console.log).toHaveBeenCalledWith('\n\n⏹️  Analisis dihentikan oleh pengguna');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('logs an unexpected error and still says goodbye', async () => {
    const failure = new Error('stdin closed');
    const prompter = new FailingPrompter(failure);

    const result = await new PropertyAnalysisSession(config, { prompter, now }).run();

    expect(result).toEqual({ exitCode: 0 });
    expect(prompter.closed).toBe(true);
    expect(console.error).toHaveBeenCalledWith('\n❌ Unexpected error:', failure);
    expect(console.log).toHaveBeenCalledWith(
      '\n🏢 Terima kasih telah menggunakan Jabodetabek Property Intel!',
    );
  });
});
